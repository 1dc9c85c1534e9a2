import {
	Injectable,
	Logger,
	OnModuleDestroy,
	OnModuleInit
} from '@nestjs/common'
import { session } from 'grammy'
import { AppSettings } from '../../config/app-settings'
import { describeError } from '../../common/errors'
import { AdminGateService } from '../admin/admin-gate.service'
import { AuditService } from '../admin/audit.service'
import { AnnouncementsService } from '../announcements/announcements.service'
import { CompaniesService } from '../companies/companies.service'
import { ComplaintsService } from '../complaints/complaints.service'
import { I18nService } from '../i18n/i18n.service'
import { BackupService } from '../reports/backup.service'
import { ReportsService } from '../reports/reports.service'
import { RequestsService } from '../requests/requests.service'
import { TelegramBot } from '../telegram/telegram-bot'
import { UsersService } from '../users/users.service'
import { languageKeyboard } from '../../shared/keyboards/language'
import {
	resolveMenuAction,
	type MenuAction
} from '../../shared/keyboards/main-menu'
import { adminCommands, showAdminPanel } from './commands/admin.command'
import { cancelCommand, cancelCurrent } from './commands/cancel.command'
import { startCommand } from './commands/start.command'
import { adminPanelCallbacks } from './callbacks/admin-panel.callback'
import { hideMessageCallback } from './callbacks/hide-message.callback'
import { intakeCallbacks } from './callbacks/intake.callback'
import { languageCallback } from './callbacks/language.callback'
import { moderationCallbacks } from './callbacks/moderation.callback'
import { handleAdminInput } from './core/admin-input.handler'
import {
	initialSession,
	userContextMiddleware,
	type BotContext
} from './core/bot.middleware'
import { FlowRunner } from './core/flow-runner'
import { SessionStore } from './core/session-store'
import { accountText } from './elements/cards'
import { NotificationsService } from './notifications.service'
import { requireUser, withErrorReply } from './utils/reply'

const RECENT_REQUESTS = 5

@Injectable()
export class BotService implements OnModuleInit, OnModuleDestroy {
	private readonly logger = new Logger(BotService.name)

	constructor(
		private readonly bot: TelegramBot,
		private readonly settings: AppSettings,
		private readonly i18n: I18nService,
		private readonly gate: AdminGateService,
		private readonly audit: AuditService,
		private readonly sessions: SessionStore,
		private readonly runner: FlowRunner,
		private readonly notifications: NotificationsService,
		private readonly usersService: UsersService,
		private readonly companiesService: CompaniesService,
		private readonly requestsService: RequestsService,
		private readonly complaintsService: ComplaintsService,
		private readonly announcementsService: AnnouncementsService,
		private readonly reportsService: ReportsService,
		private readonly backupService: BackupService
	) {}

	async onModuleInit() {
		await this.bot.api.setMyCommands([
			{ command: 'start', description: this.i18n.t('en', 'command_start') },
			{ command: 'cancel', description: this.i18n.t('en', 'command_cancel') },
			{ command: 'reset', description: this.i18n.t('en', 'command_reset') }
		])

		this.bot.use(
			session({
				initial: initialSession,
				getSessionKey: ctx =>
					ctx.from ? SessionStore.keyFor(ctx.from.id) : undefined,
				storage: this.sessions.storage
			})
		)

		// Answer callbacks before any lookup so the query does not expire
		this.bot.use((ctx, next) => {
			if (ctx.callbackQuery) {
				return ctx
					.answerCallbackQuery()
					.catch((error: unknown) => {
						this.logger.debug(`answerCallbackQuery: ${describeError(error)}`)
					})
					.then(() => next())
			}
			return next()
		})

		this.bot.use(
			userContextMiddleware(this.usersService, this.gate, this.settings.defaultLanguage)
		)

		this.bot.catch(async err => {
			this.logger.error(`Bot error: ${err.message}`, err.stack)
			const ctx = err.ctx
			if (!ctx.chat) return
			const lang = ctx.state?.lang ?? this.settings.defaultLanguage
			await ctx.reply(this.i18n.t(lang, 'error')).catch((error: unknown) => {
				this.logger.warn(`error reply failed: ${describeError(error)}`)
			})
		})

		// Commands
		startCommand(this.bot, this.usersService, this.i18n, this.logger)
		cancelCommand(this.bot, this.runner, this.i18n, this.logger)
		adminCommands(this.bot, this.sessions, this.audit, this.i18n, this.logger)

		// Callbacks
		intakeCallbacks(this.bot, this.runner, this.i18n, this.logger)
		languageCallback(this.bot, this.usersService, this.i18n, this.logger)
		moderationCallbacks(
			this.bot,
			this.requestsService,
			this.complaintsService,
			this.notifications,
			this.i18n,
			this.logger
		)
		adminPanelCallbacks(this.bot, {
			users: this.usersService,
			companies: this.companiesService,
			requests: this.requestsService,
			complaints: this.complaintsService,
			announcements: this.announcementsService,
			reports: this.reportsService,
			backups: this.backupService,
			notifications: this.notifications,
			i18n: this.i18n,
			logger: this.logger
		})
		hideMessageCallback(this.bot, this.logger)

		// Buttons whose flow has already moved on
		this.bot.on(
			'callback_query:data',
			withErrorReply(this.i18n, this.logger, ctx => this.runner.reprompt(ctx))
		)

		this.bot.on(
			'message:text',
			withErrorReply(this.i18n, this.logger, ctx => this.onText(ctx))
		)

		this.bot
			.start({
				onStart: info => this.logger.log(`Bot @${info.username} started`)
			})
			.catch((error: unknown) => {
				this.logger.error(`Bot polling stopped: ${describeError(error)}`)
			})
	}

	async onModuleDestroy() {
		await this.bot.stop()
	}

	private async onText(ctx: BotContext): Promise<void> {
		const text = ctx.message?.text ?? ''
		if (text.startsWith('/')) {
			await ctx.reply(this.i18n.t(ctx.state.lang, 'unknown_command'))
			return
		}

		const action = resolveMenuAction(this.i18n, text)
		if (action) {
			await this.onMenu(ctx, action)
			return
		}

		const adminInput = ctx.session.adminInput
		if (adminInput) {
			await handleAdminInput(ctx, adminInput, text, {
				companies: this.companiesService,
				requests: this.requestsService,
				complaints: this.complaintsService,
				announcements: this.announcementsService,
				notifications: this.notifications,
				i18n: this.i18n,
				logger: this.logger
			})
			return
		}

		await this.runner.run(ctx, { type: 'text', text })
	}

	private async onMenu(ctx: BotContext, action: MenuAction): Promise<void> {
		const lang = ctx.state.lang
		switch (action.type) {
			case 'cancel':
				await cancelCurrent(ctx, this.runner, this.i18n)
				return
			case 'begin_request':
				await this.runner.run(ctx, { type: 'begin_request', kind: action.kind })
				return
			case 'begin_complaint':
				await this.runner.run(ctx, { type: 'begin_complaint' })
				return
			case 'admin':
				ctx.session.adminInput = undefined
				await showAdminPanel(ctx, this.i18n)
				return
			case 'language':
				await ctx.reply(this.i18n.t(lang, 'choose_language'), {
					reply_markup: languageKeyboard(this.i18n, this.settings.supportedLanguages)
				})
				return
			case 'account': {
				const user = await requireUser(ctx, this.i18n)
				if (!user) return
				const recent = await this.requestsService.listByUser(
					user.telegramId,
					RECENT_REQUESTS
				)
				await ctx.reply(accountText(this.i18n, lang, user, recent))
				return
			}
		}
	}
}
