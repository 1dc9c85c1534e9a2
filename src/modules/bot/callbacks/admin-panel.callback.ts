import type { Logger } from '@nestjs/common'
import { InputFile, type Bot, type InlineKeyboard } from 'grammy'
import { describeError } from '../../../common/errors'
import type { AnnouncementsService } from '../../announcements/announcements.service'
import type { CompaniesService } from '../../companies/companies.service'
import type { ComplaintsService } from '../../complaints/complaints.service'
import type { I18nService } from '../../i18n/i18n.service'
import type { BackupService } from '../../reports/backup.service'
import type { ReportsService } from '../../reports/reports.service'
import type { RequestsService } from '../../requests/requests.service'
import type { UsersService } from '../../users/users.service'
import {
	ADMIN_CALLBACK,
	adminPanelKeyboard,
	broadcastRunningKeyboard,
	cancelAdminInputKeyboard,
	companiesAdminKeyboard,
	companyAdminKeyboard,
	complaintModerationKeyboard,
	requestModerationKeyboard
} from '../../../shared/keyboards/admin'
import type { BotContext } from '../core/bot.middleware'
import { activateAdminInput, clearAdminInput } from '../core/input-mode'
import { complaintCardText, requestCardText } from '../elements/cards'
import type { NotificationsService } from '../notifications.service'
import { bestEffort, callbackId, ensureAdmin, withErrorReply } from '../utils/reply'

export interface AdminPanelDeps {
	users: UsersService
	companies: CompaniesService
	requests: RequestsService
	complaints: ComplaintsService
	announcements: AnnouncementsService
	reports: ReportsService
	backups: BackupService
	notifications: NotificationsService
	i18n: I18nService
	logger: Logger
}

/** Edits the panel message in place, or sends a new one when it cannot. */
async function show(
	ctx: BotContext,
	logger: Logger,
	text: string,
	keyboard: InlineKeyboard
): Promise<void> {
	try {
		await ctx.editMessageText(text, { reply_markup: keyboard })
	} catch (error: unknown) {
		logger.debug(`panel edit fell back to reply: ${describeError(error)}`)
		await ctx.reply(text, { reply_markup: keyboard })
	}
}

export async function renderCompanies(
	ctx: BotContext,
	actorId: number,
	deps: Pick<AdminPanelDeps, 'companies' | 'i18n' | 'logger'>
): Promise<void> {
	const { companies, i18n, logger } = deps
	const lang = ctx.state.lang
	const list = await companies.listAll(actorId)
	await show(
		ctx,
		logger,
		i18n.t(lang, list.length ? 'admin_companies_title' : 'admin_companies_empty'),
		companiesAdminKeyboard(i18n, lang, list)
	)
}

export async function renderCompany(
	ctx: BotContext,
	actorId: number,
	companyId: number,
	deps: Pick<AdminPanelDeps, 'companies' | 'i18n' | 'logger'>
): Promise<void> {
	const { companies, i18n, logger } = deps
	const lang = ctx.state.lang
	const company = await companies.getCompany(actorId, companyId)
	const methods = await companies.listPaymentMethods(actorId, companyId)
	await show(
		ctx,
		logger,
		i18n.t(lang, 'admin_company_title', {
			name: company.name,
			status: { key: company.isActive ? 'status_active' : 'status_inactive' },
			methods: methods.length
		}),
		companyAdminKeyboard(i18n, lang, company, methods)
	)
}

export const adminPanelCallbacks = (bot: Bot<BotContext>, deps: AdminPanelDeps) => {
	const { i18n, logger } = deps

	const admin = (handler: (ctx: BotContext, actorId: number) => Promise<void>) =>
		withErrorReply(i18n, logger, async ctx => {
			if (!(await ensureAdmin(ctx, i18n))) return
			const actorId = ctx.from?.id
			if (actorId == null) return
			await handler(ctx, actorId)
		})

	const adminWithId = (
		prefix: string,
		handler: (ctx: BotContext, actorId: number, id: number) => Promise<void>
	) =>
		admin(async (ctx, actorId) => {
			const id = callbackId(ctx, prefix)
			if (id == null) return
			await handler(ctx, actorId, id)
		})

	bot.callbackQuery(
		ADMIN_CALLBACK.panel,
		admin(async ctx => {
			clearAdminInput(ctx)
			await show(
				ctx,
				logger,
				i18n.t(ctx.state.lang, 'admin_panel'),
				adminPanelKeyboard(i18n, ctx.state.lang)
			)
		})
	)

	bot.callbackQuery(
		ADMIN_CALLBACK.pending,
		admin(async (ctx, actorId) => {
			const lang = ctx.state.lang
			const [pending, counts] = await Promise.all([
				deps.requests.listPending(actorId),
				deps.requests.countByStatus(actorId)
			])
			await ctx.reply(i18n.t(lang, 'pending_summary', { ...counts }))
			for (const request of pending) {
				const [user, labels] = await Promise.all([
					deps.users.findByTelegramId(request.userId),
					deps.companies.labelsFor(request.companyId, request.paymentMethodId)
				])
				await ctx.reply(requestCardText(i18n, lang, request, labels, user), {
					reply_markup: requestModerationKeyboard(i18n, lang, request.id)
				})
			}
		})
	)

	bot.callbackQuery(
		ADMIN_CALLBACK.complaints,
		admin(async (ctx, actorId) => {
			const lang = ctx.state.lang
			const open = await deps.complaints.listOpen(actorId)
			if (!open.length) {
				await ctx.reply(i18n.t(lang, 'no_open_complaints'))
				return
			}
			for (const complaint of open) {
				const user = await deps.users.findByTelegramId(complaint.userId)
				await ctx.reply(complaintCardText(i18n, lang, complaint, user), {
					reply_markup: complaintModerationKeyboard(i18n, lang, complaint.id)
				})
			}
		})
	)

	bot.callbackQuery(
		ADMIN_CALLBACK.companies,
		admin((ctx, actorId) => renderCompanies(ctx, actorId, deps))
	)

	bot.callbackQuery(
		/^admin:company:\d+$/,
		adminWithId(ADMIN_CALLBACK.company, (ctx, actorId, id) =>
			renderCompany(ctx, actorId, id, deps)
		)
	)

	bot.callbackQuery(
		/^admin:company_toggle:\d+$/,
		adminWithId(ADMIN_CALLBACK.companyToggle, async (ctx, actorId, id) => {
			await deps.companies.toggleCompany(actorId, id)
			await renderCompany(ctx, actorId, id, deps)
		})
	)

	bot.callbackQuery(
		/^admin:method_toggle:\d+$/,
		adminWithId(ADMIN_CALLBACK.methodToggle, async (ctx, actorId, id) => {
			const method = await deps.companies.togglePaymentMethod(actorId, id)
			await renderCompany(ctx, actorId, method.companyId, deps)
		})
	)

	bot.callbackQuery(
		ADMIN_CALLBACK.companyAdd,
		admin(async ctx => {
			activateAdminInput(ctx, { mode: 'company_name' })
			await ctx.reply(i18n.t(ctx.state.lang, 'enter_company_name'), {
				reply_markup: cancelAdminInputKeyboard(i18n, ctx.state.lang)
			})
		})
	)

	bot.callbackQuery(
		/^admin:method_add:\d+$/,
		adminWithId(ADMIN_CALLBACK.methodAdd, async (ctx, actorId, companyId) => {
			const company = await deps.companies.getCompany(actorId, companyId)
			activateAdminInput(ctx, { mode: 'payment_method_label', companyId })
			await ctx.reply(
				i18n.t(ctx.state.lang, 'enter_payment_method_label', { company: company.name }),
				{ reply_markup: cancelAdminInputKeyboard(i18n, ctx.state.lang) }
			)
		})
	)

	bot.callbackQuery(
		ADMIN_CALLBACK.announce,
		admin(async ctx => {
			activateAdminInput(ctx, { mode: 'broadcast_text' })
			await ctx.reply(i18n.t(ctx.state.lang, 'enter_broadcast_text'), {
				reply_markup: cancelAdminInputKeyboard(i18n, ctx.state.lang)
			})
		})
	)

	bot.callbackQuery(
		ADMIN_CALLBACK.announceSend,
		admin(async (ctx, actorId) => {
			const lang = ctx.state.lang
			const input = ctx.session.adminInput
			if (input?.mode !== 'broadcast_confirm') {
				await ctx.reply(i18n.t(lang, 'broadcast_expired'))
				return
			}
			const handle = await deps.announcements.announce(actorId, input.text)
			clearAdminInput(ctx)
			await bestEffort(logger, 'drop broadcast buttons', () => ctx.editMessageReplyMarkup())
			await ctx.reply(
				i18n.t(lang, 'broadcast_started', {
					id: handle.adId,
					total: handle.progress().total
				}),
				{ reply_markup: broadcastRunningKeyboard(i18n, lang) }
			)
			void handle.done
				.then(summary => deps.notifications.broadcastFinished(actorId, summary))
				.catch((error: unknown) => {
					logger.error(`broadcast #${handle.adId} finalization failed: ${describeError(error)}`)
					return deps.notifications.broadcastFailed(actorId, handle.adId)
				})
		})
	)

	bot.callbackQuery(
		ADMIN_CALLBACK.announceCancel,
		admin(async ctx => {
			clearAdminInput(ctx)
			await bestEffort(logger, 'drop broadcast buttons', () => ctx.editMessageReplyMarkup())
			await ctx.reply(i18n.t(ctx.state.lang, 'cancelled'))
		})
	)

	bot.callbackQuery(
		ADMIN_CALLBACK.broadcastStatus,
		admin(async (ctx, actorId) => {
			const lang = ctx.state.lang
			const progress = deps.announcements.status(actorId)
			if (!progress) {
				await ctx.reply(i18n.t(lang, 'broadcast_idle'))
				return
			}
			await ctx.reply(
				i18n.t(lang, 'broadcast_progress', {
					id: progress.adId,
					sent: progress.sent,
					failed: progress.failed,
					total: progress.total
				}),
				{ reply_markup: broadcastRunningKeyboard(i18n, lang) }
			)
		})
	)

	bot.callbackQuery(
		ADMIN_CALLBACK.broadcastStop,
		admin(async (ctx, actorId) => {
			const progress = await deps.announcements.stop(actorId)
			await ctx.reply(
				i18n.t(ctx.state.lang, 'broadcast_stopping', {
					id: progress.adId,
					sent: progress.sent,
					total: progress.total
				})
			)
		})
	)

	bot.callbackQuery(
		ADMIN_CALLBACK.reports,
		admin(async (ctx, actorId) => {
			const lang = ctx.state.lang
			await ctx.reply(i18n.t(lang, 'reports_generating'))
			const files = await deps.reports.generate(actorId)
			if (!files.length) {
				await ctx.reply(i18n.t(lang, 'reports_empty'))
				return
			}
			for (const file of files) {
				await ctx.replyWithDocument(new InputFile(file.path), {
					caption: i18n.t(lang, 'report_caption', { table: file.table, rows: file.rows })
				})
			}
		})
	)

	bot.callbackQuery(
		ADMIN_CALLBACK.backup,
		admin(async (ctx, actorId) => {
			const backup = await deps.backups.create(actorId)
			await ctx.replyWithDocument(new InputFile(backup.path), {
				caption: i18n.t(ctx.state.lang, 'backup_caption', { bytes: backup.bytes })
			})
		})
	)
}
