import type { Logger } from '@nestjs/common'
import type { Bot } from 'grammy'
import type { AuditService } from '../../admin/audit.service'
import type { I18nService } from '../../i18n/i18n.service'
import { adminPanelKeyboard } from '../../../shared/keyboards/admin'
import { formatDateTime } from '../../../utils/format'
import { initialSession, type BotContext } from '../core/bot.middleware'
import type { SessionStore } from '../core/session-store'
import { commandArgument, ensureAdmin, withErrorReply } from '../utils/reply'

const AUDIT_PAGE = 15

export async function showAdminPanel(ctx: BotContext, i18n: I18nService): Promise<void> {
	if (!(await ensureAdmin(ctx, i18n))) return
	await ctx.reply(i18n.t(ctx.state.lang, 'admin_panel'), {
		reply_markup: adminPanelKeyboard(i18n, ctx.state.lang)
	})
}

export const adminCommands = (
	bot: Bot<BotContext>,
	sessions: SessionStore,
	audit: AuditService,
	i18n: I18nService,
	logger: Logger
) => {
	bot.command(
		'admin',
		withErrorReply(i18n, logger, ctx => showAdminPanel(ctx, i18n))
	)

	bot.command(
		'audit',
		withErrorReply(i18n, logger, async ctx => {
			if (!(await ensureAdmin(ctx, i18n))) return
			const entries = await audit.recent(ctx.from?.id ?? 0, AUDIT_PAGE)
			const lang = ctx.state.lang
			if (!entries.length) {
				await ctx.reply(i18n.t(lang, 'audit_empty'))
				return
			}
			const lines = entries.map(
				entry =>
					`${formatDateTime(entry.createdAt)} ${entry.actorId} ${entry.action} ${entry.entity}${entry.entityId == null ? '' : `#${entry.entityId}`}`
			)
			await ctx.reply(`${i18n.t(lang, 'audit_title')}\n${lines.join('\n')}`)
		})
	)

	// `/reset` alone resets the caller; admins may pass another user's id.
	bot.command(
		'reset',
		withErrorReply(i18n, logger, async ctx => {
			const lang = ctx.state.lang
			const actorId = ctx.from?.id
			if (actorId == null) return
			const arg = commandArgument(ctx.match)
			if (!arg) {
				ctx.session = initialSession()
				await ctx.reply(i18n.t(lang, 'reset_done'))
				return
			}
			if (!(await ensureAdmin(ctx, i18n))) return
			if (!/^\d+$/.test(arg)) {
				await ctx.reply(i18n.t(lang, 'reset_usage'))
				return
			}
			const targetId = Number(arg)
			let wasActive: boolean
			if (targetId === actorId) {
				wasActive = ctx.session.flow.step !== 'idle' || ctx.session.adminInput !== undefined
				ctx.session = initialSession()
			} else {
				wasActive = sessions.reset(targetId)
			}
			await audit.record({
				actorId,
				action: 'user.reset',
				entity: 'user',
				entityId: null,
				details: { telegramId: targetId, wasActive }
			})
			await ctx.reply(
				i18n.t(lang, wasActive ? 'reset_user_done' : 'reset_user_idle', { id: targetId })
			)
		})
	)
}
