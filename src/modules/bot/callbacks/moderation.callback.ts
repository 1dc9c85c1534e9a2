import type { Logger } from '@nestjs/common'
import type { Bot } from 'grammy'
import type { ComplaintsService } from '../../complaints/complaints.service'
import type { I18nService } from '../../i18n/i18n.service'
import type { RequestsService } from '../../requests/requests.service'
import {
	MODERATION_CALLBACK,
	cancelAdminInputKeyboard
} from '../../../shared/keyboards/admin'
import type { BotContext } from '../core/bot.middleware'
import { activateAdminInput } from '../core/input-mode'
import type { NotificationsService } from '../notifications.service'
import { bestEffort, callbackId, ensureAdmin, withErrorReply } from '../utils/reply'

export const moderationCallbacks = (
	bot: Bot<BotContext>,
	requestsService: RequestsService,
	complaintsService: ComplaintsService,
	notifications: NotificationsService,
	i18n: I18nService,
	logger: Logger
) => {
	const guarded = (
		prefix: string,
		handler: (ctx: BotContext, id: number, actorId: number) => Promise<void>
	) =>
		withErrorReply(i18n, logger, async ctx => {
			if (!(await ensureAdmin(ctx, i18n))) return
			const id = callbackId(ctx, prefix)
			const actorId = ctx.from?.id
			if (id == null || actorId == null) return
			await handler(ctx, id, actorId)
		})

	const dropButtons = (ctx: BotContext) =>
		bestEffort(logger, 'drop moderation buttons', () => ctx.editMessageReplyMarkup())

	bot.callbackQuery(
		/^req:approve:\d+$/,
		guarded(MODERATION_CALLBACK.approve, async (ctx, id, actorId) => {
			const request = await requestsService.approve(actorId, id)
			await dropButtons(ctx)
			await ctx.reply(i18n.t(ctx.state.lang, 'request_approved_admin', { id }))
			await notifications.requestResolved(request)
		})
	)

	bot.callbackQuery(
		/^req:reject:\d+$/,
		guarded(MODERATION_CALLBACK.reject, async (ctx, id, actorId) => {
			const request = await requestsService.reject(actorId, id)
			await dropButtons(ctx)
			await ctx.reply(i18n.t(ctx.state.lang, 'request_rejected_admin', { id }))
			await notifications.requestResolved(request)
		})
	)

	bot.callbackQuery(
		/^req:reject_note:\d+$/,
		guarded(MODERATION_CALLBACK.rejectWithNote, async (ctx, id, actorId) => {
			await requestsService.get(actorId, id)
			activateAdminInput(ctx, { mode: 'reject_note', requestId: id })
			await ctx.reply(i18n.t(ctx.state.lang, 'enter_reject_note', { id }), {
				reply_markup: cancelAdminInputKeyboard(i18n, ctx.state.lang)
			})
		})
	)

	bot.callbackQuery(
		/^cmp:close:\d+$/,
		guarded(MODERATION_CALLBACK.closeComplaint, async (ctx, id, actorId) => {
			const complaint = await complaintsService.close(actorId, id)
			await dropButtons(ctx)
			await ctx.reply(i18n.t(ctx.state.lang, 'complaint_closed_admin', { id }))
			await notifications.complaintClosed(complaint)
		})
	)

	bot.callbackQuery(
		/^cmp:reply:\d+$/,
		guarded(MODERATION_CALLBACK.replyComplaint, async (ctx, id) => {
			activateAdminInput(ctx, { mode: 'complaint_reply', complaintId: id })
			await ctx.reply(i18n.t(ctx.state.lang, 'enter_complaint_reply', { id }), {
				reply_markup: cancelAdminInputKeyboard(i18n, ctx.state.lang)
			})
		})
	)
}
