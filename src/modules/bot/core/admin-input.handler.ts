import type { Logger } from '@nestjs/common'
import { ValidationError } from '../../../common/errors'
import type { AnnouncementsService } from '../../announcements/announcements.service'
import type { CompaniesService } from '../../companies/companies.service'
import type { ComplaintsService } from '../../complaints/complaints.service'
import type { I18nService } from '../../i18n/i18n.service'
import type { RequestsService } from '../../requests/requests.service'
import {
	broadcastConfirmKeyboard,
	cancelAdminInputKeyboard
} from '../../../shared/keyboards/admin'
import { renderCompanies, renderCompany } from '../callbacks/admin-panel.callback'
import { broadcastPreviewText } from '../elements/cards'
import type { NotificationsService } from '../notifications.service'
import { replyError } from '../utils/reply'
import type { AdminInput, BotContext } from './bot.middleware'
import { activateAdminInput, clearAdminInput } from './input-mode'

export interface AdminInputDeps {
	companies: CompaniesService
	requests: RequestsService
	complaints: ComplaintsService
	announcements: AnnouncementsService
	notifications: NotificationsService
	i18n: I18nService
	logger: Logger
}

/**
 * Consumes a text message typed in answer to an admin prompt. Invalid text
 * keeps the prompt open; any other failure closes it.
 */
export async function handleAdminInput(
	ctx: BotContext,
	input: AdminInput,
	text: string,
	deps: AdminInputDeps
): Promise<void> {
	const { i18n, logger } = deps
	const lang = ctx.state.lang
	const actorId = ctx.from?.id
	if (actorId == null) return
	if (!ctx.state.isAdmin) {
		clearAdminInput(ctx)
		await ctx.reply(i18n.t(lang, 'unauthorized'))
		return
	}

	try {
		switch (input.mode) {
			case 'company_name': {
				const company = await deps.companies.create(actorId, text)
				clearAdminInput(ctx)
				await ctx.reply(i18n.t(lang, 'company_created', { name: company.name }))
				await renderCompanies(ctx, actorId, deps)
				return
			}
			case 'payment_method_label': {
				const label = text.trim()
				if (!label) throw new ValidationError('Empty label', 'invalid_name')
				activateAdminInput(ctx, {
					mode: 'payment_method_details',
					companyId: input.companyId,
					label
				})
				await ctx.reply(i18n.t(lang, 'enter_payment_method_details', { label }), {
					reply_markup: cancelAdminInputKeyboard(i18n, lang)
				})
				return
			}
			case 'payment_method_details': {
				const method = await deps.companies.addPaymentMethod(
					actorId,
					input.companyId,
					input.label,
					text
				)
				clearAdminInput(ctx)
				await ctx.reply(i18n.t(lang, 'payment_method_created', { label: method.label }))
				await renderCompany(ctx, actorId, input.companyId, deps)
				return
			}
			case 'broadcast_text': {
				const body = deps.announcements.validateText(text)
				activateAdminInput(ctx, { mode: 'broadcast_confirm', text: body })
				await ctx.reply(broadcastPreviewText(i18n, lang, body), {
					reply_markup: broadcastConfirmKeyboard(i18n, lang)
				})
				return
			}
			case 'broadcast_confirm':
				await ctx.reply(i18n.t(lang, 'broadcast_use_buttons'), {
					reply_markup: broadcastConfirmKeyboard(i18n, lang)
				})
				return
			case 'reject_note': {
				const request = await deps.requests.reject(actorId, input.requestId, text)
				clearAdminInput(ctx)
				await ctx.reply(i18n.t(lang, 'request_rejected_admin', { id: request.id }))
				await deps.notifications.requestResolved(request)
				return
			}
			case 'complaint_reply': {
				const complaint = await deps.complaints.close(actorId, input.complaintId, text)
				clearAdminInput(ctx)
				await ctx.reply(i18n.t(lang, 'complaint_closed_admin', { id: complaint.id }))
				await deps.notifications.complaintClosed(complaint)
				return
			}
		}
	} catch (error: unknown) {
		if (!(error instanceof ValidationError)) clearAdminInput(ctx)
		await replyError(ctx, i18n, logger, error)
	}
}
