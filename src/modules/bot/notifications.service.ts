import { Injectable, Logger } from '@nestjs/common'
import type { InlineKeyboard } from 'grammy'
import { describeError } from '../../common/errors'
import { AdminGateService } from '../admin/admin-gate.service'
import type { BroadcastSummary } from '../announcements/broadcast.service'
import { CompaniesService } from '../companies/companies.service'
import type { ComplaintRecord, RequestRecord } from '../database/schema'
import { I18nService } from '../i18n/i18n.service'
import { TelegramBot } from '../telegram/telegram-bot'
import { UsersService } from '../users/users.service'
import {
	complaintModerationKeyboard,
	requestModerationKeyboard
} from '../../shared/keyboards/admin'
import { complaintCardText, requestCardText } from './elements/cards'

/** Out-of-band messages; a failed delivery is logged and never thrown. */
@Injectable()
export class NotificationsService {
	private readonly logger = new Logger(NotificationsService.name)

	constructor(
		private readonly bot: TelegramBot,
		private readonly i18n: I18nService,
		private readonly gate: AdminGateService,
		private readonly users: UsersService,
		private readonly companies: CompaniesService
	) {}

	requestSubmitted(request: RequestRecord): Promise<void> {
		return this.safely(`request #${request.id} alert`, () => this.alertRequest(request))
	}

	complaintSubmitted(complaint: ComplaintRecord): Promise<void> {
		return this.safely(`complaint #${complaint.id} alert`, () =>
			this.alertComplaint(complaint)
		)
	}

	private async alertRequest(request: RequestRecord): Promise<void> {
		const [user, labels] = await Promise.all([
			this.users.findByTelegramId(request.userId),
			this.companies.labelsFor(request.companyId, request.paymentMethodId)
		])
		for (const adminId of this.gate.adminIds()) {
			const lang = await this.languageOf(adminId)
			const text = `${this.i18n.t(lang, 'new_request_alert')}\n\n${requestCardText(
				this.i18n,
				lang,
				request,
				labels,
				user
			)}`
			await this.deliver(adminId, text, requestModerationKeyboard(this.i18n, lang, request.id))
		}
	}

	private async alertComplaint(complaint: ComplaintRecord): Promise<void> {
		const user = await this.users.findByTelegramId(complaint.userId)
		for (const adminId of this.gate.adminIds()) {
			const lang = await this.languageOf(adminId)
			const text = `${this.i18n.t(lang, 'new_complaint_alert')}\n\n${complaintCardText(
				this.i18n,
				lang,
				complaint,
				user
			)}`
			await this.deliver(
				adminId,
				text,
				complaintModerationKeyboard(this.i18n, lang, complaint.id)
			)
		}
	}

	async requestResolved(request: RequestRecord): Promise<void> {
		const lang = await this.languageOf(request.userId)
		const key = request.status === 'approved' ? 'request_approved_user' : 'request_rejected_user'
		let text = this.i18n.t(lang, key, { id: request.id })
		if (request.adminNote) {
			text += `\n${this.i18n.t(lang, 'admin_note', { note: request.adminNote })}`
		}
		await this.deliver(request.userId, text)
	}

	async complaintClosed(complaint: ComplaintRecord): Promise<void> {
		const lang = await this.languageOf(complaint.userId)
		let text = this.i18n.t(lang, 'complaint_closed_user', { id: complaint.id })
		if (complaint.adminReply) {
			text += `\n${this.i18n.t(lang, 'admin_reply', { reply: complaint.adminReply })}`
		}
		await this.deliver(complaint.userId, text)
	}

	async broadcastFinished(adminId: number, summary: BroadcastSummary): Promise<void> {
		const lang = await this.languageOf(adminId)
		const key = summary.cancelled ? 'broadcast_cancelled' : 'broadcast_done'
		await this.deliver(
			adminId,
			this.i18n.t(lang, key, {
				id: summary.adId,
				sent: summary.sent,
				failed: summary.failed,
				total: summary.total
			})
		)
	}

	async broadcastFailed(adminId: number, adId: number): Promise<void> {
		const lang = await this.languageOf(adminId)
		await this.deliver(adminId, this.i18n.t(lang, 'broadcast_failed', { id: adId }))
	}

	private async safely(task: string, fn: () => Promise<void>): Promise<void> {
		try {
			await fn()
		} catch (error: unknown) {
			this.logger.warn(`${task} skipped: ${describeError(error)}`)
		}
	}

	private async languageOf(telegramId: number): Promise<string> {
		try {
			const user = await this.users.findByTelegramId(telegramId)
			return user?.languageCode ?? this.i18n.defaultLanguage
		} catch (error: unknown) {
			this.logger.warn(`language lookup failed for ${telegramId}: ${describeError(error)}`)
			return this.i18n.defaultLanguage
		}
	}

	private async deliver(
		chatId: number,
		text: string,
		keyboard?: InlineKeyboard
	): Promise<void> {
		try {
			await this.bot.api.sendMessage(chatId, text, { reply_markup: keyboard })
		} catch (error: unknown) {
			this.logger.warn(`notification to ${chatId} failed: ${describeError(error)}`)
		}
	}
}
