import { InlineKeyboard } from 'grammy'
import type { I18nService } from '../../modules/i18n/i18n.service'
import type {
	CompanyRecord,
	PaymentMethodRecord
} from '../../modules/database/schema'

export const ADMIN_CALLBACK = {
	panel: 'admin:panel',
	pending: 'admin:pending',
	complaints: 'admin:complaints',
	companies: 'admin:companies',
	company: 'admin:company:',
	companyToggle: 'admin:company_toggle:',
	companyAdd: 'admin:company_add',
	methodAdd: 'admin:method_add:',
	methodToggle: 'admin:method_toggle:',
	announce: 'admin:announce',
	announceSend: 'admin:announce_send',
	announceCancel: 'admin:announce_cancel',
	broadcastStatus: 'admin:broadcast_status',
	broadcastStop: 'admin:broadcast_stop',
	reports: 'admin:reports',
	backup: 'admin:backup'
} as const

export const MODERATION_CALLBACK = {
	approve: 'req:approve:',
	reject: 'req:reject:',
	rejectWithNote: 'req:reject_note:',
	closeComplaint: 'cmp:close:',
	replyComplaint: 'cmp:reply:'
} as const

export function adminPanelKeyboard(i18n: I18nService, lang: string) {
	return new InlineKeyboard()
		.text(i18n.t(lang, 'admin_pending_requests'), ADMIN_CALLBACK.pending)
		.text(i18n.t(lang, 'admin_open_complaints'), ADMIN_CALLBACK.complaints)
		.row()
		.text(i18n.t(lang, 'admin_companies'), ADMIN_CALLBACK.companies)
		.text(i18n.t(lang, 'admin_broadcast'), ADMIN_CALLBACK.announce)
		.row()
		.text(i18n.t(lang, 'admin_broadcast_status'), ADMIN_CALLBACK.broadcastStatus)
		.row()
		.text(i18n.t(lang, 'admin_reports'), ADMIN_CALLBACK.reports)
		.text(i18n.t(lang, 'admin_backup'), ADMIN_CALLBACK.backup)
		.row()
		.text(i18n.t(lang, 'button_close'), 'hide_message')
}

export function requestModerationKeyboard(i18n: I18nService, lang: string, requestId: number) {
	return new InlineKeyboard()
		.text(i18n.t(lang, 'button_approve'), `${MODERATION_CALLBACK.approve}${requestId}`)
		.text(i18n.t(lang, 'button_reject'), `${MODERATION_CALLBACK.reject}${requestId}`)
		.row()
		.text(
			i18n.t(lang, 'button_reject_with_note'),
			`${MODERATION_CALLBACK.rejectWithNote}${requestId}`
		)
}

export function complaintModerationKeyboard(
	i18n: I18nService,
	lang: string,
	complaintId: number
) {
	return new InlineKeyboard()
		.text(
			i18n.t(lang, 'button_close_complaint'),
			`${MODERATION_CALLBACK.closeComplaint}${complaintId}`
		)
		.text(
			i18n.t(lang, 'button_reply_complaint'),
			`${MODERATION_CALLBACK.replyComplaint}${complaintId}`
		)
}

function activeMark(active: boolean): string {
	return active ? '🟢' : '⚪️'
}

export function companiesAdminKeyboard(
	i18n: I18nService,
	lang: string,
	companies: CompanyRecord[]
) {
	const kb = new InlineKeyboard()
	for (const company of companies) {
		kb.text(
			`${activeMark(company.isActive)} ${company.name}`,
			`${ADMIN_CALLBACK.company}${company.id}`
		).row()
	}
	return kb
		.text(i18n.t(lang, 'admin_add_company'), ADMIN_CALLBACK.companyAdd)
		.row()
		.text(i18n.t(lang, 'button_back'), ADMIN_CALLBACK.panel)
}

export function companyAdminKeyboard(
	i18n: I18nService,
	lang: string,
	company: CompanyRecord,
	methods: PaymentMethodRecord[]
) {
	const kb = new InlineKeyboard()
	for (const method of methods) {
		kb.text(
			`${activeMark(method.isActive)} ${method.label}`,
			`${ADMIN_CALLBACK.methodToggle}${method.id}`
		).row()
	}
	return kb
		.text(i18n.t(lang, 'admin_add_payment_method'), `${ADMIN_CALLBACK.methodAdd}${company.id}`)
		.row()
		.text(
			i18n.t(lang, company.isActive ? 'admin_deactivate' : 'admin_activate'),
			`${ADMIN_CALLBACK.companyToggle}${company.id}`
		)
		.row()
		.text(i18n.t(lang, 'button_back'), ADMIN_CALLBACK.companies)
}

export function broadcastConfirmKeyboard(i18n: I18nService, lang: string) {
	return new InlineKeyboard()
		.text(i18n.t(lang, 'button_send'), ADMIN_CALLBACK.announceSend)
		.text(i18n.t(lang, 'button_cancel'), ADMIN_CALLBACK.announceCancel)
}

export function broadcastRunningKeyboard(i18n: I18nService, lang: string) {
	return new InlineKeyboard()
		.text(i18n.t(lang, 'admin_broadcast_status'), ADMIN_CALLBACK.broadcastStatus)
		.text(i18n.t(lang, 'button_stop'), ADMIN_CALLBACK.broadcastStop)
}

export function cancelAdminInputKeyboard(i18n: I18nService, lang: string) {
	return new InlineKeyboard().text(i18n.t(lang, 'button_cancel'), ADMIN_CALLBACK.panel)
}
