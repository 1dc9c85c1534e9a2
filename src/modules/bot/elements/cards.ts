import { formatAmount } from '../../../common/money'
import type {
	ComplaintRecord,
	RequestRecord,
	UserRecord
} from '../../database/schema'
import type { I18nService } from '../../i18n/i18n.service'
import { kindLabel } from '../../intake/flow-state'
import { formatDateTime, truncate } from '../../../utils/format'

const PREVIEW_LENGTH = 300

export interface RequestLabels {
	company: string
	method: string
}

/** Admin-facing summary of a request. */
export function requestCardText(
	i18n: I18nService,
	lang: string,
	request: RequestRecord,
	labels: RequestLabels,
	user: UserRecord | null
): string {
	return i18n.t(lang, 'request_card', {
		id: request.id,
		kind: kindLabel(request.kind),
		amount: formatAmount(request.amount),
		company: labels.company,
		method: labels.method,
		reference: request.reference,
		destination: request.destination ?? '-',
		user: user ? `${user.displayName} (${user.customerCode})` : String(request.userId),
		userId: request.userId,
		status: { key: `status_${request.status}` },
		createdAt: formatDateTime(request.createdAt)
	})
}

export function complaintCardText(
	i18n: I18nService,
	lang: string,
	complaint: ComplaintRecord,
	user: UserRecord | null
): string {
	return i18n.t(lang, 'complaint_card', {
		id: complaint.id,
		user: user ? `${user.displayName} (${user.customerCode})` : String(complaint.userId),
		userId: complaint.userId,
		text: truncate(complaint.text, PREVIEW_LENGTH),
		createdAt: formatDateTime(complaint.createdAt)
	})
}

/** Announcement echo shown to the admin before sending; long bodies are cut. */
export function broadcastPreviewText(i18n: I18nService, lang: string, text: string): string {
	return i18n.t(lang, 'broadcast_preview', { text: truncate(text, PREVIEW_LENGTH) })
}

/** User-facing line in "My account". */
export function requestLineText(
	i18n: I18nService,
	lang: string,
	request: RequestRecord
): string {
	return i18n.t(lang, 'request_line', {
		id: request.id,
		kind: kindLabel(request.kind),
		amount: formatAmount(request.amount),
		status: { key: `status_${request.status}` },
		createdAt: formatDateTime(request.createdAt)
	})
}

export function accountText(
	i18n: I18nService,
	lang: string,
	user: UserRecord,
	recent: RequestRecord[]
): string {
	const header = i18n.t(lang, 'account_info', {
		name: user.displayName,
		code: user.customerCode,
		language: i18n.t(user.languageCode, 'language_name'),
		since: formatDateTime(user.createdAt)
	})
	if (!recent.length) return `${header}\n\n${i18n.t(lang, 'no_requests_yet')}`
	const lines = recent.map(request => requestLineText(i18n, lang, request))
	return `${header}\n\n${i18n.t(lang, 'recent_requests')}\n${lines.join('\n')}`
}
