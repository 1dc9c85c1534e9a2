import { Keyboard } from 'grammy'
import type { I18nService } from '../../modules/i18n/i18n.service'

export const MENU_KEYS = [
	'menu_account',
	'menu_deposit',
	'menu_withdraw',
	'menu_language',
	'menu_support',
	'menu_reset',
	'menu_admin',
	'button_cancel'
] as const

export type MenuKey = (typeof MENU_KEYS)[number]

export type MenuAction =
	| { type: 'account' }
	| { type: 'begin_request'; kind: 'deposit' | 'withdrawal' }
	| { type: 'language' }
	| { type: 'begin_complaint' }
	| { type: 'cancel' }
	| { type: 'admin' }

const ACTIONS: Record<MenuKey, MenuAction> = {
	menu_account: { type: 'account' },
	menu_deposit: { type: 'begin_request', kind: 'deposit' },
	menu_withdraw: { type: 'begin_request', kind: 'withdrawal' },
	menu_language: { type: 'language' },
	menu_support: { type: 'begin_complaint' },
	menu_reset: { type: 'cancel' },
	menu_admin: { type: 'admin' },
	button_cancel: { type: 'cancel' }
}

/** Maps a reply-keyboard label, in any language, to its action. */
export function resolveMenuAction(i18n: I18nService, text: string): MenuAction | null {
	const key = i18n.matchKey(text, MENU_KEYS)
	return key ? ACTIONS[key] : null
}

export function mainMenuKeyboard(i18n: I18nService, lang: string, isAdmin: boolean) {
	const kb = new Keyboard()
		.text(i18n.t(lang, 'menu_deposit'))
		.text(i18n.t(lang, 'menu_withdraw'))
		.row()
		.text(i18n.t(lang, 'menu_account'))
		.text(i18n.t(lang, 'menu_support'))
		.row()
		.text(i18n.t(lang, 'menu_language'))
		.text(i18n.t(lang, 'menu_reset'))
	if (isAdmin) {
		kb.row().text(i18n.t(lang, 'menu_admin'))
	}
	return kb.resized().persistent()
}
