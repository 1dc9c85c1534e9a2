import { InlineKeyboard, type Keyboard } from 'grammy'
import type { I18nService } from '../../modules/i18n/i18n.service'
import type { FlowKeyboard } from '../../modules/intake/flow-state'
import { mainMenuKeyboard } from './main-menu'

export const FLOW_CALLBACK = {
	company: 'flow:company:',
	method: 'flow:method:',
	confirm: 'flow:confirm',
	cancel: 'flow:cancel'
} as const

/** Renders the keyboard a flow outcome asks for. */
export function flowKeyboard(
	i18n: I18nService,
	lang: string,
	isAdmin: boolean,
	keyboard: FlowKeyboard | undefined
): InlineKeyboard | Keyboard | undefined {
	if (!keyboard) return undefined
	const cancel = i18n.t(lang, 'button_cancel')
	switch (keyboard.type) {
		case 'main_menu':
			return mainMenuKeyboard(i18n, lang, isAdmin)
		case 'cancel':
			return new InlineKeyboard().text(cancel, FLOW_CALLBACK.cancel)
		case 'confirm':
			return new InlineKeyboard()
				.text(i18n.t(lang, 'button_confirm'), FLOW_CALLBACK.confirm)
				.text(cancel, FLOW_CALLBACK.cancel)
		case 'companies': {
			const kb = new InlineKeyboard()
			for (const company of keyboard.companies) {
				kb.text(company.name, `${FLOW_CALLBACK.company}${company.id}`).row()
			}
			return kb.text(cancel, FLOW_CALLBACK.cancel)
		}
		case 'payment_methods': {
			const kb = new InlineKeyboard()
			for (const method of keyboard.methods) {
				kb.text(method.label, `${FLOW_CALLBACK.method}${method.id}`).row()
			}
			return kb.text(cancel, FLOW_CALLBACK.cancel)
		}
	}
}
