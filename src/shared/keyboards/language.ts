import { InlineKeyboard } from 'grammy'
import type { I18nService } from '../../modules/i18n/i18n.service'

export const LANGUAGE_CALLBACK = 'lang:'

/** One button per supported language, labelled in that language. */
export function languageKeyboard(i18n: I18nService, languages: readonly string[]) {
	const kb = new InlineKeyboard()
	for (const code of languages) {
		kb.text(i18n.t(code, 'language_name'), `${LANGUAGE_CALLBACK}${code}`)
	}
	return kb
}
