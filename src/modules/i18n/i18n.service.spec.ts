import { readFileSync } from 'node:fs'
import { resolve } from 'node:path'
import { I18nService } from './i18n.service'

const LOCALES_DIR = resolve(__dirname, '../../../locales')

function placeholders(template: string): string[] {
	return [...template.matchAll(/\{(\w+)\}/g)].map(match => match[1]).sort()
}

function readLocale(lang: string): Record<string, string> {
	return JSON.parse(readFileSync(resolve(LOCALES_DIR, `${lang}.json`), 'utf-8'))
}

describe('I18nService', () => {
	const i18n = new I18nService(
		{
			ar: { hello: 'مرحبا {name}', kind_deposit: 'إيداع', only_ar: 'ع' },
			en: {
				hello: 'Hello {name}',
				kind_deposit: 'Deposit',
				only_en: 'English only',
				choose: '{kind}: choose'
			},
			de: { hello: 'Hallo {name}' }
		},
		'ar'
	)

	it('substitutes params', () => {
		expect(i18n.t('en', 'hello', { name: 'Sam' })).toBe('Hello Sam')
		expect(i18n.t('ar', 'hello', { name: 'Sam' })).toBe('مرحبا Sam')
	})

	it('falls back to the default language, then en, then the key', () => {
		expect(i18n.t('fr', 'hello', { name: 'Sam' })).toBe('مرحبا Sam')
		expect(i18n.t('de', 'only_ar')).toBe('ع')
		expect(i18n.t('de', 'only_en')).toBe('English only')
		expect(i18n.t(null, 'missing_key')).toBe('missing_key')
	})

	it('resolves key params in the same language', () => {
		expect(i18n.t('en', 'choose', { kind: { key: 'kind_deposit' } })).toBe('Deposit: choose')
	})

	it('leaves unknown placeholders in place', () => {
		expect(i18n.t('en', 'hello')).toBe('Hello {name}')
	})

	it('matches reply keyboard labels in any language', () => {
		expect(i18n.matchKey('إيداع', ['hello', 'kind_deposit'])).toBe('kind_deposit')
		expect(i18n.matchKey(' Deposit ', ['kind_deposit'])).toBe('kind_deposit')
		expect(i18n.matchKey('nope', ['kind_deposit'])).toBeNull()
	})

	it('loads the shipped locales', () => {
		const loaded = I18nService.loadDirectory(LOCALES_DIR, 'ar')
		expect(loaded.t('en', 'kind_withdrawal')).toBe('Withdrawal')
		expect(loaded.t('ar', 'menu_deposit')).toBe('إيداع')
		expect(loaded.t('fr', 'menu_deposit')).toBe('إيداع')
	})

	it('ships the same keys and placeholders in every locale', () => {
		const en = readLocale('en')
		const ar = readLocale('ar')
		expect(Object.keys(ar).sort()).toEqual(Object.keys(en).sort())
		for (const key of Object.keys(en)) {
			expect({ key, params: placeholders(ar[key]) }).toEqual({
				key,
				params: placeholders(en[key])
			})
		}
	})
})
