import { Logger } from '@nestjs/common'
import { readdirSync, readFileSync } from 'node:fs'
import { basename, join } from 'node:path'
import type { MessageParams, MessageParamValue } from '../../common/errors'

export type Dictionary = Record<string, string>

const FALLBACK_LANGUAGE = 'en'
const PLACEHOLDER = /\{(\w+)\}/g

/**
 * Read-only translation store. Lookup order: requested language, default
 * language, `en`, then the key itself.
 */
export class I18nService {
	private readonly logger = new Logger(I18nService.name)
	private readonly dictionaries: ReadonlyMap<string, Dictionary>

	constructor(
		dictionaries: Record<string, Dictionary>,
		readonly defaultLanguage: string
	) {
		this.dictionaries = new Map(Object.entries(dictionaries))
	}

	static loadDirectory(dir: string, defaultLanguage: string): I18nService {
		const dictionaries: Record<string, Dictionary> = {}
		for (const file of readdirSync(dir)) {
			if (!file.endsWith('.json')) continue
			const parsed: unknown = JSON.parse(readFileSync(join(dir, file), 'utf-8'))
			dictionaries[basename(file, '.json')] = toDictionary(parsed, file)
		}
		if (!Object.keys(dictionaries).length) {
			throw new Error(`No translation files found in ${dir}`)
		}
		return new I18nService(dictionaries, defaultLanguage)
	}

	t(lang: string | null | undefined, key: string, params: MessageParams = {}): string {
		const template = this.lookup(lang, key)
		return template.replace(PLACEHOLDER, (match, name: string) => {
			const value = params[name]
			if (value === undefined) {
				this.logger.warn(`Missing param "${name}" for key "${key}"`)
				return match
			}
			return this.renderParam(lang, value)
		})
	}

	/** Every translation of `key`, used to recognise reply-keyboard labels. */
	variants(key: string): string[] {
		const found: string[] = []
		for (const dictionary of this.dictionaries.values()) {
			const value = dictionary[key]
			if (value !== undefined) found.push(value)
		}
		return found
	}

	/** First of `keys` whose translation in any language equals `text`. */
	matchKey<K extends string>(text: string, keys: readonly K[]): K | null {
		const normalized = text.trim()
		for (const key of keys) {
			if (this.variants(key).some(variant => variant === normalized)) return key
		}
		return null
	}

	private renderParam(lang: string | null | undefined, value: MessageParamValue): string {
		if (typeof value === 'object') return this.t(lang, value.key)
		return String(value)
	}

	private lookup(lang: string | null | undefined, key: string): string {
		const chain = [lang, this.defaultLanguage, FALLBACK_LANGUAGE]
		for (const code of chain) {
			if (!code) continue
			const value = this.dictionaries.get(code)?.[key]
			if (value !== undefined) return value
		}
		return key
	}
}

function toDictionary(parsed: unknown, file: string): Dictionary {
	if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
		throw new Error(`Translation file ${file} must contain a JSON object`)
	}
	const dictionary: Dictionary = {}
	for (const [key, value] of Object.entries(parsed)) {
		if (typeof value !== 'string') {
			throw new Error(`Translation ${file}:${key} must be a string`)
		}
		dictionary[key] = value
	}
	return dictionary
}
