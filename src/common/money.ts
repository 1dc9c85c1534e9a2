import { ValidationError } from './errors'

const AMOUNT_PATTERN = /^\d{1,13}(\.\d{1,2})?$/
const ARABIC_INDIC_ZERO = 0x0660
const EXTENDED_ARABIC_INDIC_ZERO = 0x06f0

/** Maps Arabic-Indic digits and the Arabic decimal separator to ASCII. */
export function toAsciiDigits(input: string): string {
	return input
		.replace(/[\u0660-\u0669]/g, digit => String(digit.charCodeAt(0) - ARABIC_INDIC_ZERO))
		.replace(/[\u06f0-\u06f9]/g, digit =>
			String(digit.charCodeAt(0) - EXTENDED_ARABIC_INDIC_ZERO)
		)
		.replace(/\u066b/g, '.')
}

/**
 * Parses a user-typed amount into a normalized 2-decimal string.
 * Accepts `,` as decimal separator and ignores spaces used as grouping.
 * Arabic-Indic digits are read as their ASCII equivalents.
 */
export function parseAmount(input: string): string {
	const compact = toAsciiDigits(String(input ?? ''))
		.trim()
		.replace(/[\s ]/g, '')
		.replace(',', '.')
	if (!AMOUNT_PATTERN.test(compact)) {
		throw new ValidationError(`Invalid amount "${input}"`, 'invalid_amount')
	}
	const value = Number(compact)
	if (!Number.isFinite(value) || value <= 0) {
		throw new ValidationError(`Amount must be positive: "${input}"`, 'invalid_amount')
	}
	return value.toFixed(2)
}

export function toMoneyNumber(value: unknown, fallback = 0): number {
	if (value == null) return fallback
	if (typeof value === 'number') {
		return Number.isFinite(value) ? value : fallback
	}
	if (typeof value === 'string') {
		const n = Number(value)
		return Number.isFinite(n) ? n : fallback
	}
	return fallback
}

export function formatAmount(value: unknown): string {
	return toMoneyNumber(value).toLocaleString('en-US', {
		minimumFractionDigits: 2,
		maximumFractionDigits: 2
	})
}
