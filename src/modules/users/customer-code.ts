import { randomInt } from 'node:crypto'

export type DigitSource = (maxExclusive: number) => number

/** `PREFIX + YEAR + 6 digits`, e.g. `C2026004217`. */
export function generateCustomerCode(
	prefix: string,
	year: string,
	nextDigit: DigitSource = randomInt
): string {
	let digits = ''
	for (let i = 0; i < 6; i++) digits += String(nextDigit(10))
	return `${prefix}${year}${digits}`
}
