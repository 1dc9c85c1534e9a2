import { commandArgument } from './reply'

describe('commandArgument', () => {
	it('trims the text after a command', () => {
		expect(commandArgument('  1001 ')).toBe('1001')
	})

	it('is empty for a bare command', () => {
		expect(commandArgument('')).toBe('')
	})

	it('is empty when the update carries no command text', () => {
		expect(commandArgument(undefined)).toBe('')
		expect(commandArgument(null)).toBe('')
	})

	it('ignores regex matches from hears handlers', () => {
		expect(commandArgument(/(\d+)/.exec('id 42'))).toBe('')
	})
})
