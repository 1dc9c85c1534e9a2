import { AuthorizationError } from '../../common/errors'
import { testSettings } from '../../testing/fixtures'
import { AdminGateService } from './admin-gate.service'

describe('AdminGateService', () => {
	const gate = new AdminGateService(testSettings({ ADMINS: '900,901' }))

	it('recognises configured admins', () => {
		expect(gate.isAdmin(900)).toBe(true)
		expect(gate.isAdmin(901)).toBe(true)
		expect(gate.isAdmin(1001)).toBe(false)
		expect(gate.isAdmin(null)).toBe(false)
		expect(gate.isAdmin(undefined)).toBe(false)
	})

	it('throws for non-admins', () => {
		expect(() => gate.assertAdmin(1001)).toThrow(AuthorizationError)
		expect(() => gate.assertAdmin(900)).not.toThrow()
	})

	it('lists admin ids', () => {
		expect(gate.adminIds()).toEqual([900, 901])
	})

	it('has no admins when none are configured', () => {
		const empty = new AdminGateService(testSettings({ ADMINS: '' }))
		expect(empty.adminIds()).toEqual([])
		expect(empty.isAdmin(900)).toBe(false)
	})
})
