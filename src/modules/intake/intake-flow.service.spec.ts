import {
	ADMIN_ID,
	USER_ID,
	buildServices,
	registerUser,
	seedCatalog,
	type Catalog,
	type TestServices
} from '../../testing/fixtures'
import { IDLE, type FlowInput, type FlowOutcome, type FlowState } from './flow-state'

async function setup(): Promise<{ services: TestServices; catalog: Catalog }> {
	const services = buildServices()
	const catalog = await seedCatalog(services)
	await registerUser(services)
	return { services, catalog }
}

async function drive(
	services: TestServices,
	inputs: FlowInput[],
	start: FlowState = IDLE
): Promise<FlowOutcome[]> {
	const outcomes: FlowOutcome[] = []
	let state = start
	for (const input of inputs) {
		const outcome = await services.intake.handle(USER_ID, state, input)
		outcomes.push(outcome)
		state = outcome.state
	}
	return outcomes
}

const ACME = { kind: 'withdrawal', companyId: 1, paymentMethodId: 1 } as const

const ACME_AMOUNT: FlowState = { step: 'awaiting_amount', ...ACME }

const ACME_REFERENCE: FlowState = { step: 'awaiting_reference', ...ACME, amount: '150.00' }

const ACME_DESTINATION: FlowState = {
	step: 'awaiting_destination',
	...ACME,
	amount: '150.00',
	reference: 'TX-1001'
}

const ACME_CONFIRMATION: FlowState = {
	step: 'awaiting_confirmation',
	...ACME,
	amount: '150.00',
	reference: 'TX-1001',
	destination: 'IBAN DE00 1234'
}

describe('IntakeFlowService', () => {
	it('walks a withdrawal from the menu to a pending request', async () => {
		const { services } = await setup()
		const [company, method, amount, reference, destination, confirm, submitted] = await drive(
			services,
			[
				{ type: 'begin_request', kind: 'withdrawal' },
				{ type: 'select_company', companyId: 1 },
				{ type: 'select_payment_method', paymentMethodId: 1 },
				{ type: 'text', text: '150.00' },
				{ type: 'text', text: ' TX-1001 ' },
				{ type: 'text', text: 'IBAN DE00 1234' },
				{ type: 'confirm' }
			]
		)

		expect(company).toEqual({
			state: { step: 'awaiting_company', kind: 'withdrawal' },
			message: { key: 'choose_company', params: { kind: { key: 'kind_withdrawal' } } },
			keyboard: {
				type: 'companies',
				companies: [
					{ id: 1, name: 'Acme' },
					{ id: 2, name: 'Globex' }
				]
			}
		})
		expect(method).toEqual({
			state: { step: 'awaiting_payment_method', kind: 'withdrawal', companyId: 1 },
			message: { key: 'choose_payment_method', params: { company: 'Acme' } },
			keyboard: {
				type: 'payment_methods',
				methods: [
					{ id: 1, label: 'Bank Transfer' },
					{ id: 2, label: 'E-Wallet' }
				]
			}
		})
		expect(amount).toEqual({
			state: ACME_AMOUNT,
			message: {
				key: 'enter_amount',
				params: { method: 'Bank Transfer', details: 'IBAN XX00 TEST 0000' }
			},
			keyboard: { type: 'cancel' }
		})
		expect(reference).toEqual({
			state: ACME_REFERENCE,
			message: { key: 'enter_reference' },
			keyboard: { type: 'cancel' }
		})
		expect(destination).toEqual({
			state: ACME_DESTINATION,
			message: { key: 'enter_destination' },
			keyboard: { type: 'cancel' }
		})
		expect(confirm).toEqual({
			state: ACME_CONFIRMATION,
			message: {
				key: 'confirm_request',
				params: {
					kind: { key: 'kind_withdrawal' },
					company: 'Acme',
					method: 'Bank Transfer',
					amount: '150.00',
					reference: 'TX-1001',
					destination: 'IBAN DE00 1234'
				}
			},
			keyboard: { type: 'confirm' }
		})
		expect(submitted.state).toEqual(IDLE)
		expect(submitted.message).toEqual({ key: 'request_submitted', params: { id: 1 } })
		expect(submitted.keyboard).toEqual({ type: 'main_menu' })
		expect(submitted.created?.type).toBe('request')

		const stored = services.repos.requests.rows
		expect(stored).toHaveLength(1)
		expect(stored[0]).toMatchObject({
			userId: USER_ID,
			kind: 'withdrawal',
			companyId: 1,
			paymentMethodId: 1,
			amount: '150.00',
			reference: 'TX-1001',
			destination: 'IBAN DE00 1234',
			status: 'pending'
		})
	})

	it('takes a deposit from reference straight to confirmation', async () => {
		const { services } = await setup()
		const outcomes = await drive(services, [
			{ type: 'begin_request', kind: 'deposit' },
			{ type: 'text', text: 'acme' },
			{ type: 'text', text: 'e-wallet' },
			{ type: 'text', text: '١٥٠' },
			{ type: 'text', text: ' TX-7 ' },
			{ type: 'confirm' }
		])
		const deposit = { kind: 'deposit', companyId: 1, paymentMethodId: 2, amount: '150.00' }

		expect(outcomes[3]).toEqual({
			state: { step: 'awaiting_reference', ...deposit },
			message: { key: 'enter_reference' },
			keyboard: { type: 'cancel' }
		})
		expect(outcomes[4]).toEqual({
			state: { step: 'awaiting_confirmation', ...deposit, reference: 'TX-7', destination: null },
			message: {
				key: 'confirm_request',
				params: {
					kind: { key: 'kind_deposit' },
					company: 'Acme',
					method: 'E-Wallet',
					amount: '150.00',
					reference: 'TX-7',
					destination: '-'
				}
			},
			keyboard: { type: 'confirm' }
		})
		expect(outcomes[5].message).toEqual({ key: 'request_submitted', params: { id: 1 } })
		expect(services.repos.requests.rows[0]).toMatchObject({
			kind: 'deposit',
			amount: '150.00',
			reference: 'TX-7',
			destination: null
		})
	})

	it('reads an amount typed in Arabic-Indic digits', async () => {
		const { services } = await setup()
		const outcome = await services.intake.handle(USER_ID, ACME_AMOUNT, {
			type: 'text',
			text: '١٥٠'
		})
		expect(outcome).toEqual({
			state: ACME_REFERENCE,
			message: { key: 'enter_reference' },
			keyboard: { type: 'cancel' }
		})
	})

	it('keeps the reference step open for blank text', async () => {
		const { services } = await setup()
		const outcome = await services.intake.handle(USER_ID, ACME_REFERENCE, {
			type: 'text',
			text: '   '
		})
		expect(outcome).toEqual({
			state: ACME_REFERENCE,
			message: { key: 'reference_invalid', params: { max: 200 } },
			keyboard: { type: 'cancel' }
		})
	})

	it('keeps the destination step open for an overlong address', async () => {
		const { services } = await setup()
		const outcome = await services.intake.handle(USER_ID, ACME_DESTINATION, {
			type: 'text',
			text: 'x'.repeat(301)
		})
		expect(outcome).toEqual({
			state: ACME_DESTINATION,
			message: { key: 'destination_invalid', params: { max: 300 } },
			keyboard: { type: 'cancel' }
		})
		expect(services.repos.requests.writes).toBe(0)
	})

	it('accepts typed company and payment method names', async () => {
		const { services } = await setup()
		const outcomes = await drive(services, [
			{ type: 'begin_request', kind: 'deposit' },
			{ type: 'text', text: 'acme' },
			{ type: 'text', text: 'e-wallet' }
		])
		expect(outcomes[2]).toEqual({
			state: { step: 'awaiting_amount', kind: 'deposit', companyId: 1, paymentMethodId: 2 },
			message: { key: 'enter_amount', params: { method: 'E-Wallet', details: '-' } },
			keyboard: { type: 'cancel' }
		})
	})

	it.each(['-5', '0', 'abc', '1.234', '', '12345678901234'])(
		're-prompts on invalid amount "%s" without persisting',
		async text => {
			const { services } = await setup()
			const outcome = await services.intake.handle(USER_ID, ACME_AMOUNT, { type: 'text', text })
			expect(outcome).toEqual({
				state: ACME_AMOUNT,
				message: { key: 'invalid_amount' },
				keyboard: { type: 'cancel' }
			})
			expect(services.repos.requests.writes).toBe(0)
		}
	)

	it('re-prompts for an unknown or inactive company', async () => {
		const { services, catalog } = await setup()
		const state: FlowState = { step: 'awaiting_company', kind: 'deposit' }
		const inputs: FlowInput[] = [
			{ type: 'text', text: 'Initech' },
			{ type: 'select_company', companyId: catalog.dormant.id }
		]
		for (const input of inputs) {
			const outcome = await services.intake.handle(USER_ID, state, input)
			expect(outcome.state).toEqual(state)
			expect(outcome.message).toEqual({ key: 'company_not_found' })
			expect(outcome.keyboard?.type).toBe('companies')
		}
	})

	it('re-prompts company selection when a company has no payment methods', async () => {
		const { services, catalog } = await setup()
		const state: FlowState = { step: 'awaiting_company', kind: 'deposit' }
		const outcome = await services.intake.handle(USER_ID, state, {
			type: 'select_company',
			companyId: catalog.globex.id
		})
		expect(outcome.state).toEqual(state)
		expect(outcome.message).toEqual({
			key: 'no_payment_methods',
			params: { company: 'Globex' }
		})
	})

	it('re-prompts for a payment method of another company', async () => {
		const { services } = await setup()
		const state: FlowState = { step: 'awaiting_payment_method', kind: 'deposit', companyId: 1 }
		const outcome = await services.intake.handle(USER_ID, state, {
			type: 'select_payment_method',
			paymentMethodId: 99
		})
		expect(outcome.state).toEqual(state)
		expect(outcome.message).toEqual({ key: 'payment_method_not_found' })
		expect(outcome.keyboard?.type).toBe('payment_methods')
	})

	it('ends idle when there are no active companies', async () => {
		const services = buildServices()
		await registerUser(services)
		const [outcome] = await drive(services, [{ type: 'begin_request', kind: 'deposit' }])
		expect(outcome).toEqual({
			state: IDLE,
			message: { key: 'no_companies' },
			keyboard: { type: 'main_menu' }
		})
	})

	describe('cancel', () => {
		const states: FlowState[] = [
			{ step: 'awaiting_company', kind: 'deposit' },
			{ step: 'awaiting_payment_method', kind: 'deposit', companyId: 1 },
			ACME_AMOUNT,
			ACME_REFERENCE,
			ACME_DESTINATION,
			ACME_CONFIRMATION,
			{ step: 'awaiting_complaint_text' },
			{ step: 'awaiting_complaint_confirmation', text: 'Card charged twice' }
		]

		it.each(states)('returns to idle from $step', async state => {
			const { services } = await setup()
			const outcome = await services.intake.handle(USER_ID, state, { type: 'cancel' })
			expect(outcome).toEqual({
				state: IDLE,
				message: { key: 'cancelled' },
				keyboard: { type: 'main_menu' }
			})
			expect(services.repos.requests.writes).toBe(0)
			expect(services.repos.complaints.rows).toHaveLength(0)
		})

		it('reports nothing to cancel when idle', async () => {
			const { services } = await setup()
			const outcome = await services.intake.handle(USER_ID, IDLE, { type: 'cancel' })
			expect(outcome.message).toEqual({ key: 'nothing_to_cancel' })
			expect(outcome.state).toEqual(IDLE)
		})
	})

	it('re-prompts the current step for a stale input', async () => {
		const { services } = await setup()
		const outcome = await services.intake.handle(USER_ID, ACME_AMOUNT, {
			type: 'select_company',
			companyId: 1
		})
		expect(outcome.state).toEqual(ACME_AMOUNT)
		expect(outcome.message.key).toBe('enter_amount')

		const reference = await services.intake.handle(USER_ID, ACME_REFERENCE, { type: 'confirm' })
		expect(reference.state).toEqual(ACME_REFERENCE)
		expect(reference.message).toEqual({ key: 'enter_reference' })

		const idle = await services.intake.handle(USER_ID, IDLE, { type: 'text', text: 'hello' })
		expect(idle.message).toEqual({ key: 'unknown_input' })
	})

	it('discards partial input when a new flow starts', async () => {
		const { services } = await setup()
		const outcome = await services.intake.handle(USER_ID, ACME_AMOUNT, {
			type: 'begin_complaint'
		})
		expect(outcome.state).toEqual({ step: 'awaiting_complaint_text' })
	})

	it('returns to idle when references disappear before confirmation', async () => {
		const { services, catalog } = await setup()
		await services.companies.setActive(ADMIN_ID, catalog.acme.id, false)
		const outcome = await services.intake.handle(USER_ID, ACME_CONFIRMATION, { type: 'confirm' })
		expect(outcome).toEqual({
			state: IDLE,
			message: { key: 'company_not_found', params: {} },
			keyboard: { type: 'main_menu' }
		})
		expect(services.repos.requests.writes).toBe(0)
	})

	it('submits a complaint after confirmation', async () => {
		const { services } = await setup()
		const [prompt, invalid, preview, submitted] = await drive(services, [
			{ type: 'begin_complaint' },
			{ type: 'text', text: '   ' },
			{ type: 'text', text: ' Card charged twice ' },
			{ type: 'confirm' }
		])
		expect(prompt).toEqual({
			state: { step: 'awaiting_complaint_text' },
			message: { key: 'enter_complaint' },
			keyboard: { type: 'cancel' }
		})
		expect(invalid.message).toEqual({ key: 'complaint_invalid', params: { max: 2000 } })
		expect(invalid.state).toEqual({ step: 'awaiting_complaint_text' })
		expect(preview).toEqual({
			state: { step: 'awaiting_complaint_confirmation', text: 'Card charged twice' },
			message: { key: 'confirm_complaint', params: { text: 'Card charged twice' } },
			keyboard: { type: 'confirm' }
		})
		expect(submitted.state).toEqual(IDLE)
		expect(submitted.message).toEqual({ key: 'complaint_submitted', params: { id: 1 } })
		expect(services.repos.complaints.rows[0]).toMatchObject({
			userId: USER_ID,
			text: 'Card charged twice',
			status: 'open'
		})
	})

	it('drops a complaint from an unregistered user', async () => {
		const services = buildServices()
		const outcome = await services.intake.handle(
			USER_ID,
			{ step: 'awaiting_complaint_confirmation', text: 'hello' },
			{ type: 'confirm' }
		)
		expect(outcome).toEqual({
			state: IDLE,
			message: { key: 'please_start', params: {} },
			keyboard: { type: 'main_menu' }
		})
	})

	it('re-prompts idle with the main menu', async () => {
		const { services } = await setup()
		expect(await services.intake.reprompt(IDLE)).toEqual({
			state: IDLE,
			message: { key: 'main_menu' },
			keyboard: { type: 'main_menu' }
		})
	})
})
