import { Injectable, Logger } from '@nestjs/common'
import { DomainError, NotFoundError, ValidationError } from '../../common/errors'
import { formatAmount, parseAmount } from '../../common/money'
import { CompaniesService } from '../companies/companies.service'
import {
	ComplaintsService,
	normalizeComplaintText
} from '../complaints/complaints.service'
import type { CompanyRecord, PaymentMethodRecord } from '../database/schema'
import {
	normalizeDestination,
	normalizeReference,
	RequestsService
} from '../requests/requests.service'
import {
	IDLE,
	kindLabel,
	type FlowInput,
	type FlowKeyboard,
	type FlowOutcome,
	type FlowState
} from './flow-state'

type StateOf<S extends FlowState['step']> = Extract<FlowState, { step: S }>

const CANCEL_KEYBOARD: FlowKeyboard = { type: 'cancel' }
const CONFIRM_KEYBOARD: FlowKeyboard = { type: 'confirm' }
const MAIN_MENU: FlowKeyboard = { type: 'main_menu' }

function companiesKeyboard(companies: CompanyRecord[]): FlowKeyboard {
	return {
		type: 'companies',
		companies: companies.map(({ id, name }) => ({ id, name }))
	}
}

function methodsKeyboard(methods: PaymentMethodRecord[]): FlowKeyboard {
	return {
		type: 'payment_methods',
		methods: methods.map(({ id, label }) => ({ id, label }))
	}
}

/**
 * Per-user request/complaint conversation. Pure with respect to the
 * session: it receives the current state and returns the next one, and
 * only touches storage on confirmation.
 */
@Injectable()
export class IntakeFlowService {
	private readonly logger = new Logger(IntakeFlowService.name)

	constructor(
		private readonly companies: CompaniesService,
		private readonly requests: RequestsService,
		private readonly complaints: ComplaintsService
	) {}

	async handle(userId: number, state: FlowState, input: FlowInput): Promise<FlowOutcome> {
		switch (input.type) {
			case 'cancel':
				return state.step === 'idle'
					? { state: IDLE, message: { key: 'nothing_to_cancel' }, keyboard: MAIN_MENU }
					: { state: IDLE, message: { key: 'cancelled' }, keyboard: MAIN_MENU }
			case 'begin_request':
				return this.promptCompany({ step: 'awaiting_company', kind: input.kind })
			case 'begin_complaint':
				return {
					state: { step: 'awaiting_complaint_text' },
					message: { key: 'enter_complaint' },
					keyboard: CANCEL_KEYBOARD
				}
		}

		switch (state.step) {
			case 'idle':
				return { state, message: { key: 'unknown_input' }, keyboard: MAIN_MENU }
			case 'awaiting_company':
				return this.onCompany(state, input)
			case 'awaiting_payment_method':
				return this.onPaymentMethod(state, input)
			case 'awaiting_amount':
				return this.onAmount(state, input)
			case 'awaiting_reference':
				return this.onReference(state, input)
			case 'awaiting_destination':
				return this.onDestination(state, input)
			case 'awaiting_confirmation':
				return this.onRequestConfirmation(userId, state, input)
			case 'awaiting_complaint_text':
				return this.onComplaintText(state, input)
			case 'awaiting_complaint_confirmation':
				return this.onComplaintConfirmation(userId, state, input)
		}
	}

	/** Prompt for the current step again, e.g. after a stale button press. */
	async reprompt(state: FlowState): Promise<FlowOutcome> {
		switch (state.step) {
			case 'idle':
				return { state, message: { key: 'main_menu' }, keyboard: MAIN_MENU }
			case 'awaiting_company':
				return this.promptCompany(state)
			case 'awaiting_payment_method':
				return this.promptPaymentMethod(state)
			case 'awaiting_amount':
				return this.promptAmount(state)
			case 'awaiting_reference':
				return { state, message: { key: 'enter_reference' }, keyboard: CANCEL_KEYBOARD }
			case 'awaiting_destination':
				return { state, message: { key: 'enter_destination' }, keyboard: CANCEL_KEYBOARD }
			case 'awaiting_confirmation':
				return this.promptRequestConfirmation(state)
			case 'awaiting_complaint_text':
				return { state, message: { key: 'enter_complaint' }, keyboard: CANCEL_KEYBOARD }
			case 'awaiting_complaint_confirmation':
				return {
					state,
					message: { key: 'confirm_complaint', params: { text: state.text } },
					keyboard: CONFIRM_KEYBOARD
				}
		}
	}

	private async onCompany(
		state: StateOf<'awaiting_company'>,
		input: FlowInput
	): Promise<FlowOutcome> {
		let ref: number | string
		if (input.type === 'select_company') ref = input.companyId
		else if (input.type === 'text') ref = input.text
		else return this.reprompt(state)

		let company: CompanyRecord
		try {
			company = await this.companies.findActiveCompany(ref)
		} catch (error: unknown) {
			if (error instanceof NotFoundError) {
				return this.withMessage(await this.promptCompany(state), 'company_not_found')
			}
			throw error
		}
		const methods = await this.companies.listActivePaymentMethods(company.id)
		if (!methods.length) {
			return this.withMessage(await this.promptCompany(state), 'no_payment_methods', {
				company: company.name
			})
		}
		return {
			state: { step: 'awaiting_payment_method', kind: state.kind, companyId: company.id },
			message: { key: 'choose_payment_method', params: { company: company.name } },
			keyboard: methodsKeyboard(methods)
		}
	}

	private async onPaymentMethod(
		state: StateOf<'awaiting_payment_method'>,
		input: FlowInput
	): Promise<FlowOutcome> {
		let ref: number | string
		if (input.type === 'select_payment_method') ref = input.paymentMethodId
		else if (input.type === 'text') ref = input.text
		else return this.reprompt(state)

		let method: PaymentMethodRecord
		try {
			method = await this.companies.findActivePaymentMethod(state.companyId, ref)
		} catch (error: unknown) {
			if (error instanceof NotFoundError) {
				return this.withMessage(
					await this.promptPaymentMethod(state),
					'payment_method_not_found'
				)
			}
			throw error
		}
		return this.promptAmount({
			step: 'awaiting_amount',
			kind: state.kind,
			companyId: state.companyId,
			paymentMethodId: method.id
		}, method)
	}

	private async onAmount(
		state: StateOf<'awaiting_amount'>,
		input: FlowInput
	): Promise<FlowOutcome> {
		if (input.type !== 'text') return this.reprompt(state)
		let amount: string
		try {
			amount = parseAmount(input.text)
		} catch (error: unknown) {
			if (error instanceof ValidationError) {
				return { state, message: { key: error.messageKey }, keyboard: CANCEL_KEYBOARD }
			}
			throw error
		}
		return this.reprompt({
			step: 'awaiting_reference',
			kind: state.kind,
			companyId: state.companyId,
			paymentMethodId: state.paymentMethodId,
			amount
		})
	}

	private async onReference(
		state: StateOf<'awaiting_reference'>,
		input: FlowInput
	): Promise<FlowOutcome> {
		if (input.type !== 'text') return this.reprompt(state)
		const reference = this.validText(normalizeReference, input.text)
		if (typeof reference !== 'string') return { ...reference, state }
		const { kind, companyId, paymentMethodId, amount } = state
		if (kind === 'withdrawal') {
			return this.reprompt({
				step: 'awaiting_destination',
				kind,
				companyId,
				paymentMethodId,
				amount,
				reference
			})
		}
		return this.promptRequestConfirmation({
			step: 'awaiting_confirmation',
			kind,
			companyId,
			paymentMethodId,
			amount,
			reference,
			destination: null
		})
	}

	private async onDestination(
		state: StateOf<'awaiting_destination'>,
		input: FlowInput
	): Promise<FlowOutcome> {
		if (input.type !== 'text') return this.reprompt(state)
		const destination = this.validText(normalizeDestination, input.text)
		if (typeof destination !== 'string') return { ...destination, state }
		return this.promptRequestConfirmation({
			step: 'awaiting_confirmation',
			kind: state.kind,
			companyId: state.companyId,
			paymentMethodId: state.paymentMethodId,
			amount: state.amount,
			reference: state.reference,
			destination
		})
	}

	private async onRequestConfirmation(
		userId: number,
		state: StateOf<'awaiting_confirmation'>,
		input: FlowInput
	): Promise<FlowOutcome> {
		if (input.type !== 'confirm') return this.reprompt(state)
		try {
			const request = await this.requests.submit(userId, {
				kind: state.kind,
				companyId: state.companyId,
				paymentMethodId: state.paymentMethodId,
				amount: state.amount,
				reference: state.reference,
				destination: state.destination
			})
			return {
				state: IDLE,
				message: { key: 'request_submitted', params: { id: request.id } },
				keyboard: MAIN_MENU,
				created: { type: 'request', request }
			}
		} catch (error: unknown) {
			if (error instanceof NotFoundError || error instanceof ValidationError) {
				this.logger.warn(`request by ${userId} dropped at confirmation: ${error.message}`)
				return {
					state: IDLE,
					message: { key: error.messageKey, params: error.params },
					keyboard: MAIN_MENU
				}
			}
			throw error
		}
	}

	private async onComplaintText(
		state: StateOf<'awaiting_complaint_text'>,
		input: FlowInput
	): Promise<FlowOutcome> {
		if (input.type !== 'text') return this.reprompt(state)
		let text: string
		try {
			text = normalizeComplaintText(input.text)
		} catch (error: unknown) {
			if (error instanceof ValidationError) {
				return {
					state,
					message: { key: error.messageKey, params: error.params },
					keyboard: CANCEL_KEYBOARD
				}
			}
			throw error
		}
		return this.reprompt({ step: 'awaiting_complaint_confirmation', text })
	}

	private async onComplaintConfirmation(
		userId: number,
		state: StateOf<'awaiting_complaint_confirmation'>,
		input: FlowInput
	): Promise<FlowOutcome> {
		if (input.type !== 'confirm') return this.reprompt(state)
		try {
			const complaint = await this.complaints.submit(userId, state.text)
			return {
				state: IDLE,
				message: { key: 'complaint_submitted', params: { id: complaint.id } },
				keyboard: MAIN_MENU,
				created: { type: 'complaint', complaint }
			}
		} catch (error: unknown) {
			if (error instanceof DomainError && error.code !== 'persistence') {
				return {
					state: IDLE,
					message: { key: error.messageKey, params: error.params },
					keyboard: MAIN_MENU
				}
			}
			throw error
		}
	}

	private async promptCompany(state: StateOf<'awaiting_company'>): Promise<FlowOutcome> {
		const companies = await this.companies.listActive()
		if (!companies.length) {
			return { state: IDLE, message: { key: 'no_companies' }, keyboard: MAIN_MENU }
		}
		return {
			state,
			message: { key: 'choose_company', params: { kind: kindLabel(state.kind) } },
			keyboard: companiesKeyboard(companies)
		}
	}

	private async promptPaymentMethod(
		state: StateOf<'awaiting_payment_method'>
	): Promise<FlowOutcome> {
		const methods = await this.companies.listActivePaymentMethods(state.companyId)
		if (!methods.length) {
			return this.promptCompany({ step: 'awaiting_company', kind: state.kind })
		}
		const company = await this.companies.findActiveCompany(state.companyId).catch(
			(error: unknown) => {
				if (error instanceof NotFoundError) return null
				throw error
			}
		)
		if (!company) return this.promptCompany({ step: 'awaiting_company', kind: state.kind })
		return {
			state,
			message: { key: 'choose_payment_method', params: { company: company.name } },
			keyboard: methodsKeyboard(methods)
		}
	}

	private async promptAmount(
		state: StateOf<'awaiting_amount'>,
		known?: PaymentMethodRecord
	): Promise<FlowOutcome> {
		let method: PaymentMethodRecord
		try {
			method =
				known ??
				(await this.companies.findActivePaymentMethod(state.companyId, state.paymentMethodId))
		} catch (error: unknown) {
			if (error instanceof NotFoundError) {
				return { state: IDLE, message: { key: error.messageKey }, keyboard: MAIN_MENU }
			}
			throw error
		}
		return {
			state,
			message: {
				key: 'enter_amount',
				params: { method: method.label, details: method.details || '-' }
			},
			keyboard: CANCEL_KEYBOARD
		}
	}

	private async promptRequestConfirmation(
		state: StateOf<'awaiting_confirmation'>
	): Promise<FlowOutcome> {
		try {
			const company = await this.companies.findActiveCompany(state.companyId)
			const method = await this.companies.findActivePaymentMethod(
				state.companyId,
				state.paymentMethodId
			)
			return {
				state,
				message: {
					key: 'confirm_request',
					params: {
						kind: kindLabel(state.kind),
						company: company.name,
						method: method.label,
						amount: formatAmount(state.amount),
						reference: state.reference,
						destination: state.destination ?? '-'
					}
				},
				keyboard: CONFIRM_KEYBOARD
			}
		} catch (error: unknown) {
			if (error instanceof NotFoundError) {
				return {
					state: IDLE,
					message: { key: error.messageKey, params: error.params },
					keyboard: MAIN_MENU
				}
			}
			throw error
		}
	}

	/** The cleaned text, or the validation message that keeps the step open. */
	private validText(
		normalize: (text: string) => string,
		text: string
	): string | Omit<FlowOutcome, 'state'> {
		try {
			return normalize(text)
		} catch (error: unknown) {
			if (error instanceof ValidationError) {
				return {
					message: { key: error.messageKey, params: error.params },
					keyboard: CANCEL_KEYBOARD
				}
			}
			throw error
		}
	}

	private withMessage(
		outcome: FlowOutcome,
		key: string,
		params?: FlowOutcome['message']['params']
	): FlowOutcome {
		if (outcome.state.step === 'idle') return outcome
		return { ...outcome, message: params ? { key, params } : { key } }
	}
}
