import type { MessageParams } from '../../common/errors'
import type {
	ComplaintRecord,
	RequestKind,
	RequestRecord
} from '../database/schema'

export type FlowState =
	| { step: 'idle' }
	| { step: 'awaiting_company'; kind: RequestKind }
	| { step: 'awaiting_payment_method'; kind: RequestKind; companyId: number }
	| {
			step: 'awaiting_amount'
			kind: RequestKind
			companyId: number
			paymentMethodId: number
	  }
	| {
			step: 'awaiting_reference'
			kind: RequestKind
			companyId: number
			paymentMethodId: number
			amount: string
	  }
	| {
			step: 'awaiting_destination'
			kind: 'withdrawal'
			companyId: number
			paymentMethodId: number
			amount: string
			reference: string
	  }
	| {
			step: 'awaiting_confirmation'
			kind: RequestKind
			companyId: number
			paymentMethodId: number
			amount: string
			reference: string
			destination: string | null
	  }
	| { step: 'awaiting_complaint_text' }
	| { step: 'awaiting_complaint_confirmation'; text: string }

export type FlowStep = FlowState['step']

export type FlowInput =
	| { type: 'begin_request'; kind: RequestKind }
	| { type: 'begin_complaint' }
	| { type: 'select_company'; companyId: number }
	| { type: 'select_payment_method'; paymentMethodId: number }
	| { type: 'text'; text: string }
	| { type: 'confirm' }
	| { type: 'cancel' }

export interface FlowMessage {
	key: string
	params?: MessageParams
}

export type FlowKeyboard =
	| { type: 'companies'; companies: Array<{ id: number; name: string }> }
	| { type: 'payment_methods'; methods: Array<{ id: number; label: string }> }
	| { type: 'confirm' }
	| { type: 'cancel' }
	| { type: 'main_menu' }

export type FlowCreated =
	| { type: 'request'; request: RequestRecord }
	| { type: 'complaint'; complaint: ComplaintRecord }

export interface FlowOutcome {
	state: FlowState
	message: FlowMessage
	keyboard?: FlowKeyboard
	created?: FlowCreated
}

export const IDLE: FlowState = Object.freeze({ step: 'idle' })

export function isIdle(state: FlowState | undefined): boolean {
	return !state || state.step === 'idle'
}

export function kindLabel(kind: RequestKind): { key: string } {
	return { key: `kind_${kind}` }
}
