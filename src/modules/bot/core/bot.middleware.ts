import type { Context, MiddlewareFn, SessionFlavor } from 'grammy'
import type { UserRecord } from '../../database/schema'
import type { AdminGateService } from '../../admin/admin-gate.service'
import type { UsersService } from '../../users/users.service'
import type { FlowState } from '../../intake/flow-state'

export interface BotState {
	/** Null until the user has pressed /start. */
	user: UserRecord | null
	lang: string
	isAdmin: boolean
}

/** Multi-step admin text prompts, kept apart from the intake flow. */
export type AdminInput =
	| { mode: 'company_name' }
	| { mode: 'payment_method_label'; companyId: number }
	| { mode: 'payment_method_details'; companyId: number; label: string }
	| { mode: 'broadcast_text' }
	| { mode: 'broadcast_confirm'; text: string }
	| { mode: 'reject_note'; requestId: number }
	| { mode: 'complaint_reply'; complaintId: number }

export interface SessionData {
	flow: FlowState
	adminInput?: AdminInput
}

export type BotContext = Context &
	SessionFlavor<SessionData> & {
		state: BotState
	}

export function initialSession(): SessionData {
	return { flow: { step: 'idle' } }
}

export function userContextMiddleware(
	users: UsersService,
	gate: AdminGateService,
	defaultLanguage: string
): MiddlewareFn<BotContext> {
	return async (ctx, next) => {
		const telegramId = ctx.from?.id
		const user = telegramId == null ? null : await users.findByTelegramId(telegramId)
		ctx.state = {
			user,
			lang: user?.languageCode ?? defaultLanguage,
			isAdmin: gate.isAdmin(telegramId)
		}
		await next()
	}
}
