export type MessageParamValue = string | number | { key: string }

export type MessageParams = Record<string, MessageParamValue>

export type DomainErrorCode =
	| 'validation'
	| 'not_found'
	| 'authorization'
	| 'conflict'
	| 'persistence'

/**
 * Base of every error the bot can explain to a user. `messageKey` and
 * `params` are resolved through the translation store.
 */
export abstract class DomainError extends Error {
	abstract readonly code: DomainErrorCode

	constructor(
		message: string,
		readonly messageKey: string,
		readonly params: MessageParams = {},
		options?: { cause?: unknown }
	) {
		super(message, options)
		this.name = new.target.name
	}
}

/** Malformed user input; the user is re-prompted. */
export class ValidationError extends DomainError {
	readonly code = 'validation' as const
}

export class NotFoundError extends DomainError {
	readonly code = 'not_found' as const

	constructor(
		readonly entity: string,
		readonly entityId: number | string,
		messageKey = `${entity}_not_found`,
		params: MessageParams = {}
	) {
		super(`${entity} ${entityId} not found`, messageKey, params)
	}
}

export class AuthorizationError extends DomainError {
	readonly code = 'authorization' as const

	constructor(readonly actorId: number) {
		super(`User ${actorId} is not an admin`, 'unauthorized')
	}
}

/** The target is already in a state the operation cannot move it from. */
export class ConflictError extends DomainError {
	readonly code = 'conflict' as const
}

export class PersistenceError extends DomainError {
	readonly code = 'persistence' as const

	constructor(readonly operation: string, options?: { cause?: unknown }) {
		const reason =
			options?.cause instanceof Error ? options.cause.message : String(options?.cause)
		super(`Persistence failure in ${operation}: ${reason}`, 'error', {}, options)
	}
}

export function describeError(error: unknown): string {
	if (error instanceof Error) return error.message
	return String(error)
}
