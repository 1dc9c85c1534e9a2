import { DomainError, PersistenceError } from '../../common/errors'

/** Runs a storage call, turning driver failures into PersistenceError. */
export async function withPersistence<T>(
	operation: string,
	fn: () => Promise<T>
): Promise<T> {
	try {
		return await fn()
	} catch (error: unknown) {
		if (error instanceof DomainError) throw error
		throw new PersistenceError(operation, { cause: error })
	}
}

/** Postgres unique_violation. */
export function isUniqueViolation(error: unknown): boolean {
	const cause = error instanceof PersistenceError ? error.cause : error
	return (
		typeof cause === 'object' &&
		cause !== null &&
		'code' in cause &&
		cause.code === '23505'
	)
}
