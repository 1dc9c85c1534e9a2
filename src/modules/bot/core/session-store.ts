import { Injectable } from '@nestjs/common'
import { MemorySessionStorage } from 'grammy'
import { initialSession, type SessionData } from './bot.middleware'

/**
 * Per-user session map. Handlers reach it through grammY's session
 * middleware; admin commands use it to reset someone else's conversation.
 */
@Injectable()
export class SessionStore {
	readonly storage = new MemorySessionStorage<SessionData>()

	static keyFor(telegramId: number): string {
		return String(telegramId)
	}

	/** Returns true when the user had a conversation in progress. */
	reset(telegramId: number): boolean {
		const key = SessionStore.keyFor(telegramId)
		const current = this.storage.read(key)
		const wasActive =
			current !== undefined &&
			(current.flow.step !== 'idle' || current.adminInput !== undefined)
		this.storage.write(key, initialSession())
		return wasActive
	}
}
