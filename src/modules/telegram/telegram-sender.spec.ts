import { GrammyError } from 'grammy'
import { testSettings } from '../../testing/fixtures'
import { TelegramBot } from './telegram-bot'
import { TelegramSender, retryAfterSeconds } from './telegram-sender'

const settings = testSettings({ BROADCAST_RETRY_ATTEMPTS: '3' })

function apiError(code: number, retryAfter?: number): GrammyError {
	return new GrammyError(
		'Call to sendMessage failed',
		{
			ok: false,
			error_code: code,
			description: code === 429 ? 'Too Many Requests' : 'Forbidden: bot was blocked by the user',
			parameters: retryAfter === undefined ? {} : { retry_after: retryAfter }
		},
		'sendMessage',
		{}
	)
}

class ScriptedSender extends TelegramSender {
	readonly waits: number[] = []
	calls = 0

	constructor(private readonly failures: unknown[]) {
		super(new TelegramBot(settings), settings)
	}

	protected async deliver(): Promise<void> {
		this.calls++
		if (this.failures.length) throw this.failures.shift()
	}

	protected async wait(ms: number): Promise<void> {
		this.waits.push(ms)
	}
}

describe('retryAfterSeconds', () => {
	it('reads the delay from rate-limit errors only', () => {
		expect(retryAfterSeconds(apiError(429, 3))).toBe(3)
		expect(retryAfterSeconds(apiError(429))).toBe(1)
		expect(retryAfterSeconds(apiError(403))).toBeNull()
		expect(retryAfterSeconds(new Error('socket hang up'))).toBeNull()
	})
})

describe('TelegramSender', () => {
	it('retries after the advertised delay', async () => {
		const sender = new ScriptedSender([apiError(429, 3), apiError(429, 2)])
		await expect(sender.send(1001, 'Hello')).resolves.toBeUndefined()
		expect(sender.calls).toBe(3)
		expect(sender.waits).toEqual([3000, 2000])
	})

	it('gives up once the retries are spent', async () => {
		const final = apiError(429, 1)
		const sender = new ScriptedSender([apiError(429, 1), apiError(429, 1), apiError(429, 1), final])
		await expect(sender.send(1001, 'Hello')).rejects.toBe(final)
		expect(sender.calls).toBe(4)
		expect(sender.waits).toEqual([1000, 1000, 1000])
	})

	it('does not retry other failures', async () => {
		const blocked = apiError(403)
		const sender = new ScriptedSender([blocked])
		await expect(sender.send(1001, 'Hello')).rejects.toBe(blocked)
		expect(sender.calls).toBe(1)
		expect(sender.waits).toEqual([])
	})
})
