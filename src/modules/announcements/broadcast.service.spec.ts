import { ConflictError, PersistenceError } from '../../common/errors'
import { ADMIN_ID, testSettings } from '../../testing/fixtures'
import { InstantBroadcastService, RecordingSender } from '../../testing/fake-sender'
import { FIXED_NOW, InMemoryAdsRepo } from '../../testing/in-memory.repos'
import { sendInterval } from './broadcast.service'

function setup(overrides: Record<string, string> = {}) {
	const ads = new InMemoryAdsRepo()
	const sender = new RecordingSender()
	const broadcast = new InstantBroadcastService(ads, sender, testSettings(overrides))
	return { ads, sender, broadcast }
}

describe('sendInterval', () => {
	const base = { windowMs: 1000, retryAttempts: 3, checkpointEvery: 25 }

	it('spreads the rate limit over the window', () => {
		expect(sendInterval({ ...base, rateLimit: 28 })).toBe(36)
		expect(sendInterval({ ...base, rateLimit: 4 })).toBe(250)
	})
})

describe('BroadcastService', () => {
	it('sends to every recipient and counts failures', async () => {
		const { ads, sender, broadcast } = setup()
		sender.failFor.add(2).add(4)
		const ad = await ads.create('Maintenance tonight', ADMIN_ID)

		const summary = await broadcast.dispatch(ad, [1, 2, 3, 4, 5]).done

		expect(summary).toEqual({ adId: 1, sent: 3, failed: 2, total: 5, cancelled: false })
		expect(sender.sent.map(message => message.chatId)).toEqual([1, 3, 5])
		expect(sender.sent[0].text).toBe('Maintenance tonight')
		expect(await ads.findById(ad.id)).toMatchObject({
			status: 'completed',
			sentCount: 3,
			failedCount: 2,
			finishedAt: FIXED_NOW
		})
	})

	it('paces sends without waiting before the first', async () => {
		const { ads, broadcast } = setup({ BROADCAST_RATE_LIMIT: '4' })
		const ad = await ads.create('Hello', ADMIN_ID)
		await broadcast.dispatch(ad, [1, 2, 3]).done
		expect(broadcast.waits).toEqual([250, 250])
	})

	it('checkpoints progress between sends', async () => {
		const { ads, sender, broadcast } = setup({ BROADCAST_CHECKPOINT_EVERY: '2' })
		sender.failFor.add(2).add(4)
		const ad = await ads.create('Hello', ADMIN_ID)
		await broadcast.dispatch(ad, [1, 2, 3, 4, 5]).done
		expect(ads.checkpoints).toEqual([
			{ sentCount: 1, failedCount: 1 },
			{ sentCount: 2, failedCount: 2 }
		])
	})

	it('keeps sending when a checkpoint fails', async () => {
		const { ads, broadcast } = setup({ BROADCAST_CHECKPOINT_EVERY: '1' })
		ads.failCheckpoints = true
		const ad = await ads.create('Hello', ADMIN_ID)
		const summary = await broadcast.dispatch(ad, [1, 2, 3]).done
		expect(summary).toMatchObject({ sent: 3, failed: 0, cancelled: false })
		expect((await ads.findById(ad.id))?.status).toBe('completed')
	})

	it('stops after the in-flight send when cancelled', async () => {
		const { ads, sender, broadcast } = setup()
		const ad = await ads.create('Hello', ADMIN_ID)
		const handle = broadcast.dispatch(ad, [1, 2, 3, 4, 5])
		sender.onSend = chatId => {
			if (chatId === 2) handle.cancel()
		}

		const summary = await handle.done

		expect(summary).toEqual({ adId: 1, sent: 2, failed: 0, total: 5, cancelled: true })
		expect(sender.attempted).toEqual([1, 2])
		expect(await ads.findById(ad.id)).toMatchObject({
			status: 'cancelled',
			sentCount: 2,
			failedCount: 0
		})
	})

	it('completes when cancelled during the last send', async () => {
		const { ads, sender, broadcast } = setup()
		const ad = await ads.create('Hello', ADMIN_ID)
		const handle = broadcast.dispatch(ad, [1, 2])
		sender.onSend = chatId => {
			if (chatId === 2) handle.cancel()
		}
		expect((await handle.done).cancelled).toBe(false)
		expect((await ads.findById(ad.id))?.status).toBe('completed')
	})

	it('finalizes an empty batch', async () => {
		const { ads, broadcast } = setup()
		const ad = await ads.create('Hello', ADMIN_ID)
		expect(await broadcast.dispatch(ad, []).done).toEqual({
			adId: 1,
			sent: 0,
			failed: 0,
			total: 0,
			cancelled: false
		})
		expect(broadcast.waits).toEqual([])
	})

	it('runs one batch at a time', async () => {
		const { ads, sender, broadcast } = setup()
		sender.hold()
		const first = broadcast.dispatch(await ads.create('One', ADMIN_ID), [1, 2])
		const second = await ads.create('Two', ADMIN_ID)

		expect(broadcast.isBusy()).toBe(true)
		expect(() => broadcast.dispatch(second, [1])).toThrow(ConflictError)
		expect(first.progress()).toEqual({ adId: 1, sent: 0, failed: 0, total: 2, cancelled: false })

		sender.release()
		await first.done
		expect(broadcast.isBusy()).toBe(false)
		expect(broadcast.current()).toBeNull()
		await expect(broadcast.dispatch(second, [1]).done).resolves.toMatchObject({ sent: 1 })
	})

	it('rejects the handle when finalization fails and frees the slot', async () => {
		const { ads, sender, broadcast } = setup()
		ads.failFinalize = true
		const ad = await ads.create('Hello', ADMIN_ID)
		await expect(broadcast.dispatch(ad, [1, 2]).done).rejects.toBeInstanceOf(PersistenceError)
		expect(sender.sent).toHaveLength(2)
		expect(broadcast.isBusy()).toBe(false)
	})
})
