import { AuthorizationError, ConflictError } from '../../common/errors'
import { ADMIN_ID, USER_ID, buildServices, registerUser } from '../../testing/fixtures'
import { InstantBroadcastService, RecordingSender } from '../../testing/fake-sender'
import { InMemoryAdsRepo } from '../../testing/in-memory.repos'
import { AnnouncementsService, MAX_ANNOUNCEMENT_LENGTH } from './announcements.service'

async function setup() {
	const services = buildServices()
	await registerUser(services, 1001, 'First')
	await registerUser(services, 1002, 'Second')
	await registerUser(services, 1003, 'Third')
	const ads = new InMemoryAdsRepo()
	const sender = new RecordingSender()
	const broadcast = new InstantBroadcastService(ads, sender, services.settings)
	const announcements = new AnnouncementsService(
		ads,
		broadcast,
		services.users,
		services.gate,
		services.audit
	)
	return { services, ads, sender, announcements }
}

describe('AnnouncementsService', () => {
	it('broadcasts a trimmed announcement to every user', async () => {
		const { services, ads, sender, announcements } = await setup()
		const handle = await announcements.announce(ADMIN_ID, '  Office closed Friday  ')
		const summary = await handle.done

		expect(summary).toEqual({ adId: 1, sent: 3, failed: 0, total: 3, cancelled: false })
		expect(sender.sent).toEqual([
			{ chatId: 1001, text: 'Office closed Friday' },
			{ chatId: 1002, text: 'Office closed Friday' },
			{ chatId: 1003, text: 'Office closed Friday' }
		])
		expect(ads.rows[0]).toMatchObject({ createdBy: ADMIN_ID, status: 'completed' })
		expect(services.repos.audit.entries).toEqual([
			{
				actorId: ADMIN_ID,
				action: 'broadcast.start',
				entity: 'ad',
				entityId: 1,
				details: { recipients: 3 }
			}
		])
	})

	it('refuses non-admins before creating an ad', async () => {
		const { ads, sender, announcements } = await setup()
		await expect(announcements.announce(USER_ID, 'Hello')).rejects.toBeInstanceOf(
			AuthorizationError
		)
		expect(() => announcements.status(USER_ID)).toThrow(AuthorizationError)
		await expect(announcements.stop(USER_ID)).rejects.toBeInstanceOf(AuthorizationError)
		expect(ads.rows).toHaveLength(0)
		expect(sender.attempted).toHaveLength(0)
	})

	it('validates the announcement text', async () => {
		const { ads, announcements } = await setup()
		await expect(announcements.announce(ADMIN_ID, '   ')).rejects.toMatchObject({
			messageKey: 'broadcast_invalid',
			params: { max: MAX_ANNOUNCEMENT_LENGTH }
		})
		await expect(
			announcements.announce(ADMIN_ID, 'x'.repeat(MAX_ANNOUNCEMENT_LENGTH + 1))
		).rejects.toMatchObject({ messageKey: 'broadcast_invalid' })
		expect(ads.rows).toHaveLength(0)
	})

	it('refuses a second announcement while one is running and stops on request', async () => {
		const { services, ads, sender, announcements } = await setup()
		sender.hold()
		const handle = await announcements.announce(ADMIN_ID, 'First')

		await expect(announcements.announce(ADMIN_ID, 'Second')).rejects.toMatchObject({
			messageKey: 'broadcast_busy',
			params: { id: 1 }
		})
		expect(ads.rows).toHaveLength(1)
		expect(announcements.status(ADMIN_ID)).toEqual({
			adId: 1,
			sent: 0,
			failed: 0,
			total: 3,
			cancelled: false
		})

		const progress = await announcements.stop(ADMIN_ID)
		expect(progress.sent).toBe(0)
		sender.release()

		expect(await handle.done).toEqual({ adId: 1, sent: 1, failed: 0, total: 3, cancelled: true })
		expect(ads.rows[0]).toMatchObject({ status: 'cancelled', sentCount: 1 })
		expect(services.repos.audit.entries.map(entry => entry.action)).toEqual([
			'broadcast.start',
			'broadcast.stop'
		])
		expect(announcements.status(ADMIN_ID)).toBeNull()
	})

	it('has nothing to stop when idle', async () => {
		const { announcements } = await setup()
		await expect(announcements.stop(ADMIN_ID)).rejects.toBeInstanceOf(ConflictError)
		await expect(announcements.stop(ADMIN_ID)).rejects.toMatchObject({
			messageKey: 'broadcast_idle'
		})
	})
})
