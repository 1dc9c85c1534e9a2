import { mkdtemp, readdir, rm, stat, writeFile } from 'node:fs/promises'
import { tmpdir } from 'node:os'
import { join } from 'node:path'
import { AuthorizationError } from '../../common/errors'
import {
	ADMIN_ID,
	USER_ID,
	buildServices,
	registerUser,
	seedCatalog,
	testSettings,
	type TestServices
} from '../../testing/fixtures'
import { buildSnapshot, readBackup } from '../../testing/reporting'
import { BackupService } from './backup.service'

describe('BackupService', () => {
	let dataDir: string
	let services: TestServices
	let backups: BackupService

	beforeEach(async () => {
		dataDir = await mkdtemp(join(tmpdir(), 'intake-backups-'))
		services = buildServices(testSettings({ DATA_DIR: dataDir, BACKUP_KEEP: '2' }))
		const { snapshot } = buildSnapshot(services)
		backups = new BackupService(snapshot, services.gate, services.audit, services.settings)
	})

	afterEach(async () => {
		await rm(dataDir, { recursive: true, force: true })
	})

	it('writes a gzipped snapshot that reads back', async () => {
		await seedCatalog(services)
		await registerUser(services)
		const now = new Date(2026, 0, 15, 9, 5, 7)

		const file = await backups.create(ADMIN_ID, now)

		expect(file.path).toBe(join(dataDir, 'backups', 'backup_20260115_090507.json.gz'))
		expect(file.bytes).toBe((await stat(file.path)).size)
		expect(await readBackup(file.path)).toMatchObject({
			createdAt: now.toISOString(),
			tables: {
				companies: [{ name: 'Acme' }, { name: 'Dormant' }, { name: 'Globex' }],
				users: [{ telegramId: 1001, displayName: 'Test User' }],
				requests: []
			}
		})
		expect(services.repos.audit.entries.at(-1)).toEqual({
			actorId: ADMIN_ID,
			action: 'backup.create',
			entity: 'backup',
			details: { bytes: file.bytes }
		})
	})

	it('keeps only the newest backups', async () => {
		await backups.create(ADMIN_ID, new Date(2026, 0, 13, 3, 0, 0))
		await backups.create(ADMIN_ID, new Date(2026, 0, 14, 3, 0, 0))
		await writeFile(join(dataDir, 'backups', 'notes.txt'), 'keep me')
		await backups.create(ADMIN_ID, new Date(2026, 0, 15, 3, 0, 0))

		expect(await backups.list()).toEqual([
			'backup_20260115_030000.json.gz',
			'backup_20260114_030000.json.gz'
		])
		expect((await readdir(join(dataDir, 'backups'))).sort()).toEqual([
			'backup_20260114_030000.json.gz',
			'backup_20260115_030000.json.gz',
			'notes.txt'
		])
	})

	it('lists nothing before the first backup', async () => {
		expect(await backups.list()).toEqual([])
		expect(await backups.prune()).toBe(0)
	})

	it('refuses non-admins', async () => {
		await expect(backups.create(USER_ID)).rejects.toBeInstanceOf(AuthorizationError)
	})
})
