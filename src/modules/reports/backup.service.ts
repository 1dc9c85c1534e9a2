import { Injectable, Logger } from '@nestjs/common'
import { gzip } from 'pako'
import { mkdir, readdir, unlink, writeFile } from 'node:fs/promises'
import { join } from 'node:path'
import { AppSettings } from '../../config/app-settings'
import { AdminGateService } from '../admin/admin-gate.service'
import { AuditService } from '../admin/audit.service'
import { fileTimestamp } from './file-timestamp'
import { isMissingDirectory } from './reports.service'
import { SnapshotService, type Snapshot } from './snapshot.service'

const BACKUP_PATTERN = /^backup_\d{8}_\d{6}\.json\.gz$/

export interface BackupDocument {
	createdAt: string
	tables: Snapshot
}

export interface BackupFile {
	path: string
	bytes: number
}

@Injectable()
export class BackupService {
	private readonly logger = new Logger(BackupService.name)

	constructor(
		private readonly snapshot: SnapshotService,
		private readonly gate: AdminGateService,
		private readonly audit: AuditService,
		private readonly settings: AppSettings
	) {}

	async create(actorId: number, now: Date = new Date()): Promise<BackupFile> {
		this.gate.assertAdmin(actorId)
		const document: BackupDocument = {
			createdAt: now.toISOString(),
			tables: await this.snapshot.collect(actorId)
		}
		const compressed = gzip(JSON.stringify(document))
		await mkdir(this.settings.backupsDir, { recursive: true })
		const path = join(this.settings.backupsDir, `backup_${fileTimestamp(now)}.json.gz`)
		await writeFile(path, compressed)
		this.logger.log(`backup written to ${path} (${compressed.byteLength} bytes)`)

		await this.prune()
		await this.audit.record({
			actorId,
			action: 'backup.create',
			entity: 'backup',
			details: { bytes: compressed.byteLength }
		})
		return { path, bytes: compressed.byteLength }
	}

	/** Backup file names, newest first. */
	async list(): Promise<string[]> {
		let names: string[]
		try {
			names = await readdir(this.settings.backupsDir)
		} catch (error: unknown) {
			if (isMissingDirectory(error)) return []
			throw error
		}
		return names
			.filter(name => BACKUP_PATTERN.test(name))
			.sort()
			.reverse()
	}

	/** Keeps the newest `BACKUP_KEEP` backups. */
	async prune(): Promise<number> {
		const stale = (await this.list()).slice(this.settings.backupKeep)
		for (const name of stale) {
			await unlink(join(this.settings.backupsDir, name))
		}
		if (stale.length) this.logger.log(`pruned ${stale.length} old backups`)
		return stale.length
	}
}
