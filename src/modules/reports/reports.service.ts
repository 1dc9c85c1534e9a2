import { Injectable, Logger } from '@nestjs/common'
import { Parser } from 'json2csv'
import { mkdir, readdir, stat, unlink, writeFile } from 'node:fs/promises'
import { join } from 'node:path'
import { AppSettings } from '../../config/app-settings'
import { AdminGateService } from '../admin/admin-gate.service'
import { AuditService } from '../admin/audit.service'
import { fileTimestamp } from './file-timestamp'
import {
	SNAPSHOT_TABLES,
	SnapshotService,
	type SnapshotRow,
	type SnapshotTable
} from './snapshot.service'

const DAY_MS = 24 * 60 * 60 * 1000

export interface ReportFile {
	table: SnapshotTable
	rows: number
	path: string
}

export function toCsv(rows: SnapshotRow[]): string {
	const parser = new Parser<SnapshotRow>({ fields: Object.keys(rows[0]), eol: '\n' })
	return parser.parse(rows)
}

@Injectable()
export class ReportsService {
	private readonly logger = new Logger(ReportsService.name)

	constructor(
		private readonly snapshot: SnapshotService,
		private readonly gate: AdminGateService,
		private readonly audit: AuditService,
		private readonly settings: AppSettings
	) {}

	/** One CSV per non-empty table. */
	async generate(actorId: number, now: Date = new Date()): Promise<ReportFile[]> {
		this.gate.assertAdmin(actorId)
		const data = await this.snapshot.collect(actorId)
		const stamp = fileTimestamp(now)
		await mkdir(this.settings.reportsDir, { recursive: true })

		const files: ReportFile[] = []
		for (const table of SNAPSHOT_TABLES) {
			const rows = data[table]
			if (!rows.length) continue
			const path = join(this.settings.reportsDir, `${table}_report_${stamp}.csv`)
			await writeFile(path, toCsv(rows), 'utf-8')
			files.push({ table, rows: rows.length, path })
		}
		this.logger.log(`generated ${files.length} report files for ${actorId}`)
		await this.audit.record({
			actorId,
			action: 'reports.generate',
			entity: 'report',
			details: { files: files.length }
		})
		return files
	}

	/** Deletes report files last modified more than the retention period ago. */
	async cleanup(now: Date = new Date()): Promise<number> {
		const cutoff = now.getTime() - this.settings.reportRetentionDays * DAY_MS
		let names: string[]
		try {
			names = await readdir(this.settings.reportsDir)
		} catch (error: unknown) {
			if (isMissingDirectory(error)) return 0
			throw error
		}
		let removed = 0
		for (const name of names) {
			if (!name.endsWith('.csv')) continue
			const path = join(this.settings.reportsDir, name)
			const info = await stat(path)
			if (info.mtimeMs < cutoff) {
				await unlink(path)
				removed++
			}
		}
		if (removed) this.logger.log(`removed ${removed} expired report files`)
		return removed
	}
}

export function isMissingDirectory(error: unknown): boolean {
	return (
		typeof error === 'object' &&
		error !== null &&
		'code' in error &&
		error.code === 'ENOENT'
	)
}
