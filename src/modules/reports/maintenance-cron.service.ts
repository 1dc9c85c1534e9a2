import { Injectable, Logger } from '@nestjs/common'
import { Cron } from '@nestjs/schedule'
import { describeError } from '../../common/errors'
import { BackupService } from './backup.service'
import { ReportsService } from './reports.service'

@Injectable()
export class MaintenanceCronService {
	private readonly logger = new Logger(MaintenanceCronService.name)

	constructor(
		private readonly reports: ReportsService,
		private readonly backups: BackupService
	) {}

	private async runCronSafe(task: string, fn: () => Promise<unknown>): Promise<void> {
		try {
			await fn()
		} catch (error: unknown) {
			this.logger.warn(`${task} skipped for current tick: ${describeError(error)}`)
		}
	}

	@Cron('0 3 * * *')
	async cleanup(): Promise<void> {
		await this.runCronSafe('reports.cleanup', () => this.reports.cleanup())
		await this.runCronSafe('backups.prune', () => this.backups.prune())
	}
}
