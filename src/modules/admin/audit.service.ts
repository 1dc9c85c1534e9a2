import { Injectable, Logger } from '@nestjs/common'
import { describeError } from '../../common/errors'
import type { AuditLogRecord } from '../database/schema'
import { AdminGateService } from './admin-gate.service'
import { AuditRepo, type AuditEntry } from './audit.repo'

/** Appends admin actions to the audit log; a failed write never undoes the action. */
@Injectable()
export class AuditService {
	private readonly logger = new Logger(AuditService.name)

	constructor(
		private readonly repo: AuditRepo,
		private readonly gate: AdminGateService
	) {}

	async record(entry: AuditEntry): Promise<void> {
		try {
			await this.repo.record(entry)
		} catch (error: unknown) {
			this.logger.warn(
				`audit write failed action=${entry.action} entity=${entry.entity}#${entry.entityId ?? '-'}: ${describeError(error)}`
			)
		}
	}

	async recent(actorId: number, limit = 20): Promise<AuditLogRecord[]> {
		this.gate.assertAdmin(actorId)
		return this.repo.listRecent(limit)
	}
}
