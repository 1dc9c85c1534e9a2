import { Injectable } from '@nestjs/common'
import { desc } from 'drizzle-orm'
import { DatabaseService } from '../database/database.service'
import { withPersistence } from '../database/persistence'
import { auditLog, type AuditLogRecord } from '../database/schema'

export interface AuditEntry {
	actorId: number
	action: string
	entity: string
	entityId?: number | null
	details?: Record<string, unknown>
}

export abstract class AuditRepo {
	abstract record(entry: AuditEntry): Promise<void>
	abstract listRecent(limit: number): Promise<AuditLogRecord[]>
}

@Injectable()
export class DrizzleAuditRepo extends AuditRepo {
	constructor(private readonly database: DatabaseService) {
		super()
	}

	async record(entry: AuditEntry): Promise<void> {
		await withPersistence('audit.record', () =>
			this.database.db.insert(auditLog).values({
				actorId: entry.actorId,
				action: entry.action,
				entity: entry.entity,
				entityId: entry.entityId ?? null,
				details: entry.details ?? {}
			})
		)
	}

	listRecent(limit: number): Promise<AuditLogRecord[]> {
		return withPersistence('audit.listRecent', () =>
			this.database.db
				.select()
				.from(auditLog)
				.orderBy(desc(auditLog.createdAt))
				.limit(limit)
		)
	}
}
