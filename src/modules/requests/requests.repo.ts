import { Injectable } from '@nestjs/common'
import { and, asc, count, desc, eq } from 'drizzle-orm'
import { DatabaseService } from '../database/database.service'
import { withPersistence } from '../database/persistence'
import {
	requests,
	type RequestKind,
	type RequestRecord,
	type RequestStatus
} from '../database/schema'

export interface NewRequest {
	userId: number
	kind: RequestKind
	amount: string
	companyId: number
	paymentMethodId: number
	reference: string
	destination: string | null
}

export interface Resolution {
	status: Exclude<RequestStatus, 'pending'>
	resolvedBy: number
	resolvedAt: Date
	adminNote: string | null
}

export type StatusCounts = Record<RequestStatus, number>

export abstract class RequestsRepo {
	abstract create(input: NewRequest): Promise<RequestRecord>
	abstract findById(id: number): Promise<RequestRecord | null>
	abstract listByStatus(status: RequestStatus, limit: number): Promise<RequestRecord[]>
	abstract listByUser(userId: number, limit: number): Promise<RequestRecord[]>
	abstract listAll(): Promise<RequestRecord[]>
	/** Applies the resolution only while the row is still pending. */
	abstract resolvePending(id: number, resolution: Resolution): Promise<RequestRecord | null>
	abstract countByStatus(): Promise<StatusCounts>
}

@Injectable()
export class DrizzleRequestsRepo extends RequestsRepo {
	constructor(private readonly database: DatabaseService) {
		super()
	}

	async create(input: NewRequest): Promise<RequestRecord> {
		const [row] = await withPersistence('requests.create', () =>
			this.database.db.insert(requests).values(input).returning()
		)
		return row
	}

	async findById(id: number): Promise<RequestRecord | null> {
		const [row] = await withPersistence('requests.findById', () =>
			this.database.db.select().from(requests).where(eq(requests.id, id)).limit(1)
		)
		return row ?? null
	}

	listByStatus(status: RequestStatus, limit: number): Promise<RequestRecord[]> {
		return withPersistence('requests.listByStatus', () =>
			this.database.db
				.select()
				.from(requests)
				.where(eq(requests.status, status))
				.orderBy(asc(requests.createdAt))
				.limit(limit)
		)
	}

	listByUser(userId: number, limit: number): Promise<RequestRecord[]> {
		return withPersistence('requests.listByUser', () =>
			this.database.db
				.select()
				.from(requests)
				.where(eq(requests.userId, userId))
				.orderBy(desc(requests.createdAt))
				.limit(limit)
		)
	}

	listAll(): Promise<RequestRecord[]> {
		return withPersistence('requests.listAll', () =>
			this.database.db.select().from(requests).orderBy(asc(requests.id))
		)
	}

	async resolvePending(id: number, resolution: Resolution): Promise<RequestRecord | null> {
		const [row] = await withPersistence('requests.resolvePending', () =>
			this.database.db
				.update(requests)
				.set(resolution)
				.where(and(eq(requests.id, id), eq(requests.status, 'pending')))
				.returning()
		)
		return row ?? null
	}

	async countByStatus(): Promise<StatusCounts> {
		const rows = await withPersistence('requests.countByStatus', () =>
			this.database.db
				.select({ status: requests.status, total: count() })
				.from(requests)
				.groupBy(requests.status)
		)
		const counts: StatusCounts = { pending: 0, approved: 0, rejected: 0 }
		for (const row of rows) counts[row.status] = row.total
		return counts
	}
}
