import { Injectable } from '@nestjs/common'
import { and, asc, eq } from 'drizzle-orm'
import { DatabaseService } from '../database/database.service'
import { withPersistence } from '../database/persistence'
import { complaints, type ComplaintRecord } from '../database/schema'

export interface ComplaintClosure {
	resolvedBy: number
	resolvedAt: Date
	adminReply: string | null
}

export abstract class ComplaintsRepo {
	abstract create(userId: number, text: string): Promise<ComplaintRecord>
	abstract findById(id: number): Promise<ComplaintRecord | null>
	abstract listOpen(limit: number): Promise<ComplaintRecord[]>
	abstract listAll(): Promise<ComplaintRecord[]>
	/** Closes the complaint only while it is still open. */
	abstract closeOpen(id: number, closure: ComplaintClosure): Promise<ComplaintRecord | null>
}

@Injectable()
export class DrizzleComplaintsRepo extends ComplaintsRepo {
	constructor(private readonly database: DatabaseService) {
		super()
	}

	async create(userId: number, text: string): Promise<ComplaintRecord> {
		const [row] = await withPersistence('complaints.create', () =>
			this.database.db.insert(complaints).values({ userId, text }).returning()
		)
		return row
	}

	async findById(id: number): Promise<ComplaintRecord | null> {
		const [row] = await withPersistence('complaints.findById', () =>
			this.database.db.select().from(complaints).where(eq(complaints.id, id)).limit(1)
		)
		return row ?? null
	}

	listOpen(limit: number): Promise<ComplaintRecord[]> {
		return withPersistence('complaints.listOpen', () =>
			this.database.db
				.select()
				.from(complaints)
				.where(eq(complaints.status, 'open'))
				.orderBy(asc(complaints.createdAt))
				.limit(limit)
		)
	}

	listAll(): Promise<ComplaintRecord[]> {
		return withPersistence('complaints.listAll', () =>
			this.database.db.select().from(complaints).orderBy(asc(complaints.id))
		)
	}

	async closeOpen(id: number, closure: ComplaintClosure): Promise<ComplaintRecord | null> {
		const [row] = await withPersistence('complaints.closeOpen', () =>
			this.database.db
				.update(complaints)
				.set({ ...closure, status: 'closed' })
				.where(and(eq(complaints.id, id), eq(complaints.status, 'open')))
				.returning()
		)
		return row ?? null
	}
}
