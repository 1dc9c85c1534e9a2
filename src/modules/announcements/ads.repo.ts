import { Injectable } from '@nestjs/common'
import { and, asc, eq } from 'drizzle-orm'
import { DatabaseService } from '../database/database.service'
import { withPersistence } from '../database/persistence'
import { ads, type AdRecord } from '../database/schema'

export interface AdCounts {
	sentCount: number
	failedCount: number
}

export type AdFinalStatus = Exclude<AdRecord['status'], 'sending'>

export abstract class AdsRepo {
	abstract create(text: string, createdBy: number): Promise<AdRecord>
	abstract findById(id: number): Promise<AdRecord | null>
	abstract listAll(): Promise<AdRecord[]>
	abstract updateCounts(id: number, counts: AdCounts): Promise<void>
	/** Writes totals and the final status; a no-op once the ad left `sending`. */
	abstract finalize(
		id: number,
		status: AdFinalStatus,
		counts: AdCounts
	): Promise<AdRecord | null>
}

@Injectable()
export class DrizzleAdsRepo extends AdsRepo {
	constructor(private readonly database: DatabaseService) {
		super()
	}

	async create(text: string, createdBy: number): Promise<AdRecord> {
		const [row] = await withPersistence('ads.create', () =>
			this.database.db.insert(ads).values({ text, createdBy }).returning()
		)
		return row
	}

	async findById(id: number): Promise<AdRecord | null> {
		const [row] = await withPersistence('ads.findById', () =>
			this.database.db.select().from(ads).where(eq(ads.id, id)).limit(1)
		)
		return row ?? null
	}

	listAll(): Promise<AdRecord[]> {
		return withPersistence('ads.listAll', () =>
			this.database.db.select().from(ads).orderBy(asc(ads.id))
		)
	}

	async updateCounts(id: number, counts: AdCounts): Promise<void> {
		await withPersistence('ads.updateCounts', () =>
			this.database.db
				.update(ads)
				.set(counts)
				.where(and(eq(ads.id, id), eq(ads.status, 'sending')))
		)
	}

	async finalize(
		id: number,
		status: AdFinalStatus,
		counts: AdCounts
	): Promise<AdRecord | null> {
		const [row] = await withPersistence('ads.finalize', () =>
			this.database.db
				.update(ads)
				.set({ ...counts, status, finishedAt: new Date() })
				.where(and(eq(ads.id, id), eq(ads.status, 'sending')))
				.returning()
		)
		return row ?? null
	}
}
