import { Injectable } from '@nestjs/common'
import { asc, eq } from 'drizzle-orm'
import { DatabaseService } from '../database/database.service'
import { withPersistence } from '../database/persistence'
import { users, type NewUser, type UserRecord } from '../database/schema'

export abstract class UsersRepo {
	abstract findByTelegramId(telegramId: number): Promise<UserRecord | null>
	abstract customerCodeExists(code: string): Promise<boolean>
	abstract create(input: NewUser): Promise<UserRecord>
	abstract updateLanguage(telegramId: number, languageCode: string): Promise<UserRecord | null>
	abstract listAll(): Promise<UserRecord[]>
}

@Injectable()
export class DrizzleUsersRepo extends UsersRepo {
	constructor(private readonly database: DatabaseService) {
		super()
	}

	async findByTelegramId(telegramId: number): Promise<UserRecord | null> {
		const [row] = await withPersistence('users.findByTelegramId', () =>
			this.database.db
				.select()
				.from(users)
				.where(eq(users.telegramId, telegramId))
				.limit(1)
		)
		return row ?? null
	}

	async customerCodeExists(code: string): Promise<boolean> {
		const rows = await withPersistence('users.customerCodeExists', () =>
			this.database.db
				.select({ telegramId: users.telegramId })
				.from(users)
				.where(eq(users.customerCode, code))
				.limit(1)
		)
		return rows.length > 0
	}

	async create(input: NewUser): Promise<UserRecord> {
		const [row] = await withPersistence('users.create', () =>
			this.database.db.insert(users).values(input).returning()
		)
		return row
	}

	async updateLanguage(
		telegramId: number,
		languageCode: string
	): Promise<UserRecord | null> {
		const [row] = await withPersistence('users.updateLanguage', () =>
			this.database.db
				.update(users)
				.set({ languageCode, updatedAt: new Date() })
				.where(eq(users.telegramId, telegramId))
				.returning()
		)
		return row ?? null
	}

	listAll(): Promise<UserRecord[]> {
		return withPersistence('users.listAll', () =>
			this.database.db.select().from(users).orderBy(asc(users.createdAt))
		)
	}
}
