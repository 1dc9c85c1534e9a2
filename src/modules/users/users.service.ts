import { Injectable, Logger } from '@nestjs/common'
import { AppSettings } from '../../config/app-settings'
import { ConflictError, NotFoundError, ValidationError } from '../../common/errors'
import { isUniqueViolation } from '../database/persistence'
import type { UserRecord } from '../database/schema'
import { generateCustomerCode, type DigitSource } from './customer-code'
import { UsersRepo } from './users.repo'

const MAX_CODE_ATTEMPTS = 10
const MAX_DISPLAY_NAME_LENGTH = 255

export interface RegistrationResult {
	user: UserRecord
	created: boolean
}

@Injectable()
export class UsersService {
	private readonly logger = new Logger(UsersService.name)
	protected digitSource?: DigitSource

	constructor(
		private readonly repo: UsersRepo,
		private readonly settings: AppSettings
	) {}

	findByTelegramId(telegramId: number): Promise<UserRecord | null> {
		return this.repo.findByTelegramId(telegramId)
	}

	async getByTelegramId(telegramId: number): Promise<UserRecord> {
		const user = await this.repo.findByTelegramId(telegramId)
		if (!user) throw new NotFoundError('user', telegramId, 'please_start')
		return user
	}

	async register(
		telegramId: number,
		displayName: string,
		languageHint?: string | null
	): Promise<RegistrationResult> {
		const existing = await this.repo.findByTelegramId(telegramId)
		if (existing) return { user: existing, created: false }

		const languageCode = this.pickLanguage(languageHint)
		const name = displayName.trim().slice(0, MAX_DISPLAY_NAME_LENGTH) || String(telegramId)

		for (let attempt = 0; attempt < MAX_CODE_ATTEMPTS; attempt++) {
			const customerCode = generateCustomerCode(
				this.settings.customerCodePrefix,
				this.settings.customerCodeYear,
				this.digitSource
			)
			if (await this.repo.customerCodeExists(customerCode)) continue
			try {
				const user = await this.repo.create({
					telegramId,
					displayName: name,
					languageCode,
					customerCode
				})
				this.logger.log(`registered user=${telegramId} code=${customerCode}`)
				return { user, created: true }
			} catch (error: unknown) {
				if (!isUniqueViolation(error)) throw error
				const raced = await this.repo.findByTelegramId(telegramId)
				if (raced) return { user: raced, created: false }
			}
		}
		throw new ConflictError(
			`Could not allocate a customer code for ${telegramId}`,
			'error'
		)
	}

	async setLanguage(telegramId: number, languageCode: string): Promise<UserRecord> {
		const code = languageCode.trim().toLowerCase()
		if (!this.settings.supportedLanguages.includes(code)) {
			throw new ValidationError(`Unsupported language "${languageCode}"`, 'unsupported_language')
		}
		const updated = await this.repo.updateLanguage(telegramId, code)
		if (!updated) throw new NotFoundError('user', telegramId, 'please_start')
		return updated
	}

	listAll(): Promise<UserRecord[]> {
		return this.repo.listAll()
	}

	private pickLanguage(hint?: string | null): string {
		const code = hint?.trim().toLowerCase().slice(0, 2)
		if (code && this.settings.supportedLanguages.includes(code)) return code
		return this.settings.defaultLanguage
	}
}
