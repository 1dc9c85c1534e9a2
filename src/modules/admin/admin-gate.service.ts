import { Injectable } from '@nestjs/common'
import { AppSettings } from '../../config/app-settings'
import { AuthorizationError } from '../../common/errors'

/**
 * Membership check against the admin ids configured at startup.
 */
@Injectable()
export class AdminGateService {
	private readonly admins: ReadonlySet<number>

	constructor(settings: AppSettings) {
		this.admins = settings.adminIds
	}

	isAdmin(telegramId: number | null | undefined): boolean {
		return telegramId != null && this.admins.has(telegramId)
	}

	assertAdmin(telegramId: number): void {
		if (!this.isAdmin(telegramId)) throw new AuthorizationError(telegramId)
	}

	adminIds(): number[] {
		return [...this.admins]
	}
}
