import { Injectable, Logger } from '@nestjs/common'
import { ConflictError, ValidationError } from '../../common/errors'
import { AdminGateService } from '../admin/admin-gate.service'
import { AuditService } from '../admin/audit.service'
import type { AdRecord } from '../database/schema'
import { UsersService } from '../users/users.service'
import { AdsRepo } from './ads.repo'
import {
	BroadcastService,
	type BroadcastHandle,
	type BroadcastProgress
} from './broadcast.service'

/** Telegram's limit for a single text message. */
export const MAX_ANNOUNCEMENT_LENGTH = 4096

@Injectable()
export class AnnouncementsService {
	private readonly logger = new Logger(AnnouncementsService.name)

	constructor(
		private readonly ads: AdsRepo,
		private readonly broadcast: BroadcastService,
		private readonly users: UsersService,
		private readonly gate: AdminGateService,
		private readonly audit: AuditService
	) {}

	validateText(text: string): string {
		const trimmed = text.trim()
		if (!trimmed || trimmed.length > MAX_ANNOUNCEMENT_LENGTH) {
			throw new ValidationError('Invalid announcement text', 'broadcast_invalid', {
				max: MAX_ANNOUNCEMENT_LENGTH
			})
		}
		return trimmed
	}

	async announce(actorId: number, text: string): Promise<BroadcastHandle> {
		this.gate.assertAdmin(actorId)
		const body = this.validateText(text)
		this.assertIdle()

		const recipients = (await this.users.listAll()).map(user => user.telegramId)
		const ad = await this.ads.create(body, actorId)
		const handle = this.broadcast.dispatch(ad, recipients)
		await this.audit.record({
			actorId,
			action: 'broadcast.start',
			entity: 'ad',
			entityId: ad.id,
			details: { recipients: recipients.length }
		})
		return handle
	}

	async stop(actorId: number): Promise<BroadcastProgress> {
		this.gate.assertAdmin(actorId)
		const handle = this.broadcast.current()
		if (!handle) throw new ConflictError('No broadcast is running', 'broadcast_idle')
		handle.cancel()
		this.logger.log(`broadcast #${handle.adId} stop requested by ${actorId}`)
		await this.audit.record({
			actorId,
			action: 'broadcast.stop',
			entity: 'ad',
			entityId: handle.adId
		})
		return handle.progress()
	}

	status(actorId: number): BroadcastProgress | null {
		this.gate.assertAdmin(actorId)
		return this.broadcast.current()?.progress() ?? null
	}

	listAll(): Promise<AdRecord[]> {
		return this.ads.listAll()
	}

	private assertIdle(): void {
		const running = this.broadcast.current()
		if (running) {
			throw new ConflictError(
				`Broadcast #${running.adId} is still running`,
				'broadcast_busy',
				{ id: running.adId }
			)
		}
	}
}
