import { Injectable, Logger } from '@nestjs/common'
import { ConflictError, NotFoundError, ValidationError } from '../../common/errors'
import { AdminGateService } from '../admin/admin-gate.service'
import { AuditService } from '../admin/audit.service'
import type { ComplaintRecord } from '../database/schema'
import { UsersService } from '../users/users.service'
import { ComplaintsRepo } from './complaints.repo'

export const MAX_COMPLAINT_LENGTH = 2000
export const MAX_REPLY_LENGTH = 500
const OPEN_PAGE = 20

export function normalizeComplaintText(text: string): string {
	const trimmed = text.trim()
	if (!trimmed || trimmed.length > MAX_COMPLAINT_LENGTH) {
		throw new ValidationError('Invalid complaint text', 'complaint_invalid', {
			max: MAX_COMPLAINT_LENGTH
		})
	}
	return trimmed
}

@Injectable()
export class ComplaintsService {
	private readonly logger = new Logger(ComplaintsService.name)

	constructor(
		private readonly repo: ComplaintsRepo,
		private readonly users: UsersService,
		private readonly gate: AdminGateService,
		private readonly audit: AuditService
	) {}

	async submit(userId: number, text: string): Promise<ComplaintRecord> {
		const body = normalizeComplaintText(text)
		await this.users.getByTelegramId(userId)
		const complaint = await this.repo.create(userId, body)
		this.logger.log(`complaint #${complaint.id} submitted by ${userId}`)
		return complaint
	}

	async close(actorId: number, id: number, reply?: string | null): Promise<ComplaintRecord> {
		this.gate.assertAdmin(actorId)
		const adminReply = reply?.trim() || null
		if (adminReply && adminReply.length > MAX_REPLY_LENGTH) {
			throw new ValidationError('Reply too long', 'note_too_long', { max: MAX_REPLY_LENGTH })
		}
		const closed = await this.repo.closeOpen(id, {
			resolvedBy: actorId,
			resolvedAt: new Date(),
			adminReply
		})
		if (!closed) {
			const current = await this.repo.findById(id)
			if (!current) throw new NotFoundError('complaint', id)
			throw new ConflictError(`Complaint #${id} already closed`, 'complaint_already_closed', {
				id
			})
		}
		this.logger.log(`complaint #${id} closed by ${actorId}`)
		await this.audit.record({
			actorId,
			action: 'complaint.close',
			entity: 'complaint',
			entityId: id
		})
		return closed
	}

	async listOpen(actorId: number, limit = OPEN_PAGE): Promise<ComplaintRecord[]> {
		this.gate.assertAdmin(actorId)
		return this.repo.listOpen(limit)
	}

	listAll(): Promise<ComplaintRecord[]> {
		return this.repo.listAll()
	}
}
