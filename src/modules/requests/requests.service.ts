import { Injectable, Logger } from '@nestjs/common'
import { ConflictError, NotFoundError, ValidationError } from '../../common/errors'
import { parseAmount } from '../../common/money'
import { AdminGateService } from '../admin/admin-gate.service'
import { AuditService } from '../admin/audit.service'
import { CompaniesService } from '../companies/companies.service'
import type { RequestKind, RequestRecord } from '../database/schema'
import { UsersService } from '../users/users.service'
import { RequestsRepo, type Resolution, type StatusCounts } from './requests.repo'

const PENDING_PAGE = 20
const MAX_NOTE_LENGTH = 500
export const MAX_REFERENCE_LENGTH = 200
export const MAX_DESTINATION_LENGTH = 300

export interface RequestDraft {
	kind: RequestKind
	companyId: number
	paymentMethodId: number
	amount: string
	/** Transaction id or note the user gives for the transfer. */
	reference: string
	/** Where a withdrawal is paid out; ignored for deposits. */
	destination?: string | null
}

function boundedText(text: string, max: number, messageKey: string): string {
	const trimmed = text.trim()
	if (!trimmed || trimmed.length > max) {
		throw new ValidationError(`Invalid ${messageKey}`, messageKey, { max })
	}
	return trimmed
}

export function normalizeReference(text: string): string {
	return boundedText(text, MAX_REFERENCE_LENGTH, 'reference_invalid')
}

export function normalizeDestination(text: string): string {
	return boundedText(text, MAX_DESTINATION_LENGTH, 'destination_invalid')
}

@Injectable()
export class RequestsService {
	private readonly logger = new Logger(RequestsService.name)

	constructor(
		private readonly repo: RequestsRepo,
		private readonly users: UsersService,
		private readonly companies: CompaniesService,
		private readonly gate: AdminGateService,
		private readonly audit: AuditService
	) {}

	/**
	 * Persists a pending request after re-checking that the user, company
	 * and payment method still exist and are active.
	 */
	async submit(userId: number, draft: RequestDraft): Promise<RequestRecord> {
		await this.users.getByTelegramId(userId)
		const amount = parseAmount(draft.amount)
		const reference = normalizeReference(draft.reference)
		const destination =
			draft.kind === 'withdrawal' ? normalizeDestination(draft.destination ?? '') : null
		await this.companies.findActiveCompany(draft.companyId)
		await this.companies.findActivePaymentMethod(draft.companyId, draft.paymentMethodId)
		const request = await this.repo.create({
			userId,
			kind: draft.kind,
			amount,
			companyId: draft.companyId,
			paymentMethodId: draft.paymentMethodId,
			reference,
			destination
		})
		this.logger.log(
			`request #${request.id} ${request.kind} ${request.amount} submitted by ${userId}`
		)
		return request
	}

	approve(actorId: number, id: number, note?: string | null): Promise<RequestRecord> {
		return this.resolve(actorId, id, 'approved', note)
	}

	reject(actorId: number, id: number, note?: string | null): Promise<RequestRecord> {
		return this.resolve(actorId, id, 'rejected', note)
	}

	async listPending(actorId: number, limit = PENDING_PAGE): Promise<RequestRecord[]> {
		this.gate.assertAdmin(actorId)
		return this.repo.listByStatus('pending', limit)
	}

	async get(actorId: number, id: number): Promise<RequestRecord> {
		this.gate.assertAdmin(actorId)
		const request = await this.repo.findById(id)
		if (!request) throw new NotFoundError('request', id)
		return request
	}

	async countByStatus(actorId: number): Promise<StatusCounts> {
		this.gate.assertAdmin(actorId)
		return this.repo.countByStatus()
	}

	listByUser(userId: number, limit = 5): Promise<RequestRecord[]> {
		return this.repo.listByUser(userId, limit)
	}

	listAll(): Promise<RequestRecord[]> {
		return this.repo.listAll()
	}

	private async resolve(
		actorId: number,
		id: number,
		status: Resolution['status'],
		note?: string | null
	): Promise<RequestRecord> {
		this.gate.assertAdmin(actorId)
		const adminNote = note?.trim() || null
		if (adminNote && adminNote.length > MAX_NOTE_LENGTH) {
			throw new ValidationError('Note too long', 'note_too_long', { max: MAX_NOTE_LENGTH })
		}
		const resolved = await this.repo.resolvePending(id, {
			status,
			resolvedBy: actorId,
			resolvedAt: new Date(),
			adminNote
		})
		if (!resolved) {
			const current = await this.repo.findById(id)
			if (!current) throw new NotFoundError('request', id)
			throw new ConflictError(
				`Request #${id} already ${current.status}`,
				'request_already_resolved',
				{ id, status: { key: `status_${current.status}` } }
			)
		}
		this.logger.log(`request #${id} ${status} by ${actorId}`)
		await this.audit.record({
			actorId,
			action: `request.${status === 'approved' ? 'approve' : 'reject'}`,
			entity: 'request',
			entityId: id,
			details: adminNote ? { note: adminNote } : {}
		})
		return resolved
	}
}
