import { Injectable, Logger } from '@nestjs/common'
import { ConflictError, NotFoundError, ValidationError } from '../../common/errors'
import { AdminGateService } from '../admin/admin-gate.service'
import { AuditService } from '../admin/audit.service'
import { isUniqueViolation } from '../database/persistence'
import type { CompanyRecord, PaymentMethodRecord } from '../database/schema'
import { CompaniesRepo } from './companies.repo'

const MAX_NAME_LENGTH = 100
const MAX_DETAILS_LENGTH = 1000

function requireText(value: string, max: number, field: string): string {
	const trimmed = value.trim()
	if (!trimmed || trimmed.length > max) {
		throw new ValidationError(`Invalid ${field}`, 'invalid_name', { max })
	}
	return trimmed
}

@Injectable()
export class CompaniesService {
	private readonly logger = new Logger(CompaniesService.name)

	constructor(
		private readonly repo: CompaniesRepo,
		private readonly gate: AdminGateService,
		private readonly audit: AuditService
	) {}

	listActive(): Promise<CompanyRecord[]> {
		return this.repo.listCompanies(true)
	}

	async listAll(actorId: number): Promise<CompanyRecord[]> {
		this.gate.assertAdmin(actorId)
		return this.repo.listCompanies(false)
	}

	async getCompany(actorId: number, id: number): Promise<CompanyRecord> {
		this.gate.assertAdmin(actorId)
		const company = await this.repo.findCompany(id)
		if (!company) throw new NotFoundError('company', id)
		return company
	}

	async listPaymentMethods(actorId: number, companyId: number): Promise<PaymentMethodRecord[]> {
		this.gate.assertAdmin(actorId)
		return this.repo.listPaymentMethods(companyId, false)
	}

	async create(actorId: number, name: string): Promise<CompanyRecord> {
		this.gate.assertAdmin(actorId)
		const cleanName = requireText(name, MAX_NAME_LENGTH, 'company name')
		if (await this.repo.findCompanyByName(cleanName)) {
			throw new ConflictError(`Company "${cleanName}" exists`, 'company_exists', {
				name: cleanName
			})
		}
		let company: CompanyRecord
		try {
			company = await this.repo.createCompany(cleanName)
		} catch (error: unknown) {
			if (isUniqueViolation(error)) {
				throw new ConflictError(`Company "${cleanName}" exists`, 'company_exists', {
					name: cleanName
				})
			}
			throw error
		}
		this.logger.log(`company #${company.id} "${company.name}" created by ${actorId}`)
		await this.audit.record({
			actorId,
			action: 'company.create',
			entity: 'company',
			entityId: company.id,
			details: { name: company.name }
		})
		return company
	}

	async setActive(actorId: number, id: number, active: boolean): Promise<CompanyRecord> {
		this.gate.assertAdmin(actorId)
		const company = await this.repo.setCompanyActive(id, active)
		if (!company) throw new NotFoundError('company', id)
		await this.audit.record({
			actorId,
			action: active ? 'company.activate' : 'company.deactivate',
			entity: 'company',
			entityId: id
		})
		return company
	}

	async addPaymentMethod(
		actorId: number,
		companyId: number,
		label: string,
		details: string
	): Promise<PaymentMethodRecord> {
		this.gate.assertAdmin(actorId)
		const company = await this.repo.findCompany(companyId)
		if (!company) throw new NotFoundError('company', companyId)
		const method = await this.repo.createPaymentMethod({
			companyId,
			label: requireText(label, MAX_NAME_LENGTH, 'payment method label'),
			details: details.trim().slice(0, MAX_DETAILS_LENGTH)
		})
		await this.audit.record({
			actorId,
			action: 'payment_method.create',
			entity: 'payment_method',
			entityId: method.id,
			details: { companyId, label: method.label }
		})
		return method
	}

	async setPaymentMethodActive(
		actorId: number,
		id: number,
		active: boolean
	): Promise<PaymentMethodRecord> {
		this.gate.assertAdmin(actorId)
		const method = await this.repo.setPaymentMethodActive(id, active)
		if (!method) throw new NotFoundError('payment_method', id)
		await this.audit.record({
			actorId,
			action: active ? 'payment_method.activate' : 'payment_method.deactivate',
			entity: 'payment_method',
			entityId: id
		})
		return method
	}

	async toggleCompany(actorId: number, id: number): Promise<CompanyRecord> {
		const company = await this.getCompany(actorId, id)
		return this.setActive(actorId, id, !company.isActive)
	}

	async togglePaymentMethod(actorId: number, id: number): Promise<PaymentMethodRecord> {
		this.gate.assertAdmin(actorId)
		const method = await this.repo.findPaymentMethod(id)
		if (!method) throw new NotFoundError('payment_method', id)
		return this.setPaymentMethodActive(actorId, id, !method.isActive)
	}

	/** Active company by id, or by case-insensitive name when typed. */
	async findActiveCompany(ref: number | string): Promise<CompanyRecord> {
		const company =
			typeof ref === 'number'
				? await this.repo.findCompany(ref)
				: await this.repo.findCompanyByName(ref)
		if (!company || !company.isActive) throw new NotFoundError('company', ref)
		return company
	}

	listActivePaymentMethods(companyId: number): Promise<PaymentMethodRecord[]> {
		return this.repo.listPaymentMethods(companyId, true)
	}

	async findActivePaymentMethod(
		companyId: number,
		ref: number | string
	): Promise<PaymentMethodRecord> {
		let method: PaymentMethodRecord | null | undefined
		if (typeof ref === 'number') {
			method = await this.repo.findPaymentMethod(ref)
		} else {
			const wanted = ref.trim().toLowerCase()
			const methods = await this.repo.listPaymentMethods(companyId, true)
			method = methods.find(m => m.label.toLowerCase() === wanted)
		}
		if (!method || !method.isActive || method.companyId !== companyId) {
			throw new NotFoundError('payment_method', ref)
		}
		return method
	}

	/** Display names for a request's references, inactive ones included. */
	async labelsFor(
		companyId: number,
		paymentMethodId: number
	): Promise<{ company: string; method: string }> {
		const [company, method] = await Promise.all([
			this.repo.findCompany(companyId),
			this.repo.findPaymentMethod(paymentMethodId)
		])
		return {
			company: company?.name ?? `#${companyId}`,
			method: method?.label ?? `#${paymentMethodId}`
		}
	}

	listAllPaymentMethods(): Promise<PaymentMethodRecord[]> {
		return this.repo.listAllPaymentMethods()
	}
}
