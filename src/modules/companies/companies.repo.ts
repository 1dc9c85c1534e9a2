import { Injectable } from '@nestjs/common'
import { and, asc, eq, sql } from 'drizzle-orm'
import { DatabaseService } from '../database/database.service'
import { withPersistence } from '../database/persistence'
import {
	companies,
	paymentMethods,
	type CompanyRecord,
	type PaymentMethodRecord
} from '../database/schema'

export interface NewPaymentMethod {
	companyId: number
	label: string
	details: string
}

export abstract class CompaniesRepo {
	abstract listCompanies(onlyActive: boolean): Promise<CompanyRecord[]>
	abstract findCompany(id: number): Promise<CompanyRecord | null>
	abstract findCompanyByName(name: string): Promise<CompanyRecord | null>
	abstract createCompany(name: string): Promise<CompanyRecord>
	abstract setCompanyActive(id: number, active: boolean): Promise<CompanyRecord | null>
	abstract listPaymentMethods(companyId: number, onlyActive: boolean): Promise<PaymentMethodRecord[]>
	abstract listAllPaymentMethods(): Promise<PaymentMethodRecord[]>
	abstract findPaymentMethod(id: number): Promise<PaymentMethodRecord | null>
	abstract createPaymentMethod(input: NewPaymentMethod): Promise<PaymentMethodRecord>
	abstract setPaymentMethodActive(id: number, active: boolean): Promise<PaymentMethodRecord | null>
}

@Injectable()
export class DrizzleCompaniesRepo extends CompaniesRepo {
	constructor(private readonly database: DatabaseService) {
		super()
	}

	listCompanies(onlyActive: boolean): Promise<CompanyRecord[]> {
		return withPersistence('companies.list', () =>
			this.database.db
				.select()
				.from(companies)
				.where(onlyActive ? eq(companies.isActive, true) : undefined)
				.orderBy(asc(companies.name))
		)
	}

	async findCompany(id: number): Promise<CompanyRecord | null> {
		const [row] = await withPersistence('companies.find', () =>
			this.database.db.select().from(companies).where(eq(companies.id, id)).limit(1)
		)
		return row ?? null
	}

	async findCompanyByName(name: string): Promise<CompanyRecord | null> {
		const [row] = await withPersistence('companies.findByName', () =>
			this.database.db
				.select()
				.from(companies)
				.where(sql`lower(${companies.name}) = ${name.trim().toLowerCase()}`)
				.limit(1)
		)
		return row ?? null
	}

	async createCompany(name: string): Promise<CompanyRecord> {
		const [row] = await withPersistence('companies.create', () =>
			this.database.db.insert(companies).values({ name }).returning()
		)
		return row
	}

	async setCompanyActive(id: number, active: boolean): Promise<CompanyRecord | null> {
		const [row] = await withPersistence('companies.setActive', () =>
			this.database.db
				.update(companies)
				.set({ isActive: active })
				.where(eq(companies.id, id))
				.returning()
		)
		return row ?? null
	}

	listPaymentMethods(
		companyId: number,
		onlyActive: boolean
	): Promise<PaymentMethodRecord[]> {
		const byCompany = eq(paymentMethods.companyId, companyId)
		return withPersistence('paymentMethods.list', () =>
			this.database.db
				.select()
				.from(paymentMethods)
				.where(
					onlyActive ? and(byCompany, eq(paymentMethods.isActive, true)) : byCompany
				)
				.orderBy(asc(paymentMethods.id))
		)
	}

	listAllPaymentMethods(): Promise<PaymentMethodRecord[]> {
		return withPersistence('paymentMethods.listAll', () =>
			this.database.db.select().from(paymentMethods).orderBy(asc(paymentMethods.id))
		)
	}

	async findPaymentMethod(id: number): Promise<PaymentMethodRecord | null> {
		const [row] = await withPersistence('paymentMethods.find', () =>
			this.database.db
				.select()
				.from(paymentMethods)
				.where(eq(paymentMethods.id, id))
				.limit(1)
		)
		return row ?? null
	}

	async createPaymentMethod(input: NewPaymentMethod): Promise<PaymentMethodRecord> {
		const [row] = await withPersistence('paymentMethods.create', () =>
			this.database.db.insert(paymentMethods).values(input).returning()
		)
		return row
	}

	async setPaymentMethodActive(
		id: number,
		active: boolean
	): Promise<PaymentMethodRecord | null> {
		const [row] = await withPersistence('paymentMethods.setActive', () =>
			this.database.db
				.update(paymentMethods)
				.set({ isActive: active })
				.where(eq(paymentMethods.id, id))
				.returning()
		)
		return row ?? null
	}
}
