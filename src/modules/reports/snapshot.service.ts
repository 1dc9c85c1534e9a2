import { Injectable } from '@nestjs/common'
import { AnnouncementsService } from '../announcements/announcements.service'
import { CompaniesService } from '../companies/companies.service'
import { ComplaintsService } from '../complaints/complaints.service'
import { RequestsService } from '../requests/requests.service'
import { UsersService } from '../users/users.service'

export const SNAPSHOT_TABLES = [
	'users',
	'companies',
	'payment_methods',
	'requests',
	'complaints',
	'ads'
] as const

export type SnapshotTable = (typeof SNAPSHOT_TABLES)[number]

export type SnapshotValue = string | number | boolean | null

export type SnapshotRow = Record<string, SnapshotValue>

export type Snapshot = Record<SnapshotTable, SnapshotRow[]>

/** Flattens a record for export: dates become ISO strings, undefined becomes null. */
export function toSnapshotRow(record: object): SnapshotRow {
	const row: SnapshotRow = {}
	for (const [field, value] of Object.entries(record)) {
		if (value instanceof Date) row[field] = value.toISOString()
		else if (
			typeof value === 'string' ||
			typeof value === 'number' ||
			typeof value === 'boolean'
		) {
			row[field] = value
		} else if (value == null) row[field] = null
		else row[field] = JSON.stringify(value)
	}
	return row
}

/** Reads every exported table. Callers gate access. */
@Injectable()
export class SnapshotService {
	constructor(
		private readonly users: UsersService,
		private readonly companies: CompaniesService,
		private readonly requests: RequestsService,
		private readonly complaints: ComplaintsService,
		private readonly announcements: AnnouncementsService
	) {}

	async collect(actorId: number): Promise<Snapshot> {
		const [users, companies, paymentMethods, requests, complaints, ads] =
			await Promise.all([
				this.users.listAll(),
				this.companies.listAll(actorId),
				this.companies.listAllPaymentMethods(),
				this.requests.listAll(),
				this.complaints.listAll(),
				this.announcements.listAll()
			])
		return {
			users: users.map(toSnapshotRow),
			companies: companies.map(toSnapshotRow),
			payment_methods: paymentMethods.map(toSnapshotRow),
			requests: requests.map(toSnapshotRow),
			complaints: complaints.map(toSnapshotRow),
			ads: ads.map(toSnapshotRow)
		}
	}
}
