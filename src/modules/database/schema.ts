import {
	bigint,
	boolean,
	integer,
	jsonb,
	numeric,
	pgEnum,
	pgTable,
	serial,
	text,
	timestamp,
	varchar
} from 'drizzle-orm/pg-core'

export const requestKind = pgEnum('request_kind', ['deposit', 'withdrawal'])
export const requestStatus = pgEnum('request_status', [
	'pending',
	'approved',
	'rejected'
])
export const complaintStatus = pgEnum('complaint_status', ['open', 'closed'])
export const adStatus = pgEnum('ad_status', ['sending', 'completed', 'cancelled'])

const createdAt = () =>
	timestamp('created_at', { withTimezone: true }).notNull().defaultNow()

export const users = pgTable('users', {
	telegramId: bigint('telegram_id', { mode: 'number' }).primaryKey(),
	displayName: text('display_name').notNull(),
	languageCode: varchar('language_code', { length: 10 }).notNull(),
	customerCode: varchar('customer_code', { length: 32 }).notNull().unique(),
	createdAt: createdAt(),
	updatedAt: timestamp('updated_at', { withTimezone: true }).notNull().defaultNow()
})

export const companies = pgTable('companies', {
	id: serial('id').primaryKey(),
	name: varchar('name', { length: 100 }).notNull().unique(),
	isActive: boolean('is_active').notNull().default(true),
	createdAt: createdAt()
})

export const paymentMethods = pgTable('payment_methods', {
	id: serial('id').primaryKey(),
	companyId: integer('company_id')
		.notNull()
		.references(() => companies.id),
	label: varchar('label', { length: 100 }).notNull(),
	details: text('details').notNull().default(''),
	isActive: boolean('is_active').notNull().default(true),
	createdAt: createdAt()
})

export const requests = pgTable('requests', {
	id: serial('id').primaryKey(),
	userId: bigint('user_id', { mode: 'number' })
		.notNull()
		.references(() => users.telegramId),
	kind: requestKind('kind').notNull(),
	amount: numeric('amount', { precision: 15, scale: 2 }).notNull(),
	companyId: integer('company_id')
		.notNull()
		.references(() => companies.id),
	paymentMethodId: integer('payment_method_id')
		.notNull()
		.references(() => paymentMethods.id),
	reference: text('reference').notNull(),
	destination: text('destination'),
	status: requestStatus('status').notNull().default('pending'),
	adminNote: text('admin_note'),
	createdAt: createdAt(),
	resolvedAt: timestamp('resolved_at', { withTimezone: true }),
	resolvedBy: bigint('resolved_by', { mode: 'number' })
})

export const complaints = pgTable('complaints', {
	id: serial('id').primaryKey(),
	userId: bigint('user_id', { mode: 'number' })
		.notNull()
		.references(() => users.telegramId),
	text: text('text').notNull(),
	status: complaintStatus('status').notNull().default('open'),
	adminReply: text('admin_reply'),
	createdAt: createdAt(),
	resolvedAt: timestamp('resolved_at', { withTimezone: true }),
	resolvedBy: bigint('resolved_by', { mode: 'number' })
})

export const ads = pgTable('ads', {
	id: serial('id').primaryKey(),
	text: text('text').notNull(),
	createdBy: bigint('created_by', { mode: 'number' }).notNull(),
	status: adStatus('status').notNull().default('sending'),
	sentCount: integer('sent_count').notNull().default(0),
	failedCount: integer('failed_count').notNull().default(0),
	createdAt: createdAt(),
	finishedAt: timestamp('finished_at', { withTimezone: true })
})

export const auditLog = pgTable('audit_log', {
	id: serial('id').primaryKey(),
	actorId: bigint('actor_id', { mode: 'number' }).notNull(),
	action: varchar('action', { length: 64 }).notNull(),
	entity: varchar('entity', { length: 32 }).notNull(),
	entityId: integer('entity_id'),
	details: jsonb('details').$type<Record<string, unknown>>().notNull().default({}),
	createdAt: createdAt()
})

export type UserRecord = typeof users.$inferSelect
export type NewUser = typeof users.$inferInsert
export type CompanyRecord = typeof companies.$inferSelect
export type PaymentMethodRecord = typeof paymentMethods.$inferSelect
export type RequestRecord = typeof requests.$inferSelect
export type RequestKind = RequestRecord['kind']
export type RequestStatus = RequestRecord['status']
export type ComplaintRecord = typeof complaints.$inferSelect
export type ComplaintStatus = ComplaintRecord['status']
export type AdRecord = typeof ads.$inferSelect
export type AdStatus = AdRecord['status']
export type AuditLogRecord = typeof auditLog.$inferSelect
