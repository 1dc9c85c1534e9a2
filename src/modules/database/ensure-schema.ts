import { sql, type SQL } from 'drizzle-orm'
import type { Database } from './database.service'

const enumDdl = (name: string, values: string[]): SQL =>
	sql.raw(`DO $$ BEGIN
	CREATE TYPE ${name} AS ENUM (${values.map(v => `'${v}'`).join(', ')});
EXCEPTION WHEN duplicate_object THEN NULL;
END $$`)

const STATEMENTS: SQL[] = [
	enumDdl('request_kind', ['deposit', 'withdrawal']),
	enumDdl('request_status', ['pending', 'approved', 'rejected']),
	enumDdl('complaint_status', ['open', 'closed']),
	enumDdl('ad_status', ['sending', 'completed', 'cancelled']),
	sql`
		CREATE TABLE IF NOT EXISTS users (
			telegram_id BIGINT PRIMARY KEY,
			display_name TEXT NOT NULL,
			language_code VARCHAR(10) NOT NULL,
			customer_code VARCHAR(32) NOT NULL UNIQUE,
			created_at TIMESTAMPTZ NOT NULL DEFAULT now(),
			updated_at TIMESTAMPTZ NOT NULL DEFAULT now()
		)
	`,
	sql`
		CREATE TABLE IF NOT EXISTS companies (
			id SERIAL PRIMARY KEY,
			name VARCHAR(100) NOT NULL UNIQUE,
			is_active BOOLEAN NOT NULL DEFAULT TRUE,
			created_at TIMESTAMPTZ NOT NULL DEFAULT now()
		)
	`,
	sql`
		CREATE TABLE IF NOT EXISTS payment_methods (
			id SERIAL PRIMARY KEY,
			company_id INTEGER NOT NULL REFERENCES companies(id),
			label VARCHAR(100) NOT NULL,
			details TEXT NOT NULL DEFAULT '',
			is_active BOOLEAN NOT NULL DEFAULT TRUE,
			created_at TIMESTAMPTZ NOT NULL DEFAULT now()
		)
	`,
	sql`
		CREATE TABLE IF NOT EXISTS requests (
			id SERIAL PRIMARY KEY,
			user_id BIGINT NOT NULL REFERENCES users(telegram_id),
			kind request_kind NOT NULL,
			amount NUMERIC(15, 2) NOT NULL CHECK (amount > 0),
			company_id INTEGER NOT NULL REFERENCES companies(id),
			payment_method_id INTEGER NOT NULL REFERENCES payment_methods(id),
			reference TEXT NOT NULL,
			destination TEXT,
			status request_status NOT NULL DEFAULT 'pending',
			admin_note TEXT,
			created_at TIMESTAMPTZ NOT NULL DEFAULT now(),
			resolved_at TIMESTAMPTZ,
			resolved_by BIGINT
		)
	`,
	sql`CREATE INDEX IF NOT EXISTS requests_status_idx ON requests (status, created_at)`,
	sql`ALTER TABLE requests ADD COLUMN IF NOT EXISTS reference TEXT NOT NULL DEFAULT ''`,
	sql`ALTER TABLE requests ADD COLUMN IF NOT EXISTS destination TEXT`,
	sql`
		CREATE TABLE IF NOT EXISTS complaints (
			id SERIAL PRIMARY KEY,
			user_id BIGINT NOT NULL REFERENCES users(telegram_id),
			text TEXT NOT NULL,
			status complaint_status NOT NULL DEFAULT 'open',
			admin_reply TEXT,
			created_at TIMESTAMPTZ NOT NULL DEFAULT now(),
			resolved_at TIMESTAMPTZ,
			resolved_by BIGINT
		)
	`,
	sql`
		CREATE TABLE IF NOT EXISTS ads (
			id SERIAL PRIMARY KEY,
			text TEXT NOT NULL,
			created_by BIGINT NOT NULL,
			status ad_status NOT NULL DEFAULT 'sending',
			sent_count INTEGER NOT NULL DEFAULT 0,
			failed_count INTEGER NOT NULL DEFAULT 0,
			created_at TIMESTAMPTZ NOT NULL DEFAULT now(),
			finished_at TIMESTAMPTZ
		)
	`,
	sql`
		CREATE TABLE IF NOT EXISTS audit_log (
			id SERIAL PRIMARY KEY,
			actor_id BIGINT NOT NULL,
			action VARCHAR(64) NOT NULL,
			entity VARCHAR(32) NOT NULL,
			entity_id INTEGER,
			details JSONB NOT NULL DEFAULT '{}'::jsonb,
			created_at TIMESTAMPTZ NOT NULL DEFAULT now()
		)
	`
]

/** Creates missing tables and enums; safe to run on every boot. */
export async function ensureSchema(db: Database): Promise<void> {
	for (const statement of STATEMENTS) {
		await db.execute(statement)
	}
}
