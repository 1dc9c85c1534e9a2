import { resolve } from 'node:path'
import { type Env, type LogLevelName, parseEnv } from './env'

export interface BroadcastSettings {
	/** Sends allowed per window. */
	rateLimit: number
	windowMs: number
	retryAttempts: number
	checkpointEvery: number
}

/**
 * Immutable runtime settings, parsed once from the environment at startup.
 */
export class AppSettings {
	readonly botToken: string
	readonly adminIds: ReadonlySet<number>
	readonly databaseUrl: string
	readonly defaultLanguage: string
	readonly supportedLanguages: readonly string[]
	readonly customerCodePrefix: string
	readonly customerCodeYear: string
	readonly broadcast: Readonly<BroadcastSettings>
	readonly reportsDir: string
	readonly backupsDir: string
	readonly localesDir: string
	readonly backupKeep: number
	readonly reportRetentionDays: number
	readonly logLevel: LogLevelName

	constructor(env: Env, now: Date = new Date()) {
		const dataDir = resolve(env.DATA_DIR)
		this.botToken = env.BOT_TOKEN
		this.adminIds = new Set(env.ADMINS)
		this.databaseUrl = env.DATABASE_URL
		this.defaultLanguage = env.DEFAULT_LANGUAGE
		this.supportedLanguages = Object.freeze([...env.SUPPORTED_LANGUAGES])
		this.customerCodePrefix = env.CUSTOMER_ID_PREFIX
		this.customerCodeYear = env.CUSTOMER_ID_YEAR ?? String(now.getFullYear())
		this.broadcast = Object.freeze({
			rateLimit: env.BROADCAST_RATE_LIMIT,
			windowMs: env.BROADCAST_WINDOW_MS,
			retryAttempts: env.BROADCAST_RETRY_ATTEMPTS,
			checkpointEvery: env.BROADCAST_CHECKPOINT_EVERY
		})
		this.reportsDir = resolve(dataDir, 'reports')
		this.backupsDir = resolve(dataDir, 'backups')
		this.localesDir = resolve(env.LOCALES_DIR)
		this.backupKeep = env.BACKUP_KEEP
		this.reportRetentionDays = env.REPORT_RETENTION_DAYS
		this.logLevel = env.LOG_LEVEL
		Object.freeze(this)
	}

	static fromEnv(source: Record<string, unknown> = process.env): AppSettings {
		return new AppSettings(parseEnv(source))
	}
}
