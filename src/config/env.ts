import { z } from 'zod'

const LOG_LEVELS = ['error', 'warn', 'log', 'debug', 'verbose'] as const

export type LogLevelName = (typeof LOG_LEVELS)[number]

const idList = z
	.string()
	.default('')
	.transform((raw, ctx) => {
		const ids: number[] = []
		for (const part of raw.split(',')) {
			const trimmed = part.trim()
			if (!trimmed) continue
			if (!/^\d+$/.test(trimmed)) {
				ctx.addIssue({
					code: z.ZodIssueCode.custom,
					message: `Invalid admin id "${trimmed}"`
				})
				return z.NEVER
			}
			ids.push(Number(trimmed))
		}
		return ids
	})

const codeList = z
	.string()
	.default('ar,en')
	.transform(raw =>
		raw
			.split(',')
			.map(code => code.trim().toLowerCase())
			.filter(Boolean)
	)
	.pipe(z.array(z.string().min(2).max(10)).min(1))

const positiveInt = (fallback: number) =>
	z.coerce.number().int().positive().default(fallback)

export const envSchema = z
	.object({
		BOT_TOKEN: z.string().min(1, 'BOT_TOKEN is required'),
		ADMINS: idList,
		DATABASE_URL: z.string().min(1, 'DATABASE_URL is required'),
		DEFAULT_LANGUAGE: z.string().trim().toLowerCase().default('ar'),
		SUPPORTED_LANGUAGES: codeList,
		CUSTOMER_ID_PREFIX: z.string().trim().max(8).default('C'),
		CUSTOMER_ID_YEAR: z
			.string()
			.regex(/^\d{4}$/, 'CUSTOMER_ID_YEAR must be a 4-digit year')
			.optional(),
		BROADCAST_RATE_LIMIT: positiveInt(28),
		BROADCAST_WINDOW_MS: positiveInt(1000),
		BROADCAST_RETRY_ATTEMPTS: positiveInt(3),
		BROADCAST_CHECKPOINT_EVERY: positiveInt(25),
		DATA_DIR: z.string().default('data'),
		LOCALES_DIR: z.string().default('locales'),
		BACKUP_KEEP: positiveInt(10),
		REPORT_RETENTION_DAYS: positiveInt(7),
		LOG_LEVEL: z.enum(LOG_LEVELS).default('log')
	})
	.refine(env => env.SUPPORTED_LANGUAGES.includes(env.DEFAULT_LANGUAGE), {
		message: 'DEFAULT_LANGUAGE must be one of SUPPORTED_LANGUAGES',
		path: ['DEFAULT_LANGUAGE']
	})

export type Env = z.infer<typeof envSchema>

export function parseEnv(source: Record<string, unknown>): Env {
	const result = envSchema.safeParse(source)
	if (!result.success) {
		const details = result.error.issues
			.map(issue => `${issue.path.join('.') || 'env'}: ${issue.message}`)
			.join('; ')
		throw new Error(`Invalid environment configuration: ${details}`)
	}
	return result.data
}

/**
 * `validate` hook for `ConfigModule.forRoot`: fails the boot on a bad
 * environment but hands the raw values back, so `process.env` keeps strings.
 */
export function validateEnv(
	config: Record<string, unknown>
): Record<string, unknown> {
	parseEnv(config)
	return config
}

/** Nest log levels enabled for a configured minimum level. */
export function logLevelsFor(level: LogLevelName): LogLevelName[] {
	return LOG_LEVELS.slice(0, LOG_LEVELS.indexOf(level) + 1)
}
