import {
	Injectable,
	Logger,
	OnModuleDestroy,
	OnModuleInit
} from '@nestjs/common'
import { drizzle, type NodePgDatabase } from 'drizzle-orm/node-postgres'
import { Pool } from 'pg'
import { AppSettings } from '../../config/app-settings'
import { describeError } from '../../common/errors'
import { ensureSchema } from './ensure-schema'
import * as schema from './schema'

export type Database = NodePgDatabase<typeof schema>

@Injectable()
export class DatabaseService implements OnModuleInit, OnModuleDestroy {
	private readonly logger = new Logger(DatabaseService.name)
	private readonly pool: Pool
	readonly db: Database

	constructor(settings: AppSettings) {
		this.pool = new Pool({ connectionString: settings.databaseUrl })
		this.pool.on('error', error => {
			this.logger.error(`Idle database client error: ${describeError(error)}`)
		})
		this.db = drizzle(this.pool, { schema })
	}

	async onModuleInit() {
		await ensureSchema(this.db)
		this.logger.log('Database schema ensured')
	}

	async onModuleDestroy() {
		await this.pool.end()
	}
}
