import 'reflect-metadata'
import { Logger } from '@nestjs/common'
import { NestFactory } from '@nestjs/core'
import { AppModule } from './app.module'
import { AppSettings } from './config/app-settings'
import { logLevelsFor } from './config/env'
import { describeError } from './common/errors'

async function bootstrap() {
	const settings = AppSettings.fromEnv()
	const app = await NestFactory.createApplicationContext(AppModule, {
		logger: logLevelsFor(settings.logLevel)
	})
	app.enableShutdownHooks()
}

bootstrap().catch((error: unknown) => {
	new Logger('Bootstrap').error(`Startup failed: ${describeError(error)}`)
	process.exit(1)
})
