import { Module } from '@nestjs/common'
import { ConfigModule } from '@nestjs/config'
import { ScheduleModule } from '@nestjs/schedule'
import { validateEnv } from './config/env'
import { SettingsModule } from './config/settings.module'
import { AdminModule } from './modules/admin/admin.module'
import { BotModule } from './modules/bot/bot.module'
import { DatabaseModule } from './modules/database/database.module'
import { I18nModule } from './modules/i18n/i18n.module'
import { TelegramModule } from './modules/telegram/telegram.module'

@Module({
	imports: [
		ConfigModule.forRoot({ isGlobal: true, validate: validateEnv }),
		ScheduleModule.forRoot(),
		SettingsModule,
		DatabaseModule,
		I18nModule,
		AdminModule,
		TelegramModule,
		BotModule
	]
})
export class AppModule {}
