import { Global, Module } from '@nestjs/common'
import { AppSettings } from './app-settings'

@Global()
@Module({
	providers: [
		{
			provide: AppSettings,
			useFactory: () => AppSettings.fromEnv()
		}
	],
	exports: [AppSettings]
})
export class SettingsModule {}
