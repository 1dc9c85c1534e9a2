import { Global, Module } from '@nestjs/common'
import { AppSettings } from '../../config/app-settings'
import { I18nService } from './i18n.service'

@Global()
@Module({
	providers: [
		{
			provide: I18nService,
			useFactory: (settings: AppSettings) =>
				I18nService.loadDirectory(settings.localesDir, settings.defaultLanguage),
			inject: [AppSettings]
		}
	],
	exports: [I18nService]
})
export class I18nModule {}
