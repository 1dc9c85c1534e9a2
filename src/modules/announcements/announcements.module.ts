import { Module } from '@nestjs/common'
import { UsersModule } from '../users/users.module'
import { AdsRepo, DrizzleAdsRepo } from './ads.repo'
import { AnnouncementsService } from './announcements.service'
import { BroadcastService } from './broadcast.service'

/** `MessageSender` comes from the global TelegramModule. */
@Module({
	imports: [UsersModule],
	providers: [
		AnnouncementsService,
		BroadcastService,
		{ provide: AdsRepo, useClass: DrizzleAdsRepo }
	],
	exports: [AnnouncementsService]
})
export class AnnouncementsModule {}
