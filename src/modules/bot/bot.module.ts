import { Module } from '@nestjs/common'
import { AnnouncementsModule } from '../announcements/announcements.module'
import { CompaniesModule } from '../companies/companies.module'
import { ComplaintsModule } from '../complaints/complaints.module'
import { IntakeModule } from '../intake/intake.module'
import { ReportsModule } from '../reports/reports.module'
import { RequestsModule } from '../requests/requests.module'
import { UsersModule } from '../users/users.module'
import { BotService } from './bot.service'
import { FlowRunner } from './core/flow-runner'
import { SessionStore } from './core/session-store'
import { NotificationsService } from './notifications.service'

@Module({
	imports: [
		UsersModule,
		CompaniesModule,
		RequestsModule,
		ComplaintsModule,
		IntakeModule,
		AnnouncementsModule,
		ReportsModule
	],
	providers: [BotService, SessionStore, FlowRunner, NotificationsService]
})
export class BotModule {}
