import { Module } from '@nestjs/common'
import { AnnouncementsModule } from '../announcements/announcements.module'
import { CompaniesModule } from '../companies/companies.module'
import { ComplaintsModule } from '../complaints/complaints.module'
import { RequestsModule } from '../requests/requests.module'
import { UsersModule } from '../users/users.module'
import { BackupService } from './backup.service'
import { MaintenanceCronService } from './maintenance-cron.service'
import { ReportsService } from './reports.service'
import { SnapshotService } from './snapshot.service'

@Module({
	imports: [
		UsersModule,
		CompaniesModule,
		RequestsModule,
		ComplaintsModule,
		AnnouncementsModule
	],
	providers: [SnapshotService, ReportsService, BackupService, MaintenanceCronService],
	exports: [ReportsService, BackupService]
})
export class ReportsModule {}
