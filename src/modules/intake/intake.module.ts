import { Module } from '@nestjs/common'
import { CompaniesModule } from '../companies/companies.module'
import { ComplaintsModule } from '../complaints/complaints.module'
import { RequestsModule } from '../requests/requests.module'
import { IntakeFlowService } from './intake-flow.service'

@Module({
	imports: [CompaniesModule, RequestsModule, ComplaintsModule],
	providers: [IntakeFlowService],
	exports: [IntakeFlowService]
})
export class IntakeModule {}
