import { Module } from '@nestjs/common'
import { CompaniesModule } from '../companies/companies.module'
import { UsersModule } from '../users/users.module'
import { DrizzleRequestsRepo, RequestsRepo } from './requests.repo'
import { RequestsService } from './requests.service'

@Module({
	imports: [UsersModule, CompaniesModule],
	providers: [RequestsService, { provide: RequestsRepo, useClass: DrizzleRequestsRepo }],
	exports: [RequestsService]
})
export class RequestsModule {}
