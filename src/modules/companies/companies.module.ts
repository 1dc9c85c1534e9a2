import { Module } from '@nestjs/common'
import { CompaniesService } from './companies.service'
import { CompaniesRepo, DrizzleCompaniesRepo } from './companies.repo'

@Module({
	providers: [CompaniesService, { provide: CompaniesRepo, useClass: DrizzleCompaniesRepo }],
	exports: [CompaniesService]
})
export class CompaniesModule {}
