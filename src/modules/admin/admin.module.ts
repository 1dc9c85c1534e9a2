import { Global, Module } from '@nestjs/common'
import { AdminGateService } from './admin-gate.service'
import { AuditRepo, DrizzleAuditRepo } from './audit.repo'
import { AuditService } from './audit.service'

@Global()
@Module({
	providers: [
		AdminGateService,
		AuditService,
		{ provide: AuditRepo, useClass: DrizzleAuditRepo }
	],
	exports: [AdminGateService, AuditService]
})
export class AdminModule {}
