import { Module } from '@nestjs/common'
import { UsersModule } from '../users/users.module'
import { ComplaintsRepo, DrizzleComplaintsRepo } from './complaints.repo'
import { ComplaintsService } from './complaints.service'

@Module({
	imports: [UsersModule],
	providers: [
		ComplaintsService,
		{ provide: ComplaintsRepo, useClass: DrizzleComplaintsRepo }
	],
	exports: [ComplaintsService]
})
export class ComplaintsModule {}
