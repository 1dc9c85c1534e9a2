import { Module } from '@nestjs/common'
import { UsersService } from './users.service'
import { DrizzleUsersRepo, UsersRepo } from './users.repo'

@Module({
	providers: [UsersService, { provide: UsersRepo, useClass: DrizzleUsersRepo }],
	exports: [UsersService]
})
export class UsersModule {}
