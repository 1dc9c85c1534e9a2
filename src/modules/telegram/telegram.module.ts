import { Global, Module } from '@nestjs/common'
import { MessageSender } from '../announcements/message-sender'
import { TelegramBot } from './telegram-bot'
import { TelegramSender } from './telegram-sender'

@Global()
@Module({
	providers: [TelegramBot, { provide: MessageSender, useClass: TelegramSender }],
	exports: [TelegramBot, MessageSender]
})
export class TelegramModule {}
