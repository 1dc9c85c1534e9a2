import { Injectable, Logger } from '@nestjs/common'
import { GrammyError } from 'grammy'
import { setTimeout as sleep } from 'node:timers/promises'
import { AppSettings } from '../../config/app-settings'
import { MessageSender } from '../announcements/message-sender'
import { TelegramBot } from './telegram-bot'

/** Seconds to wait when Telegram answered 429, otherwise null. */
export function retryAfterSeconds(error: unknown): number | null {
	if (!(error instanceof GrammyError) || error.error_code !== 429) return null
	return error.parameters.retry_after ?? 1
}

@Injectable()
export class TelegramSender extends MessageSender {
	private readonly logger = new Logger(TelegramSender.name)

	constructor(
		private readonly bot: TelegramBot,
		private readonly settings: AppSettings
	) {
		super()
	}

	async send(chatId: number, text: string): Promise<void> {
		const retries = this.settings.broadcast.retryAttempts
		for (let attempt = 1; ; attempt++) {
			try {
				await this.deliver(chatId, text)
				return
			} catch (error: unknown) {
				const retryAfter = retryAfterSeconds(error)
				if (retryAfter === null || attempt > retries) throw error
				this.logger.warn(
					`rate limited sending to ${chatId}, retry ${attempt}/${retries} in ${retryAfter}s`
				)
				await this.wait(retryAfter * 1000)
			}
		}
	}

	protected async deliver(chatId: number, text: string): Promise<void> {
		await this.bot.api.sendMessage(chatId, text)
	}

	protected wait(ms: number): Promise<void> {
		return sleep(ms)
	}
}
