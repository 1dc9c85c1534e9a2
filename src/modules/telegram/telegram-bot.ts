import { Injectable } from '@nestjs/common'
import { Bot } from 'grammy'
import { AppSettings } from '../../config/app-settings'
import type { BotContext } from '../bot/core/bot.middleware'

/** The single grammY bot instance, shared by handlers and outbound senders. */
@Injectable()
export class TelegramBot extends Bot<BotContext> {
	constructor(settings: AppSettings) {
		super(settings.botToken)
	}
}
