import type { Logger } from '@nestjs/common'
import type { Bot } from 'grammy'
import type { BotContext } from '../core/bot.middleware'
import { bestEffort } from '../utils/reply'

export const hideMessageCallback = (bot: Bot<BotContext>, logger: Logger) => {
	bot.callbackQuery('hide_message', async ctx => {
		await bestEffort(logger, 'hide_message', () => ctx.deleteMessage())
	})
}
