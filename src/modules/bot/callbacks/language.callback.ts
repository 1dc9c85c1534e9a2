import type { Logger } from '@nestjs/common'
import type { Bot } from 'grammy'
import type { I18nService } from '../../i18n/i18n.service'
import type { UsersService } from '../../users/users.service'
import { LANGUAGE_CALLBACK } from '../../../shared/keyboards/language'
import { mainMenuKeyboard } from '../../../shared/keyboards/main-menu'
import type { BotContext } from '../core/bot.middleware'
import { bestEffort, requireUser, withErrorReply } from '../utils/reply'

export const languageCallback = (
	bot: Bot<BotContext>,
	usersService: UsersService,
	i18n: I18nService,
	logger: Logger
) => {
	bot.callbackQuery(
		/^lang:[a-z-]+$/,
		withErrorReply(i18n, logger, async ctx => {
			const user = await requireUser(ctx, i18n)
			if (!user) return
			const code = (ctx.callbackQuery?.data ?? '').slice(LANGUAGE_CALLBACK.length)
			const updated = await usersService.setLanguage(user.telegramId, code)
			ctx.state.user = updated
			ctx.state.lang = updated.languageCode
			await bestEffort(logger, 'drop language buttons', () => ctx.editMessageReplyMarkup())
			await ctx.reply(i18n.t(updated.languageCode, 'language_changed'), {
				reply_markup: mainMenuKeyboard(i18n, updated.languageCode, ctx.state.isAdmin)
			})
		})
	)
}
