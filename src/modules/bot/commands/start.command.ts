import type { Logger } from '@nestjs/common'
import type { Bot } from 'grammy'
import type { I18nService } from '../../i18n/i18n.service'
import type { UsersService } from '../../users/users.service'
import { mainMenuKeyboard } from '../../../shared/keyboards/main-menu'
import { displayName } from '../../../utils/format'
import type { BotContext } from '../core/bot.middleware'
import { resetInputModes } from '../core/input-mode'
import { withErrorReply } from '../utils/reply'

export const startCommand = (
	bot: Bot<BotContext>,
	usersService: UsersService,
	i18n: I18nService,
	logger: Logger
) => {
	bot.command(
		'start',
		withErrorReply(i18n, logger, async ctx => {
			const from = ctx.from
			if (!from) return
			resetInputModes(ctx)
			const { user, created } = await usersService.register(
				from.id,
				displayName(from),
				from.language_code
			)
			ctx.state.user = user
			ctx.state.lang = user.languageCode
			await ctx.reply(
				i18n.t(user.languageCode, created ? 'welcome_new' : 'welcome_back', {
					name: user.displayName,
					code: user.customerCode
				}),
				{ reply_markup: mainMenuKeyboard(i18n, user.languageCode, ctx.state.isAdmin) }
			)
		})
	)
}
