import type { Logger } from '@nestjs/common'
import type { Bot } from 'grammy'
import type { I18nService } from '../../i18n/i18n.service'
import { mainMenuKeyboard } from '../../../shared/keyboards/main-menu'
import type { BotContext } from '../core/bot.middleware'
import type { FlowRunner } from '../core/flow-runner'
import { clearAdminInput } from '../core/input-mode'
import { withErrorReply } from '../utils/reply'

/** Leaves whatever the user was in the middle of. */
export async function cancelCurrent(
	ctx: BotContext,
	runner: FlowRunner,
	i18n: I18nService
): Promise<void> {
	if (ctx.session.adminInput) {
		clearAdminInput(ctx)
		await ctx.reply(i18n.t(ctx.state.lang, 'cancelled'), {
			reply_markup: mainMenuKeyboard(i18n, ctx.state.lang, ctx.state.isAdmin)
		})
		return
	}
	await runner.run(ctx, { type: 'cancel' })
}

export const cancelCommand = (
	bot: Bot<BotContext>,
	runner: FlowRunner,
	i18n: I18nService,
	logger: Logger
) => {
	bot.command(
		'cancel',
		withErrorReply(i18n, logger, ctx => cancelCurrent(ctx, runner, i18n))
	)
}
