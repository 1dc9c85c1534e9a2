import type { Logger } from '@nestjs/common'
import type { Bot } from 'grammy'
import type { I18nService } from '../../i18n/i18n.service'
import { FLOW_CALLBACK } from '../../../shared/keyboards/intake'
import type { BotContext } from '../core/bot.middleware'
import type { FlowRunner } from '../core/flow-runner'
import { cancelCurrent } from '../commands/cancel.command'
import { bestEffort, callbackId, withErrorReply } from '../utils/reply'

export const intakeCallbacks = (
	bot: Bot<BotContext>,
	runner: FlowRunner,
	i18n: I18nService,
	logger: Logger
) => {
	const dropButtons = (ctx: BotContext) =>
		bestEffort(logger, 'drop flow buttons', () => ctx.editMessageReplyMarkup())

	bot.callbackQuery(
		/^flow:company:\d+$/,
		withErrorReply(i18n, logger, async ctx => {
			const companyId = callbackId(ctx, FLOW_CALLBACK.company)
			if (companyId == null) return
			await runner.run(ctx, { type: 'select_company', companyId })
		})
	)

	bot.callbackQuery(
		/^flow:method:\d+$/,
		withErrorReply(i18n, logger, async ctx => {
			const paymentMethodId = callbackId(ctx, FLOW_CALLBACK.method)
			if (paymentMethodId == null) return
			await runner.run(ctx, { type: 'select_payment_method', paymentMethodId })
		})
	)

	bot.callbackQuery(
		FLOW_CALLBACK.confirm,
		withErrorReply(i18n, logger, async ctx => {
			await dropButtons(ctx)
			await runner.run(ctx, { type: 'confirm' })
		})
	)

	bot.callbackQuery(
		FLOW_CALLBACK.cancel,
		withErrorReply(i18n, logger, async ctx => {
			await dropButtons(ctx)
			await cancelCurrent(ctx, runner, i18n)
		})
	)
}
