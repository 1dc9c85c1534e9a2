import { Injectable } from '@nestjs/common'
import { I18nService } from '../../i18n/i18n.service'
import type { FlowInput } from '../../intake/flow-state'
import { IntakeFlowService } from '../../intake/intake-flow.service'
import { NotificationsService } from '../notifications.service'
import { requireUser, sendOutcome } from '../utils/reply'
import type { BotContext } from './bot.middleware'

/** Feeds one input through the intake flow and renders the result. */
@Injectable()
export class FlowRunner {
	constructor(
		private readonly flow: IntakeFlowService,
		private readonly i18n: I18nService,
		private readonly notifications: NotificationsService
	) {}

	async run(ctx: BotContext, input: FlowInput): Promise<void> {
		const user = await requireUser(ctx, this.i18n)
		if (!user) return
		ctx.session.adminInput = undefined
		const outcome = await this.flow.handle(user.telegramId, ctx.session.flow, input)
		ctx.session.flow = outcome.state
		await sendOutcome(ctx, this.i18n, outcome)

		if (outcome.created?.type === 'request') {
			await this.notifications.requestSubmitted(outcome.created.request)
		} else if (outcome.created?.type === 'complaint') {
			await this.notifications.complaintSubmitted(outcome.created.complaint)
		}
	}

	/** Repeats the current prompt after a button from an older message. */
	async reprompt(ctx: BotContext): Promise<void> {
		const lang = ctx.state.lang
		if (!ctx.state.user || ctx.session.flow.step === 'idle') {
			await ctx.reply(this.i18n.t(lang, 'button_expired'))
			return
		}
		const outcome = await this.flow.reprompt(ctx.session.flow)
		ctx.session.flow = outcome.state
		await sendOutcome(ctx, this.i18n, outcome)
	}
}
