import type { AdminInput, BotContext } from './bot.middleware'

export function resetInputModes(ctx: BotContext): void {
	ctx.session.flow = { step: 'idle' }
	ctx.session.adminInput = undefined
}

/** Admin prompts and the intake flow never run at the same time. */
export function activateAdminInput(ctx: BotContext, input: AdminInput): void {
	ctx.session.flow = { step: 'idle' }
	ctx.session.adminInput = input
}

export function clearAdminInput(ctx: BotContext): void {
	ctx.session.adminInput = undefined
}
