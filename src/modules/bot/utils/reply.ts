import type { Logger } from '@nestjs/common'
import { DomainError, describeError } from '../../../common/errors'
import type { UserRecord } from '../../database/schema'
import type { I18nService } from '../../i18n/i18n.service'
import type { FlowOutcome } from '../../intake/flow-state'
import { flowKeyboard } from '../../../shared/keyboards/intake'
import type { BotContext } from '../core/bot.middleware'

/**
 * Explains a DomainError in the user's language; anything else is logged
 * and answered with the generic error text.
 */
export async function replyError(
	ctx: BotContext,
	i18n: I18nService,
	logger: Logger,
	error: unknown
): Promise<void> {
	const lang = ctx.state.lang
	if (error instanceof DomainError) {
		if (error.code === 'persistence') {
			logger.error(`${error.message}`, error.stack)
		}
		await ctx.reply(i18n.t(lang, error.messageKey, error.params))
		return
	}
	logger.error(`Unhandled error for ${ctx.from?.id ?? '?'}: ${describeError(error)}`)
	await ctx.reply(i18n.t(lang, 'error'))
}

export async function sendOutcome(
	ctx: BotContext,
	i18n: I18nService,
	outcome: FlowOutcome
): Promise<void> {
	const { lang, isAdmin } = ctx.state
	await ctx.reply(i18n.t(lang, outcome.message.key, outcome.message.params), {
		reply_markup: flowKeyboard(i18n, lang, isAdmin, outcome.keyboard)
	})
}

/** The registered user, or null after asking them to /start. */
export async function requireUser(
	ctx: BotContext,
	i18n: I18nService
): Promise<UserRecord | null> {
	if (ctx.state.user) return ctx.state.user
	await ctx.reply(i18n.t(ctx.state.lang, 'please_start'))
	return null
}

/** Replies "not permitted" and returns false for non-admins. */
export async function ensureAdmin(ctx: BotContext, i18n: I18nService): Promise<boolean> {
	if (ctx.state.isAdmin) return true
	await ctx.reply(i18n.t(ctx.state.lang, 'unauthorized'))
	return false
}

/** Numeric id after a callback-data prefix, or null. */
export function callbackId(ctx: BotContext, prefix: string): number | null {
	const data = ctx.callbackQuery?.data
	if (!data?.startsWith(prefix)) return null
	const raw = data.slice(prefix.length)
	if (!/^\d+$/.test(raw)) return null
	return Number(raw)
}

/** Trimmed text after a command; empty when there is none. */
export function commandArgument(match: string | RegExpMatchArray | null | undefined): string {
	return typeof match === 'string' ? match.trim() : ''
}

/** Wraps a handler so its failures are answered instead of reaching `bot.catch`. */
export function withErrorReply<C extends BotContext>(
	i18n: I18nService,
	logger: Logger,
	handler: (ctx: C) => Promise<void>
): (ctx: C) => Promise<void> {
	return async ctx => {
		try {
			await handler(ctx)
		} catch (error: unknown) {
			await replyError(ctx, i18n, logger, error)
		}
	}
}

/** For edits and deletes of messages that may already be gone. */
export async function bestEffort(
	logger: Logger,
	task: string,
	fn: () => Promise<unknown>
): Promise<void> {
	try {
		await fn()
	} catch (error: unknown) {
		logger.debug(`${task} skipped: ${describeError(error)}`)
	}
}
