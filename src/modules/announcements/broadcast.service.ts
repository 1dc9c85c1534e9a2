import { Injectable, Logger } from '@nestjs/common'
import { setTimeout as sleep } from 'node:timers/promises'
import { AppSettings, type BroadcastSettings } from '../../config/app-settings'
import { ConflictError, describeError } from '../../common/errors'
import type { AdRecord } from '../database/schema'
import { AdsRepo } from './ads.repo'
import { MessageSender } from './message-sender'

export interface BroadcastProgress {
	adId: number
	sent: number
	failed: number
	total: number
	cancelled: boolean
}

export type BroadcastSummary = BroadcastProgress

export interface BroadcastHandle {
	adId: number
	/** Settles after finalization; rejects only if finalization failed. */
	done: Promise<BroadcastSummary>
	progress(): BroadcastProgress
	cancel(): void
}

/** Minimum spacing between two sends for the configured rate. */
export function sendInterval({ rateLimit, windowMs }: BroadcastSettings): number {
	return Math.ceil(windowMs / rateLimit)
}

/**
 * Sequential, rate-paced delivery of one ad at a time. The batch runs as a
 * detached task; callers observe it through the returned handle.
 */
@Injectable()
export class BroadcastService {
	private readonly logger = new Logger(BroadcastService.name)
	private active: BroadcastHandle | null = null

	constructor(
		private readonly ads: AdsRepo,
		private readonly sender: MessageSender,
		private readonly settings: AppSettings
	) {}

	current(): BroadcastHandle | null {
		return this.active
	}

	isBusy(): boolean {
		return this.active !== null
	}

	dispatch(ad: AdRecord, recipients: readonly number[]): BroadcastHandle {
		if (this.active) {
			throw new ConflictError(
				`Broadcast #${this.active.adId} is still running`,
				'broadcast_busy',
				{ id: this.active.adId }
			)
		}
		const state: BroadcastProgress = {
			adId: ad.id,
			sent: 0,
			failed: 0,
			total: recipients.length,
			cancelled: false
		}
		let cancelRequested = false
		const done = this.run(ad, recipients, state, () => cancelRequested).finally(() => {
			this.active = null
		})
		const handle: BroadcastHandle = {
			adId: ad.id,
			done,
			progress: () => ({ ...state }),
			cancel: () => {
				cancelRequested = true
			}
		}
		this.active = handle
		this.logger.log(`broadcast #${ad.id} started for ${recipients.length} recipients`)
		return handle
	}

	protected wait(ms: number): Promise<void> {
		return sleep(ms)
	}

	private async run(
		ad: AdRecord,
		recipients: readonly number[],
		state: BroadcastProgress,
		isCancelled: () => boolean
	): Promise<BroadcastSummary> {
		const { checkpointEvery } = this.settings.broadcast
		const interval = sendInterval(this.settings.broadcast)

		for (let i = 0; i < recipients.length; i++) {
			if (isCancelled()) break
			if (i > 0) {
				await this.wait(interval)
				if (isCancelled()) break
			}
			try {
				await this.sender.send(recipients[i], ad.text)
				state.sent++
			} catch (error: unknown) {
				state.failed++
				this.logger.debug(
					`broadcast #${ad.id} failed for ${recipients[i]}: ${describeError(error)}`
				)
			}
			const attempted = state.sent + state.failed
			if (attempted % checkpointEvery === 0 && attempted < recipients.length) {
				await this.checkpoint(ad.id, state)
			}
		}

		state.cancelled = isCancelled() && state.sent + state.failed < recipients.length
		await this.ads.finalize(ad.id, state.cancelled ? 'cancelled' : 'completed', {
			sentCount: state.sent,
			failedCount: state.failed
		})
		this.logger.log(
			`broadcast #${ad.id} ${state.cancelled ? 'cancelled' : 'completed'}: sent=${state.sent} failed=${state.failed} total=${state.total}`
		)
		return { ...state }
	}

	private async checkpoint(adId: number, state: BroadcastProgress): Promise<void> {
		try {
			await this.ads.updateCounts(adId, {
				sentCount: state.sent,
				failedCount: state.failed
			})
		} catch (error: unknown) {
			this.logger.warn(`broadcast #${adId} checkpoint failed: ${describeError(error)}`)
		}
	}
}
