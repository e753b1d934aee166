/**
 * Auto Process Service
 *
 * Handles a card the learner just answered. When automatic processing is on
 * and the card carries the leech tag, the rules are applied to it on the
 * deferred task queue, after the host's answer handler has returned.
 */

import type { ActionSummary } from '@leech-actions/shared';
import { formatSummary, hasAnyCount, hasTag } from '@leech-actions/shared';
import type { HostCard, HostHooks } from '../host/types.js';
import type { LeechConfigSource } from './config.service.js';
import type { DeferredTaskQueue } from './deferred-task-queue.js';
import type { LeechActionService } from './leech-action.service.js';
import type { Notifier } from './notification.service.js';

export const AUTO_CHECKPOINT_LABEL = 'Leech Actions (auto)';

export class AutoProcessService {
  constructor(
    private actionService: LeechActionService,
    private configSource: LeechConfigSource,
    private queue: DeferredTaskQueue,
    private notifier: Notifier,
    private hooks: HostHooks = {}
  ) {}

  /**
   * Entry point for the host's "card answered" event
   */
  handleCardAnswered(card: HostCard | null | undefined): void {
    if (!card) {
      return;
    }
    this.queue.schedule(`auto-process:${card.id}`, () => this.processSafely(card));
  }

  /**
   * Apply the rules to a freshly answered card
   *
   * @returns The card's summary, or null when the card was not eligible
   */
  processCard(card: HostCard): ActionSummary | null {
    const config = this.configSource.getConfig();
    if (!config.autoRunEnabled) {
      return null;
    }
    if (!hasTag(card.note().tags, config.leechTag)) {
      return null;
    }

    this.hooks.checkpoint?.(AUTO_CHECKPOINT_LABEL);
    const summary = this.actionService.applyRulesToCard(card);
    if (!hasAnyCount(summary)) {
      return summary;
    }

    if (config.showAutoNotifications) {
      this.notifier.info(formatSummary('Auto-processed leech card', summary));
    }
    this.hooks.refresh?.();
    return summary;
  }

  private processSafely(card: HostCard): void {
    try {
      this.processCard(card);
    } catch (error) {
      console.error(`[AutoProcess] Failed to process card ${card.id}:`, error);
      this.notifier.error('Leech auto-processing failed', error);
    }
  }
}
