/**
 * Leech Run Session
 *
 * Preview-then-confirm flow behind the "run leech actions" view. The preview
 * is a simulated pass over the current leech cards; confirming commits the
 * previewed cards and refreshes the preview.
 */

import type { ActionSummary } from '@leech-actions/shared';
import { formatBulletSummary, formatSummary, hasAnyCount } from '@leech-actions/shared';
import type { HostHooks } from '../host/types.js';
import type { LeechActionService } from './leech-action.service.js';
import type { Notifier } from './notification.service.js';

export const RUN_CHECKPOINT_LABEL = 'Run Leech Actions';

export const NO_LEECH_CARDS_MESSAGE = 'No leech cards currently match the configured rules.';

export const NO_CHANGES_MESSAGE = 'No changes would be applied.';

export const RUN_FAILED_MESSAGE = 'Leech actions failed';

/**
 * What the view shows after a refresh
 */
export interface RunPreview {
  cardIds: number[];
  summary: ActionSummary | null;
  message: string;
  canConfirm: boolean;
}

export class LeechRunSession {
  private preview: RunPreview | null = null;

  constructor(
    private actionService: LeechActionService,
    private notifier: Notifier,
    private hooks: HostHooks = {}
  ) {}

  getPreview(): RunPreview | null {
    return this.preview;
  }

  /**
   * Find the current leech cards and simulate the rules over them
   */
  refreshPreview(): RunPreview {
    const cardIds = this.actionService.findLeechCards();

    if (cardIds.length === 0) {
      this.preview = { cardIds, summary: null, message: NO_LEECH_CARDS_MESSAGE, canConfirm: false };
      return this.preview;
    }

    const summary = this.actionService.processCards(cardIds, true);
    this.preview = {
      cardIds,
      summary,
      message: formatBulletSummary('Pending actions', summary),
      canConfirm: hasAnyCount(summary),
    };
    return this.preview;
  }

  /**
   * Commit the previewed cards
   *
   * A collection failure aborts the batch: the host is refreshed, the
   * failure reported, and the error rethrown.
   *
   * @returns The committed summary, or null when nothing was run
   */
  confirm(): ActionSummary | null {
    let preview = this.preview;
    if (!preview || preview.cardIds.length === 0) {
      preview = this.refreshPreview();
      if (preview.cardIds.length === 0) {
        return null;
      }
    }

    if (!preview.summary || !hasAnyCount(preview.summary)) {
      this.notifier.info(NO_CHANGES_MESSAGE);
      return null;
    }

    this.hooks.checkpoint?.(RUN_CHECKPOINT_LABEL);
    let summary: ActionSummary;
    try {
      summary = this.actionService.processCards(preview.cardIds);
    } catch (error) {
      // Cards before the failing one were already changed
      console.error('[LeechRunSession] Run aborted:', error);
      this.hooks.refresh?.();
      this.notifier.error(RUN_FAILED_MESSAGE, error);
      throw error;
    }
    this.hooks.refresh?.();
    this.notifier.info(formatSummary('Processed leech cards', summary));
    this.refreshPreview();
    return summary;
  }
}
