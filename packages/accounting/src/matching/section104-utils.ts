import { IncompleteRecordsError, toCalendarDate } from '@sharepool/core';
import type { Order } from '@sharepool/core';
import type { Result } from 'neverthrow';
import { err, ok } from 'neverthrow';

import { CapitalGain } from '../domain/capital-gain.js';
import { Section104Holding } from '../domain/section104-holding.js';
import type { MatchingQueues } from '../domain/types.js';
import type { StrictModeOptions } from '../utils/strict-mode-utils.js';
import { raiseOrWarn } from '../utils/strict-mode-utils.js';

export interface Section104Result {
  /** Undefined once the pool is empty, or after the security was abandoned */
  holding: Section104Holding | undefined;
  gains: CapitalGain[];
}

/**
 * Replay the orders left after same-day and 30-day matching through the
 * security's Section 104 pool, by ascending calendar date with acquisitions
 * ahead of disposals on the same day.
 *
 * In lenient mode a disposal with no pool is skipped, and a disposal larger
 * than the pool abandons the rest of the security: gains emitted so far are
 * kept but no holding is.
 */
export function processSection104(
  isin: string,
  name: string,
  queues: MatchingQueues,
  options: StrictModeOptions
): Result<Section104Result, IncompleteRecordsError> {
  const orders: Order[] = [...queues.acquisitions, ...queues.disposals].sort(
    (a, b) => toCalendarDate(a.timestamp).getTime() - toCalendarDate(b.timestamp).getTime()
  );

  const gains: CapitalGain[] = [];
  let holding: Section104Holding | undefined;

  for (const order of orders) {
    if (order.kind === 'acquisition') {
      holding = (holding ?? Section104Holding.empty(isin, name)).increase(order.quantity, order.total.amount);
      continue;
    }

    if (holding === undefined) {
      const outcome = raiseOrWarn(
        new IncompleteRecordsError(isin, name, 'disposal found without previous acquisitions', {
          transactionId: order.transactionId,
          additionalContext: { orderNumber: order.number, date: toCalendarDate(order.timestamp).toISOString() },
        }),
        options
      );
      if (outcome.isErr()) {
        return err(outcome.error);
      }
      continue;
    }

    const allowableCost = holding.cost.times(order.quantity).dividedBy(holding.quantity);
    const decreased = holding.decrease(order.quantity, allowableCost);
    if (decreased.isErr()) {
      const outcome = raiseOrWarn(decreased.error, options);
      if (outcome.isErr()) {
        return err(outcome.error);
      }
      return ok({ holding: undefined, gains });
    }

    holding = decreased.value.quantity.isZero() ? undefined : decreased.value;
    gains.push(new CapitalGain(order, allowableCost.plus(order.fees.total.amount)));
  }

  return ok({ holding, gains });
}
