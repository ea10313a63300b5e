import { daysBetween, isSameCalendarDate, splitOrder, toCalendarDate } from '@sharepool/core';
import type { Acquisition, Disposal, InvariantViolationError, Order, OrderSequence } from '@sharepool/core';
import type { Result } from 'neverthrow';
import { err, ok } from 'neverthrow';

import { CapitalGain } from '../domain/capital-gain.js';
import type { MatchingQueues } from '../domain/types.js';

export type MatchPredicate = (acquisition: Acquisition, disposal: Disposal) => boolean;

/** Bed-and-breakfasting window, in days after the disposal */
export const THIRTY_DAY_WINDOW = 30;

export function isSameDayMatch(acquisition: Acquisition, disposal: Disposal): boolean {
  return isSameCalendarDate(acquisition.timestamp, disposal.timestamp);
}

export function isThirtyDayMatch(acquisition: Acquisition, disposal: Disposal): boolean {
  const days = daysBetween(disposal.timestamp, acquisition.timestamp);
  return days > 0 && days <= THIRTY_DAY_WINDOW;
}

export interface MatchResult {
  /** Orders left unmatched, still in chronological order */
  queues: MatchingQueues;
  gains: CapitalGain[];
}

/**
 * Identify disposals with acquisitions accepted by `predicate`.
 *
 * Disposals are visited in queue order. For each one the acquisitions are
 * scanned from the front, skipping those already consumed; when both sides
 * differ in size the larger is split and its remainder takes its place in
 * the queue. Each match yields a gain costed at the acquisition total plus
 * the disposal fees.
 */
export function matchShares(
  queues: MatchingQueues,
  predicate: MatchPredicate,
  sequence: OrderSequence
): Result<MatchResult, InvariantViolationError> {
  const acquisitions = [...queues.acquisitions];
  const disposals = [...queues.disposals];
  const consumed = new Set<Order>();
  const gains: CapitalGain[] = [];

  let a = 0;
  let d = 0;

  while (d < disposals.length) {
    const acquisition = acquisitions[a];
    const disposal = disposals[d];

    if (acquisition === undefined || disposal === undefined) {
      a = 0;
      d += 1;
      continue;
    }

    if (consumed.has(acquisition) || !predicate(acquisition, disposal)) {
      a += 1;
      continue;
    }

    consumed.add(acquisition);
    consumed.add(disposal);

    let matchedAcquisition = acquisition;
    let matchedDisposal = disposal;

    if (acquisition.quantity.gt(disposal.quantity)) {
      const split = splitOrder(acquisition, disposal.quantity, sequence);
      if (split.isErr()) {
        return err(split.error);
      }
      [matchedAcquisition, acquisitions[a]] = split.value;
      a = 0;
      d += 1;
    } else if (disposal.quantity.gt(acquisition.quantity)) {
      const split = splitOrder(disposal, acquisition.quantity, sequence);
      if (split.isErr()) {
        return err(split.error);
      }
      [matchedDisposal, disposals[d]] = split.value;
      a += 1;
    } else {
      a = 0;
      d += 1;
    }

    gains.push(
      new CapitalGain(
        matchedDisposal,
        matchedAcquisition.total.amount.plus(matchedDisposal.fees.total.amount),
        toCalendarDate(matchedAcquisition.timestamp)
      )
    );
  }

  return ok({
    queues: {
      acquisitions: acquisitions.filter((order) => !consumed.has(order)),
      disposals: disposals.filter((order) => !consumed.has(order)),
    },
    gains,
  });
}
