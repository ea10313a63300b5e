import { formatIsoDate, mergeOrders } from '@sharepool/core';
import type { InvariantViolationError, Order, OrderSequence } from '@sharepool/core';
import type { Logger } from '@sharepool/logger';
import type { Result } from 'neverthrow';
import { err, ok } from 'neverthrow';

import type { GroupKey, MatchingQueues } from '../domain/types.js';

export function getGroupKey(order: Order): GroupKey {
  return { isin: order.isin, date: formatIsoDate(order.timestamp), kind: order.kind };
}

function serializeGroupKey(key: GroupKey): string {
  return `${key.isin}|${key.date}|${key.kind}`;
}

/**
 * Bucket orders by security, calendar date and direction, keeping the input
 * order inside each bucket and the order of first appearance across buckets
 */
export function groupSameDayOrders(orders: readonly Order[]): Order[][] {
  const groups = new Map<string, Order[]>();

  for (const order of orders) {
    const key = serializeGroupKey(getGroupKey(order));
    const group = groups.get(key);
    if (group) {
      group.push(order);
    } else {
      groups.set(key, [order]);
    }
  }

  return [...groups.values()];
}

/**
 * Merge each same-day bucket into one order and file the results into
 * per-security acquisition and disposal queues. Buckets are visited in
 * chronological order, so every queue comes out chronological too.
 */
export function buildMatchingQueues(
  orders: readonly Order[],
  sequence: OrderSequence,
  logger: Logger
): Result<Map<string, MatchingQueues>, InvariantViolationError> {
  const queues = new Map<string, MatchingQueues>();

  for (const group of groupSameDayOrders(orders)) {
    const [first] = group;
    if (first === undefined) {
      continue;
    }

    let order: Order = first;
    if (group.length > 1) {
      const merged = mergeOrders(group, sequence);
      if (merged.isErr()) {
        return err(merged.error);
      }
      order = merged.value;
      logger.debug({ isin: order.isin, orderNumber: order.number }, `New same-day merged order: ${order.notes ?? ''}`);
    }

    let security = queues.get(order.isin);
    if (!security) {
      security = { acquisitions: [], disposals: [] };
      queues.set(order.isin, security);
    }

    if (order.kind === 'acquisition') {
      security.acquisitions.push(order);
    } else {
      security.disposals.push(order);
    }
  }

  return ok(queues);
}
