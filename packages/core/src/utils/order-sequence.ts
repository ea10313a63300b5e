import type { Order } from '../types/transaction.js';

/**
 * Hands out order numbers. Every order created while processing a history,
 * original or derived, takes the next number from one sequence so that audit
 * notes can refer back to their source unambiguously.
 */
export class OrderSequence {
  private last: number;

  constructor(last = 0) {
    this.last = last;
  }

  /**
   * A sequence continuing after the highest number already in use
   */
  static after(orders: Iterable<Order>): OrderSequence {
    let last = 0;
    for (const order of orders) {
      last = Math.max(last, order.number);
    }
    return new OrderSequence(last);
  }

  next(): number {
    this.last += 1;
    return this.last;
  }

  /** Last number handed out, 0 if none */
  peek(): number {
    return this.last;
  }
}
