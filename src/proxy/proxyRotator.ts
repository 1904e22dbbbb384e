/**
 * Proxy rotation state.
 *
 * One rotator is created per configuration load and shared by reference with
 * every verification call (see createVerifierConfig). Creating one per request
 * resets the counter each time and pins all traffic to the first proxy.
 *
 * next() runs synchronously, so on the single JS thread every caller gets its
 * own ticket: N consecutive round-robin calls, from any number of concurrent
 * requests, visit each of N proxies exactly once.
 */

import { ProxyId, RotationStrategy } from '../types/proxy';

export class ProxyRotator {
  private readonly proxyIds: readonly ProxyId[];
  private counter = 0;

  constructor(
    proxyIds: readonly ProxyId[],
    readonly strategy: RotationStrategy,
    private readonly random: () => number = Math.random
  ) {
    this.proxyIds = Object.freeze([...proxyIds]);
  }

  /**
   * Next proxy id according to the strategy; undefined when the pool is empty
   */
  next(): ProxyId | undefined {
    if (this.proxyIds.length === 0) {
      return undefined;
    }

    if (this.strategy === 'random') {
      const index = Math.min(Math.floor(this.random() * this.proxyIds.length), this.proxyIds.length - 1);
      return this.proxyIds[index];
    }

    const ticket = this.counter;
    this.counter = ticket >= Number.MAX_SAFE_INTEGER ? 0 : ticket + 1;
    return this.proxyIds[ticket % this.proxyIds.length];
  }

  get size(): number {
    return this.proxyIds.length;
  }

  isEmpty(): boolean {
    return this.proxyIds.length === 0;
  }

  /** Round-robin tickets handed out so far */
  get ticketsIssued(): number {
    return this.counter;
  }

  get ids(): readonly ProxyId[] {
    return this.proxyIds;
  }
}
