import { UpstreamTarget } from './UpstreamTarget';
import type { HealthObserver } from './interfaces';
import { ConfigurationError } from './errors';
import { NoopHealthObserver } from './health';

/**
 * Ordered set of upstream targets with a round-robin cursor.
 *
 * `next()` is synchronous, so the cursor read-modify-write can't interleave
 * with another selection on the event loop: concurrent handlers never skip a
 * target or get the same slot twice.
 */
export class UpstreamPool {
  private readonly list: ReadonlyArray<UpstreamTarget>;
  private cursor = 0;

  constructor(
    targets: UpstreamTarget[],
    private readonly healthObserver: HealthObserver = new NoopHealthObserver(),
  ) {
    if (!targets.length) {
      throw new ConfigurationError('At least one upstream is required');
    }

    this.list = Object.freeze([...targets]);
  }

  /**
   * Create pool from the list of addresses
   * @param addresses
   * @param healthObserver
   * @throws ConfigurationError
   */
  public static fromAddresses(addresses: string[], healthObserver?: HealthObserver): UpstreamPool {
    return new UpstreamPool(addresses.map(a => UpstreamTarget.parse(a)), healthObserver);
  }

  public get size(): number {
    return this.list.length;
  }

  public get targets(): ReadonlyArray<UpstreamTarget> {
    return this.list;
  }

  /**
   * Select next target.
   * Ineligible targets are skipped, keeping the order among the eligible ones.
   * When none is eligible the target at the cursor is returned anyway.
   */
  public next(): UpstreamTarget {
    const start = this.cursor;

    for (let i = 0; i < this.list.length; i++) {
      const idx = (start + i) % this.list.length;
      const target = this.list[idx];

      if (this.healthObserver.isEligible(target)) {
        this.cursor = (idx + 1) % this.list.length;
        return target;
      }
    }

    this.cursor = (start + 1) % this.list.length;
    return this.list[start];
  }
}
