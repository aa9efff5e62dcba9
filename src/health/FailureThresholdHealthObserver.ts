import type { FailureRecord, HealthObserver, Outcome } from '../interfaces';
import type { UpstreamTarget } from '../UpstreamTarget';
import { ConfigurationError } from '../errors';

export interface FailureThresholdOptions {
  /**
   * Consecutive failures after which target is skipped
   */
  failureThreshold: number;

  /**
   * Time (ms) since the last failure after which target is tried again
   */
  cooldown: number;

  /**
   * Clock, mostly for tests
   * @default Date.now
   */
  now?: () => number;
}

/**
 * Marks a target ineligible after `failureThreshold` consecutive failures and
 * re-admits it once `cooldown` has passed since its last failure.
 * A single failure after re-admission takes it out for another cooldown,
 * a success resets the record.
 */
export class FailureThresholdHealthObserver implements HealthObserver {
  private records = new Map<string, FailureRecord>();
  private readonly now: () => number;

  constructor(private readonly options: FailureThresholdOptions) {
    if (!Number.isInteger(options.failureThreshold) || options.failureThreshold < 1) {
      throw new ConfigurationError(`Invalid failure threshold "${options.failureThreshold}", expected positive integer`);
    }

    if (!Number.isFinite(options.cooldown) || options.cooldown < 0) {
      throw new ConfigurationError(`Invalid cooldown "${options.cooldown}"`);
    }

    this.now = options.now ?? Date.now;
  }

  public recordOutcome(target: UpstreamTarget, outcome: Outcome): void {
    switch (outcome.type) {
      case 'success':
        this.records.delete(target.address);
        return;

      case 'upstream-unreachable':
      case 'upstream-timeout':
      case 'upstream-aborted': {
        const record = this.getRecord(target);
        this.records.set(target.address, {
          consecutiveFailures: record.consecutiveFailures + 1,
          lastFailureAt: this.now(),
        });
        return;
      }

      // client going away says nothing about the upstream
      case 'client-disconnected':
        return;
    }
  }

  public isEligible(target: UpstreamTarget): boolean {
    const record = this.records.get(target.address);
    if (!record || record.consecutiveFailures < this.options.failureThreshold) {
      return true;
    }

    return this.now() - record.lastFailureAt >= this.options.cooldown;
  }

  /**
   * Get failure record of the target
   * @param target
   */
  public getRecord(target: UpstreamTarget): FailureRecord {
    return this.records.get(target.address) ?? {
      consecutiveFailures: 0,
      lastFailureAt: 0,
    };
  }
}
