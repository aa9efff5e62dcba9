import type { HealthObserver } from '../interfaces/HealthObserver';

/**
 * Every target is always eligible, outcomes are discarded
 */
export class NoopHealthObserver implements HealthObserver {
  recordOutcome(): void {}

  isEligible(): boolean {
    return true;
  }
}
