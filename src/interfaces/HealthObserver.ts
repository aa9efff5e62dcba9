import type { UpstreamTarget } from '../UpstreamTarget';
import type { Outcome } from './Outcome';

export interface HealthObserver {
  /**
   * Called by the dispatcher after every relay attempt
   */
  recordOutcome(target: UpstreamTarget, outcome: Outcome): void;

  /**
   * Check if target may receive new requests
   */
  isEligible(target: UpstreamTarget): boolean;
}

export interface FailureRecord {
  consecutiveFailures: number;
  // epoch ms, 0 when target never failed
  lastFailureAt: number;
}
