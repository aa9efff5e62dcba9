export interface SuccessOutcome {
  type: 'success';
  statusCode: number;
  // response body bytes relayed to the client
  bytesRelayed: number;
  duration: number;
}

export interface UpstreamUnreachableOutcome {
  type: 'upstream-unreachable';
  error: Error;
  // true when no request body bytes were sent, so the request can go to another upstream
  replayable: boolean;
  duration: number;
}

export interface UpstreamTimeoutOutcome {
  type: 'upstream-timeout';
  error: Error;
  replayable: boolean;
  duration: number;
}

export interface UpstreamAbortedOutcome {
  type: 'upstream-aborted';
  error: Error;
  bytesRelayed: number;
  duration: number;
}

export interface ClientDisconnectedOutcome {
  type: 'client-disconnected';
  bytesRelayed: number;
  duration: number;
}

/**
 * Result of a single relay attempt
 */
export type Outcome =
  | SuccessOutcome
  | UpstreamUnreachableOutcome
  | UpstreamTimeoutOutcome
  | UpstreamAbortedOutcome
  | ClientDisconnectedOutcome;

export type OutcomeType = Outcome['type'];
