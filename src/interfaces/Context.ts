export type HandlingState =
  | 'Accepted'
  | 'Reading'
  | 'Dispatched'
  | 'Relaying'
  | 'Retrying'
  | 'Completed'
  | 'Failed';

/**
 * Per-request context, passed to hooks and log methods.
 * Hooks may store their own values on it.
 */
export interface Context extends Record<string, unknown> {
  id?: number;
  state?: HandlingState;
  attempt?: number;
  target?: string;
}
