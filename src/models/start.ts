/**
 * Start pistol state.
 */

export enum StartState {
  IDLE = 'idle',
  COUNTING = 'counting',
}

/**
 * Snapshot published to observers whenever the start state changes.
 */
export interface StartStatus {
  state: StartState;

  /** Time of the last accepted start result (UTC, millisecond precision) */
  resultDate: Date | null;
}
