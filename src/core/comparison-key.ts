import type { CallState, TruthState } from './states.js';

/**
 * Address of one scheme cell: a truth state paired with a call state.
 * Instances are frozen; `id` is the string form used as the map key.
 */
export class TruthAndCallStates {
  readonly id: string;

  constructor(
    readonly truthState: TruthState,
    readonly callState: CallState
  ) {
    this.id = TruthAndCallStates.keyOf(truthState, callState);
    Object.freeze(this);
  }

  static keyOf(truthState: TruthState, callState: CallState): string {
    return `${truthState}|${callState}`;
  }

  equals(other: TruthAndCallStates): boolean {
    return this.truthState === other.truthState && this.callState === other.callState;
  }

  toString(): string {
    return `[${this.truthState}, ${this.callState}]`;
  }
}
