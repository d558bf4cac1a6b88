import { randomUUID } from 'node:crypto';

export type RelayState =
  | 'RECEIVED'
  | 'RETRIEVING'
  | 'GENERATING'
  | 'COMPLETED'
  | 'FAILED';

const TRANSITIONS: Record<RelayState, readonly RelayState[]> = {
  RECEIVED: ['RETRIEVING', 'FAILED'],
  RETRIEVING: ['GENERATING', 'FAILED'],
  GENERATING: ['COMPLETED', 'FAILED'],
  COMPLETED: [],
  FAILED: [],
};

/** Tracks one request through the relay lifecycle. */
export class RelayTrace {
  readonly id = randomUUID().slice(0, 8);
  private current: RelayState = 'RECEIVED';

  constructor(private readonly onTransition?: (line: string) => void) {}

  get state(): RelayState {
    return this.current;
  }

  get terminal(): boolean {
    return TRANSITIONS[this.current].length === 0;
  }

  advance(next: RelayState) {
    if (!TRANSITIONS[this.current].includes(next)) {
      throw new Error(
        `Illegal relay transition ${this.current} -> ${next} (relay #${this.id})`,
      );
    }
    this.onTransition?.(`relay #${this.id} ${this.current} -> ${next}`);
    this.current = next;
  }
}
