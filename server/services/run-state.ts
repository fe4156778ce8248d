/**
 * Crawl state machine for one ingestion run.
 *
 *   idle → navigating_date → parsing_date → navigating_date … → merging → completed
 *
 * A date whose fetch fails goes straight on to the next date (or to merging).
 * Every non-terminal state may fail. Anything else throws.
 */

export type RunState = 'idle' | 'navigating_date' | 'parsing_date' | 'merging' | 'completed' | 'failed';

const TRANSITIONS: Record<RunState, readonly RunState[]> = {
  idle: ['navigating_date', 'failed'],
  navigating_date: ['parsing_date', 'navigating_date', 'merging', 'failed'],
  parsing_date: ['navigating_date', 'merging', 'failed'],
  merging: ['completed', 'failed'],
  completed: [],
  failed: [],
};

export class IllegalTransitionError extends Error {
  constructor(readonly from: RunState, readonly to: RunState) {
    super(`Illegal run state transition: ${from} → ${to}`);
    this.name = 'IllegalTransitionError';
  }
}

export class RunStateMachine {
  private current: RunState = 'idle';
  private trail: RunState[] = ['idle'];

  get state(): RunState {
    return this.current;
  }

  get history(): readonly RunState[] {
    return this.trail;
  }

  get isTerminal(): boolean {
    return TRANSITIONS[this.current].length === 0;
  }

  canTransition(next: RunState): boolean {
    return TRANSITIONS[this.current].includes(next);
  }

  transition(next: RunState): void {
    if (!this.canTransition(next)) {
      throw new IllegalTransitionError(this.current, next);
    }
    this.current = next;
    this.trail.push(next);
  }
}
