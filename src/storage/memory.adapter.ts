import type { RuleState } from '../types/index.js';
import { type Storage, cloneState, emptyState } from './base.js';

/**
 * Process-local storage, used by default and in tests
 */
export class MemoryStorage implements Storage {
  private state: RuleState;

  constructor(initial: RuleState = emptyState()) {
    this.state = cloneState(initial);
  }

  async init(): Promise<void> {}

  async read(): Promise<RuleState> {
    return cloneState(this.state);
  }

  async write(state: RuleState): Promise<void> {
    this.state = cloneState(state);
  }

  location(): string | null {
    return null;
  }

  async close(): Promise<void> {}
}
