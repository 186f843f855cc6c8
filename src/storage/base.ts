import type { RuleState } from '../types/index.js';

export interface Storage {
  /**
   * Initialize the storage (create files/tables if needed)
   */
  init(): Promise<void>;

  /**
   * Read the persisted rule state
   */
  read(): Promise<RuleState>;

  /**
   * Replace the persisted rule state in one write
   */
  write(state: RuleState): Promise<void>;

  /**
   * File backing the state, if any (watched for external edits)
   */
  location(): string | null;

  /**
   * Release handles
   */
  close(): Promise<void>;
}

/**
 * Generate a unique ID for rules
 */
export function generateId(): string {
  return `${Date.now()}-${Math.random().toString(36).substring(2, 9)}`;
}

export function emptyState(): RuleState {
  return { filterRules: [], hostRules: [] };
}

/**
 * Deep copy so callers never share arrays with the backing store
 */
export function cloneState(state: RuleState): RuleState {
  return {
    filterRules: state.filterRules.map((rule) => ({ ...rule })),
    hostRules: state.hostRules.map((rule) => ({ ...rule })),
  };
}
