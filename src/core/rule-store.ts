/**
 * Rule Store - ordered filter rules, host rules and preset bundles
 *
 * All mutations run one at a time. Each one validates, builds the next state,
 * persists it and only then swaps the in-memory copy, so a failure at any
 * step leaves both the store and its backing untouched.
 */

import type {
  FilterRule,
  HostRule,
  Preset,
  PresetSummary,
  RuleState,
} from '../types/index.js';
import { type Storage, cloneState, emptyState, generateId } from '../storage/base.js';
import { NotFoundError, ValidationError } from './errors.js';
import { type Logger, silentLogger } from './logger.js';
import { Mutex } from './mutex.js';
import { freezePreset } from './presets.js';
import {
  compilePattern,
  filterRuleInputSchema,
  filterRulePatchSchema,
  filterRuleSchema,
  hostRuleInputSchema,
  hostRulePatchSchema,
  hostRuleSchema,
  parseOrThrow,
  ruleStateSchema,
  type FilterRuleInput,
  type FilterRulePatch,
  type HostRuleInput,
  type HostRulePatch,
} from './validation.js';

export interface RuleStoreOptions {
  storage: Storage;
  presets?: Preset[];
  logger?: Logger;
}

/** Point-in-time, deeply frozen copy of the rules */
export interface RuleSnapshot {
  readonly filterRules: readonly Readonly<FilterRule>[];
  readonly hostRules: readonly Readonly<HostRule>[];
}

export type RuleStoreListener = (state: RuleSnapshot) => void;

export class RuleStore {
  private storage: Storage;
  private state: RuleState = emptyState();
  private presets: Map<string, Preset>;
  private mutex = new Mutex();
  private logger: Logger;
  private listeners = new Set<RuleStoreListener>();
  private initialized = false;

  constructor(options: RuleStoreOptions) {
    this.storage = options.storage;
    this.presets = new Map((options.presets ?? []).map((preset) => [preset.id, freezePreset(preset)]));
    this.logger = (options.logger ?? silentLogger).child({ component: 'rule-store' });
  }

  /**
   * Initialize storage and load persisted rules
   */
  async init(): Promise<void> {
    await this.storage.init();
    this.state = this.validateLoaded(await this.storage.read());
    this.initialized = true;
    this.logger.info(
      { filterRules: this.state.filterRules.length, hostRules: this.state.hostRules.length },
      'rule store loaded'
    );
  }

  /**
   * Re-read the backing storage (after an external edit)
   */
  async refresh(): Promise<void> {
    await this.mutex.runExclusive(async () => {
      this.ensureInitialized();
      const next = this.validateLoaded(await this.storage.read());
      this.state = next;
      this.logger.info('rule store refreshed from storage');
      this.notify();
    });
  }

  async close(): Promise<void> {
    await this.mutex.runExclusive(() => this.storage.close());
    this.initialized = false;
  }

  /**
   * Subscribe to committed mutations
   */
  onChange(listener: RuleStoreListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  snapshot(): RuleSnapshot {
    return deepFreeze(cloneState(this.state));
  }

  getStorage(): Storage {
    return this.storage;
  }

  // ==========================================================================
  // Filter rules
  // ==========================================================================

  listFilterRules(): FilterRule[] {
    return this.state.filterRules.map((rule) => ({ ...rule }));
  }

  getFilterRule(id: string): FilterRule {
    const rule = this.state.filterRules.find((r) => r.id === id);
    if (!rule) {
      throw new NotFoundError('filter rule', id);
    }
    return { ...rule };
  }

  addFilterRule(input: FilterRuleInput): Promise<FilterRule> {
    return this.mutate((state) => {
      const parsed = parseOrThrow(filterRuleInputSchema, input, 'filter rule');
      compilePattern(parsed.pattern);

      const rule: FilterRule = stripUndefined({ ...parsed, id: parsed.id ?? generateId() });
      if (state.filterRules.some((r) => r.id === rule.id)) {
        throw new ValidationError(`Filter rule id already exists: ${rule.id}`);
      }

      state.filterRules.push(rule);
      return rule;
    }, 'filter rule added');
  }

  updateFilterRule(id: string, patch: FilterRulePatch): Promise<FilterRule> {
    return this.mutate((state) => {
      const changes = parseOrThrow(filterRulePatchSchema, patch, 'filter rule update');
      const index = state.filterRules.findIndex((r) => r.id === id);
      if (index === -1) {
        throw new NotFoundError('filter rule', id);
      }

      const rule = parseOrThrow(
        filterRuleSchema,
        stripUndefined({ ...state.filterRules[index], ...changes, id }),
        'filter rule'
      );
      compilePattern(rule.pattern);

      state.filterRules[index] = rule;
      return rule;
    }, 'filter rule updated');
  }

  deleteFilterRule(id: string): Promise<FilterRule> {
    return this.mutate((state) => {
      const index = state.filterRules.findIndex((r) => r.id === id);
      if (index === -1) {
        throw new NotFoundError('filter rule', id);
      }
      const [removed] = state.filterRules.splice(index, 1);
      return removed;
    }, 'filter rule deleted');
  }

  toggleFilterRule(id: string, enabled: boolean): Promise<FilterRule> {
    return this.updateFilterRule(id, { enabled });
  }

  // ==========================================================================
  // Host rules
  // ==========================================================================

  listHostRules(): HostRule[] {
    return this.state.hostRules.map((rule) => ({ ...rule }));
  }

  getHostRule(id: string): HostRule {
    const rule = this.state.hostRules.find((r) => r.id === id);
    if (!rule) {
      throw new NotFoundError('host rule', id);
    }
    return { ...rule };
  }

  addHostRule(input: HostRuleInput): Promise<HostRule> {
    return this.mutate((state) => {
      const parsed = parseOrThrow(hostRuleInputSchema, input, 'host rule');
      const rule: HostRule = stripUndefined({ ...parsed, id: parsed.id ?? generateId() });

      if (state.hostRules.some((r) => r.id === rule.id)) {
        throw new ValidationError(`Host rule id already exists: ${rule.id}`);
      }
      this.assertHostUnique(state, rule.host, rule.id);

      state.hostRules.push(rule);
      return rule;
    }, 'host rule added');
  }

  updateHostRule(id: string, patch: HostRulePatch): Promise<HostRule> {
    return this.mutate((state) => {
      const changes = parseOrThrow(hostRulePatchSchema, patch, 'host rule update');
      const index = state.hostRules.findIndex((r) => r.id === id);
      if (index === -1) {
        throw new NotFoundError('host rule', id);
      }

      const rule = parseOrThrow(
        hostRuleSchema,
        stripUndefined({ ...state.hostRules[index], ...changes, id }),
        'host rule'
      );
      this.assertHostUnique(state, rule.host, id);

      state.hostRules[index] = rule;
      return rule;
    }, 'host rule updated');
  }

  deleteHostRule(id: string): Promise<HostRule> {
    return this.mutate((state) => {
      const index = state.hostRules.findIndex((r) => r.id === id);
      if (index === -1) {
        throw new NotFoundError('host rule', id);
      }
      const [removed] = state.hostRules.splice(index, 1);
      return removed;
    }, 'host rule deleted');
  }

  toggleHostRule(id: string, enabled: boolean): Promise<HostRule> {
    return this.updateHostRule(id, { enabled });
  }

  // ==========================================================================
  // Presets
  // ==========================================================================

  listPresets(): PresetSummary[] {
    return Array.from(this.presets.values()).map((preset) => ({
      id: preset.id,
      name: preset.name,
      description: preset.description,
      ruleCount: preset.rules.length,
    }));
  }

  getPreset(id: string): Preset {
    const preset = this.presets.get(id);
    if (!preset) {
      throw new NotFoundError('preset', id);
    }
    return preset;
  }

  /**
   * Replace the preset bundle list (e.g. after the preset file changed)
   */
  setPresets(presets: Preset[]): void {
    this.presets = new Map(presets.map((preset) => [preset.id, freezePreset(preset)]));
  }

  /**
   * Merge a preset's rules: same-id rules are replaced in place, new ones are
   * appended in preset order, everything else is kept.
   */
  applyPreset(presetId: string): Promise<FilterRule[]> {
    return this.mutate((state) => {
      const preset = this.getPreset(presetId);
      for (const rule of preset.rules) {
        compilePattern(rule.pattern);
      }

      const applied: FilterRule[] = [];
      for (const presetRule of preset.rules) {
        const rule = { ...presetRule };
        const index = state.filterRules.findIndex((r) => r.id === rule.id);
        if (index === -1) {
          state.filterRules.push(rule);
        } else {
          state.filterRules[index] = rule;
        }
        applied.push(rule);
      }
      return applied;
    }, `preset ${presetId} applied`);
  }

  // ==========================================================================
  // Internals
  // ==========================================================================

  /**
   * Run a mutation against a draft copy and commit it only if the draft
   * validates and persists
   */
  private mutate<T>(change: (draft: RuleState) => T, message: string): Promise<T> {
    return this.mutex.runExclusive(async () => {
      this.ensureInitialized();
      const draft = cloneState(this.state);
      const result = change(draft);

      await this.storage.write(draft);
      this.state = draft;

      this.logger.info(
        { filterRules: draft.filterRules.length, hostRules: draft.hostRules.length },
        message
      );
      this.notify();
      return result;
    });
  }

  private notify(): void {
    const snapshot = this.snapshot();
    for (const listener of this.listeners) {
      listener(snapshot);
    }
  }

  private assertHostUnique(state: RuleState, host: string, ownId: string): void {
    const lower = host.toLowerCase();
    if (state.hostRules.some((r) => r.id !== ownId && r.host.toLowerCase() === lower)) {
      throw new ValidationError(`Host already exists: ${host}`);
    }
  }

  private validateLoaded(raw: RuleState): RuleState {
    const state = parseOrThrow(ruleStateSchema, raw, 'stored rules');
    for (const rule of state.filterRules) {
      compilePattern(rule.pattern);
    }
    return cloneState(state);
  }

  private ensureInitialized(): void {
    if (!this.initialized) {
      throw new Error('Rule store not initialized. Call init() first.');
    }
  }
}

function stripUndefined<T extends { description?: string }>(rule: T): T {
  const copy = { ...rule };
  if (copy.description === undefined) {
    delete copy.description;
  }
  return copy;
}

function deepFreeze(state: RuleState): RuleSnapshot {
  return Object.freeze({
    filterRules: Object.freeze(state.filterRules.map((rule) => Object.freeze(rule))),
    hostRules: Object.freeze(state.hostRules.map((rule) => Object.freeze(rule))),
  });
}
