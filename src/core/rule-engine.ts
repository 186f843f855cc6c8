/**
 * Rule Engine - decides whether a captured exchange is kept
 *
 * Filter rules are a deny-list walked in insertion order. Host rules are an
 * allow-list that only applies once at least one of them is enabled.
 * Evaluation reads a single compiled snapshot reference; reload builds a new
 * snapshot completely before swapping that reference.
 */

import type { ExchangeAttributes, FilterRule, HostRule, RawExchange } from '../types/index.js';
import { type Logger, silentLogger } from './logger.js';
import { Mutex } from './mutex.js';
import type { RuleSnapshot, RuleStore } from './rule-store.js';
import { compilePattern } from './validation.js';

export interface CompiledFilterRule {
  readonly rule: Readonly<FilterRule>;
  readonly regex: RegExp;
}

export interface CompiledSnapshot {
  readonly version: number;
  readonly loadedAt: number;
  readonly filters: readonly CompiledFilterRule[];
  readonly hosts: readonly Readonly<HostRule>[];
}

export type EvaluationReason = 'included' | 'filter-rule' | 'host-not-allowed';

export interface Evaluation {
  included: boolean;
  reason: EvaluationReason;
  ruleId?: string;
}

export type IncludePredicate = (exchange: RawExchange) => boolean;

const EMPTY_SNAPSHOT: CompiledSnapshot = Object.freeze({
  version: 0,
  loadedAt: 0,
  filters: Object.freeze([]),
  hosts: Object.freeze([]),
});

export class RuleEngine {
  private store: RuleStore;
  private active: CompiledSnapshot = EMPTY_SNAPSHOT;
  private reloadLock = new Mutex();
  private logger: Logger;

  constructor(store: RuleStore, logger: Logger = silentLogger) {
    this.store = store;
    this.logger = logger.child({ component: 'rule-engine' });
  }

  /**
   * Re-read the store and publish a new snapshot. Reloads run one at a time;
   * evaluations in progress keep the snapshot they started with.
   */
  reload(): Promise<CompiledSnapshot> {
    return this.reloadLock.runExclusive(() => {
      const next = compileSnapshot(this.store.snapshot(), this.active.version + 1);
      this.active = next;
      this.logger.info(
        { version: next.version, filters: next.filters.length, hosts: next.hosts.length },
        'rules reloaded'
      );
      return next;
    });
  }

  /**
   * The snapshot currently used for evaluation
   */
  current(): CompiledSnapshot {
    return this.active;
  }

  evaluate(exchange: RawExchange | ExchangeAttributes): boolean {
    return this.explain(exchange).included;
  }

  explain(exchange: RawExchange | ExchangeAttributes): Evaluation {
    return evaluateAgainst(this.active, toAttributes(exchange));
  }

  /**
   * Predicate pinned to the current snapshot, for one batch run
   */
  createPredicate(): IncludePredicate {
    const pinned = this.active;
    return (exchange) => evaluateAgainst(pinned, toAttributes(exchange)).included;
  }
}

/**
 * Compile enabled rules. Throws InvalidPatternError before anything is published.
 */
export function compileSnapshot(snapshot: RuleSnapshot, version: number): CompiledSnapshot {
  const filters = snapshot.filterRules
    .filter((rule) => rule.enabled)
    .map((rule) => Object.freeze({ rule, regex: compilePattern(rule.pattern) }));
  const hosts = snapshot.hostRules.filter((rule) => rule.enabled);

  return Object.freeze({
    version,
    loadedAt: Date.now(),
    filters: Object.freeze(filters),
    hosts: Object.freeze(hosts),
  });
}

export function evaluateAgainst(snapshot: CompiledSnapshot, attributes: ExchangeAttributes): Evaluation {
  for (const { rule, regex } of snapshot.filters) {
    if (regex.test(attributeFor(rule.type, attributes))) {
      return { included: false, reason: 'filter-rule', ruleId: rule.id };
    }
  }

  if (snapshot.hosts.length > 0 && !snapshot.hosts.some((rule) => hostMatches(rule, attributes.host))) {
    return { included: false, reason: 'host-not-allowed' };
  }

  return { included: true, reason: 'included' };
}

/**
 * Exact match, or suffix-label match when subdomains are included
 */
export function hostMatches(rule: Readonly<HostRule>, host: string): boolean {
  const candidate = host.toLowerCase();
  const target = rule.host.toLowerCase();
  if (candidate === target) {
    return true;
  }
  return rule.includeSubdomains && candidate.endsWith(`.${target}`);
}

function attributeFor(type: FilterRule['type'], attributes: ExchangeAttributes): string {
  switch (type) {
    case 'url':
      return attributes.url;
    case 'host':
      return attributes.host;
    case 'content-type':
      return attributes.contentType;
    case 'method':
      return attributes.method;
  }
}

/**
 * Project an exchange onto the matched attributes. Content type prefers the
 * response, falling back to the request.
 */
export function toAttributes(exchange: RawExchange | ExchangeAttributes): ExchangeAttributes {
  if ('contentType' in exchange) {
    return exchange;
  }
  return {
    method: exchange.method,
    host: exchange.host,
    url: exchange.url,
    contentType:
      exchange.responseHeaders['content-type'] ??
      exchange.requestHeaders['content-type'] ??
      '',
  };
}
