import type { Decision, FilterRule, NumericField, Predicate, ShowRuleOverride, TextField } from '../types/Filter';
import type { ReleaseCandidate } from '../types/Release';
import type { TrackedShow } from '../types/Show';
import type { FilterStore } from '../types/Stores';
import { normalizeTitle, normalizeTitleForSearch, resolutionToNumber } from './parseFromTitle';
import { parsePredicate } from './predicates';
import { ConfigError, errorMessage } from '../utils/errors';

function scopeRank(rule: FilterRule): number {
  return rule.scope.kind === 'show' ? 0 : 1;
}

/** Priority descending, show-scoped before global at equal priority, then insertion order. */
export function compareRules(a: FilterRule, b: FilterRule): number {
  if (a.priority !== b.priority) return b.priority - a.priority;
  const scope = scopeRank(a) - scopeRank(b);
  if (scope !== 0) return scope;
  return a.id - b.id;
}

function matchKey(name: string): string {
  return normalizeTitle(normalizeTitleForSearch(name));
}

export function isTrackedRelease(candidate: ReleaseCandidate, show: TrackedShow): boolean {
  if (candidate.season !== null && candidate.season !== show.season) {
    return false;
  }
  const guess = matchKey(candidate.showGuess);
  if (!guess) return false;
  return [show.title, ...show.aliases].some((name) => matchKey(name) === guess);
}

export function meetsMinimumQuality(candidate: ReleaseCandidate, show: TrackedShow): boolean {
  return candidate.resolutionValue >= resolutionToNumber(show.quality);
}

function textValue(candidate: ReleaseCandidate, field: TextField): string {
  switch (field) {
    case 'title':
      return candidate.title;
    case 'show':
      return candidate.showGuess;
    case 'group':
      return candidate.group;
    case 'resolution':
      return candidate.resolution;
    case 'origin':
      return candidate.origin;
    case 'feed':
      return candidate.feed;
    case 'extras':
      return candidate.extras.join(' ');
  }
}

function numericValue(candidate: ReleaseCandidate, field: NumericField): number | null {
  switch (field) {
    case 'resolution':
      return candidate.resolutionValue;
    case 'episode':
      return candidate.episode;
    case 'season':
      return candidate.season;
    case 'seeders':
      return candidate.seeders;
  }
}

export class FilterEngine {
  private readonly rules: FilterRule[];
  private readonly disabled: Set<string>;
  private readonly patterns = new WeakMap<Predicate, RegExp>();
  readonly invalidRules: ConfigError[];

  constructor(rules: FilterRule[], overrides: ShowRuleOverride[] = [], invalid: ConfigError[] = []) {
    this.invalidRules = [...invalid];
    this.disabled = new Set(overrides.map((o) => `${o.showId}:${o.ruleId}`));

    const valid: FilterRule[] = [];
    for (const rule of rules) {
      try {
        // Rules built in code skip the store's validation
        parsePredicate(rule.predicate);
        this.compile(rule.predicate);
        valid.push(rule);
      } catch (error) {
        this.invalidRules.push(
          error instanceof ConfigError
            ? new ConfigError(`Filter rule "${rule.name}" (${rule.id}) is invalid: ${error.message}`, `rule:${rule.id}`)
            : new ConfigError(`Filter rule "${rule.name}" (${rule.id}) is invalid: ${errorMessage(error)}`, `rule:${rule.id}`)
        );
      }
    }
    this.rules = valid.sort(compareRules);
  }

  static fromStore(store: FilterStore): FilterEngine {
    const loaded = store.load();
    return new FilterEngine(loaded.rules, loaded.overrides, loaded.invalid);
  }

  private compile(predicate: Predicate): void {
    switch (predicate.kind) {
      case 'regex':
        this.patterns.set(predicate, new RegExp(predicate.pattern, 'i'));
        return;
      case 'all':
      case 'any':
        predicate.predicates.forEach((p) => this.compile(p));
        return;
      case 'not':
        this.compile(predicate.predicate);
        return;
      default:
        return;
    }
  }

  applicableRules(show: TrackedShow): FilterRule[] {
    return this.rules.filter((rule) => {
      if (!rule.enabled) return false;
      if (rule.scope.kind === 'show') return rule.scope.showId === show.id;
      return !this.disabled.has(`${show.id}:${rule.id}`);
    });
  }

  /**
   * The first matching accept or reject rule decides. An accepted release is
   * scored by every matching prefer rule, whatever its position.
   */
  evaluate(candidate: ReleaseCandidate, show: TrackedShow): Decision {
    const rules = this.applicableRules(show);
    const decisive = rules.find((rule) => rule.action !== 'prefer' && this.matches(rule.predicate, candidate, show));
    if (!decisive) {
      return { verdict: 'reject', reason: 'no rule matched' };
    }
    if (decisive.action === 'reject') {
      return { verdict: 'reject', reason: decisive.name, rule: decisive };
    }
    const score = rules
      .filter((rule) => rule.action === 'prefer' && this.matches(rule.predicate, candidate, show))
      .reduce((sum, rule) => sum + Math.max(rule.priority, 1), 0);
    return { verdict: 'accept', rule: decisive, score };
  }

  matches(predicate: Predicate, candidate: ReleaseCandidate, show: TrackedShow): boolean {
    switch (predicate.kind) {
      case 'exact':
        return textValue(candidate, predicate.field).toLowerCase() === predicate.value.toLowerCase();
      case 'contains':
        return textValue(candidate, predicate.field).toLowerCase().includes(predicate.value.toLowerCase());
      case 'regex': {
        let pattern = this.patterns.get(predicate);
        if (!pattern) {
          pattern = new RegExp(predicate.pattern, 'i');
          this.patterns.set(predicate, pattern);
        }
        return pattern.test(textValue(candidate, predicate.field));
      }
      case 'compare': {
        const value = numericValue(candidate, predicate.field);
        if (value === null) return false;
        switch (predicate.op) {
          case '<':
            return value < predicate.value;
          case '<=':
            return value <= predicate.value;
          case '==':
            return value === predicate.value;
          case '>=':
            return value >= predicate.value;
          case '>':
            return value > predicate.value;
        }
        return false;
      }
      case 'tracked':
        return isTrackedRelease(candidate, show);
      case 'minimumQuality':
        return meetsMinimumQuality(candidate, show);
      case 'all':
        return predicate.predicates.every((p) => this.matches(p, candidate, show));
      case 'any':
        return predicate.predicates.some((p) => this.matches(p, candidate, show));
      case 'not':
        return !this.matches(predicate.predicate, candidate, show);
    }
  }
}
