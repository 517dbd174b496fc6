export type TextField = 'title' | 'show' | 'group' | 'resolution' | 'origin' | 'feed' | 'extras';
export type NumericField = 'resolution' | 'episode' | 'season' | 'seeders';
export type CompareOp = '<' | '<=' | '==' | '>=' | '>';

export type Predicate =
  | { kind: 'exact'; field: TextField; value: string }
  | { kind: 'contains'; field: TextField; value: string }
  | { kind: 'regex'; field: TextField; pattern: string }
  | { kind: 'compare'; field: NumericField; op: CompareOp; value: number }
  | { kind: 'tracked' }
  | { kind: 'minimumQuality' }
  | { kind: 'all'; predicates: Predicate[] }
  | { kind: 'any'; predicates: Predicate[] }
  | { kind: 'not'; predicate: Predicate };

/** `prefer` never decides; a matching prefer rule adds its priority (at least 1) to the release's score. */
export type FilterAction = 'accept' | 'reject' | 'prefer';

export type RuleScope = { kind: 'global' } | { kind: 'show'; showId: number };

export interface FilterRule {
  id: number;
  name: string;
  predicate: Predicate;
  action: FilterAction;
  priority: number;
  scope: RuleScope;
  enabled: boolean;
  createdAt?: string;
}

export type NewFilterRule = Omit<FilterRule, 'id' | 'createdAt'>;

/** Disables one global rule for one show. */
export interface ShowRuleOverride {
  showId: number;
  ruleId: number;
}

export type Decision =
  | { verdict: 'accept'; rule: FilterRule; score: number }
  | { verdict: 'reject'; reason: string; rule?: FilterRule };
