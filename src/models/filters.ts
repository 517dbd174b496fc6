import db from '../db';
import type { FilterRule, NewFilterRule, Predicate, ShowRuleOverride } from '../types/Filter';
import type { LoadedRules } from '../types/Stores';
import { parseFilterAction, parsePredicate } from '../scoring/predicates';
import { ConfigError } from '../utils/errors';

interface FilterRuleRow {
  id: number;
  name: string;
  predicate: string;
  action: string;
  priority: number;
  show_id: number | null;
  enabled: number;
  created_at: string;
}

export const DEFAULT_FILTER_RULES: NewFilterRule[] = [
  {
    name: 'Reject batches',
    predicate: { kind: 'regex', field: 'title', pattern: '[\\[(][^\\])]*\\b(batch|complete)\\b[^\\])]*[\\])]' },
    action: 'reject',
    priority: 100,
    scope: { kind: 'global' },
    enabled: true,
  },
  {
    name: 'Reject below show quality',
    predicate: { kind: 'not', predicate: { kind: 'minimumQuality' } },
    action: 'reject',
    priority: 50,
    scope: { kind: 'global' },
    enabled: true,
  },
  {
    name: 'Accept tracked shows',
    predicate: { kind: 'all', predicates: [{ kind: 'tracked' }, { kind: 'minimumQuality' }] },
    action: 'accept',
    priority: 0,
    scope: { kind: 'global' },
    enabled: true,
  },
];

function convertRule(row: FilterRuleRow): FilterRule {
  let raw: unknown;
  try {
    raw = JSON.parse(row.predicate);
  } catch {
    throw new ConfigError(`Filter rule "${row.name}" (${row.id}) has unreadable predicate JSON`, `rule:${row.id}`);
  }
  let predicate: Predicate;
  try {
    predicate = parsePredicate(raw);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new ConfigError(`Filter rule "${row.name}" (${row.id}) is invalid: ${reason}`, `rule:${row.id}`);
  }
  return {
    id: row.id,
    name: row.name,
    predicate,
    action: parseFilterAction(row.action),
    priority: row.priority,
    scope: row.show_id === null ? { kind: 'global' } : { kind: 'show', showId: row.show_id },
    enabled: Boolean(row.enabled),
    createdAt: row.created_at,
  };
}

export const filtersModel = {
  /** Every stored rule that can be read; unreadable rows are reported, not thrown. */
  load: (): LoadedRules => {
    const rows = db.prepare('SELECT * FROM filter_rules ORDER BY id').all() as FilterRuleRow[];
    const rules: FilterRule[] = [];
    const invalid: ConfigError[] = [];
    for (const row of rows) {
      try {
        rules.push(convertRule(row));
      } catch (error) {
        if (error instanceof ConfigError) {
          invalid.push(error);
        } else {
          throw error;
        }
      }
    }
    return { rules, overrides: filtersModel.getOverrides(), invalid };
  },

  getById: (id: number): FilterRule | undefined => {
    const row = db.prepare('SELECT * FROM filter_rules WHERE id = ?').get(id) as FilterRuleRow | undefined;
    return row ? convertRule(row) : undefined;
  },

  create: (rule: NewFilterRule): FilterRule => {
    const result = db
      .prepare(
        'INSERT INTO filter_rules (name, predicate, action, priority, show_id, enabled) VALUES (?, ?, ?, ?, ?, ?)'
      )
      .run(
        rule.name,
        JSON.stringify(rule.predicate),
        rule.action,
        rule.priority,
        rule.scope.kind === 'show' ? rule.scope.showId : null,
        rule.enabled ? 1 : 0
      );
    const created = filtersModel.getById(Number(result.lastInsertRowid));
    if (!created) {
      throw new Error(`Filter rule ${rule.name} was not persisted`);
    }
    return created;
  },

  update: (id: number, rule: Partial<NewFilterRule>): FilterRule | undefined => {
    const updates: string[] = [];
    const values: Array<string | number | null> = [];

    if (rule.name !== undefined) {
      updates.push('name = ?');
      values.push(rule.name);
    }
    if (rule.predicate !== undefined) {
      updates.push('predicate = ?');
      values.push(JSON.stringify(rule.predicate));
    }
    if (rule.action !== undefined) {
      updates.push('action = ?');
      values.push(rule.action);
    }
    if (rule.priority !== undefined) {
      updates.push('priority = ?');
      values.push(rule.priority);
    }
    if (rule.scope !== undefined) {
      updates.push('show_id = ?');
      values.push(rule.scope.kind === 'show' ? rule.scope.showId : null);
    }
    if (rule.enabled !== undefined) {
      updates.push('enabled = ?');
      values.push(rule.enabled ? 1 : 0);
    }

    if (updates.length > 0) {
      values.push(id);
      db.prepare(`UPDATE filter_rules SET ${updates.join(', ')} WHERE id = ?`).run(...values);
    }
    return filtersModel.getById(id);
  },

  delete: (id: number): boolean => {
    const result = db.prepare('DELETE FROM filter_rules WHERE id = ?').run(id);
    return result.changes > 0;
  },

  getOverrides: (): ShowRuleOverride[] => {
    const rows = db
      .prepare('SELECT show_id, rule_id FROM show_rule_overrides ORDER BY show_id, rule_id')
      .all() as Array<{ show_id: number; rule_id: number }>;
    return rows.map((row) => ({ showId: row.show_id, ruleId: row.rule_id }));
  },

  disableForShow: (ruleId: number, showId: number): void => {
    db.prepare('INSERT OR IGNORE INTO show_rule_overrides (show_id, rule_id) VALUES (?, ?)').run(showId, ruleId);
  },

  enableForShow: (ruleId: number, showId: number): boolean => {
    const result = db.prepare('DELETE FROM show_rule_overrides WHERE show_id = ? AND rule_id = ?').run(showId, ruleId);
    return result.changes > 0;
  },

  seedDefaults: (): number => {
    const row = db.prepare('SELECT COUNT(*) AS count FROM filter_rules').get() as { count: number };
    if (row.count > 0) {
      return 0;
    }
    const seed = db.transaction((rules: NewFilterRule[]) => {
      for (const rule of rules) {
        filtersModel.create(rule);
      }
    });
    seed(DEFAULT_FILTER_RULES);
    console.log(`Seeded ${DEFAULT_FILTER_RULES.length} default filter rules`);
    return DEFAULT_FILTER_RULES.length;
  },
};
