import type { CompareOp, FilterAction, NumericField, Predicate, TextField } from '../types/Filter';
import { ConfigError } from '../utils/errors';

export const TEXT_FIELDS: readonly TextField[] = ['title', 'show', 'group', 'resolution', 'origin', 'feed', 'extras'];
export const NUMERIC_FIELDS: readonly NumericField[] = ['resolution', 'episode', 'season', 'seeders'];
export const COMPARE_OPS: readonly CompareOp[] = ['<', '<=', '==', '>=', '>'];

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isTextField(value: unknown): value is TextField {
  return typeof value === 'string' && (TEXT_FIELDS as readonly string[]).includes(value);
}

function isNumericField(value: unknown): value is NumericField {
  return typeof value === 'string' && (NUMERIC_FIELDS as readonly string[]).includes(value);
}

function isCompareOp(value: unknown): value is CompareOp {
  return typeof value === 'string' && (COMPARE_OPS as readonly string[]).includes(value);
}

function textField(raw: Record<string, unknown>, path: string): TextField {
  if (!isTextField(raw.field)) {
    throw new ConfigError(`${path}.field must be one of ${TEXT_FIELDS.join(', ')}`, path);
  }
  return raw.field;
}

function stringValue(raw: Record<string, unknown>, key: string, path: string): string {
  const value = raw[key];
  if (typeof value !== 'string' || value.length === 0) {
    throw new ConfigError(`${path}.${key} must be a non-empty string`, path);
  }
  return value;
}

function predicateList(raw: Record<string, unknown>, path: string): Predicate[] {
  if (!Array.isArray(raw.predicates) || raw.predicates.length === 0) {
    throw new ConfigError(`${path}.predicates must be a non-empty array`, path);
  }
  return raw.predicates.map((p, i) => parsePredicate(p, `${path}.predicates[${i}]`));
}

/**
 * Validates an untrusted predicate definition (API body or stored JSON).
 * Regex patterns are compiled here so a bad pattern fails the rule, not the cycle.
 */
export function parsePredicate(raw: unknown, path = 'predicate'): Predicate {
  if (!isRecord(raw)) {
    throw new ConfigError(`${path} must be an object`, path);
  }

  switch (raw.kind) {
    case 'exact':
      return { kind: 'exact', field: textField(raw, path), value: stringValue(raw, 'value', path) };
    case 'contains':
      return { kind: 'contains', field: textField(raw, path), value: stringValue(raw, 'value', path) };
    case 'regex': {
      const pattern = stringValue(raw, 'pattern', path);
      try {
        new RegExp(pattern, 'i');
      } catch {
        throw new ConfigError(`${path}.pattern is not a valid regular expression: ${pattern}`, path);
      }
      return { kind: 'regex', field: textField(raw, path), pattern };
    }
    case 'compare': {
      if (!isNumericField(raw.field)) {
        throw new ConfigError(`${path}.field must be one of ${NUMERIC_FIELDS.join(', ')}`, path);
      }
      if (!isCompareOp(raw.op)) {
        throw new ConfigError(`${path}.op must be one of ${COMPARE_OPS.join(' ')}`, path);
      }
      if (typeof raw.value !== 'number' || !Number.isFinite(raw.value)) {
        throw new ConfigError(`${path}.value must be a number`, path);
      }
      return { kind: 'compare', field: raw.field, op: raw.op, value: raw.value };
    }
    case 'tracked':
      return { kind: 'tracked' };
    case 'minimumQuality':
      return { kind: 'minimumQuality' };
    case 'all':
      return { kind: 'all', predicates: predicateList(raw, path) };
    case 'any':
      return { kind: 'any', predicates: predicateList(raw, path) };
    case 'not':
      return { kind: 'not', predicate: parsePredicate(raw.predicate, `${path}.predicate`) };
    default:
      throw new ConfigError(`${path}.kind "${String(raw.kind)}" is not a known predicate`, path);
  }
}

export function parseFilterAction(raw: unknown): FilterAction {
  if (raw === 'accept' || raw === 'reject' || raw === 'prefer') return raw;
  throw new ConfigError(`action must be "accept", "reject" or "prefer"`, 'action');
}
