import type { Body, Capabilities, JsonValue, MatchRule } from '../types/index.js';
import { DEFAULT_CAPABILITIES } from '../config/defaults.js';
import { MatchError } from './errors.js';

const UTF8_LABEL = /^utf-?8$/i;

/**
 * Check a live request body against a recorded body.
 *
 * - plain: exact text equality
 * - encoded: exact text equality when the encoding is absent or UTF-8
 * - json: the candidate parses as JSON and is structurally equal
 * - matches: every rule holds
 *
 * Throws `MatchError` for a rule that cannot be evaluated or a variant whose
 * capability is disabled.
 */
export function matchBody(
  recorded: Body,
  candidate: string,
  capabilities: Capabilities = DEFAULT_CAPABILITIES
): boolean {
  switch (recorded.kind) {
    case 'plain':
      return candidate === recorded.text;
    case 'encoded':
      if (recorded.encoding !== null && !UTF8_LABEL.test(recorded.encoding)) {
        return false;
      }
      return candidate === recorded.text;
    case 'json': {
      if (!capabilities.json) {
        throw new MatchError('unsupported matcher "json" (json capability disabled)');
      }
      let parsed: unknown;
      try {
        parsed = JSON.parse(candidate);
      } catch {
        return false;
      }
      return jsonEquals(recorded.value, parsed);
    }
    case 'matches':
      if (!capabilities.matching) {
        throw new MatchError('unsupported matcher "matches" (matching capability disabled)');
      }
      return recorded.rules.every((rule) => matchRule(rule, candidate, capabilities));
    default: {
      const unreachable: never = recorded;
      return unreachable;
    }
  }
}

export function matchRule(
  rule: MatchRule,
  candidate: string,
  capabilities: Capabilities = DEFAULT_CAPABILITIES
): boolean {
  switch (rule.kind) {
    case 'substring':
      return candidate.includes(rule.needle);
    case 'regex': {
      if (!capabilities.regex) {
        throw new MatchError('unsupported matcher "regex" (regex capability disabled)', { rule });
      }
      let pattern: RegExp;
      try {
        pattern = new RegExp(rule.pattern);
      } catch (error) {
        throw new MatchError(`invalid regular expression: ${rule.pattern}`, { rule, cause: error });
      }
      return pattern.test(candidate);
    }
  }
}

/**
 * Structural equality of a JSON value and a parsed candidate. Object key order
 * is ignored; array order is not.
 */
export function jsonEquals(expected: JsonValue, actual: unknown): boolean {
  if (expected === null || typeof expected !== 'object') {
    return expected === actual;
  }

  if (Array.isArray(expected)) {
    return (
      Array.isArray(actual) &&
      actual.length === expected.length &&
      expected.every((item, i) => jsonEquals(item, actual[i]))
    );
  }

  if (typeof actual !== 'object' || actual === null || Array.isArray(actual)) {
    return false;
  }

  const expectedKeys = Object.keys(expected);
  const actualEntries = new Map(Object.entries(actual));
  if (expectedKeys.length !== actualEntries.size) return false;

  return expectedKeys.every(
    (key) => actualEntries.has(key) && jsonEquals(expected[key], actualEntries.get(key))
  );
}
