import type {
  Body,
  Capabilities,
  EncodedBody,
  HttpInteraction,
  JsonBody,
  JsonValue,
  MatchListBody,
  MatchRule,
  PlainBody,
} from '../types/index.js';
import { DEFAULT_CAPABILITIES } from '../config/defaults.js';
import { SchemaError } from './errors.js';
import { decodeJsonValue } from './decoder.js';

export function plainBody(text = ''): PlainBody {
  return { kind: 'plain', text };
}

export function encodedBody(text: string, encoding: string | null = null): EncodedBody {
  return { kind: 'encoded', encoding, text };
}

export interface BodyBuilder {
  plain(text?: string): PlainBody;
  encoded(text: string, encoding?: string | null): EncodedBody;
  json(value: JsonValue): JsonBody;
  matches(rules: readonly MatchRule[]): MatchListBody;
  substring(needle: string): MatchRule;
  regex(pattern: string): MatchRule;
}

/**
 * Body and rule constructors for one capability set. Constructing a variant
 * whose capability is disabled throws a `SchemaError`, and so does a json
 * value that cannot be written as JSON.
 */
export function createBodyBuilder(capabilities: Capabilities = DEFAULT_CAPABILITIES): BodyBuilder {
  const unavailable = (variant: string, capability: keyof Capabilities): SchemaError =>
    new SchemaError('', `unsupported body variant "${variant}" (${capability} capability disabled)`);

  return {
    plain: plainBody,
    encoded: encodedBody,
    json(value) {
      if (!capabilities.json) throw unavailable('json', 'json');
      return { kind: 'json', value: decodeJsonValue(value) };
    },
    matches(rules) {
      if (!capabilities.matching) throw unavailable('matches', 'matching');
      return { kind: 'matches', rules: [...rules] };
    },
    substring(needle) {
      if (!capabilities.matching) throw unavailable('substring', 'matching');
      return { kind: 'substring', needle };
    },
    regex(pattern) {
      if (!capabilities.matching) throw unavailable('regex', 'matching');
      if (!capabilities.regex) throw unavailable('regex', 'regex');
      return { kind: 'regex', pattern };
    },
  };
}

function ruleToString(rule: MatchRule): string {
  switch (rule.kind) {
    case 'substring':
      return `substring(${JSON.stringify(rule.needle)})`;
    case 'regex':
      return `regex(${JSON.stringify(rule.pattern)})`;
  }
}

/**
 * Render a body as text. Encoded bodies with an encoding are prefixed with
 * `(<encoding>)`.
 */
export function bodyToString(body: Body): string {
  switch (body.kind) {
    case 'plain':
      return body.text;
    case 'encoded':
      return body.encoding === null ? body.text : `(${body.encoding})${body.text}`;
    case 'json':
      return JSON.stringify(body.value);
    case 'matches':
      return `[${body.rules.map(ruleToString).join(', ')}]`;
    default: {
      const unreachable: never = body;
      return unreachable;
    }
  }
}

/**
 * Parse `recorded_at` as an HTTP date. Returns null when the text is not a date.
 */
export function recordedAtDate(interaction: HttpInteraction): Date | null {
  const time = Date.parse(interaction.recorded_at);
  return Number.isNaN(time) ? null : new Date(time);
}
