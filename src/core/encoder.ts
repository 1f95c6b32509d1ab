import type {
  Body,
  Cassette,
  Headers,
  HttpInteraction,
  JsonValue,
  MatchRule,
} from '../types/index.js';

export type MatchRuleDocument = { substring: string } | { regex: string };

export type BodyDocument =
  | string
  | { string: string; encoding: string | null }
  | { json: JsonValue }
  | { matches: MatchRuleDocument[] };

export type HeadersDocument = Record<string, string[]>;

export interface InteractionDocument {
  request: {
    uri: string;
    body: BodyDocument;
    method: string;
    headers: HeadersDocument;
  };
  response: {
    body: BodyDocument;
    http_version: string;
    status: { code: number; message: string };
    headers: HeadersDocument;
  };
  recorded_at: string;
}

/**
 * Serializable cassette tree, in the shape `decodeCassette` accepts.
 */
export interface CassetteDocument {
  http_interactions: InteractionDocument[];
  recorded_with: string;
}

export function encodeCassette(cassette: Cassette): CassetteDocument {
  return {
    http_interactions: cassette.http_interactions.map(encodeInteraction),
    recorded_with: cassette.recorded_with,
  };
}

function encodeInteraction(interaction: HttpInteraction): InteractionDocument {
  const { request, response } = interaction;
  return {
    request: {
      uri: request.uri,
      body: encodeBody(request.body),
      method: request.method,
      headers: encodeHeaders(request.headers),
    },
    response: {
      body: encodeBody(response.body),
      http_version: response.http_version,
      status: { code: response.status.code, message: response.status.message },
      headers: encodeHeaders(response.headers),
    },
    recorded_at: interaction.recorded_at,
  };
}

function encodeHeaders(headers: Headers): HeadersDocument {
  return Object.fromEntries(
    Array.from(headers, ([name, values]): [string, string[]] => [name, [...values]])
  );
}

/**
 * Plain bodies, including the empty one, are written as bare strings.
 */
export function encodeBody(body: Body): BodyDocument {
  switch (body.kind) {
    case 'plain':
      return body.text;
    case 'encoded':
      return { string: body.text, encoding: body.encoding };
    case 'json':
      return { json: cloneJson(body.value) };
    case 'matches':
      return { matches: body.rules.map(encodeRule) };
    default: {
      const unreachable: never = body;
      return unreachable;
    }
  }
}

function encodeRule(rule: MatchRule): MatchRuleDocument {
  switch (rule.kind) {
    case 'substring':
      return { substring: rule.needle };
    case 'regex':
      return { regex: rule.pattern };
  }
}

function cloneJson(value: JsonValue): JsonValue {
  if (Array.isArray(value)) return value.map(cloneJson);
  if (value !== null && typeof value === 'object') {
    return Object.fromEntries(
      Object.entries(value).map(([key, item]): [string, JsonValue] => [key, cloneJson(item)])
    );
  }
  return value;
}
