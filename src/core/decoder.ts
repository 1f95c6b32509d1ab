import type {
  Body,
  Capabilities,
  Cassette,
  Headers,
  HttpInteraction,
  JsonValue,
  MatchRule,
  Request,
  Response,
  ResponseBody,
  Status,
} from '../types/index.js';
import { DEFAULT_CAPABILITIES } from '../config/defaults.js';
import { SchemaError } from './errors.js';

type DocumentMap = Record<string, unknown>;

const IDENTIFIER = /^[A-Za-z_$][\w$]*$/;

function isMap(value: unknown): value is DocumentMap {
  if (typeof value !== 'object' || value === null || Array.isArray(value)) return false;
  const proto: unknown = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}

function describeValue(value: unknown): string {
  if (value === null) return 'null';
  if (Array.isArray(value)) return 'list';
  if (isMap(value)) return 'mapping';
  return typeof value;
}

function childPath(path: string, key: string | number): string {
  if (typeof key === 'number') return `${path}[${key}]`;
  if (!IDENTIFIER.test(key)) return `${path}[${JSON.stringify(key)}]`;
  return path ? `${path}.${key}` : key;
}

function expectMap(value: unknown, path: string): DocumentMap {
  if (!isMap(value)) {
    throw new SchemaError(path, `expected a mapping, got ${describeValue(value)}`);
  }
  return value;
}

function requireField(map: DocumentMap, key: string, path: string): unknown {
  const value = map[key];
  if (value === undefined || value === null) {
    throw new SchemaError(childPath(path, key), 'missing required field');
  }
  return value;
}

function expectString(value: unknown, path: string): string {
  if (typeof value !== 'string') {
    throw new SchemaError(path, `expected a string, got ${describeValue(value)}`);
  }
  return value;
}

function requireString(map: DocumentMap, key: string, path: string): string {
  return expectString(requireField(map, key, path), childPath(path, key));
}

/**
 * Decodes a cassette document (the tree produced by a JSON or YAML parser)
 * into a `Cassette`. Throws `SchemaError` naming the first field that does
 * not fit.
 */
export function decodeCassette(
  document: unknown,
  capabilities: Capabilities = DEFAULT_CAPABILITIES
): Cassette {
  return new CassetteDecoder(capabilities).cassette(document);
}

class CassetteDecoder {
  constructor(private readonly capabilities: Capabilities) {}

  cassette(document: unknown): Cassette {
    const map = expectMap(document, '');
    const interactions = requireField(map, 'http_interactions', '');
    if (!Array.isArray(interactions)) {
      throw new SchemaError('http_interactions', `expected a list, got ${describeValue(interactions)}`);
    }

    return {
      http_interactions: interactions.map((item, i) =>
        this.interaction(item, childPath('http_interactions', i))
      ),
      recorded_with: requireString(map, 'recorded_with', ''),
    };
  }

  private interaction(value: unknown, path: string): HttpInteraction {
    const map = expectMap(value, path);
    return {
      request: this.request(requireField(map, 'request', path), childPath(path, 'request')),
      response: this.response(requireField(map, 'response', path), childPath(path, 'response')),
      recorded_at: requireString(map, 'recorded_at', path),
    };
  }

  private request(value: unknown, path: string): Request {
    const map = expectMap(value, path);
    return {
      uri: requireString(map, 'uri', path),
      body: this.body(map.body, childPath(path, 'body')),
      method: requireString(map, 'method', path),
      headers: this.headers(map.headers, childPath(path, 'headers')),
    };
  }

  private response(value: unknown, path: string): Response {
    const map = expectMap(value, path);
    return {
      body: this.responseBody(map.body, childPath(path, 'body')),
      http_version: requireString(map, 'http_version', path),
      status: this.status(requireField(map, 'status', path), childPath(path, 'status')),
      headers: this.headers(map.headers, childPath(path, 'headers')),
    };
  }

  private status(value: unknown, path: string): Status {
    const map = expectMap(value, path);
    const code = requireField(map, 'code', path);
    if (typeof code !== 'number' || !Number.isInteger(code)) {
      throw new SchemaError(childPath(path, 'code'), `expected an integer, got ${describeValue(code)}`);
    }
    return { code, message: requireString(map, 'message', path) };
  }

  private headers(value: unknown, path: string): Headers {
    const headers = new Map<string, readonly string[]>();
    if (value === undefined || value === null) return headers;

    for (const [name, values] of Object.entries(expectMap(value, path))) {
      const valuePath = childPath(path, name);
      if (!Array.isArray(values)) {
        throw new SchemaError(valuePath, `expected a list of strings, got ${describeValue(values)}`);
      }
      headers.set(
        name,
        values.map((v, i) => expectString(v, childPath(valuePath, i)))
      );
    }
    return headers;
  }

  private responseBody(value: unknown, path: string): ResponseBody {
    const body = this.body(value, path);
    if (body.kind === 'json' || body.kind === 'matches') {
      throw new SchemaError(path, `response bodies cannot use the "${body.kind}" form`);
    }
    return body;
  }

  private body(value: unknown, path: string): Body {
    if (value === undefined || value === null) return { kind: 'plain', text: '' };
    if (typeof value === 'string') return { kind: 'plain', text: value };
    if (!isMap(value)) {
      throw new SchemaError(path, `expected a string or mapping, got ${describeValue(value)}`);
    }

    const keys = Object.keys(value);
    if (keys.length === 1 && keys[0] === 'json') {
      if (!this.capabilities.json) {
        throw new SchemaError(path, 'unsupported body variant "json" (json capability disabled)');
      }
      return { kind: 'json', value: decodeJsonValue(value.json, childPath(path, 'json')) };
    }

    if (keys.length === 1 && keys[0] === 'matches') {
      if (!this.capabilities.matching) {
        throw new SchemaError(path, 'unsupported body variant "matches" (matching capability disabled)');
      }
      const rules = value.matches;
      const rulesPath = childPath(path, 'matches');
      if (!Array.isArray(rules)) {
        throw new SchemaError(rulesPath, `expected a list of matchers, got ${describeValue(rules)}`);
      }
      return {
        kind: 'matches',
        rules: rules.map((rule, i) => this.matchRule(rule, childPath(rulesPath, i))),
      };
    }

    if ('string' in value && keys.every((k) => k === 'string' || k === 'encoding')) {
      const encoding = value.encoding ?? null;
      return {
        kind: 'encoded',
        encoding: encoding === null ? null : expectString(encoding, childPath(path, 'encoding')),
        text: expectString(value.string, childPath(path, 'string')),
      };
    }

    throw new SchemaError(
      path,
      `unknown body shape with keys [${keys.join(', ')}], expected ${this.bodyShapes()}`
    );
  }

  private bodyShapes(): string {
    const shapes = ['a string'];
    if (this.capabilities.json) shapes.push('{json}');
    if (this.capabilities.matching) shapes.push('{matches}');
    shapes.push('{string, encoding}');
    return shapes.join(', ');
  }

  private matchRule(value: unknown, path: string): MatchRule {
    const map = expectMap(value, path);
    const keys = Object.keys(map);
    if (keys.length !== 1) {
      throw new SchemaError(path, `expected exactly one matcher kind, got [${keys.join(', ')}]`);
    }

    const [kind] = keys;
    const argumentPath = childPath(path, kind);
    switch (kind) {
      case 'substring':
        return { kind: 'substring', needle: expectString(map[kind], argumentPath) };
      case 'regex': {
        if (!this.capabilities.regex) {
          throw new SchemaError(path, 'unsupported matcher "regex" (regex capability disabled)');
        }
        const pattern = expectString(map[kind], argumentPath);
        try {
          new RegExp(pattern);
        } catch (error) {
          throw new SchemaError(
            argumentPath,
            `invalid regular expression: ${error instanceof Error ? error.message : String(error)}`
          );
        }
        return { kind: 'regex', pattern };
      }
      default:
        throw new SchemaError(path, `unsupported matcher "${kind}"`);
    }
  }
}

/**
 * Check that a value is plain JSON and return a fresh copy of it. Object keys
 * are copied as own properties, `__proto__` included.
 */
export function decodeJsonValue(value: unknown, path = ''): JsonValue {
  if (value === null || typeof value === 'string' || typeof value === 'boolean') {
    return value;
  }
  if (typeof value === 'number') {
    if (!Number.isFinite(value)) {
      throw new SchemaError(path, `number ${value} is not representable as JSON`);
    }
    return value;
  }
  if (Array.isArray(value)) {
    return value.map((item, i) => decodeJsonValue(item, childPath(path, i)));
  }
  if (isMap(value)) {
    return Object.fromEntries(
      Object.entries(value).map(([key, item]): [string, JsonValue] => [
        key,
        decodeJsonValue(item, childPath(path, key)),
      ])
    );
  }
  throw new SchemaError(path, `${describeValue(value)} is not representable as JSON`);
}
