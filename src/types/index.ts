export type MatchField = 'method' | 'uri' | 'body' | 'headers';
export type CassetteFormat = 'json' | 'yaml';

export interface CassetteToolConfig {
  capabilities: Capabilities;
  matching: MatchingConfig;
  format: CassetteFormat;
}

/**
 * Optional body and matcher variants. A disabled variant is rejected by the
 * decoder, the body builder and the body matcher.
 */
export interface Capabilities {
  json: boolean;
  matching: boolean;
  regex: boolean;
}

export interface MatchingConfig {
  matchOn: MatchField[];
  ignoreHeaders: string[];
}

export type JsonValue =
  | null
  | boolean
  | number
  | string
  | JsonValue[]
  | { [key: string]: JsonValue };

/** Header name to values, in recorded order. Names keep their case. */
export type Headers = ReadonlyMap<string, readonly string[]>;

export type MatchRule =
  | { readonly kind: 'substring'; readonly needle: string }
  | { readonly kind: 'regex'; readonly pattern: string };

export interface PlainBody {
  readonly kind: 'plain';
  readonly text: string;
}

/** A body stored with a text encoding label, e.g. `encoding: UTF-8`. */
export interface EncodedBody {
  readonly kind: 'encoded';
  readonly encoding: string | null;
  readonly text: string;
}

export interface JsonBody {
  readonly kind: 'json';
  readonly value: JsonValue;
}

/** Every rule must hold for a request body to match. */
export interface MatchListBody {
  readonly kind: 'matches';
  readonly rules: readonly MatchRule[];
}

export type Body = PlainBody | EncodedBody | JsonBody | MatchListBody;
export type ResponseBody = PlainBody | EncodedBody;

export interface Status {
  readonly code: number;
  readonly message: string;
}

export interface Request {
  readonly uri: string;
  readonly body: Body;
  readonly method: string;
  readonly headers: Headers;
}

export interface Response {
  readonly body: ResponseBody;
  readonly http_version: string;
  readonly status: Status;
  readonly headers: Headers;
}

export interface HttpInteraction {
  readonly request: Request;
  readonly response: Response;
  /** HTTP-date text, kept verbatim. */
  readonly recorded_at: string;
}

export interface Cassette {
  readonly http_interactions: readonly HttpInteraction[];
  readonly recorded_with: string;
}

/** A request seen on the wire, to be looked up in a cassette. */
export interface LiveRequest {
  method: string;
  uri: string;
  body?: string;
  headers?: Headers;
}
