import type {
  Capabilities,
  Cassette,
  Headers,
  HttpInteraction,
  LiveRequest,
  MatchField,
  MatchingConfig,
} from '../types/index.js';
import { DEFAULT_CAPABILITIES, DEFAULT_CONFIG } from '../config/defaults.js';
import { matchBody } from './body-matcher.js';

export interface MatchResult {
  interaction: HttpInteraction;
  /** Position in `http_interactions` */
  index: number;
  matchedBy: MatchField[];
}

/**
 * Finds the recorded interactions that answer a live request.
 */
export class InteractionMatcher {
  private config: MatchingConfig;
  private ignoredHeaders: Set<string>;
  private capabilities: Capabilities;

  constructor(
    config: Partial<MatchingConfig> = {},
    capabilities: Capabilities = DEFAULT_CAPABILITIES
  ) {
    this.config = {
      matchOn: config.matchOn ?? DEFAULT_CONFIG.matching.matchOn,
      ignoreHeaders: config.ignoreHeaders ?? DEFAULT_CONFIG.matching.ignoreHeaders,
    };
    this.capabilities = capabilities;

    this.ignoredHeaders = new Set(
      this.config.ignoreHeaders.map((h) => h.toLowerCase())
    );
  }

  /**
   * First matching interaction in recording order
   */
  findMatch(request: LiveRequest, cassette: Cassette): HttpInteraction | null {
    for (const interaction of cassette.http_interactions) {
      if (this.matches(request, interaction)) {
        return interaction;
      }
    }
    return null;
  }

  /**
   * All matching interactions, in recording order
   */
  findAllMatches(request: LiveRequest, cassette: Cassette): MatchResult[] {
    const results: MatchResult[] = [];

    cassette.http_interactions.forEach((interaction, index) => {
      if (this.matches(request, interaction)) {
        results.push({ interaction, index, matchedBy: [...this.config.matchOn] });
      }
    });

    return results;
  }

  /**
   * Check a single interaction. Body rules that cannot be evaluated throw
   * `MatchError`.
   */
  matches(request: LiveRequest, interaction: HttpInteraction): boolean {
    const recorded = interaction.request;

    return this.config.matchOn.every((field): boolean => {
      switch (field) {
        case 'method':
          return request.method.toLowerCase() === recorded.method.toLowerCase();
        case 'uri':
          return request.uri === recorded.uri;
        case 'body':
          return matchBody(recorded.body, request.body ?? '', this.capabilities);
        case 'headers':
          return this.matchHeaders(request.headers ?? new Map(), recorded.headers);
      }
    });
  }

  /**
   * Every recorded header that is not ignored must be present on the live
   * request with the same values, in order. Names compare case-insensitively.
   */
  private matchHeaders(liveHeaders: Headers, recordedHeaders: Headers): boolean {
    const live = new Map<string, readonly string[]>();
    for (const [name, values] of liveHeaders) {
      live.set(name.toLowerCase(), values);
    }

    for (const [name, values] of recordedHeaders) {
      const key = name.toLowerCase();
      if (this.ignoredHeaders.has(key)) continue;

      const liveValues = live.get(key);
      if (
        liveValues === undefined ||
        liveValues.length !== values.length ||
        values.some((value, i) => value !== liveValues[i])
      ) {
        return false;
      }
    }

    return true;
  }

  /**
   * Get current matching configuration
   */
  getConfig(): MatchingConfig {
    return {
      matchOn: [...this.config.matchOn],
      ignoreHeaders: [...this.config.ignoreHeaders],
    };
  }
}
