import type { Logger } from '../observability/logger';
import { silentLogger } from '../observability/logger';
import { assertThreshold } from './errors';
import type { IndexHandle } from './index-handle';
import type { IndexStats, MatchResult, SearchHit } from './types';

export const DEFAULT_INTENT_THRESHOLD = 0.5;
export const DEFAULT_FALLBACK_RESPONSE = "I'm not sure how to help with that. Can you rephrase?";

export interface IntentMatcherOptions {
  threshold?: number;
  fallbackResponse?: string;
  /** Returns a number in [0, 1); used to pick among several responses. */
  random?: () => number;
  logger?: Logger;
}

export class IntentMatcher {
  readonly threshold: number;
  private readonly fallbackResponse: string;
  private readonly random: () => number;
  private readonly logger: Logger;

  constructor(private readonly handle: IndexHandle, options: IntentMatcherOptions = {}) {
    const threshold = options.threshold ?? DEFAULT_INTENT_THRESHOLD;
    assertThreshold(threshold);
    this.threshold = threshold;
    this.fallbackResponse = options.fallbackResponse ?? DEFAULT_FALLBACK_RESPONSE;
    this.random = options.random ?? Math.random;
    this.logger = options.logger ?? silentLogger;
  }

  get loaded(): boolean {
    return this.handle.isLoaded;
  }

  async search(query: string, k: number): Promise<SearchHit[]> {
    return this.handle.current().search(query, k);
  }

  async match(query: string, k = 5, threshold?: number): Promise<MatchResult> {
    const effective = threshold ?? this.threshold;
    assertThreshold(effective);

    const [best] = await this.search(query, k);
    if (!best) {
      return { matched: false };
    }
    return { matched: best.score >= effective, best };
  }

  async matchIntent(query: string, k = 5): Promise<SearchHit | undefined> {
    const result = await this.match(query, k);
    if (!result.matched) {
      this.logger.debug('No intent above threshold', {
        threshold: this.threshold,
        bestScore: result.best?.score
      });
      return undefined;
    }
    return result.best;
  }

  async searchIntents(query: string, k = 10, minScore?: number): Promise<SearchHit[]> {
    if (minScore !== undefined) {
      assertThreshold(minScore, 'minScore');
    }
    const hits = await this.search(query, k);
    return minScore === undefined ? hits : hits.filter((hit) => hit.score >= minScore);
  }

  async getResponse(query: string, randomize = true): Promise<string> {
    const hit = await this.matchIntent(query);
    const responses = hit?.record.responses ?? [];
    if (responses.length === 0) {
      return this.fallbackResponse;
    }
    if (!randomize || responses.length === 1) {
      return responses[0];
    }
    const choice = Math.min(responses.length - 1, Math.floor(this.random() * responses.length));
    return responses[choice];
  }

  async getIntentTag(query: string): Promise<string | undefined> {
    const hit = await this.matchIntent(query);
    return hit?.record.tag;
  }

  stats(): IndexStats {
    const index = this.handle.peek();
    if (!index) {
      return { loaded: false, threshold: this.threshold };
    }
    const { modelName, dimension, totalVectors } = index.config;
    return { loaded: true, totalVectors, dimension, modelName, threshold: this.threshold };
  }
}
