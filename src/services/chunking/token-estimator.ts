/**
 * Token Estimator
 *
 * Measures and slices text in generation-service tokens. The same estimator both
 * measures a section and cuts it into windows, so a window never measures above
 * the budget it was cut for.
 */

import { getEncoding, type Tiktoken } from 'js-tiktoken';
import { createComponentLogger } from '../../utils/logger.js';
import { CHARS_PER_TOKEN } from './types.js';

const logger = createComponentLogger('token-estimator');

/** UTF-8 encodes a character in at most four bytes, and every token holds at least one */
const MAX_TOKENS_PER_CHAR = 4;

export type TokenEstimatorKind = 'cl100k_base' | 'chars';

export interface TokenEstimator {
  readonly kind: TokenEstimatorKind;
  /** True when counts come from a real tokenizer */
  readonly exact: boolean;
  estimate(text: string): number;
  /**
   * Cut text into windows of `budget` tokens advancing by `budget - overlap`.
   * The last window may be shorter; no window lies wholly inside the previous one.
   */
  slice(text: string, budget: number, overlap: number): string[];
}

/**
 * Exact counts with the cl100k_base BPE encoding
 */
export class TiktokenEstimator implements TokenEstimator {
  readonly kind = 'cl100k_base' as const;
  readonly exact = true;

  constructor(private readonly encoding: Tiktoken) {}

  private encode(text: string): number[] {
    // Special-token markers in article text are ordinary text here
    return this.encoding.encode(text, [], []);
  }

  estimate(text: string): number {
    return this.encode(text).length;
  }

  /**
   * Window edges land on character boundaries, so a window never ends or starts
   * inside a character whose bytes span several tokens. A window is shortened
   * to stay within the budget; the next one starts at or after `end - overlap`.
   */
  slice(text: string, budget: number, overlap: number): string[] {
    const tokens = this.encode(text);
    const windows: string[] = [];
    let start = 0;

    while (start < tokens.length) {
      const end = this.windowEnd(tokens, start, budget);
      windows.push(this.encoding.decode(tokens.slice(start, end)));
      if (end >= tokens.length) {
        break;
      }
      start = this.nextStart(tokens, start, end, overlap);
    }

    return windows;
  }

  /**
   * True when cutting before tokens[index] splits no character: decoding both
   * sides separately gives the same text as decoding across the cut.
   */
  private isCharBoundary(tokens: readonly number[], index: number): boolean {
    if (index <= 0 || index >= tokens.length) {
      return true;
    }
    const from = Math.max(0, index - MAX_TOKENS_PER_CHAR);
    const to = Math.min(tokens.length, index + MAX_TOKENS_PER_CHAR);
    const left = this.encoding.decode(tokens.slice(from, index));
    const right = this.encoding.decode(tokens.slice(index, to));
    return left + right === this.encoding.decode(tokens.slice(from, to));
  }

  private windowEnd(tokens: readonly number[], start: number, budget: number): number {
    const limit = Math.min(start + budget, tokens.length);
    for (let end = limit; end > start; end--) {
      if (this.isCharBoundary(tokens, end)) {
        return end;
      }
    }
    // Budget below one character's token count: take the whole character
    let end = limit + 1;
    while (!this.isCharBoundary(tokens, end)) {
      end++;
    }
    return end;
  }

  private nextStart(tokens: readonly number[], start: number, end: number, overlap: number): number {
    let next = Math.max(end - overlap, start + 1);
    while (next < end && !this.isCharBoundary(tokens, next)) {
      next++;
    }
    return next;
  }
}

/**
 * Character-count fallback: one token per four characters.
 * Counts code points so windows never split a surrogate pair.
 */
export class CharEstimator implements TokenEstimator {
  readonly kind = 'chars' as const;
  readonly exact = false;

  estimate(text: string): number {
    return Math.ceil(Array.from(text).length / CHARS_PER_TOKEN);
  }

  slice(text: string, budget: number, overlap: number): string[] {
    const chars = Array.from(text);
    const size = budget * CHARS_PER_TOKEN;
    const stride = (budget - overlap) * CHARS_PER_TOKEN;
    const windows: string[] = [];
    for (let start = 0; start < chars.length; start += stride) {
      windows.push(chars.slice(start, start + size).join(''));
      if (start + size >= chars.length) {
        break;
      }
    }
    return windows;
  }
}

/**
 * Create the configured estimator, falling back to character counts when the
 * encoding cannot be loaded.
 */
export function createTokenEstimator(kind: TokenEstimatorKind = 'cl100k_base'): TokenEstimator {
  if (kind === 'chars') {
    return new CharEstimator();
  }

  try {
    return new TiktokenEstimator(getEncoding(kind));
  } catch (error) {
    logger.warn(
      { error: error instanceof Error ? error.message : String(error), encoding: kind },
      'Tokenizer unavailable, estimating 4 characters per token'
    );
    return new CharEstimator();
  }
}
