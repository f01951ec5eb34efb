import type { Buffer } from 'node:buffer';

import { decodeUtf8 } from '../utf8.js';
import { HeaderTagType } from './header-types.js';

export type HeaderTagEntry = readonly [tag: HeaderTagType, span: Buffer];

/**
 * Tag kind to byte-span map. Spans are views into the parsed buffer; entries
 * iterate in {@link HeaderTagType} order regardless of insertion order.
 */
export class HeaderTags implements Iterable<HeaderTagEntry> {
  private readonly spans: readonly HeaderTagEntry[];

  private constructor(spans: readonly HeaderTagEntry[]) {
    this.spans = spans;
  }

  static from(entries: Iterable<HeaderTagEntry>): HeaderTags {
    const sorted = [...entries].sort(([a], [b]) => a - b);
    for (let i = 1; i < sorted.length; i++) {
      const previous = sorted[i - 1];
      const current = sorted[i];
      if (previous !== undefined && current !== undefined && previous[0] === current[0]) {
        throw new RangeError(`Duplicate header tag: ${HeaderTagType[current[0]]}`);
      }
    }
    return new HeaderTags(sorted);
  }

  get size(): number {
    return this.spans.length;
  }

  get(tag: HeaderTagType): Buffer | undefined {
    return this.spans.find(([key]) => key === tag)?.[1];
  }

  getString(tag: HeaderTagType): string | undefined {
    const span = this.get(tag);
    return span === undefined ? undefined : decodeUtf8(span);
  }

  has(tag: HeaderTagType): boolean {
    return this.spans.some(([key]) => key === tag);
  }

  keys(): HeaderTagType[] {
    return this.spans.map(([key]) => key);
  }

  entries(): IterableIterator<HeaderTagEntry> {
    return this.spans[Symbol.iterator]();
  }

  [Symbol.iterator](): IterableIterator<HeaderTagEntry> {
    return this.entries();
  }

  toJSON(): Record<string, string> {
    const result: Record<string, string> = {};
    for (const [tag, span] of this.spans) {
      result[HeaderTagType[tag]] = decodeUtf8(span);
    }
    return result;
  }
}
