/**
 * Tag Build Context
 *
 * Numeric-prefix to tag mapping for one run. Filled by a sequential priming
 * pass, then frozen and shared read-only with every per-file extraction task.
 */

import { logger } from '../logger';
import { normalizeNumber, type TagVocabulary } from './patterns';

export class TagBuildContext {
  readonly vocabulary: TagVocabulary;

  private readonly numberToTag = new Map<string, string>();
  private readonly ambiguousNumbers = new Set<string>();
  private frozen = false;

  constructor(vocabulary: TagVocabulary) {
    this.vocabulary = vocabulary;
  }

  /**
   * Record that a numeric prefix belongs to a tag. A second, different tag for
   * the same number makes the number ambiguous and it will never resolve.
   */
  register(digits: string, tag: string, sourceFilename: string): void {
    if (this.frozen) {
      throw new Error('TagBuildContext is frozen; register() is only valid during priming');
    }

    const number = normalizeNumber(digits);
    if (this.ambiguousNumbers.has(number)) return;

    const existing = this.numberToTag.get(number);
    if (existing === undefined) {
      this.numberToTag.set(number, tag);
      logger.debug('Registered numeric prefix', { number, tag, source_filename: sourceFilename });
      return;
    }

    if (existing !== tag) {
      this.numberToTag.delete(number);
      this.ambiguousNumbers.add(number);
      logger.warn('Numeric prefix maps to more than one tag', {
        number,
        tags: [existing, tag],
        source_filename: sourceFilename,
      });
    }
  }

  resolve(digits: string): string | undefined {
    return this.numberToTag.get(normalizeNumber(digits));
  }

  isAmbiguous(digits: string): boolean {
    return this.ambiguousNumbers.has(normalizeNumber(digits));
  }

  freeze(): this {
    this.frozen = true;
    return this;
  }

  get isFrozen(): boolean {
    return this.frozen;
  }

  /** Mapping entries sorted by number, for diagnostics */
  entries(): Array<[string, string]> {
    return Array.from(this.numberToTag.entries()).sort(
      ([a], [b]) => parseInt(a, 10) - parseInt(b, 10)
    );
  }
}
