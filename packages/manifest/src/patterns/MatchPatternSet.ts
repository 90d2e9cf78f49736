import type { MatchPattern } from '../interfaces/MatchPattern';

export interface ReadonlyMatchPatternSet extends Iterable<MatchPattern> {
  readonly size: number;
  has(pattern: MatchPattern | string): boolean;
  values(): MatchPattern[];
  /** Normalized keys in insertion order */
  keys(): string[];
  matchesURL(url: string | URL): boolean;
}

/**
 * Patterns keyed by their normalized string; the first instance of a key is
 * kept. Resolvers {@link freeze} the sets they hand out.
 */
export class MatchPatternSet implements ReadonlyMatchPatternSet {
  private readonly patterns = new Map<string, MatchPattern>();
  private frozen = false;

  constructor(patterns: Iterable<MatchPattern> = []) {
    for (const pattern of patterns) this.add(pattern);
  }

  get size(): number {
    return this.patterns.size;
  }

  get isFrozen(): boolean {
    return this.frozen;
  }

  /** @throws TypeError once the set is frozen */
  add(pattern: MatchPattern): boolean {
    if (this.frozen) throw new TypeError(`Cannot add "${pattern.key}" to a frozen MatchPatternSet`);
    if (this.patterns.has(pattern.key)) return false;
    this.patterns.set(pattern.key, pattern);
    return true;
  }

  has(pattern: MatchPattern | string): boolean {
    return this.patterns.has(typeof pattern === 'string' ? pattern : pattern.key);
  }

  values(): MatchPattern[] {
    return [...this.patterns.values()];
  }

  keys(): string[] {
    return [...this.patterns.keys()];
  }

  matchesURL(url: string | URL): boolean {
    return this.values().some((pattern) => pattern.matchesURL(url));
  }

  freeze(): ReadonlyMatchPatternSet {
    this.frozen = true;
    return this;
  }

  [Symbol.iterator](): Iterator<MatchPattern> {
    return this.patterns.values();
  }

  static union(...sets: Iterable<MatchPattern>[]): MatchPatternSet {
    const result = new MatchPatternSet();
    for (const set of sets) for (const pattern of set) result.add(pattern);
    return result;
  }
}
