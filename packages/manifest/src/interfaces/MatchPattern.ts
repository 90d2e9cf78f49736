/**
 * A compiled URL match pattern. Instances come from a {@link MatchPatternEngine};
 * the resolvers only rely on this surface.
 */
export interface MatchPattern {
  /** Normalized string, used as the set key */
  readonly key: string;
  readonly isSupported: boolean;
  readonly matchesAllURLs: boolean;
  /** True when the host is `*` or a registrable public suffix */
  readonly hostIsPublicSuffix: boolean;
  /** Concrete patterns this one stands for, e.g. `*://` as http and https */
  readonly expandedStrings: readonly string[];
  matchesURL(url: string | URL): boolean;
  toString(): string;
}

export interface MatchPatternEngine {
  /** Undefined when the string is not a match pattern at all. */
  parse(pattern: string): MatchPattern | undefined;
}
