/** `*` matches any run of characters, `?` exactly one. */
export type WildcardMatcher = (pattern: string, value: string) => boolean;
