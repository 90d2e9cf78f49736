import type { WildcardMatcher } from '../interfaces/WildcardMatcher';

const compiled = new Map<string, RegExp>();

function toRegExp(pattern: string): RegExp {
  const cached = compiled.get(pattern);
  if (cached) return cached;

  const escaped = pattern.replace(/[.+^${}()|[\]\\]/g, '\\$&');
  const regex = new RegExp(`^${escaped.replace(/\*/g, '.*').replace(/\?/g, '.')}$`, 's');
  compiled.set(pattern, regex);
  return regex;
}

export const globMatches: WildcardMatcher = (pattern, value) => toRegExp(pattern).test(value);
