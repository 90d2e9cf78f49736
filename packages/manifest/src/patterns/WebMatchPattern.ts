import type { MatchPattern, MatchPatternEngine } from '../interfaces/MatchPattern';
import { globMatches } from './globMatches';

export const ALL_URLS_PATTERN = '<all_urls>';

const SUPPORTED_SCHEMES: ReadonlySet<string> = new Set(['*', 'http', 'https', 'ws', 'wss', 'file']);
const WILDCARD_SCHEMES: readonly string[] = ['http', 'https'];
const ALL_URLS_SCHEMES: ReadonlySet<string> = new Set(['http', 'https', 'ws', 'wss', 'file']);

// Multi-label registrable suffixes; any single-label host counts as a suffix too.
const KNOWN_PUBLIC_SUFFIXES: ReadonlySet<string> = new Set([
  'co.uk',
  'org.uk',
  'ac.uk',
  'gov.uk',
  'com.au',
  'net.au',
  'org.au',
  'co.jp',
  'ne.jp',
  'or.jp',
  'com.br',
  'com.cn',
  'co.nz',
  'co.in',
  'co.za',
  'com.mx',
  'github.io',
  'gitlab.io',
  'netlify.app',
  'vercel.app',
  'pages.dev',
  'appspot.com',
  'herokuapp.com',
  'blogspot.com',
]);

export type PublicSuffixPredicate = (host: string) => boolean;

export function isKnownPublicSuffix(host: string): boolean {
  if (host === 'localhost') return false;
  return !host.includes('.') || KNOWN_PUBLIC_SUFFIXES.has(host);
}

interface PatternParts {
  scheme: string;
  host: string;
  path: string;
}

/**
 * One URL match pattern: `<all_urls>` or `scheme://host/path`, where the host
 * is `*`, `*.` followed by a domain, or a literal host.
 */
export class WebMatchPattern implements MatchPattern {
  readonly key: string;
  readonly isSupported: boolean;
  readonly matchesAllURLs: boolean;
  readonly hostIsPublicSuffix: boolean;
  readonly expandedStrings: readonly string[];

  private constructor(
    private readonly parts: PatternParts | undefined,
    isPublicSuffix: PublicSuffixPredicate,
  ) {
    if (!parts) {
      this.key = ALL_URLS_PATTERN;
      this.isSupported = true;
      this.matchesAllURLs = true;
      this.hostIsPublicSuffix = true;
      this.expandedStrings = ['http://*/*', 'https://*/*', 'file:///*'];
      return;
    }

    const { scheme, host, path } = parts;
    this.key = `${scheme}://${host}${path}`;
    this.isSupported = SUPPORTED_SCHEMES.has(scheme);
    this.matchesAllURLs = scheme === '*' && host === '*' && path === '/*';
    this.hostIsPublicSuffix = host === '*' || (scheme !== 'file' && isPublicSuffix(host.replace(/^\*\./, '')));
    this.expandedStrings =
      scheme === '*' ? WILDCARD_SCHEMES.map((expanded) => `${expanded}://${host}${path}`) : [this.key];
  }

  static parse(pattern: string, isPublicSuffix: PublicSuffixPredicate = isKnownPublicSuffix): WebMatchPattern | undefined {
    if (pattern === ALL_URLS_PATTERN) return new WebMatchPattern(undefined, isPublicSuffix);

    const matched = pattern.match(/^(\*|[a-zA-Z][a-zA-Z0-9+.-]*):\/\/([^/]*)(\/.*)$/);
    if (!matched) return undefined;

    const scheme = matched[1].toLowerCase();
    const host = matched[2].toLowerCase();
    const path = matched[3];

    if (!host && scheme !== 'file') return undefined;
    if (host.includes('*') && host !== '*' && !/^\*\.[^*]+$/.test(host)) return undefined;

    return new WebMatchPattern({ scheme, host, path }, isPublicSuffix);
  }

  matchesURL(url: string | URL): boolean {
    let parsed: URL;
    try {
      parsed = typeof url === 'string' ? new URL(url) : url;
    } catch {
      return false;
    }

    const scheme = parsed.protocol.slice(0, -1);
    if (!this.parts) return ALL_URLS_SCHEMES.has(scheme);
    if (!this.isSupported) return false;

    const { scheme: patternScheme, host, path } = this.parts;
    if (patternScheme === '*' ? !WILDCARD_SCHEMES.includes(scheme) : patternScheme !== scheme) return false;
    if (!hostMatches(parsed.hostname.toLowerCase(), host)) return false;

    return globMatches(path, `${parsed.pathname}${parsed.search}`);
  }

  toString(): string {
    return this.key;
  }
}

function hostMatches(hostname: string, patternHost: string): boolean {
  if (patternHost === '*') return true;

  if (patternHost.startsWith('*.')) {
    const base = patternHost.slice(2);
    return hostname === base || hostname.endsWith(`.${base}`);
  }

  return hostname === patternHost;
}

/** Parses patterns into {@link WebMatchPattern}s, memoizing by string. */
export class WebMatchPatternEngine implements MatchPatternEngine {
  private readonly parsed = new Map<string, WebMatchPattern | undefined>();

  constructor(private readonly isPublicSuffix: PublicSuffixPredicate = isKnownPublicSuffix) {}

  parse(pattern: string): WebMatchPattern | undefined {
    if (this.parsed.has(pattern)) return this.parsed.get(pattern);
    const result = WebMatchPattern.parse(pattern, this.isPublicSuffix);
    this.parsed.set(pattern, result);
    return result;
  }
}
