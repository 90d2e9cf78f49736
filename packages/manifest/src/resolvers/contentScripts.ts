import { ErrorKind } from '../errors';
import type { MatchPatternEngine } from '../interfaces/MatchPattern';
import type { WildcardMatcher } from '../interfaces/WildcardMatcher';
import { booleanForKey, hasKey, nonEmptyStrings, objectArrayForKey, stringArrayForKey, stringForKey, type JsonObject } from '../json';
import { MatchPatternSet, type ReadonlyMatchPatternSet } from '../patterns/MatchPatternSet';
import type { ResolverContext } from './ResolverContext';

export type InjectionTime = 'document_start' | 'document_end' | 'document_idle';
export type ContentWorld = 'isolated' | 'main';
export type StyleLevel = 'author' | 'user';

export interface InjectedContentRule {
  readonly includePatterns: ReadonlyMatchPatternSet;
  readonly excludePatterns: ReadonlyMatchPatternSet;
  readonly includeGlobs: readonly string[];
  readonly excludeGlobs: readonly string[];
  readonly scriptPaths: readonly string[];
  readonly styleSheetPaths: readonly string[];
  readonly matchesAboutBlank: boolean;
  readonly allFrames: boolean;
  readonly injectionTime: InjectionTime;
  readonly world: ContentWorld;
  readonly styleLevel: StyleLevel;
}

export const MISSING_MATCHES = 'Manifest `content_scripts` entry has no specified `matches` entry.';
export const MISSING_SCRIPTS_AND_STYLES = "Manifest `content_scripts` entry has missing or empty 'js' and 'css' arrays.";
export const UNKNOWN_RUN_AT = 'Manifest `content_scripts` entry has unknown `run_at` value.';
export const UNKNOWN_WORLD = 'Manifest `content_scripts` entry has unknown `world` value.';
export const UNKNOWN_CSS_ORIGIN = 'Manifest `content_scripts` entry has unknown `css_origin` value.';

const INJECTION_TIMES: Readonly<Record<string, InjectionTime>> = {
  document_start: 'document_start',
  document_end: 'document_end',
  document_idle: 'document_idle',
};

const WORLDS: Readonly<Record<string, ContentWorld>> = { ISOLATED: 'isolated', MAIN: 'main' };
const STYLE_LEVELS: Readonly<Record<string, StyleLevel>> = { author: 'author', user: 'user' };

/** Injection rules in manifest order, which is also the injection order. */
export function resolveContentScripts(context: ResolverContext): InjectedContentRule[] {
  const { manifest, record } = context;

  const entries = objectArrayForKey(manifest, 'content_scripts');
  if (!entries) {
    if (hasKey(manifest, 'content_scripts')) record(ErrorKind.InvalidContentScripts);
    return [];
  }

  const rules: InjectedContentRule[] = [];
  for (const entry of entries) {
    const rule = resolveRule(entry, context);
    if (rule) rules.push(rule);
  }
  return rules;
}

function resolveRule(entry: JsonObject, { patterns, record }: ResolverContext): InjectedContentRule | undefined {
  const includePatterns = supportedPatterns(stringArrayForKey(entry, 'matches'), patterns);
  if (!includePatterns.size) {
    record(ErrorKind.InvalidContentScripts, MISSING_MATCHES);
    return undefined;
  }

  const scriptPaths = nonEmptyStrings(stringArrayForKey(entry, 'js'));
  const styleSheetPaths = nonEmptyStrings(stringArrayForKey(entry, 'css'));
  if (!scriptPaths.length && !styleSheetPaths.length) {
    record(ErrorKind.InvalidContentScripts, MISSING_SCRIPTS_AND_STYLES);
    return undefined;
  }

  const runAt = stringForKey(entry, 'run_at');
  let injectionTime: InjectionTime = 'document_idle';
  if (runAt !== undefined) {
    if (Object.hasOwn(INJECTION_TIMES, runAt)) injectionTime = INJECTION_TIMES[runAt];
    else record(ErrorKind.InvalidContentScripts, UNKNOWN_RUN_AT);
  }

  const worldName = stringForKey(entry, 'world');
  let world: ContentWorld = 'isolated';
  if (worldName !== undefined) {
    if (Object.hasOwn(WORLDS, worldName)) world = WORLDS[worldName];
    else record(ErrorKind.InvalidContentScripts, UNKNOWN_WORLD);
  }

  const cssOrigin = stringForKey(entry, 'css_origin')?.toLowerCase();
  let styleLevel: StyleLevel = 'author';
  if (cssOrigin !== undefined) {
    if (Object.hasOwn(STYLE_LEVELS, cssOrigin)) styleLevel = STYLE_LEVELS[cssOrigin];
    else record(ErrorKind.InvalidContentScripts, UNKNOWN_CSS_ORIGIN);
  }

  return {
    includePatterns,
    excludePatterns: supportedPatterns(stringArrayForKey(entry, 'exclude_matches'), patterns),
    includeGlobs: nonEmptyStrings(stringArrayForKey(entry, 'include_globs')),
    excludeGlobs: nonEmptyStrings(stringArrayForKey(entry, 'exclude_globs')),
    scriptPaths,
    styleSheetPaths,
    matchesAboutBlank: booleanForKey(entry, 'match_about_blank') ?? false,
    allFrames: booleanForKey(entry, 'all_frames') ?? false,
    injectionTime,
    world,
    styleLevel,
  };
}

function supportedPatterns(values: string[] | undefined, engine: MatchPatternEngine): ReadonlyMatchPatternSet {
  const result = new MatchPatternSet();
  for (const value of nonEmptyStrings(values)) {
    const pattern = engine.parse(value);
    if (pattern?.isSupported) result.add(pattern);
  }
  return result.freeze();
}

/**
 * Whether any rule injects into `url`: no exclude pattern or exclude glob
 * matches, an include pattern does, and so does one of the include globs when
 * there are any.
 */
export function ruleAppliesToURL(rule: InjectedContentRule, url: string | URL, matches: WildcardMatcher): boolean {
  const href = typeof url === 'string' ? url : url.href;

  if (rule.excludePatterns.matchesURL(url)) return false;
  if (rule.excludeGlobs.some((glob) => matches(glob, href))) return false;
  if (!rule.includePatterns.matchesURL(url)) return false;
  return !rule.includeGlobs.length || rule.includeGlobs.some((glob) => matches(glob, href));
}

/** Every include pattern expanded to concrete strings, for runtimes that take strings. */
export function expandedIncludePatternStrings(rule: InjectedContentRule): string[] {
  return rule.includePatterns.values().flatMap((pattern) => [...pattern.expandedStrings]);
}
