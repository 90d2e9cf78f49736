/**
 * @fileoverview Background content resolution.
 *
 * A `background` entry names up to three candidates (a script list, a page and
 * a service worker) of which exactly one ends up authoritative. The optional
 * `preferred_environment` list picks the environment first; otherwise the
 * default precedence applies. Both precedence orders are decision tables.
 *
 * @module @extent/manifest/resolvers/background
 */

import { decisionTable, otherwise, type DecisionTable } from '@extent/core';
import { GENERATED_BACKGROUND_PAGE_PATH, GENERATED_SERVICE_WORKER_PATH, RESTRICTED_BACKGROUND_PLATFORMS } from '../constants';
import { ErrorKind } from '../errors';
import {
  booleanForKey,
  hasKey,
  nonEmptyStrings,
  objectForKey,
  stringArrayForKey,
  stringForKey,
  valueForKey,
  type JsonObject,
} from '../json';
import type { ResolverContext } from './ResolverContext';

export const BackgroundEnvironment = {
  Document: 'document',
  ServiceWorker: 'service_worker',
} as const;

export type BackgroundEnvironment = (typeof BackgroundEnvironment)[keyof typeof BackgroundEnvironment];

export interface BackgroundContent {
  readonly environment: BackgroundEnvironment;
  readonly scriptPaths: readonly string[];
  readonly pagePath?: string;
  readonly serviceWorkerPath?: string;
  readonly usesModules: boolean;
  readonly isPersistent: boolean;
}

/** Candidates read from the manifest, before precedence is applied. */
export interface BackgroundCandidates {
  readonly scriptPaths: readonly string[];
  readonly pagePath?: string;
  readonly serviceWorkerPath?: string;
}

export interface EnvironmentOutcome {
  readonly environment: BackgroundEnvironment;
  readonly scriptPaths: readonly string[];
  readonly pagePath?: string;
  readonly serviceWorkerPath?: string;
  /** Set when the preferred environment had nothing to run */
  readonly error?: string;
}

const SUPPORTED_ENVIRONMENTS: readonly BackgroundEnvironment[] = [
  BackgroundEnvironment.Document,
  BackgroundEnvironment.ServiceWorker,
];

export const MISSING_DOCUMENT_CONTENT =
  'Manifest `background` entry has missing or empty required `page` or `scripts` key for `preferred_environment` of `document`.';
export const MISSING_SERVICE_WORKER_CONTENT =
  'Manifest `background` entry has missing or empty required `service_worker` or `scripts` key for `preferred_environment` of `service_worker`.';
export const MISSING_BACKGROUND_CONTENT =
  'Manifest `background` entry has missing or empty required `scripts`, `page`, or `service_worker` key.';
export const INVALID_PREFERRED_ENVIRONMENT =
  'Manifest `background` entry has an empty or invalid `preferred_environment` key.';

const hasScripts = (candidates: BackgroundCandidates) => candidates.scriptPaths.length > 0;

/** Preferred `document`: page, then scripts; the service worker never applies. */
export const documentPreference: DecisionTable<BackgroundCandidates, EnvironmentOutcome> = decisionTable([
  {
    label: 'page',
    when: (candidates) => !!candidates.pagePath,
    then: ({ pagePath }) => ({ environment: BackgroundEnvironment.Document, scriptPaths: [], pagePath }),
  },
  {
    label: 'scripts',
    when: hasScripts,
    then: ({ scriptPaths }) => ({ environment: BackgroundEnvironment.Document, scriptPaths }),
  },
  otherwise('missing', ({ scriptPaths }) => ({
    environment: BackgroundEnvironment.Document,
    scriptPaths,
    error: MISSING_DOCUMENT_CONTENT,
  })),
]);

/** Preferred `service_worker`: service worker, then scripts; the page never applies. */
export const serviceWorkerPreference: DecisionTable<BackgroundCandidates, EnvironmentOutcome> = decisionTable([
  {
    label: 'service worker',
    when: (candidates) => !!candidates.serviceWorkerPath,
    then: ({ serviceWorkerPath }) => ({
      environment: BackgroundEnvironment.ServiceWorker,
      scriptPaths: [],
      serviceWorkerPath,
    }),
  },
  {
    label: 'scripts',
    when: hasScripts,
    then: ({ scriptPaths }) => ({ environment: BackgroundEnvironment.ServiceWorker, scriptPaths }),
  },
  otherwise('missing', ({ scriptPaths }) => ({
    environment: BackgroundEnvironment.ServiceWorker,
    scriptPaths,
    error: MISSING_SERVICE_WORKER_CONTENT,
  })),
]);

/** No preference: scripts beat page and service worker, page beats service worker. */
export const defaultPrecedence: DecisionTable<BackgroundCandidates, EnvironmentOutcome> = decisionTable<BackgroundCandidates, EnvironmentOutcome>([
  {
    label: 'scripts',
    when: hasScripts,
    then: ({ scriptPaths }) => ({ environment: BackgroundEnvironment.Document, scriptPaths }),
  },
  {
    label: 'page',
    when: (candidates) => !!candidates.pagePath,
    then: ({ pagePath }) => ({ environment: BackgroundEnvironment.Document, scriptPaths: [], pagePath }),
  },
  {
    label: 'service worker',
    when: (candidates) => !!candidates.serviceWorkerPath,
    then: ({ serviceWorkerPath }) => ({
      environment: BackgroundEnvironment.ServiceWorker,
      scriptPaths: [],
      serviceWorkerPath,
    }),
  },
  otherwise('missing', () => ({
    environment: BackgroundEnvironment.Document,
    scriptPaths: [],
    error: MISSING_BACKGROUND_CONTENT,
  })),
]);

const preferenceTables: Record<BackgroundEnvironment, DecisionTable<BackgroundCandidates, EnvironmentOutcome>> = {
  [BackgroundEnvironment.Document]: documentPreference,
  [BackgroundEnvironment.ServiceWorker]: serviceWorkerPreference,
};

function isSupportedEnvironment(value: string): value is BackgroundEnvironment {
  return SUPPORTED_ENVIRONMENTS.some((environment) => environment === value);
}

/**
 * Read `preferred_environment`. Undefined means no preference applies; an
 * error is recorded when the key holds neither a string nor a string list.
 */
export function readPreferredEnvironments(
  background: JsonObject,
  record: ResolverContext['record'],
): BackgroundEnvironment[] | undefined {
  const single = stringForKey(background, 'preferred_environment');
  if (single !== undefined) return isSupportedEnvironment(single) ? [single] : undefined;

  const list = stringArrayForKey(background, 'preferred_environment');
  if (list) return [...new Set(list.filter(isSupportedEnvironment))];

  if (hasKey(background, 'preferred_environment')) {
    record(ErrorKind.InvalidBackgroundContent, INVALID_PREFERRED_ENVIRONMENT);
  }
  return undefined;
}

export interface BackgroundResolverInput {
  hasRequestedPermission(permission: string): boolean;
}

/**
 * Resolve the `background` entry. Returns undefined when the manifest has no
 * usable background content.
 */
export function resolveBackground(
  context: ResolverContext,
  { hasRequestedPermission }: BackgroundResolverInput,
): BackgroundContent | undefined {
  const { manifest, record } = context;

  const background = objectForKey(manifest, 'background');
  if (!background) {
    if (hasKey(manifest, 'background')) record(ErrorKind.InvalidBackgroundContent);
    return undefined;
  }

  const candidates: BackgroundCandidates = {
    scriptPaths: nonEmptyStrings(stringArrayForKey(background, 'scripts')),
    pagePath: stringForKey(background, 'page'),
    serviceWorkerPath: stringForKey(background, 'service_worker'),
  };
  const usesModules = valueForKey(background, 'type') === 'module';

  // The first recognized preference decides, even when it has nothing to run.
  const preferred = readPreferredEnvironments(background, record)?.[0];
  const outcome = preferred
    ? preferenceTables[preferred].evaluate(candidates)
    : defaultPrecedence.evaluate(candidates);
  if (!outcome) return undefined;
  if (outcome.error) record(ErrorKind.InvalidBackgroundContent, outcome.error);

  const isPersistent = resolvePersistence(context, background, outcome, hasRequestedPermission);

  if (!outcome.scriptPaths.length && !outcome.pagePath && !outcome.serviceWorkerPath) return undefined;

  return {
    environment: outcome.environment,
    scriptPaths: outcome.scriptPaths,
    pagePath: outcome.pagePath,
    serviceWorkerPath: outcome.serviceWorkerPath,
    usesModules,
    isPersistent,
  };
}

export const PERSISTENT_MANIFEST_V3 =
  'Invalid `persistent` manifest entry. A `manifest_version` greater-than or equal to `3` must be non-persistent.';
export const PERSISTENT_SERVICE_WORKER = 'Invalid `persistent` manifest entry. A `service_worker` must be non-persistent.';
export const NON_PERSISTENT_WEB_REQUEST = 'Non-persistent background content cannot listen to `webRequest` events.';
export const PERSISTENT_RESTRICTED_PLATFORM =
  'Invalid `persistent` manifest entry. A non-persistent background is required on this platform.';

function resolvePersistence(
  context: ResolverContext,
  background: JsonObject,
  outcome: EnvironmentOutcome,
  hasRequestedPermission: (permission: string) => boolean,
): boolean {
  const { record } = context;
  const v3 = context.supportsManifestVersion(3);
  const usesServiceWorker = !!outcome.serviceWorkerPath;

  let persistent = booleanForKey(background, 'persistent') ?? !(v3 || usesServiceWorker);

  if (persistent && v3) {
    record(ErrorKind.InvalidBackgroundPersistence, PERSISTENT_MANIFEST_V3);
    persistent = false;
  }

  if (persistent && usesServiceWorker) {
    record(ErrorKind.InvalidBackgroundPersistence, PERSISTENT_SERVICE_WORKER);
    persistent = false;
  }

  if (!persistent && hasRequestedPermission('webRequest')) {
    record(ErrorKind.InvalidBackgroundPersistence, NON_PERSISTENT_WEB_REQUEST);
  }

  if (persistent && RESTRICTED_BACKGROUND_PLATFORMS.has(context.environment.platform)) {
    record(ErrorKind.InvalidBackgroundPersistence, PERSISTENT_RESTRICTED_PLATFORM);
  }

  return persistent;
}

/** Path the runtime loads: the service worker, the generated resource or the page. */
export function backgroundContentPath(content: BackgroundContent | undefined): string | undefined {
  if (!content) return undefined;
  if (content.serviceWorkerPath) return content.serviceWorkerPath;
  if (content.scriptPaths.length) {
    return content.environment === BackgroundEnvironment.ServiceWorker
      ? GENERATED_SERVICE_WORKER_PATH
      : GENERATED_BACKGROUND_PAGE_PATH;
  }
  return content.pagePath;
}

/**
 * Loader for a script-only background: a service worker importing each script,
 * or a page with one script element per script, in manifest order.
 */
export function generateBackgroundContent(content: BackgroundContent | undefined): string | undefined {
  if (!content || content.pagePath || content.serviceWorkerPath || !content.scriptPaths.length) return undefined;

  const isServiceWorker = content.environment === BackgroundEnvironment.ServiceWorker;
  const lines = content.scriptPaths.map((path) => {
    if (isServiceWorker) return content.usesModules ? `import "./${path}";` : `importScripts("${path}");`;
    return content.usesModules ? `<script type="module" src="${path}"></script>` : `<script src="${path}"></script>`;
  });

  if (isServiceWorker) return lines.join('\n');
  return `<!DOCTYPE html>\n<body>\n${lines.join('\n')}\n</body>`;
}
