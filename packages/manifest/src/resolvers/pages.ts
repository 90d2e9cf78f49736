import { ErrorKind } from '../errors';
import { hasKey, objectForKey, stringForKey } from '../json';
import type { ResolverContext } from './ResolverContext';

export interface ExtensionPages {
  readonly optionsPagePath?: string;
  readonly overrideNewTabPagePath?: string;
  readonly devtoolsPagePath?: string;
}

export const INVALID_NEW_TAB_OVERRIDE = 'Empty or invalid `newtab` manifest entry.';

export function resolvePages(context: ResolverContext): ExtensionPages {
  const { manifest, record } = context;

  let optionsPagePath: string | undefined;
  const optionsUI = objectForKey(manifest, 'options_ui', { nilIfEmpty: false });
  if (optionsUI) {
    optionsPagePath = stringForKey(optionsUI, 'page');
    if (!optionsPagePath) record(ErrorKind.InvalidOptionsPage);
  } else {
    optionsPagePath = stringForKey(manifest, 'options_page');
    if (!optionsPagePath && hasKey(manifest, 'options_page')) record(ErrorKind.InvalidOptionsPage);
  }

  const overrides =
    objectForKey(manifest, 'browser_url_overrides', { nilIfEmpty: false }) ??
    objectForKey(manifest, 'chrome_url_overrides', { nilIfEmpty: false });
  if (overrides && !Object.keys(overrides).length) record(ErrorKind.InvalidURLOverrides);

  const overrideNewTabPagePath = stringForKey(overrides, 'newtab');
  if (!overrideNewTabPagePath && hasKey(overrides, 'newtab')) {
    record(ErrorKind.InvalidURLOverrides, INVALID_NEW_TAB_OVERRIDE);
  }

  return { optionsPagePath, overrideNewTabPagePath, devtoolsPagePath: stringForKey(manifest, 'devtools_page') };
}
