import { objectForKey, stringForKey, type JsonObject } from '../json';
import type { ResolverContext } from './ResolverContext';

export type ActionSurface = 'action' | 'browser_action' | 'page_action';

export interface ActionConfig {
  readonly surface: ActionSurface;
  /** The raw action entry, read again by the icon resolver */
  readonly entry: JsonObject;
  readonly label?: string;
  readonly popupPath?: string;
  /** `default_icon` given as a single path instead of a size table */
  readonly defaultIconPath?: string;
}

/** The action surface in use: `action` from version 3, else `browser_action` then `page_action`. */
export function actionSurface(context: ResolverContext): { surface: ActionSurface; entry: JsonObject } | undefined {
  const surfaces: ActionSurface[] = context.supportsManifestVersion(3) ? ['action'] : ['browser_action', 'page_action'];

  for (const surface of surfaces) {
    const entry = objectForKey(context.manifest, surface, { nilIfEmpty: false });
    if (entry) return { surface, entry };
  }
  return undefined;
}

export function resolveAction(context: ResolverContext): ActionConfig | undefined {
  const found = actionSurface(context);
  if (!found) return undefined;

  const { surface, entry } = found;
  return {
    surface,
    entry,
    label: stringForKey(entry, 'default_title'),
    popupPath: stringForKey(entry, 'default_popup'),
    defaultIconPath: stringForKey(entry, 'default_icon'),
  };
}

export function hasActionSurface(context: ResolverContext, surface: ActionSurface): boolean {
  const v3 = context.supportsManifestVersion(3);
  if ((surface === 'action') !== v3) return false;
  return !!objectForKey(context.manifest, surface, { nilIfEmpty: false });
}
