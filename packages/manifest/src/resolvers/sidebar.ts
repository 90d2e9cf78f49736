import { objectForKey, stringForKey } from '../json';
import type { ResolverContext } from './ResolverContext';

export interface SidebarConfig {
  readonly title?: string;
  readonly documentPath?: string;
}

/** `sidebar_action` wins over `side_panel`, which carries no title. */
export function resolveSidebar({ manifest }: ResolverContext): SidebarConfig | undefined {
  const sidebarAction = objectForKey(manifest, 'sidebar_action');
  if (sidebarAction) {
    return {
      title: stringForKey(sidebarAction, 'default_title'),
      documentPath: stringForKey(sidebarAction, 'default_panel'),
    };
  }

  const sidePanel = objectForKey(manifest, 'side_panel');
  if (sidePanel) return { documentPath: stringForKey(sidePanel, 'default_path') };

  return undefined;
}
