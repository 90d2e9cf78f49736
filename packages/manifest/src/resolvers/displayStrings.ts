import { ErrorKind } from '../errors';
import { stringForKey } from '../json';
import type { ResolverContext } from './ResolverContext';

export interface DisplayStrings {
  readonly name?: string;
  readonly shortName?: string;
  readonly version?: string;
  readonly displayVersion?: string;
  readonly description?: string;
}

export function resolveDisplayStrings({ manifest, record }: ResolverContext): DisplayStrings {
  const name = stringForKey(manifest, 'name');
  const shortName = stringForKey(manifest, 'short_name') ?? name;
  if (!name) record(ErrorKind.InvalidName);

  const version = stringForKey(manifest, 'version');
  const displayVersion = stringForKey(manifest, 'version_name') ?? version;
  if (!version) record(ErrorKind.InvalidVersion);

  const description = stringForKey(manifest, 'description');
  if (!description) record(ErrorKind.InvalidDescription);

  return { name, shortName, version, displayVersion, description };
}
