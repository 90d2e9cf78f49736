/**
 * @fileoverview Keyboard command resolution.
 *
 * Each `commands` entry becomes a {@link Command}. Shortcuts are parsed from
 * the platform's `suggested_key`, and at most {@link MAXIMUM_SHORTCUT_COMMANDS}
 * commands keep one. When the manifest declares an action but no command for
 * it, a command that opens the action is added.
 *
 * @module @extent/manifest/resolvers/commands
 */

import {
  ACTION_COMMAND_IDENTIFIER,
  BROWSER_ACTION_COMMAND_IDENTIFIER,
  MAXIMUM_SHORTCUT_COMMANDS,
  PAGE_ACTION_COMMAND_IDENTIFIER,
} from '../constants';
import { ErrorKind } from '../errors';
import type { Platform } from '../interfaces/DisplayEnvironment';
import { hasKey, isJsonObject, objectForKey, stringForKey, valueForKey } from '../json';
import { hasActionSurface } from './action';
import type { ResolverContext } from './ResolverContext';

export type CommandModifier = 'Command' | 'Option' | 'Control' | 'Shift';

export interface Command {
  readonly identifier: string;
  readonly description: string;
  /** Lowercased character or named-key code point; empty when unassigned */
  readonly activationKey: string;
  readonly modifiers: ReadonlySet<CommandModifier>;
}

export interface Shortcut {
  readonly activationKey: string;
  readonly modifiers: ReadonlySet<CommandModifier>;
}

const MODIFIERS: Readonly<Record<string, CommandModifier>> = {
  Ctrl: 'Command',
  Command: 'Command',
  Alt: 'Option',
  MacCtrl: 'Control',
  Shift: 'Shift',
};

/** Named keys and the code points they activate with. */
export const NAMED_KEYS: Readonly<Record<string, string>> = {
  Comma: ',',
  Period: '.',
  Space: ' ',
  F1: '\uF704',
  F2: '\uF705',
  F3: '\uF706',
  F4: '\uF707',
  F5: '\uF708',
  F6: '\uF709',
  F7: '\uF70A',
  F8: '\uF70B',
  F9: '\uF70C',
  F10: '\uF70D',
  F11: '\uF70E',
  F12: '\uF70F',
  Insert: '\uF727',
  Delete: '\uF728',
  Home: '\uF729',
  End: '\uF72B',
  PageUp: '\uF72C',
  PageDown: '\uF72D',
  Up: '\uF700',
  Down: '\uF701',
  Left: '\uF702',
  Right: '\uF703',
};

const UNASSIGNED: Shortcut = { activationKey: '', modifiers: new Set() };

/**
 * Parse `Modifier+Key` or `Modifier+Modifier+Key`. An empty string is a valid,
 * unassigned shortcut; anything malformed returns undefined.
 */
export function parseShortcut(shortcut: string): Shortcut | undefined {
  if (!shortcut) return UNASSIGNED;

  const parts = shortcut.split('+');
  if (parts.length < 2 || parts.length > 3) return undefined;

  const keyName = parts[parts.length - 1];
  if (Object.hasOwn(MODIFIERS, keyName)) return undefined;

  let activationKey: string;
  if (keyName.length === 1) {
    if (!/^[A-Za-z0-9]$/.test(keyName)) return undefined;
    activationKey = keyName.toLowerCase();
  } else {
    if (!Object.hasOwn(NAMED_KEYS, keyName)) return undefined;
    activationKey = NAMED_KEYS[keyName];
  }

  const modifiers = new Set<CommandModifier>();
  for (const part of parts.slice(0, -1)) {
    if (!Object.hasOwn(MODIFIERS, part)) return undefined;
    modifiers.add(MODIFIERS[part]);
  }

  if (!modifiers.size) return undefined;
  return { activationKey, modifiers };
}

const SUGGESTED_KEY_LOOKUP: Readonly<Record<Platform, readonly string[]>> = {
  mac: ['mac', 'ios'],
  ios: ['ios', 'mac'],
  visionos: ['ios', 'mac'],
  windows: ['windows'],
  linux: ['linux'],
  chromeos: ['chromeos'],
};

export const INVALID_COMMAND_IDENTIFIER = 'Empty or invalid identifier in the `commands` manifest entry.';
export const INVALID_COMMAND = 'Empty or invalid command in the `commands` manifest entry.';
export const INVALID_COMMAND_DESCRIPTION = 'Empty or invalid `description` in the `commands` manifest entry.';
export const INVALID_SUGGESTED_KEY = 'Invalid `suggested_key` in the `commands` manifest entry.';
export const TOO_MANY_SHORTCUTS = `Too many shortcuts specified for \`commands\`, only ${MAXIMUM_SHORTCUT_COMMANDS} shortcuts are allowed.`;

export interface CommandResolverInput {
  readonly actionLabel?: string;
  readonly shortName?: string;
}

export function resolveCommands(context: ResolverContext, input: CommandResolverInput): Command[] {
  const { manifest, record } = context;
  const v3 = context.supportsManifestVersion(3);

  const value = valueForKey(manifest, 'commands');
  if (hasKey(manifest, 'commands') && (!isJsonObject(value) || !Object.values(value).every(isJsonObject))) {
    record(ErrorKind.InvalidCommands);
    return [];
  }

  const entries = objectForKey(manifest, 'commands', { nilIfEmpty: false }) ?? {};
  const isActionCommand = (identifier: string) =>
    v3
      ? identifier === ACTION_COMMAND_IDENTIFIER
      : identifier === BROWSER_ACTION_COMMAND_IDENTIFIER || identifier === PAGE_ACTION_COMMAND_IDENTIFIER;

  const commands: Command[] = [];
  let assignedShortcuts = 0;
  let hasActionCommand = false;

  for (const identifier of Object.keys(entries)) {
    if (!identifier) {
      record(ErrorKind.InvalidCommands, INVALID_COMMAND_IDENTIFIER);
      continue;
    }

    const entry = objectForKey(entries, identifier);
    if (!entry) {
      record(ErrorKind.InvalidCommands, INVALID_COMMAND);
      continue;
    }

    const actionCommand = isActionCommand(identifier);
    if (actionCommand) hasActionCommand = true;

    // Action commands may leave out the description.
    let description = stringForKey(entry, 'description');
    if (!description && !actionCommand) {
      record(ErrorKind.InvalidCommands, INVALID_COMMAND_DESCRIPTION);
      continue;
    }
    if (!description) description = input.actionLabel || input.shortName || '';

    let shortcut = UNASSIGNED;
    const suggestedKeys = objectForKey(entry, 'suggested_key');
    if (suggestedKeys) {
      // The first platform key holding a string wins, even an empty one; only then is `default` read.
      const platformShortcut = SUGGESTED_KEY_LOOKUP[context.environment.platform]
        .map((platform) => suggestedKeys[platform])
        .find((key): key is string => typeof key === 'string');
      const text = platformShortcut || (stringForKey(suggestedKeys, 'default') ?? '');

      const parsed = parseShortcut(text);
      if (!parsed) {
        record(ErrorKind.InvalidCommands, INVALID_SUGGESTED_KEY);
        continue;
      }

      shortcut = parsed;
      if (shortcut.activationKey && ++assignedShortcuts > MAXIMUM_SHORTCUT_COMMANDS) {
        record(ErrorKind.InvalidCommands, TOO_MANY_SHORTCUTS);
        shortcut = UNASSIGNED;
      }
    }

    commands.push({ identifier, description, activationKey: shortcut.activationKey, modifiers: shortcut.modifiers });
  }

  if (!hasActionCommand) {
    const identifier = syntheticActionCommandIdentifier(context);
    if (identifier) {
      commands.push({
        identifier,
        description: input.actionLabel || input.shortName || '',
        activationKey: '',
        modifiers: new Set(),
      });
    }
  }

  return commands;
}

function syntheticActionCommandIdentifier(context: ResolverContext): string | undefined {
  if (hasActionSurface(context, 'action')) return ACTION_COMMAND_IDENTIFIER;
  if (hasActionSurface(context, 'browser_action')) return BROWSER_ACTION_COMMAND_IDENTIFIER;
  if (hasActionSurface(context, 'page_action')) return PAGE_ACTION_COMMAND_IDENTIFIER;
  return undefined;
}
