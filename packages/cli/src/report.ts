/* packages/cli/src/report.ts */
import pc from 'picocolors';
import { NAMED_KEYS, type Command, type ManifestDescriptor, type Platform } from '@extent/manifest';

type Palette = ReturnType<typeof pc.createColors>;

export interface InspectionReport {
  name?: string;
  version?: string;
  displayVersion?: string;
  description?: string;
  manifestVersion: number;
  platform: Platform;
  background?: {
    environment: string;
    path?: string;
    persistent: boolean;
    modules: boolean;
  };
  action?: { label?: string; popup?: string };
  permissions: string[];
  optionalPermissions: string[];
  hostPatterns: string[];
  optionalHostPatterns: string[];
  commands: { id: string; shortcut: string; description: string }[];
  contentScripts: { matches: string[]; scripts: string[]; styles: string[]; runAt: string }[];
  rulesets: { id: string; enabled: boolean; path: string }[];
  contentSecurityPolicy?: string;
  errors: { kind: string; message: string }[];
}

const MODIFIER_ORDER = ['Control', 'Option', 'Shift', 'Command'] as const;

/** `Command+Shift+Y` style text for a command's shortcut; empty when unassigned. */
export function describeShortcut(command: Command): string {
  if (!command.activationKey) return '';

  const named = Object.entries(NAMED_KEYS).find(([, value]) => value === command.activationKey)?.[0];
  const key = named ?? command.activationKey.toUpperCase();
  return [...MODIFIER_ORDER.filter((modifier) => command.modifiers.has(modifier)), key].join('+');
}

export function buildReport(descriptor: ManifestDescriptor, platform: Platform): InspectionReport {
  // Forces every field so the error list is complete.
  const errors = descriptor.errors().map((error) => ({ kind: error.kind, message: error.message }));
  const background = descriptor.backgroundContent();

  return {
    name: descriptor.displayName(),
    version: descriptor.version(),
    displayVersion: descriptor.displayVersion(),
    description: descriptor.displayDescription(),
    manifestVersion: descriptor.manifestVersion(),
    platform,
    background: background && {
      environment: background.environment,
      path: descriptor.backgroundContentPath(),
      persistent: background.isPersistent,
      modules: background.usesModules,
    },
    action:
      descriptor.hasAction() || descriptor.hasBrowserAction() || descriptor.hasPageAction()
        ? { label: descriptor.displayActionLabel(), popup: descriptor.actionPopupPath() }
        : undefined,
    permissions: [...descriptor.requestedPermissions()],
    optionalPermissions: [...descriptor.optionalPermissions()],
    hostPatterns: descriptor.requestedPermissionMatchPatterns().keys(),
    optionalHostPatterns: descriptor.optionalPermissionMatchPatterns().keys(),
    commands: descriptor.commands().map((command) => ({
      id: command.identifier,
      shortcut: describeShortcut(command),
      description: command.description,
    })),
    contentScripts: descriptor.staticInjectedContents().map((rule) => ({
      matches: rule.includePatterns.keys(),
      scripts: [...rule.scriptPaths],
      styles: [...rule.styleSheetPaths],
      runAt: rule.injectionTime,
    })),
    rulesets: descriptor.declarativeNetRequestRulesets().map(({ id, enabled, path }) => ({ id, enabled, path })),
    contentSecurityPolicy: descriptor.manifestParsedSuccessfully() ? descriptor.contentSecurityPolicy() : undefined,
    errors,
  };
}

function section(colors: Palette, title: string, lines: string[]): string[] {
  if (!lines.length) return [];
  return ['', colors.bold(title), ...lines.map((line) => `  ${line}`)];
}

/** Human-readable report. Pass `createColors(false)` for plain text. */
export function formatReport(report: InspectionReport, colors: Palette = pc): string {
  const heading = [report.name ?? colors.red('(unnamed)'), report.displayVersion && colors.dim(report.displayVersion)]
    .filter(Boolean)
    .join(' ');

  const lines = [
    colors.bold(heading),
    `Manifest version ${report.manifestVersion} on ${report.platform}`,
    ...(report.description ? [report.description] : []),
  ];

  const { background, action } = report;
  if (background) {
    const traits = [background.persistent ? 'persistent' : 'non-persistent', ...(background.modules ? ['modules'] : [])];
    const where = [background.environment, background.path].filter(Boolean).join(' ');
    lines.push(...section(colors, 'Background', [`${where} (${traits.join(', ')})`]));
  }
  if (action) {
    lines.push(
      ...section(colors, 'Action', [
        ...(action.label ? [`label: ${action.label}`] : []),
        ...(action.popup ? [`popup: ${action.popup}`] : []),
      ]),
    );
  }

  lines.push(
    ...section(colors, 'Permissions', report.permissions),
    ...section(colors, 'Optional permissions', report.optionalPermissions),
    ...section(colors, 'Host patterns', report.hostPatterns),
    ...section(colors, 'Optional host patterns', report.optionalHostPatterns),
    ...section(
      colors,
      'Commands',
      report.commands.map(({ id, shortcut, description }) =>
        [colors.cyan(id), shortcut && colors.yellow(shortcut), description].filter(Boolean).join('  '),
      ),
    ),
    ...section(
      colors,
      'Content scripts',
      report.contentScripts.map(
        ({ matches, scripts, styles, runAt }) => `${matches.join(', ')} → ${[...scripts, ...styles].join(', ')} @ ${runAt}`,
      ),
    ),
    ...section(
      colors,
      'Rulesets',
      report.rulesets.map(({ id, enabled, path }) => `${id} ${enabled ? colors.green('enabled') : colors.dim('disabled')} ${path}`),
    ),
  );

  if (report.contentSecurityPolicy) lines.push(...section(colors, 'Content security policy', [report.contentSecurityPolicy]));

  lines.push('');
  if (report.errors.length) {
    lines.push(colors.red(colors.bold(`${report.errors.length} error(s)`)));
    lines.push(...report.errors.map(({ kind, message }) => `  ${colors.red('✖')} ${colors.dim(kind)} ${message}`));
  } else {
    lines.push(colors.green('✔ No errors'));
  }

  return lines.join('\n');
}
