/* packages/cli/src/program.ts */
import { Command, InvalidArgumentError } from 'commander';
import fs from 'fs-extra';
import path from 'node:path';
import pc from 'picocolors';
import { ConsoleLogger } from '@extent/core';
import { PLATFORMS, fromDirectory, isPlatform, type Platform } from '@extent/manifest';
import { buildReport, formatReport } from './report';

export interface InspectOptions {
  json?: boolean;
  platform: Platform;
  scales: number[];
  strict?: boolean;
  logs?: boolean;
  color: boolean;
}

export interface CliIO {
  stdout(text: string): void;
  stderr(text: string): void;
  setExitCode(code: number): void;
  /** Throw commander errors instead of exiting the process */
  exitOverride?: boolean;
}

export const processIO: CliIO = {
  stdout: (text) => process.stdout.write(text),
  stderr: (text) => process.stderr.write(text),
  setExitCode: (code) => {
    process.exitCode = code;
  },
};

export function parsePlatform(value: string): Platform {
  if (!isPlatform(value)) throw new InvalidArgumentError(`Expected one of ${PLATFORMS.join(', ')}.`);
  return value;
}

export function parseScales(value: string): number[] {
  const scales = value.split(',').map((part) => Number(part.trim()));
  if (!scales.length || scales.some((scale) => !Number.isFinite(scale) || scale <= 0)) {
    throw new InvalidArgumentError('Expected a comma-separated list of positive numbers, e.g. 1,2.');
  }
  return scales;
}

export function createProgram(io: CliIO = processIO): Command {
  const program = new Command();

  program
    .name('extent')
    .description('Resolve browser-extension manifests and report what the engine sees')
    .version('0.1.0')
    .configureOutput({ writeOut: io.stdout, writeErr: io.stderr });

  if (io.exitOverride) program.exitOverride();

  program
    .command('inspect')
    .description('Resolve the unpacked extension in <dir> and print its descriptor')
    .argument('<dir>', 'extension directory containing manifest.json')
    .option('--json', 'print the report as JSON')
    .option('-p, --platform <platform>', `platform to resolve for (${PLATFORMS.join(', ')})`, parsePlatform, 'mac')
    .option('-s, --scales <list>', 'display scales used for icon selection', parseScales, [1, 2])
    .option('--strict', 'exit with code 1 when any error was recorded')
    .option('--logs', 'print resolver debug logs')
    .option('--no-color', 'disable colored output')
    .action(async (dir: string, options: InspectOptions, command: Command) => {
      const directory = path.resolve(process.cwd(), dir);
      if (!(await fs.pathExists(path.join(directory, 'manifest.json')))) {
        command.error(`No manifest.json found in ${directory}`, { exitCode: 2, code: 'extent.missingManifest' });
      }

      const logger = new ConsoleLogger({ enableLogs: options.logs ?? false, write: (line) => io.stderr(`${line}\n`) });
      const descriptor = fromDirectory(directory, {
        platform: options.platform,
        displayScales: options.scales,
        logger,
      });

      const report = buildReport(descriptor, options.platform);
      io.stdout(
        options.json
          ? `${JSON.stringify(report, null, 2)}\n`
          : `${formatReport(report, pc.createColors(options.color && pc.isColorSupported))}\n`,
      );

      if (options.strict && report.errors.length) io.setExitCode(1);
    });

  return program;
}
