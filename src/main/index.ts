#!/usr/bin/env node
/**
 * albumsmith - command-line entry point
 *
 * Loads the album in the working folder (or --folder), runs one command over
 * its tracks and prints a report. Exit code 1 means at least one track
 * failed, 2 means the command line was wrong.
 */

import * as fs from 'fs';
import * as path from 'path';
import { parseArgs } from 'util';
import { ExportFormat } from '../shared/types';
import { Album } from './models/album';
import {
  BatchReport,
  TrackAction,
  clearTrack,
  defaultExportFolder,
  exportCarTrack,
  exportTrack,
  renameTrack,
  runForAllTracks,
  updateTrackTags,
  validateTrack,
} from './services/albumActions';
import { generateAlbumDefinition } from './services/albumGenerator';
import { definitionPath, saveAlbumDefinition, serializeAlbumDefinition } from './services/definitionLoader';
import { DefinitionError, isAlbumError } from './services/errors';
import { Logger, formatConsoleLine } from './services/logger';
import { SettingsManager, parseSettingAssignment, serializeSettings } from './services/settingsManager';

export const USAGE = `Usage: albumsmith <command> [options]

Commands:
  show                       Print the album definition as YAML
  list                       List the album's tracks with their canonical names
  update                     Write tags into every track
  validate                   Check every track's tags against the definition
  clear                      Remove the tags of every track
  rename                     Move tracks to their canonical paths
  export [output]            Copy the album to output (see --format, --root)
  generate                   Draft extras/album.yaml from the tagged MP3s
  config [key value]         Show settings, or change one

Options:
  -f, --folder <dir>         Album folder (default: current directory)
      --dry-run              rename: only report what would move
      --format <full|car|vw> export: album layout or flat car layout, vw = car (default: full)
      --root <dir>           export: output is <root>/<artist>/<album>
      --force                generate: overwrite an existing definition
      --reset                config: restore the defaults
  -h, --help                 Show this help`;

/** Where the CLI reads settings, writes logs and prints */
export interface CliEnvironment {
  cwd: string;
  settingsDir?: string;
  logDir?: string;
  writeLogFile?: boolean;
  stdout: (line: string) => void;
  stderr: (line: string) => void;
}

function defaultEnvironment(): CliEnvironment {
  return {
    cwd: process.cwd(),
    stdout: (line) => process.stdout.write(`${line}\n`),
    stderr: (line) => process.stderr.write(`${line}\n`),
  };
}

const ARG_OPTIONS = {
  folder: { type: 'string', short: 'f' },
  'dry-run': { type: 'boolean' },
  format: { type: 'string' },
  root: { type: 'string' },
  force: { type: 'boolean' },
  reset: { type: 'boolean' },
  help: { type: 'boolean', short: 'h' },
} as const;

function parseCommandLine(argv: string[]) {
  return parseArgs({ args: argv, options: ARG_OPTIONS, allowPositionals: true, strict: true });
}

type ParsedArgs = ReturnType<typeof parseCommandLine>;

// ─── Output ──────────────────────────────────────────────────────────────────

/**
 * @example formatReport(report) === 'update: 3 done, 1 skipped, 0 failed (4 tracks)'
 */
export function formatReport(report: BatchReport): string {
  return `${report.action}: ${report.succeeded} done, ${report.skipped} skipped, ${report.failures.length} failed (${report.total} tracks)`;
}

/** Album header followed by one line per track, grouped by disc folder */
export function formatAlbumListing(album: Album): string[] {
  const details = [album.artist().value(), album.year()?.toString(), album.genre()?.value()].filter(
    (detail): detail is string => detail !== undefined && detail.length > 0,
  );
  const lines = [details.length > 0 ? `${album.title().value()} (${details.join(', ')})` : album.title().value()];

  for (const disc of album.discs()) {
    const folder = disc.folderName();
    const indent = folder === null ? '  ' : '    ';
    if (folder !== null) {
      lines.push(`  ${folder}/`);
    }
    for (const track of disc.tracks()) {
      const artist = track.albumArtists() === null ? '' : `  [${track.artist().value()}]`;
      lines.push(`${indent}${track.canonicalFilename()}${artist}`);
    }
  }
  return lines;
}

// ─── Commands ────────────────────────────────────────────────────────────────

async function runConfig(args: ParsedArgs, settings: SettingsManager, env: CliEnvironment): Promise<number> {
  const [, key, value] = args.positionals;

  if (args.values.reset) {
    await settings.reset();
  } else if (key !== undefined) {
    const update = value === undefined ? null : parseSettingAssignment(key, value);
    if (update === null) {
      env.stderr(value === undefined ? `Missing value for "${key}"` : `Unknown setting "${key}"`);
      return 2;
    }
    await settings.save(update);
  }

  env.stdout(serializeSettings(settings.get()));
  return 0;
}

async function runGenerate(folder: string, args: ParsedArgs, env: CliEnvironment): Promise<number> {
  if (!args.values.force && fs.existsSync(definitionPath(folder))) {
    env.stderr(`${definitionPath(folder)} already exists (use --force to overwrite)`);
    return 1;
  }
  const definition = await generateAlbumDefinition(folder);
  const filePath = await saveAlbumDefinition(folder, definition);
  env.stdout(`Wrote ${filePath}`);
  return 0;
}

function exportFormat(value: string | undefined): ExportFormat | null {
  if (value === undefined || value === 'full') return 'full';
  if (value === 'car' || value === 'vw') return 'car';
  return null;
}

/** Picks the action for a batch command, or returns an error message */
function trackActionFor(
  command: string,
  album: Album,
  args: ParsedArgs,
  exportRoot: string | null,
  cwd: string,
): TrackAction | string {
  switch (command) {
    case 'update':
      return updateTrackTags;
    case 'validate':
      return validateTrack;
    case 'clear':
      return clearTrack;
    case 'rename':
      return renameTrack({ dryRun: args.values['dry-run'] });
    case 'export': {
      const format = exportFormat(args.values.format);
      if (format === null) {
        return `Unknown export format "${args.values.format}" (expected full, car or vw)`;
      }
      const output = args.positionals[1];
      const root = args.values.root ?? exportRoot;
      if (output === undefined && root === null) {
        return 'No export folder: pass one, use --root, or set exportRoot with "albumsmith config exportRoot <dir>"';
      }
      const folder = output !== undefined ? path.resolve(cwd, output) : defaultExportFolder(album, path.resolve(cwd, root ?? '.'));
      return format === 'car' ? exportCarTrack(folder) : exportTrack(folder);
    }
    default:
      return `Unknown command "${command}"`;
  }
}

// ─── Main ────────────────────────────────────────────────────────────────────

/**
 * Runs one command line.
 *
 * @returns The process exit code
 */
export async function main(argv: string[], env: CliEnvironment = defaultEnvironment()): Promise<number> {
  let args: ParsedArgs;
  try {
    args = parseCommandLine(argv);
  } catch (error: unknown) {
    env.stderr(error instanceof Error ? error.message : String(error));
    env.stderr(USAGE);
    return 2;
  }

  const command = args.positionals[0];
  if (args.values.help || command === undefined) {
    (args.values.help ? env.stdout : env.stderr)(USAGE);
    return args.values.help ? 0 : 2;
  }

  const settings = new SettingsManager({ settingsDir: env.settingsDir });
  await settings.initialize();
  if (command === 'config') {
    return runConfig(args, settings, env);
  }

  const { logLevel, exportRoot } = settings.get();
  const logger = new Logger({
    logDir: env.logDir,
    minLevel: logLevel,
    writeToFile: env.writeLogFile ?? true,
    sink: (entry) => (entry.level === 'INFO' ? env.stdout : env.stderr)(formatConsoleLine(entry)),
  });
  await logger.initialize();

  const folder = path.resolve(env.cwd, args.values.folder ?? '.');

  try {
    if (command === 'generate') {
      return await runGenerate(folder, args, env);
    }

    const album = await Album.load(folder, { coverSettings: settings.get() });
    if (command === 'show') {
      env.stdout(serializeAlbumDefinition(album.definition).trimEnd());
      return 0;
    }
    if (command === 'list') {
      formatAlbumListing(album).forEach((line) => env.stdout(line));
      return 0;
    }

    const action = trackActionFor(command, album, args, exportRoot, env.cwd);
    if (typeof action === 'string') {
      env.stderr(action);
      env.stderr(USAGE);
      return 2;
    }

    const report = await runForAllTracks(album, command, action, { logger });
    env.stdout(formatReport(report));
    return report.failures.length > 0 ? 1 : 0;
  } catch (error: unknown) {
    if (!isAlbumError(error)) {
      throw error;
    }
    logger.logError(error);
    if (error instanceof DefinitionError) {
      error.issues.forEach((issue) => env.stderr(`  - ${issue}`));
    }
    return 1;
  }
}

if (require.main === module) {
  main(process.argv.slice(2)).then(
    (code) => {
      process.exitCode = code;
    },
    (error: unknown) => {
      process.stderr.write(`${error instanceof Error ? (error.stack ?? error.message) : String(error)}\n`);
      process.exitCode = 1;
    },
  );
}
