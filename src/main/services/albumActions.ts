/**
 * Album Actions
 *
 * Operations the CLI runs over every track of an album: tag updates,
 * validation, tag removal, renaming and the two export layouts.
 *
 * Tracks are handled one at a time. A failing track never stops the batch;
 * its error is logged and collected in the report.
 */

import * as fs from 'fs';
import * as path from 'path';
import { Album } from '../models/album';
import { Track } from '../models/track';
import { AlbumError, FileError, TagError, wrapError } from './errors';
import { Logger } from './logger';
import { clearMp3Tags, compareTags, formatMismatch, readMp3Tags, writeMp3Tags } from './tagWriter';
import { buildCarTrackTags, buildTrackTags } from './trackTags';

// ─── Interfaces ──────────────────────────────────────────────────────────────

/**
 * What an action did to a track.
 * - done: the file was changed or checked
 * - skipped: nothing needed doing
 */
export type TrackOutcome = { status: 'done'; message: string } | { status: 'skipped'; reason: string };

export type TrackAction = (track: Track) => Promise<TrackOutcome>;

export interface TrackFailure {
  discNumber: number;
  trackNumber: number;
  title: string;
  error: AlbumError;
}

export interface BatchReport {
  action: string;
  total: number;
  succeeded: number;
  skipped: number;
  failures: TrackFailure[];
}

export interface RunOptions {
  logger?: Logger;
}

// ─── Runner ──────────────────────────────────────────────────────────────────

/**
 * Runs an action over every track of the album in order.
 */
export async function runForAllTracks(
  album: Album,
  action: string,
  fn: TrackAction,
  options: RunOptions = {},
): Promise<BatchReport> {
  const logger = options.logger;
  const report: BatchReport = { action, total: 0, succeeded: 0, skipped: 0, failures: [] };

  for (const track of album.tracks()) {
    report.total++;
    const filePath = track.path();
    try {
      const outcome = await fn(track);
      if (outcome.status === 'skipped') {
        report.skipped++;
        logger?.logSkippedFile(filePath, outcome.reason);
      } else {
        report.succeeded++;
        logger?.info(outcome.message, { filePath, step: action });
      }
    } catch (error: unknown) {
      const albumError = wrapError(error, 'FileError', { filePath, step: action });
      report.failures.push({
        discNumber: track.disc.discNumber,
        trackNumber: track.trackNumber,
        title: track.title().value(),
        error: albumError,
      });
      logger?.logError(albumError);
    }
  }

  return report;
}

// ─── Tag Actions ─────────────────────────────────────────────────────────────

/**
 * Writes the resolved tags into the track's file, unless its current tag
 * already matches them.
 */
export const updateTrackTags: TrackAction = async (track) => {
  const filePath = track.path();
  const expected = await buildTrackTags(track);
  const actual = readMp3Tags(filePath);
  if (compareTags(expected, actual).length === 0) {
    return { status: 'skipped', reason: 'tags up to date' };
  }

  const result = writeMp3Tags(filePath, expected);
  if (result.error) {
    throw result.error;
  }
  return { status: 'done', message: 'tags updated' };
};

/**
 * Checks the file's tag against the resolved tags.
 *
 * @throws TagError listing every mismatching frame
 */
export const validateTrack: TrackAction = async (track) => {
  const filePath = track.path();
  const mismatches = compareTags(await buildTrackTags(track), readMp3Tags(filePath));
  if (mismatches.length > 0) {
    throw new TagError(mismatches.map(formatMismatch).join('; '), { filePath, step: 'validating' });
  }
  return { status: 'done', message: 'tags valid' };
};

export const clearTrack: TrackAction = async (track) => {
  const result = clearMp3Tags(track.path());
  if (result.error) {
    throw result.error;
  }
  return { status: 'done', message: 'tags removed' };
};

// ─── File Actions ────────────────────────────────────────────────────────────

export interface RenameOptions {
  /** Only log what would be renamed */
  dryRun?: boolean;
}

/**
 * Moves a track from its explicit filename to its canonical path.
 */
export function renameTrack(options: RenameOptions = {}): TrackAction {
  return async (track) => {
    const from = track.path();
    const to = track.canonicalPath();
    if (from === to) {
      return { status: 'skipped', reason: 'already at canonical path' };
    }
    if (options.dryRun) {
      return { status: 'done', message: `would rename to ${to}` };
    }

    try {
      await fs.promises.mkdir(path.dirname(to), { recursive: true });
      await fs.promises.rename(from, to);
    } catch (error: unknown) {
      throw new FileError(`Failed to rename to ${to}`, {
        filePath: from,
        step: 'renaming',
        cause: error instanceof Error ? error : new Error(String(error)),
      });
    }
    return { status: 'done', message: `renamed to ${to}` };
  };
}

async function copyInto(from: string, to: string): Promise<void> {
  try {
    await fs.promises.mkdir(path.dirname(to), { recursive: true });
    await fs.promises.copyFile(from, to);
  } catch (error: unknown) {
    throw new FileError(`Failed to copy to ${to}`, {
      filePath: from,
      step: 'exporting',
      cause: error instanceof Error ? error : new Error(String(error)),
    });
  }
}

/** Export folder used when none is given: `{root}/{artist}/{title}` */
export function defaultExportFolder(album: Album, root: string): string {
  return path.join(root, album.artist().fileSafe(), album.title().fileSafe());
}

/**
 * Copies the track into `folder` with the album layout: disc folders holding
 * car-safe filenames, so a flattened copy keeps the track order. The file
 * keeps its tag.
 */
export function exportTrack(folder: string): TrackAction {
  return async (track) => {
    const folderName = track.disc.folderName();
    const to = path.join(folder, ...(folderName === null ? [] : [folderName]), track.carFilename());
    await copyInto(track.path(), to);
    return { status: 'done', message: `exported to ${to}` };
  };
}

/**
 * Copies the track flat into `folder` under its car filename and replaces
 * its tag with the car tags.
 */
export function exportCarTrack(folder: string): TrackAction {
  return async (track) => {
    const to = path.join(folder, track.carFilename());
    await copyInto(track.path(), to);

    const result = writeMp3Tags(to, await buildCarTrackTags(track));
    if (result.error) {
      throw result.error;
    }
    return { status: 'done', message: `exported to ${to}` };
  };
}
