/**
 * Album Generator
 *
 * Drafts an album definition from a folder of already tagged MP3s, so an
 * existing rip can be brought under albumsmith without typing every title.
 *
 * Album-level fields take the value most tracks agree on. Tracks keep their
 * current location as an explicit filename; `rename` can move them to their
 * canonical paths afterwards.
 */

import * as path from 'path';
import * as mm from 'music-metadata';
import { AlbumDefinition, TrackDefinition, defineAlbum, defineDisc, defineTrack } from '../models/definition';
import { TextValue } from '../models/text';
import { scanDirectoryForAudioFiles } from '../utils/fileScanner';
import { TagError } from './errors';

// ─── Interfaces ──────────────────────────────────────────────────────────────

/** The tag fields the generator looks at; null when the file lacks one */
export interface ScannedTags {
  title: string | null;
  artist: string | null;
  albumArtist: string | null;
  album: string | null;
  year: number | null;
  genre: string | null;
  discNumber: number | null;
}

export interface ScannedTrack {
  filePath: string;
  tags: ScannedTags;
}

export type TagReader = (filePath: string) => Promise<ScannedTags>;

// ─── Tag Reading ─────────────────────────────────────────────────────────────

/**
 * Reads the generator's tag fields with music-metadata.
 *
 * @throws TagError if the file cannot be parsed
 */
export const readScannedTags: TagReader = async (filePath) => {
  let metadata: mm.IAudioMetadata;
  try {
    metadata = await mm.parseFile(filePath, { skipCovers: true, duration: false });
  } catch (error: unknown) {
    throw new TagError(`Failed to parse "${path.basename(filePath)}"`, {
      filePath,
      step: 'reading',
      cause: error instanceof Error ? error : new Error(String(error)),
    });
  }

  const { common } = metadata;
  return {
    title: common.title ?? null,
    artist: common.artist ?? null,
    albumArtist: common.albumartist ?? null,
    album: common.album ?? null,
    year: common.year ?? null,
    genre: common.genre && common.genre.length > 0 ? common.genre[0] : null,
    discNumber: common.disk?.no ?? null,
  };
};

// ─── Building ────────────────────────────────────────────────────────────────

/**
 * The value occurring most often, ignoring nulls. Ties go to the value seen
 * first.
 */
export function mostFrequent<T>(values: Iterable<T | null>): T | null {
  const counts = new Map<T, number>();
  for (const value of values) {
    if (value !== null) {
      counts.set(value, (counts.get(value) ?? 0) + 1);
    }
  }

  let best: T | null = null;
  let bestCount = 0;
  for (const [value, count] of counts) {
    if (count > bestCount) {
      best = value;
      bestCount = count;
    }
  }
  return best;
}

/** Path relative to the album folder, with forward slashes */
function relativeFilename(root: string, filePath: string): string {
  return path.relative(root, filePath).split(path.sep).join('/');
}

/**
 * Builds a definition from scanned tracks. Track fields that repeat the
 * album value are left out so they inherit it.
 */
export function buildDefinition(root: string, scanned: readonly ScannedTrack[]): AlbumDefinition {
  const sorted = [...scanned].sort((a, b) => (a.filePath < b.filePath ? -1 : a.filePath > b.filePath ? 1 : 0));
  const tags = sorted.map((track) => track.tags);

  const title = mostFrequent(tags.map((t) => t.album)) ?? path.basename(root);
  const albumArtist = mostFrequent(tags.map((t) => t.albumArtist)) ?? mostFrequent(tags.map((t) => t.artist));
  const year = mostFrequent(tags.map((t) => t.year));
  const genre = mostFrequent(tags.map((t) => t.genre));

  const discs = new Map<number, TrackDefinition[]>();
  for (const { filePath, tags: trackTags } of sorted) {
    const track = defineTrack(trackTags.title ?? path.parse(filePath).name, {
      artists: trackTags.artist !== null && trackTags.artist !== albumArtist ? [trackTags.artist] : null,
      year: trackTags.year !== year ? trackTags.year : null,
      genre: trackTags.genre !== genre ? trackTags.genre : null,
      filename: relativeFilename(root, filePath),
    });

    const discNumber = trackTags.discNumber ?? 1;
    const disc = discs.get(discNumber);
    if (disc) {
      disc.push(track);
    } else {
      discs.set(discNumber, [track]);
    }
  }

  return defineAlbum({
    title: TextValue.from(title),
    artists: albumArtist === null ? [] : [albumArtist],
    year,
    genre,
    discs: [...discs.entries()].sort(([a], [b]) => a - b).map(([, tracks]) => defineDisc(tracks)),
  });
}

/**
 * Scans a folder recursively for MP3s, reads their tags and drafts a
 * definition.
 *
 * @throws TagError if any file cannot be read
 */
export async function generateAlbumDefinition(
  root: string,
  readTags: TagReader = readScannedTags,
): Promise<AlbumDefinition> {
  const scanned: ScannedTrack[] = [];
  for (const filePath of scanDirectoryForAudioFiles(root)) {
    scanned.push({ filePath, tags: await readTags(filePath) });
  }
  return buildDefinition(root, scanned);
}
