/**
 * Tag Writer Service
 *
 * Writes, reads and removes the ID3 tags of MP3 files with `node-id3`, and
 * compares a tag read back from a file with the tag a track should have.
 *
 * Writing always replaces the whole tag: frames the album definition does not
 * produce are dropped, so a written file validates cleanly.
 */

import NodeID3 from 'node-id3';
import { CoverImage, IMAGE_FORMAT_MIME_TYPES, ImageFormat, TrackTags } from '../../shared/types';
import { TagError } from './errors';
import { detectImageFormat } from './imageCodec';

// ─── Types ────────────────────────────────────────────────────────────────────

export interface TagResult {
  success: boolean;
  filePath: string;
  error: TagError | null;
}

/** Frame names used in mismatch reports */
export type TagFrame =
  | 'title'
  | 'artist'
  | 'album artist'
  | 'album'
  | 'track'
  | 'disc'
  | 'year'
  | 'genre'
  | 'comment'
  | 'lyrics'
  | 'cover';

/**
 * A difference between the expected and the actual tag.
 * - missing: the file lacks a frame the track should have
 * - unexpected: the file has a frame the track should not have
 * - incorrect: both have the frame with different content
 */
export type TagMismatch =
  | { kind: 'missing'; frame: TagFrame }
  | { kind: 'unexpected'; frame: TagFrame; actual: string }
  | { kind: 'incorrect'; frame: TagFrame; expected: string; actual: string };

const LANGUAGE = 'eng';

const FRONT_COVER = { id: 3, name: 'front cover' };

// ─── ID3 Tag Building ─────────────────────────────────────────────────────────

/**
 * Maps resolved track tags to node-id3 frames. Absent fields produce no frame.
 */
export function buildId3Tags(tags: TrackTags): NodeID3.Tags {
  const id3: NodeID3.Tags = {
    title: tags.title,
    album: tags.album,
    trackNumber: String(tags.trackNumber),
  };

  if (tags.artist !== null) {
    id3.artist = tags.artist;
  }
  if (tags.albumArtist !== null) {
    id3.performerInfo = tags.albumArtist;
  }
  if (tags.discNumber !== null) {
    id3.partOfSet = String(tags.discNumber);
  }
  if (tags.year !== null) {
    id3.year = String(tags.year);
  }
  if (tags.genre !== null) {
    id3.genre = tags.genre;
  }
  if (tags.comment !== null) {
    id3.comment = { language: LANGUAGE, text: tags.comment };
  }
  if (tags.lyrics !== null) {
    id3.unsynchronisedLyrics = { language: LANGUAGE, text: tags.lyrics };
  }
  if (tags.cover !== null) {
    id3.image = {
      mime: IMAGE_FORMAT_MIME_TYPES[tags.cover.format],
      type: FRONT_COVER,
      description: 'Front Cover',
      imageBuffer: tags.cover.data,
    };
  }

  return id3;
}

// ─── Reading ──────────────────────────────────────────────────────────────────

/** Parses "3" or "3/12" into 3 */
export function parseNumberFrame(value: string | undefined): number | null {
  if (value === undefined) {
    return null;
  }
  const number = parseInt(value.split('/')[0], 10);
  return isNaN(number) ? null : number;
}

function readCover(image: NodeID3.Tags['image']): CoverImage | null {
  if (image === undefined || typeof image === 'string') {
    return null;
  }
  const format: ImageFormat | null =
    image.mime === IMAGE_FORMAT_MIME_TYPES.png
      ? 'png'
      : image.mime === IMAGE_FORMAT_MIME_TYPES.jpeg
        ? 'jpeg'
        : detectImageFormat(image.imageBuffer);
  return format === null ? null : { data: image.imageBuffer, format };
}

/**
 * Reads the ID3 tag of a file into the shape `buildId3Tags` consumes.
 * Frames the file lacks come back as null (an empty title or album as '').
 *
 * @throws TagError if the file cannot be read
 */
export function readMp3Tags(filePath: string): TrackTags {
  let id3: NodeID3.Tags;
  try {
    id3 = NodeID3.read(filePath);
  } catch (error: unknown) {
    throw new TagError('Failed to read ID3 tag', {
      filePath,
      step: 'reading',
      cause: error instanceof Error ? error : new Error(String(error)),
    });
  }

  return {
    title: id3.title ?? '',
    artist: id3.artist ?? null,
    albumArtist: id3.performerInfo ?? null,
    album: id3.album ?? '',
    trackNumber: parseNumberFrame(id3.trackNumber) ?? 0,
    discNumber: parseNumberFrame(id3.partOfSet),
    year: parseNumberFrame(id3.year),
    genre: id3.genre ?? null,
    comment: id3.comment?.text ?? null,
    lyrics: id3.unsynchronisedLyrics?.text ?? null,
    cover: readCover(id3.image),
  };
}

// ─── Writing ──────────────────────────────────────────────────────────────────

function toResult(filePath: string, outcome: true | Error, step: string, message: string): TagResult {
  if (outcome instanceof Error) {
    return { success: false, filePath, error: new TagError(message, { filePath, step, cause: outcome }) };
  }
  return { success: true, filePath, error: null };
}

/**
 * Replaces the ID3 tag of a file.
 */
export function writeMp3Tags(filePath: string, tags: TrackTags): TagResult {
  try {
    return toResult(filePath, NodeID3.write(buildId3Tags(tags), filePath), 'writing', 'Failed to write ID3 tag');
  } catch (error: unknown) {
    return toResult(filePath, error instanceof Error ? error : new Error(String(error)), 'writing', 'Failed to write ID3 tag');
  }
}

/**
 * Removes the ID3 tag of a file.
 */
export function clearMp3Tags(filePath: string): TagResult {
  try {
    return toResult(filePath, NodeID3.removeTags(filePath), 'clearing', 'Failed to remove ID3 tag');
  } catch (error: unknown) {
    return toResult(filePath, error instanceof Error ? error : new Error(String(error)), 'clearing', 'Failed to remove ID3 tag');
  }
}

// ─── Comparison ───────────────────────────────────────────────────────────────

function describeCover(cover: CoverImage): string {
  return `${cover.format} image, ${cover.data.length} bytes`;
}

function compareFrame(
  mismatches: TagMismatch[],
  frame: TagFrame,
  expected: string | null,
  actual: string | null,
): void {
  if (expected === null && actual !== null) {
    mismatches.push({ kind: 'unexpected', frame, actual });
  } else if (expected !== null && actual === null) {
    mismatches.push({ kind: 'missing', frame });
  } else if (expected !== null && actual !== null && expected !== actual) {
    mismatches.push({ kind: 'incorrect', frame, expected, actual });
  }
}

function optionalString(value: number | null): string | null {
  return value === null ? null : String(value);
}

/**
 * Lists every frame whose content differs between two tags. An empty list
 * means the file is tagged as expected.
 */
export function compareTags(expected: TrackTags, actual: TrackTags): TagMismatch[] {
  const mismatches: TagMismatch[] = [];

  compareFrame(mismatches, 'title', expected.title, actual.title === '' ? null : actual.title);
  compareFrame(mismatches, 'artist', expected.artist, actual.artist);
  compareFrame(mismatches, 'album artist', expected.albumArtist, actual.albumArtist);
  compareFrame(mismatches, 'album', expected.album, actual.album === '' ? null : actual.album);
  compareFrame(
    mismatches,
    'track',
    String(expected.trackNumber),
    actual.trackNumber === 0 ? null : String(actual.trackNumber),
  );
  compareFrame(mismatches, 'disc', optionalString(expected.discNumber), optionalString(actual.discNumber));
  compareFrame(mismatches, 'year', optionalString(expected.year), optionalString(actual.year));
  compareFrame(mismatches, 'genre', expected.genre, actual.genre);
  compareFrame(mismatches, 'comment', expected.comment, actual.comment);
  compareFrame(mismatches, 'lyrics', expected.lyrics, actual.lyrics);

  const expectedCover = expected.cover;
  const actualCover = actual.cover;
  if (expectedCover === null || actualCover === null) {
    compareFrame(
      mismatches,
      'cover',
      expectedCover && describeCover(expectedCover),
      actualCover && describeCover(actualCover),
    );
  } else if (expectedCover.format !== actualCover.format || !expectedCover.data.equals(actualCover.data)) {
    mismatches.push({
      kind: 'incorrect',
      frame: 'cover',
      expected: describeCover(expectedCover),
      actual: describeCover(actualCover),
    });
  }

  return mismatches;
}

/**
 * @example formatMismatch({ kind: 'missing', frame: 'disc' }) === 'missing disc frame'
 */
export function formatMismatch(mismatch: TagMismatch): string {
  switch (mismatch.kind) {
    case 'missing':
      return `missing ${mismatch.frame} frame`;
    case 'unexpected':
      return `unexpected ${mismatch.frame} frame: "${mismatch.actual}"`;
    case 'incorrect':
      return `incorrect ${mismatch.frame}: expected "${mismatch.expected}", found "${mismatch.actual}"`;
  }
}
