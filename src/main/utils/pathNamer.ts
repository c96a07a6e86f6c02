/**
 * Canonical folder and file names for discs and tracks.
 *
 * Numbers are zero-padded to the width of the largest number in their
 * sequence, so names sort correctly in a file browser.
 */

import { AUDIO_EXTENSION } from '../../shared/types';
import type { TextValue } from '../models/text';

/** Position of a track inside its album */
export interface TrackPosition {
  discNumber: number;
  numDiscs: number;
  trackNumber: number;
  /** Number of tracks on the track's own disc */
  numTracks: number;
}

/**
 * Number of base-10 digits in a non-negative integer (zero has one).
 *
 * @example numDigits(900) === 3
 */
export function numDigits(value: number): number {
  let count = 0;
  let remaining = Math.floor(Math.abs(value));
  while (remaining !== 0) {
    remaining = Math.floor(remaining / 10);
    count++;
  }
  return Math.max(count, 1);
}

export function padNumber(value: number, width: number): string {
  return String(value).padStart(width, '0');
}

/**
 * Folder name of a disc, or null when the album has a single disc and the
 * tracks live in the album folder itself.
 *
 * @example discFolderName(1, 11) === 'Disc 01'
 */
export function discFolderName(discNumber: number, numDiscs: number): string | null {
  if (numDiscs === 1) {
    return null;
  }
  return `Disc ${padNumber(discNumber, numDigits(numDiscs))}`;
}

/**
 * Canonical track filename. The track number is left out only for a
 * single-track, single-disc album.
 */
export function canonicalTrackFilename(title: TextValue, position: TrackPosition): string {
  if (position.numTracks === 1 && position.numDiscs === 1) {
    return `${title.fileSafe()}${AUDIO_EXTENSION}`;
  }
  const number = padNumber(position.trackNumber, numDigits(position.numTracks));
  return `${number} - ${title.fileSafe()}${AUDIO_EXTENSION}`;
}

/**
 * Track filename for the flat car export. Multi-disc albums prefix the
 * disc number; disc and track numbers are padded independently.
 *
 * @example carTrackFilename(title, { discNumber: 2, numDiscs: 2, trackNumber: 3, numTracks: 12 }) === '2-03 - Title.mp3'
 */
export function carTrackFilename(title: TextValue, position: TrackPosition): string {
  if (position.numDiscs === 1) {
    return canonicalTrackFilename(title, position);
  }
  const disc = padNumber(position.discNumber, numDigits(position.numDiscs));
  const track = padNumber(position.trackNumber, numDigits(position.numTracks));
  return `${disc}-${track} - ${title.fileSafe()}${AUDIO_EXTENSION}`;
}
