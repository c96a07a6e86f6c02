/**
 * Shared type definitions for albumsmith.
 * These are used by the models, the services and the CLI entry point.
 */

/** Encoded image formats the cover pipeline reads and writes */
export type ImageFormat = 'png' | 'jpeg';

/** File extensions probed for a cover image, in priority order */
export const COVER_EXTENSIONS: readonly string[] = ['png', 'jpg', 'jpeg'] as const;

/** Audio file extension handled by the organizer */
export const AUDIO_EXTENSION = '.mp3';

/** File extension written for each image format */
export const IMAGE_FORMAT_EXTENSIONS: Record<ImageFormat, string> = {
  png: 'png',
  jpeg: 'jpg',
};

/** MIME type for each image format */
export const IMAGE_FORMAT_MIME_TYPES: Record<ImageFormat, string> = {
  png: 'image/png',
  jpeg: 'image/jpeg',
};

/** Encoded cover image bytes */
export interface CoverImage {
  /** Raw encoded bytes */
  data: Buffer;
  /** Encoding of `data` */
  format: ImageFormat;
}

/**
 * Cover variants.
 * - standard: large cover embedded in the library copy
 * - car: small JPEG cover for in-vehicle players
 */
export type CoverVariant = 'standard' | 'car';

/** Cache subdirectory (under `extras/.cache/`) for each cover variant */
export const COVER_CACHE_DIRS: Record<CoverVariant, string> = {
  standard: 'covers',
  car: 'covers-vw',
};

/** Export layouts */
export type ExportFormat = 'full' | 'car';

/** Resolved tag data for one track, ready for the tag writer */
export interface TrackTags {
  title: string;
  /** Comma-joined track artists; absent when the album has no artists */
  artist: string | null;
  /** Comma-joined album artists; only set when the track overrides the artists */
  albumArtist: string | null;
  album: string;
  trackNumber: number;
  /** Absent on single-disc albums */
  discNumber: number | null;
  year: number | null;
  genre: string | null;
  comment: string | null;
  lyrics: string | null;
  cover: CoverImage | null;
}

/** Log severity levels */
export type LogLevel = 'ERROR' | 'WARN' | 'INFO';

/** Persisted application settings */
export interface AppSettings {
  /** Root folder used by `export` when no explicit output folder is given */
  exportRoot: string | null;
  /** Edge of the square box the standard cover is fitted into (px) */
  coverSize: number;
  /** Edge of the square box the car cover is fitted into (px) */
  carCoverSize: number;
  /** JPEG quality (1-100) used when encoding covers */
  jpegQuality: number;
  /** Minimum level written to the log */
  logLevel: LogLevel;
}

/** Default application settings */
export const DEFAULT_SETTINGS: AppSettings = {
  exportRoot: null,
  coverSize: 1000,
  carCoverSize: 300,
  jpegQuality: 75,
  logLevel: 'INFO',
};
