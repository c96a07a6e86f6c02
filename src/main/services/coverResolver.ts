/**
 * Cover Resolver
 *
 * Finds the cover image of one album, disc or track. Transformed covers are
 * cached under `extras/.cache/`, so the image codec runs once per source
 * image rather than once per run:
 *
 *   1. `{cacheDir}/{name}.{png,jpg,jpeg}`, first hit loaded as is
 *   2. `{imagesDir}/{name}.{png,jpg,jpeg}`, first hit transformed, written
 *      to the cache under the extension of the output format, and returned
 *   3. otherwise null: the node has no cover of its own
 *
 * Read, transform and write failures are `CoverError`s; only "no file" is null.
 */

import * as fs from 'fs';
import * as path from 'path';
import {
  COVER_EXTENSIONS,
  CoverImage,
  CoverVariant,
  IMAGE_FORMAT_EXTENSIONS,
  ImageFormat,
} from '../../shared/types';
import { CoverError, CoverErrorReason } from './errors';
import { ImageCodec, detectImageFormat } from './imageCodec';

// ─── Interfaces ──────────────────────────────────────────────────────────────

/** Turns source image bytes into the cover stored in the cache */
export type CoverTransform = (data: Buffer) => Promise<CoverImage>;

export interface CoverLookup {
  /** Source images, usually `extras/images` */
  imagesDir: string;
  /** Cache of transformed covers for one variant */
  cacheDir: string;
  /** File name without extension */
  name: string;
  transform: CoverTransform;
}

export interface CoverTransformSettings {
  coverSize: number;
  carCoverSize: number;
  jpegQuality: number;
}

// ─── Transforms ──────────────────────────────────────────────────────────────

/**
 * Builds the transform of a cover variant.
 * - standard: fitted into `coverSize`, encoded as both PNG and JPEG, the
 *   smaller kept (PNG when equal)
 * - car: fitted into `carCoverSize`, always JPEG
 */
export function createCoverTransform(
  variant: CoverVariant,
  codec: ImageCodec,
  settings: CoverTransformSettings,
): CoverTransform {
  const quality = settings.jpegQuality;

  switch (variant) {
    case 'standard':
      return async (data) => {
        const size = settings.coverSize;
        const png = await codec.encode(data, { size, format: 'png', quality });
        const jpeg = await codec.encode(data, { size, format: 'jpeg', quality });
        return png.length <= jpeg.length ? { data: png, format: 'png' } : { data: jpeg, format: 'jpeg' };
      };
    case 'car':
      return async (data) => ({
        data: await codec.encode(data, { size: settings.carCoverSize, format: 'jpeg', quality }),
        format: 'jpeg',
      });
  }
}

// ─── Lookup ──────────────────────────────────────────────────────────────────

/**
 * Resolves one node's own cover through the cache.
 *
 * @returns The cover, or null when neither directory has a file for `name`
 */
export async function loadCoverWithCache(lookup: CoverLookup): Promise<CoverImage | null> {
  const cached = await readFirstExisting(lookup.cacheDir, lookup.name, 'cache-read');
  if (cached) {
    const format = detectImageFormat(cached.data);
    if (format === null) {
      throw new CoverError('Cached cover is neither PNG nor JPEG', 'unsupported-format', {
        filePath: cached.filePath,
      });
    }
    return { data: cached.data, format };
  }

  const source = await readFirstExisting(lookup.imagesDir, lookup.name, 'source-read');
  if (!source) {
    return null;
  }

  let cover: CoverImage;
  try {
    cover = await lookup.transform(source.data);
  } catch (error: unknown) {
    throw new CoverError('Failed to transform cover', 'transform', {
      filePath: source.filePath,
      cause: toError(error),
    });
  }

  await writeCache(lookup.cacheDir, lookup.name, cover.format, cover.data);
  return cover;
}

/** Path a cover of the given format is cached at */
export function cachedCoverPath(cacheDir: string, name: string, format: ImageFormat): string {
  return path.join(cacheDir, `${name}.${IMAGE_FORMAT_EXTENSIONS[format]}`);
}

// ─── Helpers ─────────────────────────────────────────────────────────────────

async function readFirstExisting(
  dir: string,
  name: string,
  reason: CoverErrorReason,
): Promise<{ filePath: string; data: Buffer } | null> {
  for (const extension of COVER_EXTENSIONS) {
    const filePath = path.join(dir, `${name}.${extension}`);
    try {
      return { filePath, data: await fs.promises.readFile(filePath) };
    } catch (error: unknown) {
      if (!isMissing(error)) {
        throw new CoverError('Failed to read cover', reason, { filePath, cause: toError(error) });
      }
    }
  }
  return null;
}

async function writeCache(cacheDir: string, name: string, format: ImageFormat, data: Buffer): Promise<void> {
  const filePath = cachedCoverPath(cacheDir, name, format);
  try {
    await fs.promises.mkdir(cacheDir, { recursive: true });
    await fs.promises.writeFile(filePath, data);
  } catch (error: unknown) {
    throw new CoverError('Failed to write cover cache', 'cache-write', { filePath, cause: toError(error) });
  }
}

/** A missing file, or a missing directory on the way to it */
function isMissing(error: unknown): boolean {
  return error instanceof Error && 'code' in error && (error.code === 'ENOENT' || error.code === 'ENOTDIR');
}

function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}
