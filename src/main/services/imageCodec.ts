/**
 * Image Codec
 *
 * Resizes and re-encodes cover images. The cover resolver depends on the
 * `ImageCodec` interface only; `SharpImageCodec` is the implementation used
 * outside tests.
 */

import sharp from 'sharp';
import { ImageFormat } from '../../shared/types';

// ─── Interfaces ──────────────────────────────────────────────────────────────

export interface EncodeOptions {
  /** Edge of the square box the image is fitted into (px) */
  size: number;
  format: ImageFormat;
  /** JPEG quality (1-100), ignored for PNG */
  quality: number;
}

export interface ImageCodec {
  /** Decodes PNG or JPEG bytes, fits them into the box and encodes them again */
  encode(data: Buffer, options: EncodeOptions): Promise<Buffer>;
}

// ─── Format Detection ────────────────────────────────────────────────────────

const PNG_SIGNATURE = Buffer.from([0x89, 0x50, 0x4e, 0x47, 0x0d, 0x0a, 0x1a, 0x0a]);

/**
 * Detects the encoding of image bytes from their signature.
 *
 * @returns The format, or null for anything but PNG or JPEG
 */
export function detectImageFormat(data: Buffer): ImageFormat | null {
  if (data.length >= PNG_SIGNATURE.length && data.subarray(0, PNG_SIGNATURE.length).equals(PNG_SIGNATURE)) {
    return 'png';
  }
  // JPEG: SOI marker (FF D8) followed by the first segment marker
  if (data.length >= 3 && data[0] === 0xff && data[1] === 0xd8 && data[2] === 0xff) {
    return 'jpeg';
  }
  return null;
}

// ─── Sharp Implementation ────────────────────────────────────────────────────

/**
 * Encodes with sharp: the image is scaled (up or down) to fit inside the box
 * with the Lanczos3 kernel, keeping its aspect ratio, and any alpha channel
 * is dropped.
 */
export class SharpImageCodec implements ImageCodec {
  async encode(data: Buffer, options: EncodeOptions): Promise<Buffer> {
    const pipeline = sharp(data)
      .resize(options.size, options.size, { fit: 'inside', kernel: sharp.kernel.lanczos3 })
      .removeAlpha();

    switch (options.format) {
      case 'png':
        return pipeline.png().toBuffer();
      case 'jpeg':
        return pipeline.jpeg({ quality: options.quality }).toBuffer();
    }
  }
}
