import { EncodeOptions, ImageCodec } from '../../src/main/services/imageCodec';
import { ImageFormat } from '../../src/shared/types';

export const PNG_BYTES = Buffer.from([0x89, 0x50, 0x4e, 0x47, 0x0d, 0x0a, 0x1a, 0x0a]);
export const JPEG_BYTES = Buffer.from([0xff, 0xd8, 0xff]);

/** Image bytes starting with the signature of a format, padded to `length` */
export function fakeImage(format: ImageFormat, length: number, fill = 0): Buffer {
  const signature = format === 'png' ? PNG_BYTES : JPEG_BYTES;
  return Buffer.concat([signature, Buffer.alloc(Math.max(length - signature.length, 0), fill)]);
}

/**
 * Codec that records its calls and returns a fake image of a fixed length
 * per format, filled with the low byte of the requested size.
 */
export class FakeImageCodec implements ImageCodec {
  readonly calls: { data: Buffer; options: EncodeOptions }[] = [];

  constructor(private readonly lengths: Record<ImageFormat, number> = { png: 20, jpeg: 30 }) {}

  async encode(data: Buffer, options: EncodeOptions): Promise<Buffer> {
    this.calls.push({ data, options });
    return fakeImage(options.format, this.lengths[options.format], options.size % 256);
  }
}

/** Codec whose every call fails */
export class FailingImageCodec implements ImageCodec {
  async encode(): Promise<Buffer> {
    throw new Error('corrupt image');
  }
}
