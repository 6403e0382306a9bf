import { createHash } from 'node:crypto';
import path from 'node:path';
import sharp from 'sharp';
import type { BinaryMask, RgbImage } from '../types';
import { ImageLoadError, InvalidImageError } from './errors';

/**
 * Decode an image file to raw interleaved RGB. Alpha is dropped and
 * greyscale is expanded, so the result always has 3 channels.
 */
export async function loadRgbImage(imagePath: string): Promise<RgbImage> {
  try {
    const { data, info } = await sharp(imagePath)
      .removeAlpha()
      .toColourspace('srgb')
      .raw()
      .toBuffer({ resolveWithObject: true });

    return {
      width: info.width,
      height: info.height,
      channels: info.channels,
      data: new Uint8Array(data.buffer, data.byteOffset, data.byteLength),
    };
  } catch (err) {
    throw new ImageLoadError(path.basename(imagePath), { cause: err });
  }
}

/**
 * Throws InvalidImageError unless the image is a non-empty 3-channel grid
 * whose buffer matches its dimensions.
 */
export function assertRgbImage(image: RgbImage): void {
  if (image.width <= 0 || image.height <= 0 || image.data.length === 0) {
    throw new InvalidImageError('Invalid image: image is empty', {
      width: image.width,
      height: image.height,
    });
  }
  if (image.channels !== 3) {
    throw new InvalidImageError(
      `Invalid image shape: (${image.height}, ${image.width}, ${image.channels}). Expected (H, W, 3)`,
      { channels: image.channels }
    );
  }
  const expected = image.width * image.height * 3;
  if (image.data.length !== expected) {
    throw new InvalidImageError(
      `Invalid image buffer: ${image.data.length} bytes for ${image.width}x${image.height}x3 (expected ${expected})`
    );
  }
}

export function assertMaskMatchesImage(mask: BinaryMask, image: RgbImage): void {
  if (mask.width !== image.width || mask.height !== image.height) {
    throw new InvalidImageError(
      `Mask size ${mask.width}x${mask.height} does not match image ${image.width}x${image.height}`
    );
  }
}

export function md5(data: Uint8Array | string): string {
  return createHash('md5').update(data).digest('hex');
}

/**
 * Content hash of the image, used as the server-side embedding key. The shape
 * is hashed with the pixels: a 6x2 and a 2x6 image with the same bytes differ.
 */
export function imageKey(image: RgbImage): string {
  return createHash('md5')
    .update(`${image.width}x${image.height}x${image.channels}:`)
    .update(image.data)
    .digest('hex');
}

/** Cache key for one (image, prompt) pair. */
export function fingerprint(image: RgbImage, textPrompt: string): string {
  return `${imageKey(image)}_${md5(textPrompt)}`;
}
