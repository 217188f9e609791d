import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import { PNG } from 'pngjs';
import { type RgbaImage } from '../algorithms/composite.js';
import * as errors from '../errors.js';

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

/**
 * Reads and decodes a PNG file into an RGBA bitmap.
 * Throws with the `imageFileNotFound` or `invalidImageFile` message.
 *
 * @param filePath - Absolute or cwd-relative path to the PNG file
 */
export async function loadPngFile(filePath: string): Promise<RgbaImage> {
  let buf: Buffer;
  try {
    buf = await fs.readFile(filePath);
  } catch (error: unknown) {
    if (isMissingFile(error)) {
      throw new Error(errors.messageOf(errors.imageFileNotFound(filePath)));
    }
    throw error;
  }

  let png: { width: number; height: number; data: Buffer };
  try {
    png = PNG.sync.read(buf);
  } catch {
    throw new Error(errors.messageOf(errors.invalidImageFile(filePath)));
  }

  return { width: png.width, height: png.height, data: new Uint8Array(png.data) };
}

/**
 * Encodes an RGBA bitmap as PNG and writes it, creating the parent directory.
 *
 * @param filePath - Destination path of the PNG file
 * @param image - The bitmap to encode
 */
export async function savePngFile(filePath: string, image: RgbaImage): Promise<void> {
  const png = new PNG({ width: image.width, height: image.height });
  png.data = Buffer.from(image.data);

  await fs.mkdir(path.dirname(filePath), { recursive: true });
  await fs.writeFile(filePath, PNG.sync.write(png));
}
