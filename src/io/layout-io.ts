import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import { z } from 'zod';
import { type PackedBoxes, type PlacedBox } from '../types/box.js';
import { px } from '../types/scalar.js';
import * as errors from '../errors.js';

export const LAYOUT_FILE_VERSION = '1.0';

/**
 * JSON-compatible value produced by a payload codec.
 */
export type JsonValue = string | number | boolean | null | JsonValue[] | { [key: string]: JsonValue };

/**
 * Caller-supplied conversion between a payload and its JSON form.
 * The layout format never looks inside the encoded value.
 */
export interface PayloadCodec<T> {
  encode(data: T): JsonValue;
  /** Throws when `raw` is not a valid encoding. */
  decode(raw: unknown): T;
}

const extent = z.number().finite().nonnegative();

const layoutFileSchema = z.object({
  boxpack_version: z.string(),
  width: extent,
  height: extent,
  boxes: z.array(
    z.object({
      x: extent,
      y: extent,
      width: extent,
      height: extent,
      data: z.unknown(),
    }),
  ),
});

export interface LayoutFile {
  boxpack_version: string;
  width: number;
  height: number;
  boxes: Array<{ x: number; y: number; width: number; height: number; data: JsonValue }>;
}

/**
 * Sprite names as payload: the codec used by the atlas tool.
 */
export const spriteNameCodec: PayloadCodec<string> = {
  encode: (name) => name,
  decode: (raw) => z.string().parse(raw),
};

/**
 * Flattens a packing into the on-disk layout shape.
 */
export function serializeLayout<T>(packed: PackedBoxes<T>, codec: PayloadCodec<T>): LayoutFile {
  return {
    boxpack_version: LAYOUT_FILE_VERSION,
    width: packed.width,
    height: packed.height,
    boxes: packed.boxes.map((box) => ({
      x: box.x,
      y: box.y,
      width: box.width,
      height: box.height,
      data: codec.encode(box.data),
    })),
  };
}

/**
 * Validates a parsed layout object and decodes every payload.
 * Throws a plain Error describing the first problem found.
 */
export function parseLayout<T>(raw: unknown, codec: Pick<PayloadCodec<T>, 'decode'>): PackedBoxes<T> {
  const result = layoutFileSchema.safeParse(raw);
  if (!result.success) {
    const issue = result.error.issues[0];
    const where = issue.path.length > 0 ? issue.path.join('.') : 'root';
    throw new Error(`${where}: ${issue.message}`);
  }

  const boxes: PlacedBox<T>[] = result.data.boxes.map((box, index) => {
    let data: T;
    try {
      data = codec.decode(box.data);
    } catch (e: unknown) {
      const msg = e instanceof Error ? e.message : String(e);
      throw new Error(`boxes.${String(index)}.data: ${msg}`);
    }
    return { x: px(box.x), y: px(box.y), width: px(box.width), height: px(box.height), data };
  });

  return { width: px(result.data.width), height: px(result.data.height), boxes };
}

/**
 * Loads a layout from a JSON file.
 * Throws with the `layoutFileNotFound` or `invalidLayoutFile` message.
 *
 * @param filePath - Absolute or cwd-relative path to the layout file
 * @param codec - Decoder for the box payloads
 */
export async function loadLayoutFile<T>(filePath: string, codec: Pick<PayloadCodec<T>, 'decode'>): Promise<PackedBoxes<T>> {
  let fileContent: string;
  try {
    fileContent = await fs.readFile(filePath, 'utf8');
  } catch (error: unknown) {
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
      throw new Error(errors.messageOf(errors.layoutFileNotFound(filePath)));
    }
    throw error;
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(fileContent);
  } catch (e: unknown) {
    const msg = e instanceof Error ? e.message : String(e);
    throw new Error(errors.messageOf(errors.invalidLayoutFile(filePath, `Invalid JSON. ${msg}`)));
  }

  try {
    return parseLayout(parsed, codec);
  } catch (e: unknown) {
    const msg = e instanceof Error ? e.message : String(e);
    throw new Error(errors.messageOf(errors.invalidLayoutFile(filePath, msg)));
  }
}

/**
 * Writes a layout as pretty-printed JSON, creating the parent directory.
 *
 * @param filePath - Destination path of the layout file
 * @param packed - The packing to store
 * @param codec - Encoder for the box payloads
 */
export async function saveLayoutFile<T>(filePath: string, packed: PackedBoxes<T>, codec: PayloadCodec<T>): Promise<void> {
  await fs.mkdir(path.dirname(filePath), { recursive: true });
  await fs.writeFile(filePath, JSON.stringify(serializeLayout(packed, codec), null, 2), 'utf8');
}
