import { z } from 'zod';
import { type McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import * as path from 'node:path';
import { packBoxes } from '../algorithms/packer.js';
import { boxIntersections } from '../algorithms/intersections.js';
import { composeAtlas, type RgbaImage } from '../algorithms/composite.js';
import { loadPngFile, savePngFile } from '../io/image-io.js';
import { loadLayoutFile, saveLayoutFile, spriteNameCodec } from '../io/layout-io.js';
import { type Box, type PackedBoxes } from '../types/box.js';
import { px } from '../types/scalar.js';
import { packOptionsSchema, toPackConfig, type PackOptions } from './pack.js';
import * as errors from '../errors.js';

/**
 * Zod input schema for the `atlas` tool.
 *
 * Uses a flat shape with an `action` enum discriminator.
 * - `build`: images and output_path required
 * - `verify`: layout_path required
 */
const atlasInputSchema = {
  action: z
    .enum(['build', 'verify'])
    .describe('Action to perform: build (pack PNG sprites into one atlas), verify (check a layout file for overlaps)'),
  images: z
    .array(z.string())
    .optional()
    .describe('For build: PNG files to pack. The file base name becomes the sprite name.'),
  output_path: z.string().optional().describe('For build: path of the atlas PNG to write.'),
  layout_path: z
    .string()
    .optional()
    .describe('For build: where to write the layout JSON (defaults to output_path with .json). For verify: layout to check.'),
  ...packOptionsSchema,
};

export interface AtlasToolArgs extends PackOptions {
  action: 'build' | 'verify';
  images?: string[];
  output_path?: string;
  layout_path?: string;
}

interface Sprite {
  name: string;
  image: RgbaImage;
}

/**
 * Registers the `atlas` tool on the MCP server.
 */
export function registerAtlasTool(server: McpServer): void {
  server.registerTool(
    'atlas',
    {
      title: 'Atlas',
      description:
        'Build a sprite atlas from PNG files (atlas PNG plus layout JSON), or verify that a layout file has no overlapping or out-of-bounds sprites.',
      inputSchema: atlasInputSchema,
    },
    async (args) => handleAtlas(args),
  );
}

export async function handleAtlas(args: AtlasToolArgs) {
  switch (args.action) {
    case 'build':
      return handleBuild(args);
    case 'verify':
      return handleVerify(args.layout_path);
    default:
      return errors.invalidArgument(`Unknown atlas action: ${String(args.action)}`);
  }
}

// ---------------------------------------------------------------------------
// Action handlers
// ---------------------------------------------------------------------------

function errorMessage(e: unknown): string {
  return e instanceof Error ? e.message : String(e);
}

function spriteName(imagePath: string): string {
  return path.basename(imagePath, path.extname(imagePath));
}

async function handleBuild(args: AtlasToolArgs) {
  if (!args.images || args.images.length === 0) {
    return errors.invalidArgument('atlas build requires at least one path in "images".');
  }
  if (!args.output_path) {
    return errors.invalidArgument('atlas build requires an "output_path" (atlas PNG).');
  }

  const outputPath = path.resolve(args.output_path);
  const layoutPath = args.layout_path
    ? path.resolve(args.layout_path)
    : path.join(path.dirname(outputPath), `${spriteName(outputPath)}.json`);

  // 1. Decode every sprite
  const seen = new Set<string>();
  const boxes: Box<Sprite>[] = [];
  for (const imagePath of args.images) {
    const name = spriteName(imagePath);
    if (seen.has(name)) {
      return errors.duplicateSpriteName(name);
    }
    seen.add(name);

    let image: RgbaImage;
    try {
      image = await loadPngFile(path.resolve(imagePath));
    } catch (e: unknown) {
      return errors.domainError(errorMessage(e));
    }
    boxes.push({ width: px(image.width), height: px(image.height), data: { name, image } });
  }

  // 2. Pack
  const result = packBoxes(toPackConfig(args), boxes);
  if (!result.ok) {
    const { box } = result.error;
    return errors.unplaceableBox(box.data.name, box.width, box.height);
  }
  const { packed } = result;

  // 3. Compose and write the bitmap
  const atlas = composeAtlas(packed, (sprite) => sprite.image);
  try {
    await savePngFile(outputPath, atlas);
  } catch {
    return errors.cannotWritePath(outputPath);
  }

  // 4. Write the layout with sprite names as payload
  const layout: PackedBoxes<string> = {
    width: packed.width,
    height: packed.height,
    boxes: packed.boxes.map((box) => ({ ...box, data: box.data.name })),
  };
  try {
    await saveLayoutFile(layoutPath, layout, spriteNameCodec);
  } catch {
    return errors.cannotWritePath(layoutPath);
  }

  return {
    content: [
      {
        type: 'text' as const,
        text: JSON.stringify({
          output_path: outputPath,
          layout_path: layoutPath,
          width: atlas.width,
          height: atlas.height,
          sprite_count: packed.boxes.length,
        }),
      },
    ],
  };
}

async function handleVerify(layoutPath: string | undefined) {
  if (!layoutPath) {
    return errors.invalidArgument('atlas verify requires a "layout_path".');
  }

  let layout: PackedBoxes<unknown>;
  try {
    layout = await loadLayoutFile(path.resolve(layoutPath), { decode: (raw) => raw });
  } catch (e: unknown) {
    return errors.domainError(errorMessage(e));
  }

  const overlaps = boxIntersections(layout.boxes);
  const outOfBounds: number[] = [];
  layout.boxes.forEach((box, index) => {
    if (box.x + box.width > layout.width || box.y + box.height > layout.height) {
      outOfBounds.push(index);
    }
  });

  return {
    content: [
      {
        type: 'text' as const,
        text: JSON.stringify({
          valid: overlaps.length === 0 && outOfBounds.length === 0,
          overlaps,
          out_of_bounds: outOfBounds,
        }),
      },
    ],
  };
}
