import { z } from 'zod';
import { type McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { packBoxes, packingEfficiency } from '../algorithms/packer.js';
import { type Box } from '../types/box.js';
import { type PackConfig } from '../types/config.js';
import { px } from '../types/scalar.js';
import * as errors from '../errors.js';

/**
 * Packing options shared by the `pack` and `atlas` tools.
 * Negative values are accepted and clamped to zero by the packer.
 */
export const packOptionsSchema = {
  spacing: z.number().finite().optional().describe('Gap in pixels reserved between adjacent boxes (default 0).'),
  power_of_two: z
    .boolean()
    .optional()
    .describe('Round the container width and height up to the next power of two (default false).'),
  minimum_width: z.number().finite().optional().describe('Minimum container width in pixels (default 0).'),
  maximum_width: z
    .number()
    .finite()
    .optional()
    .describe('Maximum container width in pixels, before power-of-two rounding (default unbounded).'),
  maximum_height: z
    .number()
    .finite()
    .optional()
    .describe('Maximum container height in pixels, before power-of-two rounding (default unbounded).'),
};

/**
 * Zod input schema for the `pack` tool.
 */
const packInputSchema = {
  boxes: z
    .array(
      z.object({
        id: z.string().optional().describe('Label echoed back in the result (defaults to the input index).'),
        width: z.number().finite().describe('Box width; negative values use the absolute value.'),
        height: z.number().finite().describe('Box height; negative values use the absolute value.'),
      }),
    )
    .describe('Rectangles to pack'),
  ...packOptionsSchema,
};

export interface PackOptions {
  spacing?: number;
  power_of_two?: boolean;
  minimum_width?: number;
  maximum_width?: number;
  maximum_height?: number;
}

export interface PackToolArgs extends PackOptions {
  boxes: Array<{ id?: string; width: number; height: number }>;
}

/**
 * Maps snake_case tool options onto a PackConfig.
 */
export function toPackConfig(options: PackOptions): PackConfig {
  return {
    spacing: options.spacing === undefined ? undefined : px(options.spacing),
    powerOfTwoSize: options.power_of_two,
    minimumWidth: options.minimum_width === undefined ? undefined : px(options.minimum_width),
    maximumWidth: options.maximum_width === undefined ? undefined : px(options.maximum_width),
    maximumHeight: options.maximum_height === undefined ? undefined : px(options.maximum_height),
  };
}

/**
 * Registers the `pack` tool on the MCP server.
 */
export function registerPackTool(server: McpServer): void {
  server.registerTool(
    'pack',
    {
      title: 'Pack',
      description:
        'Pack rectangles into a small container without overlap. Returns the container size, the packing efficiency and the position of every box.',
      inputSchema: packInputSchema,
    },
    (args) => handlePack(args),
  );
}

export function handlePack(args: PackToolArgs) {
  const boxes: Box<string>[] = args.boxes.map((box, index) => ({
    width: px(box.width),
    height: px(box.height),
    data: box.id ?? String(index),
  }));

  const result = packBoxes(toPackConfig(args), boxes);
  if (!result.ok) {
    const { box } = result.error;
    return errors.unplaceableBox(box.data, Math.abs(box.width), Math.abs(box.height));
  }

  const { packed } = result;
  return {
    content: [
      {
        type: 'text' as const,
        text: JSON.stringify({
          width: packed.width,
          height: packed.height,
          efficiency: packingEfficiency(packed),
          boxes: packed.boxes.map((box) => ({
            id: box.data,
            x: box.x,
            y: box.y,
            width: box.width,
            height: box.height,
          })),
        }),
      },
    ],
  };
}
