import { z } from 'zod';
import { type McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { boxIntersections } from '../algorithms/intersections.js';
import { type RectLike } from '../types/box.js';

/**
 * Zod input schema for the `intersections` tool.
 */
const intersectionsInputSchema = {
  rects: z
    .array(
      z.object({
        x: z.number().finite(),
        y: z.number().finite(),
        width: z.number().finite(),
        height: z.number().finite(),
      }),
    )
    .describe('Rectangles to check. Pairs are reported by their index in this list.'),
};

export interface IntersectionsToolArgs {
  rects: RectLike[];
}

/**
 * Registers the `intersections` tool on the MCP server.
 */
export function registerIntersectionsTool(server: McpServer): void {
  server.registerTool(
    'intersections',
    {
      title: 'Intersections',
      description:
        'Report every pair of rectangles that overlap with positive area. Rectangles that only share an edge do not overlap.',
      inputSchema: intersectionsInputSchema,
    },
    (args) => handleIntersections(args),
  );
}

export function handleIntersections(args: IntersectionsToolArgs) {
  const pairs = boxIntersections(args.rects);
  return {
    content: [
      {
        type: 'text' as const,
        text: JSON.stringify({ count: pairs.length, pairs }),
      },
    ],
  };
}
