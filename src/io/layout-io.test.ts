import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import * as fs from 'node:fs/promises';
import {
  serializeLayout,
  parseLayout,
  loadLayoutFile,
  saveLayoutFile,
  spriteNameCodec,
  type PayloadCodec,
} from './layout-io.js';
import { type PackedBoxes } from '../types/box.js';
import { px } from '../types/scalar.js';

// Mock file I/O so tests don't touch disk
vi.mock('node:fs/promises', async () => ({
  ...(await vi.importActual('node:fs/promises')),
  readFile: vi.fn(),
  mkdir: vi.fn(),
  writeFile: vi.fn(),
}));

const packed: PackedBoxes<string> = {
  width: px(20),
  height: px(10),
  boxes: [
    { x: px(0), y: px(0), width: px(10), height: px(10), data: 'hero' },
    { x: px(12), y: px(0), width: px(8), height: px(4), data: 'coin' },
  ],
};

const layoutJson = {
  boxpack_version: '1.0',
  width: 20,
  height: 10,
  boxes: [
    { x: 0, y: 0, width: 10, height: 10, data: 'hero' },
    { x: 12, y: 0, width: 8, height: 4, data: 'coin' },
  ],
};

interface Frame {
  name: string;
  durationMs: number;
}

const frameCodec: PayloadCodec<Frame> = {
  encode: (frame) => [frame.name, frame.durationMs],
  decode: (raw) => {
    if (!Array.isArray(raw) || typeof raw[0] !== 'string' || typeof raw[1] !== 'number') {
      throw new Error('expected [name, durationMs]');
    }
    return { name: raw[0], durationMs: raw[1] };
  },
};

function enoent(): Error {
  return Object.assign(new Error('ENOENT: no such file or directory'), { code: 'ENOENT' });
}

describe('layout I/O', () => {
  beforeEach(() => {
    vi.mocked(fs.mkdir).mockResolvedValue(undefined);
    vi.mocked(fs.writeFile).mockResolvedValue(undefined);
  });

  afterEach(() => {
    vi.resetAllMocks();
  });

  describe('serializeLayout', () => {
    it('flattens a packing into the file shape', () => {
      expect(serializeLayout(packed, spriteNameCodec)).toEqual(layoutJson);
    });

    it('delegates payload encoding to the codec', () => {
      const frames: PackedBoxes<Frame> = {
        width: px(4),
        height: px(4),
        boxes: [{ x: px(0), y: px(0), width: px(4), height: px(4), data: { name: 'walk_0', durationMs: 100 } }],
      };
      expect(serializeLayout(frames, frameCodec).boxes[0].data).toEqual(['walk_0', 100]);
    });
  });

  describe('parseLayout', () => {
    it('restores a packing and decodes payloads', () => {
      expect(parseLayout(layoutJson, spriteNameCodec)).toEqual(packed);
    });

    it('reverses serializeLayout with a custom codec', () => {
      const frames: PackedBoxes<Frame> = {
        width: px(8),
        height: px(4),
        boxes: [
          { x: px(0), y: px(0), width: px(4), height: px(4), data: { name: 'walk_0', durationMs: 100 } },
          { x: px(4), y: px(0), width: px(4), height: px(4), data: { name: 'walk_1', durationMs: 120 } },
        ],
      };
      expect(parseLayout(serializeLayout(frames, frameCodec), frameCodec)).toEqual(frames);
    });

    it('rejects input that is not an object', () => {
      expect(() => parseLayout('nope', spriteNameCodec)).toThrow('root:');
    });

    it('rejects a missing container size', () => {
      const { width: _width, ...withoutWidth } = layoutJson;
      expect(() => parseLayout(withoutWidth, spriteNameCodec)).toThrow('width:');
    });

    it('rejects negative coordinates', () => {
      const broken = { ...layoutJson, boxes: [{ x: -1, y: 0, width: 1, height: 1, data: 'a' }] };
      expect(() => parseLayout(broken, spriteNameCodec)).toThrow('boxes.0.x:');
    });

    it('reports payloads the codec cannot decode', () => {
      const broken = { ...layoutJson, boxes: [{ x: 0, y: 0, width: 1, height: 1, data: 'hero' }] };
      expect(() => parseLayout(broken, frameCodec)).toThrow('boxes.0.data: expected [name, durationMs]');
    });
  });

  describe('loadLayoutFile', () => {
    it('reads and parses a layout file', async () => {
      vi.mocked(fs.readFile).mockResolvedValue(JSON.stringify(layoutJson));
      await expect(loadLayoutFile('/out/atlas.json', spriteNameCodec)).resolves.toEqual(packed);
      expect(fs.readFile).toHaveBeenCalledWith('/out/atlas.json', 'utf8');
    });

    it('throws layoutFileNotFound for a missing file', async () => {
      vi.mocked(fs.readFile).mockRejectedValue(enoent());
      await expect(loadLayoutFile('/out/missing.json', spriteNameCodec)).rejects.toThrow(
        'Layout file not found: /out/missing.json',
      );
    });

    it('throws invalidLayoutFile for malformed JSON', async () => {
      vi.mocked(fs.readFile).mockResolvedValue('{ not json');
      await expect(loadLayoutFile('/out/bad.json', spriteNameCodec)).rejects.toThrow(
        'Invalid layout file: /out/bad.json. Invalid JSON.',
      );
    });

    it('throws invalidLayoutFile for a structurally wrong layout', async () => {
      vi.mocked(fs.readFile).mockResolvedValue(JSON.stringify({ boxpack_version: '1.0' }));
      await expect(loadLayoutFile('/out/empty.json', spriteNameCodec)).rejects.toThrow(
        'Invalid layout file: /out/empty.json. width:',
      );
    });
  });

  describe('saveLayoutFile', () => {
    it('writes pretty-printed JSON next to a created directory', async () => {
      await saveLayoutFile('/out/sheets/atlas.json', packed, spriteNameCodec);

      expect(fs.mkdir).toHaveBeenCalledWith('/out/sheets', { recursive: true });
      expect(fs.writeFile).toHaveBeenCalledWith('/out/sheets/atlas.json', JSON.stringify(layoutJson, null, 2), 'utf8');
    });
  });
});
