import { describe, it, expect } from 'vitest';
import { pack, boxIntersections, px, type Box } from './lib.js';

describe('library entry point', () => {
  it('packs and verifies without the server', () => {
    const boxes: Box<string>[] = [
      { width: px(16), height: px(16), data: 'a' },
      { width: px(16), height: px(16), data: 'b' },
      { width: px(16), height: px(16), data: 'c' },
      { width: px(16), height: px(16), data: 'd' },
    ];

    const packed = pack({}, boxes);

    expect(packed.width).toBe(64);
    expect(packed.height).toBe(16);
    expect(boxIntersections(packed.boxes)).toEqual([]);
  });
});
