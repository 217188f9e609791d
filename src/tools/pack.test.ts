import { describe, it, expect } from 'vitest';
import { handlePack, toPackConfig } from './pack.js';

function parseText(result: { content: Array<{ type: 'text'; text: string }> }): unknown {
  return JSON.parse(result.content[0].text);
}

describe('toPackConfig', () => {
  it('maps snake_case options onto the packer config', () => {
    expect(
      toPackConfig({ spacing: 2, power_of_two: true, minimum_width: 64, maximum_width: 512, maximum_height: 256 }),
    ).toEqual({
      spacing: 2,
      powerOfTwoSize: true,
      minimumWidth: 64,
      maximumWidth: 512,
      maximumHeight: 256,
    });
  });

  it('leaves absent options undefined', () => {
    expect(toPackConfig({})).toEqual({
      spacing: undefined,
      powerOfTwoSize: undefined,
      minimumWidth: undefined,
      maximumWidth: undefined,
      maximumHeight: undefined,
    });
  });
});

describe('pack tool', () => {
  it('returns the container, efficiency and every placement', () => {
    const result = handlePack({
      boxes: [
        { id: 'a', width: 10, height: 10 },
        { id: 'b', width: 10, height: 10 },
      ],
      spacing: 2,
    });

    expect('isError' in result).toBe(false);
    if ('isError' in result) return;

    const body = parseText(result);
    expect(body).toEqual({
      width: 22,
      height: 10,
      efficiency: 200 / 220,
      boxes: [
        { id: 'a', x: 0, y: 0, width: 10, height: 10 },
        { id: 'b', x: 12, y: 0, width: 10, height: 10 },
      ],
    });
  });

  it('labels boxes by input index when no id is given', () => {
    const result = handlePack({
      boxes: [
        { width: 8, height: 8 },
        { width: 32, height: 32 },
      ],
    });
    if ('isError' in result) throw new Error(result.content[0].text);

    const body = parseText(result);
    expect(body).toMatchObject({
      boxes: [
        { id: '1', x: 0, y: 0 },
        { id: '0', x: 32, y: 0 },
      ],
    });
  });

  it('places negative sizes by their absolute value', () => {
    const result = handlePack({ boxes: [{ id: 'flip', width: -6, height: -4 }] });
    if ('isError' in result) throw new Error(result.content[0].text);

    expect(parseText(result)).toEqual({
      width: 6,
      height: 4,
      efficiency: 1,
      boxes: [{ id: 'flip', x: 0, y: 0, width: 6, height: 4 }],
    });
  });

  it('rounds the container to powers of two', () => {
    const result = handlePack({ boxes: [{ id: 'a', width: 20, height: 5 }], power_of_two: true });
    if ('isError' in result) throw new Error(result.content[0].text);

    expect(parseText(result)).toMatchObject({ width: 32, height: 8 });
  });

  it('returns an empty packing for no boxes', () => {
    const result = handlePack({ boxes: [], minimum_width: 16 });
    if ('isError' in result) throw new Error(result.content[0].text);

    // a zero-area container counts as fully used
    expect(parseText(result)).toEqual({ width: 16, height: 0, efficiency: 1, boxes: [] });
  });

  it('reports a box that exceeds the maximum container size', () => {
    const result = handlePack({
      boxes: [
        { id: 'a', width: 10, height: 10 },
        { id: 'b', width: -10, height: 10 },
      ],
      maximum_width: 10,
      maximum_height: 10,
    });

    expect(result).toEqual({
      isError: true,
      content: [
        {
          type: 'text',
          text: "Box 'b' (10×10) does not fit in any free region. Raise maximum_width/maximum_height or reduce spacing.",
        },
      ],
    });
  });
});
