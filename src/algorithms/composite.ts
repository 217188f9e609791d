import { type PackedBoxes } from '../types/box.js';

/**
 * A decoded RGBA bitmap: `width × height × 4` bytes, row-major.
 */
export interface RgbaImage {
    width: number;
    height: number;
    data: Uint8Array;
}

/**
 * Copies every placed image into a single transparent atlas.
 *
 * Pixels are copied verbatim (no blending): packed boxes never overlap, so
 * every destination pixel has at most one source. Each image is clipped to its
 * placed box and to the atlas bounds.
 *
 * @param packed The packing to render; its width and height size the atlas.
 * @param imageOf Extracts the source bitmap from a box payload.
 * @returns A new RGBA buffer of the packed width × height.
 */
export function composeAtlas<T>(packed: PackedBoxes<T>, imageOf: (data: T) => RgbaImage): RgbaImage {
    const width = Math.ceil(packed.width);
    const height = Math.ceil(packed.height);
    const buffer = new Uint8Array(width * height * 4); // Initialized to 0 (transparent)

    for (const box of packed.boxes) {
        const image = imageOf(box.data);
        const originX = Math.round(box.x);
        const originY = Math.round(box.y);

        const copyWidth = Math.min(image.width, Math.round(box.width), width - originX);
        const copyHeight = Math.min(image.height, Math.round(box.height), height - originY);
        if (copyWidth <= 0 || copyHeight <= 0) continue;

        for (let row = 0; row < copyHeight; row++) {
            const srcStart = row * image.width * 4;
            const dstStart = ((originY + row) * width + originX) * 4;
            buffer.set(image.data.subarray(srcStart, srcStart + copyWidth * 4), dstStart);
        }
    }

    return { width, height, data: buffer };
}
