import { describe, expect, it } from 'vitest';

import { MAX_TILES, TilesetAtlasBuilder, TilesetError, type SourceImage } from './tileset-atlas';

// 4x2 single-channel image whose bytes are their own linear index.
const sheet: SourceImage = {
  width: 4,
  height: 2,
  format: 'r8unorm',
  data: Uint8Array.from([0, 1, 2, 3, 4, 5, 6, 7]),
};

function errorCode(fn: () => unknown): string | undefined {
  try {
    fn();
  } catch (error) {
    if (error instanceof TilesetError) {
      return error.code;
    }
    throw error;
  }
  return undefined;
}

describe('tileset-atlas', () => {
  it('copies tiles row by row in call order', () => {
    const builder = TilesetAtlasBuilder.create({ x: 2, y: 2 }, 'r8unorm');

    expect(builder.addTile(sheet, { x: 2, y: 0 })).toBe(0);
    expect(builder.addTile(sheet, { x: 0, y: 0 })).toBe(1);

    const image = builder.build();
    expect(image.depth).toBe(2);
    expect(image.width).toBe(2);
    expect(image.height).toBe(2);
    expect(image.sampler).toBe('nearest');
    expect(Array.from(image.data)).toEqual([2, 3, 6, 7, 0, 1, 4, 5]);
  });

  it('pads six tiles with an empty seventh layer', () => {
    const width = 16 * 6;
    const source: SourceImage = {
      width,
      height: 16,
      format: 'rgba8unorm',
      data: new Uint8Array(width * 16 * 4).fill(255),
    };
    const builder = TilesetAtlasBuilder.create({ x: 16, y: 16 }, 'rgba8unorm');
    for (let i = 0; i < 6; i += 1) {
      builder.addTile(source, { x: i * 16, y: 0 });
    }

    const image = builder.build();
    const layerBytes = 16 * 16 * 4;
    expect(image.depth).toBe(7);
    expect(image.data.length).toBe(7 * layerBytes);
    expect(image.data.subarray(0, 6 * layerBytes).every((byte) => byte === 255)).toBe(true);
    expect(image.data.subarray(6 * layerBytes).every((byte) => byte === 0)).toBe(true);
  });

  it('leaves an empty atlas at depth zero', () => {
    const image = TilesetAtlasBuilder.create({ x: 2, y: 2 }, 'r8unorm').build();
    expect(image.depth).toBe(0);
    expect(image.data.length).toBe(0);
  });

  it('rejects formats without a pixel stride', () => {
    expect(errorCode(() => TilesetAtlasBuilder.create({ x: 8, y: 8 }, 'bc7-rgba-unorm'))).toBe('UnsupportedFormat');
  });

  it('rejects sources of another format', () => {
    const builder = TilesetAtlasBuilder.create({ x: 2, y: 2 }, 'rgba8unorm');
    expect(errorCode(() => builder.addTile(sheet, { x: 0, y: 0 }))).toBe('IncorrectFormat');
  });

  it('rejects sources without pixel data', () => {
    const builder = TilesetAtlasBuilder.create({ x: 2, y: 2 }, 'r8unorm');
    expect(errorCode(() => builder.addTile({ ...sheet, data: null }, { x: 0, y: 0 }))).toBe('NoSourceData');
  });

  it('rejects offsets reading past the source buffer', () => {
    const builder = TilesetAtlasBuilder.create({ x: 2, y: 2 }, 'r8unorm');
    expect(errorCode(() => builder.addTile(sheet, { x: 3, y: 0 }))).toBe('InvalidSourceOffset');
    expect(errorCode(() => builder.addTile(sheet, { x: 0, y: 1 }))).toBe('InvalidSourceOffset');
    expect(builder.tileCount).toBe(0);
  });

  it('stops at the u16 tile limit', () => {
    const pixel: SourceImage = { width: 1, height: 1, format: 'r8unorm', data: Uint8Array.from([9]) };
    const builder = TilesetAtlasBuilder.create({ x: 1, y: 1 }, 'r8unorm');
    for (let i = 0; i < MAX_TILES; i += 1) {
      builder.addTile(pixel, { x: 0, y: 0 });
    }
    expect(errorCode(() => builder.addTile(pixel, { x: 0, y: 0 }))).toBe('TileLimit');
  });
});
