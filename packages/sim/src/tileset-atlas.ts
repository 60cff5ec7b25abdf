import type { Cell } from './collision-grid';

export const PIXEL_FORMATS = [
  'r8unorm',
  'rg8unorm',
  'rgba8unorm',
  'rgba8unorm-srgb',
  'bgra8unorm',
  'bgra8unorm-srgb',
  'rgba16float',
  'rgba32float',
  'bc1-rgba-unorm',
  'bc7-rgba-unorm',
  'astc-4x4-unorm',
] as const;

export type PixelFormat = (typeof PIXEL_FORMATS)[number];

const PIXEL_BYTES: Record<PixelFormat, number | null> = {
  r8unorm: 1,
  rg8unorm: 2,
  rgba8unorm: 4,
  'rgba8unorm-srgb': 4,
  bgra8unorm: 4,
  'bgra8unorm-srgb': 4,
  rgba16float: 8,
  rgba32float: 16,
  // Block-compressed formats have no per-pixel stride.
  'bc1-rgba-unorm': null,
  'bc7-rgba-unorm': null,
  'astc-4x4-unorm': null,
};

export function pixelSize(format: PixelFormat): number | null {
  return PIXEL_BYTES[format];
}

/** Highest tile count an atlas can hold; tile indices are u16. */
export const MAX_TILES = 0xffff;

export type TilesetErrorCode =
  | 'UnsupportedFormat'
  | 'IncorrectFormat'
  | 'NoSourceData'
  | 'InvalidSourceOffset'
  | 'TileLimit';

export class TilesetError extends Error {
  readonly code: TilesetErrorCode;

  constructor(code: TilesetErrorCode, message: string) {
    super(message);
    this.name = 'TilesetError';
    this.code = code;
  }
}

export interface SourceImage {
  width: number;
  height: number;
  format: PixelFormat;
  data: Uint8Array | null;
}

/** A 2D array texture: `depth` layers of `width`×`height` pixels. */
export interface ArrayImage {
  width: number;
  height: number;
  depth: number;
  format: PixelFormat;
  data: Uint8Array;
  sampler: 'nearest';
  usage: 'render-world';
}

/**
 * Accumulates tiles cut from source images into the layers of an array texture.
 */
export class TilesetAtlasBuilder {
  readonly tileSize: Cell;
  readonly format: PixelFormat;
  readonly pixelBytes: number;
  private readonly chunks: Uint8Array[] = [];
  private tiles = 0;

  private constructor(tileSize: Cell, format: PixelFormat, pixelBytes: number) {
    this.tileSize = tileSize;
    this.format = format;
    this.pixelBytes = pixelBytes;
  }

  static create(tileSize: Cell, format: PixelFormat): TilesetAtlasBuilder {
    const bytes = pixelSize(format);
    if (bytes === null) {
      throw new TilesetError('UnsupportedFormat', `pixel format ${format} has no fixed pixel size`);
    }
    return new TilesetAtlasBuilder(tileSize, format, bytes);
  }

  get tileCount(): number {
    return this.tiles;
  }

  get tileBytes(): number {
    return this.tileSize.x * this.tileSize.y * this.pixelBytes;
  }

  /**
   * Copies the tile whose top-left pixel is `sourceOffset` and returns its layer index.
   */
  addTile(source: SourceImage, sourceOffset: Cell): number {
    if (source.format !== this.format) {
      throw new TilesetError(
        'IncorrectFormat',
        `expected source format ${this.format}, got ${source.format}`,
      );
    }
    if (!source.data) {
      throw new TilesetError('NoSourceData', 'source image has no pixel data');
    }
    if (this.tiles >= MAX_TILES) {
      throw new TilesetError('TileLimit', `tileset already holds ${MAX_TILES} tiles`);
    }

    const byteOffset = (sourceOffset.x + source.width * sourceOffset.y) * this.pixelBytes;
    const sourceRowBytes = source.width * this.pixelBytes;
    const tileRowBytes = this.tileSize.x * this.pixelBytes;

    const lastByte = byteOffset + (this.tileSize.y - 1) * sourceRowBytes + tileRowBytes;
    if (sourceOffset.x < 0 || sourceOffset.y < 0 || lastByte > source.data.length) {
      throw new TilesetError(
        'InvalidSourceOffset',
        `tile at (${sourceOffset.x}, ${sourceOffset.y}) reads past the ${source.width}x${source.height} source`,
      );
    }

    for (let row = 0; row < this.tileSize.y; row += 1) {
      const start = byteOffset + row * sourceRowBytes;
      this.chunks.push(source.data.slice(start, start + tileRowBytes));
    }

    const index = this.tiles;
    this.tiles += 1;
    return index;
  }

  build(): ArrayImage {
    let depth = this.tiles;
    // Six layers would be taken for a cubemap; pad with an empty layer.
    if (depth > 0 && depth % 6 === 0) {
      depth += 1;
    }

    const data = new Uint8Array(depth * this.tileBytes);
    let cursor = 0;
    for (const chunk of this.chunks) {
      data.set(chunk, cursor);
      cursor += chunk.length;
    }

    return {
      width: this.tileSize.x,
      height: this.tileSize.y,
      depth,
      format: this.format,
      data,
      sampler: 'nearest',
      usage: 'render-world',
    };
  }
}
