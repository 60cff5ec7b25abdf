import path from 'node:path';

import type { SourceImage } from '@rp/sim';
import sharp from 'sharp';

import type { TilesetSource } from './assembler';

/** Decodes any image sharp reads into tightly packed 8-bit sRGB RGBA. */
export async function decodeImage(filePath: string): Promise<SourceImage> {
  const { data, info } = await sharp(filePath).ensureAlpha().raw().toBuffer({ resolveWithObject: true });
  return {
    width: info.width,
    height: info.height,
    format: 'rgba8unorm-srgb',
    data: new Uint8Array(data.buffer, data.byteOffset, data.byteLength),
  };
}

export function fileTilesetSource(assetRoot: string): TilesetSource {
  return {
    load: (relativePath) => decodeImage(path.resolve(assetRoot, relativePath)),
  };
}
