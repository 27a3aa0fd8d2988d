import Sharp from 'sharp';

/** A decoded icon: one 0xAARRGGBB value per pixel, row-major from the top row. */
export interface IconImage {
  width: number;
  height: number;
  pixels: Uint32Array;
}

export function argb(a: number, r: number, g: number, b: number): number {
  return ((a << 24) | (r << 16) | (g << 8) | b) >>> 0;
}

export const IconImage = {
  create(width: number, height: number): IconImage {
    return { width, height, pixels: new Uint32Array(width * height) };
  },
  fromRGBA(width: number, height: number, rgba: Uint8Array): IconImage {
    if (rgba.length !== width * height * 4) {
      throw new Error(`expected ${width * height * 4} bytes of RGBA data, got ${rgba.length}`);
    }
    const image = IconImage.create(width, height);
    for (let i = 0; i < image.pixels.length; i++) {
      image.pixels[i] = argb(rgba[i * 4 + 3], rgba[i * 4], rgba[i * 4 + 1], rgba[i * 4 + 2]);
    }
    return image;
  },
  toRGBA(image: IconImage): Buffer {
    const buf = Buffer.alloc(image.pixels.length * 4);
    for (let i = 0; i < image.pixels.length; i++) {
      const pix = image.pixels[i];
      buf[i * 4] = (pix >>> 16) & 0xff;
      buf[i * 4 + 1] = (pix >>> 8) & 0xff;
      buf[i * 4 + 2] = pix & 0xff;
      buf[i * 4 + 3] = pix >>> 24;
    }
    return buf;
  },
  toPNG(image: IconImage): Promise<Buffer> {
    return Sharp(IconImage.toRGBA(image), {
      raw: {
        width: image.width,
        height: image.height,
        channels: 4,
      },
    }).png().toBuffer();
  },
};
