// src/field/render/rgbaImage.ts
export type Rgba = readonly [r: number, g: number, b: number, a: number];

export type RgbaImage = {
  width: number;
  height: number;
  data: Uint8Array; // length = width*height*4 (RGBA)
};

export function createImage(width: number, height: number, fill: Rgba = [0, 0, 0, 0]): RgbaImage {
  const [r, g, b, a] = fill;
  const data = new Uint8Array(width * height * 4);
  for (let i = 0; i < width * height; i++) {
    const o = i * 4;
    data[o + 0] = r;
    data[o + 1] = g;
    data[o + 2] = b;
    data[o + 3] = a;
  }
  return { width, height, data };
}

/** Overwrites pixels of the rectangle [left, right) x [top, bottom), clipped to the image. */
export function fillRect(
  img: RgbaImage,
  left: number,
  top: number,
  right: number,
  bottom: number,
  color: Rgba,
): void {
  const x0 = Math.max(0, left);
  const y0 = Math.max(0, top);
  const x1 = Math.min(img.width, right);
  const y1 = Math.min(img.height, bottom);
  if (x1 <= x0 || y1 <= y0) return;

  const [r, g, b, a] = color;
  for (let y = y0; y < y1; y++) {
    for (let x = x0; x < x1; x++) {
      const o = (y * img.width + x) * 4;
      img.data[o + 0] = r;
      img.data[o + 1] = g;
      img.data[o + 2] = b;
      img.data[o + 3] = a;
    }
  }
}

export function pixelAt(img: RgbaImage, x: number, y: number): Rgba {
  const o = (y * img.width + x) * 4;
  return [img.data[o + 0]!, img.data[o + 1]!, img.data[o + 2]!, img.data[o + 3]!];
}
