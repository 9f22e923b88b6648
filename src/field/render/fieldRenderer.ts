// src/field/render/fieldRenderer.ts
import type { Dir } from "../exits.js";
import type { Field } from "../field.js";
import type { PanelKind } from "../panel.js";
import { writePngRgba } from "./png.js";
import { createImage, fillRect, type Rgba, type RgbaImage } from "./rgbaImage.js";

export const PANEL_COLORS: Readonly<Record<PanelKind, Rgba>> = {
  EMPTY: [0, 0, 0, 0],
  NEUTRAL: [200, 200, 200, 255],
  HOME: [240, 240, 240, 255],
  ENCOUNTER: [220, 60, 60, 255],
  DRAW: [70, 200, 90, 255],
  BONUS: [240, 200, 40, 255],
  DROP: [60, 110, 220, 255],
  WARP: [170, 80, 210, 255],
  DRAW_2X: [30, 140, 50, 255],
  BONUS_2X: [200, 150, 0, 255],
  DROP_2X: [30, 60, 160, 255],
  DECK: [120, 80, 40, 255],
  ENCOUNTER_2X: [150, 20, 20, 255],
  MOVE: [60, 200, 200, 255],
  MOVE_2X: [20, 140, 140, 255],
  WARP_MOVE: [220, 120, 220, 255],
  WARP_MOVE_2X: [160, 60, 160, 255],
  ICE: [170, 220, 250, 255],
  HEAL: [250, 150, 180, 255],
  HEAL_2X: [220, 90, 130, 255],
  DAMAGE: [90, 90, 90, 255],
  DAMAGE_2X: [40, 40, 40, 255],
};

export const EXIT_COLOR: Rgba = [0, 0, 0, 255];
export const BACKTRACK_COLOR: Rgba = [255, 120, 0, 255];

export type FieldRendererOptions = Readonly<{
  /** Side of one panel in pixels. */
  cell?: number;
  showBacktrack?: boolean;
}>;

export class FieldRenderer {
  public readonly cell: number;
  private readonly showBacktrack: boolean;

  public constructor(opts: FieldRendererOptions = {}) {
    const cell = opts.cell ?? 16;
    if (!Number.isInteger(cell) || cell < 4) throw new RangeError(`cell must be an integer >= 4, got ${cell}`);
    this.cell = cell;
    this.showBacktrack = opts.showBacktrack === true;
  }

  public renderField(field: Field): RgbaImage {
    const c = this.cell;
    const img = createImage(field.width * c, field.height * c);

    for (const [x, y] of field.positions()) {
      const p = field.get(x, y).panel;
      if (p.kind === "EMPTY") continue;

      const left = x * c;
      const top = y * c;
      fillRect(img, left + 1, top + 1, left + c - 1, top + c - 1, PANEL_COLORS[p.kind]);

      for (const d of p.exits.dirs()) this.drawBar(img, left, top, d, 0, EXIT_COLOR);
      if (this.showBacktrack) {
        for (const d of p.exitsBacktrack.dirs()) {
          this.drawBar(img, left, top, d, this.thickness(), BACKTRACK_COLOR);
        }
      }
    }

    return img;
  }

  public renderFieldToPng(field: Field): Buffer {
    return writePngRgba(this.renderField(field));
  }

  private thickness(): number {
    return Math.max(1, Math.floor(this.cell / 8));
  }

  // Bar centred on one edge of the cell, `inset` pixels in from the edge.
  private drawBar(img: RgbaImage, left: number, top: number, d: Dir, inset: number, color: Rgba): void {
    const c = this.cell;
    const t = this.thickness();
    const len = Math.floor(c / 2);
    const start = Math.floor((c - len) / 2);

    switch (d) {
      case "N":
        fillRect(img, left + start, top + inset, left + start + len, top + inset + t, color);
        return;
      case "S":
        fillRect(img, left + start, top + c - inset - t, left + start + len, top + c - inset, color);
        return;
      case "W":
        fillRect(img, left + inset, top + start, left + inset + t, top + start + len, color);
        return;
      case "E":
        fillRect(img, left + c - inset - t, top + start, left + c - inset, top + start + len, color);
        return;
    }
  }
}
