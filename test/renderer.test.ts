import { describe, expect, it } from "vitest";

import { Exits } from "../src/field/exits.js";
import { Field } from "../src/field/field.js";
import { newPanel } from "../src/field/panel.js";
import { BACKTRACK_COLOR, EXIT_COLOR, FieldRenderer, PANEL_COLORS } from "../src/field/render/fieldRenderer.js";
import { readPngRgba } from "../src/field/render/png.js";
import { pixelAt } from "../src/field/render/rgbaImage.js";

function home(): Field {
  const f = Field.fromRows([[newPanel("HOME", Exits.EAST)]]);
  f.getMut(0, 0).exitsBacktrack = Exits.WEST;
  return f;
}

describe("FieldRenderer", () => {
  it("sizes the image by cell", () => {
    const f = Field.fromRows([[newPanel("HOME"), newPanel("DRAW")]]);
    const img = new FieldRenderer({ cell: 10 }).renderField(f);
    expect(img.width).toBe(20);
    expect(img.height).toBe(10);
  });

  it("fills the panel inset by one pixel and draws exit bars", () => {
    const img = new FieldRenderer({ cell: 8 }).renderField(home());
    expect(pixelAt(img, 0, 0)).toEqual([0, 0, 0, 0]);
    expect(pixelAt(img, 4, 4)).toEqual(PANEL_COLORS.HOME);
    expect(pixelAt(img, 7, 3)).toEqual(EXIT_COLOR);
    expect(pixelAt(img, 7, 1)).toEqual([0, 0, 0, 0]);
    expect(pixelAt(img, 1, 3)).toEqual(PANEL_COLORS.HOME);
  });

  it("draws backtrack bars only when asked", () => {
    const img = new FieldRenderer({ cell: 8, showBacktrack: true }).renderField(home());
    expect(pixelAt(img, 1, 3)).toEqual(BACKTRACK_COLOR);
    expect(pixelAt(img, 7, 3)).toEqual(EXIT_COLOR);
  });

  it("leaves EMPTY panels transparent", () => {
    const img = new FieldRenderer({ cell: 8 }).renderField(Field.fromRows([[newPanel("EMPTY")]]));
    expect(pixelAt(img, 4, 4)).toEqual([0, 0, 0, 0]);
  });

  it("writes a PNG that reads back to the same pixels", () => {
    const r = new FieldRenderer({ cell: 6 });
    const img = r.renderField(home());
    const back = readPngRgba(r.renderFieldToPng(home()));
    expect(back.width).toBe(6);
    expect(back.height).toBe(6);
    expect(back.data).toEqual(img.data);
  });

  it("rejects tiny cells", () => {
    expect(() => new FieldRenderer({ cell: 3 })).toThrow(RangeError);
  });
});
