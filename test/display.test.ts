import { describe, expect, it } from "vitest";
import { readFile } from "node:fs/promises";
import path from "node:path";

import { panelGlyph, renderFieldAscii } from "../src/field/display.js";
import { Exits } from "../src/field/exits.js";
import { Field } from "../src/field/field.js";
import { decodeFldx } from "../src/field/fldx.js";
import { PANEL_KINDS, newPanel } from "../src/field/panel.js";

const FIXTURES_DIR = path.resolve(process.cwd(), "fixtures", "fields");

describe("ASCII display", () => {
  it("gives every kind a distinct two-character glyph", () => {
    const glyphs = PANEL_KINDS.map(panelGlyph);
    for (const g of glyphs) expect(g).toHaveLength(2);
    expect(new Set(glyphs).size).toBe(PANEL_KINDS.length);
  });

  it("draws a horizontal connector pointing the way of travel", () => {
    const f = Field.fromRows([[newPanel("HOME", Exits.EAST), newPanel("NEUTRAL", Exits.WEST)]]);
    expect(renderFieldAscii(f)).toBe("@@<[]");

    const g = Field.fromRows([[newPanel("HOME", Exits.EAST), newPanel("NEUTRAL")]]);
    expect(renderFieldAscii(g)).toBe("@@>[]");
  });

  it("draws vertical connectors between rows", () => {
    const f = Field.fromRows([[newPanel("HOME", Exits.SOUTH)], [newPanel("DRAW")]]);
    expect(renderFieldAscii(f)).toBe("@@\n\\/\nda");

    const g = Field.fromRows([[newPanel("HOME")], [newPanel("DRAW", Exits.NORTH)]]);
    expect(renderFieldAscii(g)).toBe("@@\n/\\\nda");
  });

  it("renders the ring fixture", async () => {
    const f = decodeFldx(await readFile(path.join(FIXTURES_DIR, "ring-3x3.fldx")));
    expect(renderFieldAscii(f)).toBe(
      ["@@>da>@@", "/\\    \\/", "bs    en", "/\\    \\/", "@@<dr<@@"].join("\n"),
    );
  });

  it("renders an empty field as an empty string", () => {
    expect(renderFieldAscii(Field.empty())).toBe("");
  });
});
