import { describe, expect, it } from "vitest";
import { readdir, readFile } from "node:fs/promises";
import path from "node:path";

import { SizeMismatchError, UnexpectedEndOfInputError, UnknownPanelKindError } from "../src/field/errors.js";
import { Exits } from "../src/field/exits.js";
import { Field } from "../src/field/field.js";
import { decodeFldx, encodeFldx } from "../src/field/fldx.js";
import { newPanel } from "../src/field/panel.js";

const FIXTURES_DIR = path.resolve(process.cwd(), "fixtures", "fields");

function firstDiffIndex(a: Uint8Array, b: Uint8Array): number {
  const n = Math.min(a.length, b.length);
  for (let i = 0; i < n; i++) if (a[i] !== b[i]) return i;
  return a.length === b.length ? -1 : n;
}

describe(".fldx codec", () => {
  it("encodes a 2x1 field as header + 2 bytes per panel", () => {
    const f = Field.fromRows([[newPanel("HOME", Exits.EAST), newPanel("NEUTRAL", Exits.WEST)]]);
    const bytes = encodeFldx(f);
    expect(Array.from(bytes)).toEqual([0x02, 0x00, 0x01, 0x00, 0x02, 0x04, 0x01, 0x01]);

    const back = decodeFldx(bytes);
    expect(back.width).toBe(2);
    expect(back.height).toBe(1);
    expect(back.get(0, 0).kind).toBe("HOME");
    expect(back.get(0, 0).exits.dirs()).toEqual(["E"]);
    expect(back.get(1, 0).kind).toBe("NEUTRAL");
    expect(back.get(1, 0).exits.dirs()).toEqual(["W"]);
    expect(back.equals(f)).toBe(true);
  });

  it("writes dimensions little-endian", () => {
    const f = Field.fromPanels(Array.from({ length: 300 }, () => newPanel("EMPTY")), 300, 1);
    const bytes = encodeFldx(f);
    expect(Array.from(bytes.subarray(0, 4))).toEqual([0x2c, 0x01, 0x01, 0x00]);
    expect(bytes.length).toBe(4 + 600);
  });

  it("round-trips an empty field", () => {
    const bytes = encodeFldx(Field.empty());
    expect(Array.from(bytes)).toEqual([0, 0, 0, 0]);
    expect(decodeFldx(bytes).equals(Field.empty())).toBe(true);
  });

  it("fails with a size mismatch when records are missing", () => {
    const bytes = Uint8Array.of(0x02, 0x00, 0x02, 0x00, 0x01, 0x00, 0x01, 0x00, 0x01, 0x00);
    try {
      decodeFldx(bytes);
      expect.unreachable();
    } catch (e: unknown) {
      expect(e).toBeInstanceOf(SizeMismatchError);
      if (e instanceof SizeMismatchError) {
        expect(e.expected).toBe(4);
        expect(e.actual).toBe(3);
      }
    }
  });

  it("fails on an unknown kind byte and names it", () => {
    const bytes = Uint8Array.of(0x01, 0x00, 0x01, 0x00, 0xff, 0x00);
    try {
      decodeFldx(bytes);
      expect.unreachable();
    } catch (e: unknown) {
      expect(e).toBeInstanceOf(UnknownPanelKindError);
      if (e instanceof UnknownPanelKindError) expect(e.byte).toBe(0xff);
    }
  });

  it("fails on a truncated header", () => {
    expect(() => decodeFldx(new Uint8Array(0))).toThrow(UnexpectedEndOfInputError);
    expect(() => decodeFldx(Uint8Array.of(0x02))).toThrow(UnexpectedEndOfInputError);
    expect(() => decodeFldx(Uint8Array.of(0x02, 0x00, 0x01))).toThrow(UnexpectedEndOfInputError);
  });

  it("fails on a trailing partial record", () => {
    const bytes = Uint8Array.of(0x01, 0x00, 0x01, 0x00, 0x01, 0x00, 0x01);
    expect(() => decodeFldx(bytes)).toThrow(UnexpectedEndOfInputError);
  });

  it("byte-identical: decode -> encode for every .fldx fixture", async () => {
    const entries = await readdir(FIXTURES_DIR, { withFileTypes: true });
    const files = entries
      .filter((e) => e.isFile() && e.name.toLowerCase().endsWith(".fldx"))
      .map((e) => e.name)
      .sort();

    expect(files.length).toBeGreaterThan(0);

    for (const name of files) {
      const original = new Uint8Array(await readFile(path.join(FIXTURES_DIR, name)));
      const rebuilt = encodeFldx(decodeFldx(original));
      expect(firstDiffIndex(original, rebuilt), `${name}: first differing byte`).toBe(-1);
    }
  });
});
