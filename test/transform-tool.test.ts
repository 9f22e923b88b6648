import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { mkdir, mkdtemp, readdir, readFile, rm, writeFile } from "node:fs/promises";
import os from "node:os";
import path from "node:path";

import { InvalidDocumentError } from "../src/field/errors.js";
import { Exits } from "../src/field/exits.js";
import { Field } from "../src/field/field.js";
import {
  decodeFieldBytes,
  fieldFormatFromPath,
  readFieldFile,
  requireFieldFormat,
  writeFieldFile,
} from "../src/field/fieldFile.js";
import { newPanel } from "../src/field/panel.js";
import { runRenderTool } from "../src/field/render/renderTool.js";
import { runTransformTool } from "../src/field/transformTool.js";

function strip(): Field {
  const f = Field.fromRows([[newPanel("HOME", Exits.EAST), newPanel("NEUTRAL", Exits.WEST)]]);
  f.buildBacktrack();
  return f;
}

let dir = "";

beforeEach(async () => {
  dir = await mkdtemp(path.join(os.tmpdir(), "fieldtools-"));
  vi.spyOn(console, "log").mockImplementation(() => {});
  vi.spyOn(console, "warn").mockImplementation(() => {});
});

afterEach(async () => {
  vi.restoreAllMocks();
  await rm(dir, { recursive: true, force: true });
});

describe("field files", () => {
  it("picks the format from the extension", () => {
    expect(fieldFormatFromPath("a/b.FLDX")).toBe("fldx");
    expect(fieldFormatFromPath("a/b.fld")).toBe("fld");
    expect(fieldFormatFromPath("a/b.json")).toBe("json");
    expect(fieldFormatFromPath("a/b.txt")).toBeNull();
    expect(() => requireFieldFormat("a/b.txt")).toThrow(InvalidDocumentError);
  });

  it("writes and reads every format", async () => {
    const f = strip();
    for (const name of ["s.fldx", "s.json", "nested/s.fld"]) {
      const p = path.join(dir, name);
      await writeFieldFile(p, f);
      const back = await readFieldFile(p, { fldDims: { width: 2, height: 1 } });
      expect(back.equals(f), name).toBe(true);
    }
  });

  it("reads .fld as 15x15 unless told otherwise", async () => {
    const panels = Array.from({ length: 225 }, () => newPanel("NEUTRAL"));
    const p = path.join(dir, "big.fld");
    await writeFieldFile(p, Field.fromPanels(panels, 15, 15));
    const back = await readFieldFile(p);
    expect(back.width).toBe(15);
    expect(back.height).toBe(15);
  });

  it("reports unparseable JSON as an invalid document", async () => {
    const p = path.join(dir, "broken.json");
    await writeFile(p, "{ not json", "utf8");
    await expect(readFieldFile(p)).rejects.toThrow(InvalidDocumentError);
  });

  it("passes decoder warnings to the caller", () => {
    const warnings: string[] = [];
    decodeFieldBytes("fldx", Uint8Array.of(0x01, 0x00, 0x01, 0x00, 0x1c, 0x00), {
      warn: (m) => warnings.push(m),
    });
    expect(warnings).toEqual(["Panel kind HEAL_2X (0x1c) uses an unconfirmed byte code"]);
  });
});

describe("runTransformTool", () => {
  it("writes a suffixed copy next to a single file", async () => {
    const input = path.join(dir, "strip.fldx");
    await writeFieldFile(input, strip());

    const summary = await runTransformTool("rot90", input, {});
    expect(summary).toEqual({ processed: 1, written: 1, skipped: 0 });

    const out = await readFieldFile(path.join(dir, "strip.rot90.fldx"));
    expect(out.width).toBe(1);
    expect(out.height).toBe(2);
    expect(out.get(0, 0).exits.dirs()).toEqual(["S"]);
  });

  it("skips an existing output unless overwriting", async () => {
    const input = path.join(dir, "strip.fldx");
    await writeFieldFile(input, strip());
    await writeFile(path.join(dir, "strip.rot90.fldx"), "placeholder");

    expect(await runTransformTool("rot90", input, {})).toEqual({ processed: 1, written: 0, skipped: 1 });
    expect(await readFile(path.join(dir, "strip.rot90.fldx"), "utf8")).toBe("placeholder");

    expect(await runTransformTool("rot90", input, { overwrite: true })).toEqual({
      processed: 1,
      written: 1,
      skipped: 0,
    });
  });

  it("writes nothing on a dry run", async () => {
    const input = path.join(dir, "strip.fldx");
    await writeFieldFile(input, strip());

    await runTransformTool("flip-h", input, { dryRun: true });
    expect(await readdir(dir)).toEqual(["strip.fldx"]);
  });

  it("transforms in place with a backup", async () => {
    const input = path.join(dir, "strip.fldx");
    await writeFieldFile(input, strip());
    const before = await readFile(input);

    await runTransformTool("flip-h", input, { inPlace: true, backup: true });

    expect(Array.from(await readFile(`${input}.bak`))).toEqual(Array.from(before));
    const flipped = await readFieldFile(input);
    expect(flipped.get(0, 0).kind).toBe("NEUTRAL");
    expect(flipped.get(0, 0).exits.dirs()).toEqual(["E"]);
  });

  it("mirrors a directory, leaving JSON out unless asked", async () => {
    const input = path.join(dir, "in");
    await mkdir(path.join(input, "sub"), { recursive: true });
    await writeFieldFile(path.join(input, "a.fldx"), strip());
    await writeFieldFile(path.join(input, "b.json"), strip());
    await writeFieldFile(path.join(input, "sub", "c.fldx"), strip());

    const flat = await runTransformTool("rot180", input, {});
    expect(flat).toEqual({ processed: 1, written: 1, skipped: 0 });
    expect(await readdir(path.join(dir, "in__rot180"))).toEqual(["a.fldx"]);

    const out = path.join(dir, "all");
    const deep = await runTransformTool("rot180", input, { out, recursive: true, includeJson: true });
    expect(deep).toEqual({ processed: 3, written: 3, skipped: 0 });
    const c = await readFieldFile(path.join(out, "sub", "c.fldx"));
    expect(c.get(0, 0).kind).toBe("NEUTRAL");
  });

  it("reports unconfirmed panel codes through console.warn", async () => {
    const input = path.join(dir, "heal.fldx");
    await writeFile(input, Uint8Array.of(0x01, 0x00, 0x01, 0x00, 0x1c, 0x00));
    const warn = vi.mocked(console.warn);

    await runTransformTool("flip-h", input, {});

    expect(warn).toHaveBeenCalledWith(
      `${input}: Panel kind HEAL_2X (0x1c) uses an unconfirmed byte code`,
    );
  });

  it("rejects an unknown op before reading anything", async () => {
    await expect(runTransformTool("spin", path.join(dir, "missing.fldx"), {})).rejects.toThrow(
      InvalidDocumentError,
    );
  });
});

describe("runRenderTool", () => {
  it("writes a PNG beside the input", async () => {
    const input = path.join(dir, "strip.fldx");
    await writeFieldFile(input, strip());

    await runRenderTool(input, { cell: 4 });

    const png = await readFile(path.join(dir, "strip.png"));
    expect(Array.from(png.subarray(0, 4))).toEqual([0x89, 0x50, 0x4e, 0x47]);
  });

  it("reports unconfirmed panel codes through console.warn", async () => {
    const input = path.join(dir, "warp.fldx");
    await writeFile(input, Uint8Array.of(0x01, 0x00, 0x01, 0x00, 0x18, 0x00));

    await runRenderTool(input, { cell: 4 });

    expect(vi.mocked(console.warn)).toHaveBeenCalledWith(
      `${input}: Panel kind WARP_MOVE_2X (0x18) uses an unconfirmed byte code`,
    );
  });
});
