// src/field/fieldFile.ts
import path from "node:path";
import { mkdir, readFile, writeFile } from "node:fs/promises";

import { InvalidDocumentError } from "./errors.js";
import type { Field } from "./field.js";
import {
  fieldFromJsonV1,
  fieldToJsonV1,
  parseFieldJsonV1,
  stringifyFieldJsonV1,
} from "./fieldJsonV1.js";
import { FLD_S15, decodeFld, encodeFld } from "./fld.js";
import { decodeFldx, encodeFldx } from "./fldx.js";
import type { FieldDims, WarnFn } from "./format.js";

export type FieldFormat = "fld" | "fldx" | "json";

export type ReadFieldOptions = Readonly<{
  /** Dimensions of `.fld` input; defaults to 15x15. */
  fldDims?: FieldDims;
  warn?: WarnFn;
}>;

export function fieldFormatFromPath(p: string): FieldFormat | null {
  const ext = path.extname(p).toLowerCase();
  if (ext === ".fld") return "fld";
  if (ext === ".fldx") return "fldx";
  if (ext === ".json") return "json";
  return null;
}

export function requireFieldFormat(p: string): FieldFormat {
  const fmt = fieldFormatFromPath(p);
  if (!fmt) {
    throw new InvalidDocumentError(`Unsupported extension (expected .fld, .fldx or .json): ${p}`);
  }
  return fmt;
}

export function decodeFieldBytes(
  format: FieldFormat,
  bytes: Uint8Array,
  opts: ReadFieldOptions = {},
): Field {
  switch (format) {
    case "fld":
      return decodeFld(opts.fldDims ?? FLD_S15, bytes, opts.warn);
    case "fldx":
      return decodeFldx(bytes, opts.warn);
    case "json": {
      const text = Buffer.from(bytes).toString("utf8");
      let parsed: unknown;
      try {
        parsed = JSON.parse(text);
      } catch (e: unknown) {
        const msg = e instanceof Error ? e.message : String(e);
        throw new InvalidDocumentError(`Invalid JSON: ${msg}`);
      }
      return fieldFromJsonV1(parseFieldJsonV1(parsed));
    }
  }
}

export function encodeFieldBytes(format: FieldFormat, field: Field): Uint8Array {
  switch (format) {
    case "fld":
      return encodeFld(field);
    case "fldx":
      return encodeFldx(field);
    case "json":
      return Buffer.from(stringifyFieldJsonV1(fieldToJsonV1(field)), "utf8");
  }
}

export async function readFieldFile(p: string, opts: ReadFieldOptions = {}): Promise<Field> {
  const format = requireFieldFormat(p);
  const bytes = await readFile(p);
  return decodeFieldBytes(format, bytes, opts);
}

export async function writeFieldFile(p: string, field: Field): Promise<void> {
  const bytes = encodeFieldBytes(requireFieldFormat(p), field);
  await mkdir(path.dirname(p), { recursive: true });
  await writeFile(p, bytes);
}
