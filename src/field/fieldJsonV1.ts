// src/field/fieldJsonV1.ts
import { InvalidDocumentError } from "./errors.js";
import { DIR_ORDER, Exits, type Dir } from "./exits.js";
import { Field } from "./field.js";
import { PANEL_KINDS, isPanelKind, type Panel, type PanelKind } from "./panel.js";

export const FIELD_JSON_SCHEMA = "fieldtools.field.json.v1";

export type PanelJson = {
  kind: PanelKind;
  exits: Dir[]; // N, E, S, W order
  exitsBacktrack: Dir[];
};

export type FieldJsonV1 = {
  schema: typeof FIELD_JSON_SCHEMA;
  width: number;
  height: number;
  panels: PanelJson[]; // row-major, length = width*height
};

function isRecord(v: unknown): v is Record<string, unknown> {
  return typeof v === "object" && v !== null;
}

function isDir(v: unknown): v is Dir {
  return typeof v === "string" && DIR_ORDER.some((d) => d === v);
}

function parseDim(v: unknown, name: string): number {
  if (typeof v !== "number" || !Number.isInteger(v) || v < 0 || v > 0xffff) {
    throw new InvalidDocumentError(`Invalid ${name}: expected integer in [0, 65535]`);
  }
  return v;
}

function parseDirArray(v: unknown, path: string): Dir[] {
  if (!Array.isArray(v)) throw new InvalidDocumentError(`Invalid ${path}: expected array`);
  const out: Dir[] = [];
  for (let i = 0; i < v.length; i++) {
    const d: unknown = v[i];
    if (!isDir(d)) throw new InvalidDocumentError(`Invalid ${path}[${i}]: expected N|E|S|W`);
    out.push(d);
  }
  // canonical order, no duplicates
  return Exits.fromDirs(out).dirs();
}

function parsePanelJson(v: unknown, path: string): PanelJson {
  if (!isRecord(v)) throw new InvalidDocumentError(`Invalid ${path}: expected object`);
  const kind = v.kind;
  if (!isPanelKind(kind)) {
    throw new InvalidDocumentError(
      `Invalid ${path}.kind: expected one of ${PANEL_KINDS.join("|")}`,
    );
  }
  return {
    kind,
    exits: v.exits === undefined ? [] : parseDirArray(v.exits, `${path}.exits`),
    exitsBacktrack:
      v.exitsBacktrack === undefined ? [] : parseDirArray(v.exitsBacktrack, `${path}.exitsBacktrack`),
  };
}

export function parseFieldJsonV1(input: unknown): FieldJsonV1 {
  if (!isRecord(input)) throw new InvalidDocumentError("Invalid JSON: expected object");
  if (input.schema !== FIELD_JSON_SCHEMA) throw new InvalidDocumentError("Invalid schema");

  const width = parseDim(input.width, "width");
  const height = parseDim(input.height, "height");

  if (!Array.isArray(input.panels)) throw new InvalidDocumentError("Invalid panels: expected array");
  if (input.panels.length !== width * height) {
    throw new InvalidDocumentError(
      `Invalid panels: expected ${width * height} entries for ${width}x${height}, got ${input.panels.length}`,
    );
  }

  const panels: PanelJson[] = [];
  for (let i = 0; i < input.panels.length; i++) {
    panels.push(parsePanelJson(input.panels[i], `panels[${i}]`));
  }

  return { schema: FIELD_JSON_SCHEMA, width, height, panels };
}

export function stringifyFieldJsonV1(doc: FieldJsonV1): string {
  return JSON.stringify(doc, null, 2) + "\n";
}

export function fieldToJsonV1(field: Field): FieldJsonV1 {
  return {
    schema: FIELD_JSON_SCHEMA,
    width: field.width,
    height: field.height,
    panels: field.toPanels().map((p) => ({
      kind: p.kind,
      exits: p.exits.dirs(),
      exitsBacktrack: p.exitsBacktrack.dirs(),
    })),
  };
}

export function fieldFromJsonV1(doc: FieldJsonV1): Field {
  const panels: Panel[] = doc.panels.map((p) => ({
    kind: p.kind,
    exits: Exits.fromDirs(p.exits),
    exitsBacktrack: Exits.fromDirs(p.exitsBacktrack),
  }));
  return Field.fromPanels(panels, doc.width, doc.height);
}
