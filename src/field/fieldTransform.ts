// src/field/fieldTransform.ts
import { InvalidDocumentError } from "./errors.js";
import { Exits, type Dir } from "./exits.js";
import { Field } from "./field.js";
import type { Panel } from "./panel.js";

export type FieldTransformKind =
  | "ROTATE_90"
  | "ROTATE_180"
  | "ROTATE_270"
  | "FLIP_H"
  | "FLIP_V"
  | "FLIP_DIAG_NWSE"
  | "FLIP_DIAG_NESW";

export const FIELD_TRANSFORM_KINDS: ReadonlyArray<FieldTransformKind> = [
  "ROTATE_90",
  "ROTATE_180",
  "ROTATE_270",
  "FLIP_H",
  "FLIP_V",
  "FLIP_DIAG_NWSE",
  "FLIP_DIAG_NESW",
];

export function mapDir(d: Dir, kind: FieldTransformKind): Dir {
  switch (kind) {
    case "ROTATE_90":
      // N->E->S->W->N (clockwise)
      if (d === "N") return "E";
      if (d === "E") return "S";
      if (d === "S") return "W";
      return "N";

    case "ROTATE_180":
      if (d === "N") return "S";
      if (d === "S") return "N";
      if (d === "E") return "W";
      return "E";

    case "ROTATE_270":
      if (d === "N") return "W";
      if (d === "W") return "S";
      if (d === "S") return "E";
      return "N";

    case "FLIP_H":
      if (d === "E") return "W";
      if (d === "W") return "E";
      return d;

    case "FLIP_V":
      if (d === "N") return "S";
      if (d === "S") return "N";
      return d;

    case "FLIP_DIAG_NWSE":
      // reflect across y=x: N<->W, E<->S
      if (d === "N") return "W";
      if (d === "W") return "N";
      if (d === "E") return "S";
      return "E";

    case "FLIP_DIAG_NESW":
      // reflect across anti-diagonal: N<->E, S<->W
      if (d === "N") return "E";
      if (d === "E") return "N";
      if (d === "S") return "W";
      return "S";
  }
}

function mapExits(e: Exits, kind: FieldTransformKind): Exits {
  return Exits.fromDirs(e.dirs().map((d) => mapDir(d, kind)));
}

function mapPos(
  x: number,
  y: number,
  w: number,
  h: number,
  kind: FieldTransformKind,
): { x: number; y: number; w2: number; h2: number } {
  switch (kind) {
    case "ROTATE_90":
      return { x: h - 1 - y, y: x, w2: h, h2: w };
    case "ROTATE_180":
      return { x: w - 1 - x, y: h - 1 - y, w2: w, h2: h };
    case "ROTATE_270":
      return { x: y, y: w - 1 - x, w2: h, h2: w };
    case "FLIP_H":
      return { x: w - 1 - x, y, w2: w, h2: h };
    case "FLIP_V":
      return { x, y: h - 1 - y, w2: w, h2: h };
    case "FLIP_DIAG_NWSE":
      return { x: y, y: x, w2: h, h2: w };
    case "FLIP_DIAG_NESW":
      return { x: h - 1 - y, y: w - 1 - x, w2: h, h2: w };
  }
}

/** Moves every panel and remaps both of its exit sets. */
export function transformField(field: Field, kind: FieldTransformKind): Field {
  const w = field.width;
  const h = field.height;

  const { w2, h2 } = mapPos(0, 0, w, h, kind);
  const out = new Array<Panel | undefined>(w2 * h2).fill(undefined);

  for (const [x, y] of field.positions()) {
    const p = field.get(x, y).panel;
    const q = mapPos(x, y, w, h, kind);
    out[q.y * w2 + q.x] = {
      kind: p.kind,
      exits: mapExits(p.exits, kind),
      exitsBacktrack: mapExits(p.exitsBacktrack, kind),
    };
  }

  const panels: Panel[] = [];
  for (let i = 0; i < out.length; i++) {
    const p = out[i];
    if (p === undefined) throw new Error(`Transform produced hole at index ${i}`);
    panels.push(p);
  }

  return Field.fromPanels(panels, w2, h2);
}

export function parseTransformKind(op: string): FieldTransformKind {
  const s = op.trim().toLowerCase().replace(/_/g, "-");

  if (s === "rot90" || s === "rotate90" || s === "rotate-90" || s === "r90") return "ROTATE_90";
  if (s === "rot180" || s === "rotate180" || s === "rotate-180" || s === "r180")
    return "ROTATE_180";
  if (s === "rot270" || s === "rotate270" || s === "rotate-270" || s === "r270")
    return "ROTATE_270";

  if (s === "flip-h" || s === "fliph" || s === "flip-horizontal" || s === "mirror-h")
    return "FLIP_H";
  if (s === "flip-v" || s === "flipv" || s === "flip-vertical" || s === "mirror-v") return "FLIP_V";

  if (s === "flip-nwse" || s === "flip-diag-nwse" || s === "diag-nwse") return "FLIP_DIAG_NWSE";
  if (s === "flip-nesw" || s === "flip-diag-nesw" || s === "diag-nesw") return "FLIP_DIAG_NESW";

  throw new InvalidDocumentError(
    `Unknown transform '${op}'. Expected: rot90|rot180|rot270|flip-h|flip-v|flip-nwse|flip-nesw`,
  );
}
