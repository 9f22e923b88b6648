// src/field/fld.ts
//
// The game's own `.fld` format: a flattened, row-major array of panels with no
// header, so the dimensions have to come from somewhere else.
//
// Each panel is 8 bytes, read as two little-endian 4-byte integers of which
// only the low byte ever carries data:
//   [0]    panel kind (0 = no panel)
//   [1..3] 0
//   [4]    packed exits: high nibble = Backtrack exits, low nibble = exits,
//          each nibble S E N W from high bit to low bit
//   [5..7] 0
// Padding bytes are ignored when reading and written as 0.
import { BinaryReader, BinaryWriter } from "./binary.js";
import type { Field } from "./field.js";
import { PanelDecoder, type FieldDims, type WarnFn } from "./format.js";
import { packExits, panelKindToByte } from "./panel.js";

export const FLD_RECORD_SIZE = 8;

/** Square 15x15 field, the size of Training Program. */
export const FLD_S15: FieldDims = { width: 15, height: 15 };

export function encodeFld(field: Field): Uint8Array {
  const w = new BinaryWriter();
  for (const [x, y] of field.positions()) {
    const p = field.get(x, y).panel;
    w.writeBytes(Uint8Array.of(panelKindToByte(p.kind), 0, 0, 0, packExits(p), 0, 0, 0));
  }
  return w.toBuffer();
}

export function decodeFld(dims: FieldDims, bytes: Uint8Array, warn: WarnFn = () => {}): Field {
  const r = new BinaryReader(Buffer.from(bytes));
  const dec = new PanelDecoder(warn);

  while (r.remaining() > 0) {
    const rec = r.readBytes(FLD_RECORD_SIZE);
    dec.push(rec[0]!, rec[4]!);
  }

  return dec.toField(dims);
}

