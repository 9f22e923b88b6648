// src/field/fldx.ts
//
// The community `.fldx` format. All integers are little-endian.
//
//   u16 width
//   u16 height
//   width*height panels, row-major, 2 bytes each:
//     [0] panel kind, as in .fld
//     [1] packed exits, as in .fld
import { BinaryReader, BinaryWriter } from "./binary.js";
import type { Field } from "./field.js";
import { PanelDecoder, type WarnFn } from "./format.js";
import { packExits, panelKindToByte } from "./panel.js";

export const FLDX_HEADER_SIZE = 4;
export const FLDX_RECORD_SIZE = 2;

export function encodeFldx(field: Field): Uint8Array {
  if (field.width > 0xffff || field.height > 0xffff) {
    throw new RangeError(`Field ${field.width}x${field.height} is too large for .fldx (u16 dims)`);
  }

  const w = new BinaryWriter();
  w.writeU16LE(field.width);
  w.writeU16LE(field.height);

  for (const [x, y] of field.positions()) {
    const p = field.get(x, y).panel;
    // the kind's byte code is already the .fld one
    w.writeU8(panelKindToByte(p.kind));
    w.writeU8(packExits(p));
  }

  return w.toBuffer();
}

export function decodeFldx(bytes: Uint8Array, warn: WarnFn = () => {}): Field {
  const r = new BinaryReader(Buffer.from(bytes));
  const width = r.readU16LE();
  const height = r.readU16LE();

  const dec = new PanelDecoder(warn);
  while (r.remaining() > 0) {
    const rec = r.readBytes(FLDX_RECORD_SIZE);
    dec.push(rec[0]!, rec[1]!);
  }

  return dec.toField({ width, height });
}
