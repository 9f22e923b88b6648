// src/field/format.ts
import { SizeMismatchError } from "./errors.js";
import { Field } from "./field.js";
import { UNCONFIRMED_PANEL_KINDS, panelKindFromByte, unpackExits, type Panel } from "./panel.js";

export type WarnFn = (msg: string) => void;

export type FieldDims = Readonly<{ width: number; height: number }>;

/** Tracks which unconfirmed kinds a decode has already reported. */
export class PanelDecoder {
  private readonly reported = new Set<string>();
  public readonly panels: Panel[] = [];

  public constructor(private readonly warn: WarnFn) {}

  public push(kindByte: number, packedExits: number): void {
    const kind = panelKindFromByte(kindByte);
    if (UNCONFIRMED_PANEL_KINDS.has(kind) && !this.reported.has(kind)) {
      this.reported.add(kind);
      this.warn(
        `Panel kind ${kind} (0x${kindByte.toString(16).padStart(2, "0")}) uses an unconfirmed byte code`,
      );
    }
    this.panels.push(unpackExits(kind, packedExits));
  }

  public toField(dims: FieldDims): Field {
    const expected = dims.width * dims.height;
    if (this.panels.length !== expected) {
      throw new SizeMismatchError(expected, this.panels.length);
    }
    return Field.fromPanels(this.panels, dims.width, dims.height);
  }
}
