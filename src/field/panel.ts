// src/field/panel.ts
import { UnknownPanelKindError } from "./errors.js";
import { Exits } from "./exits.js";

export type PanelKind =
  | "EMPTY"
  | "NEUTRAL"
  | "HOME"
  | "ENCOUNTER"
  | "DRAW"
  | "BONUS"
  | "DROP"
  | "WARP"
  | "DRAW_2X"
  | "BONUS_2X"
  | "DROP_2X"
  | "DECK"
  | "ENCOUNTER_2X"
  | "MOVE"
  | "MOVE_2X"
  | "WARP_MOVE"
  | "WARP_MOVE_2X"
  | "ICE"
  | "HEAL"
  | "HEAL_2X"
  | "DAMAGE"
  | "DAMAGE_2X";

// Byte codes as written by the game into .fld files.
const PANEL_KIND_BY_BYTE = new Map<number, PanelKind>([
  [0x00, "EMPTY"],
  [0x01, "NEUTRAL"],
  [0x02, "HOME"],
  [0x03, "ENCOUNTER"],
  [0x04, "DRAW"],
  [0x05, "BONUS"],
  [0x06, "DROP"],
  [0x07, "WARP"],
  [0x08, "DRAW_2X"],
  [0x09, "BONUS_2X"],
  [0x0a, "DROP_2X"],
  [0x12, "DECK"],
  [0x14, "ENCOUNTER_2X"],
  [0x15, "MOVE"],
  [0x16, "MOVE_2X"],
  [0x17, "WARP_MOVE"],
  [0x18, "WARP_MOVE_2X"],
  [0x19, "ICE"],
  [0x1b, "HEAL"],
  [0x1c, "HEAL_2X"],
  [0x20, "DAMAGE"],
  [0x21, "DAMAGE_2X"],
]);

const BYTE_BY_PANEL_KIND = new Map<PanelKind, number>();
for (const [b, kind] of PANEL_KIND_BY_BYTE.entries()) BYTE_BY_PANEL_KIND.set(kind, b);

export const PANEL_KINDS: ReadonlyArray<PanelKind> = Array.from(PANEL_KIND_BY_BYTE.values());

/**
 * Kinds whose byte code has not been checked against field files shipped with
 * the game. Decoders report them through their warn callback.
 */
export const UNCONFIRMED_PANEL_KINDS: ReadonlySet<PanelKind> = new Set<PanelKind>([
  "WARP_MOVE_2X",
  "HEAL_2X",
]);

export function panelKindFromByte(b: number): PanelKind {
  const kind = PANEL_KIND_BY_BYTE.get(b);
  if (kind === undefined) throw new UnknownPanelKindError(b);
  return kind;
}

export function panelKindToByte(kind: PanelKind): number {
  const b = BYTE_BY_PANEL_KIND.get(kind);
  if (b === undefined) throw new Error(`Panel kind '${kind}' has no byte code`);
  return b;
}

export function isPanelKind(v: unknown): v is PanelKind {
  return typeof v === "string" && PANEL_KINDS.some((k) => k === v);
}

export type Panel = {
  kind: PanelKind;
  /** Exits used in normal play. */
  exits: Exits;
  /**
   * Exits used while Backtrack is active. Often called "entrances", though a
   * panel may have an entrance and an exit on the same side.
   */
  exitsBacktrack: Exits;
};

export function newPanel(kind: PanelKind, exits: Exits = Exits.none()): Panel {
  return { kind, exits, exitsBacktrack: Exits.none() };
}

export function clonePanel(p: Readonly<Panel>): Panel {
  return { kind: p.kind, exits: p.exits, exitsBacktrack: p.exitsBacktrack };
}

export function panelsEqual(a: Readonly<Panel>, b: Readonly<Panel>): boolean {
  return a.kind === b.kind && a.exits.equals(b.exits) && a.exitsBacktrack.equals(b.exitsBacktrack);
}

// Packed exit byte: low nibble = exits, high nibble = exitsBacktrack.
export function packExits(p: Readonly<Panel>): number {
  return (p.exitsBacktrack.bits << 4) | p.exits.bits;
}

export function unpackExits(kind: PanelKind, packed: number): Panel {
  return {
    kind,
    exits: Exits.fromBits(packed & 0xf),
    exitsBacktrack: Exits.fromBits((packed >> 4) & 0xf),
  };
}
