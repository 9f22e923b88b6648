// src/field/display.ts
//
// Two text lines per field row: kind glyphs with horizontal connectors, then
// vertical connectors to the row below. Debugging aid only; nothing parses it.
import type { Field } from "./field.js";
import type { PanelKind } from "./panel.js";

const GLYPH: Readonly<Record<PanelKind, string>> = {
  EMPTY: "  ",
  NEUTRAL: "[]",
  HOME: "@@",
  ENCOUNTER: "en",
  DRAW: "da",
  BONUS: "bs",
  DROP: "dr",
  WARP: "wa",
  DRAW_2X: "DA",
  BONUS_2X: "BS",
  DROP_2X: "DR",
  DECK: "__",
  ENCOUNTER_2X: "EN",
  MOVE: "mo",
  MOVE_2X: "MO",
  WARP_MOVE: "wm",
  WARP_MOVE_2X: "WM",
  ICE: "ic",
  HEAL: "he",
  HEAL_2X: "HE",
  DAMAGE: "dm",
  DAMAGE_2X: "DM",
};

export function panelGlyph(kind: PanelKind): string {
  return GLYPH[kind];
}

export function renderFieldAscii(field: Field): string {
  const lines: string[] = [];

  for (let y = 0; y < field.height; y++) {
    let row = "";
    for (let x = 0; x < field.width; x++) {
      const here = field.get(x, y);
      row += GLYPH[here.kind];

      const east = here.offset(1, 0);
      if (!east.ok) continue;
      if (east.ref.exits.hasDir("W")) row += "<";
      else if (here.exits.hasDir("E")) row += ">";
      else row += " ";
    }
    lines.push(row);

    if (y === field.height - 1) break;

    const cells: string[] = [];
    for (let x = 0; x < field.width; x++) {
      const here = field.get(x, y);
      const south = here.offset(0, 1);
      if (south.ok && south.ref.exits.hasDir("N")) cells.push("/\\");
      else if (here.exits.hasDir("S")) cells.push("\\/");
      else cells.push("  ");
    }
    lines.push(cells.join(" "));
  }

  return lines.join("\n");
}
