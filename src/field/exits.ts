// src/field/exits.ts
export type Dir = "N" | "E" | "S" | "W";

export const DIR_ORDER: ReadonlyArray<Dir> = ["N", "E", "S", "W"];

const BIT_BY_DIR: Readonly<Record<Dir, number>> = {
  W: 0b0001,
  N: 0b0010,
  E: 0b0100,
  S: 0b1000,
};

export function oppositeDir(d: Dir): Dir {
  switch (d) {
    case "N":
      return "S";
    case "S":
      return "N";
    case "E":
      return "W";
    case "W":
      return "E";
  }
}

/** Unit step for a direction. Row 0 is the top row, so north is `y - 1`. */
export function dirStep(d: Dir): readonly [dx: number, dy: number] {
  switch (d) {
    case "N":
      return [0, -1];
    case "E":
      return [1, 0];
    case "S":
      return [0, 1];
    case "W":
      return [-1, 0];
  }
}

/**
 * A panel's exits: a 4-bit set over W (bit 0), N (bit 1), E (bit 2), S (bit 3).
 *
 * Combine directions with `union`; test with `has`, which is true when any bit
 * of the argument is present:
 *
 * ```ts
 * const ns = Exits.NORTH.union(Exits.SOUTH);
 * ns.has(Exits.SOUTH); // true
 * ns.has(Exits.EAST.union(Exits.NORTH)); // true
 * ```
 */
export class Exits {
  public static readonly WEST = new Exits(BIT_BY_DIR.W);
  public static readonly NORTH = new Exits(BIT_BY_DIR.N);
  public static readonly EAST = new Exits(BIT_BY_DIR.E);
  public static readonly SOUTH = new Exits(BIT_BY_DIR.S);

  private constructor(public readonly bits: number) {}

  public static none(): Exits {
    return new Exits(0);
  }

  public static fromBits(bits: number): Exits {
    if (!Number.isInteger(bits) || bits < 0 || bits > 0xf) {
      throw new RangeError(`Exit bits must be in 0..15, got ${bits}`);
    }
    return new Exits(bits);
  }

  public static of(d: Dir): Exits {
    return new Exits(BIT_BY_DIR[d]);
  }

  public static fromDirs(dirs: ReadonlyArray<Dir>): Exits {
    let m = 0;
    for (const d of dirs) m |= BIT_BY_DIR[d];
    return new Exits(m);
  }

  public has(mask: Exits): boolean {
    return (this.bits & mask.bits) !== 0;
  }

  public hasDir(d: Dir): boolean {
    return (this.bits & BIT_BY_DIR[d]) !== 0;
  }

  public union(other: Exits): Exits {
    return new Exits(this.bits | other.bits);
  }

  public equals(other: Exits): boolean {
    return this.bits === other.bits;
  }

  public isEmpty(): boolean {
    return this.bits === 0;
  }

  /** Directions present, in N, E, S, W order. */
  public dirs(): Dir[] {
    return DIR_ORDER.filter((d) => this.hasDir(d));
  }
}
