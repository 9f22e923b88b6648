// src/field/field.ts
import { MalformedConstructionError } from "./errors.js";
import { DIR_ORDER, Exits, dirStep, oppositeDir, type Dir } from "./exits.js";
import { clonePanel, panelsEqual, type Panel } from "./panel.js";

export type Pos = readonly [x: number, y: number];

/** `ok: false` hands back the original accessor: the offset left the field. */
export type OffsetResult<R> = Readonly<{ ok: true; ref: R }> | Readonly<{ ok: false; ref: R }>;

/**
 * @internal
 * Shared between a field and the handles it gives out. `epoch` moves forward
 * whenever a mutable handle is issued or the grid is rewritten in bulk; a
 * handle from an older epoch is stale.
 */
export class FieldStore {
  public epoch = 0;
  public writerLive = false;

  public constructor(
    public readonly width: number,
    public readonly height: number,
    public readonly data: Panel[],
  ) {}

  public index(x: number, y: number): number {
    return y * this.width + x;
  }

  public at(x: number, y: number): Panel {
    const p = this.data[this.index(x, y)];
    if (p === undefined) throw new RangeError(`No panel at (${x}, ${y})`);
    return p;
  }

  public offset(x: number, y: number, dx: number, dy: number): Pos | undefined {
    if (!Number.isInteger(dx) || !Number.isInteger(dy)) {
      throw new RangeError(`Offset (${dx}, ${dy}) must be whole steps`);
    }
    const nx = x + dx;
    const ny = y + dy;
    if (nx < 0 || ny < 0 || nx >= this.width || ny >= this.height) return undefined;
    return [nx, ny];
  }

  public checkBounds(x: number, y: number): void {
    if (!Number.isInteger(x) || x < 0 || x >= this.width) {
      throw new RangeError(`x (${x}) is out of bounds for width ${this.width}`);
    }
    if (!Number.isInteger(y) || y < 0 || y >= this.height) {
      throw new RangeError(`y (${y}) is out of bounds for height ${this.height}`);
    }
  }

  public checkEpoch(epoch: number): void {
    if (epoch !== this.epoch) {
      throw new Error("Stale panel handle: the field was changed or handed out a newer mutable handle");
    }
  }

  public revokeAll(): void {
    this.epoch++;
    this.writerLive = false;
  }
}

/** Read-only view of one panel. Any number may be live at once. */
export class PanelRef {
  /** @internal use {@link Field.get} */
  public constructor(
    private readonly store: FieldStore,
    public readonly x: number,
    public readonly y: number,
    private readonly epoch: number,
  ) {}

  /** A copy of the panel; writing to it does not touch the field. */
  public get panel(): Panel {
    return clonePanel(this.current());
  }

  public get kind(): Panel["kind"] {
    return this.current().kind;
  }

  public get exits(): Exits {
    return this.current().exits;
  }

  public get exitsBacktrack(): Exits {
    return this.current().exitsBacktrack;
  }

  public offset(dx: number, dy: number): OffsetResult<PanelRef> {
    this.store.checkEpoch(this.epoch);
    const p = this.store.offset(this.x, this.y, dx, dy);
    if (!p) return { ok: false, ref: this };
    return { ok: true, ref: new PanelRef(this.store, p[0], p[1], this.epoch) };
  }

  private current(): Readonly<Panel> {
    this.store.checkEpoch(this.epoch);
    return this.store.at(this.x, this.y);
  }
}

/**
 * Exclusive, writable view of one panel.
 *
 * `offset` consumes the handle it is called on when it succeeds; the returned
 * handle is the only live one. Getting another mutable handle from the field
 * revokes this one.
 */
export class PanelMut {
  private consumed = false;

  /** @internal use {@link Field.getMut} */
  public constructor(
    private readonly store: FieldStore,
    public readonly x: number,
    public readonly y: number,
    private readonly epoch: number,
  ) {}

  /** A copy of the panel; write through the setters instead. */
  public get panel(): Panel {
    return clonePanel(this.current());
  }

  public get kind(): Panel["kind"] {
    return this.current().kind;
  }

  public set kind(v: Panel["kind"]) {
    this.current().kind = v;
  }

  public get exits(): Exits {
    return this.current().exits;
  }

  public set exits(v: Exits) {
    this.current().exits = v;
  }

  public get exitsBacktrack(): Exits {
    return this.current().exitsBacktrack;
  }

  public set exitsBacktrack(v: Exits) {
    this.current().exitsBacktrack = v;
  }

  public offset(dx: number, dy: number): OffsetResult<PanelMut> {
    this.checkLive();
    const p = this.store.offset(this.x, this.y, dx, dy);
    if (!p) return { ok: false, ref: this };
    this.consumed = true;
    return { ok: true, ref: new PanelMut(this.store, p[0], p[1], this.epoch) };
  }

  private checkLive(): void {
    if (this.consumed) throw new Error("Panel handle was consumed by offset()");
    this.store.checkEpoch(this.epoch);
  }

  private current(): Panel {
    this.checkLive();
    return this.store.at(this.x, this.y);
  }
}

/**
 * A rectangular field of panels, stored as a row-major array.
 *
 * Most of a field's power comes from {@link PanelRef.offset} and
 * {@link PanelMut.offset}, which walk relative to a panel:
 *
 * ```ts
 * const field = Field.fromRows([
 *   [newPanel("DRAW"), newPanel("ENCOUNTER")],
 *   [newPanel("BONUS"), newPanel("DROP")],
 * ]);
 *
 * const step = field.getMut(0, 0).offset(1, 1);
 * if (step.ok) step.ref.kind = "DROP_2X";
 * field.get(1, 1).kind; // "DROP_2X"
 * ```
 */
export class Field {
  private readonly store: FieldStore;

  private constructor(width: number, height: number, data: Panel[]) {
    this.store = new FieldStore(width, height, data);
  }

  public static empty(): Field {
    return new Field(0, 0, []);
  }

  /** Builds a field from a row-major array; panels are copied. */
  public static fromPanels(panels: ReadonlyArray<Readonly<Panel>>, width: number, height: number): Field {
    if (!Number.isInteger(width) || width < 0 || !Number.isInteger(height) || height < 0) {
      throw new MalformedConstructionError(`Invalid field dimensions ${width}x${height}`);
    }
    if (panels.length !== width * height) {
      throw new MalformedConstructionError(
        `Data does not match size requirements: ${panels.length} panels for ${width}x${height}`,
      );
    }
    return new Field(width, height, panels.map(clonePanel));
  }

  /** Builds a field from rows; every row must have the same length. */
  public static fromRows(rows: ReadonlyArray<ReadonlyArray<Readonly<Panel>>>): Field {
    const first = rows[0];
    if (first === undefined) return Field.empty();

    const width = first.length;
    const data: Panel[] = [];
    for (let y = 0; y < rows.length; y++) {
      const row = rows[y]!;
      if (row.length !== width) {
        throw new MalformedConstructionError(
          `All rows must have the same length: row 0 has ${width}, row ${y} has ${row.length}`,
        );
      }
      for (const p of row) data.push(clonePanel(p));
    }
    return new Field(width, rows.length, data);
  }

  public get width(): number {
    return this.store.width;
  }

  public get height(): number {
    return this.store.height;
  }

  public get size(): number {
    return this.store.data.length;
  }

  public get(x: number, y: number): PanelRef {
    this.store.checkBounds(x, y);
    // A read handle ends any outstanding write handle.
    if (this.store.writerLive) this.store.revokeAll();
    return new PanelRef(this.store, x, y, this.store.epoch);
  }

  public getMut(x: number, y: number): PanelMut {
    this.store.checkBounds(x, y);
    this.store.revokeAll();
    this.store.writerLive = true;
    return new PanelMut(this.store, x, y, this.store.epoch);
  }

  /** Coordinates `(x + dx, y + dy)`, or undefined when that is off the field. */
  public offsetPos(x: number, y: number, dx: number, dy: number): Pos | undefined {
    this.store.checkBounds(x, y);
    return this.store.offset(x, y, dx, dy);
  }

  public neighbor(x: number, y: number, dir: Dir): Pos | undefined {
    const [dx, dy] = dirStep(dir);
    return this.offsetPos(x, y, dx, dy);
  }

  /** All positions, row-major. */
  public positions(): Pos[] {
    const out: Pos[] = [];
    for (let y = 0; y < this.height; y++) {
      for (let x = 0; x < this.width; x++) out.push([x, y]);
    }
    return out;
  }

  public rowIter(y: number): PanelRef[] {
    if (!Number.isInteger(y) || y < 0 || y >= this.height) {
      throw new RangeError(`y (${y}) is out of bounds for height ${this.height}`);
    }
    const out: PanelRef[] = [];
    for (let x = 0; x < this.width; x++) out.push(this.get(x, y));
    return out;
  }

  public columnIter(x: number): PanelRef[] {
    if (!Number.isInteger(x) || x < 0 || x >= this.width) {
      throw new RangeError(`x (${x}) is out of bounds for width ${this.width}`);
    }
    const out: PanelRef[] = [];
    for (let y = 0; y < this.height; y++) out.push(this.get(x, y));
    return out;
  }

  public rowsIter(): PanelRef[][] {
    const out: PanelRef[][] = [];
    for (let y = 0; y < this.height; y++) out.push(this.rowIter(y));
    return out;
  }

  public columnsIter(): PanelRef[][] {
    const out: PanelRef[][] = [];
    for (let x = 0; x < this.width; x++) out.push(this.columnIter(x));
    return out;
  }

  /** Copies of every panel, row-major. */
  public toPanels(): Panel[] {
    return this.store.data.map(clonePanel);
  }

  /** Rebuilds backtrack exits from the normal exits. Revokes outstanding handles. */
  public buildBacktrack(): void {
    const s = this.store;
    s.revokeAll();

    for (const p of s.data) p.exitsBacktrack = Exits.none();

    for (let y = 0; y < s.height; y++) {
      for (let x = 0; x < s.width; x++) {
        const exits = s.at(x, y).exits;
        for (const d of DIR_ORDER) {
          if (!exits.hasDir(d)) continue;
          const [dx, dy] = dirStep(d);
          const n = s.offset(x, y, dx, dy);
          // exits pointing off the field have nothing to enter
          if (!n) continue;
          const adjacent = s.at(n[0], n[1]);
          adjacent.exitsBacktrack = adjacent.exitsBacktrack.union(Exits.of(oppositeDir(d)));
        }
      }
    }
  }

  public equals(other: Field): boolean {
    if (this.width !== other.width || this.height !== other.height) return false;
    const a = this.store.data;
    const b = other.store.data;
    for (let i = 0; i < a.length; i++) {
      if (!panelsEqual(a[i]!, b[i]!)) return false;
    }
    return true;
  }

  public clone(): Field {
    return Field.fromPanels(this.store.data, this.width, this.height);
  }
}
