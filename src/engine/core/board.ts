import {
  type Colour,
  type ShapeId,
  gridCoordAsNumber,
  shapeIdAsString,
} from "../../types/brands";
import { debugLog } from "../../utils/debug";

import { InvalidArgumentError } from "./errors";
import {
  type BlockSnapshot,
  type BoardDimensions,
  type BoardQuery,
  type GridPoint,
  type Occupant,
  DEFAULT_BOARD_DIMENSIONS,
  samePoint,
} from "./types";

import type { Shape } from "./shape";

type CellsProvider = () => ReadonlyArray<GridPoint>;

const EMPTY: Occupant = { kind: "empty" };

/**
 * Reference board: bounds, the settled pile, and the cells of the shapes that
 * are still falling. It never clears lines.
 */
export class GridBoard implements BoardQuery {
  readonly width: number;
  readonly height: number;
  private readonly pile: Array<Colour | null>;
  private readonly active = new Map<ShapeId, CellsProvider>();

  constructor(dimensions: BoardDimensions = DEFAULT_BOARD_DIMENSIONS) {
    const { height, width } = dimensions;
    if (!Number.isInteger(width) || width <= 0) {
      throw new InvalidArgumentError("Board width must be a positive integer");
    }
    if (!Number.isInteger(height) || height <= 0) {
      throw new InvalidArgumentError(
        "Board height must be a positive integer",
      );
    }
    this.width = width;
    this.height = height;
    this.pile = new Array<Colour | null>(width * height).fill(null);
  }

  isInBounds(point: GridPoint): boolean {
    const x = gridCoordAsNumber(point.x);
    const y = gridCoordAsNumber(point.y);
    return x >= 0 && x < this.width && y >= 0 && y < this.height;
  }

  occupantAt(point: GridPoint): Occupant {
    if (!this.isInBounds(point)) {
      throw new RangeError("occupantAt: out-of-bounds");
    }
    const colour = this.pile[this.idx(point)] ?? null;
    if (colour !== null) return { colour, kind: "pile" };

    for (const [owner, cells] of this.active) {
      if (cells().some((c) => samePoint(c, point))) {
        return { kind: "shape", owner };
      }
    }
    return EMPTY;
  }

  /** Registers a falling shape's cells. Returns the matching untrack. */
  track(owner: ShapeId, cells: CellsProvider): () => void {
    this.active.set(owner, cells);
    return () => {
      this.active.delete(owner);
    };
  }

  /**
   * Tracks the shape while it falls and absorbs it into the pile when it
   * joins. Returns a detach function for shapes discarded before locking.
   * A shape that has already joined goes straight into the pile.
   */
  attach(shape: Shape): () => void {
    if (shape.board !== this) {
      throw new InvalidArgumentError("Shape belongs to a different board");
    }
    if (shape.state === "joined") {
      this.absorbShape(shape.id, shape.snapshot());
      return () => undefined;
    }
    const untrack = this.track(shape.id, () => shape.positions());
    const unsubscribe = shape.onJoinPile((event) => {
      untrack();
      unsubscribe();
      this.absorbShape(event.shapeId, event.blocks);
    });
    return () => {
      unsubscribe();
      untrack();
    };
  }

  private absorbShape(id: ShapeId, blocks: ReadonlyArray<BlockSnapshot>): void {
    this.absorb(blocks);
    debugLog(
      "board",
      `absorbed ${shapeIdAsString(id)} (${String(blocks.length)} blocks)`,
    );
  }

  absorb(blocks: ReadonlyArray<BlockSnapshot>): void {
    for (const { colour, position } of blocks) {
      if (!this.isInBounds(position)) continue;
      this.pile[this.idx(position)] = colour;
    }
  }

  /** One string per row: "." empty, "#" pile, "@" falling shape. */
  rows(): ReadonlyArray<string> {
    const falling = new Set<number>();
    for (const cells of this.active.values()) {
      for (const c of cells()) {
        if (this.isInBounds(c)) falling.add(this.idx(c));
      }
    }
    const out: Array<string> = [];
    for (let y = 0; y < this.height; y++) {
      let row = "";
      for (let x = 0; x < this.width; x++) {
        const i = y * this.width + x;
        if ((this.pile[i] ?? null) !== null) row += "#";
        else if (falling.has(i)) row += "@";
        else row += ".";
      }
      out.push(row);
    }
    return out;
  }

  private idx(point: GridPoint): number {
    return gridCoordAsNumber(point.y) * this.width + gridCoordAsNumber(point.x);
  }
}
