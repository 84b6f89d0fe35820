import {
  type Colour,
  type GridCoord,
  type ShapeId,
  createGridCoord,
  gridCoordAsNumber,
} from "../../types/brands";

// Default board dimensions
const BOARD_WIDTH = 10 as const;
const BOARD_HEIGHT = 20 as const; // rows 0..19, row 0 at the top

export type BoardDimensions = {
  readonly width: number;
  readonly height: number;
};

export const DEFAULT_BOARD_DIMENSIONS: BoardDimensions = {
  height: BOARD_HEIGHT,
  width: BOARD_WIDTH,
};

// y grows downward, x grows to the right
export type GridPoint = {
  readonly x: GridCoord;
  readonly y: GridCoord;
};

export function gridPoint(x: number, y: number): GridPoint {
  return { x: createGridCoord(x), y: createGridCoord(y) };
}

export function translate(p: GridPoint, dx: number, dy: number): GridPoint {
  return gridPoint(gridCoordAsNumber(p.x) + dx, gridCoordAsNumber(p.y) + dy);
}

export function samePoint(a: GridPoint, b: GridPoint): boolean {
  return a.x === b.x && a.y === b.y;
}

// One rotation-offset entry: [dx, dy] applied to a single block
export type Offset = readonly [number, number];

// One row per rotation state, one offset per block
export type RotationTable = ReadonlyArray<ReadonlyArray<Offset>>;

export type Occupant =
  | { readonly kind: "empty" }
  | { readonly kind: "pile"; readonly colour: Colour }
  | { readonly kind: "shape"; readonly owner: ShapeId };

/**
 * Board capability consumed by blocks and shapes.
 *
 * `occupantAt` is only defined for points where `isInBounds` holds. Cells of
 * the active shapes are reported with their owner so that a block can tell its
 * own shape apart from foreign occupancy.
 */
export type BoardQuery = {
  isInBounds(point: GridPoint): boolean;
  occupantAt(point: GridPoint): Occupant;
};

export type BlockSnapshot = {
  readonly position: GridPoint;
  readonly colour: Colour;
};
