/**
 * @fileoverview Shared test helper functions for pilefall tests
 */

import { Block } from "@/engine/core/block";
import { GridBoard } from "@/engine/core/board";
import { Shape } from "@/engine/core/shape";
import {
  type BlockSnapshot,
  type BoardQuery,
  type GridPoint,
  type RotationTable,
  gridPoint,
} from "@/engine/core/types";
import { createColour, gridCoordAsNumber } from "@/types/brands";

export const TEST_COLOUR = createColour("#FFFFFF");
export const PILE_COLOUR = createColour("#808080");

/**
 * Creates a board with the given pile cells already settled.
 *
 * @example
 * ```typescript
 * const board = createTestBoard([[4, 10]]); // one pile cell under column 4
 * ```
 */
export function createTestBoard(
  pile: ReadonlyArray<readonly [number, number]> = [],
  width = 10,
  height = 20,
): GridBoard {
  const board = new GridBoard({ height, width });
  board.absorb(
    pile.map(([x, y]) => ({ colour: PILE_COLOUR, position: gridPoint(x, y) })),
  );
  return board;
}

export function fillBoardRow(
  board: GridBoard,
  y: number,
  gaps: ReadonlyArray<number> = [],
): void {
  const cells: Array<BlockSnapshot> = [];
  for (let x = 0; x < board.width; x++) {
    if (!gaps.includes(x)) {
      cells.push({ colour: PILE_COLOUR, position: gridPoint(x, y) });
    }
  }
  board.absorb(cells);
}

export function createTestBlock(board: BoardQuery, x: number, y: number): Block {
  return new Block(board, TEST_COLOUR, gridPoint(x, y));
}

export function createTestShape(
  board: BoardQuery,
  cells: ReadonlyArray<readonly [number, number]>,
  rotationOffsets: RotationTable | null = null,
): Shape {
  return new Shape(
    board,
    cells.map(([x, y]) => createTestBlock(board, x, y)),
    rotationOffsets,
  );
}

// Plain [x, y] pairs for readable assertions
export function coords(
  points: ReadonlyArray<GridPoint>,
): Array<[number, number]> {
  return points.map((p): [number, number] => [
    gridCoordAsNumber(p.x),
    gridCoordAsNumber(p.y),
  ]);
}

export function shapeCoords(shape: Shape): Array<[number, number]> {
  return coords(shape.positions());
}
