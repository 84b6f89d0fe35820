import { type EngineSettings, loadSettings } from "../app/settings";

import { GridBoard } from "./core/board";
import { type PieceKind, spawnShape } from "./core/pieces";

import type { Shape } from "./core/shape";

/**
 * Board sized from the loaded settings.
 */
export function createBoard(
  settings: EngineSettings = loadSettings(),
): GridBoard {
  return new GridBoard(settings.board);
}

/**
 * Spawns a shape on the board and lets the board track it until it joins the
 * pile. Returns null on top out.
 */
export function spawnOnBoard(board: GridBoard, kind: PieceKind): Shape | null {
  const shape = spawnShape(board, kind);
  if (shape === null) return null;
  board.attach(shape);
  return shape;
}
