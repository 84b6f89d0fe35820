import { type Colour, createColour, isColour } from "../../types/brands";

import { Block } from "./block";
import { InvalidArgumentError } from "./errors";
import piecesData from "./data/pieces.json";
import { Shape } from "./shape";
import {
  type BoardQuery,
  type GridPoint,
  type Offset,
  type RotationTable,
  gridPoint,
  translate,
} from "./types";

// Tetrominoes plus the smaller polyominoes used for 1-3 block shapes
export const PIECE_KINDS = [
  "I",
  "O",
  "T",
  "S",
  "Z",
  "J",
  "L",
  "I1",
  "I2",
  "I3",
  "V3",
] as const;
export type PieceKind = (typeof PIECE_KINDS)[number];

// Cell layouts per rotation state, block i of one state rotates into block i
// of the next
export type PieceDefinition = {
  readonly id: PieceKind;
  readonly colour: Colour;
  readonly rotations: ReadonlyArray<ReadonlyArray<Offset>>;
};

export type PieceCatalogue = Readonly<Record<PieceKind, PieceDefinition>>;

function isRecord(x: unknown): x is Record<string, unknown> {
  return typeof x === "object" && x !== null;
}

function isPieceKind(u: unknown): u is PieceKind {
  return PIECE_KINDS.some((k) => k === u);
}

function parseCell(u: unknown, id: string): Offset {
  if (
    !Array.isArray(u) ||
    u.length !== 2 ||
    !Number.isInteger(u[0]) ||
    !Number.isInteger(u[1])
  ) {
    throw new InvalidArgumentError(`Piece ${id}: cells must be [x, y] integers`);
  }
  return [Number(u[0]), Number(u[1])];
}

function parseRotations(
  u: unknown,
  id: string,
): ReadonlyArray<ReadonlyArray<Offset>> {
  if (!Array.isArray(u) || u.length === 0) {
    throw new InvalidArgumentError(`Piece ${id}: no rotation states`);
  }
  const rotations = u.map((layout: unknown) => {
    if (!Array.isArray(layout) || layout.length === 0) {
      throw new InvalidArgumentError(`Piece ${id}: empty layout`);
    }
    return layout.map((cell: unknown) => parseCell(cell, id));
  });
  const size = rotations[0]?.length ?? 0;
  if (rotations.some((r) => r.length !== size)) {
    throw new InvalidArgumentError(
      `Piece ${id}: every rotation needs ${String(size)} cells`,
    );
  }
  return rotations;
}

export function parsePieceCatalogue(raw: unknown): PieceCatalogue {
  if (!isRecord(raw) || !Array.isArray(raw["pieces"])) {
    throw new InvalidArgumentError("Piece catalogue must have a pieces array");
  }
  const found = new Map<PieceKind, PieceDefinition>();
  for (const entry of raw["pieces"]) {
    if (!isRecord(entry)) {
      throw new InvalidArgumentError("Piece entries must be objects");
    }
    const id = entry["id"];
    if (!isPieceKind(id)) {
      throw new InvalidArgumentError(`Unknown piece kind: ${String(id)}`);
    }
    const colour = entry["colour"];
    if (!isColour(colour)) {
      throw new InvalidArgumentError(`Piece ${id}: missing colour`);
    }
    found.set(id, {
      colour: createColour(colour),
      id,
      rotations: parseRotations(entry["rotations"], id),
    });
  }

  const definition = (kind: PieceKind): PieceDefinition => {
    const def = found.get(kind);
    if (def === undefined) {
      throw new InvalidArgumentError(`Piece catalogue is missing ${kind}`);
    }
    return def;
  };
  return {
    I: definition("I"),
    I1: definition("I1"),
    I2: definition("I2"),
    I3: definition("I3"),
    J: definition("J"),
    L: definition("L"),
    O: definition("O"),
    S: definition("S"),
    T: definition("T"),
    V3: definition("V3"),
    Z: definition("Z"),
  };
}

export const PIECES: PieceCatalogue = parsePieceCatalogue(piecesData);

/**
 * Offsets that carry each block from one rotation state to the next.
 * `null` for single-state layouts, which cannot rotate.
 */
export function rotationTableFor(def: PieceDefinition): RotationTable | null {
  const n = def.rotations.length;
  if (n <= 1) return null;
  return def.rotations.map((from, r) => {
    const to = def.rotations[(r + 1) % n] ?? from;
    return from.map(([x, y], i): Offset => {
      const [nx, ny] = to[i] ?? [x, y];
      return [nx - x, ny - y];
    });
  });
}

// Horizontally centred, topmost cell on row 0
export function defaultSpawnOrigin(
  def: PieceDefinition,
  boardWidth: number,
): GridPoint {
  let boxWidth = 0;
  for (const layout of def.rotations) {
    for (const [x] of layout) boxWidth = Math.max(boxWidth, x + 1);
  }
  const topRow = Math.min(...(def.rotations[0] ?? []).map(([, y]) => y));
  return gridPoint(Math.floor((boardWidth - boxWidth) / 2), 0 - topRow);
}

/**
 * Places a new shape of the given kind in its first rotation state.
 * Returns null when a spawn cell is outside the board or already taken.
 */
export function spawnShape(
  board: BoardQuery & { readonly width: number },
  kind: PieceKind,
  origin?: GridPoint,
  catalogue: PieceCatalogue = PIECES,
): Shape | null {
  const def = catalogue[kind];
  const at = origin ?? defaultSpawnOrigin(def, board.width);
  const blocks: Array<Block> = [];
  for (const [dx, dy] of def.rotations[0] ?? []) {
    const position = translate(at, dx, dy);
    if (!board.isInBounds(position)) return null;
    if (board.occupantAt(position).kind !== "empty") return null;
    blocks.push(new Block(board, def.colour, position));
  }
  return new Shape(board, blocks, rotationTableFor(def));
}
