import {
  type ShapeId,
  createShapeId,
  gridCoordAsNumber,
  shapeIdAsString,
} from "../../types/brands";
import { debugLog } from "../../utils/debug";

import { Block } from "./block";
import { IndexOutOfRangeError, InvalidArgumentError } from "./errors";
import {
  type ShapeLifecycleState,
  ShapeLifecycleService,
} from "./shape-lifecycle.machine";
import {
  type BlockSnapshot,
  type BoardQuery,
  type GridPoint,
  type Offset,
  type RotationTable,
  samePoint,
} from "./types";

import type { JoinPileEvent, JoinPileListener } from "../events";

export type MoveResult =
  | { kind: "Moved" }
  | { kind: "Locked"; blocks: ReadonlyArray<BlockSnapshot> };

export type DropResult = {
  kind: "Locked";
  rows: number;
  blocks: ReadonlyArray<BlockSnapshot>;
};

function isOffset(u: unknown): u is Offset {
  return (
    Array.isArray(u) &&
    u.length === 2 &&
    Number.isInteger(u[0]) &&
    Number.isInteger(u[1])
  );
}

function describePoint(p: GridPoint): string {
  return `(${String(gridCoordAsNumber(p.x))}, ${String(gridCoordAsNumber(p.y))})`;
}

function validateBlocks(
  board: BoardQuery,
  blocks: ReadonlyArray<Block | null | undefined> | null | undefined,
): ReadonlyArray<Block> {
  if (blocks == null) {
    throw new InvalidArgumentError("Shape requires a blocks array");
  }
  if (blocks.length === 0) {
    throw new InvalidArgumentError("Shape requires at least one block");
  }
  const valid: Array<Block> = [];
  for (const [i, block] of blocks.entries()) {
    if (block == null) {
      throw new InvalidArgumentError(
        "One of the blocks in the blocks array is null.",
      );
    }
    if (block.board !== board) {
      throw new InvalidArgumentError(
        `Block ${String(i)} belongs to a different board`,
      );
    }
    if (!board.isInBounds(block.position)) {
      throw new InvalidArgumentError(
        `Block ${String(i)} at ${describePoint(block.position)} is outside the board`,
      );
    }
    if (board.occupantAt(block.position).kind !== "empty") {
      throw new InvalidArgumentError(
        `Block ${String(i)} at ${describePoint(block.position)} overlaps an occupied cell`,
      );
    }
    if (valid.some((b) => samePoint(b.position, block.position))) {
      throw new InvalidArgumentError(
        `Block ${String(i)} overlaps another block at ${describePoint(block.position)}`,
      );
    }
    valid.push(block);
  }
  return valid;
}

function validateRotationTable(
  offsets: ReadonlyArray<ReadonlyArray<Offset | null | undefined> | null | undefined>,
  blockCount: number,
): RotationTable {
  if (offsets.length === 0) {
    throw new InvalidArgumentError("Offset array has no rotation states");
  }
  const table: Array<ReadonlyArray<Offset>> = [];
  for (const row of offsets) {
    if (row == null) {
      throw new InvalidArgumentError(
        "One of the rows in the offset array is null.",
      );
    }
    if (row.length < blockCount) {
      throw new InvalidArgumentError(
        `Offset array length: ${String(row.length)}. Blocks array length: ${String(blockCount)}`,
      );
    }
    const entries: Array<Offset> = [];
    for (const entry of row) {
      if (entry == null) {
        throw new InvalidArgumentError(
          "One of the offset values in the offset array is null.",
        );
      }
      if (!isOffset(entry)) {
        throw new InvalidArgumentError(
          "Offset values must be integer [dx, dy] pairs",
        );
      }
      entries.push([entry[0], entry[1]]);
    }
    table.push(entries);
  }
  return table;
}

/**
 * A falling piece: an ordered set of blocks moved as one.
 *
 * Every movement trials all blocks before committing any of them, so a shape
 * either moves as a whole or not at all. A failed downward trial settles the
 * shape: the lifecycle machine moves to "joined" and subscribers receive a
 * single {@link JoinPileEvent}. Nothing moves a joined shape again.
 *
 * Variants differ only in their block layout and rotation table; see
 * `spawnShape` for the catalogue.
 */
export class Shape {
  readonly id: ShapeId;
  private readonly blocks: ReadonlyArray<Block>;
  private readonly rotationOffsets: RotationTable | null;
  private currentRotation = 0;
  private readonly lifecycle: ShapeLifecycleService;
  private readonly listeners = new Set<JoinPileListener>();

  constructor(
    readonly board: BoardQuery,
    blocks: ReadonlyArray<Block>,
    rotationOffsets?: RotationTable | null,
  ) {
    if (board == null) {
      throw new InvalidArgumentError("Shape requires a board");
    }
    const valid = validateBlocks(board, blocks);
    this.rotationOffsets =
      rotationOffsets == null
        ? null
        : validateRotationTable(rotationOffsets, valid.length);

    this.id = createShapeId();
    // Own copies: the caller's blocks cannot reach the shape's state
    this.blocks = valid.map((b) => b.withOwner(this.id));
    this.lifecycle = new ShapeLifecycleService(this.id);
  }

  get length(): number {
    return this.blocks.length;
  }

  get rotation(): number {
    return this.currentRotation;
  }

  get rotationStates(): number {
    return this.rotationOffsets?.length ?? 1;
  }

  get isRotatable(): boolean {
    return this.rotationOffsets !== null;
  }

  get state(): ShapeLifecycleState {
    return this.lifecycle.state;
  }

  /** Copy of the block at `i`; mutating it leaves the shape untouched. */
  at(i: number): Block {
    return this.blockAt(i).copy();
  }

  snapshot(): ReadonlyArray<BlockSnapshot> {
    return this.blocks.map((b) => b.snapshot());
  }

  positions(): ReadonlyArray<GridPoint> {
    return this.blocks.map((b) => b.position);
  }

  onJoinPile(listener: JoinPileListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  moveDown(): MoveResult {
    if (this.state === "joined") {
      debugLog("shape", `${shapeIdAsString(this.id)}: moveDown on joined shape`);
      return { blocks: this.snapshot(), kind: "Locked" };
    }
    if (!this.blocks.every((b) => b.tryMoveDown())) {
      return this.join();
    }
    for (const b of this.blocks) b.moveDown();
    return { kind: "Moved" };
  }

  drop(): DropResult {
    let rows = 0;
    for (;;) {
      const result = this.moveDown();
      if (result.kind === "Locked") {
        return { blocks: result.blocks, kind: "Locked", rows };
      }
      rows++;
    }
  }

  moveLeft(): boolean {
    if (!this.acceptsMovement("moveLeft")) return false;
    if (!this.blocks.every((b) => b.tryMoveLeft())) return false;
    for (const b of this.blocks) b.moveLeft();
    return true;
  }

  moveRight(): boolean {
    if (!this.acceptsMovement("moveRight")) return false;
    if (!this.blocks.every((b) => b.tryMoveRight())) return false;
    for (const b of this.blocks) b.moveRight();
    return true;
  }

  rotate(): boolean {
    if (!this.acceptsMovement("rotate")) return false;
    const table = this.rotationOffsets;
    if (table === null) return false;

    const row = table[this.currentRotation];
    if (row === undefined) return false;
    const moves: Array<{ block: Block; offset: Offset }> = [];
    for (const [i, block] of this.blocks.entries()) {
      const offset = row[i];
      if (offset === undefined) return false;
      moves.push({ block, offset });
    }

    if (!moves.every(({ block, offset }) => block.tryRotate(offset))) {
      return false;
    }
    for (const { block, offset } of moves) block.rotate(offset);
    this.currentRotation = (this.currentRotation + 1) % table.length;
    return true;
  }

  private blockAt(i: number): Block {
    const block = Number.isInteger(i) ? this.blocks[i] : undefined;
    if (block === undefined) {
      throw new IndexOutOfRangeError(i, this.length);
    }
    return block;
  }

  private acceptsMovement(op: string): boolean {
    if (this.state === "active") return true;
    debugLog("shape", `${shapeIdAsString(this.id)}: ${op} on joined shape`);
    return false;
  }

  private join(): MoveResult {
    const blocks = this.snapshot();
    const event = this.lifecycle.join(blocks);
    if (event !== undefined) {
      debugLog("shape", `${shapeIdAsString(this.id)} joined the pile`, blocks);
      this.notify(event);
    }
    return { blocks, kind: "Locked" };
  }

  private notify(event: JoinPileEvent): void {
    for (const listener of [...this.listeners]) listener(event);
  }
}
