import {
  type Colour,
  type ShapeId,
  isColour,
  isGridCoord,
} from "../../types/brands";

import { InvalidArgumentError } from "./errors";
import {
  type BlockSnapshot,
  type BoardQuery,
  type GridPoint,
  type Offset,
  translate,
} from "./types";

/**
 * A single occupied cell of a shape.
 *
 * Every move comes as a trial (`tryX`, a pure query against the board) and a
 * commit (`x`, which shifts the position without re-checking). Shapes trial
 * all of their blocks before committing any of them.
 */
export class Block {
  private pos: GridPoint;

  constructor(
    readonly board: BoardQuery,
    readonly colour: Colour,
    position: GridPoint,
    readonly owner?: ShapeId,
  ) {
    // Runtime checks cover callers outside the type system
    if (board == null) {
      throw new InvalidArgumentError("Block requires a board");
    }
    if (!isColour(colour)) {
      throw new InvalidArgumentError("Block requires a non-empty colour");
    }
    if (
      position == null ||
      !isGridCoord(position.x) ||
      !isGridCoord(position.y)
    ) {
      throw new InvalidArgumentError("Block requires an integer position");
    }
    this.pos = position;
  }

  get position(): GridPoint {
    return this.pos;
  }

  tryMoveDown(): boolean {
    return this.canOccupy(translate(this.pos, 0, 1));
  }

  moveDown(): void {
    this.pos = translate(this.pos, 0, 1);
  }

  tryMoveLeft(): boolean {
    return this.canOccupy(translate(this.pos, -1, 0));
  }

  moveLeft(): void {
    this.pos = translate(this.pos, -1, 0);
  }

  tryMoveRight(): boolean {
    return this.canOccupy(translate(this.pos, 1, 0));
  }

  moveRight(): void {
    this.pos = translate(this.pos, 1, 0);
  }

  tryRotate(offset: Offset): boolean {
    const [dx, dy] = offset;
    return this.canOccupy(translate(this.pos, dx, dy));
  }

  rotate(offset: Offset): void {
    const [dx, dy] = offset;
    this.pos = translate(this.pos, dx, dy);
  }

  copy(): Block {
    return new Block(this.board, this.colour, this.pos, this.owner);
  }

  withOwner(owner: ShapeId): Block {
    return new Block(this.board, this.colour, this.pos, owner);
  }

  snapshot(): BlockSnapshot {
    return Object.freeze({ colour: this.colour, position: this.pos });
  }

  // In bounds, and either empty or held by this block's own shape
  private canOccupy(target: GridPoint): boolean {
    if (!this.board.isInBounds(target)) return false;
    const occupant = this.board.occupantAt(target);
    switch (occupant.kind) {
      case "empty":
        return true;
      case "shape":
        return this.owner !== undefined && occupant.owner === this.owner;
      case "pile":
        return false;
    }
  }
}
