import { GridBoard } from "@/engine/core/board";
import { InvalidArgumentError } from "@/engine/core/errors";
import { spawnShape } from "@/engine/core/pieces";
import { gridPoint } from "@/engine/core/types";
import { createColour, createShapeId } from "@/types/brands";

import {
  PILE_COLOUR,
  createTestBoard,
  createTestShape,
  fillBoardRow,
} from "../../test-helpers";

describe("@/engine/core/board — occupancy and the pile", () => {
  test("defaults to 10 × 20 and rejects bad dimensions", () => {
    const board = new GridBoard();
    expect(board.width).toBe(10);
    expect(board.height).toBe(20);
    expect(board.rows()).toHaveLength(20);

    expect(() => new GridBoard({ height: 20, width: 0 })).toThrow(
      "Board width must be a positive integer",
    );
    expect(() => new GridBoard({ height: 2.5, width: 10 })).toThrow(
      InvalidArgumentError,
    );
  });

  test("isInBounds covers exactly the grid", () => {
    const board = createTestBoard([], 4, 6);
    expect(board.isInBounds(gridPoint(0, 0))).toBe(true);
    expect(board.isInBounds(gridPoint(3, 5))).toBe(true);
    expect(board.isInBounds(gridPoint(4, 5))).toBe(false);
    expect(board.isInBounds(gridPoint(3, 6))).toBe(false);
    expect(board.isInBounds(gridPoint(-1, 0))).toBe(false);
    expect(board.isInBounds(gridPoint(0, -1))).toBe(false);
  });

  test("occupantAt reports empty, pile and tracked shape cells", () => {
    const board = createTestBoard([[2, 3]]);
    const owner = createShapeId();
    const untrack = board.track(owner, () => [gridPoint(5, 5)]);

    expect(board.occupantAt(gridPoint(0, 0))).toEqual({ kind: "empty" });
    expect(board.occupantAt(gridPoint(2, 3))).toEqual({
      colour: PILE_COLOUR,
      kind: "pile",
    });
    expect(board.occupantAt(gridPoint(5, 5))).toEqual({
      kind: "shape",
      owner,
    });

    untrack();
    expect(board.occupantAt(gridPoint(5, 5))).toEqual({ kind: "empty" });
    expect(() => board.occupantAt(gridPoint(10, 0))).toThrow(
      "occupantAt: out-of-bounds",
    );
  });

  test("absorb skips cells outside the board", () => {
    const board = createTestBoard([], 3, 2);
    const colour = createColour("#123456");
    board.absorb([
      { colour, position: gridPoint(1, 1) },
      { colour, position: gridPoint(3, 1) },
      { colour, position: gridPoint(0, -1) },
    ]);
    expect(board.rows()).toEqual(["...", ".#."]);
  });

  test("fillBoardRow leaves the requested gaps", () => {
    const board = createTestBoard([], 5, 2);
    fillBoardRow(board, 1, [0, 3]);
    expect(board.rows()).toEqual([".....", ".##.#"]);
  });

  test("attached shapes are drawn while falling and absorbed on lock", () => {
    const board = new GridBoard();
    const shape = spawnShape(board, "T");
    if (shape === null) throw new Error("spawn failed");
    board.attach(shape);

    expect(board.rows()[0]).toBe("....@.....");
    expect(board.rows()[1]).toBe("...@@@....");

    shape.drop();

    expect(board.rows()[0]).toBe("..........");
    expect(board.rows()[18]).toBe("....#.....");
    expect(board.rows()[19]).toBe("...###....");
    expect(board.occupantAt(gridPoint(4, 18))).toEqual({
      colour: "#FF00FF",
      kind: "pile",
    });
  });

  test("detaching stops tracking without touching the pile", () => {
    const board = new GridBoard();
    const shape = createTestShape(board, [[4, 4]]);
    const detach = board.attach(shape);
    detach();

    expect(board.occupantAt(gridPoint(4, 4))).toEqual({ kind: "empty" });
    shape.drop();
    expect(board.rows()[19]).toBe("..........");
  });

  test("attaching a shape that already joined puts it in the pile", () => {
    const board = new GridBoard();
    const shape = createTestShape(board, [[0, 0]]);
    shape.drop();
    expect(shape.state).toBe("joined");

    const detach = board.attach(shape);

    expect(board.occupantAt(gridPoint(0, 19))).toEqual({
      colour: "#FFFFFF",
      kind: "pile",
    });
    expect(board.rows()[19]).toBe("#.........");
    detach();
    expect(board.rows()[19]).toBe("#.........");
  });

  test("attach refuses a shape from another board", () => {
    const board = new GridBoard();
    const shape = createTestShape(new GridBoard(), [[0, 0]]);
    expect(() => board.attach(shape)).toThrow(
      "Shape belongs to a different board",
    );
  });
});
