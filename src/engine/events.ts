import type { BlockSnapshot } from "./core/types";
import type { ShapeId } from "../types/brands";

// Delivered once, when a shape settles into the pile
export type JoinPileEvent = {
  kind: "JoinedPile";
  shapeId: ShapeId;
  blocks: ReadonlyArray<BlockSnapshot>;
};

export type JoinPileListener = (event: JoinPileEvent) => void;
