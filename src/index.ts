export { createBoard, spawnOnBoard } from "./engine";
export { Block } from "./engine/core/block";
export { GridBoard } from "./engine/core/board";
export { IndexOutOfRangeError, InvalidArgumentError } from "./engine/core/errors";
export {
  PIECES,
  PIECE_KINDS,
  defaultSpawnOrigin,
  parsePieceCatalogue,
  rotationTableFor,
  spawnShape,
  type PieceCatalogue,
  type PieceDefinition,
  type PieceKind,
} from "./engine/core/pieces";
export { Shape, type DropResult, type MoveResult } from "./engine/core/shape";
export {
  ShapeLifecycleService,
  type ShapeLifecycleState,
} from "./engine/core/shape-lifecycle.machine";
export {
  DEFAULT_BOARD_DIMENSIONS,
  gridPoint,
  samePoint,
  translate,
  type BlockSnapshot,
  type BoardDimensions,
  type BoardQuery,
  type GridPoint,
  type Occupant,
  type Offset,
  type RotationTable,
} from "./engine/core/types";
export type { JoinPileEvent, JoinPileListener } from "./engine/events";
export {
  DEFAULT_SETTINGS,
  envSettingsStore,
  loadSettings,
  parseSettings,
  type EngineSettings,
  type SettingsStore,
} from "./app/settings";
export {
  createColour,
  createGridCoord,
  type Colour,
  type GridCoord,
  type ShapeId,
} from "./types/brands";
export { debugLog, isDebugEnabled } from "./utils/debug";
