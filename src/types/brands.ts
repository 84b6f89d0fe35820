// Branded primitive types for type safety and domain modeling

// Grid coordinates - for board positions (must be integers)
declare const GridCoordBrand: unique symbol;
export type GridCoord = number & { readonly [GridCoordBrand]: true };

// Opaque visual tag carried by a block (e.g. "#FF00FF")
declare const ColourBrand: unique symbol;
export type Colour = string & { readonly [ColourBrand]: true };

// Identity of a single shape instance on a board
declare const ShapeIdBrand: unique symbol;
export type ShapeId = string & { readonly [ShapeIdBrand]: true };

// GridCoord constructors and guards
export function createGridCoord(value: number): GridCoord {
  if (!Number.isInteger(value)) {
    throw new Error("GridCoord must be an integer");
  }
  return value as GridCoord;
}

export function isGridCoord(n: unknown): n is GridCoord {
  return typeof n === "number" && Number.isInteger(n);
}

export function assertGridCoord(n: unknown): asserts n is GridCoord {
  if (!isGridCoord(n)) throw new Error("Not a valid GridCoord");
}

// Colour constructors and guards
export function createColour(value: string): Colour {
  if (typeof value !== "string" || value.length === 0) {
    throw new Error("Colour must be a non-empty string");
  }
  return value as Colour;
}

export function isColour(s: unknown): s is Colour {
  return typeof s === "string" && s.length > 0;
}

// ShapeId issuing - ids are unique for the lifetime of the process
let nextShapeId = 1;

export function createShapeId(): ShapeId {
  const id = `shape-${String(nextShapeId)}`;
  nextShapeId++;
  return id as ShapeId;
}

export function isShapeId(s: unknown): s is ShapeId {
  return typeof s === "string" && s.startsWith("shape-");
}

// Conversion helpers for interop at boundaries
export const gridCoordAsNumber = (g: GridCoord): number => g as number;
export const colourAsString = (c: Colour): string => c as string;
export const shapeIdAsString = (s: ShapeId): string => s as string;
