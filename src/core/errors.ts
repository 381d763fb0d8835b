export type PlaneMapperErrorCode =
  | "DEGENERATE_FRAME"
  | "INVALID_GRID_SIZE"
  | "INVALID_GRID_CELL";

export class PlaneMapperError extends Error {
  override name: string = "PlaneMapperError";
  readonly code: PlaneMapperErrorCode;

  constructor(code: PlaneMapperErrorCode, message: string) {
    super(message);
    this.code = code;
  }
}

/**
 * The three corners are collinear (or close enough that the plane through
 * them is numerically meaningless).
 */
export class DegenerateFrameError extends PlaneMapperError {
  override name = "DegenerateFrameError";
  readonly sine: number;

  constructor(sine: number, epsilon: number) {
    super(
      "DEGENERATE_FRAME",
      `makeCornerFrame requires non-collinear corners (sine ${sine} <= epsilon ${epsilon})`
    );
    this.sine = sine;
  }
}

export class InvalidGridSizeError extends PlaneMapperError {
  override name = "InvalidGridSizeError";
  readonly size: number;

  constructor(size: number) {
    super(
      "INVALID_GRID_SIZE",
      `grid size must be a positive integer, got ${size}`
    );
    this.size = size;
  }
}

export class InvalidGridCellError extends PlaneMapperError {
  override name = "InvalidGridCellError";
  readonly size: number;
  readonly row: number;
  readonly col: number;

  constructor(size: number, row: number, col: number) {
    super(
      "INVALID_GRID_CELL",
      `cell (${row}, ${col}) is outside a ${size}x${size} grid`
    );
    this.size = size;
    this.row = row;
    this.col = col;
  }
}
