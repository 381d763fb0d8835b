/*
Defines the nouns (what a point, a corner and a cell are).
Every value here is read-only once built.
*/
export type Point3D = Readonly<{
  x: number;
  y: number;
  z: number;
}>;

/**
 * Three sampled corners of the reference unit square.
 * - origin: reference <0,0> (top-left)
 * - colCorner: reference <1,0> (top-right)
 * - rowCorner: reference <0,1> (bottom-left)
 */
export type CornerPoints = Readonly<{
  origin: Point3D;
  colCorner: Point3D;
  rowCorner: Point3D;
}>;

// integer cell index on a size × size grid, each in [0, size)
export type GridCell = Readonly<{
  row: number;
  col: number;
}>;
