import type { CornerPoints, GridCell, Point3D } from "./types";
import type { PlaneMapperOptions } from "./config";
import { InvalidGridCellError, InvalidGridSizeError } from "./errors";
import { affine3 } from "./geometry";
import { frameBasis, makeCornerFrame, type CornerFrame } from "./frame3d";

export type CellQuad = readonly [
  topLeft: Point3D,
  topRight: Point3D,
  bottomRight: Point3D,
  bottomLeft: Point3D,
];

export type PlaneMapper = Readonly<{
  frame: CornerFrame;
  /** (0,0) → origin, (1,0) → colCorner, (0,1) → rowCorner; no clamping. */
  mapUnit: (u: number, v: number) => Point3D;
  /** Fractional grid coordinate on a size × size grid; cols run along colBasis. */
  mapGridCell: (size: number, row: number, col: number) => Point3D;
  mapCellCenter: (size: number, row: number, col: number) => Point3D;
  cellCorners: (size: number, row: number, col: number) => CellQuad;
  gridCellCenters: (size: number) => Point3D[];
}>;

function assertGridSize(size: number): void {
  if (!Number.isInteger(size) || size <= 0) {
    throw new InvalidGridSizeError(size);
  }
}

function assertGridCell(size: number, { row, col }: GridCell): void {
  assertGridSize(size);
  const inRange = (i: number) => Number.isInteger(i) && i >= 0 && i < size;
  if (!inRange(row) || !inRange(col)) {
    throw new InvalidGridCellError(size, row, col);
  }
}

export function makePlaneMapper(
  corners: CornerPoints,
  options?: Partial<PlaneMapperOptions>
): PlaneMapper {
  const frame = makeCornerFrame(corners, options);
  const { colBasis, rowBasis } = frameBasis(frame);
  const { origin } = frame;

  function mapUnit(u: number, v: number): Point3D {
    return affine3(origin, colBasis, rowBasis, u, v);
  }

  function mapGridCell(size: number, row: number, col: number): Point3D {
    assertGridSize(size);
    return mapUnit(col / size, row / size);
  }

  function mapCellCenter(size: number, row: number, col: number): Point3D {
    assertGridCell(size, { row, col });
    return mapGridCell(size, row + 0.5, col + 0.5);
  }

  function cellCorners(size: number, row: number, col: number): CellQuad {
    assertGridCell(size, { row, col });
    return [
      mapGridCell(size, row, col),
      mapGridCell(size, row, col + 1),
      mapGridCell(size, row + 1, col + 1),
      mapGridCell(size, row + 1, col),
    ];
  }

  function gridCellCenters(size: number): Point3D[] {
    assertGridSize(size);
    const points: Point3D[] = [];

    for (let r = 0; r < size; r++) {
      for (let c = 0; c < size; c++) {
        points.push(mapGridCell(size, r + 0.5, c + 0.5));
      }
    }

    return points;
  }

  // the closures hold the basis of this frame, so the frame can't be swapped
  return Object.freeze({
    frame,
    mapUnit,
    mapGridCell,
    mapCellCenter,
    cellCorners,
    gridCellCenters,
  });
}
