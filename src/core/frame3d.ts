import type { CornerPoints, Point3D } from "./types";
import { resolveOptions, type PlaneMapperOptions } from "./config";
import { DegenerateFrameError } from "./errors";
import { cross3, length3, normalize3, subtract3 } from "./geometry";

/** Corner points that are known to span a plane. */
export type CornerFrame = CornerPoints & { readonly __frame: true };

export type FrameBasis = {
  colBasis: Point3D;
  rowBasis: Point3D;
};

export function frameBasis(frame: CornerPoints): FrameBasis {
  return {
    colBasis: subtract3(frame.colCorner, frame.origin),
    rowBasis: subtract3(frame.rowCorner, frame.origin),
  };
}

/**
 * Sine of the angle between the two bases. 0 for collinear corners
 * (including coincident ones), 1 for perpendicular bases.
 * Bases are normalized first so the cross product stays in range
 * for very large or very small corners.
 */
function basisSine({ colBasis, rowBasis }: FrameBasis): number {
  return length3(cross3(normalize3(colBasis), normalize3(rowBasis)));
}

export function makeCornerFrame(
  corners: CornerPoints,
  options?: Partial<PlaneMapperOptions>
): CornerFrame {
  const { epsilon } = resolveOptions(options);

  const sine = basisSine(frameBasis(corners));
  // NaN compares false here, so non-finite corners pass through
  if (sine <= epsilon) {
    throw new DegenerateFrameError(sine, epsilon);
  }

  const { origin, colCorner, rowCorner } = corners;
  return Object.freeze({
    origin: Object.freeze({ ...origin }),
    colCorner: Object.freeze({ ...colCorner }),
    rowCorner: Object.freeze({ ...rowCorner }),
    __frame: true as const,
  });
}

/** Unit normal of the frame's plane, following colBasis × rowBasis. */
export function frameNormal(frame: CornerFrame): Point3D {
  const { colBasis, rowBasis } = frameBasis(frame);
  return normalize3(cross3(colBasis, rowBasis));
}
