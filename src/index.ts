export type { CornerPoints, GridCell, Point3D } from "./core/types";
export {
  add3,
  affine3,
  cross3,
  length3,
  normalize3,
  point3,
  scale3,
  subtract3,
} from "./core/geometry";
export {
  DEFAULT_PLANE_MAPPER_OPTIONS,
  type PlaneMapperOptions,
} from "./core/config";
export {
  DegenerateFrameError,
  InvalidGridCellError,
  InvalidGridSizeError,
  PlaneMapperError,
  type PlaneMapperErrorCode,
} from "./core/errors";
export {
  frameBasis,
  frameNormal,
  makeCornerFrame,
  type CornerFrame,
  type FrameBasis,
} from "./core/frame3d";
export {
  makePlaneMapper,
  type CellQuad,
  type PlaneMapper,
} from "./core/planeMapper";
