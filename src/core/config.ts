export type PlaneMapperOptions = {
  // largest sine of the angle between the two bases still treated as collinear
  epsilon: number;
};

export const DEFAULT_PLANE_MAPPER_OPTIONS: Readonly<PlaneMapperOptions> =
  Object.freeze({
    epsilon: 1e-9,
  });

export function resolveOptions(
  options: Partial<PlaneMapperOptions> = {}
): PlaneMapperOptions {
  const epsilon = options.epsilon ?? DEFAULT_PLANE_MAPPER_OPTIONS.epsilon;
  if (!Number.isFinite(epsilon) || epsilon < 0) {
    throw new RangeError(
      `epsilon must be a finite number >= 0, got ${String(epsilon)}`
    );
  }
  return { epsilon };
}
