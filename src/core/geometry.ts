/*
Vector arithmetic on Point3D.
*/

import type { Point3D } from "./types";

export function point3(x: number, y: number, z: number): Point3D {
  return { x, y, z };
}

export function add3(a: Point3D, b: Point3D): Point3D {
  return { x: a.x + b.x, y: a.y + b.y, z: a.z + b.z };
}

export function subtract3(a: Point3D, b: Point3D): Point3D {
  return { x: a.x - b.x, y: a.y - b.y, z: a.z - b.z };
}

export function scale3(a: Point3D, s: number): Point3D {
  return { x: a.x * s, y: a.y * s, z: a.z * s };
}

export function cross3(a: Point3D, b: Point3D): Point3D {
  return {
    x: a.y * b.z - a.z * b.y,
    y: a.z * b.x - a.x * b.z,
    z: a.x * b.y - a.y * b.x,
  };
}

export function length3(a: Point3D): number {
  return Math.hypot(a.x, a.y, a.z);
}

export function normalize3(v: Point3D): Point3D {
  const mag = length3(v);
  if (mag === 0) return { x: 0, y: 0, z: 0 };
  return { x: v.x / mag, y: v.y / mag, z: v.z / mag };
}

/**
 * Affine combination `origin + u * basisU + v * basisV`.
 */
export function affine3(
  origin: Point3D,
  basisU: Point3D,
  basisV: Point3D,
  u: number,
  v: number
): Point3D {
  return {
    x: origin.x + u * basisU.x + v * basisV.x,
    y: origin.y + u * basisU.y + v * basisV.y,
    z: origin.z + u * basisU.z + v * basisV.z,
  };
}
