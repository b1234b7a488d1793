/**
 * Yaw helpers. Angles are radians around the vertical axis,
 * measured the same way as Math.atan2(dx, dz).
 */

const TWO_PI = Math.PI * 2;

/** Wrap an angle into (-PI, PI] */
export function normalizeAngle(angle: number): number {
  let a = angle % TWO_PI;
  if (a <= -Math.PI) a += TWO_PI;
  if (a > Math.PI) a -= TWO_PI;
  return a;
}

/** Signed shortest difference from `from` to `to` */
export function shortestAngleDelta(from: number, to: number): number {
  return normalizeAngle(to - from);
}

/** Blend between two angles along the shortest arc */
export function lerpAngle(from: number, to: number, t: number): number {
  return normalizeAngle(from + shortestAngleDelta(from, to) * t);
}

export function lerp(a: number, b: number, t: number): number {
  return a + (b - a) * t;
}

export function headingTo(dx: number, dz: number): number {
  return Math.atan2(dx, dz);
}
