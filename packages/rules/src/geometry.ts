// packages/rules/src/geometry.ts

import { UnitState, Vec3 } from "./model";

// Axis-aligned box in world space
export interface Volume {
  min: Vec3;
  max: Vec3;
}

/**
 * Geometric collaborator. The presentation layer owns the real shapes;
 * the rules only ask for volumes, overlap tests and closing distances.
 */
export interface Geometry {
  boundingVolumeOf(unit: UnitState, at?: Vec3): Volume;
  intersects(a: Volume, b: Volume): boolean;
  /** Shortest distance between two volumes, 0 when they touch or overlap */
  gap(a: Volume, b: Volume): number;
}

function axisSeparation(aMin: number, aMax: number, bMin: number, bMax: number) {
  return Math.max(0, bMin - aMax, aMin - bMax);
}

export const boxGeometry: Geometry = {
  boundingVolumeOf(unit, at) {
    const c = at ?? unit.position;
    const hx = unit.size.x / 2;
    const hy = unit.size.y / 2;
    const hz = unit.size.z / 2;
    return {
      min: { x: c.x - hx, y: c.y - hy, z: c.z - hz },
      max: { x: c.x + hx, y: c.y + hy, z: c.z + hz },
    };
  },

  // Touching faces count as contact
  intersects(a, b) {
    return (
      a.min.x <= b.max.x &&
      a.max.x >= b.min.x &&
      a.min.y <= b.max.y &&
      a.max.y >= b.min.y &&
      a.min.z <= b.max.z &&
      a.max.z >= b.min.z
    );
  },

  gap(a, b) {
    const dx = axisSeparation(a.min.x, a.max.x, b.min.x, b.max.x);
    const dy = axisSeparation(a.min.y, a.max.y, b.min.y, b.max.y);
    const dz = axisSeparation(a.min.z, a.max.z, b.min.z, b.max.z);
    return Math.sqrt(dx * dx + dy * dy + dz * dz);
  },
};

// Distance on the ground plane, vertical axis ignored
export function planarDistance(a: Vec3, b: Vec3): number {
  return Math.hypot(b.x - a.x, b.z - a.z);
}

export function distance(a: Vec3, b: Vec3): number {
  return Math.hypot(b.x - a.x, b.y - a.y, b.z - a.z);
}

// Moves `from` toward `to` on the ground plane, keeping from.y
export function stepToward(from: Vec3, to: Vec3, length: number): Vec3 {
  const d = planarDistance(from, to);
  if (d === 0) return { ...from };
  return {
    x: from.x + ((to.x - from.x) * length) / d,
    y: from.y,
    z: from.z + ((to.z - from.z) * length) / d,
  };
}

export function onGround(point: Vec3, keepY: number): Vec3 {
  return { x: point.x, y: keepY, z: point.z };
}

export function unitsCollide(
  geometry: Geometry,
  a: UnitState,
  b: UnitState,
  aAt?: Vec3
): boolean {
  return geometry.intersects(
    geometry.boundingVolumeOf(a, aAt),
    geometry.boundingVolumeOf(b)
  );
}

export function closingDistance(
  geometry: Geometry,
  a: UnitState,
  b: UnitState
): number {
  return geometry.gap(geometry.boundingVolumeOf(a), geometry.boundingVolumeOf(b));
}

/**
 * First point on the straight line from `mover` toward `target` where the two
 * volumes touch. Overlap along that line is a single interval ending at the
 * target's centre, so bisection converges on its near edge.
 */
export function firstContactPoint(
  geometry: Geometry,
  mover: UnitState,
  target: UnitState
): Vec3 {
  const from = mover.position;
  const to = onGround(target.position, from.y);
  const at = (t: number): Vec3 => ({
    x: from.x + (to.x - from.x) * t,
    y: from.y,
    z: from.z + (to.z - from.z) * t,
  });

  if (unitsCollide(geometry, mover, target, from)) return { ...from };

  let lo = 0;
  let hi = 1;
  for (let i = 0; i < 40; i += 1) {
    const mid = (lo + hi) / 2;
    if (unitsCollide(geometry, mover, target, at(mid))) {
      hi = mid;
    } else {
      lo = mid;
    }
  }
  return at(hi);
}
