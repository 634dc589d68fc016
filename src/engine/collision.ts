/**
 * Track-Relative Collision and Elevation
 *
 * Keeps a car inside the course corridor and on the road surface:
 *   - Finds the segment whose midpoint is nearest the car (centre-distance
 *     heuristic, not nearest point on segment)
 *   - Projects the car into that segment's local frame
 *   - Eases height toward the segment's elevation profile
 *   - Clamps lateral offset to half the segment width; a clamp inverts and
 *     damps lateral velocity so the car bounces off the edge
 *
 * Works the same for straights, banked turns, hairpins, jumps and tunnels,
 * because everything is expressed relative to the nearest segment.
 */

import type { PlanarVec, TrackSegment, Course, CarState } from './types';
import { planar, rightXZ } from './vec3';
import { sinDeg, cosDeg, clamp } from './detmath';
import { elevationHeightDelta } from './segments';
import { segmentMidpoint } from './track';
import { COLLISION } from './constants';

/** Outcome of one containment pass. */
export interface TrackContact {
  /** Car with corrected position, height, lateral velocity and lap distance */
  car: CarState;
  /** Lateral clamp happened this tick */
  collided: boolean;
  /** Edge that was hit: +1 right, -1 left, 0 none */
  side: -1 | 0 | 1;
  /** Unit vector pointing back toward the centreline (zero when no hit) */
  inward: PlanarVec;
}

// ──────────────────────────────────────────────────────────
// findNearestSegment
// ──────────────────────────────────────────────────────────

/**
 * Linear scan for the segment whose midpoint is closest on the ground plane.
 * Ties keep the lower index. Returns -1 for an empty course.
 */
export function findNearestSegment(
  segments: readonly TrackSegment[],
  point: PlanarVec,
): number {
  let best = -1;
  let bestDistSq = Infinity;

  for (let i = 0; i < segments.length; i++) {
    const mid = segmentMidpoint(segments[i]);
    const dx = point.x - mid.x;
    const dz = point.z - mid.z;
    const distSq = dx * dx + dz * dz;
    if (distSq < bestDistSq) {
      bestDistSq = distSq;
      best = i;
    }
  }

  return best;
}

// ──────────────────────────────────────────────────────────
// Segment-local frame
// ──────────────────────────────────────────────────────────

/**
 * World -> segment-local. Result x is lateral offset (positive = right of the
 * centreline), z is distance along the segment from its start.
 */
export function toSegmentLocal(segment: TrackSegment, point: PlanarVec): PlanarVec {
  const s = sinDeg(segment.heading);
  const c = cosDeg(segment.heading);
  const dx = point.x - segment.position.x;
  const dz = point.z - segment.position.z;
  return planar(dx * c - dz * s, dx * s + dz * c);
}

/** Segment-local -> world. Inverse of toSegmentLocal. */
export function fromSegmentLocal(segment: TrackSegment, local: PlanarVec): PlanarVec {
  const s = sinDeg(segment.heading);
  const c = cosDeg(segment.heading);
  return planar(
    local.x * c + local.z * s + segment.position.x,
    -local.x * s + local.z * c + segment.position.z,
  );
}

// ──────────────────────────────────────────────────────────
// resolveTrackCollision
// ──────────────────────────────────────────────────────────

/**
 * Contain a car against the nearest segment.
 *
 * Height is blended, not snapped, so crests and jumps don't pop. Lateral
 * velocity is inverted and damped on a clamp rather than zeroed.
 * With no segments the car is returned unchanged.
 */
export function resolveTrackCollision(car: CarState, course: Course): TrackContact {
  const none: TrackContact = { car, collided: false, side: 0, inward: planar(0, 0) };

  const index = findNearestSegment(course.segments, car.position);
  if (index < 0) {
    return none;
  }

  const seg = course.segments[index];
  const local = toSegmentLocal(seg, car.position);

  // Elevation follows progress through the segment
  const progress = clamp(local.z / seg.length, 0, 1);
  const targetY = seg.position.y + elevationHeightDelta(seg.elevation) * progress;
  const y = car.position.y + (targetY - car.position.y) * COLLISION.elevationBlend;

  const lapDistance = seg.start + clamp(local.z, 0, seg.length);

  const halfWidth = seg.width * 0.5;
  const clampedX = clamp(local.x, -halfWidth, halfWidth);

  if (clampedX === local.x) {
    return {
      ...none,
      car: {
        ...car,
        position: { x: car.position.x, y, z: car.position.z },
        segmentIndex: index,
        lapDistance,
      },
    };
  }

  const world = fromSegmentLocal(seg, planar(clampedX, local.z));
  const side = local.x > 0 ? 1 : -1;
  const right = rightXZ(seg.heading);

  return {
    car: {
      ...car,
      position: { x: world.x, y, z: world.z },
      lateralVelocity: car.lateralVelocity * -COLLISION.wallBounce,
      segmentIndex: index,
      lapDistance,
    },
    collided: true,
    side,
    inward: planar(-right.x * side, -right.z * side),
  };
}

// ──────────────────────────────────────────────────────────
// applyWallHit
// ──────────────────────────────────────────────────────────

/**
 * Impact response on top of the clamp: scrub forward speed and queue an
 * inward shove that vehicle dynamics applies (and decays) next tick.
 */
export function applyWallHit(contact: TrackContact): CarState {
  const { car } = contact;
  if (!contact.collided) {
    return car;
  }
  return {
    ...car,
    forwardVelocity: car.forwardVelocity * COLLISION.wallSpeedLoss,
    pushback: planar(
      car.pushback.x + contact.inward.x * COLLISION.wallPushback,
      car.pushback.z + contact.inward.z * COLLISION.wallPushback,
    ),
  };
}
