/**
 * Course Compilation Pipeline
 *
 * Converts an authored list of segment descriptors into absolute course
 * geometry. The compiled course is the foundation for collision, elevation,
 * AI navigation and lap progress.
 *
 * Pipeline: SegmentDescriptor[] -> compileCourse -> Course
 *   1. Walk a cursor (position, heading) through the layout, laying one
 *      segment per descriptor along the cursor heading
 *   2. Drop a waypoint at every segment midpoint
 *   3. Sum lengths, place checkpoints at even lap-distance intervals
 *   4. Return an immutable Course shared by every tick of the race
 */

import type { Vec3, PlanarVec, SegmentDescriptor, TrackSegment, Waypoint, Checkpoint, Course } from './types';
import { vec3, advanceXZ, forwardXZ, distanceXZ } from './vec3';
import { normalizeDegrees } from './detmath';
import { turnDegrees, turnLengthMultiplier, elevationHeightDelta } from './segments';
import { TRACK } from './constants';

export interface CompileOptions {
  /** Straight-segment length (default TRACK.baseSegmentLength) */
  baseLength?: number;
  /** Corridor width of every segment (default TRACK.defaultWidth) */
  width?: number;
  checkpointCount?: number;
  /** Run the advisory closure check (default: NODE_ENV !== 'production') */
  debug?: boolean;
  /** Where closure warnings go (default console.warn) */
  warn?: (message: string) => void;
}

export interface ClosureReport {
  /** Signed sum of all turn angles */
  totalDegrees: number;
  /** Sum is a whole number of turns within tolerance */
  closed: boolean;
}

const DEBUG_BUILD = process.env.NODE_ENV !== 'production';

function defaultWarn(message: string): void {
  console.warn(`[track] ${message}`);
}

// ──────────────────────────────────────────────────────────
// validateClosure
// ──────────────────────────────────────────────────────────

/**
 * Check that the layout's turns add up to a whole number of revolutions,
 * i.e. the course ends facing the way it started.
 */
export function validateClosure(layout: readonly Pick<SegmentDescriptor, 'turn'>[]): ClosureReport {
  let total = 0;
  for (const seg of layout) {
    total += turnDegrees(seg.turn);
  }
  const residual = Math.abs(total % 360);
  const error = Math.min(residual, 360 - residual);
  return { totalDegrees: total, closed: error < TRACK.closureToleranceDeg };
}

// ──────────────────────────────────────────────────────────
// compileCourse
// ──────────────────────────────────────────────────────────

/**
 * Compile a layout into a Course.
 *
 * Descriptors past TRACK.maxSegments are dropped without notice; the result
 * is then not guaranteed to close. An open layout only produces a warning in
 * debug builds -- compilation always succeeds.
 */
export function compileCourse(
  layout: readonly SegmentDescriptor[],
  options: CompileOptions = {},
): Course {
  const baseLength = options.baseLength ?? TRACK.baseSegmentLength;
  const width = options.width ?? TRACK.defaultWidth;
  const checkpointCount = options.checkpointCount ?? TRACK.checkpointCount;

  if (options.debug ?? DEBUG_BUILD) {
    const closure = validateClosure(layout);
    if (!closure.closed) {
      (options.warn ?? defaultWarn)(
        `layout turns ${closure.totalDegrees} degrees; course will not close`,
      );
    }
  }

  const segments: TrackSegment[] = [];
  const waypoints: Waypoint[] = [];

  let cursor: Vec3 = vec3(0, 0, 0);
  let heading = 0;
  let distance = 0;

  const count = Math.min(layout.length, TRACK.maxSegments);
  for (let i = 0; i < count; i++) {
    const def = layout[i];
    const length = baseLength * turnLengthMultiplier(def.turn);
    const rise = elevationHeightDelta(def.elevation);
    const forward = forwardXZ(heading);

    segments.push({
      position: cursor,
      heading,
      turn: def.turn,
      elevation: def.elevation,
      banking: def.banking,
      style: def.style,
      width,
      length,
      start: distance,
    });

    if (waypoints.length < TRACK.maxWaypoints) {
      const mid = advanceXZ(cursor, forward, length * 0.5);
      waypoints.push(vec3(mid.x, cursor.y + rise * 0.5, mid.z));
    }

    // Lay the length along the segment's own heading, then turn for the next one
    const end = advanceXZ(cursor, forward, length);
    cursor = vec3(end.x, cursor.y + rise, end.z);
    heading = normalizeDegrees(heading + turnDegrees(def.turn));
    distance += length;
  }

  let totalLength = 0;
  for (const seg of segments) {
    totalLength += seg.length;
  }

  const partial: Course = { segments, waypoints, checkpoints: [], totalLength };
  const checkpoints: Checkpoint[] = [];
  if (segments.length > 0) {
    const spacing = totalLength / checkpointCount;
    for (let i = 0; i < checkpointCount; i++) {
      const at = i * spacing;
      checkpoints.push({ distance: at, position: pointAtLapDistance(partial, at) });
    }
  }

  return { segments, waypoints, checkpoints, totalLength };
}

// ──────────────────────────────────────────────────────────
// Geometry queries
// ──────────────────────────────────────────────────────────

/** Heading-projected centre of a segment on the ground plane. */
export function segmentMidpoint(segment: TrackSegment): PlanarVec {
  const forward = forwardXZ(segment.heading);
  const half = segment.length * 0.5;
  return {
    x: segment.position.x + forward.x * half,
    z: segment.position.z + forward.z * half,
  };
}

/** Index of the segment containing a lap distance (wrapped into one lap). */
export function segmentAtLapDistance(course: Course, distance: number): number {
  const { segments, totalLength } = course;
  if (segments.length === 0 || totalLength <= 0) return -1;

  let d = distance % totalLength;
  if (d < 0) d += totalLength;

  for (let i = segments.length - 1; i >= 0; i--) {
    if (segments[i].start <= d) return i;
  }
  return 0;
}

/** World position on the centreline at a lap distance, height interpolated. */
export function pointAtLapDistance(course: Course, distance: number): Vec3 {
  const index = segmentAtLapDistance(course, distance);
  if (index < 0) return vec3(0, 0, 0);

  const seg = course.segments[index];
  let d = distance % course.totalLength;
  if (d < 0) d += course.totalLength;

  const along = Math.min(Math.max(d - seg.start, 0), seg.length);
  const p = advanceXZ(seg.position, forwardXZ(seg.heading), along);
  const rise = elevationHeightDelta(seg.elevation) * (along / seg.length);
  return vec3(p.x, seg.position.y + rise, p.z);
}

/**
 * Ground-plane gap between where the last segment ends and where the first
 * begins. Near zero for a well-authored layout.
 */
export function closureGap(course: Course): number {
  const { segments } = course;
  if (segments.length === 0) return 0;
  const last = segments[segments.length - 1];
  const end = advanceXZ(last.position, forwardXZ(last.heading), last.length);
  return distanceXZ(end, segments[0].position);
}
