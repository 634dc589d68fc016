/**
 * Checkpoint Crossing and Lap Counting
 *
 * Checkpoints sit at even lap-distance intervals, independent of segment
 * boundaries. A car passes the next expected checkpoint when its lap
 * distance comes within CHECKPOINT_TOLERANCE of it:
 * - Sequential: only the next checkpoint can be passed (no skipping)
 * - Passing checkpoint 0 after the others completes a lap for human cars;
 *   AI laps are counted by the navigator on waypoint wrap
 * - Every car keeps checkpointLaps, the wrap count that race progress ranks by
 *
 * All functions are pure: they return new objects, never mutate input state.
 */

import type { CarState, Course } from './types';
import { CHECKPOINT_TOLERANCE } from './constants';

export interface CheckpointUpdate {
  car: CarState;
  /** Next checkpoint was passed this tick */
  passed: boolean;
  /** The pass completed a lap (human cars only) */
  lapCompleted: boolean;
}

/** Shortest distance between two lap positions on a loop of the given length. */
export function lapGap(a: number, b: number, totalLength: number): number {
  if (totalLength <= 0) return Math.abs(a - b);
  let d = Math.abs(a - b) % totalLength;
  if (d > totalLength - d) d = totalLength - d;
  return d;
}

/**
 * Advance a car's checkpoint index if it has reached the next checkpoint.
 *
 * Reads car.lapDistance, so run it after the collision pass for the tick.
 */
export function updateCheckpoints(car: CarState, course: Course): CheckpointUpdate {
  const count = course.checkpoints.length;
  if (count === 0) {
    return { car, passed: false, lapCompleted: false };
  }

  const next = (car.lastCheckpoint + 1) % count;
  const target = course.checkpoints[next].distance;

  if (lapGap(car.lapDistance, target, course.totalLength) >= CHECKPOINT_TOLERANCE) {
    return { car, passed: false, lapCompleted: false };
  }

  const wrapped = next === 0;
  const lapCompleted = wrapped && car.controller === 'human';
  return {
    car: {
      ...car,
      lastCheckpoint: next,
      checkpointLaps: wrapped ? car.checkpointLaps + 1 : car.checkpointLaps,
      lap: lapCompleted ? car.lap + 1 : car.lap,
    },
    passed: true,
    lapCompleted,
  };
}
