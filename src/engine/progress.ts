/**
 * Race Progress Tracker
 *
 * A single scalar per car (laps, checkpoints, distance into the current
 * checkpoint interval) that orders the field. Ranking is a stable sort, so
 * cars with identical progress keep slot order.
 */

import type { CarState, Course } from './types';
import { clamp } from './detmath';

/** Signed distance from b forward to a, taken the short way round, in (-L/2, L/2]. */
function lapOffset(a: number, b: number, totalLength: number): number {
  let d = (a - b) % totalLength;
  if (d < 0) d += totalLength;
  return d > totalLength / 2 ? d - totalLength : d;
}

/**
 * Race progress in lap-distance units: checkpoint laps, checkpoints passed,
 * then distance past the last checkpoint clamped to [0, interval].
 *
 * Laps come from checkpointLaps so the lap and checkpoint terms move together
 * for AI cars too. A car standing short of the checkpoint it just passed
 * (inside the tolerance window) reads 0 into the interval, not a full one.
 */
export function computeProgress(car: CarState, course: Course): number {
  const length = course.totalLength;
  const count = course.checkpoints.length;
  if (count === 0 || length <= 0) {
    return car.checkpointLaps * length;
  }

  const interval = length / count;
  const from = course.checkpoints[car.lastCheckpoint % count].distance;
  const travelled = lapOffset(car.lapDistance, from, length);

  return car.checkpointLaps * length + car.lastCheckpoint * interval + clamp(travelled, 0, interval);
}

/**
 * Assign racePosition 1..N by progress, highest first.
 * Returns new car objects in the original slot order.
 */
export function rankCars(cars: readonly CarState[], course: Course): CarState[] {
  const order = cars
    .map((car, index) => ({ index, progress: computeProgress(car, course) }))
    .sort((a, b) => b.progress - a.progress || a.index - b.index);

  const positions = new Array<number>(cars.length);
  order.forEach((entry, rank) => {
    positions[entry.index] = rank + 1;
  });

  return cars.map((car, i) =>
    car.racePosition === positions[i] ? car : { ...car, racePosition: positions[i] },
  );
}
