/**
 * AI Navigator: Waypoint Seeking
 *
 * Turns an AI car's position and heading into a control sample, the same
 * shape a human pad produces, plus a speed limit that eases off in corners.
 * Lap counting for AI cars happens here: wrapping the waypoint index back to
 * 0 completes a lap.
 */

import type { CarState, ControlInput, Course, Waypoint } from './types';
import { atan2Deg, wrapDegrees, clamp } from './detmath';
import { distanceSqXZ } from './vec3';
import { AI } from './constants';

/** What the navigator asks of vehicle dynamics this tick. */
export interface NavigatorCommand {
  controls: ControlInput;
  /** Forward speed cap to pass to stepCar */
  speedLimit: number;
}

export interface NavigatorResult {
  /** Car with waypoint index (and lap) advanced */
  car: CarState;
  command: NavigatorCommand;
  lapCompleted: boolean;
}

/** Signed heading change (deg, (-180, 180]) that would point the car at a target. */
export function headingError(car: Pick<CarState, 'position' | 'heading'>, target: Waypoint): number {
  const bearing = atan2Deg(target.x - car.position.x, target.z - car.position.z);
  return wrapDegrees(bearing - car.heading);
}

/**
 * Steer toward the current waypoint and advance it on arrival.
 *
 * Steering aims at the waypoint that is current after the arrival check, so
 * the tick that reaches a waypoint already turns toward the next one.
 */
export function navigate(car: CarState, waypoints: readonly Waypoint[]): NavigatorResult {
  const maxSpeed = car.stats.maxSpeed;

  if (waypoints.length === 0) {
    return {
      car,
      command: {
        controls: { throttle: AI.fallbackThrottle, brake: 0, steer: 0, boost: false },
        speedLimit: maxSpeed * AI.speedCapRatio,
      },
      lapCompleted: false,
    };
  }

  const index = car.waypoint % waypoints.length;

  let waypoint = index;
  let lap = car.lap;
  let lapCompleted = false;
  if (distanceSqXZ(car.position, waypoints[index]) < AI.arrivalRadius * AI.arrivalRadius) {
    waypoint = (index + 1) % waypoints.length;
    if (waypoint === 0) {
      lap += 1;
      lapCompleted = true;
    }
  }

  const steer = clamp(headingError(car, waypoints[waypoint]) / AI.turnSeverity, -1, 1);

  return {
    car: { ...car, waypoint, lap },
    command: {
      controls: { throttle: AI.throttle, brake: 0, steer, boost: false },
      speedLimit: maxSpeed * AI.speedCapRatio * (1 - Math.abs(steer) * AI.cornerSlowdown),
    },
    lapCompleted,
  };
}

/**
 * First waypoint whose segment midpoint lies beyond a lap distance, so a car
 * placed mid-lap does not turn back for waypoint 0. Wraps to 0 past the last.
 */
export function firstWaypointAhead(course: Course, lapDistance: number): number {
  const count = Math.min(course.waypoints.length, course.segments.length);
  for (let i = 0; i < count; i++) {
    const seg = course.segments[i];
    if (seg.start + seg.length * 0.5 > lapDistance) {
      return i;
    }
  }
  return 0;
}
