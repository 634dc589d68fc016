/**
 * AI Navigator Tests
 *
 * Waypoint arrival and lap counting, steering toward the current target,
 * corner speed limit and the start-of-race waypoint pick.
 */

import { describe, it, expect } from 'vitest';
import { navigate, headingError, firstWaypointAhead } from '../../src/engine/navigator';
import { createCar } from '../../src/engine/car';
import { compileCourse } from '../../src/engine/track';
import { vec3 } from '../../src/engine/vec3';
import type { CarState, SegmentDescriptor, Waypoint } from '../../src/engine/types';

const SPEEDSTER_CAP = 28.5 * 0.9;

function aiCar(x: number, z: number, overrides: Partial<CarState> = {}): CarState {
  return { ...createCar(1, 'ai', 'speedster', vec3(x, 0, z), 0), ...overrides };
}

describe('headingError', () => {
  it('is zero for a target dead ahead', () => {
    expect(headingError(aiCar(0, 0), vec3(0, 0, 20))).toBeCloseTo(0, 12);
  });

  it('is positive to the right and negative to the left', () => {
    expect(headingError(aiCar(0, 0), vec3(10, 0, 0))).toBeCloseTo(90, 10);
    expect(headingError(aiCar(0, 0), vec3(-10, 0, 0))).toBeCloseTo(-90, 10);
  });

  it('wraps across north', () => {
    // Facing 350, target bearing 10: a 20 degree right turn
    const target = vec3(Math.sin(Math.PI / 18) * 50, 0, Math.cos(Math.PI / 18) * 50);
    expect(headingError(aiCar(0, 0, { heading: 350 }), target)).toBeCloseTo(20, 6);
  });
});

describe('navigate', () => {
  it('drives straight at a target ahead', () => {
    const { command, lapCompleted } = navigate(aiCar(0, 0), [vec3(0, 0, 20)]);
    expect(command.controls.throttle).toBe(0.85);
    expect(command.controls.brake).toBe(0);
    expect(command.controls.boost).toBe(false);
    expect(command.controls.steer).toBeCloseTo(0, 12);
    expect(command.speedLimit).toBeCloseTo(SPEEDSTER_CAP, 10);
    expect(lapCompleted).toBe(false);
  });

  it('saturates steer and slows for a sharp turn', () => {
    const right = navigate(aiCar(0, 0), [vec3(10, 0, 0)]).command;
    expect(right.controls.steer).toBe(1);
    expect(right.speedLimit).toBeCloseTo(SPEEDSTER_CAP * 0.7, 10);

    const left = navigate(aiCar(0, 0), [vec3(-20, 0, 20)]).command;
    expect(left.controls.steer).toBeCloseTo(-1, 10);
  });

  it('scales steer with heading error', () => {
    // 30 degrees right of dead ahead -> 30 / 45
    const target = vec3(Math.sin(Math.PI / 6) * 40, 0, Math.cos(Math.PI / 6) * 40);
    expect(navigate(aiCar(0, 0), [target]).command.controls.steer).toBeCloseTo(2 / 3, 6);
  });

  it('keeps the target until the car is within arrival range', () => {
    const { car } = navigate(aiCar(0, 0), [vec3(0, 0, 10), vec3(10, 0, 10)]);
    expect(car.waypoint).toBe(0);
  });

  it('counts a lap when the waypoint index wraps', () => {
    const loop: Waypoint[] = [vec3(0, 0, 10), vec3(10, 0, 10), vec3(10, 0, 0), vec3(0, 0, 0)];
    let car = aiCar(0, 0);
    const laps: boolean[] = [];
    for (const wp of loop) {
      const result = navigate({ ...car, position: wp }, loop);
      car = result.car;
      laps.push(result.lapCompleted);
    }
    expect(car.waypoint).toBe(0);
    expect(car.lap).toBe(1);
    expect(laps).toEqual([false, false, false, true]);
  });

  it('steers at the next waypoint on the tick it arrives', () => {
    const loop: Waypoint[] = [vec3(0, 0, 10), vec3(10, 0, 10)];
    const { car, command } = navigate(aiCar(0, 9), loop);
    expect(car.waypoint).toBe(1);
    // From (0, 9) facing +z, (10, 10) is almost square to the right
    expect(command.controls.steer).toBe(1);
  });

  it('falls back to cruising with no waypoints', () => {
    const start = aiCar(0, 0);
    const { car, command } = navigate(start, []);
    expect(car).toBe(start);
    expect(command.controls).toEqual({ throttle: 0.8, brake: 0, steer: 0, boost: false });
    expect(command.speedLimit).toBeCloseTo(SPEEDSTER_CAP, 10);
  });
});

describe('firstWaypointAhead', () => {
  const corner: SegmentDescriptor = { turn: 'Tight90R', elevation: 'Flat', banking: 'Flat', style: 'Open' };
  // Midpoints at lap distance 7.5, 22.5, 37.5, 52.5
  const square = compileCourse([corner, corner, corner, corner], { debug: false });

  it('picks the first segment midpoint beyond the lap distance', () => {
    expect(firstWaypointAhead(square, 0)).toBe(0);
    expect(firstWaypointAhead(square, 10)).toBe(1);
    expect(firstWaypointAhead(square, 40)).toBe(3);
  });

  it('wraps to 0 past the last midpoint', () => {
    expect(firstWaypointAhead(square, 55)).toBe(0);
  });

  it('returns 0 on an empty course', () => {
    expect(firstWaypointAhead(compileCourse([], { debug: false }), 0)).toBe(0);
  });
});
