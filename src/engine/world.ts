/**
 * World Step Function: Race Orchestrator
 *
 * Wires all engine modules together into a single pure step function.
 * This is the function every host calls once per fixed tick.
 *
 * Step sequence per tick, per car in slot order:
 *   1. Pick the control source (human sample, or navigator for AI slots)
 *   2. Step vehicle dynamics
 *   3. Contain against the track, apply wall-hit effects
 *   4. Update checkpoints (and human laps)
 * Then for the whole field:
 *   5. Rank by progress
 *   6. Move cameras, roll human-camera shake from the host's draws
 *   7. Detect the finish, advance the clock
 *
 * All functions are pure: (state, frame) -> newState.
 * No Math.random, no Date.now: the host supplies dt and the draws.
 */

import type {
  AudioCue,
  CameraState,
  CarClass,
  CarState,
  Course,
  CueSink,
  RaceSetup,
  RaceState,
  TickFrame,
} from './types';
import { createCar, stepCar, NO_INPUT } from './car';
import type { CarStepResult } from './car';
import { navigate, firstWaypointAhead } from './navigator';
import { resolveTrackCollision, applyWallHit } from './collision';
import { updateCheckpoints } from './checkpoint';
import { rankCars } from './progress';
import { createCamera, followCar, addShake, updateShake } from './camera';
import { vec3 } from './vec3';
import { COLLISION, RACE } from './constants';

/** Class used for any slot the setup leaves unassigned. */
export const DEFAULT_CAR_CLASS: CarClass = 'speedster';

interface PendingCue {
  cue: AudioCue;
  slot: number;
}

// ──────────────────────────────────────────────────────────
// createRace
// ──────────────────────────────────────────────────────────

/** Grid position for a slot: staggered pairs behind the start line, facing +z. */
export function gridPosition(slot: number): { x: number; z: number } {
  return {
    x: (slot - (RACE.maxCars - 1) / 2) * RACE.gridSpacingX,
    z: RACE.gridStartZ + RACE.gridSpacingZ * slot,
  };
}

/**
 * Create a race at tick 0 with every slot on the grid.
 *
 * Slots 0..humanCount-1 are human; the rest are AI and start seeking the
 * first waypoint ahead of their grid spot.
 */
export function createRace(course: Course, setup: RaceSetup): RaceState {
  const humanCount = Math.max(0, Math.min(RACE.maxCars, Math.floor(setup.humanCount) || 0));

  const cars: CarState[] = [];
  for (let slot = 0; slot < RACE.maxCars; slot++) {
    const carClass = slot < setup.carClasses.length ? setup.carClasses[slot] : DEFAULT_CAR_CLASS;
    const grid = gridPosition(slot);
    const placed = createCar(
      slot,
      slot < humanCount ? 'human' : 'ai',
      carClass,
      vec3(grid.x, 0, grid.z),
      0,
    );

    // Seed the track-relative fields without moving the car
    const contact = resolveTrackCollision(placed, course);
    const car: CarState = {
      ...placed,
      segmentIndex: contact.car.segmentIndex,
      lapDistance: contact.car.lapDistance,
    };

    cars.push(
      car.controller === 'ai'
        ? { ...car, waypoint: firstWaypointAhead(course, car.lapDistance) }
        : car,
    );
  }

  return {
    tick: 0,
    raceTime: 0,
    course,
    cars,
    cameras: cars.map(createCamera),
    humanCount,
    targetLaps: setup.targetLaps ?? RACE.targetLaps,
    finished: false,
  };
}

// ──────────────────────────────────────────────────────────
// stepRace
// ──────────────────────────────────────────────────────────

/**
 * Advance the race by one tick.
 *
 * Total over its inputs: missing control samples read as released, a
 * non-finite or negative dt as 0. Cues are delivered after the new state is
 * built, in slot order.
 */
export function stepRace(state: RaceState, frame: TickFrame, cues?: CueSink): RaceState {
  const { course } = state;
  const dt = Number.isFinite(frame.dt) && frame.dt > 0 ? frame.dt : 0;
  const pending: PendingCue[] = [];
  const hits: boolean[] = [];

  const stepped = state.cars.map((car, slot) => {
    // 1-2. Control source, then dynamics
    let result: CarStepResult;
    if (car.controller === 'human') {
      const input = slot < frame.controls.length ? frame.controls[slot] : NO_INPUT;
      result = stepCar(car, input, dt);
    } else {
      const nav = navigate(car, course.waypoints);
      result = stepCar(nav.car, nav.command.controls, dt, nav.command.speedLimit);
    }
    if (result.boostStarted) pending.push({ cue: 'boost', slot });
    if (result.driftStarted) pending.push({ cue: 'drift', slot });

    // 3. Track containment
    const contact = resolveTrackCollision(result.car, course);
    const next = applyWallHit(contact);
    hits.push(contact.collided);
    if (contact.collided) pending.push({ cue: 'collision', slot });

    // 4. Checkpoints
    const cp = updateCheckpoints(next, course);
    if (cp.passed) pending.push({ cue: 'checkpoint', slot });
    return cp.car;
  });

  // 5. Ranking
  const cars = rankCars(stepped, course);

  // 6. Cameras
  const cameras = state.cameras.map((camera, slot): CameraState => {
    const car = slot < cars.length ? cars[slot] : undefined;
    if (!car) return camera;
    let next = followCar(camera, car);
    if (car.controller === 'human') {
      if (hits[slot]) next = addShake(next, COLLISION.cameraShake);
      next = updateShake(next, frame.random());
    }
    return next;
  });

  // 7. Finish
  let finished = state.finished;
  if (!finished) {
    const winner = cars.find((car) => car.controller === 'human' && car.lap >= state.targetLaps);
    if (winner) {
      finished = true;
      pending.push({ cue: 'finish', slot: winner.slot });
    }
  }

  const next: RaceState = {
    ...state,
    tick: state.tick + 1,
    raceTime: state.raceTime + dt,
    cars,
    cameras,
    finished,
  };

  if (cues) {
    for (const { cue, slot } of pending) {
      cues(cue, slot);
    }
  }

  return next;
}
