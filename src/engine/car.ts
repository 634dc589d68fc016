/**
 * Car Physics Module: Arcade Drive Model
 *
 * Pure functions implementing the vehicle simulation:
 * - Throttle/brake integration with coasting friction
 * - Boost activation, fixed-length window and speed ceiling
 * - Drift entry and slide, which refills the boost meter
 * - Heading integration and movement along the car's forward/right basis
 * - Decaying pushback queued by wall hits
 *
 * Fidelity is intentionally low; determinism is the target. All trig goes
 * through detmath, no Math.random, no wall clock.
 */

import type { Vec3, CarState, CarClass, CarStats, ControlInput, Controller } from './types';
import { vec3, planar, forwardXZ, rightXZ } from './vec3';
import { normalizeDegrees, clamp } from './detmath';
import { BOOST, DRIFT, DRIVE, COLLISION, RACE, CAR_CLASSES } from './constants';

/** Neutral control sample. */
export const NO_INPUT: ControlInput = { throttle: 0, brake: 0, steer: 0, boost: false };

export interface CarStepResult {
  car: CarState;
  /** Boost window opened this tick */
  boostStarted: boolean;
  /** Drift began this tick */
  driftStarted: boolean;
}

// ──────────────────────────────────────────────────────────
// createCar
// ──────────────────────────────────────────────────────────

/**
 * Create a car at rest with its class stats copied in.
 * Meter starts at the race's opening charge.
 */
export function createCar(
  slot: number,
  controller: Controller,
  carClass: CarClass,
  position: Vec3,
  heading: number,
): CarState {
  const stats: CarStats = { ...CAR_CLASSES[carClass] };
  return {
    slot,
    controller,
    carClass,
    stats,
    position: vec3(position.x, position.y, position.z),
    heading: normalizeDegrees(heading),
    forwardVelocity: 0,
    lateralVelocity: 0,
    angularVelocity: 0,
    boostMeter: RACE.startingBoost,
    boosting: false,
    boostTicks: 0,
    drifting: false,
    lap: 0,
    lastCheckpoint: 0,
    checkpointLaps: 0,
    waypoint: 0,
    racePosition: slot + 1,
    pushback: planar(0, 0),
    segmentIndex: -1,
    lapDistance: 0,
  };
}

// ──────────────────────────────────────────────────────────
// sanitizeControls
// ──────────────────────────────────────────────────────────

function finiteOr(value: number, fallback: number): number {
  return Number.isFinite(value) ? value : fallback;
}

/** Clamp a raw sample into range; non-finite axes read as released. */
export function sanitizeControls(input: ControlInput): ControlInput {
  return {
    throttle: clamp(finiteOr(input.throttle, 0), 0, 1),
    brake: clamp(finiteOr(input.brake, 0), 0, 1),
    steer: clamp(finiteOr(input.steer, 0), -1, 1),
    boost: input.boost === true,
  };
}

// ──────────────────────────────────────────────────────────
// speedCeiling
// ──────────────────────────────────────────────────────────

/** Forward speed cap this tick: class max, boosted while active, then the caller's limit. */
export function speedCeiling(car: Pick<CarState, 'stats' | 'boosting'>, speedLimit = Infinity): number {
  const boosted = car.stats.maxSpeed * (car.boosting ? BOOST.multiplier : 1);
  return Math.min(boosted, speedLimit);
}

// ──────────────────────────────────────────────────────────
// stepCar
// ──────────────────────────────────────────────────────────

/**
 * Advance one car by one tick.
 *
 * Steps:
 * 1. Throttle/brake integrate forward velocity; released input coasts
 * 2. Boost request opens the window if the meter can pay for it
 * 3. Clamp forward velocity to the (boosted, limited) ceiling
 * 4. Drift or grip steering sets yaw rate and lateral velocity
 * 5. Integrate heading, then position along forward/right
 * 6. Apply and decay pending pushback
 * 7. Count down the boost window
 *
 * @param speedLimit - Extra cap from the navigator; humans pass none
 */
export function stepCar(
  car: CarState,
  input: ControlInput,
  dt: number,
  speedLimit = Infinity,
): CarStepResult {
  const controls = sanitizeControls(input);
  const { stats } = car;

  // 1. Longitudinal
  const accelInput = controls.throttle - controls.brake * DRIVE.brakeWeight;
  let forward = car.forwardVelocity;
  if (accelInput > DRIVE.inputDeadzone) {
    forward += stats.acceleration * accelInput * dt;
  } else if (accelInput < -DRIVE.inputDeadzone) {
    forward += stats.acceleration * accelInput * DRIVE.brakeGain * dt;
  } else {
    forward *= DRIVE.coastFriction;
  }

  // 2. Boost
  let boosting = car.boosting;
  let boostTicks = car.boostTicks;
  let boostMeter = car.boostMeter;
  let boostStarted = false;
  if (controls.boost && boostMeter >= BOOST.cost && !boosting) {
    boosting = true;
    boostTicks = BOOST.durationTicks;
    boostMeter -= BOOST.cost;
    boostStarted = true;
  }

  // 3. Ceiling
  const ceiling = speedCeiling({ stats, boosting }, speedLimit);
  forward = clamp(forward, -ceiling * DRIVE.reverseRatio, ceiling);

  // 4. Steering
  const speedFactor = Math.min(Math.abs(forward) / stats.maxSpeed, 1);
  let lateral = car.lateralVelocity;
  let angular: number;
  let drifting: boolean;
  let driftStarted = false;

  if (
    controls.brake > DRIFT.threshold &&
    Math.abs(controls.steer) > DRIFT.threshold &&
    speedFactor > DRIFT.minSpeedFactor
  ) {
    driftStarted = !car.drifting;
    drifting = true;
    const driftPower = controls.steer * stats.driftFactor;
    lateral += driftPower * DRIFT.lateralGain * dt;
    angular = driftPower * DRIFT.yawRate;
    forward *= DRIFT.forwardBleed;
    boostMeter = Math.min(boostMeter + DRIFT.meterRegen, 1);
  } else {
    drifting = false;
    angular = controls.steer * stats.handling * DRIVE.steerRate * speedFactor;
    lateral *= DRIVE.lateralDecay;
  }

  // 5. Integrate
  const heading = normalizeDegrees(car.heading + angular * dt);
  const fwd = forwardXZ(heading);
  const right = rightXZ(heading);

  let x = car.position.x + (fwd.x * forward + right.x * lateral) * dt;
  let z = car.position.z + (fwd.z * forward + right.z * lateral) * dt;

  // 6. Pushback
  x += car.pushback.x;
  z += car.pushback.z;
  const pushback = planar(
    car.pushback.x * COLLISION.pushbackDecay,
    car.pushback.z * COLLISION.pushbackDecay,
  );

  // 7. Boost window
  if (boostTicks > 0) {
    boostTicks -= 1;
    if (boostTicks === 0) {
      boosting = false;
    }
  }

  return {
    car: {
      ...car,
      position: vec3(x, car.position.y, z),
      heading,
      forwardVelocity: forward,
      lateralVelocity: lateral,
      angularVelocity: angular,
      boostMeter: clamp(boostMeter, 0, 1),
      boosting,
      boostTicks,
      drifting,
      pushback,
    },
    boostStarted,
    driftStarted,
  };
}
