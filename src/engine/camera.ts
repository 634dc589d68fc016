/**
 * Follow Camera
 *
 * Per-slot chase camera that trails the car and shakes on impact. It is a
 * render sink: nothing in the simulation reads it back, but it lives in race
 * state so replays reproduce it exactly. Shake offsets come from the host's
 * random draws, never from Math.random.
 */

import type { CameraState, CarState, Vec3 } from './types';
import { vec3, lerp, forwardXZ } from './vec3';
import { CAMERA } from './constants';

function idealPosition(car: CarState): Vec3 {
  const fwd = forwardXZ(car.heading);
  return vec3(
    car.position.x - fwd.x * CAMERA.followDistance,
    car.position.y + CAMERA.followHeight,
    car.position.z - fwd.z * CAMERA.followDistance,
  );
}

function idealTarget(car: CarState): Vec3 {
  const fwd = forwardXZ(car.heading);
  return vec3(
    car.position.x + fwd.x * CAMERA.lookAhead,
    car.position.y + CAMERA.lookHeight,
    car.position.z + fwd.z * CAMERA.lookAhead,
  );
}

/** Camera placed exactly at its follow point, no shake. */
export function createCamera(car: CarState): CameraState {
  return {
    position: idealPosition(car),
    target: idealTarget(car),
    shakeIntensity: 0,
    shakeOffsetX: 0,
    shakeOffsetY: 0,
  };
}

/** Ease position and target toward the car's follow point. */
export function followCar(camera: CameraState, car: CarState): CameraState {
  return {
    ...camera,
    position: lerp(camera.position, idealPosition(car), CAMERA.smoothing),
    target: lerp(camera.target, idealTarget(car), CAMERA.smoothing),
  };
}

/** Add impact shake, capped at 1. */
export function addShake(camera: CameraState, amount: number): CameraState {
  return { ...camera, shakeIntensity: Math.min(camera.shakeIntensity + amount, 1) };
}

/**
 * Decay shake and roll new offsets from one uint32 draw.
 * Low byte drives x, next byte drives y, each mapped to [-1, 1).
 */
export function updateShake(camera: CameraState, draw: number): CameraState {
  if (camera.shakeIntensity <= 0) {
    return camera.shakeOffsetX === 0 && camera.shakeOffsetY === 0
      ? camera
      : { ...camera, shakeOffsetX: 0, shakeOffsetY: 0 };
  }

  const rx = (draw & 0xff) / 128 - 1;
  const ry = ((draw >>> 8) & 0xff) / 128 - 1;
  const intensity = camera.shakeIntensity;

  let decayed = intensity * CAMERA.shakeDecay;
  if (decayed < CAMERA.shakeFloor) decayed = 0;

  return {
    ...camera,
    shakeOffsetX: rx * intensity * CAMERA.shakeScaleX,
    shakeOffsetY: ry * intensity * CAMERA.shakeScaleY,
    shakeIntensity: decayed,
  };
}
