/**
 * Race State Checksum
 *
 * SHA-256 over a canonical serialisation of everything a tick writes. Two
 * instances that agree on the checksum agree on the state bit for bit, which
 * is the check rollback resimulation relies on.
 */

import { createHash } from 'node:crypto';
import type { CameraState, CarState, RaceState, Vec3 } from './types';

/** Full-precision float64 text; -0 is kept distinct from 0. */
function num(value: number): string {
  return Object.is(value, -0) ? '-0' : String(value);
}

function vec(v: Vec3): string[] {
  return [num(v.x), num(v.y), num(v.z)];
}

function carFields(car: CarState): string[] {
  return [
    String(car.slot),
    car.controller,
    car.carClass,
    ...vec(car.position),
    num(car.heading),
    num(car.forwardVelocity),
    num(car.lateralVelocity),
    num(car.angularVelocity),
    num(car.boostMeter),
    String(car.boosting),
    String(car.boostTicks),
    String(car.drifting),
    String(car.lap),
    String(car.lastCheckpoint),
    String(car.checkpointLaps),
    String(car.waypoint),
    String(car.racePosition),
    num(car.pushback.x),
    num(car.pushback.z),
    String(car.segmentIndex),
    num(car.lapDistance),
  ];
}

function cameraFields(camera: CameraState): string[] {
  return [
    ...vec(camera.position),
    ...vec(camera.target),
    num(camera.shakeIntensity),
    num(camera.shakeOffsetX),
    num(camera.shakeOffsetY),
  ];
}

export function checksumRace(state: RaceState): string {
  const payload = {
    tick: state.tick,
    raceTime: num(state.raceTime),
    finished: state.finished,
    cars: state.cars.map(carFields),
    cameras: state.cameras.map(cameraFields),
  };
  return createHash('sha256').update(JSON.stringify(payload)).digest('hex');
}
