/**
 * Simulation Constants and Tuning Parameters
 *
 * All gameplay tuning lives here. The arcade model is deliberately simple:
 * these numbers set the feel, and every resimulating instance must share them.
 */

import type { CarClass, CarStats } from './types';

/** Fixed timestep in seconds (60Hz). Hosts may pass their own, identical on every instance. */
export const DT = 1 / 60;

/** Course compilation. */
export const TRACK = {
  /** Length of a straight segment; turns scale it by their multiplier */
  baseSegmentLength: 10,
  /** Full corridor width of every segment */
  defaultWidth: 10,
  maxSegments: 64,
  maxWaypoints: 64,
  checkpointCount: 4,
  /** Allowed error (degrees) when checking that a layout turns a full circle */
  closureToleranceDeg: 0.1,
} as const;

/** Longitudinal drive model. */
export const DRIVE = {
  /** Brake counts this much against throttle */
  brakeWeight: 0.7,
  /** Net input inside ±this is treated as released */
  inputDeadzone: 0.01,
  /** Braking decelerates this many times harder than throttle accelerates */
  brakeGain: 2,
  /** Per-tick multiplier while coasting */
  coastFriction: 0.98,
  /** Reverse speed cap as a fraction of forward cap */
  reverseRatio: 0.5,
  /** Yaw rate (deg/s) at full steer, full speed, handling 1 */
  steerRate: 90,
  /** Per-tick lateral velocity multiplier when not drifting */
  lateralDecay: 0.85,
} as const;

export const BOOST = {
  /** Meter spent per activation */
  cost: 0.5,
  /** Max-speed multiplier while active */
  multiplier: 1.5,
  /** Active window in ticks (2s at 60Hz) */
  durationTicks: 120,
} as const;

export const DRIFT = {
  /** Brake and |steer| must both exceed this */
  threshold: 0.3,
  /** Minimum |speed| / maxSpeed to start sliding */
  minSpeedFactor: 0.4,
  lateralGain: 15,
  /** Yaw rate (deg/s) at full drift power */
  yawRate: 120,
  /** Per-tick forward velocity multiplier while drifting */
  forwardBleed: 0.97,
  /** Boost meter gained per drifting tick */
  meterRegen: 0.015,
} as const;

/** Track-relative containment. */
export const COLLISION = {
  /** Fraction of the height gap closed per tick */
  elevationBlend: 0.15,
  /** Lateral velocity is inverted and scaled by this on a wall hit */
  wallBounce: 0.3,
  /** Forward velocity multiplier on a wall hit */
  wallSpeedLoss: 0.7,
  /** Inward shove (units) queued on a wall hit */
  wallPushback: 0.5,
  /** Pending pushback multiplier per tick */
  pushbackDecay: 0.5,
  /** Camera shake added on a wall hit */
  cameraShake: 0.3,
} as const;

/** Lap distance window (units) for passing a checkpoint. */
export const CHECKPOINT_TOLERANCE = 5;

/** Navigator tuning. */
export const AI = {
  /** Ground distance at which a waypoint counts as reached */
  arrivalRadius: 8,
  /** Heading error (deg) that maps to full steer */
  turnSeverity: 45,
  throttle: 0.85,
  /** Throttle when the course has no waypoints */
  fallbackThrottle: 0.8,
  /** AI cap as a fraction of class max speed */
  speedCapRatio: 0.9,
  /** Cap reduction at full steer */
  cornerSlowdown: 0.3,
} as const;

export const RACE = {
  maxCars: 4,
  targetLaps: 3,
  /** Ticks from grid to green (4s) */
  countdownTicks: 240,
  /** Attract-mode demo restarts once car 0 reaches this lap */
  attractRestartLap: 2,
  startingBoost: 0.5,
  gridSpacingX: 2.5,
  gridStartZ: 5,
  gridSpacingZ: 3,
} as const;

export const CAMERA = {
  followDistance: 8,
  followHeight: 3,
  lookAhead: 5,
  lookHeight: 1,
  /** Fraction of the gap closed per tick */
  smoothing: 0.1,
  shakeDecay: 0.9,
  /** Below this the shake snaps to zero */
  shakeFloor: 0.01,
  shakeScaleX: 0.3,
  shakeScaleY: 0.2,
} as const;

export const CAR_CLASSES: Record<CarClass, CarStats> = {
  speedster: { maxSpeed: 28.5, acceleration: 14.0, handling: 1.0, driftFactor: 0.85 },
  muscle: { maxSpeed: 33.0, acceleration: 12.5, handling: 0.85, driftFactor: 0.8 },
  racer: { maxSpeed: 28.5, acceleration: 17.0, handling: 0.95, driftFactor: 0.9 },
  drift: { maxSpeed: 27.0, acceleration: 15.5, handling: 1.2, driftFactor: 1.0 },
  phantom: { maxSpeed: 31.5, acceleration: 14.5, handling: 0.9, driftFactor: 0.88 },
  titan: { maxSpeed: 25.5, acceleration: 13.5, handling: 0.75, driftFactor: 0.7 },
  viper: { maxSpeed: 36.0, acceleration: 11.5, handling: 1.05, driftFactor: 0.95 },
};

export const CAR_CLASS_IDS = [
  'speedster', 'muscle', 'racer', 'drift', 'phantom', 'titan', 'viper',
] as const satisfies readonly CarClass[];
