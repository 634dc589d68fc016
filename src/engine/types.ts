/**
 * Engine Type Contracts
 *
 * All interfaces used by the simulation engine. Course, car, camera and race
 * state are immutable snapshots: every tick produces new objects, so a saved
 * reference to an old RaceState is a complete rollback point.
 */

import type { TurnAngle, Elevation, Banking, SegmentStyle } from './segments';

/** World-space point. y is height; the ground plane is x/z. */
export interface Vec3 {
  readonly x: number;
  readonly y: number;
  readonly z: number;
}

/** Ground-plane vector (x/z only). */
export interface PlanarVec {
  readonly x: number;
  readonly z: number;
}

// ──────────────────────────────────────────────────────────
// Course
// ──────────────────────────────────────────────────────────

/** One authored piece of a course, before compilation. */
export interface SegmentDescriptor {
  turn: TurnAngle;
  elevation: Elevation;
  banking: Banking;
  style: SegmentStyle;
}

/** A compiled segment with absolute placement. Index order is traversal order. */
export interface TrackSegment {
  /** Segment start in world space */
  position: Vec3;
  /** Heading in degrees, [0, 360). 0 = +z, 90 = +x. */
  heading: number;
  turn: TurnAngle;
  elevation: Elevation;
  banking: Banking;
  style: SegmentStyle;
  /** Full corridor width */
  width: number;
  /** Base length x turn multiplier */
  length: number;
  /** Lap distance at the segment start */
  start: number;
}

/** AI navigation target at a segment midpoint. */
export type Waypoint = Vec3;

/** Evenly spaced progress marker along the lap. */
export interface Checkpoint {
  /** Lap distance from the start line */
  distance: number;
  /** World position at that lap distance */
  position: Vec3;
}

/**
 * Compiled course. Built once per race, never mutated; every system reads it.
 * segments and waypoints never exceed their fixed capacities.
 */
export interface Course {
  segments: readonly TrackSegment[];
  waypoints: readonly Waypoint[];
  checkpoints: readonly Checkpoint[];
  totalLength: number;
}

// ──────────────────────────────────────────────────────────
// Cars
// ──────────────────────────────────────────────────────────

export type CarClass =
  | 'speedster'
  | 'muscle'
  | 'racer'
  | 'drift'
  | 'phantom'
  | 'titan'
  | 'viper';

/** Per-class handling, copied onto the car at race start. */
export interface CarStats {
  maxSpeed: number;
  acceleration: number;
  handling: number;
  driftFactor: number;
}

export type Controller = 'human' | 'ai';

/** One control sample, from a pad or from the navigator. */
export interface ControlInput {
  /** 0 (none) to 1 (full) */
  throttle: number;
  /** 0 (none) to 1 (full) */
  brake: number;
  /** -1 (full left) to +1 (full right) */
  steer: number;
  /** Boost button pressed this tick */
  boost: boolean;
}

/** Complete car state at one tick. */
export interface CarState {
  slot: number;
  controller: Controller;
  carClass: CarClass;
  stats: CarStats;

  position: Vec3;
  /** Degrees, [0, 360) */
  heading: number;
  forwardVelocity: number;
  lateralVelocity: number;
  /** Degrees per second */
  angularVelocity: number;

  /** 0 to 1 */
  boostMeter: number;
  boosting: boolean;
  /** Ticks left in the boost window */
  boostTicks: number;
  drifting: boolean;

  /** Completed laps */
  lap: number;
  lastCheckpoint: number;
  /** Wraps to checkpoint 0; matches lap for human cars, ranks every car */
  checkpointLaps: number;
  /** Navigator target index */
  waypoint: number;
  /** 1..N, 1 = leading */
  racePosition: number;

  /** Pending correction from wall hits, halved each tick */
  pushback: PlanarVec;
  /** Segment used by the last collision pass (-1 before any) */
  segmentIndex: number;
  /** Track-relative longitudinal coordinate from the last collision pass */
  lapDistance: number;
}

// ──────────────────────────────────────────────────────────
// Camera (render sink)
// ──────────────────────────────────────────────────────────

export interface CameraState {
  position: Vec3;
  target: Vec3;
  shakeIntensity: number;
  shakeOffsetX: number;
  shakeOffsetY: number;
}

// ──────────────────────────────────────────────────────────
// Race
// ──────────────────────────────────────────────────────────

export type AudioCue = 'boost' | 'drift' | 'collision' | 'checkpoint' | 'finish';

/** Fire-and-forget notification for the audio layer. */
export type CueSink = (cue: AudioCue, slot: number) => void;

/** Host-supplied inputs for one tick. */
export interface TickFrame {
  /** Seconds; must be identical on every resimulating instance */
  dt: number;
  /** One sample per car slot; AI slots ignore theirs */
  controls: readonly ControlInput[];
  /** Deterministic unsigned 32-bit draw */
  random: () => number;
}

export interface RaceSetup {
  /** One class per slot */
  carClasses: readonly CarClass[];
  /** Slots 0..humanCount-1 are human; the rest are AI */
  humanCount: number;
  targetLaps?: number;
}

/** Full simulation state at one tick. */
export interface RaceState {
  tick: number;
  /** Seconds of simulated racing */
  raceTime: number;
  /** Same object every tick */
  course: Course;
  cars: readonly CarState[];
  cameras: readonly CameraState[];
  humanCount: number;
  targetLaps: number;
  finished: boolean;
}
