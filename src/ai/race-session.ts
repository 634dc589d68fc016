/**
 * RaceSession: Headless host controller wrapping the engine.
 *
 * Adapts the race engine into a reset/step interface for external drivers
 * (bots, replay tools, netcode harnesses). Owns the seeded random source so
 * a saved snapshot plus the same control samples replays bit for bit.
 * No rendering, no audio: cues are returned as data.
 */

import { z } from 'zod';
import type { AudioCue, CarClass, Controller, Course, ControlInput, RaceSetup, Vec3 } from '../engine/types';
import type { CompileOptions } from '../engine/track';
import { RaceController, GamePhase, NO_SIGNALS } from '../engine/RaceController';
import type { ControllerState } from '../engine/RaceController';
import { RandomSource } from '../engine/rng';
import type { RandomState } from '../engine/rng';
import { checksumRace } from '../engine/checksum';
import { CAR_CLASS_IDS, DT, RACE } from '../engine/constants';
import { loadCourse, DEFAULT_COURSE_ID } from '../tracks/registry';

export interface SessionOptions {
  /** Seed for the shake draws (default 1) */
  seed?: number;
  /** Tick length in seconds (default DT) */
  dt?: number;
  /** Run the 240-tick countdown before cars move (default false) */
  countdown?: boolean;
  compile?: CompileOptions;
}

export interface CarObservation {
  slot: number;
  controller: Controller;
  carClass: CarClass;
  position: Vec3;
  heading: number;
  speed: number;
  lap: number;
  checkpoint: number;
  boostMeter: number;
  boosting: boolean;
  drifting: boolean;
  racePosition: number;
}

export interface CueEvent {
  cue: AudioCue;
  slot: number;
}

export interface SessionObservation {
  tick: number;
  raceTime: number;
  phase: GamePhase;
  finished: boolean;
  cars: CarObservation[];
  cues: CueEvent[];
  checksum: string;
}

/** Everything needed to resume a session at an earlier tick. */
export interface SessionSnapshot {
  controller: ControllerState;
  rng: RandomState;
}

// ──────────────────────────────────────────────────────────
// Input validation
// ──────────────────────────────────────────────────────────

const controlSchema = z.object({
  throttle: z.number().finite().default(0),
  brake: z.number().finite().default(0),
  steer: z.number().finite().default(0),
  boost: z.boolean().default(false),
});

export const controlsSchema = z.array(controlSchema).max(RACE.maxCars);

export const setupSchema = z.object({
  carClasses: z.array(z.enum(CAR_CLASS_IDS)).max(RACE.maxCars).default([]),
  humanCount: z.number().int().min(0).max(RACE.maxCars).default(1),
  targetLaps: z.number().int().min(1).optional(),
});

function describeIssue(error: z.ZodError, what: string): string {
  const [issue] = error.issues;
  const where = issue.path.length > 0 ? ` at ${issue.path.join('.')}` : '';
  return `${what}${where}: ${issue.message}`;
}

/** Parse per-slot control samples from an untrusted source. */
export function parseControls(raw: unknown): ControlInput[] {
  const result = controlsSchema.safeParse(raw);
  if (!result.success) {
    throw new Error(describeIssue(result.error, 'Invalid controls'));
  }
  return result.data;
}

/** Parse a race setup from an untrusted source. */
export function parseSetup(raw: unknown): RaceSetup {
  const result = setupSchema.safeParse(raw ?? {});
  if (!result.success) {
    throw new Error(describeIssue(result.error, 'Invalid setup'));
  }
  return result.data;
}

// ──────────────────────────────────────────────────────────
// RaceSession
// ──────────────────────────────────────────────────────────

export class RaceSession {
  readonly course: Course;
  readonly courseId: string;
  private readonly options: SessionOptions;
  private rng: RandomSource;
  private controller: RaceController | null = null;

  constructor(courseId = DEFAULT_COURSE_ID, options: SessionOptions = {}) {
    this.courseId = courseId;
    this.options = options;
    this.course = loadCourse(courseId, options.compile);
    this.rng = new RandomSource(options.seed ?? 1);
  }

  get started(): boolean {
    return this.controller !== null;
  }

  reset(setup: RaceSetup = { carClasses: [], humanCount: 1 }): SessionObservation {
    this.rng = new RandomSource(this.options.seed ?? 1);
    const controller = new RaceController(this.course, setup, this.options.countdown ?? false);
    this.controller = controller;
    return this.observe(controller, []);
  }

  step(controls: readonly ControlInput[]): SessionObservation {
    const controller = this.requireController('step');
    const cues: CueEvent[] = [];
    controller.step(
      NO_SIGNALS,
      { dt: this.options.dt ?? DT, controls, random: this.rng.next },
      (cue, slot) => cues.push({ cue, slot }),
    );
    return this.observe(controller, cues);
  }

  saveState(): SessionSnapshot {
    const controller = this.requireController('saveState');
    return { controller: { ...controller.state }, rng: this.rng.snapshot() };
  }

  loadState(snapshot: SessionSnapshot): SessionObservation {
    const controller = this.requireController('loadState');
    controller.restore(snapshot.controller);
    this.rng.restore(snapshot.rng);
    return this.observe(controller, []);
  }

  checksum(): string {
    return checksumRace(this.requireController('checksum').race);
  }

  private requireController(method: string): RaceController {
    if (!this.controller) {
      throw new Error(`${method}() called before reset()`);
    }
    return this.controller;
  }

  private observe(controller: RaceController, cues: CueEvent[]): SessionObservation {
    const { race } = controller;
    return {
      tick: race.tick,
      raceTime: race.raceTime,
      phase: controller.phase,
      finished: race.finished,
      cars: race.cars.map((car) => ({
        slot: car.slot,
        controller: car.controller,
        carClass: car.carClass,
        position: car.position,
        heading: car.heading,
        speed: car.forwardVelocity,
        lap: car.lap,
        checkpoint: car.lastCheckpoint,
        boostMeter: car.boostMeter,
        boosting: car.boosting,
        drifting: car.drifting,
        racePosition: car.racePosition,
      })),
      cues,
      checksum: checksumRace(race),
    };
  }
}
