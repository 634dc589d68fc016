/**
 * RaceController Tests
 *
 * Phase transitions of the headless state machine: countdown, racing,
 * pause, restart, finish and the attract demo loop.
 */

import { describe, it, expect } from 'vitest';
import {
  RaceController,
  GamePhase,
  RaceAction,
  NO_SIGNALS,
  ATTRACT_CLASSES,
} from '../../src/engine/RaceController';
import type { RaceControlSignals } from '../../src/engine/RaceController';
import { compileCourse } from '../../src/engine/track';
import { RandomSource } from '../../src/engine/rng';
import { DT } from '../../src/engine/constants';
import type { RaceSetup, SegmentDescriptor, TickFrame } from '../../src/engine/types';

// ──────────────────────────────────────────────────────────
// Helpers
// ──────────────────────────────────────────────────────────

const straight: SegmentDescriptor = { turn: 'Straight', elevation: 'Flat', banking: 'Flat', style: 'Open' };
const LINE = compileCourse(Array.from({ length: 8 }, () => straight), { debug: false });
const SETUP: RaceSetup = { carClasses: [], humanCount: 1 };

const source = new RandomSource(1);
const FRAME: TickFrame = { dt: DT, controls: [], random: source.next };

function signals(overrides: Partial<RaceControlSignals>): RaceControlSignals {
  return { ...NO_SIGNALS, ...overrides };
}

function racing(setup: RaceSetup = SETUP): RaceController {
  return new RaceController(LINE, setup, false);
}

// ──────────────────────────────────────────────────────────
// Countdown
// ──────────────────────────────────────────────────────────
describe('countdown', () => {
  it('starts on the grid with four seconds to go', () => {
    const controller = new RaceController(LINE, SETUP);
    expect(controller.phase).toBe(GamePhase.Countdown);
    expect(controller.state.countdownTicksLeft).toBe(240);
    expect(controller.countdownBeat).toBe(4);
  });

  it('goes green after 240 ticks without moving the cars', () => {
    const controller = new RaceController(LINE, SETUP);
    for (let i = 0; i < 239; i++) {
      controller.step(NO_SIGNALS, FRAME);
    }
    expect(controller.phase).toBe(GamePhase.Countdown);
    expect(controller.countdownBeat).toBe(0);

    controller.step(NO_SIGNALS, FRAME);
    expect(controller.phase).toBe(GamePhase.Racing);
    expect(controller.race.tick).toBe(0);
  });

  it('starts already racing when built without a countdown', () => {
    const controller = new RaceController(LINE, SETUP, false);
    expect(controller.phase).toBe(GamePhase.Racing);
    expect(controller.state.countdownTicksLeft).toBe(0);
    expect(controller.race.tick).toBe(0);
    expect(controller.step(NO_SIGNALS, FRAME)).toBe(RaceAction.None);
    expect(controller.race.tick).toBe(1);
  });

  it('counts down again on a restart after starting without one', () => {
    const controller = new RaceController(LINE, SETUP, false);
    controller.step(signals({ restart: true }), FRAME);
    expect(controller.phase).toBe(GamePhase.Countdown);
    expect(controller.state.countdownTicksLeft).toBe(240);
  });

  it('ignores pause during the countdown', () => {
    const controller = new RaceController(LINE, SETUP);
    controller.step(signals({ togglePause: true }), FRAME);
    expect(controller.phase).toBe(GamePhase.Countdown);
  });
});

// ──────────────────────────────────────────────────────────
// Racing and pause
// ──────────────────────────────────────────────────────────
describe('racing', () => {
  it('steps the race each tick', () => {
    const controller = racing();
    expect(controller.step(NO_SIGNALS, FRAME)).toBe(RaceAction.None);
    controller.step(NO_SIGNALS, FRAME);
    expect(controller.race.tick).toBe(2);
  });

  it('forwards cues from the race step', () => {
    const controller = racing();
    const heard: string[] = [];
    controller.step(NO_SIGNALS, { ...FRAME, controls: [{ throttle: 1, brake: 0, steer: 0, boost: true }] }, (cue) =>
      heard.push(cue),
    );
    expect(heard).toContain('boost');
  });

  it('freezes the race while paused and resumes on toggle', () => {
    const controller = racing();
    controller.step(signals({ togglePause: true }), FRAME);
    expect(controller.phase).toBe(GamePhase.Paused);
    expect(controller.race.tick).toBe(1);

    controller.step(NO_SIGNALS, FRAME);
    controller.step(NO_SIGNALS, FRAME);
    expect(controller.race.tick).toBe(1);

    controller.step(signals({ togglePause: true }), FRAME);
    expect(controller.phase).toBe(GamePhase.Racing);
    controller.step(NO_SIGNALS, FRAME);
    expect(controller.race.tick).toBe(2);
  });

  it('restarts to the countdown', () => {
    const controller = racing();
    controller.step(NO_SIGNALS, FRAME);
    expect(controller.step(signals({ restart: true, togglePause: true }), FRAME)).toBe(RaceAction.Restarted);
    expect(controller.phase).toBe(GamePhase.Countdown);
    expect(controller.race.tick).toBe(0);
  });

  it('quits from pause before considering restart', () => {
    const controller = racing();
    controller.step(signals({ togglePause: true }), FRAME);
    expect(controller.step(signals({ quitToMenu: true, restart: true }), FRAME)).toBe(RaceAction.QuitToMenu);
    expect(controller.phase).toBe(GamePhase.Paused);
  });

  it('restarts from pause', () => {
    const controller = racing();
    controller.step(signals({ togglePause: true }), FRAME);
    expect(controller.step(signals({ restart: true }), FRAME)).toBe(RaceAction.Restarted);
    expect(controller.phase).toBe(GamePhase.Countdown);
  });
});

// ──────────────────────────────────────────────────────────
// Finish
// ──────────────────────────────────────────────────────────
describe('finish', () => {
  function finished(): RaceController {
    const controller = racing({ ...SETUP, targetLaps: 1 });
    const { race } = controller;
    controller.restore({
      ...controller.state,
      race: { ...race, cars: race.cars.map((car) => (car.slot === 0 ? { ...car, lap: 1 } : car)) },
    });
    controller.step(NO_SIGNALS, FRAME);
    return controller;
  }

  it('enters the results phase when the lap target is reached', () => {
    const controller = finished();
    expect(controller.phase).toBe(GamePhase.Finished);
    expect(controller.race.finished).toBe(true);
  });

  it('holds results until the player acts', () => {
    const controller = finished();
    const tick = controller.race.tick;
    expect(controller.step(NO_SIGNALS, FRAME)).toBe(RaceAction.None);
    expect(controller.race.tick).toBe(tick);
    expect(controller.step(signals({ togglePause: true }), FRAME)).toBe(RaceAction.QuitToMenu);
  });

  it('restarts from results', () => {
    const controller = finished();
    expect(controller.step(signals({ restart: true }), FRAME)).toBe(RaceAction.Restarted);
    expect(controller.phase).toBe(GamePhase.Countdown);
    expect(controller.race.finished).toBe(false);
  });
});

// ──────────────────────────────────────────────────────────
// Attract
// ──────────────────────────────────────────────────────────
describe('attract', () => {
  it('runs an all-AI field', () => {
    const controller = new RaceController(LINE, SETUP);
    controller.startAttract();
    expect(controller.phase).toBe(GamePhase.Attract);
    expect(controller.race.humanCount).toBe(0);
    expect(controller.race.cars.map((c) => c.carClass)).toEqual([...ATTRACT_CLASSES]);

    expect(controller.step(NO_SIGNALS, FRAME)).toBe(RaceAction.None);
    expect(controller.race.tick).toBe(1);
  });

  it('hands control back on any input', () => {
    const controller = new RaceController(LINE, SETUP);
    controller.startAttract();
    expect(controller.step(signals({ anyInput: true }), FRAME)).toBe(RaceAction.ExitAttract);
    expect(controller.race.tick).toBe(0);
  });

  it('loops once the lead demo car reaches lap 2', () => {
    const controller = new RaceController(LINE, SETUP);
    controller.startAttract();
    const { race } = controller;
    controller.restore({
      ...controller.state,
      race: { ...race, tick: 50, cars: race.cars.map((car) => (car.slot === 0 ? { ...car, lap: 2 } : car)) },
    });
    expect(controller.step(NO_SIGNALS, FRAME)).toBe(RaceAction.Restarted);
    expect(controller.phase).toBe(GamePhase.Attract);
    expect(controller.race.tick).toBe(0);
  });
});
