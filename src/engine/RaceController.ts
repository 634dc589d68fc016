/**
 * RaceController: Headless Game State Machine
 *
 * Owns the race phases: countdown, racing, paused, finished, and the
 * all-AI attract demo. Holds the current RaceState and only advances the
 * simulation in phases where cars move. No renderer or host imports; the
 * headless session and any front end drive it through step().
 */

import type { CarClass, Course, CueSink, RaceSetup, RaceState, TickFrame } from './types';
import { createRace, stepRace } from './world';
import { RACE } from './constants';

// ─────────────────────────────────────────────────────────
// Game Phase
// ─────────────────────────────────────────────────────────

export enum GamePhase {
  Countdown = 'countdown',
  Racing    = 'racing',
  Paused    = 'paused',
  Finished  = 'finished',
  Attract   = 'attract',
}

/** Ticks per countdown beat (60 = 1 second at 60Hz) */
export const COUNTDOWN_BEAT_TICKS = 60;

/** Demo field used by attract mode. */
export const ATTRACT_CLASSES: readonly CarClass[] = ['speedster', 'muscle', 'racer', 'drift'];

export interface ControllerState {
  phase: GamePhase;
  /** Ticks left before the green light. 0 outside the countdown. */
  countdownTicksLeft: number;
  race: RaceState;
}

// ─────────────────────────────────────────────────────────
// Control signals: what the caller wants to do this tick
// ─────────────────────────────────────────────────────────

export interface RaceControlSignals {
  /** Start button pressed this tick (debounced by caller) */
  togglePause: boolean;
  /** Restart request (debounced by caller) */
  restart: boolean;
  /** Quit-to-menu request from pause or results (debounced by caller) */
  quitToMenu: boolean;
  /** Any button held; ends attract mode */
  anyInput: boolean;
}

export const NO_SIGNALS: RaceControlSignals = {
  togglePause: false,
  restart: false,
  quitToMenu: false,
  anyInput: false,
};

// ─────────────────────────────────────────────────────────
// Step result: action the caller should perform
// ─────────────────────────────────────────────────────────

export enum RaceAction {
  /** No special action */
  None = 'none',
  /** The race was rebuilt on the grid this tick */
  Restarted = 'restarted',
  /** Player wants to leave the race */
  QuitToMenu = 'quit_to_menu',
  /** Input arrived during the attract demo */
  ExitAttract = 'exit_attract',
}

// ─────────────────────────────────────────────────────────
// RaceController: headless game state machine
// ─────────────────────────────────────────────────────────

export class RaceController {
  private readonly course: Course;
  private setup: RaceSetup;
  private _state: ControllerState;

  /** countdown=false starts the grid already racing; restarts still count down. */
  constructor(course: Course, setup: RaceSetup, countdown = true) {
    this.course = course;
    this.setup = setup;
    this._state = this.gridState(countdown);
  }

  get state(): Readonly<ControllerState> { return this._state; }

  get phase(): GamePhase { return this._state.phase; }

  get race(): RaceState { return this._state.race; }

  /** Whole seconds left on the countdown (4 at the start, 0 on green). */
  get countdownBeat(): number {
    return Math.floor(this._state.countdownTicksLeft / COUNTDOWN_BEAT_TICKS);
  }

  /**
   * Advance the state machine by one tick.
   * @param signals - Abstract control inputs (pause, restart, quit) from the caller
   * @param frame - Simulation inputs, consumed only when cars move this tick
   * @returns RaceAction the caller should perform
   */
  step(signals: RaceControlSignals, frame: TickFrame, cues?: CueSink): RaceAction {
    const phase = this._state.phase;

    switch (phase) {
      case GamePhase.Countdown:
        return this.tickCountdown();

      case GamePhase.Racing:
        return this.tickRacing(signals, frame, cues);

      case GamePhase.Paused:
        return this.tickPaused(signals);

      case GamePhase.Finished:
        return this.tickFinished(signals);

      case GamePhase.Attract:
        return this.tickAttract(signals, frame);

      default: {
        const _exhaustive: never = phase;
        return _exhaustive;
      }
    }
  }

  /** Rebuild the race on the grid. countdown=false goes straight to racing. */
  reset(setup: RaceSetup = this.setup, countdown = true): void {
    this.setup = setup;
    this._state = this.gridState(countdown);
  }

  /** Start the all-AI demo loop. */
  startAttract(): void {
    this._state = this.attractState();
  }

  /** Return to a state taken earlier from `state` (rollback). */
  restore(state: ControllerState): void {
    this._state = { ...state };
  }

  // ─── State builders ─────────────────────────────────────

  private gridState(countdown: boolean): ControllerState {
    const race = createRace(this.course, this.setup);
    return countdown
      ? { phase: GamePhase.Countdown, countdownTicksLeft: RACE.countdownTicks, race }
      : { phase: GamePhase.Racing, countdownTicksLeft: 0, race };
  }

  private attractState(): ControllerState {
    return {
      phase: GamePhase.Attract,
      countdownTicksLeft: 0,
      race: createRace(this.course, { carClasses: ATTRACT_CLASSES, humanCount: 0 }),
    };
  }

  // ─── Phase tick handlers ───────────────────────────────

  private tickCountdown(): RaceAction {
    const left = this._state.countdownTicksLeft - 1;
    this._state = left <= 0
      ? { ...this._state, phase: GamePhase.Racing, countdownTicksLeft: 0 }
      : { ...this._state, countdownTicksLeft: left };
    return RaceAction.None;
  }

  private tickRacing(signals: RaceControlSignals, frame: TickFrame, cues?: CueSink): RaceAction {
    // Restart request (priority over pause)
    if (signals.restart) {
      this.reset();
      return RaceAction.Restarted;
    }

    const race = stepRace(this._state.race, frame, cues);
    let phase: GamePhase = GamePhase.Racing;
    if (race.finished) {
      phase = GamePhase.Finished;
    } else if (signals.togglePause) {
      phase = GamePhase.Paused;
    }
    this._state = { ...this._state, race, phase };
    return RaceAction.None;
  }

  private tickPaused(signals: RaceControlSignals): RaceAction {
    // Quit to menu (highest priority in pause)
    if (signals.quitToMenu) {
      return RaceAction.QuitToMenu;
    }

    // Restart from pause (priority over resume)
    if (signals.restart) {
      this.reset();
      return RaceAction.Restarted;
    }

    if (signals.togglePause) {
      this._state = { ...this._state, phase: GamePhase.Racing };
    }
    return RaceAction.None;
  }

  private tickFinished(signals: RaceControlSignals): RaceAction {
    if (signals.restart) {
      this.reset();
      return RaceAction.Restarted;
    }
    if (signals.quitToMenu || signals.togglePause) {
      return RaceAction.QuitToMenu;
    }
    return RaceAction.None;
  }

  private tickAttract(signals: RaceControlSignals, frame: TickFrame): RaceAction {
    if (signals.anyInput) {
      return RaceAction.ExitAttract;
    }

    const race = stepRace(this._state.race, frame);
    if (race.cars.length > 0 && race.cars[0].lap >= RACE.attractRestartLap) {
      this.startAttract();
      return RaceAction.Restarted;
    }
    this._state = { ...this._state, race };
    return RaceAction.None;
  }
}
