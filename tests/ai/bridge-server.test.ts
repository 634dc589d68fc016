/**
 * Bridge Protocol Tests
 *
 * Exercises BridgeConnection message dispatch directly; no socket is opened.
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { BridgeConnection, MAX_SNAPSHOTS } from '../../src/ai/bridge-server';
import type { BridgeResponse } from '../../src/ai/bridge-server';
import type { SessionObservation } from '../../src/ai/race-session';

function observationOf(res: BridgeResponse): SessionObservation {
  if (res.type === 'reset_result' || res.type === 'step_result' || res.type === 'load_result') {
    return res.observation;
  }
  throw new Error(`expected an observation, got ${JSON.stringify(res)}`);
}

function savedOf(res: BridgeResponse): { id: string; tick: number; checksum: string } {
  if (res.type === 'save_result') return res;
  throw new Error(`expected save_result, got ${JSON.stringify(res)}`);
}

const STEP = JSON.stringify({ type: 'step', controls: [{ throttle: 1, steer: 0.1 }] });

describe('BridgeConnection', () => {
  let connection: BridgeConnection;

  beforeEach(() => {
    connection = new BridgeConnection();
    vi.spyOn(console, 'error').mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  function send(message: unknown): BridgeResponse {
    return connection.handleMessage(JSON.stringify(message));
  }

  // --- Protocol errors ---

  describe('errors', () => {
    it('rejects text that is not JSON and logs it', () => {
      expect(connection.handleMessage('{nope')).toEqual({ type: 'error', message: 'Message is not valid JSON' });
      expect(console.error).toHaveBeenCalledWith('[bridge] error:', 'Message is not valid JSON');
    });

    it('rejects an unknown message type', () => {
      expect(send({ type: 'fly' })).toEqual({ type: 'error', message: 'Unknown message type: fly' });
      expect(send({})).toEqual({ type: 'error', message: 'Unknown message type: undefined' });
    });

    it('requires a reset first', () => {
      expect(send({ type: 'step', controls: [] })).toEqual({
        type: 'error',
        message: 'Call reset before step, save or load',
      });
      expect(send({ type: 'save' })).toEqual({ type: 'error', message: 'Call reset before step, save or load' });
    });

    it('reports a missing field with its message type', () => {
      send({ type: 'reset' });
      expect(send({ type: 'load' })).toEqual({ type: 'error', message: 'Invalid load message at id: Required' });
    });

    it('reports bad controls', () => {
      send({ type: 'reset' });
      const res = send({ type: 'step', controls: [{ steer: 'left' }] });
      expect(res.type).toBe('error');
      expect(res.type === 'error' && res.message).toMatch(/^Invalid controls at 0\.steer: /);
    });

    it('reports an unknown course', () => {
      const res = send({ type: 'reset', courseId: 'moon-base' });
      expect(res.type === 'error' && res.message).toMatch(/^Unknown course "moon-base"/);
    });
  });

  // --- Session lifecycle ---

  describe('reset / step', () => {
    it('starts a race and steps it', () => {
      const reset = observationOf(send({ type: 'reset', courseId: 'neon-city', seed: 3 }));
      expect(reset.tick).toBe(0);
      expect(reset.cars).toHaveLength(4);

      const step = observationOf(connection.handleMessage(STEP));
      expect(step.tick).toBe(1);
      expect(step.cars[0].speed).toBeGreaterThan(0);
    });

    it('passes the setup through', () => {
      const obs = observationOf(send({ type: 'reset', setup: { carClasses: ['drift'], humanCount: 0 } }));
      expect(obs.cars[0].carClass).toBe('drift');
      expect(obs.cars[0].controller).toBe('ai');
    });

    it('forgets the session on close', () => {
      send({ type: 'reset' });
      expect(send({ type: 'close' })).toEqual({ type: 'close_result' });
      expect(connection.handleMessage(STEP).type).toBe('error');
    });
  });

  // --- Snapshots ---

  describe('save / load', () => {
    beforeEach(() => {
      send({ type: 'reset', seed: 8 });
    });

    it('numbers snapshots and restores them', () => {
      for (let i = 0; i < 10; i++) connection.handleMessage(STEP);
      const saved = savedOf(send({ type: 'save' }));
      expect(saved.id).toBe('snap-1');
      expect(saved.tick).toBe(10);

      for (let i = 0; i < 10; i++) connection.handleMessage(STEP);
      expect(savedOf(send({ type: 'save' })).id).toBe('snap-2');

      const loaded = observationOf(send({ type: 'load', id: 'snap-1' }));
      expect(loaded.tick).toBe(10);
      expect(loaded.checksum).toBe(saved.checksum);
    });

    it('replays identically after a load', () => {
      const saved = savedOf(send({ type: 'save' }));
      let ahead = '';
      for (let i = 0; i < 30; i++) ahead = observationOf(connection.handleMessage(STEP)).checksum;

      send({ type: 'load', id: saved.id });
      let replay = '';
      for (let i = 0; i < 30; i++) replay = observationOf(connection.handleMessage(STEP)).checksum;
      expect(replay).toBe(ahead);
    });

    it('rejects an unknown snapshot id', () => {
      expect(send({ type: 'load', id: 'snap-9' })).toEqual({ type: 'error', message: 'Unknown snapshot "snap-9"' });
    });

    it('drops the oldest snapshot past the cap', () => {
      for (let i = 0; i <= MAX_SNAPSHOTS; i++) send({ type: 'save' });
      expect(send({ type: 'load', id: 'snap-1' }).type).toBe('error');
      expect(send({ type: 'load', id: 'snap-2' }).type).toBe('load_result');
    });

    it('keeps the live session and snapshots when a reset names an unknown course', () => {
      for (let i = 0; i < 5; i++) connection.handleMessage(STEP);
      const saved = savedOf(send({ type: 'save' }));

      const res = send({ type: 'reset', courseId: 'moon-base' });
      expect(res.type === 'error' && res.message).toMatch(/^Unknown course "moon-base"/);

      expect(observationOf(connection.handleMessage(STEP)).tick).toBe(6);
      const loaded = observationOf(send({ type: 'load', id: saved.id }));
      expect(loaded.tick).toBe(5);
      expect(loaded.checksum).toBe(saved.checksum);
    });

    it('clears snapshots on reset', () => {
      send({ type: 'save' });
      send({ type: 'reset' });
      expect(send({ type: 'load', id: 'snap-1' }).type).toBe('error');
    });
  });
});
