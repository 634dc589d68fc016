/**
 * WebSocket Bridge Server: JSON RPC interface for external race drivers.
 *
 * Accepts JSON messages over WebSocket: reset, step, save, load, close.
 * Each connection gets its own RaceSession and snapshot store.
 * Binds to loopback only (no LAN exposure).
 */

import { WebSocketServer, WebSocket } from 'ws';
import type { RawData } from 'ws';
import { z } from 'zod';
import { RaceSession, parseControls, parseSetup } from './race-session';
import type { SessionObservation, SessionSnapshot } from './race-session';
import type { BridgeConfig } from './bridge-config';
import { DEFAULT_BRIDGE_CONFIG } from './bridge-config';

/** Saved snapshots kept per connection; the oldest is dropped past this. */
export const MAX_SNAPSHOTS = 256;

const messageSchema = z.discriminatedUnion('type', [
  z.object({
    type: z.literal('reset'),
    courseId: z.string().optional(),
    seed: z.number().int().optional(),
    setup: z.unknown().optional(),
  }),
  z.object({ type: z.literal('step'), controls: z.unknown() }),
  z.object({ type: z.literal('save') }),
  z.object({ type: z.literal('load'), id: z.string() }),
  z.object({ type: z.literal('close') }),
]);

export type BridgeMessage = z.infer<typeof messageSchema>;

export type BridgeResponse =
  | { type: 'reset_result'; observation: SessionObservation }
  | { type: 'step_result'; observation: SessionObservation }
  | { type: 'save_result'; id: string; tick: number; checksum: string }
  | { type: 'load_result'; observation: SessionObservation }
  | { type: 'close_result' }
  | { type: 'error'; message: string };

function parseMessage(text: string): BridgeMessage {
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch {
    throw new Error('Message is not valid JSON');
  }
  const result = messageSchema.safeParse(raw);
  if (!result.success) {
    const type = typeof raw === 'object' && raw !== null && 'type' in raw ? String(raw.type) : 'undefined';
    const [issue] = result.error.issues;
    throw new Error(
      issue.path[0] === 'type'
        ? `Unknown message type: ${type}`
        : `Invalid ${type} message at ${issue.path.join('.')}: ${issue.message}`,
    );
  }
  return result.data;
}

// ──────────────────────────────────────────────────────────
// BridgeConnection: per-socket dispatch, no I/O
// ──────────────────────────────────────────────────────────

export class BridgeConnection {
  private session: RaceSession | null = null;
  private readonly snapshots = new Map<string, SessionSnapshot>();
  private nextSnapshotId = 1;

  /** Handle one text frame. Never throws; failures become error responses. */
  handleMessage(text: string): BridgeResponse {
    try {
      return this.dispatch(parseMessage(text));
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      console.error('[bridge] error:', message);
      return { type: 'error', message };
    }
  }

  close(): void {
    this.session = null;
    this.snapshots.clear();
  }

  private dispatch(msg: BridgeMessage): BridgeResponse {
    switch (msg.type) {
      case 'reset': {
        // The live session and its snapshots survive a reset that fails
        const setup = parseSetup(msg.setup);
        const session = new RaceSession(msg.courseId, { seed: msg.seed });
        const observation = session.reset(setup);
        this.close();
        this.session = session;
        return { type: 'reset_result', observation };
      }
      case 'step': {
        const session = this.requireSession();
        return { type: 'step_result', observation: session.step(parseControls(msg.controls)) };
      }
      case 'save': {
        const session = this.requireSession();
        const id = `snap-${this.nextSnapshotId++}`;
        const snapshot = session.saveState();
        this.snapshots.set(id, snapshot);
        if (this.snapshots.size > MAX_SNAPSHOTS) {
          const [oldest] = this.snapshots.keys();
          this.snapshots.delete(oldest);
        }
        return { type: 'save_result', id, tick: snapshot.controller.race.tick, checksum: session.checksum() };
      }
      case 'load': {
        const session = this.requireSession();
        const snapshot = this.snapshots.get(msg.id);
        if (!snapshot) {
          throw new Error(`Unknown snapshot "${msg.id}"`);
        }
        return { type: 'load_result', observation: session.loadState(snapshot) };
      }
      case 'close': {
        this.close();
        return { type: 'close_result' };
      }
    }
  }

  private requireSession(): RaceSession {
    if (!this.session) {
      throw new Error('Call reset before step, save or load');
    }
    return this.session;
  }
}

// ──────────────────────────────────────────────────────────
// Server
// ──────────────────────────────────────────────────────────

function frameText(data: RawData): string {
  if (Array.isArray(data)) return Buffer.concat(data).toString();
  if (data instanceof ArrayBuffer) return Buffer.from(data).toString();
  return data.toString();
}

export function startBridgeServer(config: BridgeConfig = DEFAULT_BRIDGE_CONFIG) {
  const { port, host } = config;
  const wss = new WebSocketServer({
    port,
    host,
    perMessageDeflate: false,
    maxPayload: 65_536,
    clientTracking: true,
  });

  wss.on('connection', (ws, req) => {
    req.socket.setNoDelay(true);
    const connection = new BridgeConnection();

    ws.on('message', (data) => {
      ws.send(JSON.stringify(connection.handleMessage(frameText(data))));
    });

    ws.on('close', () => connection.close());
    ws.on('error', (err) => {
      console.error('[bridge] connection error:', err.message);
      connection.close();
    });
  });

  function shutdown() {
    console.log('[bridge] shutting down...');
    wss.clients.forEach((client) => {
      if (client.readyState === WebSocket.OPEN) {
        client.close(1001, 'Server shutting down');
      }
    });
    wss.close(() => {
      console.log('[bridge] closed');
      process.exit(0);
    });
    setTimeout(() => process.exit(1), 5000).unref();
  }

  process.on('SIGINT', shutdown);
  process.on('SIGTERM', shutdown);

  wss.on('listening', () => {
    console.log(`[bridge] listening on ws://${host}:${port}`);
  });

  return { wss, shutdown };
}
