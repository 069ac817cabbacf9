import type { InputEvent } from '../src/input.ts';
import type { AssignMsg, ClientRole, JoinMode, ServerMessage } from './protocol.ts';

/** Rate limits for player input. */
export interface PlayerControlOptions {
  maxInputsPerTick: number;
  maxInputsPerSecond: number;
}

/** Dependencies for player control updates. */
export interface PlayerControlDeps {
  send: (connId: number, payload: ServerMessage) => void;
  /** Millisecond clock used for the per-second window. */
  now?: () => number;
}

/** Why an input was not queued. */
export type InputRejection = 'not-player' | 'rate-limited';

/** The connection holding the player slot and its counters. */
interface PlayerSlot {
  connId: number;
  name: string | null;
  inputsThisTick: number;
  secondStartMs: number;
  inputsThisSecond: number;
}

/**
 * Single player slot plus the queue of events waiting for the next tick.
 * Every other joined connection is a spectator.
 */
export class PlayerControl {
  /** Current player, if any. */
  private slot: PlayerSlot | null = null;
  /** Events accepted since the last drain, in arrival order. */
  private queue: InputEvent[] = [];
  /** Inputs dropped by rate limiting since startup. */
  private dropped = 0;
  private options: PlayerControlOptions;
  private send: PlayerControlDeps['send'];
  private now: () => number;

  /**
   * Create a player control instance.
   * @param options - Rate limits.
   * @param deps - Message sender and clock.
   */
  constructor(options: PlayerControlOptions, deps: PlayerControlDeps) {
    this.options = options;
    this.send = deps.send;
    this.now = deps.now ?? Date.now;
  }

  /** Connection id of the current player, or null. */
  getPlayerConnId(): number | null {
    return this.slot?.connId ?? null;
  }

  /** Display name the player joined with. */
  getPlayerName(): string | null {
    return this.slot?.name ?? null;
  }

  /** Inputs dropped by rate limiting so far. */
  getDroppedInputs(): number {
    return this.dropped;
  }

  /**
   * Grant a role to a joining connection and tell it which one it got.
   * A player request falls back to spectator while another connection
   * holds the slot.
   * @param connId - Connection id.
   * @param mode - Requested mode.
   * @param name - Optional display name.
   * @returns Granted role.
   */
  join(connId: number, mode: JoinMode, name?: string): ClientRole {
    let role: ClientRole = 'spectator';
    if (mode === 'player') {
      if (!this.slot || this.slot.connId === connId) {
        this.slot = {
          connId,
          name: name?.trim() || null,
          inputsThisTick: 0,
          secondStartMs: this.now(),
          inputsThisSecond: 0
        };
        role = 'player';
      }
    } else {
      this.release(connId);
    }
    const assign: AssignMsg = { type: 'assign', role };
    this.send(connId, assign);
    return role;
  }

  /**
   * Free the player slot if this connection holds it, dropping its queued input.
   * @param connId - Connection id.
   */
  release(connId: number): void {
    if (this.slot?.connId !== connId) return;
    this.slot = null;
    this.queue = [];
  }

  /**
   * Queue an input event from a connection, enforcing the rate limits.
   * Quit is never rate limited.
   * @param connId - Sending connection.
   * @param event - Input event.
   * @returns Null when queued, otherwise why it was rejected.
   */
  handleInput(connId: number, event: InputEvent): InputRejection | null {
    const slot = this.slot;
    if (!slot || slot.connId !== connId) return 'not-player';
    if (event === 'quit') {
      this.queue.push(event);
      return null;
    }

    const now = this.now();
    if (now - slot.secondStartMs >= 1000) {
      slot.secondStartMs = now;
      slot.inputsThisSecond = 0;
    }
    if (slot.inputsThisSecond >= this.options.maxInputsPerSecond) {
      this.dropped += 1;
      return 'rate-limited';
    }
    slot.inputsThisSecond += 1;
    if (slot.inputsThisTick >= this.options.maxInputsPerTick) {
      this.dropped += 1;
      return 'rate-limited';
    }
    slot.inputsThisTick += 1;
    this.queue.push(event);
    return null;
  }

  /**
   * Take every queued event and open a new per-tick window.
   * @returns Events in arrival order.
   */
  drain(): InputEvent[] {
    const events = this.queue;
    this.queue = [];
    if (this.slot) this.slot.inputsThisTick = 0;
    return events;
  }
}
