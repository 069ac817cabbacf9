import { performance } from 'node:perf_hooks';
import { GameSession, type Phase } from '../src/session.ts';
import { FrameSerializer } from '../src/serializer.ts';
import { projectFrame } from '../src/projection.ts';
import { buildTitleSnakes } from '../src/titleScreen.ts';
import { createRng } from '../src/rng.ts';
import type { GameSettings } from '../src/config.ts';
import type { InputEvent } from '../src/input.ts';
import type { SnakeBody } from '../src/snake.ts';
import type { ServerConfig } from './config.ts';
import type { Logger } from './logger.ts';
import type { ByeReason, JoinMode, ServerMessage, StatsMsg } from './protocol.ts';
import { PlayerControl } from './playerControl.ts';

/** What the game server needs from the socket layer. */
export interface GameHub {
  broadcastFrame: (bytes: Uint8Array) => void;
  broadcastStats: (stats: StatsMsg) => void;
  sendJsonTo: (connId: number, payload: ServerMessage) => void;
  hasFrameRecipients: () => boolean;
  getClientCount: () => number;
  sayGoodbye: (reason: ByeReason) => void;
}

export interface GameServerOptions {
  /** Seed for the session RNG. */
  seed: number;
  logger?: Logger;
  /** Called once after a quit event stopped the loop. */
  onQuit?: () => void;
  /** Tuning overrides for the session. */
  settings?: Partial<GameSettings>;
  /** Millisecond clock for input rate limits. */
  now?: () => number;
}

/** Session status reported over HTTP and in stats. */
export interface GameStatus {
  tick: number;
  phase: Phase;
  score: number;
  clients: number;
}

/** Fixed-rate session loop with frame and stats broadcasting. */
export class GameServer {
  /** The single game session. */
  private session: GameSession;
  /** Socket layer used for broadcasts. */
  private hub: GameHub;
  /** Session update rate in hertz. */
  private tickRateHz: number;
  /** Frame broadcast rate in hertz. */
  private frameRateHz: number;
  /** Current tick id. */
  private tickId = 0;
  /** Timestamp of the last sent frame in ms. */
  private lastFrameSentAt = Number.NEGATIVE_INFINITY;
  /** Timestamp of the last stats message in ms. */
  private lastStatsSentAt = Number.NEGATIVE_INFINITY;
  /** Whether the main loop is running. */
  private running = false;
  /** Set once a quit event has been handled. */
  private quitHandled = false;
  /** Active timer id for scheduled ticks. */
  private timer: ReturnType<typeof setTimeout> | null = null;
  /** Target time for the next tick in ms. */
  private nextTickAt = 0;
  /** Player slot and input queue. */
  private control: PlayerControl;
  /** Title letters shown on the main menu; built once. */
  private titleSnakes: SnakeBody[];
  private logger: Logger | null;
  private onQuit: (() => void) | null;

  /**
   * Create a game server for a hub.
   * @param config - Normalized server configuration.
   * @param hub - Socket layer.
   * @param options - Seed, logger and quit hook.
   */
  constructor(config: ServerConfig, hub: GameHub, options: GameServerOptions) {
    this.hub = hub;
    this.tickRateHz = config.tickRateHz;
    this.frameRateHz = Math.min(config.frameRateHz, config.tickRateHz);
    this.logger = options.logger ?? null;
    this.onQuit = options.onQuit ?? null;
    this.session = new GameSession({
      settings: options.settings,
      rng: createRng(options.seed),
      onPhaseChange: (from, to, session) => {
        this.logger?.info('session', `${from} -> ${to} (score ${session.score})`);
      }
    });
    this.titleSnakes = buildTitleSnakes(this.session.grid);
    this.control = new PlayerControl(
      {
        maxInputsPerTick: config.maxInputsPerTick,
        maxInputsPerSecond: config.maxInputsPerSecond
      },
      {
        send: (connId, payload) => this.hub.sendJsonTo(connId, payload),
        now: options.now
      }
    );
  }

  /** Start the server tick loop. */
  start(): void {
    if (this.running || this.quitHandled) return;
    this.running = true;
    this.nextTickAt = performance.now();
    this.loop();
  }

  /** Stop the server tick loop. */
  stop(): void {
    this.running = false;
    if (this.timer) clearTimeout(this.timer);
    this.timer = null;
  }

  isRunning(): boolean {
    return this.running;
  }

  getSession(): GameSession {
    return this.session;
  }

  getStatus(): GameStatus {
    return {
      tick: this.tickId,
      phase: this.session.phase,
      score: this.session.score,
      clients: this.hub.getClientCount()
    };
  }

  /**
   * Handle a join request.
   * @param connId - Connection id.
   * @param mode - Requested mode.
   * @param name - Optional display name.
   */
  handleJoin(connId: number, mode: JoinMode, name?: string): void {
    const role = this.control.join(connId, mode, name);
    this.logger?.info('server', `conn ${connId} joined as ${role}${name ? ` (${name})` : ''}`);
  }

  /**
   * Queue an input event for the next tick.
   * @param connId - Connection id.
   * @param event - Input event.
   */
  handleInput(connId: number, event: InputEvent): void {
    const rejected = this.control.handleInput(connId, event);
    if (rejected === 'not-player') {
      this.hub.sendJsonTo(connId, { type: 'error', message: 'not the active player' });
    } else if (rejected === 'rate-limited') {
      this.logger?.debug('server', `conn ${connId} input dropped (rate limit)`);
    }
  }

  /**
   * Handle connection teardown.
   * @param connId - Connection id.
   */
  handleDisconnect(connId: number): void {
    if (this.control.getPlayerConnId() === connId) {
      const name = this.control.getPlayerName();
      this.logger?.info('server', `player conn ${connId}${name ? ` (${name})` : ''} left`);
    }
    this.control.release(connId);
  }

  /**
   * Run one tick: feed queued input to the session, then broadcast as due.
   * The loop calls this; hosts driving time themselves may call it directly.
   * @param now - Current timestamp in ms.
   */
  tick(now: number = performance.now()): void {
    if (this.quitHandled) return;
    this.tickId += 1;
    const result = this.session.update(this.control.drain());
    if (result.quit) {
      this.handleQuit();
      return;
    }

    const shouldBroadcastFrame = now - this.lastFrameSentAt >= 1000 / this.frameRateHz;
    if (shouldBroadcastFrame && this.hub.hasFrameRecipients()) {
      const frame = FrameSerializer.serialize(projectFrame(this.session, this.titleSnakes));
      this.hub.broadcastFrame(frame);
      this.lastFrameSentAt = now;
    }
    if (now - this.lastStatsSentAt >= 1000) {
      this.hub.broadcastStats(this.buildStats());
      this.lastStatsSentAt = now;
    }
  }

  /** Main timer loop for scheduling ticks. */
  private loop(): void {
    if (!this.running) return;
    const now = performance.now();
    if (now >= this.nextTickAt) {
      this.tick(now);
      this.nextTickAt += 1000 / this.tickRateHz;
    }
    if (!this.running) return;
    const delay = Math.max(0, this.nextTickAt - now);
    this.timer = setTimeout(() => this.loop(), delay);
  }

  private handleQuit(): void {
    this.quitHandled = true;
    this.logger?.info('server', `quit requested at tick ${this.tickId}`);
    this.stop();
    this.hub.sayGoodbye('quit');
    this.onQuit?.();
  }

  /**
   * Build the stats payload broadcast to clients.
   * @returns Stats message payload.
   */
  private buildStats(): StatsMsg {
    const status = this.getStatus();
    return {
      type: 'stats',
      tick: status.tick,
      phase: status.phase,
      score: status.score,
      clients: status.clients,
      droppedInputs: this.control.getDroppedInputs()
    };
  }
}
