// session.ts
// Session phases and the per-tick rules that apply in each of them.
//
//   main-menu --start--> countdown --(counter < 0)--> playing
//   playing --(self-collision)--> dying --(all bones)--> game-over
//   game-over --start--> countdown, game-over --menu--> main-menu
//
// Entering main-menu or countdown always rebuilds the snake and food.

import { resolveSettings, type GameSettings } from './config.ts';
import { Grid, isDirection, type Direction } from './grid.ts';
import { SnakeBody } from './snake.ts';
import { placeFood, type Food } from './food.ts';
import {
  acceptDirection,
  randomDirection,
  step,
  ticksPerMoveForScore,
  type PlayField,
  type StepEnv
} from './movement.ts';
import { randInt, type RandomSource } from './rng.ts';
import type { InputEvent } from './input.ts';

/** Session phases. */
export type Phase = 'main-menu' | 'countdown' | 'playing' | 'dying' | 'game-over';

/** Listener notified after every phase transition. */
export type PhaseListener = (from: Phase, to: Phase, session: GameSession) => void;

/** Construction options for a session. */
export interface SessionOptions {
  /** Overrides applied on top of the default tuning. */
  settings?: Partial<GameSettings>;
  /** RNG used for food, autopilot and tongue; defaults to Math.random. */
  rng?: RandomSource;
  /** Phase change listener. */
  onPhaseChange?: PhaseListener;
}

/** Result of one update tick. */
export interface TickResult {
  /** The host should stop its loop. */
  quit: boolean;
}

/** A single-player game session. */
export class GameSession {
  /** Tuning values in effect. */
  readonly settings: GameSettings;
  /** Board geometry. */
  readonly grid: Grid;
  /** RNG shared by every random decision in the session. */
  private readonly rng: RandomSource;
  /** Optional transition listener. */
  private readonly onPhaseChange: PhaseListener | null;
  /** Active snake, food and score. */
  private field: PlayField;
  /** Current phase. */
  private currentPhase: Phase = 'main-menu';
  /** Direction used by the next player move. */
  private currentDirection: Direction = 'up';
  /** Ticks since the last move. */
  private moveTicks = 0;
  /** Ticks between moves. */
  private moveInterval: number;
  /** Countdown value shown before play. */
  private countdownValue: number;
  /** Ticks since the last countdown decrement. */
  private countdownTicks = 0;
  /** Ticks since the last segment turned to bone. */
  private skeletonTicks = 0;
  /** Whether the head shows its tongue. */
  private tongue = false;
  /** Ticks since the last tongue toggle. */
  private tongueTicks = 0;

  constructor(options: SessionOptions = {}) {
    this.settings = resolveSettings(options.settings);
    this.grid = new Grid(this.settings.gridWidth, this.settings.gridHeight);
    this.rng = options.rng ?? Math.random;
    this.onPhaseChange = options.onPhaseChange ?? null;
    this.moveInterval = this.settings.startTicksPerMove;
    this.countdownValue = this.settings.countdownStart;
    this.field = this.freshField();
    this.enter('main-menu');
  }

  get phase(): Phase {
    return this.currentPhase;
  }

  get body(): SnakeBody {
    return this.field.body;
  }

  get food(): Food | null {
    return this.field.food;
  }

  get score(): number {
    return this.field.score;
  }

  get direction(): Direction {
    return this.currentDirection;
  }

  get ticksPerMove(): number {
    return this.moveInterval;
  }

  get countdown(): number {
    return this.countdownValue;
  }

  get tongueOut(): boolean {
    return this.tongue;
  }

  /** Number of segments already turned to bone. */
  get skeletonProgress(): number {
    return this.field.body.skeletonCount();
  }

  /**
   * Run one fixed tick.
   * @param events - Input events gathered since the previous tick, in order.
   */
  update(events: readonly InputEvent[] = []): TickResult {
    if (events.includes('quit')) return { quit: true };
    switch (this.currentPhase) {
      case 'main-menu':
        this.updateMainMenu(events);
        break;
      case 'countdown':
        this.updateCountdown();
        break;
      case 'playing':
        this.updatePlaying(events);
        break;
      case 'dying':
        this.updateDying();
        break;
      case 'game-over':
        this.updateGameOver(events);
        break;
    }
    return { quit: false };
  }

  /**
   * Jump to a phase, running its entry actions.
   * @param to - Target phase.
   */
  changePhase(to: Phase): void {
    const from = this.currentPhase;
    this.enter(to);
    this.onPhaseChange?.(from, to, this);
  }

  /** Rebuild snake, food, score and every counter. */
  reset(): void {
    this.moveInterval = this.settings.startTicksPerMove;
    this.currentDirection = 'up';
    this.countdownValue = this.settings.countdownStart;
    this.countdownTicks = 0;
    this.moveTicks = 0;
    this.skeletonTicks = 0;
    this.tongue = false;
    this.tongueTicks = 0;
    this.field = this.freshField();
  }

  private enter(to: Phase): void {
    if (to === 'main-menu') {
      this.reset();
      const grow = randInt(this.rng, this.settings.menuPreGrowMax);
      for (let i = 0; i < grow; i++) {
        this.field.body.advance(randomDirection(this.field.body.head().facing, this.rng));
      }
      this.moveInterval = this.settings.menuTicksPerMove;
    } else if (to === 'countdown') {
      this.reset();
    }
    this.currentPhase = to;
  }

  private freshField(): PlayField {
    const origin = this.grid.center();
    const body = SnakeBody.spawn(this.grid, origin.x, origin.y);
    return {
      grid: this.grid,
      body,
      food: placeFood(this.grid, body, {
        rng: this.rng,
        maxAttempts: this.settings.foodSampleAttempts
      }),
      score: 0
    };
  }

  private stepEnv(): StepEnv {
    return { rng: this.rng, foodSampleAttempts: this.settings.foodSampleAttempts };
  }

  private updateMainMenu(events: readonly InputEvent[]): void {
    if (events.includes('start')) {
      this.changePhase('countdown');
      return;
    }
    this.moveTicks++;
    if (this.moveTicks >= this.moveInterval) {
      this.moveTicks = 0;
      const d = randomDirection(this.field.body.head().facing, this.rng);
      step(this.field, d, { checkDeath: false, checkFood: false }, this.stepEnv());
    }
    this.updateTongue();
  }

  private updateCountdown(): void {
    this.countdownTicks++;
    if (this.countdownTicks >= this.settings.countdownTicksPerStep) {
      this.countdownValue--;
      this.countdownTicks = 0;
    }
    if (this.countdownValue < 0) this.changePhase('playing');
  }

  private updatePlaying(events: readonly InputEvent[]): void {
    const facing = this.field.body.head().facing;
    for (const event of events) {
      if (isDirection(event) && acceptDirection(facing, event)) {
        this.currentDirection = event;
      }
    }
    this.moveTicks++;
    if (this.moveTicks >= this.moveInterval) {
      this.moveTicks = 0;
      const outcome = step(
        this.field,
        this.currentDirection,
        { checkDeath: true, checkFood: true },
        this.stepEnv()
      );
      if (outcome === 'died') {
        this.changePhase('dying');
        return;
      }
      this.moveInterval = ticksPerMoveForScore(this.field.score, this.settings);
    }
    this.updateTongue();
  }

  private updateDying(): void {
    this.skeletonTicks++;
    if (this.skeletonTicks < this.settings.skeletonTicksPerSegment) return;
    this.skeletonTicks = 0;
    this.field.body.skeletonizeNext();
    if (this.field.body.skeletonCount() >= this.field.body.length) {
      this.changePhase('game-over');
    }
  }

  private updateGameOver(events: readonly InputEvent[]): void {
    for (const event of events) {
      if (event === 'start') {
        this.changePhase('countdown');
        return;
      }
      if (event === 'menu') {
        this.changePhase('main-menu');
        return;
      }
    }
  }

  private updateTongue(): void {
    this.tongueTicks++;
    if (this.tongueTicks < this.settings.tongueTicks) return;
    if (this.tongue) {
      this.tongue = false;
    } else if (this.rng() < this.settings.tongueShowChance) {
      this.tongue = true;
    }
    this.tongueTicks = 0;
  }
}
