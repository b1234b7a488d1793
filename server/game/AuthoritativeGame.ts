/**
 * AuthoritativeGame - Headless server-side match simulation.
 *
 * Owns one SimWorld and runs its fixed-rate tick loop.
 * No rendering, DOM, or audio dependencies.
 *
 * Tick order:
 *   1. apply buffered commands
 *   2. unit state machines
 *   3. capture + victory
 *   4. visibility
 *   5. drain domain events to the session
 *   6. every `broadcastEvery` ticks, ask the session to send snapshots
 *
 * Nothing inside a tick awaits; network callbacks only enqueue.
 */

import { SimWorld } from '@shared/simulation/SimWorld';
import type { SimUnit } from '@shared/simulation/SimUnit';
import type { SimEvent } from '@shared/simulation/SimEventQueue';
import type { GameCommand, CommandSource } from '@shared/multiplayer/CommandProtocol';
import type { StateSnapshot } from '@shared/multiplayer/SnapshotProtocol';
import type { ArchetypeData, GameModeData, MapLayout, SimConfig, TeamId } from '@shared/data/types';
import { CommandPipeline, type CommandOutcome } from './CommandPipeline';
import { SnapshotBuilder, type Observer, type SnapshotBuilderOptions } from './SnapshotBuilder';
import type { Logger } from '../logger';

/** Session callbacks invoked from inside the tick */
export interface GameHooks {
  /** Domain events drained this tick, in emission order */
  onEvents(events: readonly SimEvent[], tick: number): void;
  /** Snapshot interval reached */
  onBroadcast(tick: number): void;
  /** Results of this tick's command application */
  onCommandOutcomes?(outcomes: readonly CommandOutcome[]): void;
  /** A tick threw; the match cannot continue */
  onTickError(err: unknown): void;
}

export interface MatchPlayer {
  playerId: string;
  team: TeamId;
}

export interface AuthoritativeGameConfig {
  layout: MapLayout;
  mode: GameModeData;
  archetypes: ReadonlyMap<string, ArchetypeData>;
  simConfig: SimConfig;
  tickRate: number;
  broadcastEvery: number;
  snapshot?: Partial<SnapshotBuilderOptions>;
  hooks: GameHooks;
  log: Logger;
}

export class AuthoritativeGame {
  readonly world: SimWorld;
  readonly pipeline: CommandPipeline;
  private readonly snapshots: SnapshotBuilder;
  private readonly config: AuthoritativeGameConfig;
  private readonly log: Logger;
  private readonly tickDt: number;
  private tickInterval: ReturnType<typeof setInterval> | null = null;
  private stopped = false;

  constructor(config: AuthoritativeGameConfig) {
    this.config = config;
    this.log = config.log;
    this.tickDt = 1 / config.tickRate;
    this.world = new SimWorld({
      layout: config.layout,
      config: config.simConfig,
      victoryConditions: config.mode.victoryConditions,
      onViolation: message => this.log.error({ tick: this.world.tick }, message),
    });
    this.pipeline = new CommandPipeline(this.log);
    this.snapshots = new SnapshotBuilder(config.snapshot);
  }

  /** Reset the world, spawn every player's squad and compute initial vision */
  initialize(players: readonly MatchPlayer[]): void {
    this.world.reset();
    for (const player of players) {
      for (const entry of this.config.mode.squad) {
        const archetype = this.config.archetypes.get(entry.archetype);
        if (!archetype) {
          this.log.warn({ archetype: entry.archetype }, 'Unknown archetype in squad, skipped');
          continue;
        }
        for (let i = 0; i < entry.count; i++) {
          this.world.spawnUnit(player.team, player.playerId, archetype);
        }
      }
    }
    this.world.start();

    this.log.info(
      { map: this.config.layout.id, mode: this.config.mode.id, units: this.world.store.unitCount },
      'Match initialized',
    );
  }

  /** Start the fixed-rate tick loop */
  start(): void {
    if (this.tickInterval || this.stopped) return;

    this.tickInterval = setInterval(() => {
      try {
        this.processTick();
      } catch (err) {
        this.log.error({ err, tick: this.world.tick }, 'Tick failed');
        this.config.hooks.onTickError(err);
      }
    }, 1000 / this.config.tickRate);

    this.log.info({ tickRate: this.config.tickRate }, 'Tick loop started');
  }

  /** Stop the tick loop and drop all match state */
  stop(): void {
    if (this.tickInterval) {
      clearInterval(this.tickInterval);
      this.tickInterval = null;
    }
    if (this.stopped) return;
    this.stopped = true;
    this.log.info({ tick: this.world.tick }, 'Tick loop stopped');
    this.pipeline.clear();
    this.snapshots.clear();
    this.world.clear();
  }

  get isRunning(): boolean {
    return this.tickInterval !== null;
  }

  get isStopped(): boolean {
    return this.stopped;
  }

  getTick(): number {
    return this.world.tick;
  }

  /** Buffer a validated command for the next tick */
  receiveCommand(playerId: string, command: GameCommand, source: CommandSource = 'manual'): void {
    if (this.stopped) return;
    this.pipeline.enqueue(playerId, command, source, this.world.tick);
  }

  // ─── Tick Processing ──────────────────────────────────────────

  processTick(): void {
    if (this.stopped) return;

    const outcomes = this.pipeline.applyPending(this.world);
    this.world.step(this.tickDt);

    const events = this.world.events.drain();
    if (outcomes.length > 0) this.config.hooks.onCommandOutcomes?.(outcomes);
    if (events.length > 0) this.config.hooks.onEvents(events, this.world.tick);

    // The session may have ended the match while handling events
    if (this.stopped) return;

    if (this.world.tick % this.config.broadcastEvery === 0) {
      this.config.hooks.onBroadcast(this.world.tick);
    }
  }

  // ─── Snapshots ────────────────────────────────────────────────

  buildSnapshot(observer: Observer, pending: ReadonlyMap<string, string>, serverTime = Date.now()): StateSnapshot {
    return this.snapshots.build(this.world, observer, pending, serverTime);
  }

  getLastSnapshot(playerId: string): StateSnapshot | null {
    return this.snapshots.getLastSnapshot(playerId);
  }

  /** The observer's latest view, or a fresh one when nothing was sent yet */
  getObserverView(observer: Observer): StateSnapshot {
    return this.snapshots.getLastSnapshot(observer.playerId)
      ?? new SnapshotBuilder().build(this.world, observer, new Map(), Date.now());
  }

  forgetObserver(playerId: string): void {
    this.snapshots.forget(playerId);
  }

  getUnitsOwnedBy(playerId: string): SimUnit[] {
    return this.world.store.getUnitsOwnedBy(playerId);
  }
}
