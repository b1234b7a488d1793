/**
 * SimWorld - One match's simulation.
 *
 * Owns the entity store, navigation grid, visibility grids, capture engine,
 * victory evaluator and event queue, and implements SimContext for the
 * units living in it. `step()` advances everything by one fixed tick in
 * a fixed order: units, capture and victory, then visibility. Events are
 * left queued for the owner to drain.
 */

import * as THREE from 'three';
import type { ArchetypeData, MapLayout, SimConfig, TeamId, VictoryConditionDef } from '../data/types';
import type { SimContext } from '../core/SimContext';
import { EntityStore } from './EntityStore';
import { NavGrid } from './NavGrid';
import { SimCaptureManager } from './SimCaptureManager';
import { SimEventQueue, type SimEvent } from './SimEventQueue';
import { SimVisionManager } from './SimVisionManager';
import type { SimUnit } from './SimUnit';
import { VictoryEvaluator, type VictoryResult } from './VictoryConditions';

export interface SimWorldOptions {
  layout: MapLayout;
  config: SimConfig;
  victoryConditions: VictoryConditionDef[];
  /** Receives clamped consistency violations (non-strict mode) */
  onViolation?: (message: string) => void;
}

export class SimWorld implements SimContext {
  readonly config: SimConfig;
  readonly layout: MapLayout;
  readonly store = new EntityStore();
  readonly events = new SimEventQueue();
  readonly nav: NavGrid;
  readonly vision: SimVisionManager;
  readonly capture: SimCaptureManager;

  private readonly victory: VictoryEvaluator;
  private readonly onViolation: (message: string) => void;
  private victoryPollTimer = 0;
  private _result: VictoryResult | null = null;
  private _tick = 0;

  constructor(options: SimWorldOptions) {
    this.config = options.config;
    this.layout = options.layout;
    this.onViolation = options.onViolation ?? (() => {});
    this.nav = NavGrid.fromLayout(options.layout);
    this.vision = new SimVisionManager(this.store, this.config, options.layout.width, options.layout.height);
    this.capture = new SimCaptureManager(this.store, this.events, this.config, msg => this.onViolation(msg));
    this.victory = VictoryEvaluator.fromDefs(options.victoryConditions);

    for (const def of options.layout.controlPoints) {
      this.store.addControlPoint(def, this.config.captureRadius);
    }
  }

  get tick(): number { return this._tick; }
  get result(): VictoryResult | null { return this._result; }

  // ─── Setup ───────────────────────────────────────────────────

  spawnUnit(team: TeamId, ownerId: string, archetype: ArchetypeData, position?: THREE.Vector3): SimUnit {
    if (position) {
      return this.store.spawnUnit({ team, ownerId, archetype, position }, this);
    }
    const spawnIndex = this.store.getTeamUnits(team).length;
    return this.store.spawnUnit(
      { team, ownerId, archetype, position: this.getSpawnPoint(team, spawnIndex), spawnIndex },
      this,
    );
  }

  /** Compute initial vision so the first tick's acquisition has something to see */
  start(): void {
    this.vision.update();
  }

  // ─── Tick ────────────────────────────────────────────────────

  step(dt: number): void {
    this._tick++;

    for (const unit of this.store.getUnits()) {
      // Dead lasts one tick; without respawn the unit then leaves the store
      if (unit.deathSettled && !this.config.respawnEnabled) {
        this.store.removeUnit(unit.id);
        continue;
      }
      unit.fixedUpdate(dt);
    }

    const captureChanged = this.capture.update(dt);
    this.evaluateVictory(dt, captureChanged);

    this.vision.update();
  }

  private evaluateVictory(dt: number, captureChanged: boolean): void {
    if (this._result) return;

    let due = captureChanged;
    if (this.config.victoryPollInterval > 0) {
      this.victoryPollTimer += dt;
      if (this.victoryPollTimer >= this.config.victoryPollInterval) {
        this.victoryPollTimer = 0;
        due = true;
      }
    }
    if (!due) return;

    const result = this.victory.evaluate(this.store.getControlPoints());
    if (result) {
      this._result = result;
      this.events.push({ type: 'victory', winner: result.winner, condition: result.condition });
    }
  }

  /** Back to the start of a match on the same map: no units, every point neutral */
  reset(): void {
    for (const unit of this.store.getUnits()) {
      this.store.removeUnit(unit.id);
    }
    this.store.resetControlPoints();
    this.events.clear();
    this.vision.reset();
    this._result = null;
    this.victoryPollTimer = 0;
    this._tick = 0;
  }

  /** Match end: drop every entity and pending event */
  clear(): void {
    this.store.clear();
    this.events.clear();
    this.vision.reset();
    this._result = null;
    this.victoryPollTimer = 0;
    this._tick = 0;
  }

  // ─── SimContext ──────────────────────────────────────────────

  emit(event: SimEvent): void {
    this.events.push(event);
  }

  reportViolation(message: string): void {
    this.onViolation(message);
  }

  getUnit(id: string): SimUnit | undefined {
    return this.store.getUnit(id);
  }

  getUnitsInRadius(position: THREE.Vector3, radius: number, team?: TeamId): SimUnit[] {
    const radiusSq = radius * radius;
    return this.store.getLiveUnits(team).filter(unit => {
      const dx = unit.simPosition.x - position.x;
      const dz = unit.simPosition.z - position.z;
      return dx * dx + dz * dz <= radiusSq;
    });
  }

  isUnitVisibleTo(team: TeamId, unit: SimUnit): boolean {
    return this.vision.isUnitVisibleTo(team, unit);
  }

  findPath(from: THREE.Vector3, to: THREE.Vector3): THREE.Vector3[] | null {
    return this.nav.findPath(from, to);
  }

  navCellOf(position: THREE.Vector3): number {
    return this.nav.cellIndexAt(position.x, position.z);
  }

  getSpawnPoint(team: TeamId, spawnIndex: number): THREE.Vector3 {
    const points = this.layout.spawnPoints[team];
    const point = points[spawnIndex % Math.max(1, points.length)];
    if (!point) {
      // Layout without spawn points: team A starts on the near edge, B on the far one
      const z = team === 'A' ? this.layout.height * 0.1 : this.layout.height * 0.9;
      return new THREE.Vector3(this.layout.width / 2, 0, z);
    }
    return new THREE.Vector3(point.x, 0, point.z);
  }
}
