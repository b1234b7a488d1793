/**
 * SnapshotBuilder - Per-observer filtered views of the world.
 *
 * Own-team units go out in full, enemy units in reduced form and only
 * while visible to the observer's team. Control points are always sent.
 * The vision grid is attached when it drifted far enough from the copy
 * the observer last received, and as a keyframe every so many snapshots
 * so a dropped snapshot cannot leave the observer's fog stale for long.
 */

import type { SimWorld } from '@shared/simulation/SimWorld';
import type { SimUnit } from '@shared/simulation/SimUnit';
import type { ControlPoint } from '@shared/simulation/ControlPoint';
import { countChangedCells } from '@shared/simulation/SimVisionManager';
import { compareEntityId } from '@shared/utils/idSort';
import type { TeamId } from '@shared/data/types';
import { encodeVisionGrid } from '@shared/multiplayer/SnapshotProtocol';
import type {
  ControlPointSnapshot,
  FullUnitSnapshot,
  ReducedUnitSnapshot,
  StateSnapshot,
  UnitSnapshot,
  VisionLayer,
} from '@shared/multiplayer/SnapshotProtocol';

export interface SnapshotBuilderOptions {
  /** Minimum changed cells before a grid is resent */
  gridChangeThreshold: number;
  /** Force a full grid at least every this many snapshots */
  gridKeyframeInterval: number;
}

export const DEFAULT_SNAPSHOT_OPTIONS: SnapshotBuilderOptions = {
  gridChangeThreshold: 8,
  gridKeyframeInterval: 20,
};

export interface Observer {
  playerId: string;
  team: TeamId;
}

/** What the builder remembers about one observer between snapshots */
interface ObserverSyncState {
  lastGrid: Uint8Array | null;
  snapshotsSinceGrid: number;
  /** Unit ids last reported with a pending AI annotation */
  reportedPending: Set<string>;
  lastSnapshot: StateSnapshot | null;
}

export class SnapshotBuilder {
  private readonly options: SnapshotBuilderOptions;
  private readonly observers: Map<string, ObserverSyncState> = new Map();

  constructor(options: Partial<SnapshotBuilderOptions> = {}) {
    this.options = { ...DEFAULT_SNAPSHOT_OPTIONS, ...options };
  }

  /**
   * Build the snapshot for one observer.
   * @param pending Unit id → intent text for in-flight AI translations
   */
  build(
    world: SimWorld,
    observer: Observer,
    pending: ReadonlyMap<string, string>,
    serverTime: number,
  ): StateSnapshot {
    const state = this.getState(observer.playerId);

    const units: UnitSnapshot[] = [];
    const sorted = world.store.getUnits().sort((a, b) => compareEntityId(a.id, b.id));
    for (const unit of sorted) {
      if (unit.team === observer.team) {
        units.push(this.fullUnit(unit, observer, pending, state));
      } else if (unit.isAlive && world.isUnitVisibleTo(observer.team, unit)) {
        units.push(reducedUnit(unit));
      }
    }

    // Annotations that settled for units no longer in the snapshot are simply forgotten
    for (const id of state.reportedPending) {
      if (!world.store.hasUnit(id)) state.reportedPending.delete(id);
    }

    const snapshot: StateSnapshot = {
      tick: world.tick,
      serverTime,
      team: observer.team,
      units,
      controlPoints: world.store.getControlPoints().map(controlPointSnapshot),
      vision: this.visionLayer(world, observer.team, state),
    };

    state.lastSnapshot = snapshot;
    return snapshot;
  }

  /** Latest snapshot built for a player, used to summarise their view */
  getLastSnapshot(playerId: string): StateSnapshot | null {
    return this.observers.get(playerId)?.lastSnapshot ?? null;
  }

  forget(playerId: string): void {
    this.observers.delete(playerId);
  }

  clear(): void {
    this.observers.clear();
  }

  private getState(playerId: string): ObserverSyncState {
    let state = this.observers.get(playerId);
    if (!state) {
      state = { lastGrid: null, snapshotsSinceGrid: 0, reportedPending: new Set(), lastSnapshot: null };
      this.observers.set(playerId, state);
    }
    return state;
  }

  private fullUnit(
    unit: SimUnit,
    observer: Observer,
    pending: ReadonlyMap<string, string>,
    state: ObserverSyncState,
  ): FullUnitSnapshot {
    const ability = unit.archetype.ability;
    const snapshot: FullUnitSnapshot = {
      detail: 'full',
      id: unit.id,
      team: unit.team,
      ownerId: unit.ownerId,
      archetype: unit.archetype.id,
      x: unit.simPosition.x,
      z: unit.simPosition.z,
      rotation: unit.simRotationY,
      vx: unit.velocity.x,
      vz: unit.velocity.z,
      health: unit.health,
      maxHealth: unit.maxHealth,
      state: unit.state,
      targetId: unit.targetId,
      attackCooldown: unit.attackCooldownRemaining,
      ability: ability
        ? { id: ability.id, cooldown: unit.abilityCooldownRemaining, charge: unit.chargeRemaining }
        : null,
      invulnerable: unit.isInvulnerable,
      stealthed: unit.isStealthed,
      respawnRemaining: unit.respawnRemaining,
    };

    if (unit.ownerId === observer.playerId) {
      const text = pending.get(unit.id);
      if (text !== undefined) {
        snapshot.pendingCommand = text;
        state.reportedPending.add(unit.id);
      } else if (state.reportedPending.delete(unit.id)) {
        snapshot.pendingCommand = null;
      }
    }

    return snapshot;
  }

  private visionLayer(world: SimWorld, team: TeamId, state: ObserverSyncState): VisionLayer | undefined {
    const grid = world.vision.getGrid(team);
    state.snapshotsSinceGrid++;

    let keyframe = false;
    if (!state.lastGrid || state.snapshotsSinceGrid >= this.options.gridKeyframeInterval) {
      keyframe = true;
    } else if (countChangedCells(grid, state.lastGrid) < this.options.gridChangeThreshold) {
      return undefined;
    }

    state.lastGrid = grid.slice();
    state.snapshotsSinceGrid = 0;
    return {
      cols: world.vision.cols,
      rows: world.vision.rows,
      cellSize: world.vision.cellSize,
      version: world.vision.getVersion(team),
      data: encodeVisionGrid(grid),
      keyframe,
    };
  }
}

function reducedUnit(unit: SimUnit): ReducedUnitSnapshot {
  return {
    detail: 'reduced',
    id: unit.id,
    team: unit.team,
    archetype: unit.archetype.id,
    x: unit.simPosition.x,
    z: unit.simPosition.z,
    rotation: unit.simRotationY,
    health: unit.health,
    maxHealth: unit.maxHealth,
    state: unit.state,
  };
}

function controlPointSnapshot(point: ControlPoint): ControlPointSnapshot {
  return {
    id: point.id,
    x: point.x,
    z: point.z,
    radius: point.radius,
    value: point.value,
    captureValue: point.captureValue,
    controller: point.controller,
    status: point.status,
  };
}
