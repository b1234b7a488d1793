/**
 * ShadowWorld - Observer-side copy of the host's world.
 *
 * Snapshots arrive on the unreliable channel, so each one is a complete
 * replacement of what this observer can see: units missing from it are
 * gone (dead or out of view). Rendered positions blend from wherever the
 * unit was drawn toward the new authoritative value over one broadcast
 * interval.
 *
 * Reliable events are applied strictly in sequence order; an envelope
 * that arrives early is held until the gap before it is filled.
 */

import { decodeVisionGrid } from '@shared/multiplayer/SnapshotProtocol';
import type {
  ControlPointSnapshot,
  DomainEvent,
  EventEnvelope,
  ServerEvent,
  StateSnapshot,
  UnitSnapshot,
} from '@shared/multiplayer/SnapshotProtocol';
import { isDeadState } from '@shared/simulation/UnitState';
import { lerp, lerpAngle } from '@shared/utils/angles';

export type RemovalReason = 'died' | 'out_of_view';

export interface ShadowUnit {
  readonly id: string;
  /** Latest authoritative data, exactly as received */
  snapshot: UnitSnapshot;
  /** Intent text of an AI translation in flight; survives snapshots that do not mention it */
  pendingCommand: string | null;
  renderX: number;
  renderZ: number;
  renderRotation: number;
  fromX: number;
  fromZ: number;
  fromRotation: number;
  blendElapsed: number;
}

export interface Ghost {
  snapshot: UnitSnapshot;
  remainingMs: number;
}

export interface ShadowVision {
  cols: number;
  rows: number;
  cellSize: number;
  version: number;
  cells: Uint8Array;
}

export interface ShadowWorldOptions {
  /** Blend time for a position update; normally the broadcast interval */
  interpolationMs: number;
  /** How long an out-of-view enemy stays as a last-known marker */
  ghostTtlMs: number;
  onUnitAdded?: (unit: ShadowUnit) => void;
  onUnitRemoved?: (id: string, reason: RemovalReason, last: UnitSnapshot) => void;
  onEvent?: (event: ServerEvent, tick: number) => void;
}

export const DEFAULT_SHADOW_OPTIONS: ShadowWorldOptions = {
  interpolationMs: 100,
  ghostTtlMs: 5000,
};

export class ShadowWorld {
  private readonly options: ShadowWorldOptions;
  private readonly units: Map<string, ShadowUnit> = new Map();
  private readonly ghosts: Map<string, Ghost> = new Map();
  private readonly controlPoints: Map<string, ControlPointSnapshot> = new Map();
  /** unitId -> tick of the unit_died event */
  private readonly deaths: Map<string, number> = new Map();
  private readonly heldEvents: Map<number, EventEnvelope> = new Map();
  private vision: ShadowVision | null = null;
  private _lastTick = -1;
  private _lastSeq = 0;

  constructor(options: Partial<ShadowWorldOptions> = {}) {
    this.options = { ...DEFAULT_SHADOW_OPTIONS, ...options };
  }

  // ─── Snapshots ────────────────────────────────────────────────

  /** Apply a snapshot; returns false when it is stale and was ignored */
  applySnapshot(snapshot: StateSnapshot): boolean {
    if (snapshot.tick <= this._lastTick) return false;
    this._lastTick = snapshot.tick;

    const seen = new Set<string>();
    for (const data of snapshot.units) {
      seen.add(data.id);
      this.upsertUnit(data, snapshot.tick);
    }

    for (const [id, unit] of this.units) {
      if (seen.has(id)) continue;
      this.removeUnit(unit);
    }

    this.controlPoints.clear();
    for (const point of snapshot.controlPoints) {
      this.controlPoints.set(point.id, point);
    }

    if (snapshot.vision) {
      const layer = snapshot.vision;
      this.vision = {
        cols: layer.cols,
        rows: layer.rows,
        cellSize: layer.cellSize,
        version: layer.version,
        cells: decodeVisionGrid(layer.data, layer.cols * layer.rows),
      };
    }
    return true;
  }

  private upsertUnit(data: UnitSnapshot, tick: number): void {
    const carried = data.detail === 'full' ? data.pendingCommand : undefined;
    const existing = this.units.get(data.id);

    const deathTick = this.deaths.get(data.id);
    if (deathTick !== undefined && tick > deathTick && !isDeadState(data.state)) {
      this.deaths.delete(data.id);
    }

    if (existing) {
      existing.fromX = existing.renderX;
      existing.fromZ = existing.renderZ;
      existing.fromRotation = existing.renderRotation;
      existing.blendElapsed = 0;
      existing.snapshot = data;
      if (carried !== undefined) existing.pendingCommand = carried;
      return;
    }

    const unit: ShadowUnit = {
      id: data.id,
      snapshot: data,
      pendingCommand: carried ?? null,
      renderX: data.x,
      renderZ: data.z,
      renderRotation: data.rotation,
      fromX: data.x,
      fromZ: data.z,
      fromRotation: data.rotation,
      blendElapsed: this.options.interpolationMs,
    };
    this.ghosts.delete(data.id);
    this.units.set(data.id, unit);
    this.options.onUnitAdded?.(unit);
  }

  private removeUnit(unit: ShadowUnit): void {
    this.units.delete(unit.id);
    const died = this.deaths.has(unit.id);
    if (died) {
      this.deaths.delete(unit.id);
    } else {
      this.ghosts.set(unit.id, { snapshot: unit.snapshot, remainingMs: this.options.ghostTtlMs });
    }
    this.options.onUnitRemoved?.(unit.id, died ? 'died' : 'out_of_view', unit.snapshot);
  }

  /** Advance interpolation and ghost expiry by `dtMs` of wall time */
  update(dtMs: number): void {
    const duration = this.options.interpolationMs;
    for (const unit of this.units.values()) {
      unit.blendElapsed = Math.min(duration, unit.blendElapsed + dtMs);
      const t = duration > 0 ? unit.blendElapsed / duration : 1;
      unit.renderX = lerp(unit.fromX, unit.snapshot.x, t);
      unit.renderZ = lerp(unit.fromZ, unit.snapshot.z, t);
      unit.renderRotation = lerpAngle(unit.fromRotation, unit.snapshot.rotation, t);
    }

    for (const [id, ghost] of this.ghosts) {
      ghost.remainingMs -= dtMs;
      if (ghost.remainingMs <= 0) this.ghosts.delete(id);
    }
  }

  // ─── Reliable events ──────────────────────────────────────────

  /** Apply an envelope; out-of-order ones wait for the gap to fill, duplicates are dropped */
  applyEvent(envelope: EventEnvelope): void {
    if (envelope.seq <= this._lastSeq) return;
    this.heldEvents.set(envelope.seq, envelope);

    let next = this.heldEvents.get(this._lastSeq + 1);
    while (next) {
      this.heldEvents.delete(next.seq);
      this._lastSeq = next.seq;
      this.handleEvent(next.event, next.tick);
      next = this.heldEvents.get(this._lastSeq + 1);
    }
  }

  /** A fresh connection numbers its events from 1 again */
  resetSequence(): void {
    this.heldEvents.clear();
    this._lastSeq = 0;
  }

  private handleEvent(event: ServerEvent, tick: number): void {
    switch (event.type) {
      case 'unit_died':
        this.recordDeath(event, tick);
        break;
      case 'match_started':
      case 'match_ended':
        this.resetMatchState();
        break;
      default:
        break;
    }
    this.options.onEvent?.(event, tick);
  }

  private recordDeath(event: Extract<DomainEvent, { type: 'unit_died' }>, tick: number): void {
    // Already dropped as out of view: the marker is stale now
    if (this.ghosts.delete(event.unitId)) return;
    this.deaths.set(event.unitId, tick);
  }

  /** Forget everything tied to the previous match; ticks restart from zero */
  private resetMatchState(): void {
    this.units.clear();
    this.ghosts.clear();
    this.controlPoints.clear();
    this.deaths.clear();
    this.vision = null;
    this._lastTick = -1;
  }

  // ─── Queries ──────────────────────────────────────────────────

  get lastTick(): number {
    return this._lastTick;
  }

  get lastSeq(): number {
    return this._lastSeq;
  }

  get heldEventCount(): number {
    return this.heldEvents.size;
  }

  getUnit(id: string): ShadowUnit | undefined {
    return this.units.get(id);
  }

  getUnits(): ShadowUnit[] {
    return Array.from(this.units.values());
  }

  getGhost(id: string): Ghost | undefined {
    return this.ghosts.get(id);
  }

  getGhosts(): Map<string, Ghost> {
    return this.ghosts;
  }

  getControlPoint(id: string): ControlPointSnapshot | undefined {
    return this.controlPoints.get(id);
  }

  getControlPoints(): ControlPointSnapshot[] {
    return Array.from(this.controlPoints.values());
  }

  getVision(): ShadowVision | null {
    return this.vision;
  }

  /** Fog lookup against the last received grid; everything is fogged before the first one */
  isVisible(x: number, z: number): boolean {
    const vision = this.vision;
    if (!vision) return false;
    const col = Math.floor(x / vision.cellSize);
    const row = Math.floor(z / vision.cellSize);
    if (col < 0 || row < 0 || col >= vision.cols || row >= vision.rows) return false;
    return vision.cells[row * vision.cols + col] === 1;
  }
}
