/**
 * EntityStore - Authoritative registry of units and control points for one match.
 *
 * The store is the only owner of entity lifetime. Everything else keeps
 * ids and looks entities up here, so removing an entity can never leave
 * a dangling handle behind. Created at match start, cleared at match end.
 */

import type * as THREE from 'three';
import type { ArchetypeData, ControlPointDef, TeamId } from '../data/types';
import type { SimContext } from '../core/SimContext';
import { SimUnit } from './SimUnit';
import { ControlPoint } from './ControlPoint';

export interface SpawnUnitSpec {
  team: TeamId;
  ownerId: string;
  archetype: ArchetypeData;
  position: THREE.Vector3;
  spawnIndex?: number | undefined;
}

export class EntityStore {
  private readonly units: Map<string, SimUnit> = new Map();
  private readonly controlPoints: Map<string, ControlPoint> = new Map();
  private nextUnitId = 1;
  private readonly spawnCounters: Record<TeamId, number> = { A: 0, B: 0 };

  // ─── Units ────────────────────────────────────────────────────

  spawnUnit(params: SpawnUnitSpec, context: SimContext): SimUnit {
    const spawnIndex = params.spawnIndex ?? this.spawnCounters[params.team]++;
    const unit = new SimUnit(
      {
        id: `u${this.nextUnitId++}`,
        team: params.team,
        ownerId: params.ownerId,
        archetype: params.archetype,
        position: params.position,
        spawnIndex,
      },
      context,
    );
    this.units.set(unit.id, unit);
    return unit;
  }

  getUnit(id: string): SimUnit | undefined {
    return this.units.get(id);
  }

  hasUnit(id: string): boolean {
    return this.units.has(id);
  }

  removeUnit(id: string): boolean {
    return this.units.delete(id);
  }

  /** All units in spawn order */
  getUnits(): SimUnit[] {
    return Array.from(this.units.values());
  }

  getTeamUnits(team: TeamId): SimUnit[] {
    return this.getUnits().filter(u => u.team === team);
  }

  getLiveUnits(team?: TeamId): SimUnit[] {
    return this.getUnits().filter(u => u.isAlive && (team === undefined || u.team === team));
  }

  getUnitsOwnedBy(ownerId: string): SimUnit[] {
    return this.getUnits().filter(u => u.ownerId === ownerId);
  }

  get unitCount(): number {
    return this.units.size;
  }

  // ─── Control points ───────────────────────────────────────────

  addControlPoint(def: ControlPointDef, defaultRadius: number): ControlPoint {
    const point = new ControlPoint(def, defaultRadius);
    this.controlPoints.set(point.id, point);
    return point;
  }

  getControlPoint(id: string): ControlPoint | undefined {
    return this.controlPoints.get(id);
  }

  getControlPoints(): ControlPoint[] {
    return Array.from(this.controlPoints.values());
  }

  /** Match reset: every point back to neutral */
  resetControlPoints(): void {
    for (const point of this.controlPoints.values()) {
      point.reset();
    }
  }

  clear(): void {
    this.units.clear();
    this.controlPoints.clear();
    this.nextUnitId = 1;
    this.spawnCounters.A = 0;
    this.spawnCounters.B = 0;
  }
}
