/**
 * SimCaptureManager - Continuous territorial capture.
 *
 * Every tick each control point's capture value moves by
 * (live units of A in radius - live units of B in radius) × rate × dt,
 * clamped to [-1, 1]. Ownership events fire only when the derived
 * controller changes, never while a point simply stays held.
 */

import type { SimConfig } from '../data/types';
import type { EntityStore } from './EntityStore';
import type { SimEventQueue } from './SimEventQueue';
import { controllerOf, type ControlPoint } from './ControlPoint';
import { checkRange, clamp } from '../utils/invariant';

/** Presence summary for one point after an update */
interface PointPresence {
  pointId: string;
  countA: number;
  countB: number;
  advantage: number;
}

export class SimCaptureManager {
  private readonly store: EntityStore;
  private readonly events: SimEventQueue;
  private readonly config: SimConfig;
  private readonly onViolation: (message: string) => void;

  constructor(
    store: EntityStore,
    events: SimEventQueue,
    config: SimConfig,
    onViolation: (message: string) => void = () => {},
  ) {
    this.store = store;
    this.events = events;
    this.config = config;
    this.onViolation = onViolation;
  }

  /**
   * Advance every point by dt seconds.
   * @returns true if any point's controlling team changed
   */
  update(dt: number): boolean {
    let changed = false;
    for (const point of this.store.getControlPoints()) {
      const presence = this.updateOccupants(point);
      if (this.advance(point, presence.advantage, dt)) changed = true;
    }
    return changed;
  }

  private updateOccupants(point: ControlPoint): PointPresence {
    const radiusSq = point.radius * point.radius;
    const occupantsA: string[] = [];
    const occupantsB: string[] = [];

    for (const unit of this.store.getLiveUnits()) {
      const dx = unit.simPosition.x - point.x;
      const dz = unit.simPosition.z - point.z;
      if (dx * dx + dz * dz > radiusSq) continue;
      if (unit.team === 'A') occupantsA.push(unit.id);
      else occupantsB.push(unit.id);
    }

    point.occupants.A = occupantsA;
    point.occupants.B = occupantsB;

    return {
      pointId: point.id,
      countA: occupantsA.length,
      countB: occupantsB.length,
      advantage: occupantsA.length - occupantsB.length,
    };
  }

  /** Apply one step to a point; returns true if its controller changed */
  private advance(point: ControlPoint, advantage: number, dt: number): boolean {
    const before = point.controller;

    const next = clamp(point.captureValue + advantage * this.config.captureRate * dt, -1, 1);
    point.captureValue = checkRange(
      next,
      -1,
      1,
      `capture value of ${point.id}`,
      this.config.strictInvariants,
      violation => this.onViolation(violation.message),
    );

    const after = controllerOf(point.captureValue);
    if (after === before) return false;

    if (before !== null) {
      this.events.push({ type: 'control_point_neutralized', pointId: point.id, previousTeam: before });
    }
    if (after !== null) {
      this.events.push({ type: 'control_point_captured', pointId: point.id, team: after });
    }
    return true;
  }
}
