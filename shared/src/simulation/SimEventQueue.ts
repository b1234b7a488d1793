/**
 * SimEventQueue - Domain events raised during a tick.
 *
 * Systems push events while the tick runs; the owner drains the queue
 * once per tick at a fixed point (after capture/visibility, before
 * snapshots) and fans them out to listeners in registration order.
 */

import type { TeamId } from '../data/types';
import type { UnitState } from './UnitState';

export type SimEvent =
  | { type: 'unit_died'; unitId: string; team: TeamId; killerId: string | null }
  | { type: 'unit_respawned'; unitId: string; team: TeamId; x: number; z: number }
  | { type: 'unit_state_changed'; unitId: string; from: UnitState; to: UnitState }
  | { type: 'ability_completed'; unitId: string; abilityId: string }
  | { type: 'control_point_captured'; pointId: string; team: TeamId }
  | { type: 'control_point_neutralized'; pointId: string; previousTeam: TeamId }
  | { type: 'victory'; winner: TeamId; condition: string };

export type SimEventType = SimEvent['type'];

export type SimEventListener = (event: SimEvent) => void;

export class SimEventQueue {
  private pending: SimEvent[] = [];
  private readonly listeners: SimEventListener[] = [];

  push(event: SimEvent): void {
    this.pending.push(event);
  }

  /** Register a listener; returns an unsubscribe function */
  subscribe(listener: SimEventListener): () => void {
    this.listeners.push(listener);
    return () => {
      const idx = this.listeners.indexOf(listener);
      if (idx >= 0) this.listeners.splice(idx, 1);
    };
  }

  /**
   * Deliver every pending event to every listener, in push order.
   * Events pushed by a listener during the drain are delivered in the same drain.
   */
  drain(): SimEvent[] {
    const delivered: SimEvent[] = [];
    while (this.pending.length > 0) {
      const batch = this.pending;
      this.pending = [];
      for (const event of batch) {
        delivered.push(event);
        for (const listener of [...this.listeners]) {
          listener(event);
        }
      }
    }
    return delivered;
  }

  /** Events queued but not yet drained */
  peek(): readonly SimEvent[] {
    return this.pending;
  }

  clear(): void {
    this.pending = [];
  }
}
