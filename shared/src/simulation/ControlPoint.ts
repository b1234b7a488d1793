/**
 * ControlPoint - A capturable map location.
 *
 * The only stored ownership state is `captureValue` in [-1, 1]. The
 * controlling team is always derived from it, so the two can never disagree.
 */

import type { ControlPointDef, TeamId } from '../data/types';

export type CaptureStatus = 'controlled' | 'contested' | 'neutral';

/** Derive the controlling team from a capture value */
export function controllerOf(value: number): TeamId | null {
  if (value >= 1) return 'A';
  if (value <= -1) return 'B';
  return null;
}

export class ControlPoint {
  readonly id: string;
  readonly x: number;
  readonly z: number;
  readonly value: number;
  readonly radius: number;
  readonly tags: readonly string[];

  captureValue = 0;
  /** Unit ids inside the capture radius as of the last update, per team */
  readonly occupants: Record<TeamId, string[]> = { A: [], B: [] };

  constructor(def: ControlPointDef, defaultRadius: number) {
    this.id = def.id;
    this.x = def.x;
    this.z = def.z;
    this.value = def.value;
    this.radius = def.radius ?? defaultRadius;
    this.tags = def.tags ?? [];
  }

  get controller(): TeamId | null {
    return controllerOf(this.captureValue);
  }

  get status(): CaptureStatus {
    if (Math.abs(this.captureValue) >= 1) return 'controlled';
    if (this.captureValue === 0 && this.occupants.A.length === 0 && this.occupants.B.length === 0) {
      return 'neutral';
    }
    return 'contested';
  }

  /** Ring progress for rendering */
  get progress(): number {
    return Math.abs(this.captureValue);
  }

  reset(): void {
    this.captureValue = 0;
    this.occupants.A = [];
    this.occupants.B = [];
  }
}
