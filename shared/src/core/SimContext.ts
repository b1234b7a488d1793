/**
 * SimContext - What a unit may ask of the world it lives in.
 *
 * Implemented by SimWorld. Units never hold other units directly;
 * every cross-unit reference goes through getUnit() by id.
 */

import type * as THREE from 'three';
import type { SimConfig, TeamId } from '../data/types';
import type { SimEvent } from '../simulation/SimEventQueue';
import type { SimUnit } from '../simulation/SimUnit';

export interface SimContext {
  readonly config: SimConfig;
  /** Current simulation tick */
  readonly tick: number;

  /** Queue a domain event for the end-of-tick drain */
  emit(event: SimEvent): void;

  /** Report a clamped consistency violation (non-strict mode) */
  reportViolation(message: string): void;

  // Entity lookup
  getUnit(id: string): SimUnit | undefined;
  getUnitsInRadius(position: THREE.Vector3, radius: number, team?: TeamId): SimUnit[];

  // Vision
  isUnitVisibleTo(team: TeamId, unit: SimUnit): boolean;

  // Navigation
  findPath(from: THREE.Vector3, to: THREE.Vector3): THREE.Vector3[] | null;
  /** Index of the navigation cell containing a position */
  navCellOf(position: THREE.Vector3): number;
  getSpawnPoint(team: TeamId, spawnIndex: number): THREE.Vector3;
}
