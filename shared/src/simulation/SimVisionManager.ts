/**
 * SimVisionManager - Per-team visibility grids
 *
 * Each team owns a Uint8Array over the map (1 = visible). Every update
 * fully recomputes the grid from the team's live units: a cell is visible
 * when its center lies inside some unit's vision radius. The grid version
 * only advances when the contents actually changed, so observers can tell
 * cheaply whether anything new is worth sending.
 *
 * Vision is shared by the whole team; there is no per-player fog.
 */

import type { SimConfig, TeamId } from '../data/types';
import { TEAM_IDS } from '../data/types';
import type { EntityStore } from './EntityStore';
import type { SimUnit } from './SimUnit';

interface TeamGrid {
  cells: Uint8Array;
  scratch: Uint8Array;
  version: number;
}

export class SimVisionManager {
  readonly cols: number;
  readonly rows: number;
  readonly cellSize: number;

  private readonly store: EntityStore;
  private readonly config: SimConfig;
  private readonly grids: Record<TeamId, TeamGrid>;

  constructor(store: EntityStore, config: SimConfig, mapWidth: number, mapHeight: number) {
    this.store = store;
    this.config = config;
    this.cellSize = config.visionCellSize;
    this.cols = Math.max(1, Math.ceil(mapWidth / this.cellSize));
    this.rows = Math.max(1, Math.ceil(mapHeight / this.cellSize));

    const total = this.cols * this.rows;
    this.grids = {
      A: { cells: new Uint8Array(total), scratch: new Uint8Array(total), version: 0 },
      B: { cells: new Uint8Array(total), scratch: new Uint8Array(total), version: 0 },
    };
  }

  // ─── Update ──────────────────────────────────────────────────

  /** Recompute every team's grid; returns the teams whose grid changed */
  update(): TeamId[] {
    const changed: TeamId[] = [];
    for (const team of TEAM_IDS) {
      if (this.recompute(team)) changed.push(team);
    }
    return changed;
  }

  private recompute(team: TeamId): boolean {
    const grid = this.grids[team];
    const next = grid.scratch;
    next.fill(0);

    for (const unit of this.store.getLiveUnits(team)) {
      this.markCircle(next, unit.simPosition.x, unit.simPosition.z, unit.archetype.visionRange);
    }

    if (sameCells(next, grid.cells)) return false;

    grid.scratch = grid.cells;
    grid.cells = next;
    grid.version++;
    return true;
  }

  private markCircle(cells: Uint8Array, cx: number, cz: number, radius: number): void {
    const size = this.cellSize;
    const minCol = Math.max(0, Math.floor((cx - radius) / size));
    const maxCol = Math.min(this.cols - 1, Math.floor((cx + radius) / size));
    const minRow = Math.max(0, Math.floor((cz - radius) / size));
    const maxRow = Math.min(this.rows - 1, Math.floor((cz + radius) / size));
    const radiusSq = radius * radius;

    for (let row = minRow; row <= maxRow; row++) {
      const dz = (row + 0.5) * size - cz;
      for (let col = minCol; col <= maxCol; col++) {
        const dx = (col + 0.5) * size - cx;
        if (dx * dx + dz * dz <= radiusSq) {
          cells[row * this.cols + col] = 1;
        }
      }
    }
  }

  // ─── Queries ─────────────────────────────────────────────────

  isPointVisible(team: TeamId, x: number, z: number): boolean {
    const col = Math.floor(x / this.cellSize);
    const row = Math.floor(z / this.cellSize);
    if (col < 0 || row < 0 || col >= this.cols || row >= this.rows) return false;
    return this.grids[team].cells[row * this.cols + col] === 1;
  }

  /**
   * A unit is visible to a team when any grid cell overlapping its
   * footprint is visible. Own units are always visible. A stealthed enemy
   * additionally needs a live unit of the team within detection range.
   */
  isUnitVisibleTo(team: TeamId, unit: SimUnit): boolean {
    if (unit.team === team) return true;
    if (!this.footprintVisible(team, unit)) return false;
    if (unit.isStealthed && !this.isDetected(team, unit)) return false;
    return true;
  }

  private footprintVisible(team: TeamId, unit: SimUnit): boolean {
    const cells = this.grids[team].cells;
    const size = this.cellSize;
    const { x, z } = unit.simPosition;
    const r = unit.archetype.radius;

    const minCol = Math.max(0, Math.floor((x - r) / size));
    const maxCol = Math.min(this.cols - 1, Math.floor((x + r) / size));
    const minRow = Math.max(0, Math.floor((z - r) / size));
    const maxRow = Math.min(this.rows - 1, Math.floor((z + r) / size));
    const rSq = r * r;

    for (let row = minRow; row <= maxRow; row++) {
      for (let col = minCol; col <= maxCol; col++) {
        if (cells[row * this.cols + col] !== 1) continue;
        // Closest point of the cell rectangle to the footprint center
        const nearX = Math.min(Math.max(x, col * size), (col + 1) * size);
        const nearZ = Math.min(Math.max(z, row * size), (row + 1) * size);
        const dx = nearX - x;
        const dz = nearZ - z;
        if (dx * dx + dz * dz <= rSq) return true;
      }
    }
    return false;
  }

  private isDetected(team: TeamId, unit: SimUnit): boolean {
    const rangeSq = this.config.stealthDetectionRange * this.config.stealthDetectionRange;
    for (const viewer of this.store.getLiveUnits(team)) {
      const dx = viewer.simPosition.x - unit.simPosition.x;
      const dz = viewer.simPosition.z - unit.simPosition.z;
      if (dx * dx + dz * dz <= rangeSq) return true;
    }
    return false;
  }

  getGrid(team: TeamId): Uint8Array {
    return this.grids[team].cells;
  }

  getVersion(team: TeamId): number {
    return this.grids[team].version;
  }

  /** Clear both grids (match reset) */
  reset(): void {
    for (const team of TEAM_IDS) {
      const grid = this.grids[team];
      grid.cells.fill(0);
      grid.scratch.fill(0);
      grid.version = 0;
    }
  }
}

function sameCells(a: Uint8Array, b: Uint8Array): boolean {
  if (a.length !== b.length) return false;
  for (let i = 0; i < a.length; i++) {
    if (a[i] !== b[i]) return false;
  }
  return true;
}

/** Number of cells that differ between two grids of the same size */
export function countChangedCells(a: Uint8Array, b: Uint8Array): number {
  if (a.length !== b.length) return Math.max(a.length, b.length);
  let changed = 0;
  for (let i = 0; i < a.length; i++) {
    if (a[i] !== b[i]) changed++;
  }
  return changed;
}
