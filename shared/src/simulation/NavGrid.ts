/**
 * NavGrid - Walkability grid supplied by the map layout.
 *
 * Paths are found with a 4-neighbour breadth-first search and returned
 * as world-space waypoints (cell centers, the final one replaced by the
 * exact destination). Straight runs are collapsed to their end cell.
 */

import * as THREE from 'three';
import type { MapLayout } from '../data/types';

export interface GridCell {
  col: number;
  row: number;
}

export class NavGrid {
  readonly cols: number;
  readonly rows: number;
  readonly cellSize: number;
  private readonly blocked: Uint8Array;

  constructor(width: number, height: number, cellSize: number, blockedCells: Array<[number, number]> = []) {
    this.cellSize = cellSize;
    this.cols = Math.max(1, Math.ceil(width / cellSize));
    this.rows = Math.max(1, Math.ceil(height / cellSize));
    this.blocked = new Uint8Array(this.cols * this.rows);
    for (const [col, row] of blockedCells) {
      if (this.inBounds(col, row)) this.blocked[row * this.cols + col] = 1;
    }
  }

  static fromLayout(layout: MapLayout): NavGrid {
    return new NavGrid(layout.width, layout.height, layout.navCellSize, layout.blocked);
  }

  inBounds(col: number, row: number): boolean {
    return col >= 0 && row >= 0 && col < this.cols && row < this.rows;
  }

  isWalkable(col: number, row: number): boolean {
    return this.inBounds(col, row) && this.blocked[row * this.cols + col] === 0;
  }

  cellAt(x: number, z: number): GridCell {
    return { col: Math.floor(x / this.cellSize), row: Math.floor(z / this.cellSize) };
  }

  /** Flat cell index; positions off the grid map to -1 */
  cellIndexAt(x: number, z: number): number {
    const cell = this.cellAt(x, z);
    return this.inBounds(cell.col, cell.row) ? this.toIndex(cell) : -1;
  }

  cellCenter(cell: GridCell): THREE.Vector3 {
    return new THREE.Vector3(
      (cell.col + 0.5) * this.cellSize,
      0,
      (cell.row + 0.5) * this.cellSize,
    );
  }

  /**
   * Find a route from `from` to `to`.
   * Returns null when the destination is off-grid, blocked or unreachable.
   */
  findPath(from: THREE.Vector3, to: THREE.Vector3): THREE.Vector3[] | null {
    const start = this.cellAt(from.x, from.z);
    const goal = this.cellAt(to.x, to.z);
    if (!this.isWalkable(goal.col, goal.row)) return null;

    if (start.col === goal.col && start.row === goal.row) {
      return [to.clone()];
    }

    const startIdx = this.toIndex(start);
    const goalIdx = this.toIndex(goal);
    // A unit standing on a blocked or off-grid cell may still walk out of it
    const startKnown = this.inBounds(start.col, start.row);

    const prev = new Int32Array(this.cols * this.rows).fill(-1);
    const queue: number[] = [];
    let head = 0;

    if (startKnown) {
      prev[startIdx] = startIdx;
      queue.push(startIdx);
    } else {
      const entry = this.nearestWalkable(start);
      if (!entry) return null;
      const entryIdx = this.toIndex(entry);
      prev[entryIdx] = entryIdx;
      queue.push(entryIdx);
    }

    while (head < queue.length) {
      const current = queue[head++]!;
      if (current === goalIdx) break;

      const col = current % this.cols;
      const row = (current - col) / this.cols;
      const neighbours: Array<[number, number]> = [
        [col + 1, row],
        [col - 1, row],
        [col, row + 1],
        [col, row - 1],
      ];

      for (const [nc, nr] of neighbours) {
        if (!this.isWalkable(nc, nr)) continue;
        const idx = nr * this.cols + nc;
        if (prev[idx] !== -1) continue;
        prev[idx] = current;
        queue.push(idx);
      }
    }

    if (prev[goalIdx] === -1) return null;

    const cells: number[] = [];
    let cursor = goalIdx;
    while (prev[cursor] !== cursor) {
      cells.push(cursor);
      cursor = prev[cursor]!;
    }
    cells.reverse();

    const waypoints = this.collapseStraightRuns(cells).map(idx => this.cellCenter(this.fromIndex(idx)));
    waypoints[waypoints.length - 1] = to.clone();
    return waypoints;
  }

  private collapseStraightRuns(cells: number[]): number[] {
    if (cells.length <= 2) return cells;
    const result: number[] = [];
    for (let i = 0; i < cells.length; i++) {
      const next = cells[i + 1];
      const prevCell = cells[i - 1];
      if (next === undefined || prevCell === undefined) {
        result.push(cells[i]!);
        continue;
      }
      const stepIn = cells[i]! - prevCell;
      const stepOut = next - cells[i]!;
      if (stepIn !== stepOut) result.push(cells[i]!);
    }
    return result;
  }

  private nearestWalkable(cell: GridCell): GridCell | null {
    const col = Math.min(this.cols - 1, Math.max(0, cell.col));
    const row = Math.min(this.rows - 1, Math.max(0, cell.row));
    return this.isWalkable(col, row) ? { col, row } : null;
  }

  private toIndex(cell: GridCell): number {
    return cell.row * this.cols + cell.col;
  }

  private fromIndex(idx: number): GridCell {
    const col = idx % this.cols;
    return { col, row: (idx - col) / this.cols };
  }
}
