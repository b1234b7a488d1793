/**
 * Formation slot layout
 *
 * Turns a formation command into one world-space destination per unit.
 * Slots are returned in the same order as the units passed in.
 */

import * as THREE from 'three';

export type FormationLayout = 'line' | 'column' | 'wedge' | 'box';

export const FORMATION_LAYOUTS: readonly FormationLayout[] = ['line', 'column', 'wedge', 'box'] as const;

export function computeFormationSlots(
  layout: FormationLayout,
  count: number,
  center: THREE.Vector3,
  spacing: number,
): THREE.Vector3[] {
  const slots: THREE.Vector3[] = [];
  if (count <= 0) return slots;

  switch (layout) {
    case 'line':
      for (let i = 0; i < count; i++) {
        slots.push(offset(center, (i - (count - 1) / 2) * spacing, 0));
      }
      break;

    case 'column':
      for (let i = 0; i < count; i++) {
        slots.push(offset(center, 0, (i - (count - 1) / 2) * spacing));
      }
      break;

    case 'wedge':
      // Tip at the center, alternating left/right one rank further back
      for (let i = 0; i < count; i++) {
        const rank = Math.ceil(i / 2);
        const side = i === 0 ? 0 : i % 2 === 1 ? -1 : 1;
        slots.push(offset(center, side * rank * spacing, rank * spacing));
      }
      break;

    case 'box': {
      const perRow = Math.ceil(Math.sqrt(count));
      const rows = Math.ceil(count / perRow);
      for (let i = 0; i < count; i++) {
        const row = Math.floor(i / perRow);
        const col = i % perRow;
        slots.push(offset(
          center,
          (col - (perRow - 1) / 2) * spacing,
          (row - (rows - 1) / 2) * spacing,
        ));
      }
      break;
    }
  }

  return slots;
}

function offset(center: THREE.Vector3, dx: number, dz: number): THREE.Vector3 {
  return new THREE.Vector3(center.x + dx, 0, center.z + dz);
}
