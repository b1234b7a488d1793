/**
 * Victory conditions - pluggable per game mode.
 *
 * Conditions are evaluated in the mode's declared order and the first
 * one satisfied decides the match. Inside one condition team A is checked
 * before team B, so simultaneous satisfaction always resolves the same way.
 */

import type { TeamId, VictoryConditionDef } from '../data/types';
import { TEAM_IDS } from '../data/types';
import type { ControlPoint } from './ControlPoint';

export interface VictoryCondition {
  readonly id: string;
  isSatisfiedBy(team: TeamId, points: readonly ControlPoint[]): boolean;
}

export interface VictoryResult {
  winner: TeamId;
  condition: string;
}

function countControlled(team: TeamId, points: readonly ControlPoint[]): number {
  let count = 0;
  for (const point of points) {
    if (point.controller === team) count++;
  }
  return count;
}

/** Team controls at least `count` points */
export function controlCountCondition(count: number): VictoryCondition {
  return {
    id: `control_count:${count}`,
    isSatisfiedBy: (team, points) => points.length > 0 && countControlled(team, points) >= count,
  };
}

/** Team controls the designated point plus `quota` others */
export function keystoneCondition(pointId: string, quota: number): VictoryCondition {
  return {
    id: `keystone:${pointId}+${quota}`,
    isSatisfiedBy: (team, points) => {
      const keystone = points.find(p => p.id === pointId);
      if (!keystone || keystone.controller !== team) return false;
      const others = points.filter(p => p.id !== pointId && p.controller === team).length;
      return others >= quota;
    },
  };
}

/** Team controls every point in a specific set (e.g. the perimeter) */
export function pointSetCondition(pointIds: readonly string[]): VictoryCondition {
  return {
    id: `point_set:${pointIds.join(',')}`,
    isSatisfiedBy: (team, points) => {
      if (pointIds.length === 0) return false;
      return pointIds.every(id => points.some(p => p.id === id && p.controller === team));
    },
  };
}

/** Strategic values of the team's points add up to at least `threshold` */
export function strategicValueCondition(threshold: number): VictoryCondition {
  return {
    id: `strategic_value:${threshold}`,
    isSatisfiedBy: (team, points) => {
      let total = 0;
      for (const point of points) {
        if (point.controller === team) total += point.value;
      }
      return total >= threshold;
    },
  };
}

export function buildVictoryCondition(def: VictoryConditionDef): VictoryCondition {
  switch (def.type) {
    case 'control_count':
      return controlCountCondition(def.count);
    case 'keystone':
      return keystoneCondition(def.pointId, def.quota);
    case 'point_set':
      return pointSetCondition(def.pointIds);
    case 'strategic_value':
      return strategicValueCondition(def.threshold);
  }
}

export class VictoryEvaluator {
  private readonly conditions: readonly VictoryCondition[];

  constructor(conditions: readonly VictoryCondition[]) {
    this.conditions = conditions;
  }

  static fromDefs(defs: readonly VictoryConditionDef[]): VictoryEvaluator {
    return new VictoryEvaluator(defs.map(buildVictoryCondition));
  }

  evaluate(points: readonly ControlPoint[]): VictoryResult | null {
    for (const condition of this.conditions) {
      for (const team of TEAM_IDS) {
        if (condition.isSatisfiedBy(team, points)) {
          return { winner: team, condition: condition.id };
        }
      }
    }
    return null;
  }
}
