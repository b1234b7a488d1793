/**
 * CommandPipeline - Buffers validated commands and applies them at the start of a tick.
 *
 * Network callbacks only enqueue. The tick loop calls applyPending() once,
 * which resolves every id against the entity store at that moment. Each
 * command is applied in isolation: a failing command is logged and the
 * rest of the queue still runs.
 */

import * as THREE from 'three';
import type { SimWorld } from '@shared/simulation/SimWorld';
import type { SimUnit } from '@shared/simulation/SimUnit';
import { computeFormationSlots } from '@shared/simulation/formations';
import { CommandType, describeCommand } from '@shared/multiplayer/CommandProtocol';
import type { CommandSource, GameCommand, QueuedCommand } from '@shared/multiplayer/CommandProtocol';
import type { Logger } from '../logger';

export type DropReason =
  | 'unknown_unit'
  | 'not_owner'
  | 'dead_unit'
  | 'no_route'
  | 'ability_unavailable';

export interface CommandOutcome {
  playerId: string;
  command: GameCommand;
  source: CommandSource;
  /** Unit ids that received the order */
  applied: string[];
  dropped: Array<{ unitId: string; reason: DropReason }>;
  /** Set when the whole command was dropped */
  rejected?: string | undefined;
}

export class CommandPipeline {
  private queue: QueuedCommand[] = [];
  private readonly log: Logger;

  constructor(log: Logger) {
    this.log = log;
  }

  enqueue(playerId: string, command: GameCommand, source: CommandSource, receivedTick: number): void {
    this.queue.push({ playerId, command, source, receivedTick });
  }

  get pendingCount(): number {
    return this.queue.length;
  }

  /** Apply every queued command in arrival order */
  applyPending(world: SimWorld): CommandOutcome[] {
    const batch = this.queue;
    this.queue = [];

    const outcomes: CommandOutcome[] = [];
    for (const queued of batch) {
      try {
        const outcome = applyCommand(world, queued.playerId, queued.command, queued.source);
        this.logOutcome(outcome);
        outcomes.push(outcome);
      } catch (err) {
        this.log.error(
          { err, playerId: queued.playerId, command: describeCommand(queued.command) },
          'Command failed during application',
        );
        outcomes.push({
          playerId: queued.playerId,
          command: queued.command,
          source: queued.source,
          applied: [],
          dropped: [],
          rejected: 'internal_error',
        });
      }
    }
    return outcomes;
  }

  clear(): void {
    this.queue = [];
  }

  private logOutcome(outcome: CommandOutcome): void {
    const command = describeCommand(outcome.command);
    if (outcome.rejected) {
      this.log.warn({ playerId: outcome.playerId, command, reason: outcome.rejected }, 'Command dropped');
      return;
    }
    if (outcome.dropped.length > 0) {
      this.log.debug({ playerId: outcome.playerId, command, dropped: outcome.dropped }, 'Units dropped from command');
    }
  }
}

// ─── Application ─────────────────────────────────────────────────

/**
 * Resolve and apply one command against the world.
 * Ownership is checked per unit: ids that are unknown, dead or owned by
 * someone else are dropped individually.
 */
export function applyCommand(
  world: SimWorld,
  playerId: string,
  command: GameCommand,
  source: CommandSource,
): CommandOutcome {
  const outcome: CommandOutcome = { playerId, command, source, applied: [], dropped: [] };

  const units: SimUnit[] = [];
  const seen = new Set<string>();
  for (const unitId of command.unitIds) {
    if (seen.has(unitId)) continue;
    seen.add(unitId);

    const unit = world.getUnit(unitId);
    if (!unit) {
      outcome.dropped.push({ unitId, reason: 'unknown_unit' });
    } else if (unit.ownerId !== playerId) {
      outcome.dropped.push({ unitId, reason: 'not_owner' });
    } else if (!unit.isAlive) {
      outcome.dropped.push({ unitId, reason: 'dead_unit' });
    } else {
      units.push(unit);
    }
  }

  if (units.length === 0) {
    outcome.rejected = 'no_valid_units';
    return outcome;
  }

  switch (command.type) {
    case CommandType.Move: {
      const target = new THREE.Vector3(command.target.x, 0, command.target.z);
      for (const unit of units) {
        record(outcome, unit, unit.setMoveCommand(target), 'no_route');
      }
      break;
    }

    case CommandType.Attack: {
      const target = world.getUnit(command.targetId);
      const team = units[0]!.team;
      if (!target || !target.isAlive) {
        outcome.rejected = 'invalid_target';
        break;
      }
      if (target.team === team) {
        outcome.rejected = 'friendly_target';
        break;
      }
      if (!world.isUnitVisibleTo(team, target)) {
        outcome.rejected = 'target_not_visible';
        break;
      }
      for (const unit of units) {
        record(outcome, unit, unit.setAttackCommand(target.id), 'dead_unit');
      }
      break;
    }

    case CommandType.Stop:
      for (const unit of units) {
        unit.stop();
        outcome.applied.push(unit.id);
      }
      break;

    case CommandType.Formation: {
      const center = new THREE.Vector3(command.center.x, 0, command.center.z);
      const slots = computeFormationSlots(command.layout, units.length, center, world.config.formationSpacing);
      units.forEach((unit, i) => {
        const slot = slots[i] ?? center;
        record(outcome, unit, unit.setMoveCommand(slot), 'no_route');
      });
      break;
    }

    case CommandType.Ability:
      for (const unit of units) {
        record(outcome, unit, unit.startAbility(), 'ability_unavailable');
      }
      break;
  }

  if (!outcome.rejected && outcome.applied.length === 0) {
    outcome.rejected = 'no_unit_accepted';
  }
  return outcome;
}

function record(outcome: CommandOutcome, unit: SimUnit, accepted: boolean, reason: DropReason): void {
  if (accepted) outcome.applied.push(unit.id);
  else outcome.dropped.push({ unitId: unit.id, reason });
}
