/**
 * CommandProtocol - Player commands as they travel from client to host.
 *
 * Commands carry only ids and positions; the host resolves every id
 * against its own entity store when the command is applied.
 */

import type { FormationLayout } from '../simulation/formations';

export enum CommandType {
  Move = 'move',
  Attack = 'attack',
  Stop = 'stop',
  Formation = 'formation',
  Ability = 'ability',
}

export interface GroundPoint {
  x: number;
  z: number;
}

export interface MoveCommand {
  type: CommandType.Move;
  unitIds: string[];
  target: GroundPoint;
}

export interface AttackCommand {
  type: CommandType.Attack;
  unitIds: string[];
  targetId: string;
}

export interface StopCommand {
  type: CommandType.Stop;
  unitIds: string[];
}

export interface FormationCommand {
  type: CommandType.Formation;
  unitIds: string[];
  layout: FormationLayout;
  center: GroundPoint;
}

export interface AbilityCommand {
  type: CommandType.Ability;
  unitIds: string[];
}

export type GameCommand = MoveCommand | AttackCommand | StopCommand | FormationCommand | AbilityCommand;

/** Where a queued command came from */
export type CommandSource = 'manual' | 'ai';

/** A validated command waiting in the host's queue for the next tick */
export interface QueuedCommand {
  playerId: string;
  command: GameCommand;
  source: CommandSource;
  /** Host tick at which the command was accepted */
  receivedTick: number;
}

export function createMoveCommand(unitIds: string[], x: number, z: number): MoveCommand {
  return { type: CommandType.Move, unitIds, target: { x, z } };
}

export function createAttackCommand(unitIds: string[], targetId: string): AttackCommand {
  return { type: CommandType.Attack, unitIds, targetId };
}

export function createStopCommand(unitIds: string[]): StopCommand {
  return { type: CommandType.Stop, unitIds };
}

export function createFormationCommand(
  unitIds: string[],
  layout: FormationLayout,
  x: number,
  z: number,
): FormationCommand {
  return { type: CommandType.Formation, unitIds, layout, center: { x, z } };
}

export function createAbilityCommand(unitIds: string[]): AbilityCommand {
  return { type: CommandType.Ability, unitIds };
}

/** Short human-readable form, used in logs and translator summaries */
export function describeCommand(command: GameCommand): string {
  const units = command.unitIds.join(',');
  switch (command.type) {
    case CommandType.Move:
      return `move [${units}] to (${command.target.x}, ${command.target.z})`;
    case CommandType.Attack:
      return `attack [${units}] -> ${command.targetId}`;
    case CommandType.Stop:
      return `stop [${units}]`;
    case CommandType.Formation:
      return `formation ${command.layout} [${units}] at (${command.center.x}, ${command.center.z})`;
    case CommandType.Ability:
      return `ability [${units}]`;
  }
}
