/**
 * Unit behavior states
 * Shared between the simulation, snapshots and observers
 */
export enum UnitState {
  Idle = 'idle',
  Moving = 'moving',
  Attacking = 'attacking',
  ChargingAbility = 'chargingAbility',
  Dead = 'dead',
  Respawning = 'respawning',
}

/** Dead and Respawning units have zero health and reject commands */
export function isDeadState(state: UnitState): boolean {
  return state === UnitState.Dead || state === UnitState.Respawning;
}
