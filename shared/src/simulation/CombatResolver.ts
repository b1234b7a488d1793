/**
 * CombatResolver - The single path by which combat lowers health.
 *
 * Damage, death bookkeeping (state, timers, death event) and the
 * attacker's cooldown reset happen in one call, so nothing reading the
 * world between systems can see a hit without its consequences.
 */

import type { SimUnit } from './SimUnit';

export interface AttackResult {
  damage: number;
  killed: boolean;
  /** True when the hit was discarded (invulnerable or already dead target) */
  discarded: boolean;
}

export function resolveAttack(attacker: SimUnit, target: SimUnit): AttackResult {
  const damage = attacker.archetype.attackDamage;
  const discarded = !target.isAlive || target.isInvulnerable;
  const killed = target.applyDamage(damage, attacker.id);
  attacker.resetAttackCooldown();
  return { damage: discarded ? 0 : damage, killed, discarded };
}
