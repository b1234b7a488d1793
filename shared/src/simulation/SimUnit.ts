/**
 * SimUnit - Pure simulation unit
 *
 * Holds the state machine (Idle, Moving, Attacking, ChargingAbility,
 * Dead, Respawning), timers and movement for one unit.
 * No rendering, network or logging dependencies.
 *
 * The attack target is a weak reference: only the id is stored and it is
 * resolved through the context every tick. A target that is gone, dead or
 * no longer visible sends the unit back to Idle.
 */

import * as THREE from 'three';
import type { ArchetypeData, TeamId } from '../data/types';
import { opposingTeam } from '../data/types';
import type { SimContext } from '../core/SimContext';
import { checkRange } from '../utils/invariant';
import { compareEntityId } from '../utils/idSort';
import { headingTo } from '../utils/angles';
import { UnitState, isDeadState } from './UnitState';
import { resolveAttack } from './CombatResolver';

// ─── Reusable temp vectors ───────────────────────────────────────
const _toTarget = new THREE.Vector3();
const _before = new THREE.Vector3();

export interface SimUnitConfig {
  id: string;
  team: TeamId;
  ownerId: string;
  archetype: ArchetypeData;
  position: THREE.Vector3;
  /** Which of the team's spawn points this unit respawns at */
  spawnIndex: number;
}

export class SimUnit {
  // Identity
  public readonly id: string;
  public readonly team: TeamId;
  public readonly ownerId: string;
  public readonly archetype: ArchetypeData;
  public readonly maxHealth: number;
  public readonly spawnIndex: number;

  // Position & rotation
  public readonly simPosition: THREE.Vector3;
  public simRotationY = 0;
  public readonly velocity = new THREE.Vector3();

  // Core state
  private _health: number;
  private _state: UnitState = UnitState.Idle;
  private _targetId: string | null = null;
  private _lastAttackerId: string | null = null;

  // Movement
  private waypoints: THREE.Vector3[] = [];
  private waypointIndex = 0;
  /** Nav cell the target occupied when the chase route was planned */
  private chaseCell: number | null = null;

  // Timers (seconds)
  private attackCooldown = 0;
  private respawnTimer = 0;
  private abilityCooldown = 0;
  private chargeTimer = 0;
  private invulnerableTimer = 0;
  private stealthTimer = 0;
  private deathTick = -1;

  private readonly context: SimContext;

  constructor(config: SimUnitConfig, context: SimContext) {
    this.id = config.id;
    this.team = config.team;
    this.ownerId = config.ownerId;
    this.archetype = config.archetype;
    this.maxHealth = config.archetype.maxHealth;
    this.spawnIndex = config.spawnIndex;
    this.simPosition = config.position.clone();
    this._health = this.maxHealth;
    this.context = context;
  }

  // ─── Getters ─────────────────────────────────────────────────

  get health(): number { return this._health; }
  get state(): UnitState { return this._state; }
  get targetId(): string | null { return this._targetId; }
  get isAlive(): boolean { return !isDeadState(this._state); }
  get isInvulnerable(): boolean { return this.invulnerableTimer > 0; }
  get isStealthed(): boolean { return this.stealthTimer > 0; }
  get attackCooldownRemaining(): number { return Math.max(0, this.attackCooldown); }
  get abilityCooldownRemaining(): number { return Math.max(0, this.abilityCooldown); }
  get chargeRemaining(): number { return Math.max(0, this.chargeTimer); }
  get respawnRemaining(): number { return Math.max(0, this.respawnTimer); }
  get invulnerableRemaining(): number { return Math.max(0, this.invulnerableTimer); }
  get lastAttackerId(): string | null { return this._lastAttackerId; }
  /** Dead for at least one whole tick; until then it neither respawns nor leaves the store */
  get deathSettled(): boolean {
    return this._state === UnitState.Dead && this.deathTick < this.context.tick;
  }

  /** Remaining route, for plan metadata in snapshots */
  getRemainingWaypoints(): THREE.Vector3[] {
    return this.waypoints.slice(this.waypointIndex);
  }

  // ─── Health ──────────────────────────────────────────────────

  /**
   * Apply damage from an attack. Returns true if this hit killed the unit.
   * Only CombatResolver calls this, so the attacker's bookkeeping runs in
   * the same step.
   */
  applyDamage(amount: number, attackerId: string | null): boolean {
    if (!this.isAlive) return false;
    // Invulnerability discards the hit entirely
    if (this.invulnerableTimer > 0) return false;

    this._lastAttackerId = attackerId;
    this._health = this.checkedHealth(Math.max(0, this._health - amount));
    if (this._health === 0) {
      this.die(attackerId);
      return true;
    }
    return false;
  }

  heal(amount: number): void {
    if (!this.isAlive) return;
    this._health = this.checkedHealth(Math.min(this.maxHealth, this._health + amount));
  }

  private checkedHealth(value: number): number {
    return checkRange(
      value,
      0,
      this.maxHealth,
      `health of ${this.id}`,
      this.context.config.strictInvariants,
      violation => this.context.reportViolation(violation.message),
    );
  }

  private die(killerId: string | null): void {
    this._health = 0;
    this.attackCooldown = 0;
    this.abilityCooldown = 0;
    this.chargeTimer = 0;
    this.invulnerableTimer = 0;
    this.stealthTimer = 0;
    this._targetId = null;
    this.deathTick = this.context.tick;
    this.clearPath();
    this.setState(UnitState.Dead);
    this.context.emit({ type: 'unit_died', unitId: this.id, team: this.team, killerId });
  }

  // ─── Commands ────────────────────────────────────────────────

  /** Move to a point. Returns false if the command was not accepted. */
  setMoveCommand(target: THREE.Vector3): boolean {
    if (!this.isAlive) return false;
    this.cancelCharge();
    this._targetId = null;
    this.chaseCell = null;

    const path = this.context.findPath(this.simPosition, target);
    if (!path || path.length === 0) {
      // No route: hold position
      this.clearPath();
      this.setState(UnitState.Idle);
      return false;
    }

    this.waypoints = path;
    this.waypointIndex = 0;
    this.setState(UnitState.Moving);
    return true;
  }

  setAttackCommand(targetId: string): boolean {
    if (!this.isAlive) return false;
    if (targetId === this.id) return false;
    this.cancelCharge();
    this.clearPath();
    this._targetId = targetId;
    this.setState(UnitState.Attacking);
    return true;
  }

  /** Clear target, route and charge. A no-op on a unit that is already idle. */
  stop(): boolean {
    if (!this.isAlive) return false;
    this.cancelCharge();
    this._targetId = null;
    this.clearPath();
    this.setState(UnitState.Idle);
    return true;
  }

  /** Begin charging the archetype's ability */
  startAbility(): boolean {
    if (!this.isAlive) return false;
    const ability = this.archetype.ability;
    if (!ability) return false;
    if (this.abilityCooldown > 0) return false;
    if (this._state === UnitState.ChargingAbility) return false;

    this._targetId = null;
    this.clearPath();
    this.chargeTimer = ability.chargeTime;
    this.setState(UnitState.ChargingAbility);
    return true;
  }

  resetAttackCooldown(): void {
    this.attackCooldown = this.archetype.attackCooldown;
  }

  // ─── Fixed Update (Main Simulation Tick) ─────────────────────

  fixedUpdate(dt: number): void {
    this.tickTimers(dt);

    switch (this._state) {
      case UnitState.Dead:
        this.processDead();
        break;
      case UnitState.Respawning:
        this.processRespawning(dt);
        break;
      case UnitState.Idle:
        this.processIdle();
        break;
      case UnitState.Moving:
        this.processMoving(dt);
        break;
      case UnitState.Attacking:
        this.processAttack(dt);
        break;
      case UnitState.ChargingAbility:
        this.processCharging(dt);
        break;
    }
  }

  private tickTimers(dt: number): void {
    if (this.attackCooldown > 0) this.attackCooldown -= dt;
    if (this.abilityCooldown > 0) this.abilityCooldown -= dt;
    if (this.invulnerableTimer > 0) this.invulnerableTimer = Math.max(0, this.invulnerableTimer - dt);
    if (this.stealthTimer > 0) this.stealthTimer = Math.max(0, this.stealthTimer - dt);
  }

  private processDead(): void {
    // A unit killed this tick stays Dead until the next one, whether or not
    // its killer updated first. Without respawn the world removes it instead.
    if (!this.deathSettled || !this.context.config.respawnEnabled) return;
    this.respawnTimer = this.archetype.respawnDelay ?? this.context.config.respawnDelay;
    this.setState(UnitState.Respawning);
  }

  private processRespawning(dt: number): void {
    this.respawnTimer -= dt;
    if (this.respawnTimer > 0) return;

    this.respawnTimer = 0;
    this._health = this.maxHealth;
    this._lastAttackerId = null;
    this.simPosition.copy(this.context.getSpawnPoint(this.team, this.spawnIndex));
    this.velocity.set(0, 0, 0);
    this.invulnerableTimer = this.context.config.invulnerabilityDuration;
    this.setState(UnitState.Idle);
    this.context.emit({
      type: 'unit_respawned',
      unitId: this.id,
      team: this.team,
      x: this.simPosition.x,
      z: this.simPosition.z,
    });
  }

  private processIdle(): void {
    this.velocity.set(0, 0, 0);
    const enemy = this.findNearestVisibleEnemy();
    if (enemy) {
      this._targetId = enemy.id;
      this.processAttack(0);
    }
  }

  private processMoving(dt: number): void {
    if (this._targetId) {
      this.processAttack(dt);
      return;
    }

    const enemy = this.findNearestVisibleEnemy();
    if (enemy) {
      this.clearPath();
      this._targetId = enemy.id;
      this.processAttack(dt);
      return;
    }

    this.advanceAlongPath(dt);
    if (this.waypointIndex >= this.waypoints.length) {
      this.clearPath();
      this.setState(UnitState.Idle);
    }
  }

  private processAttack(dt: number): void {
    const target = this.resolveTarget();
    if (!target) {
      this._targetId = null;
      this.clearPath();
      this.velocity.set(0, 0, 0);
      this.setState(UnitState.Idle);
      return;
    }

    _toTarget.subVectors(target.simPosition, this.simPosition);
    _toTarget.y = 0;
    const distance = _toTarget.length();

    if (distance > this.archetype.attackRange) {
      // Chase the target's current position, repathing when it changes nav cell
      const targetCell = this.context.navCellOf(target.simPosition);
      if (this.chaseCell !== targetCell || this.waypointIndex >= this.waypoints.length) {
        const path = this.context.findPath(this.simPosition, target.simPosition);
        if (!path || path.length === 0) {
          this._targetId = null;
          this.clearPath();
          this.velocity.set(0, 0, 0);
          this.setState(UnitState.Idle);
          return;
        }
        this.waypoints = path;
        this.waypointIndex = 0;
        this.chaseCell = targetCell;
      }
      this.setState(UnitState.Moving);
      this.advanceAlongPath(dt);
      return;
    }

    this.clearPath();
    this.velocity.set(0, 0, 0);
    if (distance > 0) this.simRotationY = headingTo(_toTarget.x, _toTarget.z);
    this.setState(UnitState.Attacking);

    if (this.attackCooldown <= 0) {
      resolveAttack(this, target);
    }
  }

  private processCharging(dt: number): void {
    this.velocity.set(0, 0, 0);
    this.chargeTimer -= dt;
    if (this.chargeTimer > 0) return;

    const ability = this.archetype.ability;
    this.chargeTimer = 0;
    if (!ability) {
      this.setState(UnitState.Idle);
      return;
    }

    if (ability.kind === 'cloak') {
      this.stealthTimer = ability.duration;
    } else {
      for (const ally of this.context.getUnitsInRadius(this.simPosition, ability.radius, this.team)) {
        ally.heal(ability.amount);
      }
    }

    this.abilityCooldown = ability.cooldown;
    this.context.emit({ type: 'ability_completed', unitId: this.id, abilityId: ability.id });
    this.setState(UnitState.Idle);
  }

  // ─── Targeting ───────────────────────────────────────────────

  /** Resolve the weak target reference; null when it is no longer a legal target */
  private resolveTarget(): SimUnit | null {
    if (!this._targetId) return null;
    const target = this.context.getUnit(this._targetId);
    if (!target || !target.isAlive) return null;
    if (target.team === this.team) return null;
    if (!this.context.isUnitVisibleTo(this.team, target)) return null;
    return target;
  }

  /** Nearest visible enemy within this unit's vision range; ties go to the lowest id */
  private findNearestVisibleEnemy(): SimUnit | null {
    const candidates = this.context.getUnitsInRadius(
      this.simPosition,
      this.archetype.visionRange,
      opposingTeam(this.team),
    );

    let best: SimUnit | null = null;
    let bestDistSq = Infinity;
    for (const enemy of candidates) {
      if (!enemy.isAlive) continue;
      if (!this.context.isUnitVisibleTo(this.team, enemy)) continue;
      const dx = enemy.simPosition.x - this.simPosition.x;
      const dz = enemy.simPosition.z - this.simPosition.z;
      const distSq = dx * dx + dz * dz;
      if (
        distSq < bestDistSq ||
        (distSq === bestDistSq && best !== null && compareEntityId(enemy.id, best.id) < 0)
      ) {
        best = enemy;
        bestDistSq = distSq;
      }
    }
    return best;
  }

  // ─── Movement ────────────────────────────────────────────────

  private advanceAlongPath(dt: number): void {
    _before.copy(this.simPosition);
    let budget = this.archetype.speed * dt;

    while (budget > 0 && this.waypointIndex < this.waypoints.length) {
      const waypoint = this.waypoints[this.waypointIndex]!;
      const dx = waypoint.x - this.simPosition.x;
      const dz = waypoint.z - this.simPosition.z;
      const dist = Math.sqrt(dx * dx + dz * dz);

      if (dist > 0) this.simRotationY = headingTo(dx, dz);

      if (dist <= budget) {
        this.simPosition.x = waypoint.x;
        this.simPosition.z = waypoint.z;
        budget -= dist;
        this.waypointIndex++;
      } else {
        this.simPosition.x += (dx / dist) * budget;
        this.simPosition.z += (dz / dist) * budget;
        budget = 0;
      }
    }

    if (dt > 0) {
      this.velocity.subVectors(this.simPosition, _before).divideScalar(dt);
    }
  }

  private clearPath(): void {
    this.waypoints = [];
    this.waypointIndex = 0;
    this.chaseCell = null;
  }

  private cancelCharge(): void {
    if (this._state === UnitState.ChargingAbility) {
      this.chargeTimer = 0;
    }
  }

  // ─── State ───────────────────────────────────────────────────

  private setState(next: UnitState): void {
    if (next === this._state) return;
    const from = this._state;
    this._state = next;
    this.context.emit({ type: 'unit_state_changed', unitId: this.id, from, to: next });
  }
}
