/**
 * Core data types shared by the simulation, the server and observers.
 */

// ─── Teams ───────────────────────────────────────────────────────

export type TeamId = 'A' | 'B';

export const TEAM_IDS: readonly TeamId[] = ['A', 'B'] as const;

export function opposingTeam(team: TeamId): TeamId {
  return team === 'A' ? 'B' : 'A';
}

// ─── Archetypes ──────────────────────────────────────────────────

export type AbilityKind = 'cloak' | 'repair';

export interface AbilityData {
  id: string;
  kind: AbilityKind;
  /** Seconds spent in ChargingAbility before the effect applies */
  chargeTime: number;
  /** Seconds before the ability can be charged again */
  cooldown: number;
  /** Effect radius (repair) */
  radius: number;
  /** Health restored per unit (repair) */
  amount: number;
  /** Effect duration in seconds (cloak) */
  duration: number;
}

export interface ArchetypeData {
  id: string;
  name: string;
  maxHealth: number;
  speed: number;
  attackRange: number;
  attackDamage: number;
  /** Seconds between attacks */
  attackCooldown: number;
  visionRange: number;
  /** Footprint radius used for visibility checks */
  radius: number;
  /** Overrides the mode's respawn delay when set */
  respawnDelay?: number | undefined;
  ability?: AbilityData | undefined;
}

// ─── Map layout ──────────────────────────────────────────────────

export interface ControlPointDef {
  id: string;
  x: number;
  z: number;
  /** Strategic (victory) weight */
  value: number;
  radius?: number | undefined;
  tags?: string[] | undefined;
}

export interface MapPoint {
  x: number;
  z: number;
}

/**
 * Map layout handed over by the map generator at match setup.
 * World coordinates span [0, width] × [0, height].
 */
export interface MapLayout {
  id: string;
  width: number;
  height: number;
  /** Navigation grid resolution (meters per cell) */
  navCellSize: number;
  /** Blocked navigation cells as [col, row] pairs */
  blocked: Array<[number, number]>;
  controlPoints: ControlPointDef[];
  spawnPoints: Record<TeamId, MapPoint[]>;
}

// ─── Game modes ──────────────────────────────────────────────────

export type VictoryConditionDef =
  | { type: 'control_count'; count: number }
  | { type: 'keystone'; pointId: string; quota: number }
  | { type: 'point_set'; pointIds: string[] }
  | { type: 'strategic_value'; threshold: number };

export interface SquadEntry {
  archetype: string;
  count: number;
}

export interface GameModeData {
  id: string;
  name: string;
  /** Capture value change per second per unit of advantage */
  captureRate: number;
  /** Default capture radius for points that do not declare one */
  captureRadius: number;
  respawnEnabled: boolean;
  /** Seconds in Respawning before a unit returns */
  respawnDelay: number;
  /** Seconds of invulnerability after respawn */
  invulnerabilityDuration: number;
  /** Squad spawned for every player at match start */
  squad: SquadEntry[];
  /** Evaluated in order; the first satisfied condition wins */
  victoryConditions: VictoryConditionDef[];
  /** Safety-net victory poll interval in seconds (0 disables polling) */
  victoryPollInterval: number;
}

// ─── Simulation configuration ────────────────────────────────────

export interface SimConfig {
  captureRate: number;
  captureRadius: number;
  respawnEnabled: boolean;
  respawnDelay: number;
  invulnerabilityDuration: number;
  victoryPollInterval: number;
  /** Visibility grid resolution (meters per cell) */
  visionCellSize: number;
  /** Distance at which stealthed enemies are revealed */
  stealthDetectionRange: number;
  /** Spacing between formation slots */
  formationSpacing: number;
  /** Throw on consistency violations instead of clamping */
  strictInvariants: boolean;
}

export const GAME_CONSTANTS = {
  CAPTURE_RATE: 0.2, // per second per unit of advantage
  CAPTURE_RADIUS: 10,
  RESPAWN_DELAY: 20, // seconds
  INVULNERABILITY_DURATION: 3, // seconds
  VICTORY_POLL_INTERVAL: 5, // seconds
  VISION_CELL_SIZE: 2,
  STEALTH_DETECTION_RANGE: 8,
  FORMATION_SPACING: 3,
  MAX_TEAM_SIZE: 2,
} as const;

export const DEFAULT_SIM_CONFIG: SimConfig = {
  captureRate: GAME_CONSTANTS.CAPTURE_RATE,
  captureRadius: GAME_CONSTANTS.CAPTURE_RADIUS,
  respawnEnabled: true,
  respawnDelay: GAME_CONSTANTS.RESPAWN_DELAY,
  invulnerabilityDuration: GAME_CONSTANTS.INVULNERABILITY_DURATION,
  victoryPollInterval: GAME_CONSTANTS.VICTORY_POLL_INTERVAL,
  visionCellSize: GAME_CONSTANTS.VISION_CELL_SIZE,
  stealthDetectionRange: GAME_CONSTANTS.STEALTH_DETECTION_RANGE,
  formationSpacing: GAME_CONSTANTS.FORMATION_SPACING,
  strictInvariants: false,
};

/** Build a SimConfig from a game mode, keeping defaults for fields the mode does not cover */
export function simConfigFromMode(mode: GameModeData, overrides: Partial<SimConfig> = {}): SimConfig {
  return {
    ...DEFAULT_SIM_CONFIG,
    captureRate: mode.captureRate,
    captureRadius: mode.captureRadius,
    respawnEnabled: mode.respawnEnabled,
    respawnDelay: mode.respawnDelay,
    invulnerabilityDuration: mode.invulnerabilityDuration,
    victoryPollInterval: mode.victoryPollInterval,
    ...overrides,
  };
}
