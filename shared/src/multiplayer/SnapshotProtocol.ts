/**
 * SnapshotProtocol - Host → observer messages.
 *
 * Two channels:
 * - `snapshot` (unreliable): per-observer filtered world state, sent every
 *   broadcast interval. A dropped snapshot is simply superseded.
 * - `event` (reliable, ordered): domain events and session messages, each
 *   wrapped in an envelope carrying a per-observer sequence number.
 */

import type { TeamId } from '../data/types';
import type { UnitState } from '../simulation/UnitState';
import type { CaptureStatus } from '../simulation/ControlPoint';

// ─── Snapshots ───────────────────────────────────────────────────

interface UnitSnapshotBase {
  id: string;
  team: TeamId;
  archetype: string;
  x: number;
  z: number;
  rotation: number;
  health: number;
  maxHealth: number;
  state: UnitState;
}

export interface AbilitySnapshot {
  id: string;
  cooldown: number;
  charge: number;
}

/** Own-team unit: everything the owner needs to drive its UI */
export interface FullUnitSnapshot extends UnitSnapshotBase {
  detail: 'full';
  ownerId: string;
  vx: number;
  vz: number;
  targetId: string | null;
  attackCooldown: number;
  ability: AbilitySnapshot | null;
  invulnerable: boolean;
  stealthed: boolean;
  respawnRemaining: number;
  /**
   * Intent text of an in-flight AI translation. Present while pending;
   * `null` once, on the first snapshot after the translation settled.
   * Absent otherwise.
   */
  pendingCommand?: string | null;
}

/** Visible enemy unit: position and outward state only */
export interface ReducedUnitSnapshot extends UnitSnapshotBase {
  detail: 'reduced';
}

export type UnitSnapshot = FullUnitSnapshot | ReducedUnitSnapshot;

export interface ControlPointSnapshot {
  id: string;
  x: number;
  z: number;
  radius: number;
  value: number;
  captureValue: number;
  controller: TeamId | null;
  status: CaptureStatus;
}

export interface VisionLayer {
  cols: number;
  rows: number;
  cellSize: number;
  version: number;
  /** Bit-packed grid, base64 */
  data: string;
  keyframe: boolean;
}

export interface StateSnapshot {
  tick: number;
  serverTime: number;
  team: TeamId;
  units: UnitSnapshot[];
  controlPoints: ControlPointSnapshot[];
  vision?: VisionLayer | undefined;
}

// ─── Reliable events ─────────────────────────────────────────────

export type TeamRoster = Record<TeamId, Array<{ playerId: string; name: string }>>;

export interface LobbyPlayerInfo {
  playerId: string;
  name: string;
  team: TeamId;
  ready: boolean;
  teammateId: string | null;
}

export type MatchEndReason = 'victory' | 'disconnect' | 'shutdown' | 'error';

export type DomainEvent =
  | { type: 'unit_died'; unitId: string; team: TeamId; killerId: string | null }
  | { type: 'unit_respawned'; unitId: string; team: TeamId; x: number; z: number }
  | { type: 'control_point_captured'; pointId: string; team: TeamId }
  | { type: 'control_point_neutralized'; pointId: string; previousTeam: TeamId }
  | { type: 'victory'; winner: TeamId; condition: string }
  | { type: 'match_started'; mapId: string; modeId: string; teams: TeamRoster }
  | { type: 'match_ended'; winner: TeamId | null; reason: MatchEndReason };

export type SessionMessage =
  | { type: 'lobby_joined'; code: string; playerId: string; team: TeamId; players: LobbyPlayerInfo[] }
  | { type: 'lobby_updated'; code: string; players: LobbyPlayerInfo[] }
  | { type: 'teammate_left'; playerId: string }
  | { type: 'command_rejected'; reason: string }
  | { type: 'rate_limit_exceeded'; messageType: string; retryAfter: number }
  | { type: 'notice'; message: string }
  | { type: 'error'; error: string };

export type ServerEvent = DomainEvent | SessionMessage;

export interface EventEnvelope {
  seq: number;
  tick: number;
  event: ServerEvent;
}

const DOMAIN_EVENT_TYPES: ReadonlySet<string> = new Set([
  'unit_died',
  'unit_respawned',
  'control_point_captured',
  'control_point_neutralized',
  'victory',
  'match_started',
  'match_ended',
]);

export function isDomainEvent(event: ServerEvent): event is DomainEvent {
  return DOMAIN_EVENT_TYPES.has(event.type);
}

// ─── Vision grid packing ─────────────────────────────────────────

/** Pack a 0/1 grid into bits (LSB first) and base64-encode it */
export function encodeVisionGrid(cells: Uint8Array): string {
  const bytes = new Uint8Array(Math.ceil(cells.length / 8));
  for (let i = 0; i < cells.length; i++) {
    if (cells[i] !== 0) {
      bytes[i >> 3] = bytes[i >> 3]! | (1 << (i & 7));
    }
  }
  let binary = '';
  for (let i = 0; i < bytes.length; i++) {
    binary += String.fromCharCode(bytes[i]!);
  }
  return btoa(binary);
}

/** Inverse of encodeVisionGrid; `length` is the cell count (cols × rows) */
export function decodeVisionGrid(data: string, length: number): Uint8Array {
  const binary = atob(data);
  const cells = new Uint8Array(length);
  for (let i = 0; i < length; i++) {
    const byte = binary.charCodeAt(i >> 3);
    if (Number.isNaN(byte)) break;
    cells[i] = (byte >> (i & 7)) & 1;
  }
  return cells;
}
