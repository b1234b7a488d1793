/**
 * @holdfast/shared - Shared game logic package
 *
 * Pure simulation, data types and wire protocol used by both
 * the authoritative host and observers.
 */

// Core
export type { SimContext } from './core/SimContext';

// Data types
export * from './data/types';

// Multiplayer protocol
export {
  CommandType,
  createMoveCommand,
  createAttackCommand,
  createStopCommand,
  createFormationCommand,
  createAbilityCommand,
  describeCommand,
} from './multiplayer/CommandProtocol';
export type {
  GameCommand,
  MoveCommand,
  AttackCommand,
  StopCommand,
  FormationCommand,
  AbilityCommand,
  GroundPoint,
  CommandSource,
  QueuedCommand,
} from './multiplayer/CommandProtocol';
export { encodeVisionGrid, decodeVisionGrid, isDomainEvent } from './multiplayer/SnapshotProtocol';
export type {
  StateSnapshot,
  UnitSnapshot,
  FullUnitSnapshot,
  ReducedUnitSnapshot,
  AbilitySnapshot,
  ControlPointSnapshot,
  VisionLayer,
  DomainEvent,
  SessionMessage,
  ServerEvent,
  EventEnvelope,
  TeamRoster,
  LobbyPlayerInfo,
  MatchEndReason,
} from './multiplayer/SnapshotProtocol';
export { EVENTS } from './multiplayer/SocketEvents';
export type {
  ClientToServerEvents,
  ServerToClientEvents,
  HostLobbyPayload,
  JoinLobbyPayload,
  SetReadyPayload,
  CommandPayload,
  IntentPayload,
  RequestFailedPayload,
} from './multiplayer/SocketEvents';

// Simulation
export { SimWorld } from './simulation/SimWorld';
export type { SimWorldOptions } from './simulation/SimWorld';
export { SimUnit } from './simulation/SimUnit';
export type { SimUnitConfig } from './simulation/SimUnit';
export { UnitState, isDeadState } from './simulation/UnitState';
export { EntityStore } from './simulation/EntityStore';
export type { SpawnUnitSpec } from './simulation/EntityStore';
export { ControlPoint, controllerOf } from './simulation/ControlPoint';
export type { CaptureStatus } from './simulation/ControlPoint';
export { SimCaptureManager } from './simulation/SimCaptureManager';
export { SimVisionManager, countChangedCells } from './simulation/SimVisionManager';
export { SimEventQueue } from './simulation/SimEventQueue';
export type { SimEvent, SimEventType, SimEventListener } from './simulation/SimEventQueue';
export { resolveAttack } from './simulation/CombatResolver';
export type { AttackResult } from './simulation/CombatResolver';
export {
  VictoryEvaluator,
  buildVictoryCondition,
  controlCountCondition,
  keystoneCondition,
  pointSetCondition,
  strategicValueCondition,
} from './simulation/VictoryConditions';
export type { VictoryCondition, VictoryResult } from './simulation/VictoryConditions';
export { NavGrid } from './simulation/NavGrid';
export type { GridCell } from './simulation/NavGrid';
export { computeFormationSlots, FORMATION_LAYOUTS } from './simulation/formations';
export type { FormationLayout } from './simulation/formations';

// Utils
export { compareEntityId } from './utils/idSort';
export { InvariantViolation, checkRange, clamp } from './utils/invariant';
export type { ViolationHandler } from './utils/invariant';
export { normalizeAngle, shortestAngleDelta, lerpAngle, lerp, headingTo } from './utils/angles';
