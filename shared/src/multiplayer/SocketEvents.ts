/**
 * SocketEvents - socket.io event names and typed event maps.
 */

import type { GameCommand } from './CommandProtocol';
import type { EventEnvelope, StateSnapshot } from './SnapshotProtocol';

export const EVENTS = {
  // client → host
  C_HOST_LOBBY: 'host_lobby',
  C_JOIN_LOBBY: 'join_lobby',
  C_LEAVE_LOBBY: 'leave_lobby',
  C_SET_READY: 'set_ready',
  C_COMMAND: 'command',
  C_INTENT: 'intent',
  // host → client
  S_EVENT: 'event',
  S_SNAPSHOT: 'snapshot',
  S_REQUEST_FAILED: 'request_failed',
} as const;

export interface HostLobbyPayload {
  playerName: string;
}

export interface JoinLobbyPayload {
  code: string;
  playerName: string;
}

export interface SetReadyPayload {
  ready: boolean;
}

export interface CommandPayload {
  command: GameCommand;
}

export interface IntentPayload {
  text: string;
  unitIds: string[];
}

/** A request that could not be tied to a lobby, so no envelope applies */
export interface RequestFailedPayload {
  request: string;
  error: string;
}

export interface ServerToClientEvents {
  [EVENTS.S_EVENT]: (envelope: EventEnvelope) => void;
  [EVENTS.S_SNAPSHOT]: (snapshot: StateSnapshot) => void;
  [EVENTS.S_REQUEST_FAILED]: (payload: RequestFailedPayload) => void;
}

export interface ClientToServerEvents {
  [EVENTS.C_HOST_LOBBY]: (payload: HostLobbyPayload) => void;
  [EVENTS.C_JOIN_LOBBY]: (payload: JoinLobbyPayload) => void;
  [EVENTS.C_LEAVE_LOBBY]: () => void;
  [EVENTS.C_SET_READY]: (payload: SetReadyPayload) => void;
  [EVENTS.C_COMMAND]: (payload: CommandPayload) => void;
  [EVENTS.C_INTENT]: (payload: IntentPayload) => void;
}
