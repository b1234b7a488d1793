/**
 * SocketTransport - socket.io adapter between connections and the session manager.
 *
 * Reliable events go out as ordinary emits. Snapshots use volatile emits,
 * which socket.io drops when the connection cannot take them right away.
 */

import type { Server, Socket } from 'socket.io';
import { EVENTS } from '@shared/multiplayer/SocketEvents';
import type { ClientToServerEvents, ServerToClientEvents } from '@shared/multiplayer/SocketEvents';
import type { EventEnvelope, StateSnapshot } from '@shared/multiplayer/SnapshotProtocol';
import type { ObserverChannel } from '../game/GameSession';
import type { GameSessionManager } from '../game/GameSessionManager';
import type { Logger } from '../logger';

export type GameServer = Server<ClientToServerEvents, ServerToClientEvents>;
type GameSocket = Socket<ClientToServerEvents, ServerToClientEvents>;

export class SocketTransport implements ObserverChannel {
  private readonly io: GameServer;
  private readonly log: Logger;

  constructor(io: GameServer, log: Logger) {
    this.io = io;
    this.log = log.child({ module: 'transport' });
  }

  /** Start routing connections to the manager */
  attach(manager: GameSessionManager): void {
    this.io.on('connection', socket => this.onConnection(socket, manager));
  }

  sendEvent(connectionId: string, envelope: EventEnvelope): void {
    this.io.to(connectionId).emit(EVENTS.S_EVENT, envelope);
  }

  sendSnapshot(connectionId: string, snapshot: StateSnapshot): void {
    this.io.to(connectionId).volatile.emit(EVENTS.S_SNAPSHOT, snapshot);
  }

  get connectionCount(): number {
    return this.io.of('/').sockets.size;
  }

  private onConnection(socket: GameSocket, manager: GameSessionManager): void {
    const connectionId = socket.id;
    this.log.info({ connectionId, address: socket.handshake.address }, 'Client connected');

    const fail = (request: string, error: string): void => {
      socket.emit(EVENTS.S_REQUEST_FAILED, { request, error });
    };

    socket.on(EVENTS.C_HOST_LOBBY, (payload: unknown) => {
      const result = manager.hostLobby(connectionId, payload);
      if (!result.success) fail(EVENTS.C_HOST_LOBBY, result.error);
    });

    socket.on(EVENTS.C_JOIN_LOBBY, (payload: unknown) => {
      const result = manager.joinLobby(connectionId, payload);
      if (!result.success) fail(EVENTS.C_JOIN_LOBBY, result.error);
    });

    socket.on(EVENTS.C_LEAVE_LOBBY, () => {
      manager.leaveLobby(connectionId);
    });

    socket.on(EVENTS.C_SET_READY, (payload: unknown) => {
      const result = manager.setReady(connectionId, payload);
      if (!result.success) fail(EVENTS.C_SET_READY, result.error);
    });

    // Rejections inside a lobby come back as enveloped events from the session
    socket.on(EVENTS.C_COMMAND, (payload: unknown) => {
      const result = manager.submitCommand(connectionId, payload);
      if (!result.success && !manager.getSessionForConnection(connectionId)) {
        fail(EVENTS.C_COMMAND, result.error);
      }
    });

    socket.on(EVENTS.C_INTENT, (payload: unknown) => {
      const result = manager.submitIntent(connectionId, payload);
      if (!result.success && !manager.getSessionForConnection(connectionId)) {
        fail(EVENTS.C_INTENT, result.error);
      }
    });

    socket.on('disconnect', reason => {
      this.log.info({ connectionId, reason }, 'Client disconnected');
      manager.handleDisconnect(connectionId);
    });
  }

  /** Disconnect every client and stop accepting new ones */
  async close(): Promise<void> {
    await this.io.close();
  }
}
