/**
 * ObserverClient - socket.io connection from an observer to the match host.
 *
 * Feeds incoming snapshots and event envelopes into a ShadowWorld and
 * exposes the lobby and command requests as plain methods.
 */

import { io, type Socket } from 'socket.io-client';
import { EVENTS } from '@shared/multiplayer/SocketEvents';
import type {
  ClientToServerEvents,
  RequestFailedPayload,
  ServerToClientEvents,
} from '@shared/multiplayer/SocketEvents';
import type { GameCommand } from '@shared/multiplayer/CommandProtocol';
import { ShadowWorld, type ShadowWorldOptions } from './ShadowWorld';

export type ObserverSocket = Socket<ServerToClientEvents, ClientToServerEvents>;

export interface ObserverClientOptions {
  url: string;
  shadow?: Partial<ShadowWorldOptions>;
  onRequestFailed?: (payload: RequestFailedPayload) => void;
  /** Injected socket, for tests */
  socket?: ObserverSocket;
}

export class ObserverClient {
  readonly world: ShadowWorld;
  private readonly socket: ObserverSocket;
  private readonly onRequestFailed: ((payload: RequestFailedPayload) => void) | undefined;

  constructor(options: ObserverClientOptions) {
    this.world = new ShadowWorld(options.shadow);
    this.onRequestFailed = options.onRequestFailed;
    this.socket = options.socket ?? io(options.url, { autoConnect: false, transports: ['websocket'] });

    this.socket.on('connect', () => {
      this.world.resetSequence();
    });
    this.socket.on(EVENTS.S_SNAPSHOT, snapshot => {
      this.world.applySnapshot(snapshot);
    });
    this.socket.on(EVENTS.S_EVENT, envelope => {
      this.world.applyEvent(envelope);
    });
    this.socket.on(EVENTS.S_REQUEST_FAILED, payload => {
      this.onRequestFailed?.(payload);
    });
  }

  connect(): void {
    this.socket.connect();
  }

  disconnect(): void {
    this.socket.disconnect();
  }

  get connected(): boolean {
    return this.socket.connected;
  }

  // ─── Requests ─────────────────────────────────────────────────

  hostLobby(playerName: string): void {
    this.socket.emit(EVENTS.C_HOST_LOBBY, { playerName });
  }

  joinLobby(code: string, playerName: string): void {
    this.socket.emit(EVENTS.C_JOIN_LOBBY, { code, playerName });
  }

  leaveLobby(): void {
    this.socket.emit(EVENTS.C_LEAVE_LOBBY);
  }

  setReady(ready: boolean): void {
    this.socket.emit(EVENTS.C_SET_READY, { ready });
  }

  sendCommand(command: GameCommand): void {
    this.socket.emit(EVENTS.C_COMMAND, { command });
  }

  sendIntent(text: string, unitIds: string[]): void {
    this.socket.emit(EVENTS.C_INTENT, { text, unitIds });
  }
}
