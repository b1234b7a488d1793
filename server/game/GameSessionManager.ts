/**
 * GameSessionManager - Creates and manages lobbies and their matches.
 *
 * Entry point for everything a connection can ask for. Looks sessions up
 * by lobby code and by connection, applies per-connection rate limits,
 * validates payloads and reports load for the health endpoint.
 */

import type { TeamId } from '@shared/data/types';
import type { MatchEndReason } from '@shared/multiplayer/SnapshotProtocol';
import { GameSession, ConnectionState, EventSequencer } from './GameSession';
import type { MatchSetup, ObserverChannel, SessionResult } from './GameSession';
import type { IntentDispatcher } from './CommandTranslator';
import { RateLimiter } from '../RateLimiter';
import {
  commandMessageSchema,
  hostLobbySchema,
  intentMessageSchema,
  joinLobbySchema,
  setReadySchema,
} from '../validation/schemas';
import type { Logger } from '../logger';

/** Intent budget is counted per minute */
const INTENT_WINDOW_MS = 60_000;

export interface GameSessionManagerConfig {
  channel: ObserverChannel;
  createMatch: () => MatchSetup;
  dispatcher: IntentDispatcher;
  log: Logger;
  maxConcurrentGames: number;
  commandRateLimit: number;
  commandRateWindowMs: number;
  intentRateLimit: number;
  autoStartLoop?: boolean;
  random?: () => number;
  now?: () => number;
}

export type LobbyResult = { success: true; code: string; team: TeamId } | { success: false; error: string };

export type SubmitResult =
  | { success: true }
  | { success: false; error: string; kind: 'rate_limited'; retryAfter: number }
  | { success: false; error: string; kind: 'invalid' | 'not_in_match' };

export interface LoadInfo {
  activeGames: number;
  runningMatches: number;
  maxGames: number;
  activePlayers: number;
}

export class GameSessionManager {
  private readonly sessions: Map<string, GameSession> = new Map(); // lobbyCode -> session
  private readonly connections: Map<string, string> = new Map(); // connectionId -> lobbyCode
  private readonly config: GameSessionManagerConfig;
  private readonly log: Logger;
  private readonly commandLimiter: RateLimiter;
  private readonly intentLimiter: RateLimiter;
  /** One numbering per connection across every lobby it joins */
  private readonly sequencer = new EventSequencer();
  private readonly random: () => number;
  private readonly now: () => number;

  constructor(config: GameSessionManagerConfig) {
    this.config = config;
    this.log = config.log.child({ module: 'sessions' });
    this.random = config.random ?? Math.random;
    this.now = config.now ?? Date.now;
    this.commandLimiter = new RateLimiter({
      capacity: config.commandRateLimit,
      windowMs: config.commandRateWindowMs,
      now: this.now,
    });
    this.intentLimiter = new RateLimiter({
      capacity: config.intentRateLimit,
      windowMs: INTENT_WINDOW_MS,
      now: this.now,
    });
  }

  // ─── Lobbies ──────────────────────────────────────────────────

  generateLobbyCode(): string {
    const letters = 'ABCDEFGHIJKLMNOPQRSTUVWXYZ';
    const numbers = '0123456789';

    let code: string;
    do {
      let letterPart = '';
      let numberPart = '';
      for (let i = 0; i < 4; i++) {
        letterPart += letters[Math.floor(this.random() * letters.length)] ?? 'A';
        numberPart += numbers[Math.floor(this.random() * numbers.length)] ?? '0';
      }
      code = `${letterPart}-${numberPart}`;
    } while (this.sessions.has(code));

    return code;
  }

  hostLobby(connectionId: string, payload: unknown): LobbyResult {
    const parsed = hostLobbySchema.safeParse(payload);
    if (!parsed.success) {
      return { success: false, error: `Invalid request: ${parsed.error.issues[0]?.message ?? 'invalid'}` };
    }
    if (this.connections.has(connectionId)) {
      return { success: false, error: 'Already in a lobby' };
    }
    if (!this.hasCapacity()) {
      this.log.warn({ max: this.config.maxConcurrentGames }, 'Max concurrent games reached');
      return { success: false, error: 'Server is at maximum game capacity' };
    }

    const code = this.generateLobbyCode();
    const session = new GameSession({
      code,
      channel: this.config.channel,
      createMatch: this.config.createMatch,
      dispatcher: this.config.dispatcher,
      log: this.config.log,
      sequencer: this.sequencer,
      autoStartLoop: this.config.autoStartLoop ?? true,
      now: this.now,
      onMatchEnded: (sess, winner, reason) => this.onMatchEnded(sess, winner, reason),
    });
    this.sessions.set(code, session);

    const seated = session.addPlayer(connectionId, parsed.data.playerName, ConnectionState.Hosting);
    if (!seated.success) {
      this.sessions.delete(code);
      return seated;
    }
    this.connections.set(connectionId, code);

    this.log.info({ code, active: this.sessions.size }, 'Lobby created');
    return { success: true, code, team: seated.team };
  }

  joinLobby(connectionId: string, payload: unknown): LobbyResult {
    const parsed = joinLobbySchema.safeParse(payload);
    if (!parsed.success) {
      return { success: false, error: `Invalid request: ${parsed.error.issues[0]?.message ?? 'invalid'}` };
    }
    if (this.connections.has(connectionId)) {
      return { success: false, error: 'Already in a lobby' };
    }

    const { code, playerName } = parsed.data;
    const session = this.sessions.get(code);
    if (!session) return { success: false, error: 'Lobby not found' };

    const seated = session.addPlayer(connectionId, playerName, ConnectionState.Joining);
    if (!seated.success) return seated;

    this.connections.set(connectionId, code);
    return { success: true, code, team: seated.team };
  }

  leaveLobby(connectionId: string): void {
    this.removeConnection(connectionId, 'left');
  }

  /** Connection lost: same as leaving, plus rate limit and sequence state is dropped */
  handleDisconnect(connectionId: string): void {
    this.removeConnection(connectionId, 'disconnect');
    this.commandLimiter.clear(connectionId);
    this.intentLimiter.clear(connectionId);
    this.sequencer.forget(connectionId);
  }

  setReady(connectionId: string, payload: unknown): SessionResult {
    const parsed = setReadySchema.safeParse(payload);
    if (!parsed.success) return { success: false, error: 'Invalid request: ready must be a boolean' };
    const session = this.getSessionForConnection(connectionId);
    if (!session) return { success: false, error: 'Not in a lobby' };
    return session.setReady(connectionId, parsed.data.ready);
  }

  private removeConnection(connectionId: string, reason: 'left' | 'disconnect'): void {
    const code = this.connections.get(connectionId);
    if (!code) return;
    this.connections.delete(connectionId);

    const session = this.sessions.get(code);
    if (!session) return;
    session.removePlayer(connectionId, reason);

    if (session.isEmpty) {
      this.destroySession(code);
    }
  }

  // ─── Commands ─────────────────────────────────────────────────

  /** Rate limit, validate, then queue a manual command for the next tick */
  submitCommand(connectionId: string, payload: unknown): SubmitResult {
    if (!this.commandLimiter.tryConsume(connectionId)) {
      return this.rateLimited(connectionId, 'command', this.commandLimiter.getRetryAfter(connectionId));
    }

    const session = this.getSessionForConnection(connectionId);
    const parsed = commandMessageSchema.safeParse(payload);
    if (!parsed.success) {
      const error = `Malformed command: ${parsed.error.issues[0]?.message ?? 'invalid'}`;
      session?.notify(connectionId, { type: 'command_rejected', reason: error });
      this.log.debug({ connectionId, issues: parsed.error.issues.length }, 'Malformed command rejected');
      return { success: false, error, kind: 'invalid' };
    }

    if (!session) return { success: false, error: 'Not in a running match', kind: 'not_in_match' };
    const result = session.submitCommand(connectionId, parsed.data.command);
    if (!result.success) {
      session.notify(connectionId, { type: 'command_rejected', reason: result.error });
      return { success: false, error: result.error, kind: 'not_in_match' };
    }
    return { success: true };
  }

  submitIntent(connectionId: string, payload: unknown): SubmitResult {
    if (!this.intentLimiter.tryConsume(connectionId)) {
      return this.rateLimited(connectionId, 'intent', this.intentLimiter.getRetryAfter(connectionId));
    }

    const session = this.getSessionForConnection(connectionId);
    const parsed = intentMessageSchema.safeParse(payload);
    if (!parsed.success) {
      const error = `Malformed intent: ${parsed.error.issues[0]?.message ?? 'invalid'}`;
      session?.notify(connectionId, { type: 'command_rejected', reason: error });
      return { success: false, error, kind: 'invalid' };
    }

    if (!session) return { success: false, error: 'Not in a running match', kind: 'not_in_match' };
    const result = session.submitIntent(connectionId, parsed.data.text, parsed.data.unitIds);
    if (!result.success) {
      session.notify(connectionId, { type: 'command_rejected', reason: result.error });
      return { success: false, error: result.error, kind: 'not_in_match' };
    }
    return { success: true };
  }

  private rateLimited(connectionId: string, messageType: string, retryAfter: number): SubmitResult {
    this.getSessionForConnection(connectionId)?.notify(connectionId, {
      type: 'rate_limit_exceeded',
      messageType,
      retryAfter,
    });
    this.log.warn({ connectionId, messageType, retryAfter }, 'Rate limit exceeded');
    return { success: false, error: 'Rate limit exceeded', kind: 'rate_limited', retryAfter };
  }

  // ─── Lookup ───────────────────────────────────────────────────

  getSession(code: string): GameSession | undefined {
    return this.sessions.get(code);
  }

  getSessionForConnection(connectionId: string): GameSession | undefined {
    const code = this.connections.get(connectionId);
    return code ? this.sessions.get(code) : undefined;
  }

  getConnectionState(connectionId: string): ConnectionState {
    return this.getSessionForConnection(connectionId)?.getPlayer(connectionId)?.state ?? ConnectionState.Offline;
  }

  /** Get current load info for health checks */
  getLoadInfo(): LoadInfo {
    let activePlayers = 0;
    let runningMatches = 0;
    for (const session of this.sessions.values()) {
      activePlayers += session.playerCount;
      if (session.inMatch) runningMatches++;
    }

    return {
      activeGames: this.sessions.size,
      runningMatches,
      maxGames: this.config.maxConcurrentGames,
      activePlayers,
    };
  }

  hasCapacity(): boolean {
    return this.sessions.size < this.config.maxConcurrentGames;
  }

  // ─── Cleanup ──────────────────────────────────────────────────

  /** Remove lobbies that have sat idle without a match for longer than maxIdleMs */
  cleanupStaleSessions(maxIdleMs: number): string[] {
    const now = this.now();
    const removed: string[] = [];
    for (const [code, session] of this.sessions) {
      if (session.inMatch) continue;
      if (now - session.lastActivity < maxIdleMs) continue;
      removed.push(code);
    }
    for (const code of removed) {
      const session = this.sessions.get(code);
      if (!session) continue;
      for (const player of session.getPlayers()) {
        session.notify(player.connectionId, { type: 'notice', message: 'Lobby closed after inactivity' });
        this.connections.delete(player.connectionId);
      }
      this.destroySession(code);
    }
    if (removed.length > 0) this.log.info({ removed }, 'Stale lobbies removed');
    return removed;
  }

  destroySession(code: string): void {
    const session = this.sessions.get(code);
    if (!session) return;
    session.dispose();
    this.sessions.delete(code);
    this.log.info({ code, active: this.sessions.size }, 'Session destroyed');
  }

  private onMatchEnded(session: GameSession, winner: TeamId | null, reason: MatchEndReason): void {
    this.log.info({ code: session.code, winner, reason }, 'Match finished');
  }

  /** Clean up all sessions */
  dispose(): void {
    for (const code of [...this.sessions.keys()]) {
      this.destroySession(code);
    }
    this.connections.clear();
    this.commandLimiter.dispose();
    this.intentLimiter.dispose();
  }
}
