/**
 * GameSession - One lobby and, while a match runs, its AuthoritativeGame.
 *
 * Owns the team roster and every player's connection state:
 *
 *   Offline → Hosting | Joining → Connected → InMatch → Connected | Offline
 *
 * Matches start only from here, once every team has a member and every
 * member is ready. A disconnect during a match ends it at once in favour
 * of the other team.
 */

import { opposingTeam, TEAM_IDS, GAME_CONSTANTS } from '@shared/data/types';
import type { ArchetypeData, GameModeData, MapLayout, SimConfig, TeamId } from '@shared/data/types';
import type { SimEvent } from '@shared/simulation/SimEventQueue';
import type { GameCommand } from '@shared/multiplayer/CommandProtocol';
import type {
  DomainEvent,
  EventEnvelope,
  LobbyPlayerInfo,
  MatchEndReason,
  ServerEvent,
  StateSnapshot,
  TeamRoster,
} from '@shared/multiplayer/SnapshotProtocol';
import { AuthoritativeGame } from './AuthoritativeGame';
import type { SnapshotBuilderOptions } from './SnapshotBuilder';
import { summarizeSnapshot, type IntentDispatcher } from './CommandTranslator';
import type { Logger } from '../logger';

export enum ConnectionState {
  Offline = 'offline',
  Hosting = 'hosting',
  Joining = 'joining',
  Connected = 'connected',
  InMatch = 'inMatch',
}

export interface SessionPlayer {
  connectionId: string;
  name: string;
  team: TeamId;
  ready: boolean;
  teammateId: string | null;
  state: ConnectionState;
}

/** Outbound side of the transport */
export interface ObserverChannel {
  /** Reliable, ordered */
  sendEvent(connectionId: string, envelope: EventEnvelope): void;
  /** Unreliable; may be dropped */
  sendSnapshot(connectionId: string, snapshot: StateSnapshot): void;
}

/** Everything needed to set up a match in this session */
export interface MatchSetup {
  layout: MapLayout;
  mode: GameModeData;
  archetypes: ReadonlyMap<string, ArchetypeData>;
  simConfig: SimConfig;
  tickRate: number;
  broadcastEvery: number;
  snapshot?: Partial<SnapshotBuilderOptions>;
}

export interface GameSessionConfig {
  code: string;
  channel: ObserverChannel;
  createMatch: () => MatchSetup;
  dispatcher: IntentDispatcher;
  log: Logger;
  /** Defaults to a counter private to this session */
  sequencer?: EventSequencer;
  /** Run the interval loop on start; tests drive ticks by hand */
  autoStartLoop?: boolean;
  now?: () => number;
  onMatchEnded?: (session: GameSession, winner: TeamId | null, reason: MatchEndReason) => void;
}

export type SessionResult = { success: true } | { success: false; error: string };

/**
 * Reliable sequence numbers, one counter per connection. Shared across the
 * lobbies a connection passes through so its numbering never restarts.
 */
export class EventSequencer {
  private readonly sequences: Map<string, number> = new Map();

  next(connectionId: string): number {
    const seq = (this.sequences.get(connectionId) ?? 0) + 1;
    this.sequences.set(connectionId, seq);
    return seq;
  }

  forget(connectionId: string): void {
    this.sequences.delete(connectionId);
  }
}

export class GameSession {
  readonly code: string;
  private readonly config: GameSessionConfig;
  private readonly log: Logger;
  private readonly now: () => number;
  private readonly players: Map<string, SessionPlayer> = new Map(); // connectionId -> player
  private readonly sequencer: EventSequencer;
  private game: AuthoritativeGame | null = null;
  private matchId = 0;
  private _lastActivity: number;

  constructor(config: GameSessionConfig) {
    this.code = config.code;
    this.config = config;
    this.log = config.log.child({ session: config.code });
    this.now = config.now ?? Date.now;
    this.sequencer = config.sequencer ?? new EventSequencer();
    this._lastActivity = this.now();
  }

  // ─── Roster ───────────────────────────────────────────────────

  /** Seat a player on the smaller team; A on a tie */
  addPlayer(
    connectionId: string,
    name: string,
    entering: ConnectionState.Hosting | ConnectionState.Joining,
  ): { success: true; team: TeamId } | { success: false; error: string } {
    if (this.game) return { success: false, error: 'Match already in progress' };
    if (this.players.has(connectionId)) return { success: false, error: 'Already in this lobby' };

    const team = this.pickTeam();
    if (!team) return { success: false, error: 'Lobby is full' };

    const player: SessionPlayer = {
      connectionId,
      name,
      team,
      ready: false,
      teammateId: null,
      state: entering,
    };

    const teammate = this.getTeam(team)[0];
    if (teammate) {
      player.teammateId = teammate.connectionId;
      teammate.teammateId = connectionId;
    }

    this.players.set(connectionId, player);
    player.state = ConnectionState.Connected;
    this.touch();

    this.log.info({ connectionId, name, team }, 'Player joined');
    this.notify(connectionId, {
      type: 'lobby_joined',
      code: this.code,
      playerId: connectionId,
      team,
      players: this.getLobbyInfo(),
    });
    this.broadcastLobby(connectionId);
    return { success: true, team };
  }

  private pickTeam(): TeamId | null {
    let best: TeamId | null = null;
    let bestSize: number = GAME_CONSTANTS.MAX_TEAM_SIZE;
    for (const team of TEAM_IDS) {
      const size = this.getTeam(team).length;
      if (size < bestSize) {
        best = team;
        bestSize = size;
      }
    }
    return best;
  }

  /** Leave or disconnect. Ends a running match in favour of the other team. */
  removePlayer(connectionId: string, reason: 'left' | 'disconnect'): void {
    const player = this.players.get(connectionId);
    if (!player) return;

    const cancelled = this.config.dispatcher.cancel(connectionId);
    const wasInMatch = player.state === ConnectionState.InMatch;

    this.players.delete(connectionId);
    if (reason === 'disconnect') this.sequencer.forget(connectionId);
    this.game?.forgetObserver(connectionId);
    player.state = ConnectionState.Offline;
    this.touch();

    if (player.teammateId) {
      const teammate = this.players.get(player.teammateId);
      if (teammate) {
        teammate.teammateId = null;
        this.notify(teammate.connectionId, { type: 'teammate_left', playerId: connectionId });
      }
    }

    this.log.info({ connectionId, reason, cancelledTranslations: cancelled }, 'Player removed');

    if (wasInMatch && this.game) {
      this.endMatch(opposingTeam(player.team), 'disconnect');
    }
    this.broadcastLobby();
  }

  setReady(connectionId: string, ready: boolean): SessionResult {
    const player = this.players.get(connectionId);
    if (!player) return { success: false, error: 'Not in this lobby' };
    if (player.state !== ConnectionState.Connected) {
      return { success: false, error: 'Ready can only change between matches' };
    }

    player.ready = ready;
    this.touch();
    this.broadcastLobby();
    this.maybeStartMatch();
    return { success: true };
  }

  getPlayer(connectionId: string): SessionPlayer | undefined {
    return this.players.get(connectionId);
  }

  getPlayers(): SessionPlayer[] {
    return Array.from(this.players.values());
  }

  getTeam(team: TeamId): SessionPlayer[] {
    return this.getPlayers().filter(p => p.team === team);
  }

  /** Ids of the team's units in the running match */
  getTeamUnitIds(team: TeamId): string[] {
    return this.game?.world.store.getTeamUnits(team).map(u => u.id) ?? [];
  }

  get playerCount(): number {
    return this.players.size;
  }

  get isEmpty(): boolean {
    return this.players.size === 0;
  }

  get inMatch(): boolean {
    return this.game !== null;
  }

  get lastActivity(): number {
    return this._lastActivity;
  }

  /** The running match, if any */
  getGame(): AuthoritativeGame | null {
    return this.game;
  }

  getLobbyInfo(): LobbyPlayerInfo[] {
    return this.getPlayers().map(p => ({
      playerId: p.connectionId,
      name: p.name,
      team: p.team,
      ready: p.ready,
      teammateId: p.teammateId,
    }));
  }

  // ─── Match lifecycle ──────────────────────────────────────────

  private maybeStartMatch(): void {
    if (this.game) return;
    for (const team of TEAM_IDS) {
      const members = this.getTeam(team);
      if (members.length === 0) return;
      if (!members.every(p => p.ready)) return;
    }
    this.startMatch();
  }

  private startMatch(): void {
    const setup = this.config.createMatch();
    this.matchId++;

    const game = new AuthoritativeGame({
      ...setup,
      log: this.log.child({ match: this.matchId }),
      hooks: {
        onEvents: (events) => this.handleSimEvents(events),
        onBroadcast: () => this.broadcastSnapshots(),
        onTickError: () => this.endMatch(null, 'error'),
      },
    });
    this.game = game;

    const players = this.getPlayers();
    for (const player of players) player.state = ConnectionState.InMatch;
    game.initialize(players.map(p => ({ playerId: p.connectionId, team: p.team })));

    const teams: TeamRoster = { A: [], B: [] };
    for (const player of players) {
      teams[player.team].push({ playerId: player.connectionId, name: player.name });
    }
    this.broadcast({ type: 'match_started', mapId: setup.layout.id, modeId: setup.mode.id, teams });

    if (this.config.autoStartLoop ?? true) game.start();
    this.log.info({ matchId: this.matchId, players: players.length }, 'Match started');
  }

  /**
   * Stop the match and return everyone to the lobby.
   * Safe to call more than once; only the first call has any effect.
   */
  endMatch(winner: TeamId | null, reason: MatchEndReason): void {
    const game = this.game;
    if (!game) return;
    this.game = null;
    game.stop();

    for (const player of this.players.values()) {
      this.config.dispatcher.cancel(player.connectionId);
      player.state = ConnectionState.Connected;
      player.ready = false;
    }
    this.touch();

    this.broadcast({ type: 'match_ended', winner, reason });
    this.log.info({ matchId: this.matchId, winner, reason }, 'Match ended');
    this.config.onMatchEnded?.(this, winner, reason);
    this.broadcastLobby();
  }

  private handleSimEvents(events: readonly SimEvent[]): void {
    let victory: { winner: TeamId } | null = null;
    for (const event of events) {
      const domain = toDomainEvent(event);
      if (!domain) continue;
      const teams = this.recipientTeams(domain);
      for (const player of this.players.values()) {
        if (teams.includes(player.team)) this.notify(player.connectionId, domain);
      }
      if (event.type === 'victory' && !victory) victory = { winner: event.winner };
    }
    if (victory) this.endMatch(victory.winner, 'victory');
  }

  /**
   * Unit events follow the fog: a respawn stays with the unit's own team,
   * a death reaches the enemy only if the unit was in its sight.
   */
  private recipientTeams(event: DomainEvent): readonly TeamId[] {
    switch (event.type) {
      case 'unit_respawned':
        return [event.team];
      case 'unit_died': {
        const world = this.game?.world;
        const unit = world?.getUnit(event.unitId);
        if (!world || !unit) return [event.team];
        return world.vision.isUnitVisibleTo(opposingTeam(event.team), unit) ? TEAM_IDS : [event.team];
      }
      default:
        return TEAM_IDS;
    }
  }

  private broadcastSnapshots(): void {
    const game = this.game;
    if (!game) return;

    const now = this.now();
    for (const player of this.players.values()) {
      if (player.state !== ConnectionState.InMatch) continue;
      // Only the owner's own translations; the dispatcher serves every lobby
      const pending = this.config.dispatcher.getPendingAnnotations(player.connectionId);
      const snapshot = game.buildSnapshot({ playerId: player.connectionId, team: player.team }, pending, now);
      this.config.channel.sendSnapshot(player.connectionId, snapshot);
    }
  }

  // ─── Commands ─────────────────────────────────────────────────

  /** Queue an already-validated command for the next tick */
  submitCommand(connectionId: string, command: GameCommand): SessionResult {
    const player = this.players.get(connectionId);
    if (!player || player.state !== ConnectionState.InMatch || !this.game) {
      return { success: false, error: 'Not in a running match' };
    }
    this.game.receiveCommand(connectionId, command, 'manual');
    this.touch();
    return { success: true };
  }

  /** Send an intent to the translator; the answer is queued on a later tick */
  submitIntent(connectionId: string, text: string, unitIds: string[]): SessionResult {
    const player = this.players.get(connectionId);
    const game = this.game;
    if (!player || player.state !== ConnectionState.InMatch || !game) {
      return { success: false, error: 'Not in a running match' };
    }

    const owned = unitIds.filter(id => game.world.getUnit(id)?.ownerId === connectionId);
    if (owned.length === 0) return { success: false, error: 'No units of yours selected' };

    const matchId = this.matchId;
    const view = game.getObserverView({ playerId: connectionId, team: player.team });
    this.touch();

    this.config.dispatcher
      .dispatch({
        connectionId,
        request: {
          playerId: connectionId,
          sessionId: this.code,
          text,
          unitIds: owned,
          state: summarizeSnapshot(view),
        },
        onCommands: (commands) => {
          const current = this.players.get(connectionId);
          if (!this.game || this.matchId !== matchId || current?.state !== ConnectionState.InMatch) {
            this.log.debug({ connectionId }, 'Translation arrived after the match ended, discarded');
            return;
          }
          for (const command of commands) {
            this.game.receiveCommand(connectionId, command, 'ai');
          }
        },
        onFailure: (error) => {
          this.notify(connectionId, { type: 'notice', message: `Command translation failed: ${error.message}` });
        },
      })
      .catch((err: unknown) => {
        this.log.error({ err, connectionId }, 'Intent dispatch failed');
      });

    return { success: true };
  }

  // ─── Communication ────────────────────────────────────────────

  /** Reliable message to one player, stamped with that player's next sequence number */
  notify(connectionId: string, event: ServerEvent): void {
    const seq = this.sequencer.next(connectionId);
    this.config.channel.sendEvent(connectionId, { seq, tick: this.game?.getTick() ?? 0, event });
  }

  broadcast(event: ServerEvent): void {
    for (const connectionId of this.players.keys()) {
      this.notify(connectionId, event);
    }
  }

  private broadcastLobby(except?: string): void {
    const players = this.getLobbyInfo();
    for (const connectionId of this.players.keys()) {
      if (connectionId === except) continue;
      this.notify(connectionId, { type: 'lobby_updated', code: this.code, players });
    }
  }

  private touch(): void {
    this._lastActivity = this.now();
  }

  /** Clean up */
  dispose(): void {
    this.endMatch(null, 'shutdown');
    for (const connectionId of this.players.keys()) {
      this.config.dispatcher.cancel(connectionId);
    }
    this.players.clear();
  }
}

/** Domain events that leave the host; internal bookkeeping events stay behind */
function toDomainEvent(event: SimEvent): DomainEvent | null {
  switch (event.type) {
    case 'unit_died':
    case 'unit_respawned':
    case 'control_point_captured':
    case 'control_point_neutralized':
    case 'victory':
      return event;
    case 'unit_state_changed':
    case 'ability_completed':
      return null;
  }
}
