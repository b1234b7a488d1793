/**
 * Unit tests for GameSessionManager: lobby codes, validation, rate limits and cleanup
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { GameSessionManager, type GameSessionManagerConfig } from '../../game/GameSessionManager';
import { ConnectionState } from '../../game/GameSession';
import { IntentDispatcher } from '../../game/CommandTranslator';
import { ShadowWorld } from '../../../client/src/ShadowWorld';
import { ManualTranslator, RecordingChannel, createMatchSetup, silentLogger } from '../helpers';

const STOP_U1 = { command: { type: 'stop', unitIds: ['u1'] } };

describe('GameSessionManager', () => {
  let channel: RecordingChannel;
  let clock: number;
  let randomValues: number[];
  let manager: GameSessionManager;

  const createManager = (overrides: Partial<GameSessionManagerConfig> = {}): GameSessionManager => {
    manager = new GameSessionManager({
      channel,
      createMatch: () => createMatchSetup(),
      dispatcher: new IntentDispatcher(new ManualTranslator(), silentLogger),
      log: silentLogger,
      maxConcurrentGames: 10,
      commandRateLimit: 2,
      commandRateWindowMs: 2048,
      intentRateLimit: 1,
      autoStartLoop: false,
      random: () => randomValues.shift() ?? 0.5,
      now: () => clock,
      ...overrides,
    });
    return manager;
  };

  beforeEach(() => {
    channel = new RecordingChannel();
    clock = 0;
    randomValues = new Array<number>(16).fill(0);
  });

  afterEach(() => {
    manager.dispose();
  });

  describe('lobbies', () => {
    it('should host a lobby under a fresh code', () => {
      createManager();
      expect(manager.hostLobby('c1', { playerName: 'Ann' })).toEqual({ success: true, code: 'AAAA-0000', team: 'A' });
      expect(manager.getConnectionState('c1')).toBe(ConnectionState.Connected);
    });

    it('should draw another code on a collision', () => {
      createManager();
      manager.hostLobby('c1', { playerName: 'Ann' });
      expect(manager.hostLobby('c2', { playerName: 'Bo' })).toEqual({ success: true, code: 'NNNN-5555', team: 'A' });
    });

    it('should validate the host request', () => {
      createManager();
      expect(manager.hostLobby('c1', { playerName: '   ' })).toEqual({
        success: false,
        error: 'Invalid request: Name is required',
      });
      expect(manager.hostLobby('c1', undefined)).toEqual({ success: false, error: 'Invalid request: Required' });
    });

    it('should refuse a second lobby for the same connection', () => {
      createManager();
      manager.hostLobby('c1', { playerName: 'Ann' });
      expect(manager.hostLobby('c1', { playerName: 'Ann' })).toEqual({ success: false, error: 'Already in a lobby' });
    });

    it('should refuse new lobbies at capacity', () => {
      createManager({ maxConcurrentGames: 1 });
      manager.hostLobby('c1', { playerName: 'Ann' });

      expect(manager.hasCapacity()).toBe(false);
      expect(manager.hostLobby('c2', { playerName: 'Bo' })).toEqual({
        success: false,
        error: 'Server is at maximum game capacity',
      });
    });

    it('should join by code, ignoring case', () => {
      createManager();
      manager.hostLobby('c1', { playerName: 'Ann' });

      expect(manager.joinLobby('c2', { code: 'aaaa-0000', playerName: 'Bo' })).toEqual({
        success: true,
        code: 'AAAA-0000',
        team: 'B',
      });
      expect(manager.getSession('AAAA-0000')?.playerCount).toBe(2);
    });

    it('should explain why a join failed', () => {
      createManager();
      manager.hostLobby('c1', { playerName: 'Ann' });

      expect(manager.joinLobby('c2', { code: 'ZZZZ-9999', playerName: 'Bo' })).toEqual({
        success: false,
        error: 'Lobby not found',
      });
      expect(manager.joinLobby('c2', { code: '1234', playerName: 'Bo' })).toEqual({
        success: false,
        error: 'Invalid request: Lobby code must look like ABCD-1234',
      });
      expect(manager.joinLobby('c1', { code: 'AAAA-0000', playerName: 'Ann' })).toEqual({
        success: false,
        error: 'Already in a lobby',
      });
    });

    it('should destroy a lobby when its last player leaves', () => {
      createManager();
      manager.hostLobby('c1', { playerName: 'Ann' });
      manager.leaveLobby('c1');

      expect(manager.getSession('AAAA-0000')).toBeUndefined();
      expect(manager.getConnectionState('c1')).toBe(ConnectionState.Offline);
      expect(manager.getLoadInfo()).toEqual({ activeGames: 0, runningMatches: 0, maxGames: 10, activePlayers: 0 });
    });

    it('should keep one event numbering per connection across lobbies', () => {
      createManager();
      manager.hostLobby('c1', { playerName: 'Ann' });
      manager.joinLobby('c2', { code: 'AAAA-0000', playerName: 'Bo' });
      manager.leaveLobby('c2');
      manager.hostLobby('c2', { playerName: 'Bo' });
      manager.joinLobby('c3', { code: 'NNNN-5555', playerName: 'Cy' });

      const delivered: string[] = [];
      const shadow = new ShadowWorld({ onEvent: event => delivered.push(event.type) });
      for (const envelope of channel.envelopesFor('c2')) shadow.applyEvent(envelope);

      expect(delivered).toEqual(['lobby_joined', 'lobby_joined', 'lobby_updated']);
      expect(shadow.lastSeq).toBe(3);
    });

    it('should validate ready changes', () => {
      createManager();
      expect(manager.setReady('c1', { ready: true })).toEqual({ success: false, error: 'Not in a lobby' });

      manager.hostLobby('c1', { playerName: 'Ann' });
      expect(manager.setReady('c1', { ready: 'yes' })).toEqual({
        success: false,
        error: 'Invalid request: ready must be a boolean',
      });
      expect(manager.setReady('c1', { ready: true })).toEqual({ success: true });
    });
  });

  describe('matches', () => {
    const startMatch = (): void => {
      manager.hostLobby('c1', { playerName: 'Ann' });
      manager.joinLobby('c2', { code: 'AAAA-0000', playerName: 'Bo' });
      manager.joinLobby('c3', { code: 'AAAA-0000', playerName: 'Cy' });
      for (const id of ['c1', 'c2', 'c3']) manager.setReady(id, { ready: true });
    };

    it('should report running matches in the load info', () => {
      createManager();
      startMatch();

      expect(manager.getConnectionState('c3')).toBe(ConnectionState.InMatch);
      expect(manager.getLoadInfo()).toEqual({ activeGames: 1, runningMatches: 1, maxGames: 10, activePlayers: 3 });
    });

    it('should accept a valid command during a match', () => {
      createManager();
      startMatch();

      expect(manager.submitCommand('c1', STOP_U1)).toEqual({ success: true });
      expect(manager.getSession('AAAA-0000')?.getGame()?.pipeline.pendingCount).toBe(1);
    });

    it('should reject malformed commands and tell the player', () => {
      createManager();
      startMatch();

      const result = manager.submitCommand('c1', { command: { type: 'move', unitIds: ['u1'], target: { x: 'far' } } });

      expect(result.success).toBe(false);
      if (result.success) return;
      expect(result.kind).toBe('invalid');
      expect(result.error).toMatch(/^Malformed command: /);
      expect(channel.eventsFor('c1').at(-1)).toEqual({ type: 'command_rejected', reason: result.error });
    });

    it('should reject commands from players not in a match', () => {
      createManager();
      manager.hostLobby('c1', { playerName: 'Ann' });

      expect(manager.submitCommand('c1', STOP_U1)).toEqual({
        success: false,
        error: 'Not in a running match',
        kind: 'not_in_match',
      });
      expect(channel.eventsFor('c1').at(-1)).toEqual({ type: 'command_rejected', reason: 'Not in a running match' });
      expect(manager.submitCommand('stranger', STOP_U1)).toMatchObject({ success: false, kind: 'not_in_match' });
    });

    it('should end the match when a player disconnects', () => {
      createManager();
      startMatch();
      manager.handleDisconnect('c3');

      expect(manager.getLoadInfo().runningMatches).toBe(0);
      expect(manager.getConnectionState('c1')).toBe(ConnectionState.Connected);
    });
  });

  describe('rate limits', () => {
    it('should limit commands per connection and report when to retry', () => {
      createManager();
      manager.hostLobby('c1', { playerName: 'Ann' });

      manager.submitCommand('c1', STOP_U1);
      manager.submitCommand('c1', STOP_U1);
      expect(manager.submitCommand('c1', STOP_U1)).toEqual({
        success: false,
        error: 'Rate limit exceeded',
        kind: 'rate_limited',
        retryAfter: 1024,
      });
      expect(channel.eventsFor('c1').at(-1)).toEqual({
        type: 'rate_limit_exceeded',
        messageType: 'command',
        retryAfter: 1024,
      });
    });

    it('should let the bucket refill with time', () => {
      createManager();
      manager.submitCommand('c1', STOP_U1);
      manager.submitCommand('c1', STOP_U1);

      clock = 1024;
      expect(manager.submitCommand('c1', STOP_U1)).toMatchObject({ kind: 'not_in_match' });
    });

    it('should limit intents on their own budget', () => {
      createManager();
      manager.hostLobby('c1', { playerName: 'Ann' });
      const intent = { text: 'hold the hill', unitIds: ['u1'] };

      expect(manager.submitIntent('c1', intent)).toMatchObject({ kind: 'not_in_match' });
      expect(manager.submitIntent('c1', intent)).toMatchObject({ kind: 'rate_limited' });
      expect(manager.submitCommand('c1', STOP_U1)).toMatchObject({ kind: 'not_in_match' });
    });

    it('should forget a connection\'s budget on disconnect', () => {
      createManager();
      manager.submitCommand('c1', STOP_U1);
      manager.submitCommand('c1', STOP_U1);
      manager.handleDisconnect('c1');

      expect(manager.submitCommand('c1', STOP_U1)).toMatchObject({ kind: 'not_in_match' });
    });
  });

  describe('cleanup', () => {
    it('should close lobbies idle for too long and tell their players', () => {
      createManager();
      manager.hostLobby('c1', { playerName: 'Ann' });

      clock = 30_000;
      expect(manager.cleanupStaleSessions(60_000)).toEqual([]);

      clock = 60_000;
      expect(manager.cleanupStaleSessions(60_000)).toEqual(['AAAA-0000']);
      expect(channel.eventsFor('c1').at(-1)).toEqual({ type: 'notice', message: 'Lobby closed after inactivity' });
      expect(manager.getConnectionState('c1')).toBe(ConnectionState.Offline);
    });

    it('should leave running matches alone', () => {
      createManager();
      manager.hostLobby('c1', { playerName: 'Ann' });
      manager.joinLobby('c2', { code: 'AAAA-0000', playerName: 'Bo' });
      manager.joinLobby('c3', { code: 'AAAA-0000', playerName: 'Cy' });
      for (const id of ['c1', 'c2', 'c3']) manager.setReady(id, { ready: true });

      clock = 10_000_000;
      expect(manager.cleanupStaleSessions(60_000)).toEqual([]);
    });
  });
});
