/**
 * Holdfast match host
 *
 * Handles:
 * - Lobby creation and joining (XXXX-NNNN codes)
 * - Authoritative match simulation, one tick loop per running match
 * - Per-observer state sync over socket.io
 * - Health/load reporting at GET /health
 */

import { createServer } from 'node:http';
import { Server } from 'socket.io';
import type { ClientToServerEvents, ServerToClientEvents } from '@shared/multiplayer/SocketEvents';
import { simConfigFromMode } from '@shared/data/types';
import { loadConfig } from './config';
import { logger } from './logger';
import { DATA_DIR, loadGameData } from './game/ServerDataLoader';
import type { MatchSetup } from './game/GameSession';
import { GameSessionManager } from './game/GameSessionManager';
import {
  HttpCommandTranslator,
  IntentDispatcher,
  UnavailableTranslator,
  type CommandTranslator,
} from './game/CommandTranslator';
import { SocketTransport } from './net/SocketTransport';

const STALE_LOBBY_MS = 3_600_000; // 1 hour
const CLEANUP_INTERVAL_MS = 60_000;

const config = loadConfig();
const data = await loadGameData(DATA_DIR);

const layout = data.maps.get(config.mapId);
const mode = data.modes.get(config.gameMode);
if (!layout || !mode) {
  logger.fatal(
    { mapId: config.mapId, mode: config.gameMode, maps: [...data.maps.keys()], modes: [...data.modes.keys()] },
    'Configured map or game mode does not exist',
  );
  process.exit(1);
}

const simConfig = simConfigFromMode(mode, { strictInvariants: config.strictInvariants });
const createMatch = (): MatchSetup => ({
  layout,
  mode,
  archetypes: data.archetypes,
  simConfig,
  tickRate: config.tickRate,
  broadcastEvery: config.broadcastEvery,
});

const translator: CommandTranslator = config.translatorUrl
  ? new HttpCommandTranslator({ url: config.translatorUrl, timeoutMs: config.translatorTimeoutMs })
  : new UnavailableTranslator();
const dispatcher = new IntentDispatcher(translator, logger.child({ module: 'translator' }));

// ─── HTTP + socket.io ────────────────────────────────────────────

let manager: GameSessionManager | null = null;

const httpServer = createServer((req, res) => {
  if (req.method === 'GET' && req.url === '/health') {
    res.writeHead(200, {
      'Content-Type': 'application/json',
      'Access-Control-Allow-Origin': config.allowedOrigin,
    });
    res.end(JSON.stringify({ status: 'ok', ...manager?.getLoadInfo() }));
    return;
  }
  res.writeHead(404, { 'Content-Type': 'application/json' });
  res.end(JSON.stringify({ error: 'Not found' }));
});

const io = new Server<ClientToServerEvents, ServerToClientEvents>(httpServer, {
  cors: {
    origin: config.allowedOrigin,
    methods: ['GET', 'POST'],
  },
});

const transport = new SocketTransport(io, logger);
manager = new GameSessionManager({
  channel: transport,
  createMatch,
  dispatcher,
  log: logger,
  maxConcurrentGames: config.maxConcurrentGames,
  commandRateLimit: config.commandRateLimit,
  commandRateWindowMs: config.commandRateWindowMs,
  intentRateLimit: config.intentRateLimit,
});
transport.attach(manager);

const sessions = manager;
const cleanupTimer = setInterval(() => {
  sessions.cleanupStaleSessions(STALE_LOBBY_MS);
}, CLEANUP_INTERVAL_MS);
cleanupTimer.unref();

httpServer.listen(config.port, () => {
  logger.info(
    {
      port: config.port,
      map: layout.id,
      mode: mode.id,
      tickRate: config.tickRate,
      broadcastEvery: config.broadcastEvery,
      translator: config.translatorUrl ? 'http' : 'unavailable',
    },
    'Match host listening',
  );
  logger.info(`Health check at http://localhost:${config.port}/health`);
});

// Graceful shutdown
let shuttingDown = false;
const shutdown = async (signal: string): Promise<void> => {
  if (shuttingDown) return;
  shuttingDown = true;
  logger.info({ signal }, 'Shutting down...');
  clearInterval(cleanupTimer);
  sessions.dispose();
  dispatcher.cancelAll();
  try {
    await transport.close();
  } catch (err) {
    logger.error({ err }, 'Error while closing connections');
    process.exitCode = 1;
  }
  process.exit();
};
process.on('SIGINT', signal => void shutdown(signal));
process.on('SIGTERM', signal => void shutdown(signal));
