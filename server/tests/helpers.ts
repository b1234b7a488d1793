/**
 * Test helpers for session-level tests: an in-process channel, a
 * translator the test settles by hand, and a small match setup.
 */

import pino from 'pino';
import type { GameCommand } from '@shared/multiplayer/CommandProtocol';
import type { EventEnvelope, ServerEvent, StateSnapshot } from '@shared/multiplayer/SnapshotProtocol';
import type { ControlPointDef, GameModeData } from '@shared/data/types';
import type { MatchSetup, ObserverChannel } from '../game/GameSession';
import type { CommandTranslator, TranslationRequest } from '../game/CommandTranslator';
import { createArchetype, createConfig, createLayout } from '../../shared/tests/fixtures';

export const silentLogger = pino({ level: 'silent' });

export class RecordingChannel implements ObserverChannel {
  readonly events: Array<{ connectionId: string; envelope: EventEnvelope }> = [];
  readonly snapshots: Array<{ connectionId: string; snapshot: StateSnapshot }> = [];

  sendEvent(connectionId: string, envelope: EventEnvelope): void {
    this.events.push({ connectionId, envelope });
  }

  sendSnapshot(connectionId: string, snapshot: StateSnapshot): void {
    this.snapshots.push({ connectionId, snapshot });
  }

  envelopesFor(connectionId: string): EventEnvelope[] {
    return this.events.filter(e => e.connectionId === connectionId).map(e => e.envelope);
  }

  eventsFor(connectionId: string): ServerEvent[] {
    return this.envelopesFor(connectionId).map(e => e.event);
  }

  typesFor(connectionId: string): string[] {
    return this.eventsFor(connectionId).map(e => e.type);
  }

  snapshotsFor(connectionId: string): StateSnapshot[] {
    return this.snapshots.filter(s => s.connectionId === connectionId).map(s => s.snapshot);
  }
}

export interface PendingTranslation {
  request: TranslationRequest;
  signal: AbortSignal;
  resolve: (commands: GameCommand[]) => void;
  reject: (err: Error) => void;
}

/** Translator whose answers the test hands out */
export class ManualTranslator implements CommandTranslator {
  readonly calls: PendingTranslation[] = [];

  translate(request: TranslationRequest, signal: AbortSignal): Promise<GameCommand[]> {
    return new Promise((resolve, reject) => {
      this.calls.push({ request, signal, resolve, reject });
    });
  }
}

export const createMode = (overrides: Partial<GameModeData> = {}): GameModeData => ({
  id: 'skirmish',
  name: 'Skirmish',
  captureRate: 1,
  captureRadius: 5,
  respawnEnabled: false,
  respawnDelay: 5,
  invulnerabilityDuration: 0,
  squad: [{ archetype: 'trooper', count: 1 }],
  victoryConditions: [{ type: 'control_count', count: 1 }],
  victoryPollInterval: 0,
  ...overrides,
});

/** One trooper per player on the 40×40 test map; broadcasts every second tick */
export const createMatchSetup = (controlPoints: ControlPointDef[] = []): MatchSetup => {
  const mode = createMode();
  return {
    layout: createLayout({ controlPoints }),
    mode,
    archetypes: new Map([['trooper', createArchetype()]]),
    simConfig: createConfig({ captureRate: mode.captureRate, captureRadius: mode.captureRadius, respawnEnabled: false }),
    tickRate: 20,
    broadcastEvery: 2,
  };
};
