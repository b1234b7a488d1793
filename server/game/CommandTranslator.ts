/**
 * CommandTranslator - Natural-language intents → game commands.
 *
 * The translation service is reached over HTTP. Its answer goes through
 * the same zod schema as manual input and comes back into the match as
 * ordinary queued commands on a later tick; nothing here touches the
 * simulation directly.
 */

import type { GameCommand } from '@shared/multiplayer/CommandProtocol';
import type { StateSnapshot } from '@shared/multiplayer/SnapshotProtocol';
import type { TeamId } from '@shared/data/types';
import { translatorResponseSchema } from '../validation/schemas';
import type { Logger } from '../logger';

// ─── Types ───────────────────────────────────────────────────────

export type TranslatorErrorKind = 'timeout' | 'http' | 'malformed' | 'unreachable' | 'aborted' | 'unavailable';

export class TranslatorError extends Error {
  constructor(readonly kind: TranslatorErrorKind, message: string) {
    super(message);
    this.name = 'TranslatorError';
  }
}

/** Compact view of what the requesting player can see */
export interface StateSummary {
  tick: number;
  team: TeamId;
  ownUnits: Array<{ id: string; archetype: string; x: number; z: number; health: number; state: string }>;
  visibleEnemies: Array<{ id: string; archetype: string; x: number; z: number }>;
  controlPoints: Array<{ id: string; x: number; z: number; controller: TeamId | null; captureValue: number }>;
}

export interface TranslationRequest {
  playerId: string;
  sessionId: string;
  text: string;
  unitIds: string[];
  state: StateSummary;
}

export interface CommandTranslator {
  translate(request: TranslationRequest, signal: AbortSignal): Promise<GameCommand[]>;
}

export type FetchFn = (input: string, init: RequestInit) => Promise<Response>;

// ─── HTTP translator ─────────────────────────────────────────────

export interface HttpTranslatorOptions {
  url: string;
  timeoutMs: number;
  fetchFn?: FetchFn;
}

export class HttpCommandTranslator implements CommandTranslator {
  private readonly url: string;
  private readonly timeoutMs: number;
  private readonly fetchFn: FetchFn;

  constructor(options: HttpTranslatorOptions) {
    this.url = options.url;
    this.timeoutMs = options.timeoutMs;
    this.fetchFn = options.fetchFn ?? ((input, init) => fetch(input, init));
  }

  async translate(request: TranslationRequest, signal: AbortSignal): Promise<GameCommand[]> {
    const controller = new AbortController();
    let timedOut = false;
    const timer = setTimeout(() => {
      timedOut = true;
      controller.abort();
    }, this.timeoutMs);
    const onAbort = (): void => controller.abort();
    if (signal.aborted) controller.abort();
    else signal.addEventListener('abort', onAbort, { once: true });

    try {
      let res: Response;
      try {
        res = await this.fetchFn(this.url, {
          method: 'POST',
          headers: { 'Content-Type': 'application/json' },
          body: JSON.stringify(request),
          signal: controller.signal,
        });
      } catch (err) {
        if (timedOut) throw new TranslatorError('timeout', `Translator did not answer within ${this.timeoutMs}ms`);
        if (signal.aborted) throw new TranslatorError('aborted', 'Translation cancelled');
        throw new TranslatorError('unreachable', err instanceof Error ? err.message : String(err));
      }

      if (!res.ok) {
        throw new TranslatorError('http', `Translator responded with HTTP ${res.status}`);
      }

      let body: unknown;
      try {
        body = await res.json();
      } catch {
        if (timedOut) throw new TranslatorError('timeout', `Translator did not answer within ${this.timeoutMs}ms`);
        throw new TranslatorError('malformed', 'Translator response is not JSON');
      }

      const parsed = translatorResponseSchema.safeParse(body);
      if (!parsed.success) {
        throw new TranslatorError('malformed', `Translator response rejected: ${parsed.error.issues[0]?.message ?? 'invalid'}`);
      }
      return parsed.data.commands;
    } finally {
      clearTimeout(timer);
      signal.removeEventListener('abort', onAbort);
    }
  }
}

/** Stand-in when no translator URL is configured */
export class UnavailableTranslator implements CommandTranslator {
  async translate(): Promise<GameCommand[]> {
    throw new TranslatorError('unavailable', 'AI command translation is not configured');
  }
}

export function summarizeSnapshot(snapshot: StateSnapshot): StateSummary {
  const summary: StateSummary = {
    tick: snapshot.tick,
    team: snapshot.team,
    ownUnits: [],
    visibleEnemies: [],
    controlPoints: snapshot.controlPoints.map(p => ({
      id: p.id,
      x: p.x,
      z: p.z,
      controller: p.controller,
      captureValue: p.captureValue,
    })),
  };

  for (const unit of snapshot.units) {
    if (unit.detail === 'full') {
      summary.ownUnits.push({
        id: unit.id,
        archetype: unit.archetype,
        x: unit.x,
        z: unit.z,
        health: unit.health,
        state: unit.state,
      });
    } else {
      summary.visibleEnemies.push({ id: unit.id, archetype: unit.archetype, x: unit.x, z: unit.z });
    }
  }
  return summary;
}

// ─── Dispatcher ──────────────────────────────────────────────────

export interface DispatchParams {
  connectionId: string;
  request: TranslationRequest;
  onCommands: (commands: GameCommand[]) => void;
  onFailure: (error: TranslatorError) => void;
}

interface InFlight {
  id: number;
  controller: AbortController;
  unitIds: string[];
  text: string;
}

/**
 * Runs translations out of band and tracks which are in flight per
 * connection, so a disconnect can abort them and snapshots can annotate
 * the affected units.
 */
export class IntentDispatcher {
  private readonly translator: CommandTranslator;
  private readonly log: Logger;
  private readonly inFlight: Map<string, InFlight[]> = new Map(); // connectionId -> dispatches
  private nextId = 1;

  constructor(translator: CommandTranslator, log: Logger) {
    this.translator = translator;
    this.log = log;
  }

  /** Resolves once the translation settled; failures go to onFailure, never rejected */
  async dispatch(params: DispatchParams): Promise<void> {
    const entry: InFlight = {
      id: this.nextId++,
      controller: new AbortController(),
      unitIds: [...params.request.unitIds],
      text: params.request.text,
    };
    const list = this.inFlight.get(params.connectionId) ?? [];
    list.push(entry);
    this.inFlight.set(params.connectionId, list);

    let commands: GameCommand[] | null = null;
    let failure: TranslatorError | null = null;
    try {
      commands = await this.translator.translate(params.request, entry.controller.signal);
    } catch (err) {
      failure = err instanceof TranslatorError
        ? err
        : new TranslatorError('unreachable', err instanceof Error ? err.message : String(err));
    }

    const wasCancelled = entry.controller.signal.aborted;
    this.remove(params.connectionId, entry.id);

    if (wasCancelled) {
      this.log.debug({ connectionId: params.connectionId, dispatchId: entry.id }, 'Translation result discarded after cancel');
      return;
    }
    if (failure) {
      this.log.warn({ connectionId: params.connectionId, kind: failure.kind, err: failure.message }, 'Translation failed');
      params.onFailure(failure);
      return;
    }
    if (commands) params.onCommands(commands);
  }

  /** Abort every in-flight translation of a connection */
  cancel(connectionId: string): number {
    const list = this.inFlight.get(connectionId);
    if (!list) return 0;
    for (const entry of list) entry.controller.abort();
    this.inFlight.delete(connectionId);
    return list.length;
  }

  cancelAll(): void {
    for (const connectionId of [...this.inFlight.keys()]) this.cancel(connectionId);
  }

  /** Unit id → intent text for every unit with a translation in flight */
  getPendingAnnotations(connectionId?: string): Map<string, string> {
    const result = new Map<string, string>();
    const lists = connectionId === undefined
      ? [...this.inFlight.values()]
      : [this.inFlight.get(connectionId) ?? []];
    for (const list of lists) {
      for (const entry of list) {
        for (const unitId of entry.unitIds) result.set(unitId, entry.text);
      }
    }
    return result;
  }

  inFlightCount(connectionId: string): number {
    return this.inFlight.get(connectionId)?.length ?? 0;
  }

  private remove(connectionId: string, id: number): void {
    const list = this.inFlight.get(connectionId);
    if (!list) return;
    const remaining = list.filter(e => e.id !== id);
    if (remaining.length > 0) this.inFlight.set(connectionId, remaining);
    else this.inFlight.delete(connectionId);
  }
}
