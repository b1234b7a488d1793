/**
 * Unit tests for the HTTP command translator and the intent dispatcher
 */

import { describe, it, expect, vi } from 'vitest';
import {
  HttpCommandTranslator,
  IntentDispatcher,
  TranslatorError,
  UnavailableTranslator,
  summarizeSnapshot,
  type FetchFn,
  type TranslationRequest,
} from '../../game/CommandTranslator';
import { CommandType, createStopCommand } from '@shared/multiplayer/CommandProtocol';
import type { StateSnapshot } from '@shared/multiplayer/SnapshotProtocol';
import { UnitState } from '@shared/simulation/UnitState';
import { ManualTranslator, silentLogger } from '../helpers';

const TRANSLATOR_URL = 'http://translator.test/translate';

const request = (overrides: Partial<TranslationRequest> = {}): TranslationRequest => ({
  playerId: 'c1',
  sessionId: 'ABCD-1234',
  text: 'take the center',
  unitIds: ['u1', 'u2'],
  state: { tick: 40, team: 'A', ownUnits: [], visibleEnemies: [], controlPoints: [] },
  ...overrides,
});

const jsonResponse = (body: unknown, status = 200): Response =>
  new Response(JSON.stringify(body), { status, headers: { 'Content-Type': 'application/json' } });

/** Never answers; rejects once its signal aborts */
const hangingFetch: FetchFn = (_input, init) =>
  new Promise((_resolve, reject) => {
    init.signal?.addEventListener('abort', () => reject(new Error('The operation was aborted')));
  });

describe('HttpCommandTranslator', () => {
  it('should post the request and return validated commands', async () => {
    const fetchFn = vi.fn<FetchFn>(async () =>
      jsonResponse({ commands: [{ type: 'move', unitIds: ['u1'], target: { x: 50, z: 60 } }] }),
    );
    const translator = new HttpCommandTranslator({ url: TRANSLATOR_URL, timeoutMs: 1000, fetchFn });

    const commands = await translator.translate(request(), new AbortController().signal);

    expect(commands).toEqual([{ type: CommandType.Move, unitIds: ['u1'], target: { x: 50, z: 60 } }]);
    const [input, init] = fetchFn.mock.calls[0] ?? [];
    expect(input).toBe(TRANSLATOR_URL);
    expect(init?.method).toBe('POST');
    expect(JSON.parse(String(init?.body))).toMatchObject({ text: 'take the center', unitIds: ['u1', 'u2'] });
  });

  it('should fail on an HTTP error status', async () => {
    const translator = new HttpCommandTranslator({
      url: TRANSLATOR_URL,
      timeoutMs: 1000,
      fetchFn: async () => jsonResponse({ error: 'busy' }, 503),
    });

    await expect(translator.translate(request(), new AbortController().signal)).rejects.toMatchObject({
      kind: 'http',
      message: 'Translator responded with HTTP 503',
    });
  });

  it('should fail on a body that is not JSON', async () => {
    const translator = new HttpCommandTranslator({
      url: TRANSLATOR_URL,
      timeoutMs: 1000,
      fetchFn: async () => new Response('<html>oops</html>', { status: 200 }),
    });

    await expect(translator.translate(request(), new AbortController().signal)).rejects.toMatchObject({
      kind: 'malformed',
      message: 'Translator response is not JSON',
    });
  });

  it('should fail on commands that do not validate', async () => {
    const translator = new HttpCommandTranslator({
      url: TRANSLATOR_URL,
      timeoutMs: 1000,
      fetchFn: async () => jsonResponse({ commands: [{ type: 'teleport', unitIds: ['u1'] }] }),
    });

    await expect(translator.translate(request(), new AbortController().signal)).rejects.toMatchObject({
      kind: 'malformed',
    });
  });

  it('should give up after the timeout', async () => {
    const translator = new HttpCommandTranslator({ url: TRANSLATOR_URL, timeoutMs: 20, fetchFn: hangingFetch });

    await expect(translator.translate(request(), new AbortController().signal)).rejects.toMatchObject({
      kind: 'timeout',
      message: 'Translator did not answer within 20ms',
    });
  });

  it('should stop when the caller aborts', async () => {
    const translator = new HttpCommandTranslator({ url: TRANSLATOR_URL, timeoutMs: 5000, fetchFn: hangingFetch });
    const controller = new AbortController();

    const pending = translator.translate(request(), controller.signal);
    controller.abort();

    await expect(pending).rejects.toMatchObject({ kind: 'aborted' });
  });

  it('should report an unreachable service', async () => {
    const translator = new HttpCommandTranslator({
      url: TRANSLATOR_URL,
      timeoutMs: 1000,
      fetchFn: async () => {
        throw new Error('connect ECONNREFUSED');
      },
    });

    await expect(translator.translate(request(), new AbortController().signal)).rejects.toMatchObject({
      kind: 'unreachable',
      message: 'connect ECONNREFUSED',
    });
  });
});

describe('UnavailableTranslator', () => {
  it('should always fail as unavailable', async () => {
    await expect(new UnavailableTranslator().translate()).rejects.toBeInstanceOf(TranslatorError);
    await expect(new UnavailableTranslator().translate()).rejects.toMatchObject({ kind: 'unavailable' });
  });
});

describe('IntentDispatcher', () => {
  it('should hand translated commands to onCommands', async () => {
    const translator = new ManualTranslator();
    const dispatcher = new IntentDispatcher(translator, silentLogger);
    const onCommands = vi.fn();
    const onFailure = vi.fn();

    const done = dispatcher.dispatch({ connectionId: 'c1', request: request(), onCommands, onFailure });
    translator.calls[0]?.resolve([createStopCommand(['u1'])]);
    await done;

    expect(onCommands).toHaveBeenCalledWith([createStopCommand(['u1'])]);
    expect(onFailure).not.toHaveBeenCalled();
  });

  it('should annotate units while a translation is in flight', () => {
    const translator = new ManualTranslator();
    const dispatcher = new IntentDispatcher(translator, silentLogger);

    void dispatcher.dispatch({ connectionId: 'c1', request: request(), onCommands: vi.fn(), onFailure: vi.fn() });
    void dispatcher.dispatch({
      connectionId: 'c2',
      request: request({ playerId: 'c2', text: 'retreat', unitIds: ['u5'] }),
      onCommands: vi.fn(),
      onFailure: vi.fn(),
    });

    expect(dispatcher.getPendingAnnotations()).toEqual(
      new Map([
        ['u1', 'take the center'],
        ['u2', 'take the center'],
        ['u5', 'retreat'],
      ]),
    );
    expect(dispatcher.getPendingAnnotations('c2')).toEqual(new Map([['u5', 'retreat']]));
    expect(dispatcher.inFlightCount('c1')).toBe(1);
  });

  it('should discard results that arrive after a cancel', async () => {
    const translator = new ManualTranslator();
    const dispatcher = new IntentDispatcher(translator, silentLogger);
    const onCommands = vi.fn();

    const done = dispatcher.dispatch({ connectionId: 'c1', request: request(), onCommands, onFailure: vi.fn() });
    expect(dispatcher.cancel('c1')).toBe(1);
    expect(translator.calls[0]?.signal.aborted).toBe(true);

    translator.calls[0]?.resolve([createStopCommand(['u1'])]);
    await done;

    expect(onCommands).not.toHaveBeenCalled();
    expect(dispatcher.getPendingAnnotations().size).toBe(0);
  });

  it('should route failures to onFailure', async () => {
    const dispatcher = new IntentDispatcher(new UnavailableTranslator(), silentLogger);
    const onFailure = vi.fn();

    await dispatcher.dispatch({ connectionId: 'c1', request: request(), onCommands: vi.fn(), onFailure });

    expect(onFailure).toHaveBeenCalledTimes(1);
    expect(onFailure.mock.calls[0]?.[0]).toMatchObject({ kind: 'unavailable' });
  });

  it('should wrap unexpected errors as unreachable', async () => {
    const translator = new ManualTranslator();
    const dispatcher = new IntentDispatcher(translator, silentLogger);
    const onFailure = vi.fn();

    const done = dispatcher.dispatch({ connectionId: 'c1', request: request(), onCommands: vi.fn(), onFailure });
    translator.calls[0]?.reject(new Error('socket hang up'));
    await done;

    expect(onFailure.mock.calls[0]?.[0]).toMatchObject({ kind: 'unreachable', message: 'socket hang up' });
  });
});

describe('summarizeSnapshot', () => {
  it('should split own units from visible enemies', () => {
    const snapshot: StateSnapshot = {
      tick: 12,
      serverTime: 0,
      team: 'A',
      units: [
        {
          detail: 'full',
          id: 'u1',
          team: 'A',
          ownerId: 'c1',
          archetype: 'rifleman',
          x: 4,
          z: 5,
          rotation: 0,
          vx: 0,
          vz: 0,
          health: 80,
          maxHealth: 100,
          state: UnitState.Moving,
          targetId: null,
          attackCooldown: 0,
          ability: null,
          invulnerable: false,
          stealthed: false,
          respawnRemaining: 0,
        },
        {
          detail: 'reduced',
          id: 'u7',
          team: 'B',
          archetype: 'heavy',
          x: 30,
          z: 31,
          rotation: 1,
          health: 180,
          maxHealth: 180,
          state: UnitState.Idle,
        },
      ],
      controlPoints: [
        { id: 'center', x: 20, z: 20, radius: 10, value: 2, captureValue: -0.5, controller: null, status: 'contested' },
      ],
    };

    expect(summarizeSnapshot(snapshot)).toEqual({
      tick: 12,
      team: 'A',
      ownUnits: [{ id: 'u1', archetype: 'rifleman', x: 4, z: 5, health: 80, state: 'moving' }],
      visibleEnemies: [{ id: 'u7', archetype: 'heavy', x: 30, z: 31 }],
      controlPoints: [{ id: 'center', x: 20, z: 20, controller: null, captureValue: -0.5 }],
    });
  });
});
