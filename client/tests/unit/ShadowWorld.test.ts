/**
 * Unit tests for the observer-side shadow world
 */

import { describe, it, expect, vi } from 'vitest';
import { ShadowWorld } from '../../src/ShadowWorld';
import { UnitState } from '@shared/simulation/UnitState';
import { encodeVisionGrid } from '@shared/multiplayer/SnapshotProtocol';
import type {
  EventEnvelope,
  FullUnitSnapshot,
  ReducedUnitSnapshot,
  ServerEvent,
  StateSnapshot,
  UnitSnapshot,
} from '@shared/multiplayer/SnapshotProtocol';

const ownUnit = (id: string, overrides: Partial<FullUnitSnapshot> = {}): FullUnitSnapshot => ({
  detail: 'full',
  id,
  team: 'A',
  ownerId: 'c1',
  archetype: 'rifleman',
  x: 0,
  z: 0,
  rotation: 0,
  vx: 0,
  vz: 0,
  health: 100,
  maxHealth: 100,
  state: UnitState.Idle,
  targetId: null,
  attackCooldown: 0,
  ability: null,
  invulnerable: false,
  stealthed: false,
  respawnRemaining: 0,
  ...overrides,
});

const enemyUnit = (id: string, overrides: Partial<ReducedUnitSnapshot> = {}): ReducedUnitSnapshot => ({
  detail: 'reduced',
  id,
  team: 'B',
  archetype: 'heavy',
  x: 30,
  z: 30,
  rotation: 0,
  health: 180,
  maxHealth: 180,
  state: UnitState.Idle,
  ...overrides,
});

const snapshot = (tick: number, units: UnitSnapshot[], extra: Partial<StateSnapshot> = {}): StateSnapshot => ({
  tick,
  serverTime: tick * 50,
  team: 'A',
  units,
  controlPoints: [],
  ...extra,
});

const envelope = (seq: number, event: ServerEvent, tick = 0): EventEnvelope => ({ seq, tick, event });

describe('ShadowWorld', () => {
  describe('snapshots', () => {
    it('should keep unit data exactly as received', () => {
      const world = new ShadowWorld();
      const data = ownUnit('u1', { x: 4, z: 5, health: 73, state: UnitState.Moving, targetId: 'u9' });

      world.applySnapshot(snapshot(1, [data]));

      expect(world.getUnit('u1')?.snapshot).toEqual(data);
      expect(world.lastTick).toBe(1);
    });

    it('should ignore snapshots that are not newer than the last one', () => {
      const world = new ShadowWorld();
      world.applySnapshot(snapshot(5, [ownUnit('u1', { x: 10 })]));

      expect(world.applySnapshot(snapshot(4, [ownUnit('u1', { x: 2 })]))).toBe(false);
      expect(world.applySnapshot(snapshot(5, []))).toBe(false);
      expect(world.getUnit('u1')?.snapshot.x).toBe(10);
    });

    it('should replace control points wholesale', () => {
      const world = new ShadowWorld();
      const point = {
        id: 'center',
        x: 20,
        z: 20,
        radius: 10,
        value: 2,
        captureValue: 0.25,
        controller: null,
        status: 'contested' as const,
      };
      world.applySnapshot(snapshot(1, [], { controlPoints: [point] }));
      world.applySnapshot(snapshot(2, [], { controlPoints: [{ ...point, captureValue: 1, controller: 'A', status: 'controlled' }] }));

      expect(world.getControlPoints()).toHaveLength(1);
      expect(world.getControlPoint('center')?.controller).toBe('A');
    });

    it('should decode the vision grid and keep it until the next one', () => {
      const world = new ShadowWorld();
      expect(world.isVisible(1, 1)).toBe(false);

      const cells = Uint8Array.from([1, 0, 0, 1]);
      world.applySnapshot(
        snapshot(1, [], { vision: { cols: 2, rows: 2, cellSize: 10, version: 3, data: encodeVisionGrid(cells), keyframe: true } }),
      );
      world.applySnapshot(snapshot(2, []));

      expect(world.getVision()?.version).toBe(3);
      expect(world.isVisible(5, 5)).toBe(true);
      expect(world.isVisible(15, 5)).toBe(false);
      expect(world.isVisible(15, 15)).toBe(true);
      expect(world.isVisible(25, 5)).toBe(false);
    });
  });

  describe('removal', () => {
    it('should keep a ghost for an enemy that left view', () => {
      const onUnitRemoved = vi.fn();
      const world = new ShadowWorld({ ghostTtlMs: 1000, onUnitRemoved });
      const enemy = enemyUnit('u7');

      world.applySnapshot(snapshot(1, [enemy]));
      world.applySnapshot(snapshot(2, []));

      expect(world.getUnit('u7')).toBeUndefined();
      expect(world.getGhost('u7')).toEqual({ snapshot: enemy, remainingMs: 1000 });
      expect(onUnitRemoved).toHaveBeenCalledWith('u7', 'out_of_view', enemy);
    });

    it('should expire ghosts after their time to live', () => {
      const world = new ShadowWorld({ ghostTtlMs: 1000 });
      world.applySnapshot(snapshot(1, [enemyUnit('u7')]));
      world.applySnapshot(snapshot(2, []));

      world.update(600);
      expect(world.getGhost('u7')?.remainingMs).toBe(400);
      world.update(400);
      expect(world.getGhost('u7')).toBeUndefined();
    });

    it('should drop the ghost when the unit comes back into view', () => {
      const world = new ShadowWorld();
      world.applySnapshot(snapshot(1, [enemyUnit('u7')]));
      world.applySnapshot(snapshot(2, []));
      world.applySnapshot(snapshot(3, [enemyUnit('u7', { x: 28 })]));

      expect(world.getGhost('u7')).toBeUndefined();
      expect(world.getUnit('u7')?.renderX).toBe(28);
    });

    it('should remove a unit reported dead without leaving a ghost', () => {
      const onUnitRemoved = vi.fn();
      const world = new ShadowWorld({ onUnitRemoved });
      const enemy = enemyUnit('u7', { state: UnitState.Dead, health: 0 });

      world.applySnapshot(snapshot(10, [enemy]));
      world.applyEvent(envelope(1, { type: 'unit_died', unitId: 'u7', team: 'B', killerId: 'u1' }, 10));
      world.applySnapshot(snapshot(11, []));

      expect(world.getGhost('u7')).toBeUndefined();
      expect(onUnitRemoved).toHaveBeenCalledWith('u7', 'died', enemy);
    });

    it('should clear a stale ghost when the death is reported afterwards', () => {
      const world = new ShadowWorld();
      world.applySnapshot(snapshot(1, [enemyUnit('u7')]));
      world.applySnapshot(snapshot(2, []));

      world.applyEvent(envelope(1, { type: 'unit_died', unitId: 'u7', team: 'B', killerId: null }, 2));
      expect(world.getGhost('u7')).toBeUndefined();
    });

    it('should forget a death once the unit is seen alive again', () => {
      const onUnitRemoved = vi.fn();
      const world = new ShadowWorld({ onUnitRemoved });

      world.applySnapshot(snapshot(1, [ownUnit('u1')]));
      world.applyEvent(envelope(1, { type: 'unit_died', unitId: 'u1', team: 'A', killerId: 'u7' }, 1));
      world.applySnapshot(snapshot(2, [ownUnit('u1', { state: UnitState.Respawning, health: 0 })]));
      world.applySnapshot(snapshot(3, [ownUnit('u1', { state: UnitState.Idle })]));
      world.applySnapshot(snapshot(4, []));

      expect(onUnitRemoved).toHaveBeenCalledWith('u1', 'out_of_view', expect.objectContaining({ id: 'u1' }));
    });
  });

  describe('pending AI annotations', () => {
    it('should keep the annotation until a snapshot clears it', () => {
      const world = new ShadowWorld();

      world.applySnapshot(snapshot(1, [ownUnit('u1', { pendingCommand: 'take the ridge' })]));
      world.applySnapshot(snapshot(2, [ownUnit('u1')]));
      expect(world.getUnit('u1')?.pendingCommand).toBe('take the ridge');

      world.applySnapshot(snapshot(3, [ownUnit('u1', { pendingCommand: null })]));
      expect(world.getUnit('u1')?.pendingCommand).toBeNull();
    });

    it('should start without an annotation', () => {
      const world = new ShadowWorld();
      world.applySnapshot(snapshot(1, [ownUnit('u1'), enemyUnit('u7')]));

      expect(world.getUnit('u1')?.pendingCommand).toBeNull();
      expect(world.getUnit('u7')?.pendingCommand).toBeNull();
    });
  });

  describe('interpolation', () => {
    it('should draw a new unit at its reported position', () => {
      const onUnitAdded = vi.fn();
      const world = new ShadowWorld({ onUnitAdded });
      world.applySnapshot(snapshot(1, [ownUnit('u1', { x: 8, z: 6, rotation: 1 })]));

      const unit = world.getUnit('u1');
      expect(unit).toMatchObject({ renderX: 8, renderZ: 6, renderRotation: 1 });
      expect(onUnitAdded).toHaveBeenCalledWith(unit);
    });

    it('should blend toward the new position over the interpolation time', () => {
      const world = new ShadowWorld({ interpolationMs: 100 });
      world.applySnapshot(snapshot(1, [ownUnit('u1', { x: 0, z: 0 })]));
      world.applySnapshot(snapshot(2, [ownUnit('u1', { x: 10, z: -4 })]));

      const unit = world.getUnit('u1');
      expect(unit).toMatchObject({ renderX: 0, renderZ: 0 });

      world.update(50);
      expect(unit?.renderX).toBe(5);
      expect(unit?.renderZ).toBe(-2);

      world.update(80);
      expect(unit?.renderX).toBe(10);
      expect(unit?.renderZ).toBe(-4);
    });

    it('should restart the blend from where the unit is drawn', () => {
      const world = new ShadowWorld({ interpolationMs: 100 });
      world.applySnapshot(snapshot(1, [ownUnit('u1', { x: 0 })]));
      world.applySnapshot(snapshot(2, [ownUnit('u1', { x: 10 })]));
      world.update(50);
      world.applySnapshot(snapshot(3, [ownUnit('u1', { x: 20 })]));

      const unit = world.getUnit('u1');
      expect(unit?.fromX).toBe(5);
      world.update(50);
      expect(unit?.renderX).toBe(12.5);
    });
  });

  describe('events', () => {
    const notice = (message: string): ServerEvent => ({ type: 'notice', message });

    it('should deliver events in sequence order, holding early ones', () => {
      const delivered: string[] = [];
      const world = new ShadowWorld({
        onEvent: event => {
          if (event.type === 'notice') delivered.push(event.message);
        },
      });

      world.applyEvent(envelope(2, notice('second')));
      world.applyEvent(envelope(3, notice('third')));
      expect(delivered).toEqual([]);
      expect(world.heldEventCount).toBe(2);

      world.applyEvent(envelope(1, notice('first')));
      expect(delivered).toEqual(['first', 'second', 'third']);
      expect(world.lastSeq).toBe(3);
      expect(world.heldEventCount).toBe(0);
    });

    it('should drop duplicate envelopes', () => {
      const onEvent = vi.fn();
      const world = new ShadowWorld({ onEvent });

      world.applyEvent(envelope(1, notice('hello')));
      world.applyEvent(envelope(1, notice('hello')));

      expect(onEvent).toHaveBeenCalledTimes(1);
    });

    it('should count from 1 again after a reconnect', () => {
      const delivered: string[] = [];
      const world = new ShadowWorld({
        onEvent: event => {
          if (event.type === 'notice') delivered.push(event.message);
        },
      });

      world.applyEvent(envelope(1, notice('old')));
      world.applyEvent(envelope(3, notice('never filled')));
      world.resetSequence();
      world.applyEvent(envelope(1, notice('new')));

      expect(delivered).toEqual(['old', 'new']);
      expect(world.lastSeq).toBe(1);
      expect(world.heldEventCount).toBe(0);
    });

    it('should pass the envelope tick along with the event', () => {
      const onEvent = vi.fn();
      const world = new ShadowWorld({ onEvent });
      const captured: ServerEvent = { type: 'control_point_captured', pointId: 'center', team: 'A' };

      world.applyEvent(envelope(1, captured, 42));
      expect(onEvent).toHaveBeenCalledWith(captured, 42);
    });

    it('should reset match state when a new match starts', () => {
      const world = new ShadowWorld();
      world.applySnapshot(snapshot(300, [ownUnit('u1'), enemyUnit('u7')]));
      world.applySnapshot(snapshot(302, [ownUnit('u1')]));

      world.applyEvent(
        envelope(1, { type: 'match_started', mapId: 'crossroads', modeId: 'standard', teams: { A: [], B: [] } }),
      );

      expect(world.getUnits()).toEqual([]);
      expect(world.getGhosts().size).toBe(0);
      expect(world.lastTick).toBe(-1);
      // Ticks restart with the new match
      expect(world.applySnapshot(snapshot(2, [ownUnit('u1')]))).toBe(true);
    });
  });
});
