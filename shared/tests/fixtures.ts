/**
 * Test fixtures for simulation tests
 */

import type { ArchetypeData, MapLayout, SimConfig, VictoryConditionDef } from '../src/data/types';
import { DEFAULT_SIM_CONFIG } from '../src/data/types';
import { SimWorld } from '../src/simulation/SimWorld';

export const TICK_DT = 0.05;

export const createArchetype = (overrides: Partial<ArchetypeData> = {}): ArchetypeData => ({
  id: 'trooper',
  name: 'Trooper',
  maxHealth: 100,
  speed: 5,
  attackRange: 10,
  attackDamage: 25,
  attackCooldown: 1,
  visionRange: 20,
  radius: 1,
  ...overrides,
});

/** Harmless target: cannot see, cannot hurt, cannot move */
export const createDummy = (overrides: Partial<ArchetypeData> = {}): ArchetypeData =>
  createArchetype({ id: 'dummy', name: 'Dummy', speed: 0, attackDamage: 0, visionRange: 0, ...overrides });

export const createLayout = (overrides: Partial<MapLayout> = {}): MapLayout => ({
  id: 'test_map',
  width: 40,
  height: 40,
  navCellSize: 4,
  blocked: [],
  controlPoints: [],
  spawnPoints: {
    A: [{ x: 4, z: 4 }, { x: 8, z: 4 }],
    B: [{ x: 36, z: 36 }, { x: 32, z: 36 }],
  },
  ...overrides,
});

export const createConfig = (overrides: Partial<SimConfig> = {}): SimConfig => ({
  ...DEFAULT_SIM_CONFIG,
  victoryPollInterval: 0,
  strictInvariants: true,
  ...overrides,
});

export const createWorld = (
  options: {
    layout?: Partial<MapLayout>;
    config?: Partial<SimConfig>;
    victoryConditions?: VictoryConditionDef[];
  } = {},
): SimWorld =>
  new SimWorld({
    layout: createLayout(options.layout),
    config: createConfig(options.config),
    victoryConditions: options.victoryConditions ?? [],
  });
