/**
 * ServerDataLoader - Loads archetype, map and game mode JSON data for the server.
 *
 * Reads server/data/ once at startup. Every file is validated with zod;
 * a malformed file aborts startup rather than producing a half-loaded registry.
 */

import { readFile, readdir } from 'node:fs/promises';
import { dirname, join, resolve } from 'node:path';
import { fileURLToPath } from 'node:url';
import type { ZodType, ZodTypeDef } from 'zod';
import type { ArchetypeData, GameModeData, MapLayout } from '@shared/data/types';
import {
  archetypeFileSchema,
  gameModeSchema,
  mapLayoutSchema,
  toArchetype,
  toGameMode,
  toMapLayout,
} from '../validation/schemas';
import { logger } from '../logger';

const log = logger.child({ module: 'data' });

export const DATA_DIR = resolve(dirname(fileURLToPath(import.meta.url)), '../data');

export interface GameData {
  archetypes: ReadonlyMap<string, ArchetypeData>;
  maps: ReadonlyMap<string, MapLayout>;
  modes: ReadonlyMap<string, GameModeData>;
}

export class GameDataError extends Error {
  constructor(message: string, readonly file: string) {
    super(message);
    this.name = 'GameDataError';
  }
}

async function loadJsonFile<T>(file: string, schema: ZodType<T, ZodTypeDef, unknown>): Promise<T> {
  let raw: unknown;
  try {
    raw = JSON.parse(await readFile(file, 'utf8'));
  } catch (err) {
    throw new GameDataError(`Failed to read ${file}: ${err instanceof Error ? err.message : String(err)}`, file);
  }

  const result = schema.safeParse(raw);
  if (!result.success) {
    throw new GameDataError(`Invalid data in ${file}: ${result.error.message}`, file);
  }
  return result.data;
}

async function loadJsonDir<T>(dir: string, schema: ZodType<T, ZodTypeDef, unknown>): Promise<T[]> {
  const entries = (await readdir(dir)).filter(name => name.endsWith('.json')).sort();
  return Promise.all(entries.map(name => loadJsonFile(join(dir, name), schema)));
}

/** Load all game data. Called once at server startup. */
export async function loadGameData(dataDir: string = DATA_DIR): Promise<GameData> {
  const [archetypeFile, maps, modes] = await Promise.all([
    loadJsonFile(join(dataDir, 'archetypes.json'), archetypeFileSchema),
    loadJsonDir(join(dataDir, 'maps'), mapLayoutSchema),
    loadJsonDir(join(dataDir, 'modes'), gameModeSchema),
  ]);

  const data: GameData = {
    archetypes: new Map(archetypeFile.archetypes.map(a => [a.id, toArchetype(a)])),
    maps: new Map(maps.map(m => [m.id, toMapLayout(m)])),
    modes: new Map(modes.map(m => [m.id, toGameMode(m)])),
  };

  validateReferences(data);

  log.info(
    { archetypes: data.archetypes.size, maps: data.maps.size, modes: data.modes.size },
    'Game data loaded',
  );
  return data;
}

/** Cross-file checks zod cannot express: squads and victory conditions must name known ids */
function validateReferences(data: GameData): void {
  for (const mode of data.modes.values()) {
    for (const entry of mode.squad) {
      if (!data.archetypes.has(entry.archetype)) {
        throw new GameDataError(`Mode ${mode.id} references unknown archetype ${entry.archetype}`, `modes/${mode.id}`);
      }
    }
  }
}
