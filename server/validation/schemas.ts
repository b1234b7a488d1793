/**
 * Zod validation schemas for client messages, translator responses and game data files
 */

import { z } from 'zod';
import { CommandType } from '@shared/multiplayer/CommandProtocol';
import type { GameCommand } from '@shared/multiplayer/CommandProtocol';
import type { ArchetypeData, GameModeData, MapLayout } from '@shared/data/types';

// ─── Shared pieces ───────────────────────────────────────────────

const MAX_UNITS_PER_COMMAND = 64;
const WORLD_LIMIT = 10_000;

const coordinate = z.number().finite().min(-WORLD_LIMIT).max(WORLD_LIMIT);
const groundPoint = z.object({ x: coordinate, z: coordinate });
const entityId = z.string().min(1).max(32);
const unitIds = z.array(entityId).min(1).max(MAX_UNITS_PER_COMMAND);

export const playerNameSchema = z.string()
  .trim()
  .min(1, 'Name is required')
  .max(24, 'Name must be at most 24 characters')
  .regex(/^[a-zA-Z0-9\s\-_.']+$/, 'Name can only contain letters, numbers, spaces, hyphens, underscores, periods, and apostrophes');

export const lobbyCodeSchema = z.string()
  .trim()
  .toUpperCase()
  .regex(/^[A-Z]{4}-[0-9]{4}$/, 'Lobby code must look like ABCD-1234');

// ─── Commands ────────────────────────────────────────────────────

export const commandSchema: z.ZodType<GameCommand> = z.discriminatedUnion('type', [
  z.object({ type: z.literal(CommandType.Move), unitIds, target: groundPoint }),
  z.object({ type: z.literal(CommandType.Attack), unitIds, targetId: entityId }),
  z.object({ type: z.literal(CommandType.Stop), unitIds }),
  z.object({
    type: z.literal(CommandType.Formation),
    unitIds,
    layout: z.enum(['line', 'column', 'wedge', 'box']),
    center: groundPoint,
  }),
  z.object({ type: z.literal(CommandType.Ability), unitIds }),
]);

// ─── Client → server messages ────────────────────────────────────

export const hostLobbySchema = z.object({
  playerName: playerNameSchema,
});

export const joinLobbySchema = z.object({
  code: lobbyCodeSchema,
  playerName: playerNameSchema,
});

export const setReadySchema = z.object({
  ready: z.boolean(),
});

export const commandMessageSchema = z.object({
  command: commandSchema,
});

export const intentMessageSchema = z.object({
  text: z.string().trim().min(1).max(500),
  unitIds,
});

// ─── AI translator ───────────────────────────────────────────────

export const translatorResponseSchema = z.object({
  commands: z.array(commandSchema).max(16),
});

// ─── Game data files ─────────────────────────────────────────────

const abilitySchema = z.object({
  id: z.string().min(1),
  kind: z.enum(['cloak', 'repair']),
  chargeTime: z.number().min(0),
  cooldown: z.number().min(0),
  radius: z.number().min(0).default(0),
  amount: z.number().min(0).default(0),
  duration: z.number().min(0).default(0),
});

export const archetypeSchema = z.object({
  id: z.string().min(1),
  name: z.string().min(1),
  maxHealth: z.number().positive(),
  speed: z.number().min(0),
  attackRange: z.number().min(0),
  attackDamage: z.number().min(0),
  attackCooldown: z.number().positive(),
  visionRange: z.number().min(0),
  radius: z.number().positive(),
  respawnDelay: z.number().min(0).optional(),
  ability: abilitySchema.optional(),
});

export const archetypeFileSchema = z.object({
  archetypes: z.array(archetypeSchema).min(1),
});

const controlPointDefSchema = z.object({
  id: z.string().min(1),
  x: z.number(),
  z: z.number(),
  value: z.number().min(0),
  radius: z.number().positive().optional(),
  tags: z.array(z.string()).optional(),
});

const mapPointSchema = z.object({ x: z.number(), z: z.number() });

export const mapLayoutSchema = z.object({
  id: z.string().min(1),
  width: z.number().positive(),
  height: z.number().positive(),
  navCellSize: z.number().positive(),
  blocked: z.array(z.tuple([z.number().int(), z.number().int()])).default([]),
  controlPoints: z.array(controlPointDefSchema),
  spawnPoints: z.object({
    A: z.array(mapPointSchema).min(1),
    B: z.array(mapPointSchema).min(1),
  }),
});

const victoryConditionSchema = z.discriminatedUnion('type', [
  z.object({ type: z.literal('control_count'), count: z.number().int().positive() }),
  z.object({ type: z.literal('keystone'), pointId: z.string().min(1), quota: z.number().int().min(0) }),
  z.object({ type: z.literal('point_set'), pointIds: z.array(z.string().min(1)).min(1) }),
  z.object({ type: z.literal('strategic_value'), threshold: z.number().positive() }),
]);

export const gameModeSchema = z.object({
  id: z.string().min(1),
  name: z.string().min(1),
  captureRate: z.number().positive(),
  captureRadius: z.number().positive(),
  respawnEnabled: z.boolean(),
  respawnDelay: z.number().min(0),
  invulnerabilityDuration: z.number().min(0),
  squad: z.array(z.object({ archetype: z.string().min(1), count: z.number().int().positive() })).min(1),
  victoryConditions: z.array(victoryConditionSchema).min(1),
  victoryPollInterval: z.number().min(0),
});

// Parsed data must fit the simulation's own types
export type ParsedArchetype = z.infer<typeof archetypeSchema>;
export type ParsedMapLayout = z.infer<typeof mapLayoutSchema>;
export type ParsedGameMode = z.infer<typeof gameModeSchema>;

export const toArchetype = (parsed: ParsedArchetype): ArchetypeData => parsed;
export const toMapLayout = (parsed: ParsedMapLayout): MapLayout => parsed;
export const toGameMode = (parsed: ParsedGameMode): GameModeData => parsed;

// Type exports
export type HostLobbyInput = z.infer<typeof hostLobbySchema>;
export type JoinLobbyInput = z.infer<typeof joinLobbySchema>;
export type SetReadyInput = z.infer<typeof setReadySchema>;
export type CommandMessageInput = z.infer<typeof commandMessageSchema>;
export type IntentMessageInput = z.infer<typeof intentMessageSchema>;
export type TranslatorResponse = z.infer<typeof translatorResponseSchema>;
