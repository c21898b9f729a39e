import { z } from 'zod';

export const DEFAULT_DIFFICULTY_LABEL = 'normal';
export const DEFAULT_MAP_PREFIX = 'KF';
export const DEFAULT_GAME_TYPE_CLASS = 'KFMod.KFGameType';

export const gameModeOptionSchema = z.object({
  key: z.string(),
  value: z.string(),
});

/**
 * Shape shared by a `GameMode` config section and by `GameMode.toData()`.
 * Everything is optional in config; blanks are filled in by `GameMode`.
 */
export const gameModeSectionSchema = z.object({
  title: z.string().default(''),
  difficulty: z.string().default(''),
  gameTypeClass: z.string().default(''),
  acronym: z.string().default(''),
  mapPrefix: z.string().default(''),
  options: z.array(gameModeOptionSchema).default([]),
  includeAddons: z.array(z.string()).default([]),
  excludeAddons: z.array(z.string()).default([]),
});

export type GameModeOption = z.infer<typeof gameModeOptionSchema>;
export type GameModeSection = z.infer<typeof gameModeSectionSchema>;
