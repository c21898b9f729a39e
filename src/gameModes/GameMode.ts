/**
 * GameMode entity
 *
 * A named, config-loaded description of one selectable mode: which host
 * game type runs, at what difficulty, with which server options and which
 * add-ons. Immutable after load; the registry hands out the same instance
 * for a name until it is reloaded.
 */

import type { ConfigSection, ConfigSource } from '../config/serverConfig';
import type { DataTree } from '../data/dataTree';
import { EntityKind } from '../entities/EntityRegistry';
import { AppError } from '../errors/AppError';
import { createLogger } from '../utils/logger';
import { resolveDifficulty } from './difficulty';
import {
  DEFAULT_DIFFICULTY_LABEL,
  DEFAULT_GAME_TYPE_CLASS,
  DEFAULT_MAP_PREFIX,
  gameModeSectionSchema,
  type GameModeOption,
  type GameModeSection,
} from './schema';

const logger = createLogger('gameMode');

export const GAME_MODE_KIND_NAME = 'GameMode';

// Separators of the host's URL-style option string ("?key=value?key=value")
const RESERVED_OPTION_CHARS = ['?', '='];
// Add-ons are additionally joined with ","
const RESERVED_ADDON_CHARS = [',', '?', '='];

function containsAny(text: string, chars: string[]): boolean {
  return chars.some((char) => text.includes(char));
}

function isValidOption(option: GameModeOption): boolean {
  return !containsAny(option.key, RESERVED_OPTION_CHARS) && !containsAny(option.value, RESERVED_OPTION_CHARS);
}

function isValidAddon(addon: string): boolean {
  return addon.trim().length > 0 && !containsAny(addon, RESERVED_ADDON_CHARS);
}

export class GameMode {
  private constructor(
    readonly name: string,
    private readonly fields: GameModeSection,
  ) {}

  /**
   * Read the `GameMode` section called `name`.
   */
  static load(name: string, source: ConfigSource): GameMode {
    const section = source.getSection(GAME_MODE_KIND_NAME, name);
    if (!section) {
      throw AppError.notFound(`No ${GAME_MODE_KIND_NAME} section named "${name}"`);
    }
    return GameMode.fromSection(name, section);
  }

  static fromSection(name: string, section: ConfigSection): GameMode {
    return GameMode.build(name, section);
  }

  static fromData(name: string, tree: DataTree): GameMode {
    return GameMode.build(name, tree);
  }

  private static build(name: string, raw: unknown): GameMode {
    const result = gameModeSectionSchema.safeParse(raw);
    if (!result.success) {
      const issues = result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
      throw AppError.configInvalid(`Invalid game mode "${name}"`, { issues });
    }
    const fields = result.data;
    return new GameMode(name, {
      ...fields,
      difficulty: fields.difficulty || DEFAULT_DIFFICULTY_LABEL,
      gameTypeClass: fields.gameTypeClass || DEFAULT_GAME_TYPE_CLASS,
      acronym: fields.acronym || name,
      mapPrefix: fields.mapPrefix || DEFAULT_MAP_PREFIX,
      options: fields.options.map((option) => ({ key: option.key, value: option.value })),
      includeAddons: [...fields.includeAddons],
      excludeAddons: [...fields.excludeAddons],
    });
  }

  toData(): DataTree {
    return {
      title: this.fields.title,
      difficulty: this.fields.difficulty,
      gameTypeClass: this.fields.gameTypeClass,
      acronym: this.fields.acronym,
      mapPrefix: this.fields.mapPrefix,
      options: this.fields.options.map((option) => ({ key: option.key, value: option.value })),
      includeAddons: [...this.fields.includeAddons],
      excludeAddons: [...this.fields.excludeAddons],
    };
  }

  get title(): string {
    return this.fields.title;
  }

  get difficulty(): string {
    return this.fields.difficulty;
  }

  get gameTypeClass(): string {
    return this.fields.gameTypeClass;
  }

  get acronym(): string {
    return this.fields.acronym;
  }

  get mapPrefix(): string {
    return this.fields.mapPrefix;
  }

  /** Numeric host difficulty for this mode's label. */
  getDifficultyLevel(): number {
    return resolveDifficulty(this.fields.difficulty);
  }

  /**
   * Option pairs safe to put into the host's option string, in config order.
   */
  getOptions(): GameModeOption[] {
    return this.fields.options
      .filter(isValidOption)
      .map((option) => ({ key: option.key, value: option.value }));
  }

  /**
   * Warn once per option pair that `getOptions` leaves out.
   * Returns the rejected pairs.
   */
  validateOptions(): GameModeOption[] {
    const rejected = this.fields.options.filter((option) => !isValidOption(option));
    for (const option of rejected) {
      logger.warn(
        { mode: this.name, key: option.key, value: option.value },
        'option contains "?" or "=", ignoring it',
      );
    }
    return rejected.map((option) => ({ key: option.key, value: option.value }));
  }

  /**
   * Add-ons this mode turns on, minus malformed names and anything the mode
   * also excludes.
   */
  getIncludedAddons(): string[] {
    const excluded = new Set(this.getExcludedAddons());
    return this.fields.includeAddons.filter((addon) => isValidAddon(addon) && !excluded.has(addon));
  }

  getExcludedAddons(): string[] {
    return this.fields.excludeAddons.filter(isValidAddon);
  }

  /**
   * Warn once per malformed add-on name in either list.
   * Returns the rejected names.
   */
  validateAddons(): string[] {
    const rejected: string[] = [];
    const lists: [string, string[]][] = [
      ['include', this.fields.includeAddons],
      ['exclude', this.fields.excludeAddons],
    ];
    for (const [list, addons] of lists) {
      for (const addon of addons) {
        if (isValidAddon(addon)) continue;
        logger.warn({ mode: this.name, list, addon }, 'malformed add-on name, ignoring it');
        rejected.push(addon);
      }
    }
    return rejected;
  }
}

export const gameModeKind = new EntityKind<GameMode>(GAME_MODE_KIND_NAME, (name, section) =>
  GameMode.fromSection(name, section),
);
