/**
 * Unit Tests: GameMode entity
 */

import { describe, it, expect, vi, beforeEach } from 'vitest';

const logSpies = vi.hoisted(() => ({
  fatal: vi.fn(),
  error: vi.fn(),
  warn: vi.fn(),
  info: vi.fn(),
  debug: vi.fn(),
}));

vi.mock('../../../src/utils/logger', async (importOriginal) => ({
  ...(await importOriginal<typeof import('../../../src/utils/logger')>()),
  createLogger: () => logSpies,
}));

import { ConfigSource } from '../../../src/config/serverConfig';
import { AppError } from '../../../src/errors/AppError';
import { GameMode } from '../../../src/gameModes/GameMode';

function sourceWith(modes: Record<string, unknown>): ConfigSource {
  return ConfigSource.fromObject({ sections: { GameMode: modes } });
}

describe('GameMode', () => {
  beforeEach(() => {
    vi.clearAllMocks();
  });

  describe('load', () => {
    it('fills blank fields with fallbacks', () => {
      const mode = GameMode.load('plain', sourceWith({ plain: {} }));

      expect(mode.name).toBe('plain');
      expect(mode.title).toBe('');
      expect(mode.difficulty).toBe('normal');
      expect(mode.acronym).toBe('plain');
      expect(mode.mapPrefix).toBe('KF');
      expect(mode.gameTypeClass).toBe('KFMod.KFGameType');
      expect(mode.getOptions()).toEqual([]);
      expect(mode.getIncludedAddons()).toEqual([]);
      expect(mode.getExcludedAddons()).toEqual([]);
    });

    it('treats empty strings like missing fields', () => {
      const mode = GameMode.load(
        'blank',
        sourceWith({ blank: { difficulty: '', acronym: '', mapPrefix: '', gameTypeClass: '' } }),
      );

      expect(mode.difficulty).toBe('normal');
      expect(mode.acronym).toBe('blank');
      expect(mode.mapPrefix).toBe('KF');
      expect(mode.gameTypeClass).toBe('KFMod.KFGameType');
    });

    it('keeps configured values', () => {
      const mode = GameMode.load(
        'story',
        sourceWith({
          story: {
            title: 'Story Hard',
            difficulty: 'Hard',
            gameTypeClass: 'KFStoryGame.KFStoryGameInfo',
            acronym: 'SH',
            mapPrefix: 'KFO',
          },
        }),
      );

      expect(mode.title).toBe('Story Hard');
      expect(mode.difficulty).toBe('Hard');
      expect(mode.gameTypeClass).toBe('KFStoryGame.KFStoryGameInfo');
      expect(mode.acronym).toBe('SH');
      expect(mode.mapPrefix).toBe('KFO');
      expect(mode.getDifficultyLevel()).toBe(4);
    });

    it('throws NOT_FOUND for a missing section', () => {
      expect(() => GameMode.load('ghost', sourceWith({}))).toThrow(AppError);
      try {
        GameMode.load('ghost', sourceWith({}));
      } catch (err) {
        expect(AppError.isAppError(err) && err.code).toBe('NOT_FOUND');
      }
    });

    it('throws CONFIG_INVALID for a malformed section', () => {
      const source = sourceWith({ broken: { options: 'GameLength=1' } });
      try {
        GameMode.load('broken', source);
        expect.unreachable();
      } catch (err) {
        expect(AppError.isAppError(err) && err.code).toBe('CONFIG_INVALID');
      }
    });
  });

  describe('toData / fromData', () => {
    it('round-trips every field, keeping option order', () => {
      const original = GameMode.fromData('full', {
        title: 'Full',
        difficulty: 'suicidal',
        gameTypeClass: 'KFMod.KFGameType',
        acronym: 'F',
        mapPrefix: 'KF',
        options: [
          { key: 'Zeta', value: '1' },
          { key: 'Alpha', value: '2' },
          { key: 'Bad?', value: '3' },
        ],
        includeAddons: ['Perks.One', 'Perks.Two'],
        excludeAddons: ['Perks.Three'],
      });

      const copy = GameMode.fromData('full', original.toData());

      expect(copy.name).toBe(original.name);
      expect(copy.toData()).toEqual(original.toData());
      expect(copy.toData().options).toEqual([
        { key: 'Zeta', value: '1' },
        { key: 'Alpha', value: '2' },
        { key: 'Bad?', value: '3' },
      ]);
    });

    it('writes the resolved fallbacks into the tree', () => {
      expect(GameMode.fromData('bare', {}).toData()).toEqual({
        title: '',
        difficulty: 'normal',
        gameTypeClass: 'KFMod.KFGameType',
        acronym: 'bare',
        mapPrefix: 'KF',
        options: [],
        includeAddons: [],
        excludeAddons: [],
      });
    });

    it('hands out copies, not its own lists', () => {
      const mode = GameMode.fromData('m', { options: [{ key: 'A', value: '1' }] });
      const tree = mode.toData();
      tree.options = [];

      expect(mode.getOptions()).toEqual([{ key: 'A', value: '1' }]);
    });
  });

  describe('options', () => {
    const mode = GameMode.fromData('mixed', {
      options: [
        { key: 'GameLength', value: '1' },
        { key: 'Bad?Key', value: 'v' },
        { key: 'Mode', value: 'a=b' },
        { key: 'MaxPlayers', value: '6' },
      ],
    });

    it('drops pairs containing "?" or "=" from getOptions', () => {
      expect(mode.getOptions()).toEqual([
        { key: 'GameLength', value: '1' },
        { key: 'MaxPlayers', value: '6' },
      ]);
      expect(logSpies.warn).not.toHaveBeenCalled();
    });

    it('warns exactly once per malformed pair', () => {
      const rejected = mode.validateOptions();

      expect(rejected).toEqual([
        { key: 'Bad?Key', value: 'v' },
        { key: 'Mode', value: 'a=b' },
      ]);
      expect(logSpies.warn).toHaveBeenCalledTimes(2);
      expect(logSpies.warn).toHaveBeenNthCalledWith(
        1,
        { mode: 'mixed', key: 'Bad?Key', value: 'v' },
        'option contains "?" or "=", ignoring it',
      );
      expect(logSpies.warn).toHaveBeenNthCalledWith(
        2,
        { mode: 'mixed', key: 'Mode', value: 'a=b' },
        'option contains "?" or "=", ignoring it',
      );
    });
  });

  describe('add-ons', () => {
    const mode = GameMode.fromData('addons', {
      includeAddons: ['Perks.One', '', 'Perks.Two,Perks.Three', 'Perks.Four'],
      excludeAddons: ['Perks.Four', 'Perks?'],
    });

    it('leaves malformed and excluded names out of the included list', () => {
      expect(mode.getIncludedAddons()).toEqual(['Perks.One']);
      expect(mode.getExcludedAddons()).toEqual(['Perks.Four']);
    });

    it('warns once per malformed name in either list', () => {
      expect(mode.validateAddons()).toEqual(['', 'Perks.Two,Perks.Three', 'Perks?']);
      expect(logSpies.warn).toHaveBeenCalledTimes(3);
      expect(logSpies.warn).toHaveBeenCalledWith(
        { mode: 'addons', list: 'exclude', addon: 'Perks?' },
        'malformed add-on name, ignoring it',
      );
    });
  });
});
