import { describe, it, expect } from 'vitest';
import { buildModeReport, formatModeReport } from '../../../src/cli/modeReport';
import { createConfigSource } from '../../fixtures/factories';

describe('modeReport', () => {
  it('describes the rows a session would inject', () => {
    const entries = buildModeReport(
      createConfigSource({
        modes: {
          vet: {
            title: 'Veteran',
            difficulty: 'hard',
            acronym: 'VET',
            options: [
              { key: 'GameLength', value: '1' },
              { key: 'Bad', value: 'a?b' },
            ],
            includeAddons: ['Perks.One', 'Bad,Name'],
          },
          plain: {},
        },
      }),
    );

    expect(entries.map((entry) => [entry.index, entry.name, entry.difficultyLevel])).toEqual([
      [0, 'vet', 4],
      [1, 'plain', 2],
    ]);
    expect(entries[0].rejectedOptions).toEqual([{ key: 'Bad', value: 'a?b' }]);
    expect(entries[0].rejectedAddons).toEqual(['Bad,Name']);

    expect(formatModeReport(entries)).toEqual([
      '[0] vet (VET) "Veteran" KFMod.KFGameType prefix=KF difficulty=4',
      '    options: GameLength=1',
      '    addons: Perks.One',
      '    dropped option: Bad=a?b',
      '    dropped add-on: "Bad,Name"',
      '[1] plain (plain) "" KFMod.KFGameType prefix=KF difficulty=2',
    ]);
  });

  it('says so when nothing is configured', () => {
    expect(formatModeReport(buildModeReport(createConfigSource({ modes: {} })))).toEqual([
      'no game modes configured',
    ]);
  });
});
