import { mkdtempSync, rmSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import path from 'path';
import { describe, it, expect, afterEach } from 'vitest';
import { ConfigSource } from '../../../src/config/serverConfig';
import { AppError } from '../../../src/errors/AppError';

describe('ConfigSource', () => {
  let tempDir: string | null = null;

  afterEach(() => {
    if (tempDir) rmSync(tempDir, { recursive: true, force: true });
    tempDir = null;
  });

  function writeTemp(contents: string): string {
    tempDir = mkdtempSync(path.join(tmpdir(), 'server-config-'));
    const file = path.join(tempDir, 'server.json');
    writeFileSync(file, contents, 'utf8');
    return file;
  }

  it('lists sections of a kind in file order', () => {
    const source = ConfigSource.fromObject({
      sections: { GameMode: { zeta: {}, alpha: {}, mid: {} } },
    });

    expect(source.listSections('GameMode')).toEqual(['zeta', 'alpha', 'mid']);
    expect(source.listSections('Unknown')).toEqual([]);
  });

  it('returns a section or null', () => {
    const source = ConfigSource.fromObject({ sections: { GameMode: { hard: { title: 'Hard' } } } });

    expect(source.getSection('GameMode', 'hard')).toEqual({ title: 'Hard' });
    expect(source.getSection('GameMode', 'toString')).toBeNull();
    expect(source.getSection('Other', 'hard')).toBeNull();
  });

  it('defaults autoEnable configs to "default"', () => {
    const source = ConfigSource.fromObject({ autoEnable: [{ kind: 'a' }, { kind: 'b', config: 'custom' }] });

    expect(source.getAutoEnableList()).toEqual([
      { kind: 'a', configName: 'default' },
      { kind: 'b', configName: 'custom' },
    ]);
  });

  it('accepts an empty document', () => {
    const source = ConfigSource.fromObject({});
    expect(source.listSections('GameMode')).toEqual([]);
    expect(source.getAutoEnableList()).toEqual([]);
  });

  it('rejects a malformed document with CONFIG_INVALID', () => {
    try {
      ConfigSource.fromObject({ sections: { GameMode: { hard: 'not an object' } } });
      expect.unreachable();
    } catch (err) {
      expect(AppError.isAppError(err) && err.code).toBe('CONFIG_INVALID');
    }
  });

  it('reads a file from disk', () => {
    const file = writeTemp(JSON.stringify({ sections: { GameMode: { hard: {} } } }));
    expect(ConfigSource.fromFile(file).listSections('GameMode')).toEqual(['hard']);
  });

  it('reports unreadable JSON as CONFIG_INVALID', () => {
    const file = writeTemp('{ not json');
    expect(() => ConfigSource.fromFile(file)).toThrow(`Cannot read server config: ${file}`);
  });

  it('loads the bundled example config', () => {
    const source = ConfigSource.fromFile(path.resolve(process.cwd(), 'config/server.json'));
    expect(source.listSections('GameMode')).toEqual(['normal', 'hard', 'suicidal', 'hoe']);
  });
});
