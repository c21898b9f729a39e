/**
 * Server configuration file.
 *
 * One JSON document holds every named config section, grouped by entity
 * kind, plus the ordered list of features to enable at startup:
 *
 *   {
 *     "sections": { "GameMode": { "hard": { "title": "Hard" } } },
 *     "autoEnable": [{ "kind": "motd", "config": "default" }]
 *   }
 *
 * Section order in the file is the order `listSections` reports, which is
 * the order game modes appear in the vote.
 */

import { readFileSync } from 'fs';
import path from 'path';
import { z } from 'zod';
import { AppError } from '../errors/AppError';

const sectionSchema = z.record(z.string(), z.unknown());

const autoEnableEntrySchema = z.object({
  kind: z.string().min(1),
  config: z.string().min(1).default('default'),
});

const serverConfigSchema = z.object({
  sections: z.record(z.string(), z.record(z.string(), sectionSchema)).default({}),
  autoEnable: z.array(autoEnableEntrySchema).default([]),
});

export type ConfigSection = z.infer<typeof sectionSchema>;
export type ServerConfigFile = z.infer<typeof serverConfigSchema>;

export interface AutoEnableEntry {
  kind: string;
  configName: string;
}

export class ConfigSource {
  private constructor(private readonly data: ServerConfigFile) {}

  /**
   * Validate an already-parsed document.
   */
  static fromObject(raw: unknown, origin = '<inline>'): ConfigSource {
    const result = serverConfigSchema.safeParse(raw);
    if (!result.success) {
      const issues = result.error.issues.map((issue) => ({
        path: issue.path.join('.'),
        message: issue.message,
      }));
      throw AppError.configInvalid(`Invalid server config: ${origin}`, { issues });
    }
    return new ConfigSource(result.data);
  }

  /**
   * Read and validate a config file. Synchronous: it runs inside the host's
   * startup callback, which cannot wait.
   */
  static fromFile(filePath: string): ConfigSource {
    const full = path.resolve(filePath);
    let parsed: unknown;
    try {
      parsed = JSON.parse(readFileSync(full, 'utf8'));
    } catch (err) {
      const reason = err instanceof Error ? err.message : String(err);
      throw AppError.configInvalid(`Cannot read server config: ${full}`, { reason });
    }
    return ConfigSource.fromObject(parsed, full);
  }

  listSections(kind: string): string[] {
    return Object.keys(this.data.sections[kind] ?? {});
  }

  getSection(kind: string, name: string): ConfigSection | null {
    const sections = this.data.sections[kind];
    if (!sections || !Object.prototype.hasOwnProperty.call(sections, name)) return null;
    return sections[name];
  }

  getAutoEnableList(): AutoEnableEntry[] {
    return this.data.autoEnable.map((entry) => ({ kind: entry.kind, configName: entry.config }));
  }
}
