import type { ConfigSource } from '../config/serverConfig';
import { EntityRegistry } from '../entities/EntityRegistry';
import { gameModeKind } from '../gameModes/GameMode';
import type { GameModeOption } from '../gameModes/schema';
import type { VotingTableRow } from '../host/types';
import { buildVotingRow } from '../voting/votingTable';

export interface ModeReportEntry {
  index: number;
  name: string;
  difficultyLevel: number;
  row: VotingTableRow;
  rejectedOptions: GameModeOption[];
  rejectedAddons: string[];
}

/**
 * The vote table a session would inject for `source`, with what each mode
 * loses to validation.
 */
export function buildModeReport(source: ConfigSource): ModeReportEntry[] {
  const registry = new EntityRegistry(source);
  registry.register(gameModeKind);
  return registry.getNamedInstances(gameModeKind).map((mode, index) => ({
    index,
    name: mode.name,
    difficultyLevel: mode.getDifficultyLevel(),
    row: buildVotingRow(mode),
    rejectedOptions: mode.validateOptions(),
    rejectedAddons: mode.validateAddons(),
  }));
}

export function formatModeReport(entries: ModeReportEntry[]): string[] {
  if (entries.length === 0) {
    return ['no game modes configured'];
  }
  const lines: string[] = [];
  for (const entry of entries) {
    const { row } = entry;
    lines.push(
      `[${entry.index}] ${entry.name} (${row.acronym}) "${row.title}" ${row.gameTypeClass} prefix=${row.mapPrefix} difficulty=${entry.difficultyLevel}`,
    );
    if (row.options) lines.push(`    options: ${row.options}`);
    if (row.addons) lines.push(`    addons: ${row.addons}`);
    for (const option of entry.rejectedOptions) {
      lines.push(`    dropped option: ${option.key}=${option.value}`);
    }
    for (const addon of entry.rejectedAddons) {
      lines.push(`    dropped add-on: "${addon}"`);
    }
  }
  return lines;
}
