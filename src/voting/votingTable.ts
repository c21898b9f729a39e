import type { GameMode } from '../gameModes/GameMode';
import type { GameModeOption } from '../gameModes/schema';
import type { VotingTableRow } from '../host/types';

export const OPTION_SEPARATOR = '?';
export const ADDON_SEPARATOR = ',';

export function encodeOptions(options: GameModeOption[]): string {
  return options.map((option) => `${option.key}=${option.value}`).join(OPTION_SEPARATOR);
}

export function encodeAddons(addons: string[]): string {
  return addons.join(ADDON_SEPARATOR);
}

export function buildVotingRow(mode: GameMode): VotingTableRow {
  return {
    gameTypeClass: mode.gameTypeClass,
    title: mode.title,
    mapPrefix: mode.mapPrefix,
    acronym: mode.acronym,
    addons: encodeAddons(mode.getIncludedAddons()),
    options: encodeOptions(mode.getOptions()),
  };
}

/**
 * One row per mode; row i is mode i.
 */
export function buildVotingTable(modes: GameMode[]): VotingTableRow[] {
  return modes.map(buildVotingRow);
}

export function cloneVotingTable(rows: VotingTableRow[]): VotingTableRow[] {
  return rows.map((row) => ({ ...row }));
}
