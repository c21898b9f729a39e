#!/usr/bin/env node
/**
 * Print the vote table a config file would produce.
 * Usage:
 *   npm run check-modes -- config/server.json
 *   check-modes            (reads GAME_MODES_CONFIG_PATH)
 */
import 'dotenv/config';
import { getEnv } from '../config/env';
import { ConfigSource } from '../config/serverConfig';
import { AppError } from '../errors/AppError';
import { buildModeReport, formatModeReport } from './modeReport';

function run(): void {
  const filePath = process.argv[2] ?? getEnv().GAME_MODES_CONFIG_PATH;
  try {
    const entries = buildModeReport(ConfigSource.fromFile(filePath));
    formatModeReport(entries).forEach((line) => console.log(line));
    const dropped = entries.some((entry) => entry.rejectedOptions.length || entry.rejectedAddons.length);
    if (dropped) process.exitCode = 1;
  } catch (err) {
    console.error(`${filePath}: ${err instanceof Error ? err.message : String(err)}`);
    if (AppError.isAppError(err) && err.details) {
      console.error(JSON.stringify(err.details, null, 2));
    }
    process.exitCode = 1;
  }
}

run();
