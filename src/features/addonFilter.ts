/**
 * Add-on filter feature
 *
 * Vetoes host objects whose class is on the active game mode's exclude
 * list, so a mode can switch off add-ons the server loads by default.
 * Config (optional):
 *
 *   { "alwaysExclude": ["SomePkg.NoisyMutator"] }
 */

import { z } from 'zod';
import { createLogger } from '../utils/logger';
import type { Feature, FeatureContext, FeatureDefinition } from './types';

const logger = createLogger('addonFilter');

export const ADDON_FILTER_KIND = 'addonFilter';

const addonFilterConfigSchema = z.object({
  alwaysExclude: z.array(z.string()).default([]),
});

class AddonFilter implements Feature {
  private unsubscribe: (() => void) | null = null;

  enable(context: FeatureContext): void {
    const parsed = addonFilterConfigSchema.safeParse(context.config ?? {});
    if (!parsed.success) {
      logger.warn({ config: context.configName }, 'invalid addonFilter config; using defaults');
    }
    const alwaysExclude = parsed.success ? parsed.data.alwaysExclude : [];

    this.unsubscribe = context.signals.subscribe('checkReplacement', ADDON_FILTER_KIND, (objectClass) => {
      const mode = context.getActiveGameMode();
      const excluded = new Set([...alwaysExclude, ...(mode?.getExcludedAddons() ?? [])]);
      if (!excluded.has(objectClass)) return true;
      logger.debug({ objectClass, mode: mode?.name ?? null }, 'blocked excluded add-on');
      return false;
    });
  }

  disable(): void {
    this.unsubscribe?.();
    this.unsubscribe = null;
  }
}

export const addonFilterFeature: FeatureDefinition = {
  kind: ADDON_FILTER_KIND,
  create: () => new AddonFilter(),
};
