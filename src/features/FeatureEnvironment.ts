/**
 * Feature Environment
 *
 * Keeps the feature definitions contributed by packages and the set of
 * features currently running. Which features start, and with which config,
 * comes from the config file's `autoEnable` list.
 */

import type { AutoEnableEntry, ConfigSource } from '../config/serverConfig';
import { AppError } from '../errors/AppError';
import { createLogger } from '../utils/logger';
import type { Feature, FeatureDefinition, FeatureServices } from './types';

const logger = createLogger('features');

interface EnabledFeature {
  configName: string;
  instance: Feature;
}

export class FeatureEnvironment {
  private readonly definitions = new Map<string, FeatureDefinition>();
  private readonly enabled = new Map<string, EnabledFeature>();

  constructor(
    private readonly source: ConfigSource,
    private readonly services: FeatureServices,
  ) {}

  register(definition: FeatureDefinition): void {
    const existing = this.definitions.get(definition.kind);
    if (existing === definition) return;
    if (existing) {
      throw AppError.conflict(`Feature kind already registered: ${definition.kind}`);
    }
    this.definitions.set(definition.kind, definition);
  }

  getAutoEnableList(): AutoEnableEntry[] {
    return this.source.getAutoEnableList();
  }

  isEnabled(kind: string): boolean {
    return this.enabled.has(kind);
  }

  enabledKinds(): string[] {
    return Array.from(this.enabled.keys());
  }

  /**
   * Enable `kind` with config `configName`. Re-enabling with another config
   * restarts the feature; with the same config it is a no-op.
   */
  enable(kind: string, configName: string): void {
    const definition = this.definitions.get(kind);
    if (!definition) {
      throw AppError.notFound(`Unknown feature kind: ${kind}`);
    }

    const current = this.enabled.get(kind);
    if (current?.configName === configName) return;
    if (current) this.disable(kind);

    const instance = definition.create();
    instance.enable({
      ...this.services,
      configName,
      config: this.source.getSection(kind, configName),
    });
    this.enabled.set(kind, { configName, instance });
    logger.info({ feature: kind, config: configName }, 'feature enabled');
  }

  disable(kind: string): void {
    const current = this.enabled.get(kind);
    if (!current) return;
    this.enabled.delete(kind);
    current.instance.disable();
    logger.info({ feature: kind }, 'feature disabled');
  }

  /**
   * Disable every running feature, last enabled first.
   */
  disableAll(): void {
    for (const kind of this.enabledKinds().reverse()) {
      this.disable(kind);
    }
  }
}
