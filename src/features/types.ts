import type { ConfigSection } from '../config/serverConfig';
import type { EntityRegistry } from '../entities/EntityRegistry';
import type { GameMode } from '../gameModes/GameMode';
import type { SignalBus } from '../signals/SignalBus';

export interface FeatureServices {
  signals: SignalBus;
  registry: EntityRegistry;
  /** Mode restored after a vote-driven restart, if any. */
  getActiveGameMode(): GameMode | null;
}

export interface FeatureContext extends FeatureServices {
  configName: string;
  /** Section `configName` under the feature's kind, or null if absent. */
  config: ConfigSection | null;
}

export interface Feature {
  enable(context: FeatureContext): void;
  disable(): void;
}

export interface FeatureDefinition {
  /** Unique feature kind, also the config section kind it reads. */
  kind: string;
  create(): Feature;
}
