import type { EntityKind } from '../entities/EntityRegistry';
import type { FeatureDefinition } from '../features/types';

/**
 * What a package contributes when the orchestrator loads it.
 */
export interface PackageManifest {
  name: string;
  entityKinds?: EntityKind<unknown>[];
  features?: FeatureDefinition[];
}
