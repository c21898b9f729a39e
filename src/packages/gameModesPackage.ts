import { addonFilterFeature } from '../features/addonFilter';
import { gameModeKind } from '../gameModes/GameMode';
import type { PackageManifest } from './types';

export const gameModesPackage: PackageManifest = {
  name: 'game-modes',
  entityKinds: [gameModeKind],
  features: [addonFilterFeature],
};

export const DEFAULT_PACKAGES: PackageManifest[] = [gameModesPackage];
