import 'dotenv/config';

export { getEnv, type Env } from './config/env';
export { ConfigSource, type AutoEnableEntry, type ConfigSection } from './config/serverConfig';
export type { DataScalar, DataTree, DataValue } from './data/dataTree';
export { EntityKind, EntityRegistry } from './entities/EntityRegistry';
export { AppError, type AppErrorCode } from './errors/AppError';
export { FeatureEnvironment } from './features/FeatureEnvironment';
export type { Feature, FeatureContext, FeatureDefinition } from './features/types';
export { GameMode, gameModeKind } from './gameModes/GameMode';
export { resolveDifficulty } from './gameModes/difficulty';
export type { GameModeOption } from './gameModes/schema';
export type * from './host/types';
export type { PackageManifest } from './packages/types';
export { DEFAULT_PACKAGES } from './packages/gameModesPackage';
export { getCheckpointStore, MemoryCheckpointStore, type CheckpointStore, type SessionCheckpoint } from './session/checkpointStore';
export { SignalBus, type SignalHandlers, type SignalKind } from './signals/SignalBus';
export { createLogger, type Logger } from './utils/logger';
export { VotingAdapter } from './voting/VotingAdapter';
export { Orchestrator, startSession, type OrchestratorOptions, type StartResult } from './bootstrap/Orchestrator';
