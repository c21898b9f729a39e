/**
 * Bootstrap Orchestrator
 *
 * One per server session. The host calls `start` when a map begins and
 * `stop` when it ends (restart or shutdown), and routes its command,
 * replacement and login callbacks here to be republished on the signal bus.
 *
 * Start order:
 *   1. leftover scan     : objects the previous session failed to release
 *   2. claim session slot: a second orchestrator backs off
 *   3. load packages     : entity kinds + feature definitions
 *   4. game-mode voting  : read the restart checkpoint, then inject modes
 *   5. auto-enable features
 *
 * Stop reverses it and forwards to the next handler in the host chain.
 */

import { randomUUID } from 'crypto';
import type { ConfigSource } from '../config/serverConfig';
import { getEnv } from '../config/env';
import { EntityRegistry } from '../entities/EntityRegistry';
import { FeatureEnvironment } from '../features/FeatureEnvironment';
import { gameModeKind, type GameMode } from '../gameModes/GameMode';
import {
  FRAMEWORK_OBJECT_KINDS,
  type HostCallbackHandler,
  type HostEngine,
  type LoginRequest,
} from '../host/types';
import { DEFAULT_PACKAGES } from '../packages/gameModesPackage';
import type { PackageManifest } from '../packages/types';
import { getCheckpointStore, type CheckpointStore } from '../session/checkpointStore';
import { getSessionRegistry, type SessionOwner, type SessionRegistry } from '../session/sessionRegistry';
import { SignalBus } from '../signals/SignalBus';
import { createLogger, describeError } from '../utils/logger';
import { runInSession } from '../utils/sessionContext';
import { VotingAdapter } from '../voting/VotingAdapter';

const logger = createLogger('orchestrator');

export type StartResult = 'started' | 'already-running' | 'failed';

export interface OrchestratorOptions {
  host: HostEngine;
  config: ConfigSource;
  packages?: PackageManifest[];
  /** Defaults to GAME_MODE_VOTING. */
  votingEnabled?: boolean;
  checkpoints?: CheckpointStore;
  sessions?: SessionRegistry;
  /** Next handler in the host's callback chain. */
  next?: HostCallbackHandler;
  sessionId?: string;
}

export class Orchestrator implements HostCallbackHandler, SessionOwner {
  readonly sessionId: string;
  readonly signals = new SignalBus();
  readonly registry: EntityRegistry;
  readonly features: FeatureEnvironment;

  private readonly host: HostEngine;
  private readonly packages: PackageManifest[];
  private readonly votingEnabled: boolean;
  private readonly checkpoints: CheckpointStore;
  private readonly sessions: SessionRegistry;
  private readonly next: HostCallbackHandler | undefined;

  private running = false;
  private votingAdapter: VotingAdapter | null = null;
  private activeGameMode: GameMode | null = null;

  constructor(options: OrchestratorOptions) {
    this.sessionId = options.sessionId ?? randomUUID();
    this.host = options.host;
    this.packages = options.packages ?? DEFAULT_PACKAGES;
    this.votingEnabled = options.votingEnabled ?? getEnv().GAME_MODE_VOTING;
    this.checkpoints = options.checkpoints ?? getCheckpointStore();
    this.sessions = options.sessions ?? getSessionRegistry();
    this.next = options.next;
    this.registry = new EntityRegistry(options.config);
    this.features = new FeatureEnvironment(options.config, {
      signals: this.signals,
      registry: this.registry,
      getActiveGameMode: () => this.activeGameMode,
    });
  }

  isRunning(): boolean {
    return this.running;
  }

  getActiveGameMode(): GameMode | null {
    return this.activeGameMode;
  }

  getVotingAdapter(): VotingAdapter | null {
    return this.votingAdapter;
  }

  start(): StartResult {
    return runInSession(this.sessionId, () => {
      if (this.running) return 'started';

      this.reportLeftovers();

      if (!this.sessions.claim(this)) {
        logger.error(
          { owner: this.sessions.current()?.sessionId ?? null },
          'another session is already running; this one stays inactive',
        );
        return 'already-running';
      }

      try {
        this.loadPackages();
      } catch (err) {
        logger.fatal({ error: describeError(err) }, 'package loading failed; session not started');
        this.sessions.release(this);
        return 'failed';
      }

      this.running = true;
      if (this.votingEnabled) {
        this.startVoting();
      }
      this.enableAutoFeatures();
      logger.info(
        { packages: this.packages.map((pkg) => pkg.name), features: this.features.enabledKinds() },
        'session started',
      );
      return 'started';
    });
  }

  stop(isRestart: boolean): void {
    runInSession(this.sessionId, () => {
      if (this.running) {
        this.stopVoting();
        this.sessions.release(this);
        this.shutdownServices();
        this.running = false;
        logger.info({ isRestart }, 'session stopped');
      }
      this.next?.stop?.(isRestart);
    });
  }

  // ─────────────────────────────────────────────────────────────────────────
  // Host callbacks, republished as signals
  // ─────────────────────────────────────────────────────────────────────────

  mutate(command: string, sender: string): void {
    runInSession(this.sessionId, () => {
      if (this.running) this.signals.emitMutate(command, sender);
      this.next?.mutate?.(command, sender);
    });
  }

  checkReplacement(objectClass: string): boolean {
    return runInSession(this.sessionId, () => {
      const keep = this.running ? this.signals.emitCheckReplacement(objectClass) : true;
      if (!keep) return false;
      return this.next?.checkReplacement?.(objectClass) ?? true;
    });
  }

  modifyLogin(portal: string, options: string): LoginRequest {
    return runInSession(this.sessionId, () => {
      const request = this.running ? this.signals.emitModifyLogin({ portal, options }) : { portal, options };
      return this.next?.modifyLogin?.(request.portal, request.options) ?? request;
    });
  }

  // ─────────────────────────────────────────────────────────────────────────
  // Internals
  // ─────────────────────────────────────────────────────────────────────────

  private reportLeftovers(): void {
    const leftovers = FRAMEWORK_OBJECT_KINDS.map((kind) => [kind, this.host.countLiveInstances(kind)] as const);
    const total = leftovers.reduce((sum, [, count]) => sum + count, 0);
    if (total === 0) {
      logger.info({}, 'no objects left over from the previous session');
    } else {
      logger.warn({ ...Object.fromEntries(leftovers), total }, 'objects left over from the previous session');
    }
  }

  private loadPackages(): void {
    for (const pkg of this.packages) {
      for (const kind of pkg.entityKinds ?? []) {
        this.registry.register(kind);
      }
      for (const feature of pkg.features ?? []) {
        this.features.register(feature);
      }
      logger.debug({ package: pkg.name }, 'package loaded');
    }
  }

  private startVoting(): void {
    try {
      const adapter = new VotingAdapter({
        host: this.host,
        registry: this.registry,
        checkpoints: this.checkpoints,
      });
      this.activeGameMode = adapter.setupAfterTravel();
      adapter.inject(this.registry.getNamedInstances(gameModeKind));
      this.votingAdapter = adapter;
    } catch (err) {
      logger.fatal({ error: describeError(err) }, 'game-mode voting setup failed');
    }
  }

  private stopVoting(): void {
    const adapter = this.votingAdapter;
    if (!adapter) return;
    try {
      adapter.prepareForTravel();
      adapter.restoreBackup();
    } catch (err) {
      logger.fatal({ error: describeError(err) }, 'game-mode voting teardown failed');
    }
    this.votingAdapter = null;
  }

  private enableAutoFeatures(): void {
    for (const { kind, configName } of this.features.getAutoEnableList()) {
      try {
        this.features.enable(kind, configName);
      } catch (err) {
        logger.error({ feature: kind, config: configName, error: describeError(err) }, 'failed to enable feature');
      }
    }
  }

  private shutdownServices(): void {
    try {
      this.features.disableAll();
    } catch (err) {
      logger.error({ error: describeError(err) }, 'failed to disable features');
    }
    this.signals.clear();
    this.activeGameMode = null;
  }
}

/**
 * Start a session unless one is already running, in which case the running
 * orchestrator is returned untouched.
 */
export function startSession(options: OrchestratorOptions): Orchestrator {
  const sessions = options.sessions ?? getSessionRegistry();
  const current = sessions.current();
  if (current instanceof Orchestrator) {
    return current;
  }
  const orchestrator = new Orchestrator({ ...options, sessions });
  orchestrator.start();
  return orchestrator;
}
