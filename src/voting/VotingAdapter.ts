/**
 * Voting Adapter
 *
 * Swaps the host's vote table for one built from configured game modes and
 * works out, after the vote, which mode won. The host reports the winner
 * only as a row index, so the adapter keeps the mode list it injected and
 * checks every index against both tables before trusting it.
 *
 *   inject ──▶ (players vote) ──▶ prepareForTravel ──▶ restoreBackup
 *                                        │
 *                          checkpoint    ▼     (map restart)
 *                                 setupAfterTravel  (new session)
 *
 * Nothing here throws into the host: a missing vote handler or a bad index
 * is logged at fatal level and the operation is dropped.
 */

import type { EntityRegistry } from '../entities/EntityRegistry';
import { gameModeKind, type GameMode } from '../gameModes/GameMode';
import type { HostEngine, HostVotingComponent, VotingTableRow } from '../host/types';
import type { CheckpointStore } from '../session/checkpointStore';
import { createLogger } from '../utils/logger';
import { buildVotingTable, cloneVotingTable } from './votingTable';

const logger = createLogger('votingAdapter');

export interface VotingAdapterDeps {
  host: HostEngine;
  registry: EntityRegistry;
  checkpoints: CheckpointStore;
}

export class VotingAdapter {
  private readonly host: HostEngine;
  private readonly registry: EntityRegistry;
  private readonly checkpoints: CheckpointStore;

  private votingComponent: HostVotingComponent | null = null;
  private backup: VotingTableRow[] = [];
  private injectedModes: GameMode[] = [];

  constructor(deps: VotingAdapterDeps) {
    this.host = deps.host;
    this.registry = deps.registry;
    this.checkpoints = deps.checkpoints;
  }

  isInjected(): boolean {
    return this.votingComponent !== null;
  }

  /**
   * Replace the host's vote table with one row per mode, in order.
   * Does nothing if this adapter has already injected.
   */
  inject(modes: GameMode[]): void {
    if (this.votingComponent) return;

    const component = this.findVotingComponent();
    if (!component) {
      logger.fatal({}, 'no live voting handler found; game modes will not be offered in the vote');
      return;
    }

    this.backup = cloneVotingTable(component.gameConfig);
    this.injectedModes = [...modes];
    component.gameConfig = buildVotingTable(this.injectedModes);
    this.votingComponent = component;

    for (const mode of this.injectedModes) {
      mode.validateOptions();
      mode.validateAddons();
    }
    logger.info(
      { modes: this.injectedModes.map((mode) => mode.name), replacedRows: this.backup.length },
      'injected game modes into the vote',
    );
  }

  /**
   * Record the voted mode before the host restarts the map, and bake its
   * difficulty into the host default so the new map starts with it.
   */
  prepareForTravel(): void {
    const component = this.votingComponent;
    if (!component) return;
    if (!component.voteTriggeredTravel) {
      logger.debug({}, 'restart not caused by a vote; nothing to carry over');
      return;
    }

    const index = component.currentGameConfig;
    const hostRows = component.gameConfig.length;
    if (!Number.isInteger(index) || index < 0 || index >= hostRows) {
      logger.fatal({ index, hostRows }, 'voted row index is outside the host vote table');
      return;
    }
    if (index >= this.injectedModes.length) {
      logger.fatal(
        { index, injectedModes: this.injectedModes.length },
        'voted row index has no matching injected game mode',
      );
      return;
    }

    const mode = this.injectedModes[index];
    const difficulty = mode.getDifficultyLevel();
    const previousDifficulty = this.host.getDefaultDifficulty();
    this.checkpoints.beginTravel(mode.name, previousDifficulty);
    this.host.setDefaultDifficulty(difficulty);
    logger.info(
      { mode: mode.name, index, difficulty, previousDifficulty },
      'carrying voted game mode across restart',
    );
  }

  /**
   * Read the checkpoint left by the previous session. Returns the voted
   * mode, or null when the last restart was not vote-driven.
   */
  setupAfterTravel(): GameMode | null {
    const checkpoint = this.checkpoints.consume();
    if (!checkpoint) return null;

    this.host.setDefaultDifficulty(checkpoint.storedDifficulty);
    const mode = this.registry.getInstance(gameModeKind, checkpoint.targetModeName);
    if (!mode) {
      logger.error({ mode: checkpoint.targetModeName }, 'voted game mode is no longer configured');
      return null;
    }
    logger.info({ mode: mode.name }, 'restored voted game mode after restart');
    return mode;
  }

  /**
   * Put the host's own table back, in both its live and saved copies, so
   * the host never persists the injected rows.
   */
  restoreBackup(): void {
    const component = this.votingComponent;
    if (!component) return;

    component.gameConfig = cloneVotingTable(this.backup);
    component.defaultGameConfig = cloneVotingTable(this.backup);
    component.saveConfig();

    this.votingComponent = null;
    this.injectedModes = [];
    this.backup = [];
    logger.debug({}, 'restored host vote table');
  }

  private findVotingComponent(): HostVotingComponent | null {
    const handlers = this.host.findLiveInstances('votingHandler');
    if (handlers.length > 1) {
      logger.warn({ count: handlers.length }, 'several voting handlers alive; using the first');
    }
    return handlers[0] ?? null;
  }
}
