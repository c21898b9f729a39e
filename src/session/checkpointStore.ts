/**
 * Session Checkpoint Store
 *
 * The only state that crosses a map restart. The host destroys every
 * session object on restart but keeps the process alive, so a
 * process-lifetime store is enough: the outgoing session writes the
 * checkpoint once, the incoming one consumes it once.
 */

export interface SessionCheckpoint {
  /** True from `beginTravel` until the next session consumes the checkpoint. */
  isTraveling: boolean;
  /** Name of the game mode that won the vote. */
  targetModeName: string;
  /** Host default difficulty before it was overridden for the restart. */
  storedDifficulty: number;
}

export interface CheckpointStore {
  read(): SessionCheckpoint;
  beginTravel(targetModeName: string, storedDifficulty: number): void;
  /** Returns the checkpoint and resets the store, or null when not traveling. */
  consume(): SessionCheckpoint | null;
  clear(): void;
}

const IDLE: SessionCheckpoint = { isTraveling: false, targetModeName: '', storedDifficulty: 0 };

export class MemoryCheckpointStore implements CheckpointStore {
  private checkpoint: SessionCheckpoint = { ...IDLE };

  read(): SessionCheckpoint {
    return { ...this.checkpoint };
  }

  beginTravel(targetModeName: string, storedDifficulty: number): void {
    this.checkpoint = { isTraveling: true, targetModeName, storedDifficulty };
  }

  consume(): SessionCheckpoint | null {
    if (!this.checkpoint.isTraveling) return null;
    const consumed = this.checkpoint;
    this.checkpoint = { ...IDLE };
    return consumed;
  }

  clear(): void {
    this.checkpoint = { ...IDLE };
  }
}

let sharedStore: CheckpointStore | null = null;

/**
 * Get the process-wide checkpoint store.
 * Creates it on first call.
 */
export function getCheckpointStore(): CheckpointStore {
  if (sharedStore) {
    return sharedStore;
  }
  sharedStore = new MemoryCheckpointStore();
  return sharedStore;
}
