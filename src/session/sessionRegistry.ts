/**
 * Session Registry
 *
 * Process-lifetime slot holding the one orchestrator allowed to run per
 * server session. A second claimant is refused and must not touch host
 * state; the slot is released on stop so the post-restart orchestrator can
 * claim it.
 */

export interface SessionOwner {
  readonly sessionId: string;
}

export class SessionRegistry {
  private owner: SessionOwner | null = null;

  /**
   * Take the slot. Returns false when another owner holds it.
   */
  claim(candidate: SessionOwner): boolean {
    if (this.owner && this.owner !== candidate) return false;
    this.owner = candidate;
    return true;
  }

  /**
   * Free the slot if `owner` holds it; a stale owner cannot evict a new one.
   */
  release(owner: SessionOwner): void {
    if (this.owner === owner) {
      this.owner = null;
    }
  }

  current(): SessionOwner | null {
    return this.owner;
  }
}

let sharedRegistry: SessionRegistry | null = null;

export function getSessionRegistry(): SessionRegistry {
  if (sharedRegistry) {
    return sharedRegistry;
  }
  sharedRegistry = new SessionRegistry();
  return sharedRegistry;
}
