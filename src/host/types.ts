/**
 * Host-owned objects the bridge reads and writes.
 *
 * None of these are implemented here: the game server provides them. The
 * shapes mirror the fields the host exposes, nothing more.
 */

/**
 * One entry of the host's map/mode vote.
 */
export interface VotingTableRow {
  gameTypeClass: string;
  title: string;
  mapPrefix: string;
  acronym: string;
  /** Add-on identifiers joined with "," */
  addons: string;
  /** `key=value` pairs joined with "?" */
  options: string;
}

/**
 * The host's vote handler. Players pick a row by index; that index is the
 * only thing it reports back.
 */
export interface HostVotingComponent {
  /** Rows shown in the current session. */
  gameConfig: VotingTableRow[];
  /** Rows the host writes to its own storage and reloads on boot. */
  defaultGameConfig: VotingTableRow[];
  /** Index of the row that won the vote. */
  currentGameConfig: number;
  /** True when the pending restart was started by a finished vote. */
  voteTriggeredTravel: boolean;
  /** Persist `defaultGameConfig` to the host's storage. */
  saveConfig(): void;
}

/**
 * Kinds of live host objects the bridge looks up by type.
 */
export interface HostObjectKinds {
  votingHandler: HostVotingComponent;
}

export type HostObjectKind = keyof HostObjectKinds;

/**
 * Object kinds the bridge's framework leaves in the host's object pool.
 * Counted at startup to spot objects that outlived the previous session.
 */
export type FrameworkObjectKind = 'object' | 'actor' | 'record';

export const FRAMEWORK_OBJECT_KINDS: readonly FrameworkObjectKind[] = ['object', 'actor', 'record'];

/**
 * The host engine's session object.
 */
export interface HostEngine {
  findLiveInstances<K extends HostObjectKind>(kind: K): HostObjectKinds[K][];
  getDefaultDifficulty(): number;
  setDefaultDifficulty(value: number): void;
  countLiveInstances(kind: FrameworkObjectKind): number;
}

/**
 * The next handler in the host's callback chain, if any.
 */
export interface HostCallbackHandler {
  mutate?(command: string, sender: string): void;
  checkReplacement?(objectClass: string): boolean;
  modifyLogin?(portal: string, options: string): LoginRequest;
  stop?(isRestart: boolean): void;
}

export interface LoginRequest {
  portal: string;
  options: string;
}
