/**
 * Signal Bus
 *
 * Republishes the host callbacks the orchestrator receives as signals other
 * parts of the server can subscribe to. The set of signals is fixed:
 *
 *   mutate            (command, sender) => void
 *                     Typed server command. Every subscriber sees it.
 *   checkReplacement  (objectClass) => boolean
 *                     Return false to veto. Dispatch stops at the first
 *                     veto; the host receives the combined answer.
 *   modifyLogin       (request) => request
 *                     Each subscriber receives the previous one's result;
 *                     the host receives the last.
 *
 * Dispatch is synchronous and each subscriber runs at most once per host
 * callback. A subscriber that throws is logged and skipped.
 */

import type { LoginRequest } from '../host/types';
import { createLogger, describeError } from '../utils/logger';

const logger = createLogger('signalBus');

export interface SignalHandlers {
  mutate: (command: string, sender: string) => void;
  checkReplacement: (objectClass: string) => boolean;
  modifyLogin: (request: LoginRequest) => LoginRequest;
}

export type SignalKind = keyof SignalHandlers;

export const SIGNAL_KINDS: readonly SignalKind[] = ['mutate', 'checkReplacement', 'modifyLogin'];

interface Subscription<K extends SignalKind> {
  owner: string;
  handler: SignalHandlers[K];
}

type SubscriberTable = { [K in SignalKind]: Subscription<K>[] };

export class SignalBus {
  private readonly subscribers: SubscriberTable = {
    mutate: [],
    checkReplacement: [],
    modifyLogin: [],
  };

  /**
   * Subscribe `handler` to `kind`. Returns a function that unsubscribes it.
   */
  subscribe<K extends SignalKind>(kind: K, owner: string, handler: SignalHandlers[K]): () => void {
    const subscription: Subscription<K> = { owner, handler };
    const list: Subscription<K>[] = this.subscribers[kind];
    list.push(subscription);
    return () => {
      const index = list.indexOf(subscription);
      if (index >= 0) list.splice(index, 1);
    };
  }

  /**
   * Drop every subscription made under `owner`.
   */
  unsubscribeOwner(owner: string): void {
    for (const kind of SIGNAL_KINDS) {
      this.removeWhere(kind, (subscription) => subscription.owner === owner);
    }
  }

  clear(): void {
    for (const kind of SIGNAL_KINDS) {
      this.removeWhere(kind, () => true);
    }
  }

  subscriberCount(kind: SignalKind): number {
    return this.subscribers[kind].length;
  }

  emitMutate(command: string, sender: string): void {
    for (const { owner, handler } of [...this.subscribers.mutate]) {
      try {
        handler(command, sender);
      } catch (err) {
        logger.error({ signal: 'mutate', owner, error: describeError(err) }, 'subscriber failed');
      }
    }
  }

  emitCheckReplacement(objectClass: string): boolean {
    for (const { owner, handler } of [...this.subscribers.checkReplacement]) {
      try {
        if (!handler(objectClass)) return false;
      } catch (err) {
        logger.error(
          { signal: 'checkReplacement', owner, objectClass, error: describeError(err) },
          'subscriber failed',
        );
      }
    }
    return true;
  }

  emitModifyLogin(request: LoginRequest): LoginRequest {
    let current: LoginRequest = { ...request };
    for (const { owner, handler } of [...this.subscribers.modifyLogin]) {
      try {
        current = handler({ ...current });
      } catch (err) {
        logger.error({ signal: 'modifyLogin', owner, error: describeError(err) }, 'subscriber failed');
      }
    }
    return current;
  }

  private removeWhere<K extends SignalKind>(kind: K, predicate: (subscription: Subscription<K>) => boolean): void {
    const list: Subscription<K>[] = this.subscribers[kind];
    for (let i = list.length - 1; i >= 0; i--) {
      if (predicate(list[i])) list.splice(i, 1);
    }
  }
}
