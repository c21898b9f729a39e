/**
 * Entity Registry
 *
 * Turns named config sections into entity instances. Each kind is loaded
 * lazily: an instance is built the first time its name is asked for and
 * then reused for the life of the registry (or until `reload`).
 */

import type { ConfigSection, ConfigSource } from '../config/serverConfig';
import { AppError } from '../errors/AppError';
import { createLogger, describeError } from '../utils/logger';

const logger = createLogger('entityRegistry');

export type EntityLoader<T> = (name: string, section: ConfigSection) => T;

/**
 * A config-backed entity kind. Instances are cached per registry so two
 * registries over different config sources never share objects.
 */
export class EntityKind<T> {
  private readonly caches = new WeakMap<EntityRegistry, Map<string, T>>();

  constructor(
    readonly name: string,
    private readonly loader: EntityLoader<T>,
  ) {}

  load(name: string, section: ConfigSection): T {
    return this.loader(name, section);
  }

  cacheFor(registry: EntityRegistry): Map<string, T> {
    let cache = this.caches.get(registry);
    if (!cache) {
      cache = new Map<string, T>();
      this.caches.set(registry, cache);
    }
    return cache;
  }

  forget(registry: EntityRegistry): void {
    this.caches.delete(registry);
  }
}

export class EntityRegistry {
  private readonly kinds = new Map<string, EntityKind<unknown>>();

  constructor(private source: ConfigSource) {}

  register<T>(kind: EntityKind<T>): void {
    const existing = this.kinds.get(kind.name);
    if (existing === kind) return;
    if (existing) {
      throw AppError.conflict(`Entity kind already registered: ${kind.name}`);
    }
    this.kinds.set(kind.name, kind);
  }

  hasKind(kindName: string): boolean {
    return this.kinds.has(kindName);
  }

  /**
   * Resolve one named instance. Returns null when no section carries that
   * name or when the section fails to load (the failure is logged).
   */
  getInstance<T>(kind: EntityKind<T>, name: string): T | null {
    this.assertRegistered(kind);
    const cache = kind.cacheFor(this);
    const cached = cache.get(name);
    if (cached !== undefined) return cached;

    const section = this.source.getSection(kind.name, name);
    if (!section) return null;

    try {
      const instance = kind.load(name, section);
      cache.set(name, instance);
      return instance;
    } catch (err) {
      logger.error({ kind: kind.name, name, error: describeError(err) }, 'failed to load entity');
      return null;
    }
  }

  /**
   * Every loadable instance of `kind`, in config file order.
   */
  getNamedInstances<T>(kind: EntityKind<T>): T[] {
    this.assertRegistered(kind);
    const instances: T[] = [];
    for (const name of this.source.listSections(kind.name)) {
      const instance = this.getInstance(kind, name);
      if (instance !== null) instances.push(instance);
    }
    return instances;
  }

  /**
   * Number of instances built so far across all kinds.
   */
  countLoaded(): number {
    let total = 0;
    for (const kind of this.kinds.values()) {
      total += kind.cacheFor(this).size;
    }
    return total;
  }

  /**
   * Drop cached instances, optionally switching to a freshly read config
   * source; the next lookup loads again.
   */
  reload(source: ConfigSource = this.source): void {
    this.source = source;
    for (const kind of this.kinds.values()) {
      kind.forget(this);
    }
    logger.debug({ kinds: Array.from(this.kinds.keys()) }, 'entity caches cleared');
  }

  private assertRegistered(kind: EntityKind<unknown>): void {
    if (this.kinds.get(kind.name) !== kind) {
      throw AppError.notFound(`Unknown entity kind: ${kind.name}`);
    }
  }
}
