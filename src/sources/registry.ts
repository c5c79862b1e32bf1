/**
 * Source Registry
 *
 * Central registry for site adapters. Provides lookup by site id and keeps
 * registration order, which is the order records are concatenated in.
 *
 * @module sources/registry
 */

import type { MarketSource, SourceFactory } from './types.js';
import { PolymarketSource } from './polymarket.js';
import { ManifoldSource } from './manifold.js';
import { PredictItSource } from './predictit.js';

// ============================================================================
// Source Registry Class
// ============================================================================

/**
 * SourceRegistry manages all registered site adapters.
 *
 * Sources are registered by ID, either as instances or as factories that
 * run on first lookup.
 *
 * @example
 * ```typescript
 * const registry = new SourceRegistry();
 * registry.register(new PolymarketSource());
 * registry.registerFactory('manifold', () => new ManifoldSource());
 *
 * registry.getIds(); // ['polymarket', 'manifold']
 * ```
 */
export class SourceRegistry {
  /** Registration order of all ids */
  private readonly order: string[] = [];

  private readonly sources: Map<string, MarketSource> = new Map();

  private readonly factories: Map<string, SourceFactory> = new Map();

  /**
   * Register a source instance.
   *
   * @throws Error if a source with the same ID is already registered
   */
  register(source: MarketSource): void {
    this.assertFree(source.id);
    this.sources.set(source.id, source);
    this.order.push(source.id);
  }

  /**
   * Register a factory for lazy instantiation.
   *
   * @throws Error if a source with the same ID is already registered
   */
  registerFactory(id: string, factory: SourceFactory): void {
    this.assertFree(id);
    this.factories.set(id, factory);
    this.order.push(id);
  }

  /**
   * Get a source by ID, instantiating it from its factory on first access.
   */
  get(id: string): MarketSource | undefined {
    const existing = this.sources.get(id);
    if (existing) {
      return existing;
    }

    const factory = this.factories.get(id);
    if (factory) {
      const source = factory();
      this.sources.set(id, source);
      this.factories.delete(id);
      return source;
    }

    return undefined;
  }

  has(id: string): boolean {
    return this.sources.has(id) || this.factories.has(id);
  }

  /**
   * Registered ids in registration order.
   */
  getIds(): string[] {
    return [...this.order];
  }

  /**
   * Unregister a source by ID.
   *
   * @returns true if the source was removed
   */
  unregister(id: string): boolean {
    const deletedDirect = this.sources.delete(id);
    const deletedFactory = this.factories.delete(id);
    if (deletedDirect || deletedFactory) {
      this.order.splice(this.order.indexOf(id), 1);
      return true;
    }
    return false;
  }

  get size(): number {
    return this.order.length;
  }

  private assertFree(id: string): void {
    if (this.has(id)) {
      throw new Error(`Source '${id}' is already registered`);
    }
  }
}

// ============================================================================
// Defaults
// ============================================================================

/**
 * Site ids collected when no explicit list is given.
 */
export const DEFAULT_SOURCE_IDS = ['polymarket', 'manifold', 'predictit'] as const;

export type DefaultSourceId = (typeof DEFAULT_SOURCE_IDS)[number];

/**
 * Create a registry with the three built-in site adapters.
 */
export function createDefaultRegistry(): SourceRegistry {
  const registry = new SourceRegistry();
  registry.registerFactory('polymarket', () => new PolymarketSource());
  registry.registerFactory('manifold', () => new ManifoldSource());
  registry.registerFactory('predictit', () => new PredictItSource());
  return registry;
}
