import type { SourceAdapter } from '../types/adapter.js';
import type { AdapterDeps } from './base-adapter.js';
import { GeMineiroAdapter, type GeMineiroOptions } from './ge-mineiro.js';
import { FlashscoreAdapter } from './flashscore.js';
import { SofascoreAdapter } from './sofascore.js';
import { ApiFootballAdapter, type ApiFootballOptions } from './api-football.js';

export class AdapterRegistry {
  private readonly adapters: Map<string, SourceAdapter> = new Map();

  register(adapter: SourceAdapter): this {
    if (this.adapters.has(adapter.config.id)) {
      throw new Error(`Adapter already registered: ${adapter.config.id}`);
    }
    this.adapters.set(adapter.config.id, adapter);
    return this;
  }

  getAdapter(id: string): SourceAdapter {
    const adapter = this.adapters.get(id);
    if (!adapter) throw new Error(`Unknown adapter: ${id} (available: ${this.ids.join(', ')})`);
    return adapter;
  }

  getAllAdapters(): SourceAdapter[] {
    return Array.from(this.adapters.values());
  }

  /** Registered adapters in the order of `ids`; every adapter when empty. */
  select(ids: readonly string[]): SourceAdapter[] {
    if (ids.length === 0) return this.getAllAdapters();
    return ids.map((id) => this.getAdapter(id));
  }

  get ids(): string[] {
    return Array.from(this.adapters.keys());
  }
}

export interface RegistryOptions extends AdapterDeps {
  /** API-Football is only registered when a key is configured */
  apiFootball?: ApiFootballOptions;
  geMineiro?: GeMineiroOptions;
}

/** Pages first, then the JSON APIs. */
export function createRegistry(options: RegistryOptions = {}): AdapterRegistry {
  const { apiFootball, geMineiro, ...deps } = options;
  const registry = new AdapterRegistry()
    .register(new GeMineiroAdapter(deps, geMineiro))
    .register(new FlashscoreAdapter(deps))
    .register(new SofascoreAdapter(deps));
  if (apiFootball) registry.register(new ApiFootballAdapter(apiFootball, deps));
  return registry;
}
