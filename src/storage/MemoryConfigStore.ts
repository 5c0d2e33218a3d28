import type { ConfigStore } from "../types";

/** Process-local {@link ConfigStore}; contents vanish with the instance. */
export class MemoryConfigStore implements ConfigStore {
  private map = new Map<string, string>();

  constructor(initial?: Record<string, string>) {
    if (initial) {
      for (const [k, v] of Object.entries(initial)) this.map.set(k, v);
    }
  }

  async get(key: string): Promise<string | null> {
    return this.map.get(key) ?? null;
  }

  async set(key: string, value: string): Promise<void> {
    this.map.set(key, String(value));
  }

  snapshot(): Record<string, string> {
    return Object.fromEntries(this.map);
  }
}
