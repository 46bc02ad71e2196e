/**
 * Named factories, looked up by a short name (e.g. `min` for an aggregation map).
 */

export class Registry<Args extends unknown[], T> {
  private readonly _map = new Map<string, (...args: Args) => T>();
  readonly subsystem: string;

  constructor(subsystem: string) {
    this.subsystem = subsystem;
  }

  register(name: string, factory: (...args: Args) => T): this {
    this._map.set(name, factory);
    return this;
  }

  create(name: string, ...args: Args): T {
    const factory = this._map.get(name);
    if (!factory) {
      const avail = [...this._map.keys()].join(", ");
      throw new Error(
        `[${this.subsystem}] Unknown implementation "${name}". Available: ${avail}`
      );
    }
    return factory(...args);
  }

  has(name: string): boolean {
    return this._map.has(name);
  }

  list(): string[] {
    return [...this._map.keys()];
  }
}
