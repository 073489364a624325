import { checkExists, load, save } from './io';

/**
 * String-keyed persistence used by every engine store
 */
export interface KeyValueStore<T> {
  get(key: string): T | undefined;
  set(key: string, value: T): void;
  delete(key: string): boolean;
  keys(): string[];
  clear(): void;
}

/**
 * Process-lifetime store backed by a Map
 */
export class InMemoryStore<T> implements KeyValueStore<T> {
  private entries: Map<string, T> = new Map();

  get(key: string): T | undefined {
    return this.entries.get(key);
  }

  set(key: string, value: T): void {
    this.entries.set(key, value);
  }

  delete(key: string): boolean {
    return this.entries.delete(key);
  }

  keys(): string[] {
    return [...this.entries.keys()];
  }

  clear(): void {
    this.entries.clear();
  }
}

/**
 * Store persisted as one JSON object in `<dataDir>/<name>.json`.
 * The file is read once on first access and rewritten on every change.
 */
export class JsonFileStore<T> implements KeyValueStore<T> {
  private entries: Record<string, T> | null = null;
  private readonly fileName: string;

  constructor(
    private readonly dataDir: string,
    name: string,
  ) {
    this.fileName = `${name}.json`;
  }

  private read(): Record<string, T> {
    if (this.entries === null) {
      // Prototype-free so a key such as `__proto__` is stored like any other
      const entries: Record<string, T> = Object.create(null);
      if (checkExists(this.dataDir, this.fileName)) {
        Object.assign(entries, load<Record<string, T>>(this.dataDir, this.fileName));
      }
      this.entries = entries;
    }
    return this.entries;
  }

  private write() {
    save(this.dataDir, this.read(), this.fileName);
  }

  get(key: string): T | undefined {
    const entries = this.read();
    return Object.prototype.hasOwnProperty.call(entries, key) ? entries[key] : undefined;
  }

  set(key: string, value: T): void {
    this.read()[key] = value;
    this.write();
  }

  delete(key: string): boolean {
    const entries = this.read();
    if (!Object.prototype.hasOwnProperty.call(entries, key)) {
      return false;
    }
    delete entries[key];
    this.write();
    return true;
  }

  keys(): string[] {
    return Object.keys(this.read());
  }

  clear(): void {
    this.entries = Object.create(null);
    this.write();
  }
}
