export type StorageArea = "localStorage" | "sessionStorage";

/** The synchronous slice of the Web Storage API the preference store needs. */
export type KeyValueStorage = Pick<Storage, "getItem" | "setItem" | "removeItem">;

export function resolveBrowserStorage(area: StorageArea): KeyValueStorage | null {
  if (typeof window === "undefined") return null;

  try {
    const storage = area === "localStorage" ? window.localStorage : window.sessionStorage;
    return storage ?? null;
  } catch {
    // Some browsers throw on access when storage is disabled.
    return null;
  }
}

export function createMemoryStorage(seed: Record<string, string> = {}): KeyValueStorage {
  const store = new Map<string, string>(Object.entries(seed));
  return {
    getItem: (key) => store.get(key) ?? null,
    setItem: (key, value) => {
      store.set(key, String(value));
    },
    removeItem: (key) => {
      store.delete(key);
    },
  };
}

function safeAction<T>(storage: KeyValueStorage | null, callback: (storage: KeyValueStorage) => T): T | null {
  if (!storage) return null;
  try {
    return callback(storage);
  } catch {
    return null;
  }
}

export function safeStorageGetItem(storage: KeyValueStorage | null, key: string): string | null {
  return safeAction(storage, (target) => target.getItem(key)) ?? null;
}

export function safeStorageReadJson(storage: KeyValueStorage | null, key: string): unknown {
  const raw = safeStorageGetItem(storage, key);
  if (!raw) return null;

  try {
    const parsed: unknown = JSON.parse(raw);
    return parsed;
  } catch {
    safeStorageRemoveItem(storage, key);
    return null;
  }
}

/** Returns false when the write did not reach storage. */
export function safeStorageSetItem(storage: KeyValueStorage | null, key: string, value: string): boolean {
  return (
    safeAction(storage, (target) => {
      target.setItem(key, value);
      return true;
    }) ?? false
  );
}

export function safeStorageRemoveItem(storage: KeyValueStorage | null, key: string): boolean {
  return (
    safeAction(storage, (target) => {
      target.removeItem(key);
      return true;
    }) ?? false
  );
}
