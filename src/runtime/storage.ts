import type { StorageValue, Value } from "./value";
import { nul, num, str } from "./value";

export function createStorage(seed: Readonly<Record<string, string>> = {}): StorageValue {
  return { kind: "Storage", items: new Map(Object.entries(seed)), properties: new Map() };
}

export function storageGetItem(storage: StorageValue, key: string): Value {
  const item = storage.items.get(key);
  return item === undefined ? nul() : str(item);
}

export function storageSetItem(storage: StorageValue, key: string, value: string): void {
  storage.items.set(key, value);
}

export function storageRemoveItem(storage: StorageValue, key: string): void {
  storage.items.delete(key);
}

export function storageClear(storage: StorageValue): void {
  storage.items.clear();
}

/** `key(n)`: insertion order, null past the end. */
export function storageKey(storage: StorageValue, index: number): Value {
  const key = [...storage.items.keys()][index];
  return key === undefined ? nul() : str(key);
}

export function storageLength(storage: StorageValue): Value {
  return num(storage.items.size);
}
