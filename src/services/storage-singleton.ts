/**
 * Lazy singleton for StorageService
 */
import { StorageService } from '@/services/storage.js';

let _storageSingleton: StorageService | null = null;

export function getStorageService(): StorageService {
  if (!_storageSingleton) {
    _storageSingleton = new StorageService();
  }
  return _storageSingleton;
}


/** Drops the cached instance so the next call reads STORAGE_PATH again */
export function resetStorageForTests(): void {
  _storageSingleton = null;
}
