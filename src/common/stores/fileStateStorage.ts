// src/common/stores/fileStateStorage.ts

import { existsSync, mkdirSync, readFileSync, rmSync, writeFileSync } from 'node:fs';
import { join } from 'node:path';

import type { StateStorage } from 'zustand/middleware';

/**
 * File-backed StateStorage for Node clients: one JSON file per persisted key.
 * Keys are made file-name safe; the directory is created on first write.
 */
export function createFileStateStorage(dir: string): StateStorage {
  function fileFor(name: string): string {
    return join(dir, `${name.replace(/[^a-zA-Z0-9_-]/g, '_')}.json`);
  }

  return {
    getItem: (name) => {
      const file = fileFor(name);
      if (!existsSync(file)) return null;
      return readFileSync(file, 'utf-8');
    },
    setItem: (name, value) => {
      if (!existsSync(dir)) mkdirSync(dir, { recursive: true, mode: 0o700 });
      writeFileSync(fileFor(name), value, { mode: 0o600 });
    },
    removeItem: (name) => {
      rmSync(fileFor(name), { force: true });
    },
  };
}
