import { cpSync, mkdirSync, mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { dirname, join } from 'node:path';
import { fileURLToPath } from 'node:url';

export const MINIMAL_MAP_ROOT = fileURLToPath(new URL('../fixtures/minimal-map', import.meta.url));

/** Runs `body` with a fresh temporary directory, removed afterwards. */
export function withTempDir<T>(body: (dir: string) => T): T {
  const dir = mkdtempSync(join(tmpdir(), 'province-atlas-'));
  try {
    return body(dir);
  } finally {
    rmSync(dir, { recursive: true, force: true });
  }
}

export function writeTextFile(root: string, relativePath: string, content: string | Uint8Array): string {
  const path = join(root, ...relativePath.split('/'));
  mkdirSync(dirname(path), { recursive: true });
  writeFileSync(path, content);
  return path;
}

/**
 * Copies the minimal map into a temporary root and applies `changes`: a string
 * replaces the file's content, `null` deletes the file.
 */
export function withMapFixture<T>(
  changes: Readonly<Record<string, string | null>>,
  body: (root: string) => T,
): T {
  return withTempDir((dir) => {
    const root = join(dir, 'game');
    cpSync(MINIMAL_MAP_ROOT, root, { recursive: true });
    for (const [relativePath, content] of Object.entries(changes)) {
      if (content === null) {
        rmSync(join(root, ...relativePath.split('/')), { force: true });
      } else {
        writeTextFile(root, relativePath, content);
      }
    }
    return body(root);
  });
}
