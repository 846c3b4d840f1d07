import { existsSync, readFileSync } from 'node:fs';
import { dirname, resolve } from 'node:path';
import { fileURLToPath } from 'node:url';

/** Version from the nearest package.json above this module, or null. */
export function detectVersionSync(): string | null {
  try {
    const startDir = dirname(fileURLToPath(import.meta.url));

    let current = startDir;
    for (let i = 0; i < 8; i++) {
      const candidate = resolve(current, 'package.json');
      if (existsSync(candidate)) {
        const content = readFileSync(candidate, 'utf8');
        const parsed: unknown = JSON.parse(content);
        if (typeof parsed === 'object' && parsed !== null && 'version' in parsed && typeof parsed.version === 'string') {
          return parsed.version;
        }
        return null;
      }
      const parent = resolve(current, '..');
      if (parent === current) break;
      current = parent;
    }
    return null;
  } catch {
    return null;
  }
}
