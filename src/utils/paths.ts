import fs from 'fs';
import path from 'path';

let cachedRoot: string | null = null;

/**
 * Directory holding package.json, found by walking up from this file.
 * Works from both src/ and the compiled dist/ tree.
 */
export function projectRoot(): string {
  if (cachedRoot) {
    return cachedRoot;
  }

  let dir = __dirname;
  while (!fs.existsSync(path.join(dir, 'package.json'))) {
    const parent = path.dirname(dir);
    if (parent === dir) {
      return process.cwd();
    }
    dir = parent;
  }

  cachedRoot = dir;
  return dir;
}

export function fromProjectRoot(...segments: string[]): string {
  return path.join(projectRoot(), ...segments);
}
