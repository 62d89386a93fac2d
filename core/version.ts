import { existsSync, readFileSync } from 'fs';
import { dirname, join } from 'path';

function findPackageJson(start: string): string | undefined {
  let dir = start;
  for (;;) {
    const candidate = join(dir, 'package.json');
    if (existsSync(candidate)) {
      return candidate;
    }
    const parent = dirname(dir);
    if (parent === dir) {
      return undefined;
    }
    dir = parent;
  }
}

function readVersion(): string {
  const packageJsonPath = findPackageJson(__dirname);
  if (!packageJsonPath) {
    return '0.0.0';
  }
  const parsed: unknown = JSON.parse(readFileSync(packageJsonPath, 'utf-8'));
  if (typeof parsed === 'object' && parsed !== null && 'version' in parsed && typeof parsed.version === 'string') {
    return parsed.version;
  }
  return '0.0.0';
}

export const version = readVersion();
