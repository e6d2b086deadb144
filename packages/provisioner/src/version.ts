import { existsSync, readFileSync } from 'node:fs';
import { dirname, resolve } from 'node:path';
import { fileURLToPath } from 'node:url';

const __dirname = dirname(fileURLToPath(import.meta.url));

// package.json sits one level up from both src/ and dist/
const candidates = [resolve(__dirname, '..', 'package.json')];

function readVersion(): string {
  for (const candidate of candidates) {
    if (!existsSync(candidate)) continue;
    const pkg = JSON.parse(readFileSync(candidate, 'utf-8')) as { version: string };
    return pkg.version;
  }
  return '0.0.0';
}

export const VERSION: string = readVersion();
