import { fileURLToPath } from 'node:url';
import fs from 'node:fs';
import path from 'node:path';
import { homedir } from 'node:os';
import { nanoid } from 'nanoid';

export const ID_SIZE = 21;

const ID_PATTERN = new RegExp(`^[A-Za-z0-9_-]{${ID_SIZE}}$`);

export function generateId(size = ID_SIZE): string {
  return nanoid(size);
}

/** True when `id` has the shape of an identifier produced by `generateId`. */
export function isGeneratedId(id: string): boolean {
  return ID_PATTERN.test(id);
}

export function resolvePath(p: string): string {
  if (p.startsWith('~/') || p === '~') {
    return path.join(homedir(), p.slice(1));
  }
  return path.resolve(p);
}

export function toISO(date: Date): string {
  return date.toISOString();
}

export function daysBefore(date: Date, days: number): Date {
  return new Date(date.getTime() - days * 24 * 3600 * 1000);
}

export function getPackageRoot(): string {
  // Walk up from the current file to the directory holding package.json.
  // Works from both src/shared/utils.ts and dist/shared/utils.js.
  let dir = path.dirname(fileURLToPath(import.meta.url));
  while (true) {
    if (fs.existsSync(path.join(dir, 'package.json'))) return dir;
    const parent = path.dirname(dir);
    if (parent === dir) break;
    dir = parent;
  }
  return path.resolve(path.dirname(fileURLToPath(import.meta.url)), '..', '..');
}

export function getTrendscribeDir(): string {
  return resolvePath('~/.trendscribe');
}

export function isPlainObject(value: unknown): value is Record<string, unknown> {
  if (value === null || typeof value !== 'object' || Array.isArray(value)) return false;
  const proto: unknown = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}
