/**
 * rulestudio Data Files
 * Static tables shipped in src/data (copied to dist/data on build)
 */

import * as fs from 'fs';

const cache = new Map<string, unknown>();

export function dataFileUrl(name: string): URL {
  return new URL(`./data/${name}`, import.meta.url);
}

export function readDataText(name: string): string {
  return fs.readFileSync(dataFileUrl(name), 'utf-8');
}

/**
 * Parsed JSON data file, read once per process
 */
export function readDataJson(name: string): unknown {
  if (!cache.has(name)) {
    const parsed: unknown = JSON.parse(readDataText(name));
    cache.set(name, parsed);
  }
  return cache.get(name);
}

export function isObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function isStringArray(value: unknown): value is string[] {
  return Array.isArray(value) && value.every((item) => typeof item === 'string');
}
