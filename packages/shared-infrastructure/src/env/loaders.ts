/**
 * Environment variable loading utilities.
 * `.env` files are parsed with Node's built-in parser; typed readers apply defaults.
 */
import { existsSync, readFileSync } from 'node:fs';
import { isAbsolute, resolve } from 'node:path';
import { parseEnv } from 'node:util';

export interface LoadEnvOptions {
  cwd?: string;
  files?: string[];
  override?: boolean;
  assignToProcess?: boolean;
}

export interface LoadEnvResult {
  values: Record<string, string>;
  loadedFiles: string[];
  missingFiles: string[];
  assignedKeys: string[];
}

/**
 * Load variables from one or more `.env` files (default: `.env` in cwd).
 * Later files win over earlier ones only when `override` is set; existing
 * process variables are kept unless `override` is set.
 */
export function loadEnvFiles(options: LoadEnvOptions = {}): LoadEnvResult {
  const cwd = resolve(options.cwd ?? process.cwd());
  const files = (options.files && options.files.length > 0 ? options.files : ['.env']).map(
    (file) => (isAbsolute(file) ? file : resolve(cwd, file)),
  );
  const override = options.override ?? false;
  const assignToProcess = options.assignToProcess ?? true;

  const values: Record<string, string> = {};
  const loadedFiles: string[] = [];
  const missingFiles: string[] = [];
  const assignedKeys = new Set<string>();

  for (const file of files) {
    if (!existsSync(file)) {
      missingFiles.push(file);
      continue;
    }

    const parsed = parseEnv(readFileSync(file, 'utf8'));
    loadedFiles.push(file);

    for (const [key, value] of Object.entries(parsed)) {
      if (value === undefined) continue;

      if (override || values[key] === undefined) {
        values[key] = value;
      }

      if (assignToProcess && (override || process.env[key] === undefined)) {
        process.env[key] = value;
        assignedKeys.add(key);
      }
    }
  }

  return { values, loadedFiles, missingFiles, assignedKeys: [...assignedKeys] };
}

/**
 * Read integer from environment with default. Fractions are truncated.
 */
export function readInt(name: string, def: number): number {
  const v = process.env[name];
  if (!v) return def;
  const n = Number(v);
  return Number.isFinite(n) ? Math.trunc(n) : def;
}

export function readNumber(name: string, def: number): number {
  const v = process.env[name];
  if (!v) return def;
  const n = Number(v);
  return Number.isFinite(n) ? n : def;
}

export function readString(name: string, def: string): string;
export function readString(name: string, def?: string): string | undefined;
export function readString(name: string, def?: string): string | undefined {
  const v = process.env[name];
  if (v == null || v === '') return def;
  return v;
}

/**
 * Read a comma-separated list; blank entries are dropped.
 */
export function readList(name: string, def: readonly string[]): string[] {
  const v = process.env[name];
  if (v == null || v.trim() === '') return [...def];
  return v
    .split(',')
    .map((item) => item.trim())
    .filter(Boolean);
}

/**
 * Read one of a closed set of values. Returns `undefined` for values outside
 * the set so callers can decide whether that is a configuration error.
 */
export function readEnum<T extends string>(
  name: string,
  allowed: readonly T[],
  def: T,
): T | undefined {
  const v = readString(name);
  if (v === undefined) return def;
  const normalized = v.trim().toLowerCase();
  return allowed.find((candidate) => candidate === normalized);
}
