/**
 * Server configuration from environment variables
 *
 *   ZK_DIRECTORY       notes directory (else VAULT_PATH, else nearest .zk/.obsidian root)
 *   ZK_FILE_EXTENSION  note file extension without the dot (default: md)
 *   ZK_ID_REGEXP       id pattern (default: \d{12})
 *   ZK_INDEX_FORMAT    row template (default: "%t [[%i]]")
 *   ZK_DEFAULT_SORT    modified | created | size (default: modified)
 *   ZK_WATCH           reload the store on file changes (default: true)
 *   ZK_DEBOUNCE_MS     watcher debounce (default: 500)
 *
 * Invalid values are reported and replaced by their default.
 */

import { z } from 'zod';
import {
  DEFAULT_EXTENSION,
  DEFAULT_ID_PATTERN,
  DEFAULT_INDEX_FORMAT,
  DEFAULT_SORT_MODE,
  type SortMode,
} from '@zk-index/core';
import { findVaultRoot } from './vaultRoot.js';
import { serverLog } from '../shared/serverLog.js';

export interface ZkConfig {
  vaultPath: string;
  extension: string;
  idPattern: string;
  indexFormat: string;
  defaultSort: SortMode;
  watch: boolean;
  debounceMs: number;
}

export const DEFAULT_DEBOUNCE_MS = 500;

const ExtensionSchema = z.string().regex(/^[A-Za-z0-9]+$/, 'letters and digits only');

const IdPatternSchema = z.string().min(1).refine((pattern) => {
  try {
    new RegExp(pattern);
    return true;
  } catch {
    return false;
  }
}, 'not a valid regular expression');

const IndexFormatSchema = z.string().min(1);

const SortSchema = z.enum(['modified', 'created', 'size']);

const BooleanSchema = z.enum(['true', 'false', '1', '0']).transform((v) => v === 'true' || v === '1');

const DebounceSchema = z.coerce.number().int().positive();

type Env = Record<string, string | undefined>;

/**
 * Parse one variable, falling back to `fallback` (with a warning) when the
 * value does not validate.
 */
function readVar<T>(env: Env, name: string, schema: z.ZodType<T, z.ZodTypeDef, unknown>, fallback: T): T {
  const raw = env[name]?.trim();
  if (raw === undefined || raw === '') {
    return fallback;
  }

  const parsed = schema.safeParse(raw);
  if (parsed.success) {
    return parsed.data;
  }

  const reason = parsed.error.issues.map((issue) => issue.message).join('; ');
  serverLog('config', `Ignoring ${name}="${raw}" (${reason}), using ${JSON.stringify(fallback)}`, 'warn');
  return fallback;
}

export function loadConfig(env: Env = process.env): ZkConfig {
  const vaultPath = env.ZK_DIRECTORY?.trim() || env.VAULT_PATH?.trim() || findVaultRoot();

  return {
    vaultPath,
    extension: readVar(env, 'ZK_FILE_EXTENSION', ExtensionSchema, DEFAULT_EXTENSION),
    idPattern: readVar(env, 'ZK_ID_REGEXP', IdPatternSchema, DEFAULT_ID_PATTERN),
    indexFormat: readVar(env, 'ZK_INDEX_FORMAT', IndexFormatSchema, DEFAULT_INDEX_FORMAT),
    defaultSort: readVar(env, 'ZK_DEFAULT_SORT', SortSchema, DEFAULT_SORT_MODE),
    watch: readVar(env, 'ZK_WATCH', BooleanSchema, true),
    debounceMs: readVar(env, 'ZK_DEBOUNCE_MS', DebounceSchema, DEFAULT_DEBOUNCE_MS),
  };
}
