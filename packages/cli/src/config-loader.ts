import { parseConfig } from '@lp-builds/shared';
import type { Config } from '@lp-builds/shared';
import { parseCatalog, type BoardCatalog } from '@lp-builds/launchpad';
import { readFileSync, existsSync } from 'node:fs';
import { resolve } from 'node:path';

export const DEFAULT_CONFIG_FILE = 'lp-builds.json';

function readJson(path: string): unknown {
  return JSON.parse(readFileSync(path, 'utf-8'));
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function section(raw: unknown, key: string): Record<string, unknown> {
  const value = isRecord(raw) ? raw[key] : undefined;
  return isRecord(value) ? { ...value } : {};
}

export function loadConfig(configPath?: string, env: NodeJS.ProcessEnv = process.env): Config {
  let raw: unknown = {};

  // 1. Try configPath if provided, else look for lp-builds.json in CWD
  if (configPath) {
    const resolved = resolve(configPath);
    if (!existsSync(resolved)) {
      throw new Error(`Config file not found: ${resolved}`);
    }
    raw = readJson(resolved);
  } else {
    const defaultPath = resolve(DEFAULT_CONFIG_FILE);
    if (existsSync(defaultPath)) {
      raw = readJson(defaultPath);
    }
  }

  // 2. Build nested structure, applying env var overrides
  const launchpad = section(raw, 'launchpad');
  const snaps = section(raw, 'snaps');
  const images = section(raw, 'images');
  const receiver = section(raw, 'receiver');
  let catalogPath: unknown = isRecord(raw) ? raw.catalogPath : undefined;

  if (env.LP_BUILDS_BASE_URL) launchpad.baseUrl = env.LP_BUILDS_BASE_URL;
  if (env.LP_BUILDS_USERNAME) launchpad.username = env.LP_BUILDS_USERNAME;
  if (env.LP_BUILDS_CONSUMER_KEY) launchpad.consumerKey = env.LP_BUILDS_CONSUMER_KEY;
  if (env.LP_BUILDS_TOKEN) launchpad.token = env.LP_BUILDS_TOKEN;
  if (env.LP_BUILDS_SECRET) launchpad.secret = env.LP_BUILDS_SECRET;

  if (env.LP_BUILDS_GPG_PASSPHRASE) images.gpgPassphrase = env.LP_BUILDS_GPG_PASSPHRASE;

  if (env.LP_BUILDS_RECEIVER_PORT) receiver.port = parseInt(env.LP_BUILDS_RECEIVER_PORT, 10);
  if (env.LP_BUILDS_RECEIVER_SECRET) receiver.secret = env.LP_BUILDS_RECEIVER_SECRET;

  if (env.LP_BUILDS_CATALOG) catalogPath = env.LP_BUILDS_CATALOG;

  // 3. Validate with parseConfig (zod) and return typed Config
  return parseConfig({ launchpad, snaps, images, receiver, catalogPath });
}

/** The board catalog named by the config, or undefined for the built-in one. */
export function loadCatalog(config: Config): BoardCatalog | undefined {
  if (!config.catalogPath) return undefined;

  const resolved = resolve(config.catalogPath);
  if (!existsSync(resolved)) {
    throw new Error(`Catalog file not found: ${resolved}`);
  }
  return parseCatalog(readJson(resolved));
}
