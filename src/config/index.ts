import { readFileSync, existsSync } from 'fs';
import { resolve } from 'path';
import { homedir } from 'os';
import { parse as parseYaml } from 'yaml';
import type { ZodIssue } from 'zod';
import { ConfigSchema } from './schema.js';
import { ConfigurationError, type ChaffGateConfig } from '../types/index.js';

type Env = Record<string, string | undefined>;

type RawConfig = Record<string, unknown>;

export function configSearchPaths(env: Env = process.env): string[] {
  const paths = [
    resolve(process.cwd(), 'chaffgate.yaml'),
    resolve(homedir(), '.chaffgate', 'config.yaml'),
    resolve(homedir(), '.config', 'chaffgate', 'config.yaml')
  ];

  if (env.CHAFFGATE_CONFIG) {
    paths.unshift(resolve(env.CHAFFGATE_CONFIG));
  }

  return paths;
}

function readConfigFile(paths: string[]): RawConfig {
  for (const path of paths) {
    if (!existsSync(path)) continue;

    let parsed: unknown;
    try {
      parsed = parseYaml(readFileSync(path, 'utf-8'));
    } catch (error) {
      throw new ConfigurationError(`Failed to read ${path}`, [
        error instanceof Error ? error.message : String(error)
      ]);
    }

    if (parsed === null || parsed === undefined) return {};
    if (!isRecord(parsed)) {
      throw new ConfigurationError(`Invalid configuration file ${path}`, ['top level must be a mapping']);
    }
    return parsed;
  }

  return {};
}

function splitList(value: string): string[] {
  return value
    .split(',')
    .map(item => item.trim())
    .filter(Boolean);
}

function section(raw: RawConfig, key: string): RawConfig {
  const value = raw[key];
  return isRecord(value) ? { ...value } : {};
}

// Environment variables win over the configuration file
export function applyEnvOverrides(raw: RawConfig, env: Env): RawConfig {
  const server = section(raw, 'server');
  const upstream = section(raw, 'upstream');
  const classifier = section(raw, 'classifier');
  const override = section(classifier, 'override');
  const obfuscation = section(raw, 'obfuscation');

  if (env.CHAFFGATE_BIND) {
    const separator = env.CHAFFGATE_BIND.lastIndexOf(':');
    if (separator <= 0) {
      throw new ConfigurationError('Invalid CHAFFGATE_BIND', [`expected host:port, got "${env.CHAFFGATE_BIND}"`]);
    }
    server.host = env.CHAFFGATE_BIND.slice(0, separator);
    server.port = env.CHAFFGATE_BIND.slice(separator + 1);
  }

  if (env.CHAFFGATE_UPSTREAM_BASE_URL) upstream.baseUrl = env.CHAFFGATE_UPSTREAM_BASE_URL;
  if (env.CHAFFGATE_TIMEOUT_MS) upstream.timeoutMs = env.CHAFFGATE_TIMEOUT_MS;
  if (env.CHAFFGATE_MAX_BODY_BYTES) upstream.maxBodyBytes = env.CHAFFGATE_MAX_BODY_BYTES;

  if (env.CHAFFGATE_OVERRIDE_PARAM) override.param = env.CHAFFGATE_OVERRIDE_PARAM;
  if (env.CHAFFGATE_OVERRIDE_VALUE) override.value = env.CHAFFGATE_OVERRIDE_VALUE;

  if (env.CHAFFGATE_IGNORE_IDS !== undefined) obfuscation.ignoreIds = splitList(env.CHAFFGATE_IGNORE_IDS);
  if (env.CHAFFGATE_META_TAGS !== undefined) obfuscation.metaTags = splitList(env.CHAFFGATE_META_TAGS);

  const excerpt = section(obfuscation, 'excerpt');
  if (env.CHAFFGATE_EXCERPT_ANCHOR_ID) excerpt.anchorId = env.CHAFFGATE_EXCERPT_ANCHOR_ID;
  if (env.CHAFFGATE_EXCERPT_LENGTH) excerpt.length = env.CHAFFGATE_EXCERPT_LENGTH;
  if (Object.keys(excerpt).length > 0) obfuscation.excerpt = excerpt;

  const result: RawConfig = {
    ...raw,
    server,
    upstream,
    classifier: { ...classifier, override },
    obfuscation
  };

  if (env.CHAFFGATE_ERROR_PAGE_STYLE) result.errorPageStyle = env.CHAFFGATE_ERROR_PAGE_STYLE;

  return result;
}

function formatIssue(issue: ZodIssue): string {
  const path = issue.path.length > 0 ? issue.path.join('.') : '(root)';
  return `${path}: ${issue.message}`;
}

export function parseConfig(raw: unknown): ChaffGateConfig {
  const parsed = ConfigSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ConfigurationError('Invalid configuration', parsed.error.issues.map(formatIssue));
  }
  const config: ChaffGateConfig = parsed.data;
  return deepFreeze(config);
}

export function loadConfig(env: Env = process.env, paths: string[] = configSearchPaths(env)): ChaffGateConfig {
  const raw = applyEnvOverrides(readConfigFile(paths), env);
  return parseConfig(raw);
}

function deepFreeze<T>(value: T): T {
  if (typeof value === 'object' && value !== null && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const child of Object.values(value)) {
      deepFreeze(child);
    }
  }
  return value;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
