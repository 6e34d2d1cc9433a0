import fs from 'node:fs';
import path from 'node:path';
import os from 'node:os';
import yaml from 'js-yaml';
import type { TasksnapConfig } from '@tasksnap/shared';
import { ConfigError } from '../errors/errors.js';
import { isRecord, isStringArray } from '../storage/guards.js';
import { storageLayout } from '../storage/storage.layout.js';
import { DEFAULT_CONFIG } from './config.defaults.js';

const TASKSNAP_DIR = path.join(os.homedir(), '.tasksnap');
const CONFIG_PATH = path.join(TASKSNAP_DIR, 'config.yaml');

type PlainObject = Record<string, unknown>;

function deepMerge(base: PlainObject, override: PlainObject): PlainObject {
  const result: PlainObject = { ...base };
  for (const key of Object.keys(override)) {
    const overrideVal = override[key];
    const baseVal = base[key];
    if (isRecord(overrideVal) && isRecord(baseVal)) {
      result[key] = deepMerge(baseVal, overrideVal);
    } else if (overrideVal !== undefined) {
      result[key] = overrideVal;
    }
  }
  return result;
}

function section(config: PlainObject, key: string): PlainObject {
  const value = config[key];
  if (!isRecord(value)) throw new ConfigError(`${key} must be a mapping`);
  return value;
}

function nonNegativeInt(sectionName: string, obj: PlainObject, key: string, min = 0): number {
  const value = obj[key];
  if (typeof value !== 'number' || !Number.isInteger(value) || value < min) {
    throw new ConfigError(`${sectionName}.${key} must be an integer >= ${min}`);
  }
  return value;
}

function bool(sectionName: string, obj: PlainObject, key: string): boolean {
  const value = obj[key];
  if (typeof value !== 'boolean') {
    throw new ConfigError(`${sectionName}.${key} must be true or false`);
  }
  return value;
}

/**
 * Check every field and rebuild a typed config from the merged YAML data.
 */
export function validateConfig(raw: PlainObject): TasksnapConfig {
  const snapshots = section(raw, 'snapshots');
  const rollback = section(raw, 'rollback');
  const validation = section(raw, 'validation');
  const briefs = section(raw, 'briefs');
  const archive = section(raw, 'archive');
  const logs = section(raw, 'logs');

  const mode = snapshots['mode'];
  if (mode !== 'auto' && mode !== 'native' && mode !== 'file_copy') {
    throw new ConfigError('snapshots.mode must be one of auto, native, file_copy');
  }
  const ignore = snapshots['ignore'];
  if (!isStringArray(ignore)) {
    throw new ConfigError('snapshots.ignore must be a list of strings');
  }

  const command = validation['command'];
  if (command !== null && (typeof command !== 'string' || !command.trim())) {
    throw new ConfigError('validation.command must be a non-empty string or null');
  }

  const dir = briefs['dir'];
  if (typeof dir !== 'string' || !dir.trim()) {
    throw new ConfigError('briefs.dir must be a non-empty string');
  }

  return {
    snapshots: {
      mode,
      retention: nonNegativeInt('snapshots', snapshots, 'retention', 1),
      strict_dirty: bool('snapshots', snapshots, 'strict_dirty'),
      ignore,
    },
    rollback: {
      delete_untracked: bool('rollback', rollback, 'delete_untracked'),
      lock_timeout_ms: nonNegativeInt('rollback', rollback, 'lock_timeout_ms'),
    },
    validation: {
      command,
      timeout_ms: nonNegativeInt('validation', validation, 'timeout_ms', 1),
    },
    briefs: { dir },
    archive: {
      by_branch: bool('archive', archive, 'by_branch'),
      by_title: bool('archive', archive, 'by_title'),
    },
    logs: {
      retention: nonNegativeInt('logs', logs, 'retention', 1),
    },
  };
}

function readYaml(file: string): PlainObject {
  const raw = fs.readFileSync(file, 'utf8');
  let parsed: unknown;
  try {
    parsed = yaml.load(raw);
  } catch (err) {
    throw new ConfigError(`${file} is not valid YAML: ${err instanceof Error ? err.message : String(err)}`);
  }
  if (parsed === null || parsed === undefined) return {};
  if (!isRecord(parsed)) throw new ConfigError(`${file} must contain a mapping`);
  return parsed;
}

export function writeConfig(config: TasksnapConfig): void {
  validateConfig({ ...config });
  if (!fs.existsSync(TASKSNAP_DIR)) {
    fs.mkdirSync(TASKSNAP_DIR, { recursive: true });
  }
  fs.writeFileSync(CONFIG_PATH, yaml.dump(config), 'utf8');
}

/**
 * Load ~/.tasksnap/config.yaml (written with defaults on first run), layer
 * <projectRoot>/.tasksnap/config.yaml on top, and validate the result.
 */
export async function loadConfig(projectRoot?: string): Promise<TasksnapConfig> {
  if (!fs.existsSync(TASKSNAP_DIR)) {
    fs.mkdirSync(TASKSNAP_DIR, { recursive: true });
  }

  let userConfig: PlainObject = {};
  if (fs.existsSync(CONFIG_PATH)) {
    userConfig = readYaml(CONFIG_PATH);
  } else {
    fs.writeFileSync(CONFIG_PATH, yaml.dump(DEFAULT_CONFIG), 'utf8');
    process.stderr.write(`Created default config at ${CONFIG_PATH}\n`);
  }

  let merged = deepMerge({ ...DEFAULT_CONFIG }, userConfig);

  if (projectRoot) {
    const projectConfig = storageLayout(projectRoot).projectConfig;
    if (fs.existsSync(projectConfig)) {
      merged = deepMerge(merged, readYaml(projectConfig));
    }
  }

  return validateConfig(merged);
}

export { TASKSNAP_DIR, CONFIG_PATH };
