import * as fs from 'fs';
import * as path from 'path';
import * as os from 'os';
import { config as loadDotenv } from 'dotenv';

const CONFIG_DIR = path.join(os.homedir(), '.pausekit');
const CONFIG_FILE = path.join(CONFIG_DIR, 'config.json');

const DEFAULT_STATE_DIR = '.pausekit';
const DEFAULT_STATE_FILE = 'breaker.json';
const MAX_ACTOR_LENGTH = 64;

let _configCache: Config | null = null;

// Load .env from current directory if exists
loadDotenv();

export interface Config {
  stateFile?: string;  // where the CLI keeps the packed breaker word
  actor?: string;      // identity attached to notifications
}

function parseConfig(raw: unknown): Config {
  if (typeof raw !== 'object' || raw === null) return {};
  const config: Config = {};
  if ('stateFile' in raw && typeof raw.stateFile === 'string') {
    config.stateFile = raw.stateFile;
  }
  if ('actor' in raw && typeof raw.actor === 'string') {
    config.actor = raw.actor;
  }
  return config;
}

export function loadConfig(): Config {
  if (_configCache) return _configCache;
  let config: Config = {};
  if (fs.existsSync(CONFIG_FILE)) {
    try {
      config = parseConfig(JSON.parse(fs.readFileSync(CONFIG_FILE, 'utf-8')));
    } catch (error) {
      console.warn('Ignoring unreadable config file:', error);
    }
  }
  _configCache = config;
  return config;
}

export function _clearConfigCache(): void {
  _configCache = null;
}

export function saveConfig(config: Config): void {
  if (!fs.existsSync(CONFIG_DIR)) {
    fs.mkdirSync(CONFIG_DIR, { recursive: true, mode: 0o700 });
  }
  fs.writeFileSync(CONFIG_FILE, JSON.stringify(config, null, 2), {
    mode: 0o600,
  });
  _configCache = config;
}

export function getConfigFilePath(): string {
  return CONFIG_FILE;
}

// --- State file ---

export function getStateFilePath(cwd: string = process.cwd()): string {
  // Priority: env var > config file > project-local default
  const envPath = process.env.PAUSEKIT_STATE_FILE;
  if (envPath) {
    return path.resolve(cwd, envPath);
  }
  const configured = loadConfig().stateFile;
  if (configured) {
    return path.resolve(cwd, configured);
  }
  return path.join(cwd, DEFAULT_STATE_DIR, DEFAULT_STATE_FILE);
}

export function setStateFilePath(stateFile: string): void {
  const config = loadConfig();
  config.stateFile = path.resolve(stateFile);
  saveConfig(config);
}

// --- Actor ---

export function validateActor(actor: string): boolean {
  return actor.length > 0 && actor.length <= MAX_ACTOR_LENGTH && !/\s/.test(actor);
}

function osUserName(): string {
  try {
    return os.userInfo().username;
  } catch {
    // No passwd entry (e.g. a container running as an arbitrary uid)
    return 'unknown';
  }
}

export function getActor(): string {
  // Priority: env var > config file > OS user
  const envActor = process.env.PAUSEKIT_ACTOR;
  if (envActor && validateActor(envActor)) {
    return envActor;
  }
  const configured = loadConfig().actor;
  if (configured !== undefined && validateActor(configured)) {
    return configured;
  }
  return osUserName();
}

export function getActorSource(): 'env' | 'config' | 'os' {
  const envActor = process.env.PAUSEKIT_ACTOR;
  if (envActor && validateActor(envActor)) {
    return 'env';
  }
  const configured = loadConfig().actor;
  return configured !== undefined && validateActor(configured) ? 'config' : 'os';
}

export function setActor(actor: string): void {
  const config = loadConfig();
  config.actor = actor;
  saveConfig(config);
}

export function clearActor(): void {
  const config = loadConfig();
  delete config.actor;
  saveConfig(config);
}
