import { readFileSync, existsSync } from 'fs';
import { join } from 'path';
import { homedir } from 'os';
import { MAX_TIMER_DELAY_MS } from '../utils/exec.js';

export interface ServerConfig {
  port: number;
  host: string;
}

export interface WebSocketConfig {
  path: string;
  heartbeatInterval: number;
}

export interface DiscoveryConfig {
  enabled: boolean;
  pollInterval: number;
}

export interface ToolsConfig {
  adbPath: string;
  scrcpyPath: string;
  adbTimeoutMs: number;
  /** Ceiling for a mirroring session; sessions last as long as the user wants */
  scrcpyTimeoutMs: number;
  stopGraceMs: number;
}

export interface AuthConfig {
  enabled: boolean;
  secret: string;
  /** Lifetime of a control token, in seconds */
  tokenExpiry: number;
  /** Lifetime of a WebSocket ticket, in seconds */
  ticketExpiry: number;
  passwordHash: string;
}

export interface AppConfig {
  server: ServerConfig;
  websocket: WebSocketConfig;
  discovery: DiscoveryConfig;
  tools: ToolsConfig;
  auth: AuthConfig;
}

export type ConfigOverrides = { [K in keyof AppConfig]?: Partial<AppConfig[K]> };

export const DEFAULT_CONFIG: AppConfig = {
  server: {
    port: 3000,
    host: '127.0.0.1',
  },
  websocket: {
    path: '/ws',
    heartbeatInterval: 30000,
  },
  discovery: {
    enabled: true,
    pollInterval: 3000,
  },
  tools: {
    adbPath: 'adb',
    scrcpyPath: 'scrcpy',
    adbTimeoutMs: 10_000,
    scrcpyTimeoutMs: 24 * 60 * 60 * 1000,
    stopGraceMs: 5000,
  },
  auth: {
    enabled: false,
    secret: 'change-this-secret-in-production',
    tokenExpiry: 86400,
    ticketExpiry: 60,
    passwordHash: '',
  },
};

const CONFIG_PATHS = [
  join(process.cwd(), 'config', 'config.json'),
  join(homedir(), '.config', 'mirror-control', 'config.json'),
];

function loadConfigFile(): ConfigOverrides {
  for (const configPath of CONFIG_PATHS) {
    if (existsSync(configPath)) {
      try {
        const content = readFileSync(configPath, 'utf-8');
        const parsed: unknown = JSON.parse(content);
        if (!isRecord(parsed)) {
          console.error(`Ignoring ${configPath}: expected a JSON object`);
          continue;
        }
        console.log(`Loaded config from ${configPath}`);
        return overridesFromJson(parsed);
      } catch (err) {
        console.error(`Failed to load config from ${configPath}:`, err);
      }
    }
  }
  return {};
}

function parseIntEnv(value: string | undefined): number | undefined {
  if (value === undefined || value === '') return undefined;
  return parseInt(value, 10);
}

export function loadEnvConfig(env: NodeJS.ProcessEnv = process.env): ConfigOverrides {
  const config: ConfigOverrides = {};

  // Server config
  const port = parseIntEnv(env.PORT);
  if (port !== undefined || env.HOST) {
    config.server = { port, host: env.HOST || undefined };
  }

  // Discovery config
  const pollInterval = parseIntEnv(env.DISCOVERY_INTERVAL);
  if (pollInterval !== undefined || env.DISCOVERY_ENABLED) {
    config.discovery = {
      pollInterval,
      enabled: env.DISCOVERY_ENABLED ? env.DISCOVERY_ENABLED === 'true' : undefined,
    };
  }

  // Tool locations
  const adbTimeoutMs = parseIntEnv(env.ADB_TIMEOUT_MS);
  const stopGraceMs = parseIntEnv(env.SCRCPY_STOP_GRACE_MS);
  if (env.ADB_PATH || env.SCRCPY_PATH || adbTimeoutMs !== undefined || stopGraceMs !== undefined) {
    config.tools = {
      adbPath: env.ADB_PATH || undefined,
      scrcpyPath: env.SCRCPY_PATH || undefined,
      adbTimeoutMs,
      stopGraceMs,
    };
  }

  // Auth config
  const auth: Partial<AuthConfig> = {};
  if (env.AUTH_ENABLED) auth.enabled = env.AUTH_ENABLED === 'true';
  if (env.AUTH_SECRET) auth.secret = env.AUTH_SECRET;
  const tokenExpiry = parseIntEnv(env.AUTH_TOKEN_EXPIRY);
  if (tokenExpiry !== undefined) auth.tokenExpiry = tokenExpiry;
  const ticketExpiry = parseIntEnv(env.AUTH_TICKET_EXPIRY);
  if (ticketExpiry !== undefined) auth.ticketExpiry = ticketExpiry;
  if (env.AUTH_PASSWORD_HASH) {
    auth.passwordHash = env.AUTH_PASSWORD_HASH;
    auth.enabled = true;
  }
  if (Object.keys(auth).length > 0) {
    config.auth = auth;
  }

  return config;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function section(raw: Record<string, unknown>, key: keyof AppConfig): Record<string, unknown> {
  const value = raw[key];
  return isRecord(value) ? value : {};
}

const num = (value: unknown): number | undefined => (typeof value === 'number' ? value : undefined);
const str = (value: unknown): string | undefined => (typeof value === 'string' ? value : undefined);
const bool = (value: unknown): boolean | undefined => (typeof value === 'boolean' ? value : undefined);

/** Keeps only the known keys of a parsed config file, with the right types */
export function overridesFromJson(raw: Record<string, unknown>): ConfigOverrides {
  const server = section(raw, 'server');
  const websocket = section(raw, 'websocket');
  const discovery = section(raw, 'discovery');
  const tools = section(raw, 'tools');
  const auth = section(raw, 'auth');

  return {
    server: { port: num(server.port), host: str(server.host) },
    websocket: { path: str(websocket.path), heartbeatInterval: num(websocket.heartbeatInterval) },
    discovery: { enabled: bool(discovery.enabled), pollInterval: num(discovery.pollInterval) },
    tools: {
      adbPath: str(tools.adbPath),
      scrcpyPath: str(tools.scrcpyPath),
      adbTimeoutMs: num(tools.adbTimeoutMs),
      scrcpyTimeoutMs: num(tools.scrcpyTimeoutMs),
      stopGraceMs: num(tools.stopGraceMs),
    },
    auth: {
      enabled: bool(auth.enabled),
      secret: str(auth.secret),
      tokenExpiry: num(auth.tokenExpiry),
      ticketExpiry: num(auth.ticketExpiry),
      passwordHash: str(auth.passwordHash),
    },
  };
}

function merge<T extends object>(target: T, source: Partial<T> | undefined): T {
  if (!source) return { ...target };
  const defined = Object.fromEntries(Object.entries(source).filter(([, value]) => value !== undefined));
  return { ...target, ...defined };
}

export function mergeConfig(base: AppConfig, overrides: ConfigOverrides): AppConfig {
  return {
    server: merge(base.server, overrides.server),
    websocket: merge(base.websocket, overrides.websocket),
    discovery: merge(base.discovery, overrides.discovery),
    tools: merge(base.tools, overrides.tools),
    auth: merge(base.auth, overrides.auth),
  };
}

export function validateConfig(config: AppConfig): void {
  if (!Number.isInteger(config.server.port) || config.server.port < 1 || config.server.port > 65535) {
    throw new Error('Invalid port number');
  }
  if (!(config.discovery.pollInterval >= 500)) {
    throw new Error('Discovery poll interval must be at least 500ms');
  }
  if (!config.tools.adbPath || !config.tools.scrcpyPath) {
    throw new Error('Tool paths must not be empty');
  }
  for (const key of ['adbTimeoutMs', 'scrcpyTimeoutMs', 'stopGraceMs'] as const) {
    if (!(config.tools[key] > 0)) {
      throw new Error(`tools.${key} must be a positive number of milliseconds`);
    }
    if (config.tools[key] > MAX_TIMER_DELAY_MS) {
      throw new Error(`tools.${key} must not exceed ${MAX_TIMER_DELAY_MS}ms`);
    }
  }
  if (config.auth.enabled && !config.auth.secret) {
    throw new Error('Auth secret is required when auth is enabled');
  }
  if (config.auth.enabled && !config.auth.passwordHash) {
    throw new Error('Auth password hash is required when auth is enabled');
  }
  if (config.auth.enabled && !(config.auth.ticketExpiry > 0 && config.auth.ticketExpiry < config.auth.tokenExpiry)) {
    throw new Error('Auth ticket expiry must be positive and shorter than the token expiry');
  }
}

let cachedConfig: AppConfig | null = null;

export function loadConfig(): AppConfig {
  if (cachedConfig) return cachedConfig;

  // Priority: env > file > defaults
  let config = mergeConfig(DEFAULT_CONFIG, loadConfigFile());
  config = mergeConfig(config, loadEnvConfig());

  validateConfig(config);

  cachedConfig = config;
  return config;
}

export function getConfig(): AppConfig {
  return cachedConfig || loadConfig();
}

export function reloadConfig(): AppConfig {
  cachedConfig = null;
  return loadConfig();
}
