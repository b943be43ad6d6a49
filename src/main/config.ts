/**
 * Runtime configuration from environment variables and the command line.
 *
 * The entry point loads `.env` through `dotenv/config` before calling
 * {@link load_config}; this module only reads the resulting environment.
 *
 * @module config
 */

import { is_log_level, type LogLevel } from './log/logger';

export const DEFAULT_CONNECTION_URL = 'serial:///dev/ttyUSB0:57600';
export const DEFAULT_LOG_DIR = 'flight_logs';

export interface AppConfig {
  connection_url: string;
  log_dir: string;
  display_enabled: boolean;
  log_level: LogLevel;
  tick_ms: number;
  fetch_retry_ms: number;
  restart_delay_ms: number;
  /** Print serial ports and exit instead of connecting. */
  list_ports: boolean;
}

type Env = Record<string, string | undefined>;

const num = (v: string | undefined, def: number): number =>
  v != null && v !== '' && !Number.isNaN(Number(v)) && Number(v) > 0 ? Number(v) : def;

const flag = (v: string | undefined, def: boolean): boolean => {
  if (v == null || v === '') {
    return def;
  }
  return !['false', '0', 'no', 'off'].includes(v.trim().toLowerCase());
};

/**
 * Build the configuration.
 *
 * @param env - Usually `process.env`.
 * @param argv - Arguments after the script name. The first positional
 *   argument overrides the connection URL.
 * @throws If `TELEMETRY_LOG_LEVEL` names an unknown level.
 */
export function load_config(env: Env, argv: readonly string[] = []): AppConfig {
  const positional = argv.filter((arg) => !arg.startsWith('--'));
  const level = (env.TELEMETRY_LOG_LEVEL ?? 'warn').trim().toLowerCase();
  if (!is_log_level(level)) {
    throw new Error(`Invalid TELEMETRY_LOG_LEVEL "${level}"`);
  }

  return {
    connection_url: positional[0] ?? env.TELEMETRY_CONNECTION ?? DEFAULT_CONNECTION_URL,
    log_dir: env.TELEMETRY_LOG_DIR || DEFAULT_LOG_DIR,
    display_enabled: flag(env.TELEMETRY_DISPLAY, true),
    log_level: level,
    tick_ms: num(env.TELEMETRY_TICK_MS, 1000),
    fetch_retry_ms: num(env.TELEMETRY_FETCH_RETRY_MS, 1000),
    restart_delay_ms: num(env.TELEMETRY_RESTART_DELAY_MS, 5000),
    list_ports: argv.includes('--list-ports')
  };
}
