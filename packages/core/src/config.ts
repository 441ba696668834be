/**
 * @module config
 * Viewer settings read from environment variables.
 *
 * | Variable                 | Default   |
 * |--------------------------|-----------|
 * | SVGVIEW_WIDTH / _HEIGHT  | 800 / 600 |
 * | SVGVIEW_FIT              | stretch   |
 * | SVGVIEW_RELOAD_POLICY    | keep      |
 * | SVGVIEW_DEBOUNCE_MS      | 0         |
 * | SVGVIEW_PORT             | 0         |
 * | SVGVIEW_OPEN             | 1         |
 * | SVGVIEW_CLOSE_GRACE_MS   | 2000      |
 * | SVGVIEW_FONT_DIRS        | (none)    |
 * | SVGVIEW_DEFAULT_FONT     | (none)    |
 * | SVGVIEW_LOG              | warn      |
 */

import * as path from 'path';
import type { FitPolicy, LogLevel, Size } from '@svgview/types';
import { ConfigError } from './errors';
import { isLogLevel } from './logger';

/** What to do when a reload cannot read or parse the file. */
export type ReloadPolicy = 'keep' | 'abort';

/** Fully resolved viewer configuration. */
export interface ViewerConfig {
  /** Viewport used until the window reports its real size. */
  initialSize: Size;
  fit: FitPolicy;
  reloadPolicy: ReloadPolicy;
  /** Coalescing window for bursts of file changes; 0 forwards every change. */
  debounceMs: number;
  /** Port of the viewer window server; 0 picks a free one. */
  port: number;
  /** Launch the system browser on the viewer page. */
  openBrowser: boolean;
  /** How long to wait for the page to reconnect before treating it as closed. */
  closeGraceMs: number;
  fontDirs: string[];
  /** Family used for text whose fonts cannot be found. */
  defaultFontFamily?: string;
  logLevel: LogLevel;
}

export const DEFAULT_CONFIG: Readonly<ViewerConfig> = {
  initialSize: { width: 800, height: 600 },
  fit: 'stretch',
  reloadPolicy: 'keep',
  debounceMs: 0,
  port: 0,
  openBrowser: true,
  closeGraceMs: 2000,
  fontDirs: [],
  logLevel: 'warn',
};

/** Largest accepted window edge, matching the raster surface limit. */
const MAX_EDGE = 32767;

function readInt(
  env: NodeJS.ProcessEnv,
  name: string,
  fallback: number,
  min: number,
  max: number,
): number {
  const raw = env[name];
  if (raw === undefined || raw.trim() === '') return fallback;
  if (!/^\d+$/.test(raw.trim())) {
    throw new ConfigError(`${name} must be an integer, got "${raw}"`);
  }
  const value = parseInt(raw, 10);
  if (value < min || value > max) {
    throw new ConfigError(`${name} must be between ${min} and ${max}, got ${value}`);
  }
  return value;
}

function readChoice<T extends string>(
  env: NodeJS.ProcessEnv,
  name: string,
  choices: readonly T[],
  fallback: T,
): T {
  const raw = env[name];
  if (raw === undefined || raw.trim() === '') return fallback;
  const value = raw.trim().toLowerCase();
  const match = choices.find((choice) => choice === value);
  if (match === undefined) {
    throw new ConfigError(`${name} must be one of ${choices.join(', ')}, got "${raw}"`);
  }
  return match;
}

function readFlag(env: NodeJS.ProcessEnv, name: string, fallback: boolean): boolean {
  const raw = env[name];
  if (raw === undefined || raw.trim() === '') return fallback;
  const value = raw.trim().toLowerCase();
  if (['1', 'true', 'yes', 'on'].includes(value)) return true;
  if (['0', 'false', 'no', 'off'].includes(value)) return false;
  throw new ConfigError(`${name} must be a boolean flag, got "${raw}"`);
}

/**
 * Resolve the configuration from an environment map.
 * @throws {ConfigError} On the first invalid value.
 */
export function loadViewerConfig(env: NodeJS.ProcessEnv = process.env): ViewerConfig {
  const logLevel = env.SVGVIEW_LOG?.trim().toLowerCase() ?? '';
  if (logLevel !== '' && !isLogLevel(logLevel)) {
    throw new ConfigError(`SVGVIEW_LOG must be one of error, warn, info, debug, got "${env.SVGVIEW_LOG}"`);
  }

  const defaultFontFamily = env.SVGVIEW_DEFAULT_FONT?.trim();

  return {
    initialSize: {
      width: readInt(env, 'SVGVIEW_WIDTH', DEFAULT_CONFIG.initialSize.width, 1, MAX_EDGE),
      height: readInt(env, 'SVGVIEW_HEIGHT', DEFAULT_CONFIG.initialSize.height, 1, MAX_EDGE),
    },
    fit: readChoice(env, 'SVGVIEW_FIT', ['stretch', 'contain'], DEFAULT_CONFIG.fit),
    reloadPolicy: readChoice(env, 'SVGVIEW_RELOAD_POLICY', ['keep', 'abort'], DEFAULT_CONFIG.reloadPolicy),
    debounceMs: readInt(env, 'SVGVIEW_DEBOUNCE_MS', DEFAULT_CONFIG.debounceMs, 0, 60_000),
    port: readInt(env, 'SVGVIEW_PORT', DEFAULT_CONFIG.port, 0, 65_535),
    openBrowser: readFlag(env, 'SVGVIEW_OPEN', DEFAULT_CONFIG.openBrowser),
    closeGraceMs: readInt(env, 'SVGVIEW_CLOSE_GRACE_MS', DEFAULT_CONFIG.closeGraceMs, 0, 60_000),
    fontDirs: (env.SVGVIEW_FONT_DIRS ?? '')
      .split(path.delimiter)
      .map((dir) => dir.trim())
      .filter((dir) => dir.length > 0),
    ...(defaultFontFamily ? { defaultFontFamily } : {}),
    logLevel: isLogLevel(logLevel) ? logLevel : DEFAULT_CONFIG.logLevel,
  };
}
