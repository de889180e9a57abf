import path from 'node:path';

import { ConfigurationError } from './errors.js';
import {
  DEFAULT_DEBOUNCE_SECONDS,
  DEFAULT_POLLING_INTERVAL_SECONDS,
  DEFAULT_REMOTE_TIMEOUT_SECONDS,
  DEFAULT_SHUTDOWN_TIMEOUT_SECONDS,
  DEFAULT_STARTUP_DELAY_SECONDS,
  DEFAULT_TIMEOUT_MINUTES,
  STATE_DIRECTORY,
  STATE_FILE_NAME,
} from './settings.js';
import type { ControllerConfig } from './settings.js';

export interface CameraSpec {
  readonly name: string;
  readonly inputPin: number;
  readonly ledPin: number | null;
  /** 0 disables the auto-disable timeout. */
  readonly timeoutMinutes: number;
  readonly enabled: boolean;
}

export interface GlobalSettings {
  readonly debounceSeconds: number;
  readonly pollingIntervalSeconds: number;
  readonly startupDelaySeconds: number;
  readonly stateFilePath: string;
  readonly remoteTimeoutSeconds: number;
  readonly shutdownTimeoutSeconds: number;
}

export interface PrivacyButtonSettings {
  readonly controller: ControllerConfig;
  readonly cameras: readonly CameraSpec[];
  readonly global: GlobalSettings;
}

const PLATFORM_KEYS = new Set([
  'platform',
  'name',
  '_bridge',
  'controller',
  'cameras',
  'debounceSeconds',
  'pollingIntervalSeconds',
  'startupDelaySeconds',
  'stateFilePath',
  'remoteTimeoutSeconds',
  'shutdownTimeoutSeconds',
]);

const CONTROLLER_KEYS = new Set(['address', 'username', 'password']);

const CAMERA_KEYS = new Set(['name', 'inputPin', 'ledPin', 'timeoutMinutes', 'enabled']);

type Fields = Record<string, unknown>;

function isRecord(value: unknown): value is Fields {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function rejectUnknownKeys(fields: Fields, allowed: Set<string>, where: string): void {
  const unknown = Object.keys(fields).filter(key => !allowed.has(key));
  if (unknown.length > 0) {
    throw new ConfigurationError(`Unknown ${where} field(s): ${unknown.join(', ')}`);
  }
}

function requireString(fields: Fields, key: string, where: string): string {
  const value = fields[key];
  if (typeof value !== 'string' || value.trim() === '') {
    throw new ConfigurationError(`${where}.${key} must be a non-empty string`);
  }
  return value;
}

function optionalNumber(
  fields: Fields,
  key: string,
  where: string,
  fallback: number,
  check: (value: number) => boolean,
  expectation: string,
): number {
  const value = fields[key];
  if (value === undefined) {
    return fallback;
  }
  if (typeof value !== 'number' || !Number.isFinite(value) || !check(value)) {
    throw new ConfigurationError(`${where}.${key} must be ${expectation}`);
  }
  return value;
}

function parsePin(value: unknown, where: string): number {
  if (typeof value !== 'number' || !Number.isInteger(value) || value < 0) {
    throw new ConfigurationError(`${where} must be a non-negative integer GPIO number`);
  }
  return value;
}

function parseController(value: unknown): ControllerConfig {
  if (!isRecord(value)) {
    throw new ConfigurationError('controller must be an object with address, username and password');
  }
  rejectUnknownKeys(value, CONTROLLER_KEYS, 'controller');

  return {
    address: requireString(value, 'address', 'controller'),
    username: requireString(value, 'username', 'controller'),
    password: requireString(value, 'password', 'controller'),
  };
}

function parseCamera(value: unknown, index: number): CameraSpec {
  const where = `cameras[${index}]`;
  if (!isRecord(value)) {
    throw new ConfigurationError(`${where} must be an object`);
  }
  rejectUnknownKeys(value, CAMERA_KEYS, where);

  const name = requireString(value, 'name', where);
  if (/[/\\]/.test(name)) {
    throw new ConfigurationError(`${where}.name must not contain path separators: "${name}"`);
  }

  const enabled = value.enabled ?? true;
  if (typeof enabled !== 'boolean') {
    throw new ConfigurationError(`${where}.enabled must be a boolean`);
  }

  return {
    name,
    inputPin: parsePin(value.inputPin, `${where}.inputPin`),
    ledPin: value.ledPin === undefined || value.ledPin === null ? null : parsePin(value.ledPin, `${where}.ledPin`),
    timeoutMinutes: optionalNumber(
      value, 'timeoutMinutes', where, DEFAULT_TIMEOUT_MINUTES, minutes => minutes >= 0, 'a number >= 0',
    ),
    enabled,
  };
}

function assertUniqueClaims(cameras: readonly CameraSpec[]): void {
  const names = new Set<string>();
  const pins = new Map<number, string>();

  for (const camera of cameras.filter(c => c.enabled)) {
    if (names.has(camera.name)) {
      throw new ConfigurationError(`Duplicate camera name "${camera.name}"`);
    }
    names.add(camera.name);

    const claimed = camera.ledPin === null ? [camera.inputPin] : [camera.inputPin, camera.ledPin];
    for (const pin of claimed) {
      const owner = pins.get(pin);
      if (owner !== undefined) {
        throw new ConfigurationError(
          owner === camera.name
            ? `Camera "${camera.name}" uses GPIO ${pin} for both its button and its LED`
            : `GPIO ${pin} of camera "${camera.name}" is already claimed by camera "${owner}"`,
        );
      }
      pins.set(pin, camera.name);
    }
  }
}

/**
 * Validates the raw platform configuration into typed settings.
 *
 * @param storagePath Homebridge storage directory; the default state file lives beneath it.
 * @throws ConfigurationError on the first problem found.
 */
export function parseSettings(raw: unknown, storagePath: string): PrivacyButtonSettings {
  if (!isRecord(raw)) {
    throw new ConfigurationError('Platform configuration must be an object');
  }
  rejectUnknownKeys(raw, PLATFORM_KEYS, 'platform');

  if (!Array.isArray(raw.cameras) || raw.cameras.length === 0) {
    throw new ConfigurationError('cameras must be a non-empty array');
  }

  const cameras = raw.cameras.map((camera: unknown, index: number) => parseCamera(camera, index));
  assertUniqueClaims(cameras);

  const stateFilePath = raw.stateFilePath ?? path.join(storagePath, STATE_DIRECTORY, STATE_FILE_NAME);
  if (typeof stateFilePath !== 'string' || stateFilePath.trim() === '') {
    throw new ConfigurationError('stateFilePath must be a non-empty string');
  }

  return {
    controller: parseController(raw.controller),
    cameras,
    global: {
      debounceSeconds: optionalNumber(
        raw, 'debounceSeconds', 'platform', DEFAULT_DEBOUNCE_SECONDS, s => s >= 0, 'a number >= 0',
      ),
      pollingIntervalSeconds: optionalNumber(
        raw, 'pollingIntervalSeconds', 'platform', DEFAULT_POLLING_INTERVAL_SECONDS, s => s > 0, 'a number > 0',
      ),
      startupDelaySeconds: optionalNumber(
        raw, 'startupDelaySeconds', 'platform', DEFAULT_STARTUP_DELAY_SECONDS, s => s >= 0, 'a number >= 0',
      ),
      stateFilePath,
      remoteTimeoutSeconds: optionalNumber(
        raw, 'remoteTimeoutSeconds', 'platform', DEFAULT_REMOTE_TIMEOUT_SECONDS, s => s > 0, 'a number > 0',
      ),
      shutdownTimeoutSeconds: optionalNumber(
        raw, 'shutdownTimeoutSeconds', 'platform', DEFAULT_SHUTDOWN_TIMEOUT_SECONDS, s => s >= 0, 'a number >= 0',
      ),
    },
  };
}
