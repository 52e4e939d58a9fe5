import { InvalidParameterError } from '../models/errors';

/**
 * Full set of options for one simulation run, rendering range included
 */
export interface RandomWalkConfig {
  /** Walks requested by the caller, before the extra walk is added */
  count: number;
  initialValue: number;
  /** Last time value on the axis */
  duration: number;
  sd: number;
  timeStep: number;
  /** Omit for an unseeded run */
  seed?: number;
  /**
   * Generate one walk more than requested. Kept on by default to match the
   * historical output of this simulator.
   */
  includeExtraWalk: boolean;
  yMin: number;
  yMax: number;
}

export const DEFAULT_TIME_STEP = 0.01;

export const DEFAULT_RANDOM_WALK_CONFIG: RandomWalkConfig = {
  count: 5,
  initialValue: 70,
  duration: 1,
  sd: 1,
  timeStep: DEFAULT_TIME_STEP,
  includeExtraWalk: true,
  yMin: 45,
  yMax: 100
};

type NumericKey = Exclude<keyof RandomWalkConfig, 'includeExtraWalk'>;

const NUMERIC_ENV_VARS: ReadonlyArray<[NumericKey, string]> = [
  ['count', 'RW_COUNT'],
  ['initialValue', 'RW_INITIAL_VALUE'],
  ['duration', 'RW_DURATION'],
  ['sd', 'RW_SD'],
  ['timeStep', 'RW_TIME_STEP'],
  ['seed', 'RW_SEED'],
  ['yMin', 'RW_Y_MIN'],
  ['yMax', 'RW_Y_MAX']
];

const EXTRA_WALK_ENV_VAR = 'RW_INCLUDE_EXTRA_WALK';

export type Environment = Record<string, string | undefined>;

export function parseNumber(name: string, raw: string): number {
  const value = Number(raw.trim());
  if (raw.trim() === '' || !Number.isFinite(value)) {
    throw new InvalidParameterError(name, `${name} must be a number, got "${raw}"`, { raw });
  }
  return value;
}

export function parseBoolean(name: string, raw: string): boolean {
  const normalized = raw.trim().toLowerCase();
  if (['1', 'true', 'yes', 'on'].includes(normalized)) return true;
  if (['0', 'false', 'no', 'off'].includes(normalized)) return false;
  throw new InvalidParameterError(name, `${name} must be a boolean, got "${raw}"`, { raw });
}

/**
 * Read RW_* overrides from an environment map
 */
export function configFromEnv(env: Environment): Partial<RandomWalkConfig> {
  const config: Partial<RandomWalkConfig> = {};

  for (const [key, name] of NUMERIC_ENV_VARS) {
    const raw = env[name];
    if (raw !== undefined) {
      config[key] = parseNumber(name, raw);
    }
  }

  const extraWalk = env[EXTRA_WALK_ENV_VAR];
  if (extraWalk !== undefined) {
    config.includeExtraWalk = parseBoolean(EXTRA_WALK_ENV_VAR, extraWalk);
  }

  return config;
}

/**
 * Defaults, then environment, then explicit overrides
 */
export function loadRandomWalkConfig(
  env: Environment = process.env,
  overrides: Partial<RandomWalkConfig> = {}
): RandomWalkConfig {
  const config: RandomWalkConfig = { ...DEFAULT_RANDOM_WALK_CONFIG, ...configFromEnv(env) };

  // undefined entries in overrides leave the lower layers in place
  for (const [key] of NUMERIC_ENV_VARS) {
    const value = overrides[key];
    if (value !== undefined) {
      config[key] = value;
    }
  }
  if (overrides.includeExtraWalk !== undefined) {
    config.includeExtraWalk = overrides.includeExtraWalk;
  }

  if (config.yMin >= config.yMax) {
    throw new InvalidParameterError(
      'yMin',
      `yMin (${config.yMin}) must be below yMax (${config.yMax})`,
      { yMin: config.yMin, yMax: config.yMax }
    );
  }

  return config;
}
