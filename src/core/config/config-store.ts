import * as fs from 'fs';
import * as path from 'path';
import * as yaml from 'yaml';
import type { ConfigKey, ConfigReader, ConverterConfig } from '../types/types';
import { debugLogger, isLogLevel } from '../utils/debug-logger';

export const DEFAULT_CONFIG: Readonly<ConverterConfig> = {
  sourceDirectory: '',
  outputDirectory: 'converted',
  ffmpegPath: 'ffmpeg',
  videoCodec: 'libx264',
  crf: 18,
  preset: 'fast',
  audioCodec: 'aac',
  audioBitrate: '128k',
  workers: 4,
  overwrite: false,
  includeAudio: false,
  keepIntermediate: false,
  sourceExtension: '.v264',
  assumedDurationSeconds: 600,
  processTimeoutSeconds: 0,
  logLevel: 'info',
};

export const CONFIG_KEYS: readonly ConfigKey[] = [
  'sourceDirectory',
  'outputDirectory',
  'ffmpegPath',
  'videoCodec',
  'crf',
  'preset',
  'audioCodec',
  'audioBitrate',
  'workers',
  'overwrite',
  'includeAudio',
  'keepIntermediate',
  'sourceExtension',
  'assumedDurationSeconds',
  'processTimeoutSeconds',
  'logLevel',
];

const PRESETS: readonly ConverterConfig['preset'][] = [
  'ultrafast', 'superfast', 'veryfast', 'faster', 'fast', 'medium', 'slow', 'slower', 'veryslow',
];

const isString = (value: unknown): value is string => typeof value === 'string';
const isNonEmptyString = (value: unknown): value is string => typeof value === 'string' && value.trim() !== '';
const isBoolean = (value: unknown): value is boolean => typeof value === 'boolean';

type Validators = { [K in ConfigKey]: (value: unknown) => value is ConverterConfig[K] };

const VALIDATORS: Validators = {
  sourceDirectory: isString,
  outputDirectory: isNonEmptyString,
  ffmpegPath: isNonEmptyString,
  videoCodec: isNonEmptyString,
  crf: (value): value is number => Number.isInteger(value) && typeof value === 'number' && value >= 0 && value <= 51,
  preset: (value): value is ConverterConfig['preset'] => PRESETS.some((preset) => preset === value),
  audioCodec: isNonEmptyString,
  audioBitrate: (value): value is string => typeof value === 'string' && /^\d+[kKmM]?$/.test(value),
  workers: (value): value is number => Number.isInteger(value) && typeof value === 'number' && value >= 1,
  overwrite: isBoolean,
  includeAudio: isBoolean,
  keepIntermediate: isBoolean,
  sourceExtension: (value): value is string => typeof value === 'string' && /^\.[^./\\]+$/.test(value),
  assumedDurationSeconds: (value): value is number => typeof value === 'number' && Number.isFinite(value) && value > 0,
  processTimeoutSeconds: (value): value is number => typeof value === 'number' && Number.isFinite(value) && value >= 0,
  logLevel: isLogLevel,
};

export function isConfigKey(key: string): key is ConfigKey {
  return CONFIG_KEYS.some((candidate) => candidate === key);
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function assignValidated<K extends ConfigKey>(target: ConverterConfig, key: K, value: unknown): boolean {
  const validate: (value: unknown) => value is ConverterConfig[K] = VALIDATORS[key];
  if (!validate(value)) {
    return false;
  }
  target[key] = value;
  return true;
}

/**
 * Turn a command-line string into a value of the key's type
 */
export function parseConfigValue(key: ConfigKey, raw: string): unknown {
  const fallback = DEFAULT_CONFIG[key];
  if (typeof fallback === 'number') {
    const trimmed = raw.trim();
    return trimmed === '' ? Number.NaN : Number(trimmed);
  }
  if (typeof fallback === 'boolean') {
    const normalized = raw.trim().toLowerCase();
    if (['true', 'yes', 'on', '1'].includes(normalized)) return true;
    if (['false', 'no', 'off', '0'].includes(normalized)) return false;
    return raw;
  }
  return raw;
}

/**
 * Key/value settings backed by a YAML file.
 *
 * Unknown keys in the file are ignored and invalid values fall back to their
 * defaults, so a hand-edited file never stops the converter from starting.
 */
export class ConfigStore implements ConfigReader {
  private values: ConverterConfig;

  constructor(private readonly filePath: string | null = null, initial: Partial<ConverterConfig> = {}) {
    this.values = { ...DEFAULT_CONFIG };
    this.merge(initial, 'initial values');
  }

  /**
   * Load settings from `filePath`. A missing file is created with defaults.
   */
  static load(filePath: string): ConfigStore {
    const store = new ConfigStore(filePath);

    if (!fs.existsSync(filePath)) {
      debugLogger.warn(`[Config] ${filePath} not found, writing defaults`);
      store.trySave();
      return store;
    }

    try {
      const parsed: unknown = yaml.parse(fs.readFileSync(filePath, 'utf-8'));
      if (parsed === null || parsed === undefined) {
        return store;
      }
      if (!isRecord(parsed)) {
        debugLogger.error(`[Config] ${filePath} does not contain a mapping, using defaults`);
        return store;
      }
      store.merge(parsed, filePath);
      debugLogger.info(`[Config] Loaded configuration from ${filePath}`);
    } catch (error) {
      debugLogger.error(`[Config] Error loading config file ${filePath}: ${error}`);
    }
    return store;
  }

  get<K extends ConfigKey>(key: K): ConverterConfig[K] {
    return this.values[key];
  }

  getAll(): Readonly<ConverterConfig> {
    return { ...this.values };
  }

  /**
   * Update one setting and persist the file
   */
  set<K extends ConfigKey>(key: K, value: ConverterConfig[K]): void {
    if (!assignValidated(this.values, key, value)) {
      throw new RangeError(`Invalid value for ${key}: ${JSON.stringify(value)}`);
    }
    debugLogger.info(`[Config] ${key} = ${JSON.stringify(value)}`);
    this.save();
  }

  /**
   * Update one setting from its string form (command line) and persist
   */
  setFromString(key: string, raw: string): void {
    if (!isConfigKey(key)) {
      throw new RangeError(`Unknown config key: ${key}`);
    }
    if (!assignValidated(this.values, key, parseConfigValue(key, raw))) {
      throw new RangeError(`Invalid value for ${key}: ${raw}`);
    }
    debugLogger.info(`[Config] ${key} = ${raw}`);
    this.save();
  }

  /**
   * Apply values for this run only (command-line overrides); not persisted
   */
  override(values: Partial<ConverterConfig>): void {
    this.merge(values, 'command line');
  }

  /**
   * Output directory for a source directory. Relative settings resolve
   * against the source directory.
   */
  resolveOutputDirectory(sourceDir: string): string {
    const configured = this.values.outputDirectory;
    const resolved = path.isAbsolute(configured) ? configured : path.join(sourceDir, configured);
    return path.normalize(resolved);
  }

  getFilePath(): string | null {
    return this.filePath;
  }

  save(): void {
    if (!this.filePath) return;
    fs.mkdirSync(path.dirname(this.filePath), { recursive: true });
    fs.writeFileSync(this.filePath, yaml.stringify(this.values), 'utf-8');
    debugLogger.debug(`[Config] Saved ${this.filePath}`);
  }

  private trySave(): void {
    try {
      this.save();
    } catch (error) {
      debugLogger.error(`[Config] Could not write ${this.filePath}: ${error}`);
    }
  }

  private merge(source: Record<string, unknown>, origin: string): void {
    for (const [key, value] of Object.entries(source)) {
      if (value === undefined) continue;
      if (!isConfigKey(key)) {
        debugLogger.debug(`[Config] Ignoring unknown key "${key}" from ${origin}`);
        continue;
      }
      if (!assignValidated(this.values, key, value)) {
        debugLogger.warn(
          `[Config] Invalid ${key} from ${origin}: ${JSON.stringify(value)}, keeping ${JSON.stringify(this.values[key])}`
        );
      }
    }
  }
}
