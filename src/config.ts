/**
 * Configuration system with YAML and JSON support
 */

import { readFileSync, writeFileSync, existsSync, mkdirSync } from 'fs';
import { availableParallelism } from 'os';
import { dirname } from 'path';
import YAML from 'js-yaml';
import { AppError, Logger, describeError, parseLogLevel, type LogLevel } from './logger.js';

const logger = new Logger({ context: 'ConfigManager' });

export interface MediaConfig {
  imageExtensions: string[];
  videoExtensions: string[];
}

export interface SidecarConfig {
  extensions: string[];
  names: string[];
  prefixes: string[];
}

export interface FolderConfig {
  generated: string[];
  screenshots: string;
  screenRecordings: string;
  memes: string;
}

export interface DuplicatesConfig {
  hashAlgorithm: string;
  concurrency: number;
  livePhotoSuffix: string;
}

export interface AppConfig {
  media: MediaConfig;
  sidecars: SidecarConfig;
  folders: FolderConfig;
  duplicates: DuplicatesConfig;
  logLevel: LogLevel;
}

export interface UserConfig {
  media?: Partial<MediaConfig>;
  sidecars?: Partial<SidecarConfig>;
  folders?: Partial<FolderConfig>;
  duplicates?: Partial<DuplicatesConfig>;
  logLevel?: LogLevel;
}

/**
 * The immutable value every engine component receives at construction
 */
export interface SorterConfig {
  readonly imageExtensions: ReadonlySet<string>;
  readonly videoExtensions: ReadonlySet<string>;
  readonly sidecarExtensions: ReadonlySet<string>;
  readonly sidecarNames: ReadonlySet<string>;
  readonly sidecarPrefixes: readonly string[];
  readonly generatedFolders: ReadonlySet<string>;
  readonly buckets: {
    readonly screenshots: string;
    readonly screenRecordings: string;
    readonly memes: string;
  };
  readonly hashAlgorithm: string;
  readonly hashConcurrency: number;
  readonly livePhotoSuffix: string;
}

export const DEFAULT_CONFIG: AppConfig = {
  media: {
    imageExtensions: ['.jpg', '.jpeg', '.png', '.gif', '.heic', '.heif', '.tiff'],
    // .lrv are GoPro low-res previews
    videoExtensions: ['.mp4', '.mov', '.avi', '.mkv', '.lrv', '.3gp', '.m2ts', '.webm', '.wmv']
  },
  sidecars: {
    extensions: ['.aae', '.modd', '.moff'],
    names: ['thumbs.db'],
    prefixes: ['._']
  },
  folders: {
    generated: ['Screenshots', 'ScreenRecordings', 'Memes'],
    screenshots: 'Screenshots',
    screenRecordings: 'ScreenRecordings',
    memes: 'Memes'
  },
  duplicates: {
    hashAlgorithm: 'sha256',
    concurrency: Math.max(1, availableParallelism()),
    livePhotoSuffix: '-Live'
  },
  logLevel: 'info'
};

function cloneConfig(config: AppConfig): AppConfig {
  return structuredClone(config);
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function readStringList(section: Record<string, unknown>, key: string, label: string): string[] | undefined {
  const value = section[key];
  if (value === undefined || value === null) return undefined;
  if (!Array.isArray(value) || !value.every((item): item is string => typeof item === 'string')) {
    throw new AppError(`${label}.${key} must be a list of strings`, 'INVALID_CONFIG', 400);
  }
  return value;
}

function readString(section: Record<string, unknown>, key: string, label: string): string | undefined {
  const value = section[key];
  if (value === undefined || value === null) return undefined;
  if (typeof value !== 'string') {
    throw new AppError(`${label}.${key} must be a string`, 'INVALID_CONFIG', 400);
  }
  return value;
}

function readNumber(section: Record<string, unknown>, key: string, label: string): number | undefined {
  const value = section[key];
  if (value === undefined || value === null) return undefined;
  if (typeof value !== 'number' || !Number.isFinite(value)) {
    throw new AppError(`${label}.${key} must be a number`, 'INVALID_CONFIG', 400);
  }
  return value;
}

function readSection(raw: Record<string, unknown>, key: string): Record<string, unknown> | undefined {
  const value = raw[key];
  if (value === undefined || value === null) return undefined;
  if (!isRecord(value)) {
    throw new AppError(`${key} must be a mapping`, 'INVALID_CONFIG', 400);
  }
  return value;
}

/**
 * Turn a parsed YAML/JSON document into a typed partial config.
 * Unknown keys are ignored; wrongly typed known keys are rejected.
 */
export function normalizeUserConfig(raw: unknown): UserConfig {
  if (raw === undefined || raw === null) return {};
  if (!isRecord(raw)) {
    throw new AppError('Configuration root must be a mapping', 'INVALID_CONFIG', 400);
  }

  const user: UserConfig = {};

  const media = readSection(raw, 'media');
  if (media) {
    const imageExtensions = readStringList(media, 'imageExtensions', 'media');
    const videoExtensions = readStringList(media, 'videoExtensions', 'media');
    user.media = {
      ...(imageExtensions === undefined ? {} : { imageExtensions }),
      ...(videoExtensions === undefined ? {} : { videoExtensions })
    };
  }

  const sidecars = readSection(raw, 'sidecars');
  if (sidecars) {
    const extensions = readStringList(sidecars, 'extensions', 'sidecars');
    const names = readStringList(sidecars, 'names', 'sidecars');
    const prefixes = readStringList(sidecars, 'prefixes', 'sidecars');
    user.sidecars = {
      ...(extensions === undefined ? {} : { extensions }),
      ...(names === undefined ? {} : { names }),
      ...(prefixes === undefined ? {} : { prefixes })
    };
  }

  const folders = readSection(raw, 'folders');
  if (folders) {
    const generated = readStringList(folders, 'generated', 'folders');
    const screenshots = readString(folders, 'screenshots', 'folders');
    const screenRecordings = readString(folders, 'screenRecordings', 'folders');
    const memes = readString(folders, 'memes', 'folders');
    user.folders = {
      ...(generated === undefined ? {} : { generated }),
      ...(screenshots === undefined ? {} : { screenshots }),
      ...(screenRecordings === undefined ? {} : { screenRecordings }),
      ...(memes === undefined ? {} : { memes })
    };
  }

  const duplicates = readSection(raw, 'duplicates');
  if (duplicates) {
    const hashAlgorithm = readString(duplicates, 'hashAlgorithm', 'duplicates');
    const concurrency = readNumber(duplicates, 'concurrency', 'duplicates');
    const livePhotoSuffix = readString(duplicates, 'livePhotoSuffix', 'duplicates');
    user.duplicates = {
      ...(hashAlgorithm === undefined ? {} : { hashAlgorithm }),
      ...(concurrency === undefined ? {} : { concurrency }),
      ...(livePhotoSuffix === undefined ? {} : { livePhotoSuffix })
    };
  }

  const logLevel = readString(raw, 'logLevel', 'config');
  if (logLevel !== undefined) {
    const parsed = parseLogLevel(logLevel);
    if (!parsed) {
      throw new AppError(`Unknown log level: ${logLevel}`, 'INVALID_CONFIG', 400);
    }
    user.logLevel = parsed;
  }

  return user;
}

/**
 * Merge user config with defaults (user config takes precedence, section by section)
 */
export function mergeConfigs(defaults: AppConfig, user: UserConfig): AppConfig {
  return {
    media: { ...defaults.media, ...user.media },
    sidecars: { ...defaults.sidecars, ...user.sidecars },
    folders: { ...defaults.folders, ...user.folders },
    duplicates: { ...defaults.duplicates, ...user.duplicates },
    logLevel: user.logLevel ?? defaults.logLevel
  };
}

/**
 * Freeze an AppConfig into the value the engines share
 */
export function createSorterConfig(config: AppConfig = DEFAULT_CONFIG): SorterConfig {
  const lower = (values: string[]) => new Set(values.map(value => value.toLowerCase()));

  return Object.freeze({
    imageExtensions: lower(config.media.imageExtensions),
    videoExtensions: lower(config.media.videoExtensions),
    sidecarExtensions: lower(config.sidecars.extensions),
    sidecarNames: lower(config.sidecars.names),
    sidecarPrefixes: Object.freeze([...config.sidecars.prefixes]),
    generatedFolders: new Set(config.folders.generated),
    buckets: Object.freeze({
      screenshots: config.folders.screenshots,
      screenRecordings: config.folders.screenRecordings,
      memes: config.folders.memes
    }),
    hashAlgorithm: config.duplicates.hashAlgorithm,
    hashConcurrency: Math.max(1, Math.floor(config.duplicates.concurrency)),
    livePhotoSuffix: config.duplicates.livePhotoSuffix
  });
}

/**
 * Configuration manager
 */
export class ConfigManager {
  private config: AppConfig;
  private configPath: string;
  private isDirty = false;

  constructor(configPath: string = './shoebox.yaml') {
    this.configPath = configPath;
    this.config = this.loadConfig();
  }

  /**
   * Load configuration from file or use defaults
   */
  private loadConfig(): AppConfig {
    if (!existsSync(this.configPath)) {
      logger.info(`Config file not found: ${this.configPath}, using defaults`, { path: this.configPath });
      return cloneConfig(DEFAULT_CONFIG);
    }

    try {
      const content = readFileSync(this.configPath, 'utf-8');
      let parsed: unknown;

      if (this.configPath.endsWith('.json')) {
        parsed = JSON.parse(content);
      } else if (this.configPath.endsWith('.yaml') || this.configPath.endsWith('.yml')) {
        parsed = YAML.load(content);
      } else {
        throw new AppError(`Unsupported config format: ${this.configPath}`, 'CONFIG_PARSE_ERROR', 400);
      }

      const user = normalizeUserConfig(parsed);
      logger.info(`Loaded configuration from ${this.configPath}`);

      return mergeConfigs(cloneConfig(DEFAULT_CONFIG), user);
    } catch (error) {
      logger.warn(`Failed to load config: ${describeError(error)}`, { path: this.configPath });
      return cloneConfig(DEFAULT_CONFIG);
    }
  }

  /**
   * Copy of the complete configuration
   */
  getConfig(): AppConfig {
    return cloneConfig(this.config);
  }

  /**
   * Apply a partial update on top of the current values
   */
  update(changes: UserConfig): void {
    this.config = mergeConfigs(this.config, changes);
    this.isDirty = true;
    logger.debug('Config updated', { sections: Object.keys(changes) });
  }

  /**
   * Save configuration to file
   */
  save(): void {
    if (!this.isDirty) return;

    try {
      mkdirSync(dirname(this.configPath), { recursive: true });
      const content = this.configPath.endsWith('.json') ? this.toJSON() : this.toYAML();

      writeFileSync(this.configPath, content);
      this.isDirty = false;

      logger.info(`Configuration saved to ${this.configPath}`);
    } catch (error) {
      logger.error(`Failed to save config: ${describeError(error)}`, error);
    }
  }

  /**
   * Reset to defaults
   */
  reset(): void {
    this.config = cloneConfig(DEFAULT_CONFIG);
    this.isDirty = true;
    logger.info('Configuration reset to defaults');
  }

  /**
   * Validate configuration
   */
  validate(): { valid: boolean; errors: string[] } {
    const errors: string[] = [];
    const { media, sidecars, folders, duplicates } = this.config;

    const extensionLists: Array<[string, string[]]> = [
      ['media.imageExtensions', media.imageExtensions],
      ['media.videoExtensions', media.videoExtensions],
      ['sidecars.extensions', sidecars.extensions]
    ];
    for (const [label, extensions] of extensionLists) {
      for (const extension of extensions) {
        if (!extension.startsWith('.') || extension.length < 2) {
          errors.push(`${label}: "${extension}" must start with a dot`);
        } else if (extension !== extension.toLowerCase()) {
          errors.push(`${label}: "${extension}" must be lowercase`);
        }
      }
    }

    const overlap = media.imageExtensions.filter(extension => media.videoExtensions.includes(extension));
    if (overlap.length > 0) {
      errors.push(`Extensions listed as both image and video: ${overlap.join(', ')}`);
    }

    for (const bucket of [folders.screenshots, folders.screenRecordings, folders.memes]) {
      if (!folders.generated.includes(bucket)) {
        errors.push(`Bucket "${bucket}" must be listed in folders.generated`);
      }
    }

    if (!Number.isInteger(duplicates.concurrency) || duplicates.concurrency < 1) {
      errors.push('duplicates.concurrency must be a positive integer');
    }

    if (!duplicates.livePhotoSuffix) {
      errors.push('duplicates.livePhotoSuffix must not be empty');
    }

    return {
      valid: errors.length === 0,
      errors
    };
  }

  /**
   * Frozen engine configuration; throws when the values do not validate
   */
  toSorterConfig(): SorterConfig {
    const { valid, errors } = this.validate();
    if (!valid) {
      throw new AppError(`Invalid configuration: ${errors.join('; ')}`, 'INVALID_CONFIG', 400, { errors });
    }
    return createSorterConfig(this.config);
  }

  toJSON(): string {
    return JSON.stringify(this.config, null, 2);
  }

  toYAML(): string {
    return YAML.dump(this.config, { indent: 2 });
  }
}
