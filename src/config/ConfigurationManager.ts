/**
 * Configuration Manager for application settings and environment-specific configuration
 */

import { readFile } from 'fs/promises';
import { EntityCategory, TrackedEntity } from '../models/Holdings';
import { LOG_LEVELS, LogLevel } from '../models/ActivityEvent';
import { DEFAULT_LAYOUT_CONFIG, LayoutConfig } from '../services/OverlapLayoutEngine';
import { isHexColor } from '../utils/colors';

export type Environment = 'development' | 'staging' | 'production';

export interface DashboardConfig {
  defaultEntityCount: number;
  defaultAssetCount: number;
}

export interface RefreshConfig {
  intervalMs: number;
  maxAttempts: number;
  backoffMs: number;
  maxBackoffMs: number;
}

export interface SourcesConfig {
  snapshotPath: string;
  entities: TrackedEntity[];
}

export interface ApplicationConfig {
  environment: Environment;
  version: string;
  port: number;
  host: string;
  logLevel: LogLevel;
  layout: LayoutConfig;
  dashboard: DashboardConfig;
  refresh: RefreshConfig;
  sources: SourcesConfig;
}

export type ConfigSectionName = 'layout' | 'dashboard' | 'refresh' | 'sources';

/**
 * Shape accepted from the configuration file; every value is optional
 */
export type ConfigOverrides = Partial<Omit<ApplicationConfig, ConfigSectionName>> & {
  [K in ConfigSectionName]?: Partial<ApplicationConfig[K]>;
};

export interface ConfigValidationError {
  path: string;
  message: string;
  value?: unknown;
}

export interface ConfigValidationResult {
  isValid: boolean;
  errors: ConfigValidationError[];
}

export interface EnvironmentVariables {
  NODE_ENV?: string;
  PORT?: string;
  HOST?: string;
  LOG_LEVEL?: string;
  HOLDINGS_SNAPSHOT_PATH?: string;
  REFRESH_INTERVAL_MS?: string;
  [key: string]: string | undefined;
}

const ENVIRONMENTS: readonly Environment[] = ['development', 'staging', 'production'];
const ENTITY_CATEGORIES: readonly EntityCategory[] = ['exchange', 'institution'];

function isEnvironment(value: unknown): value is Environment {
  return ENVIRONMENTS.some(environment => environment === value);
}

function isLogLevel(value: unknown): value is LogLevel {
  return LOG_LEVELS.some(level => level === value);
}

function isEntityCategory(value: unknown): value is EntityCategory {
  return ENTITY_CATEGORIES.some(category => category === value);
}

function isFiniteNumber(value: unknown): value is number {
  return typeof value === 'number' && Number.isFinite(value);
}

function isNonEmptyString(value: unknown): value is string {
  return typeof value === 'string' && value.trim().length > 0;
}

export class ConfigurationManager {
  private config: ApplicationConfig;
  private readonly configFilePath: string;
  private readonly env: EnvironmentVariables;

  constructor(configFilePath: string = './config/app.json', env: EnvironmentVariables = process.env) {
    this.configFilePath = configFilePath;
    this.env = env;

    // Initialize with default configuration
    this.config = ConfigurationManager.getDefaultConfiguration();
  }

  /**
   * Loads configuration from file and environment variables
   */
  async loadConfiguration(): Promise<void> {
    try {
      const fileConfig = await this.loadConfigurationFromFile();
      const envConfig = this.loadConfigurationFromEnvironment();

      // Environment takes precedence over the file
      const merged = this.mergeConfigurations(
        this.mergeConfigurations(ConfigurationManager.getDefaultConfiguration(), fileConfig),
        envConfig
      );

      const validation = this.validateConfiguration(merged);
      if (!validation.isValid) {
        throw new Error(`Configuration validation failed: ${validation.errors.map(e => e.message).join(', ')}`);
      }

      this.config = merged;
    } catch (error) {
      const errorMessage = error instanceof Error ? error.message : 'Unknown error';
      throw new Error(`Failed to load configuration: ${errorMessage}`);
    }
  }

  /**
   * Gets the current configuration
   */
  getConfiguration(): ApplicationConfig {
    return structuredClone(this.config);
  }

  /**
   * Gets a specific configuration section
   */
  getConfigSection<T extends ConfigSectionName>(section: T): ApplicationConfig[T] {
    return structuredClone(this.config[section]);
  }

  /**
   * Updates a configuration section; invalid updates leave the configuration untouched
   */
  updateConfigSection<T extends ConfigSectionName>(section: T, updates: Partial<ApplicationConfig[T]>): void {
    const next = structuredClone(this.config);
    Object.assign(next[section], updates);

    const validation = this.validateConfiguration(next);
    if (!validation.isValid) {
      throw new Error(`Configuration update failed validation: ${validation.errors.map(e => e.message).join(', ')}`);
    }

    this.config = next;
  }

  /**
   * Validates the entire configuration
   */
  validateConfiguration(config: ApplicationConfig): ConfigValidationResult {
    const errors: ConfigValidationError[] = [];

    if (!isEnvironment(config.environment)) {
      errors.push({
        path: 'environment',
        message: 'Environment must be development, staging, or production',
        value: config.environment
      });
    }

    if (!Number.isInteger(config.port) || config.port < 1 || config.port > 65535) {
      errors.push({ path: 'port', message: 'Port must be between 1 and 65535', value: config.port });
    }

    if (!isNonEmptyString(config.host)) {
      errors.push({ path: 'host', message: 'Host is required', value: config.host });
    }

    if (!isLogLevel(config.logLevel)) {
      errors.push({
        path: 'logLevel',
        message: 'Log level must be debug, info, warn, or error',
        value: config.logLevel
      });
    }

    errors.push(...this.validateLayoutConfig(config.layout));
    errors.push(...this.validateDashboardConfig(config.dashboard));
    errors.push(...this.validateRefreshConfig(config.refresh));
    errors.push(...this.validateSourcesConfig(config.sources));

    return {
      isValid: errors.length === 0,
      errors
    };
  }

  /**
   * Reloads configuration from sources
   */
  async reloadConfiguration(): Promise<void> {
    await this.loadConfiguration();
  }

  /**
   * Gets default configuration
   */
  static getDefaultConfiguration(): ApplicationConfig {
    return {
      environment: 'development',
      version: '1.0.0',
      port: 3000,
      host: 'localhost',
      logLevel: 'info',
      layout: structuredClone(DEFAULT_LAYOUT_CONFIG),
      dashboard: {
        defaultEntityCount: 5,
        defaultAssetCount: 10
      },
      refresh: {
        intervalMs: 3600000, // 1 hour
        maxAttempts: 3,
        backoffMs: 1000,
        maxBackoffMs: 30000
      },
      sources: {
        snapshotPath: './data/sample-holdings.json',
        entities: [
          { id: 'binance', category: 'exchange' },
          { id: 'coinbase', category: 'exchange' },
          { id: 'kraken', category: 'exchange' },
          { id: 'okx', category: 'exchange' },
          { id: 'bitfinex', category: 'exchange' },
          { id: 'blackrock', category: 'institution' },
          { id: 'fidelity', category: 'institution' },
          { id: 'grayscale', category: 'institution' }
        ]
      }
    };
  }

  /**
   * Gets environment-specific configuration overrides
   */
  private loadConfigurationFromEnvironment(): ConfigOverrides {
    const env = this.env;
    const envConfig: ConfigOverrides = {};

    if (env.NODE_ENV && isEnvironment(env.NODE_ENV)) {
      envConfig.environment = env.NODE_ENV;
    }

    if (env.PORT) {
      envConfig.port = parseInt(env.PORT, 10);
    }

    if (env.HOST) {
      envConfig.host = env.HOST;
    }

    if (env.LOG_LEVEL) {
      const level = env.LOG_LEVEL.toLowerCase();
      if (!isLogLevel(level)) {
        throw new Error(`LOG_LEVEL must be one of ${LOG_LEVELS.join(', ')}`);
      }
      envConfig.logLevel = level;
    }

    if (env.HOLDINGS_SNAPSHOT_PATH) {
      envConfig.sources = { snapshotPath: env.HOLDINGS_SNAPSHOT_PATH };
    }

    if (env.REFRESH_INTERVAL_MS) {
      envConfig.refresh = { intervalMs: parseInt(env.REFRESH_INTERVAL_MS, 10) };
    }

    return envConfig;
  }

  /**
   * Loads configuration from file; a missing file yields no overrides
   */
  private async loadConfigurationFromFile(): Promise<ConfigOverrides> {
    let text: string;
    try {
      text = await readFile(this.configFilePath, 'utf8');
    } catch (error) {
      if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
        return {};
      }
      throw error;
    }

    // Field types are checked by validateConfiguration after merging
    const parsed: ConfigOverrides = JSON.parse(text);
    if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
      throw new Error(`Configuration file ${this.configFilePath} must contain a JSON object`);
    }
    return parsed;
  }

  /**
   * Merges two configuration objects with precedence
   */
  private mergeConfigurations(base: ApplicationConfig, override: ConfigOverrides): ApplicationConfig {
    return {
      ...base,
      ...override,
      layout: { ...base.layout, ...override.layout },
      dashboard: { ...base.dashboard, ...override.dashboard },
      refresh: { ...base.refresh, ...override.refresh },
      sources: { ...base.sources, ...override.sources }
    };
  }

  /**
   * Validates layout configuration
   */
  private validateLayoutConfig(config: LayoutConfig): ConfigValidationError[] {
    const errors: ConfigValidationError[] = [];
    const positive: (keyof LayoutConfig)[] = ['anchorRadius', 'markerScale', 'viewExtent', 'legendMarkerSize'];
    const nonNegative: (keyof LayoutConfig)[] = [
      'zoneSqrtScale',
      'zoneMinSize',
      'assetLogScale',
      'overlayMinSize',
      'overlayOffsetFactor'
    ];
    const unitInterval: (keyof LayoutConfig)[] = ['zoneLightenAmount', 'zoneOpacity', 'assetOpacity'];

    for (const key of positive) {
      const value = config[key];
      if (!isFiniteNumber(value) || value <= 0) {
        errors.push({ path: `layout.${key}`, message: `Layout ${key} must be a positive number`, value });
      }
    }

    for (const key of nonNegative) {
      const value = config[key];
      if (!isFiniteNumber(value) || value < 0) {
        errors.push({ path: `layout.${key}`, message: `Layout ${key} must be a non-negative number`, value });
      }
    }

    for (const key of unitInterval) {
      const value = config[key];
      if (!isFiniteNumber(value) || value < 0 || value > 1) {
        errors.push({ path: `layout.${key}`, message: `Layout ${key} must be between 0 and 1`, value });
      }
    }

    if (!Array.isArray(config.entityPalette) || config.entityPalette.length === 0 ||
        !config.entityPalette.every(isHexColor)) {
      errors.push({
        path: 'layout.entityPalette',
        message: 'Entity palette must be a non-empty list of hex colors',
        value: config.entityPalette
      });
    }

    if (!isHexColor(config.multiHolderColor)) {
      errors.push({
        path: 'layout.multiHolderColor',
        message: 'Multi-holder color must be a hex color',
        value: config.multiHolderColor
      });
    }

    if (!isNonEmptyString(config.guideColor)) {
      errors.push({ path: 'layout.guideColor', message: 'Guide color is required', value: config.guideColor });
    }

    if (!Array.isArray(config.guideRadii) || !config.guideRadii.every(radius => isFiniteNumber(radius) && radius > 0)) {
      errors.push({
        path: 'layout.guideRadii',
        message: 'Guide radii must be positive numbers',
        value: config.guideRadii
      });
    }

    errors.push(...this.validatePercentageTiers(config));

    return errors;
  }

  private validatePercentageTiers(config: LayoutConfig): ConfigValidationError[] {
    const tiers = config.percentageTiers;
    if (!Array.isArray(tiers) || tiers.length === 0) {
      return [{ path: 'layout.percentageTiers', message: 'At least one percentage tier is required', value: tiers }];
    }

    const errors: ConfigValidationError[] = [];
    if (tiers[0].min !== 0) {
      errors.push({
        path: 'layout.percentageTiers[0].min',
        message: 'The first percentage tier must start at 0',
        value: tiers[0].min
      });
    }

    tiers.forEach((tier, i) => {
      if (!isFiniteNumber(tier.min) || (i > 0 && tier.min <= tiers[i - 1].min)) {
        errors.push({
          path: `layout.percentageTiers[${i}].min`,
          message: 'Percentage tier bounds must be strictly increasing',
          value: tier.min
        });
      }
      if (!isHexColor(tier.color)) {
        errors.push({
          path: `layout.percentageTiers[${i}].color`,
          message: 'Percentage tier color must be a hex color',
          value: tier.color
        });
      }
      if (!isNonEmptyString(tier.label)) {
        errors.push({
          path: `layout.percentageTiers[${i}].label`,
          message: 'Percentage tier label is required',
          value: tier.label
        });
      }
    });

    return errors;
  }

  /**
   * Validates dashboard configuration
   */
  private validateDashboardConfig(config: DashboardConfig): ConfigValidationError[] {
    const errors: ConfigValidationError[] = [];

    if (!Number.isInteger(config.defaultEntityCount) || config.defaultEntityCount < 0) {
      errors.push({
        path: 'dashboard.defaultEntityCount',
        message: 'Default entity count must be a non-negative integer',
        value: config.defaultEntityCount
      });
    }

    if (!Number.isInteger(config.defaultAssetCount) || config.defaultAssetCount < 0) {
      errors.push({
        path: 'dashboard.defaultAssetCount',
        message: 'Default asset count must be a non-negative integer',
        value: config.defaultAssetCount
      });
    }

    return errors;
  }

  /**
   * Validates refresh configuration
   */
  private validateRefreshConfig(config: RefreshConfig): ConfigValidationError[] {
    const errors: ConfigValidationError[] = [];

    if (!isFiniteNumber(config.intervalMs) || config.intervalMs < 1000) {
      errors.push({
        path: 'refresh.intervalMs',
        message: 'Refresh interval must be at least 1000ms',
        value: config.intervalMs
      });
    }

    if (!Number.isInteger(config.maxAttempts) || config.maxAttempts < 1) {
      errors.push({
        path: 'refresh.maxAttempts',
        message: 'Max attempts must be at least 1',
        value: config.maxAttempts
      });
    }

    if (!isFiniteNumber(config.backoffMs) || config.backoffMs < 0) {
      errors.push({
        path: 'refresh.backoffMs',
        message: 'Backoff must be non-negative',
        value: config.backoffMs
      });
    }

    if (!isFiniteNumber(config.maxBackoffMs) || config.maxBackoffMs < config.backoffMs) {
      errors.push({
        path: 'refresh.maxBackoffMs',
        message: 'Max backoff must be at least the base backoff',
        value: config.maxBackoffMs
      });
    }

    return errors;
  }

  /**
   * Validates holdings source configuration
   */
  private validateSourcesConfig(config: SourcesConfig): ConfigValidationError[] {
    const errors: ConfigValidationError[] = [];

    if (!isNonEmptyString(config.snapshotPath)) {
      errors.push({
        path: 'sources.snapshotPath',
        message: 'Snapshot path is required',
        value: config.snapshotPath
      });
    }

    if (!Array.isArray(config.entities)) {
      errors.push({ path: 'sources.entities', message: 'Tracked entities must be a list', value: config.entities });
      return errors;
    }

    const seen = new Set<string>();
    config.entities.forEach((entity, i) => {
      if (!isNonEmptyString(entity.id)) {
        errors.push({ path: `sources.entities[${i}].id`, message: 'Tracked entity id is required', value: entity.id });
      } else if (seen.has(entity.id)) {
        errors.push({
          path: `sources.entities[${i}].id`,
          message: `Tracked entity ${entity.id} is listed more than once`,
          value: entity.id
        });
      } else {
        seen.add(entity.id);
      }

      if (!isEntityCategory(entity.category)) {
        errors.push({
          path: `sources.entities[${i}].category`,
          message: 'Tracked entity category must be exchange or institution',
          value: entity.category
        });
      }
    });

    return errors;
  }
}
