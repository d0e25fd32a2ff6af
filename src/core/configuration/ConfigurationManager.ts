// src/core/configuration/ConfigurationManager.ts

import * as path from 'path';
import { EnvironmentLoader } from './EnvironmentLoader';
import {
  BrowserName,
  ConfigMap,
  ConfigurationOptions,
  HarnessConfig,
  LoadedConfiguration
} from './types/config.types';
import { AutomationError } from '../errors/AutomationErrors';
import { Logger, logger } from '../utils/Logger';

export const DEFAULT_ELEMENT_TIMEOUT = 10000;
export const DEFAULT_DATE_FORMAT = 'yyyy-MM-dd';

const BROWSERS: readonly BrowserName[] = ['chromium', 'firefox', 'webkit'];

export class ConfigurationManager {
  private static config: ConfigMap = {};
  private static overrides: ConfigMap = {};
  private static loadedConfiguration: LoadedConfiguration | null = null;
  private static isInitialized = false;

  private constructor() {}

  /**
   * Loads `global.env`, the other `*.env` files and `environments/<env>.env`,
   * then overlays the process environment. Later sources win.
   */
  static async loadConfiguration(environment?: string, options?: Partial<ConfigurationOptions>): Promise<void> {
    const configDir = options?.configDir ?? path.join(process.cwd(), 'config');
    const includeProcessEnv = options?.includeProcessEnv ?? true;
    const loader = new EnvironmentLoader(configDir);

    try {
      const merged: ConfigMap = {};
      const sources: string[] = [];

      for (const file of await loader.loadGlobalConfig()) {
        Object.assign(merged, file.values);
        sources.push(file.file);
      }

      const envName = environment
        ?? (includeProcessEnv ? process.env['ENVIRONMENT'] : undefined)
        ?? merged['ENVIRONMENT']
        ?? 'local';

      const envFile = await loader.loadEnvironmentFile(envName);
      if (envFile) {
        Object.assign(merged, envFile.values);
        sources.push(envFile.file);
      }

      if (includeProcessEnv) {
        for (const [key, value] of Object.entries(process.env)) {
          if (value !== undefined) {
            merged[key] = value;
          }
        }
        sources.push('process.env');
      }

      merged['ENVIRONMENT'] = envName;

      ConfigurationManager.config = merged;
      ConfigurationManager.overrides = {};
      ConfigurationManager.loadedConfiguration = {
        environment: envName,
        loadedAt: new Date(),
        sources,
        keyCount: Object.keys(merged).length
      };
      ConfigurationManager.isInitialized = true;

      const logLevel = merged['LOG_LEVEL'];
      if (logLevel) {
        Logger.setGlobalLevel(Logger.parseLevel(logLevel));
      }

      logger.info(`Configuration loaded for environment '${envName}'`, {
        keys: Object.keys(merged).length,
        sources: sources.length
      });
    } catch (error) {
      logger.error('Failed to load configuration', error instanceof Error ? error : { error: String(error) });
      throw new AutomationError(
        `Configuration loading failed: ${error instanceof Error ? error.message : String(error)}`,
        'CONFIG_LOAD_FAILED',
        { configDir }
      );
    }
  }

  /**
   * Before `loadConfiguration` runs, lookups fall through to `process.env`
   * so the harness works with defaults alone.
   */
  static get(key: string, defaultValue: string = ''): string {
    const override = ConfigurationManager.overrides[key];
    if (override !== undefined) {
      return override;
    }

    const value = ConfigurationManager.isInitialized
      ? ConfigurationManager.config[key]
      : process.env[key];

    return value === undefined || value === '' ? defaultValue : value;
  }

  static getBoolean(key: string, defaultValue: boolean = false): boolean {
    return ConfigurationManager.parseBoolean(ConfigurationManager.get(key)) ?? defaultValue;
  }

  static getNumber(key: string, defaultValue: number): number {
    return ConfigurationManager.parseNumber(ConfigurationManager.get(key)) ?? defaultValue;
  }

  static getArray(key: string, delimiter: string = ','): string[] {
    const value = ConfigurationManager.get(key);
    if (!value) return [];
    return value.split(delimiter).map(item => item.trim()).filter(item => item.length > 0);
  }

  static require(key: string): string {
    const value = ConfigurationManager.get(key);
    if (value === '') {
      throw new AutomationError(`Required configuration key '${key}' is missing or empty`, 'CONFIG_KEY_MISSING', { key });
    }
    return value;
  }

  static has(key: string): boolean {
    return ConfigurationManager.get(key) !== '';
  }

  /**
   * Runtime override; survives until `reset()` or the next load.
   */
  static set(key: string, value: string): void {
    ConfigurationManager.overrides[key] = value;
  }

  static isLoaded(): boolean {
    return ConfigurationManager.isInitialized;
  }

  static getLoadedConfiguration(): LoadedConfiguration | null {
    return ConfigurationManager.loadedConfiguration;
  }

  static getHarnessConfig(): HarnessConfig {
    const get = ConfigurationManager.get;
    const getNumber = ConfigurationManager.getNumber;
    const elementTimeout = getNumber('ELEMENT_TIMEOUT', DEFAULT_ELEMENT_TIMEOUT);

    return {
      environment: get('ENVIRONMENT', 'local'),
      baseUrl: get('BASE_URL'),
      logLevel: get('LOG_LEVEL', 'info'),
      browser: {
        browser: ConfigurationManager.parseBrowser(get('BROWSER', 'chromium')),
        headless: ConfigurationManager.getBoolean('HEADLESS', true),
        slowMo: getNumber('BROWSER_SLOW_MO', 0),
        viewport: {
          width: getNumber('VIEWPORT_WIDTH', 1920),
          height: getNumber('VIEWPORT_HEIGHT', 1080)
        }
      },
      timeouts: {
        element: elementTimeout,
        page: getNumber('PAGE_TIMEOUT', 30000)
      },
      retry: {
        attempts: getNumber('RETRY_ATTEMPTS', 3),
        delayMs: getNumber('RETRY_DELAY', 500)
      },
      paths: {
        pages: get('PAGES_DIR', 'pages'),
        testData: get('TEST_DATA_DIR', 'testdata')
      },
      dateFormat: get('DATE_FORMAT', DEFAULT_DATE_FORMAT)
    };
  }

  static reset(): void {
    ConfigurationManager.config = {};
    ConfigurationManager.overrides = {};
    ConfigurationManager.loadedConfiguration = null;
    ConfigurationManager.isInitialized = false;
  }

  private static parseBrowser(value: string): BrowserName {
    const lower = value.toLowerCase().trim();
    if (lower === 'chrome') return 'chromium';
    const match = BROWSERS.find(name => name === lower);
    if (!match) {
      logger.warn(`Unknown browser '${value}', defaulting to chromium`);
      return 'chromium';
    }
    return match;
  }

  private static parseBoolean(value: string): boolean | undefined {
    if (value === '') return undefined;
    const lower = value.toLowerCase().trim();
    return lower === 'true' || lower === '1' || lower === 'yes' || lower === 'on';
  }

  private static parseNumber(value: string): number | undefined {
    if (value === '') return undefined;
    const parsed = parseInt(value, 10);
    return isNaN(parsed) ? undefined : parsed;
  }
}
