// src/core/configuration/types/config.types.ts

export type ConfigMap = Record<string, string>;

export type BrowserName = 'chromium' | 'firefox' | 'webkit';

export interface ConfigurationOptions {
  /** Directory holding `global.env`, other `*.env` files and `environments/`. */
  configDir: string;
  /** Overlay `process.env` on top of the files. */
  includeProcessEnv: boolean;
}

export interface LoadedConfiguration {
  environment: string;
  loadedAt: Date;
  sources: string[];
  keyCount: number;
}

export interface BrowserSettings {
  browser: BrowserName;
  headless: boolean;
  slowMo: number;
  viewport: {
    width: number;
    height: number;
  };
}

export interface HarnessConfig {
  environment: string;
  baseUrl: string;
  logLevel: string;
  browser: BrowserSettings;
  timeouts: {
    element: number;
    page: number;
  };
  retry: {
    attempts: number;
    delayMs: number;
  };
  paths: {
    pages: string;
    testData: string;
  };
  dateFormat: string;
}
