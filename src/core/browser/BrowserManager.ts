// src/core/browser/BrowserManager.ts

import { chromium, firefox, webkit, Browser, BrowserType, LaunchOptions } from 'playwright';
import { ConfigurationManager } from '../configuration/ConfigurationManager';
import { BrowserName, BrowserSettings } from '../configuration/types/config.types';
import { ActionLogger } from '../logging/ActionLogger';
import { errorMessage } from '../errors/AutomationErrors';
import { PlaywrightDriver } from './PlaywrightDriver';
import { BrowserDriver } from './types/driver.types';

export interface BrowserSession {
  readonly driver: BrowserDriver;
  close(): Promise<void>;
}

export type BrowserLauncher = (settings: BrowserSettings) => Promise<BrowserSession>;

/** Anything holding per-session state that must not outlive the session. */
export interface Clearable {
  clearCache(): void;
}

export interface SessionOptions {
  settings?: Partial<BrowserSettings>;
  caches?: Clearable[];
}

const BROWSER_TYPES: Record<BrowserName, BrowserType> = {
  chromium,
  firefox,
  webkit
};

export const launchPlaywright: BrowserLauncher = async (settings) => {
  const options: LaunchOptions = {
    headless: settings.headless,
    slowMo: settings.slowMo
  };

  const browser: Browser = await BROWSER_TYPES[settings.browser].launch(options);
  try {
    const context = await browser.newContext({ viewport: settings.viewport });
    const page = await context.newPage();
    page.setDefaultTimeout(ConfigurationManager.getNumber('PAGE_TIMEOUT', 30000));

    return {
      driver: new PlaywrightDriver(page),
      close: async () => {
        await context.close();
        await browser.close();
      }
    };
  } catch (error) {
    await browser.close();
    throw error;
  }
};

export class BrowserManager {
  private readonly sessions = new Set<BrowserSession>();

  constructor(private readonly launcher: BrowserLauncher = launchPlaywright) {}

  /** Loads the default configuration first when nothing has loaded it yet. */
  async launch(overrides: Partial<BrowserSettings> = {}): Promise<BrowserSession> {
    if (!ConfigurationManager.isLoaded()) {
      await ConfigurationManager.loadConfiguration();
    }

    const settings: BrowserSettings = {
      ...ConfigurationManager.getHarnessConfig().browser,
      ...overrides
    };

    ActionLogger.logInfo(`Launching ${settings.browser}`, {
      headless: settings.headless,
      viewport: `${settings.viewport.width}x${settings.viewport.height}`
    });

    const session = await this.launcher(settings);
    this.sessions.add(session);
    return session;
  }

  async closeSession(session: BrowserSession): Promise<void> {
    this.sessions.delete(session);
    await session.close();
    ActionLogger.logInfo('Browser session closed');
  }

  /**
   * Runs `fn` against a fresh session. The session is closed and every
   * given cache cleared whether `fn` resolves or throws.
   */
  async withBrowserSession<T>(fn: (driver: BrowserDriver) => Promise<T>, options: SessionOptions = {}): Promise<T> {
    const session = await this.launch(options.settings);
    try {
      return await fn(session.driver);
    } finally {
      for (const cache of options.caches ?? []) {
        cache.clearCache();
      }
      await this.closeSession(session);
    }
  }

  async closeAll(): Promise<void> {
    const failures: string[] = [];
    for (const session of [...this.sessions]) {
      try {
        await this.closeSession(session);
      } catch (error) {
        failures.push(errorMessage(error));
        ActionLogger.logError('Failed to close browser session', error);
      }
    }
    if (failures.length > 0) {
      throw new Error(`Failed to close ${failures.length} browser session(s): ${failures.join('; ')}`);
    }
  }

  getOpenSessionCount(): number {
    return this.sessions.size;
  }
}
