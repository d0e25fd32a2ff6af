import * as path from 'path';
import { test, expect } from '@playwright/test';
import { BrowserManager, BrowserSession, Clearable } from '../../src/core/browser/BrowserManager';
import { ConfigurationManager } from '../../src/core/configuration/ConfigurationManager';
import { BrowserSettings } from '../../src/core/configuration/types/config.types';
import { FakeDriver } from '../support/fake-driver';

class FakeLauncher {
  readonly launched: BrowserSettings[] = [];
  readonly drivers: FakeDriver[] = [];
  failOnClose = false;

  launch = async (settings: BrowserSettings): Promise<BrowserSession> => {
    this.launched.push(settings);
    const driver = new FakeDriver();
    this.drivers.push(driver);
    return {
      driver,
      close: async () => {
        if (this.failOnClose) {
          throw new Error('browser already gone');
        }
        await driver.close();
      }
    };
  };
}

class CountingCache implements Clearable {
  cleared = 0;

  clearCache(): void {
    this.cleared++;
  }
}

test.describe('BrowserManager', () => {
  let launcher: FakeLauncher;
  let manager: BrowserManager;

  test.beforeEach(() => {
    ConfigurationManager.reset();
    launcher = new FakeLauncher();
    manager = new BrowserManager(launcher.launch);
  });

  test.afterEach(() => {
    ConfigurationManager.reset();
  });

  test('launch loads the project configuration when none is loaded yet', async () => {
    await manager.launch();

    expect(ConfigurationManager.isLoaded()).toBe(true);
    expect(ConfigurationManager.getLoadedConfiguration()?.sources[0]).toBe(path.join(process.cwd(), 'config', 'global.env'));
  });

  test('launch keeps a configuration that is already loaded', async () => {
    await ConfigurationManager.loadConfiguration('qa', {
      configDir: path.join(process.cwd(), 'test', 'fixtures', 'config'),
      includeProcessEnv: false
    });
    const loaded = ConfigurationManager.getLoadedConfiguration();

    await manager.launch();

    expect(ConfigurationManager.getLoadedConfiguration()).toBe(loaded);
  });

  test('applies overrides on top of the configured browser settings', async () => {
    await manager.launch({ browser: 'webkit', headless: false });

    expect(launcher.launched[0]?.browser).toBe('webkit');
    expect(launcher.launched[0]?.headless).toBe(false);
    expect(manager.getOpenSessionCount()).toBe(1);
  });

  test('withBrowserSession closes the session and clears caches after success', async () => {
    const cache = new CountingCache();

    const url = await manager.withBrowserSession(async driver => {
      await driver.navigate('https://example.test/search');
      return driver.currentUrl();
    }, { caches: [cache] });

    expect(url).toBe('https://example.test/search');
    expect(cache.cleared).toBe(1);
    expect(launcher.drivers[0]?.closed).toBe(true);
    expect(manager.getOpenSessionCount()).toBe(0);
  });

  test('withBrowserSession cleans up when the body throws', async () => {
    const cache = new CountingCache();

    const error = await manager.withBrowserSession(async () => {
      throw new Error('step failed');
    }, { caches: [cache] }).catch((e: unknown) => e);

    expect(error instanceof Error ? error.message : '').toBe('step failed');
    expect(cache.cleared).toBe(1);
    expect(launcher.drivers[0]?.closed).toBe(true);
    expect(manager.getOpenSessionCount()).toBe(0);
  });

  test('closeAll reports sessions that fail to close', async () => {
    await manager.launch();
    await manager.launch();
    launcher.failOnClose = true;

    const error = await manager.closeAll().catch((e: unknown) => e);

    expect(error instanceof Error ? error.message : '')
      .toBe('Failed to close 2 browser session(s): browser already gone; browser already gone');
    expect(manager.getOpenSessionCount()).toBe(0);
  });
});
