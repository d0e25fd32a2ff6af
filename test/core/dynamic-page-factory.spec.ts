import * as path from 'path';
import { test, expect } from '@playwright/test';
import { ConfigurationManager } from '../../src/core/configuration/ConfigurationManager';
import { ElementNotFoundError, InvalidPageDefinitionError } from '../../src/core/errors/AutomationErrors';
import { DynamicPageFactory } from '../../src/core/pages/DynamicPageFactory';
import { PageDefinitionParser } from '../../src/core/pages/PageDefinitionParser';
import { PageRegistry } from '../../src/core/pages/PageRegistry';
import { FakeDriver } from '../support/fake-driver';
import { fixturePath } from '../support/fixtures';
import { fixtureFactory } from '../support/pages';

test.describe('DynamicPageFactory', () => {
  let driver: FakeDriver;
  let factory: DynamicPageFactory;

  test.beforeEach(() => {
    driver = new FakeDriver();
    factory = fixtureFactory(driver);
  });

  test.afterEach(() => {
    ConfigurationManager.reset();
  });

  test('loading the same source twice returns the cached page', () => {
    const first = factory.loadPage('SearchPage');
    const second = factory.loadPage('SearchPage.json');
    const third = factory.loadPage(fixturePath('pages', 'SearchPage.json'));

    expect(second).toBe(first);
    expect(third).toBe(first);
    expect(factory.getCacheSize()).toBe(1);
    expect(factory.isCached('SearchPage')).toBe(true);
    expect(factory.getSourceId('SearchPage')).toBe(path.resolve(fixturePath('pages', 'SearchPage.json')));
  });

  test('clearCache forces a fresh parse and drops element wrappers', () => {
    const page = factory.loadPage('SearchPage');
    page.textbox('search');
    page.button('searchButton');
    expect(page.getCacheSize()).toBe(2);

    factory.clearCache();
    factory.clearCache();

    expect(page.getCacheSize()).toBe(0);
    expect(factory.getCacheSize()).toBe(0);
    expect(factory.loadPage('SearchPage')).not.toBe(page);
  });

  test('removeFromCache evicts a single page', () => {
    factory.loadPage('SearchPage');
    factory.loadPage('ProfilePage');

    expect(factory.removeFromCache('SearchPage')).toBe(true);
    expect(factory.removeFromCache('SearchPage')).toBe(false);
    expect(factory.getCachedPageNames()).toEqual(['ProfilePage']);
  });

  test('wrappers are cached per element and type', () => {
    const page = factory.loadPage('SearchPage');

    expect(page.textbox('search')).toBe(page.textbox('search'));
    expect(page.label('search')).not.toBe(page.textbox('search'));
    expect(page.getCacheSize()).toBe(2);
  });

  test('in-memory definitions are cached per definition object', () => {
    const definition = PageDefinitionParser.parseFile(fixturePath('pages', 'SearchPage.json'));

    const page = factory.loadPage(definition);

    expect(factory.getSourceId(definition)).toBe('definition:SearchPage#1');
    expect(factory.loadPage(definition)).toBe(page);

    const raw = { pageName: 'Inline', elements: [{ name: 'ok', locator: 'id=ok', type: 'Button' }] };
    expect(factory.loadPage(raw).getElementNames()).toEqual(['ok']);
    expect(factory.isCached(raw)).toBe(true);
  });

  test('two definitions sharing a page name load as separate pages', () => {
    const first = { pageName: 'Inline', elements: [{ name: 'ok', locator: 'id=ok', type: 'Button' }] };
    const second = { pageName: 'Inline', elements: [{ name: 'other', locator: 'id=other', type: 'Button' }] };

    const firstPage = factory.loadPage(first);
    const secondPage = factory.loadPage(second);

    expect(secondPage).not.toBe(firstPage);
    expect(secondPage.getElementNames()).toEqual(['other']);
    expect(factory.loadPage(first)).toBe(firstPage);
    expect(factory.getCacheSize()).toBe(2);
  });

  test('typed definitions are held to the element rules', () => {
    const parsed = PageDefinitionParser.parseFile(fixturePath('pages', 'SearchPage.json'));
    const [name, element] = [...parsed.elements][0];
    const broken = {
      ...parsed,
      elements: new Map([[name, { ...element, type: 'DynamicLabel' as const, locator: '' }]])
    };

    expect(factory.validatePageDefinition(broken)).toBe(false);

    let caught: unknown;
    try {
      factory.loadPage(broken);
    } catch (error) {
      caught = error;
    }
    expect(caught).toBeInstanceOf(InvalidPageDefinitionError);
    if (caught instanceof InvalidPageDefinitionError) {
      expect(caught.problems).toEqual([`element '${name}': locator is missing or empty`]);
    }
    expect(factory.getCacheSize()).toBe(0);
  });

  test('invalid sources fail to load and fail validation', () => {
    const invalid = fixturePath('invalid-pages', 'BrokenElements.json');

    expect(() => factory.loadPage(invalid)).toThrow(InvalidPageDefinitionError);
    expect(factory.validatePageDefinition(invalid)).toBe(false);
    expect(factory.validatePageDefinition('SearchPage')).toBe(true);
    expect(factory.validatePageDefinition({ pageName: 'Empty', elements: [] })).toBe(false);
    expect(factory.getCacheSize()).toBe(0);
  });

  test('unknown element names list what the page defines', () => {
    const page = factory.loadPage('ProfilePage');

    let caught: unknown;
    try {
      page.button('checkout');
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(ElementNotFoundError);
    if (caught instanceof ElementNotFoundError) {
      expect(caught.message).toBe("Element 'checkout' is not defined on page 'ProfilePage'");
      expect(caught.details['available']).toEqual(['username', 'country', 'techInterest', 'submit']);
    }
  });

  test('open joins relative URLs with the base URL', async () => {
    ConfigurationManager.set('BASE_URL', 'https://staging.example.test/app');

    await factory.loadPage('SearchPage').open();
    await factory.loadPage('ProfilePage').open();

    expect(driver.navigations).toEqual([
      'https://staging.example.test/app/search',
      'https://profile.example.test/me'
    ]);
  });

  test('an explicit base URL wins over configuration', () => {
    ConfigurationManager.set('BASE_URL', 'https://staging.example.test');
    const page = fixtureFactory(driver, 'https://local.example.test/').loadPage('SearchPage');

    expect(page.getUrl()).toBe('https://local.example.test/search');
  });

  test('registered page names resolve through the registry', async () => {
    const registry = new PageRegistry(fixturePath('pages'));
    await registry.discover();
    const registered = new DynamicPageFactory(driver, { registry, pagesDir: fixturePath('invalid-pages') });

    expect(registered.loadPage('ProfilePage').getPageName()).toBe('ProfilePage');
    expect(registered.getSourceId('ProfilePage')).toBe(path.resolve(fixturePath('pages', 'ProfilePage.json')));
  });
});
