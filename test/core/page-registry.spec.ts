import * as path from 'path';
import { test, expect } from '@playwright/test';
import { AutomationError } from '../../src/core/errors/AutomationErrors';
import { PageRegistry } from '../../src/core/pages/PageRegistry';
import { fixturePath } from '../support/fixtures';

test.describe('PageRegistry', () => {
  test('discovers page files and indexes them by name and tag', async () => {
    const registry = new PageRegistry(fixturePath('pages'));

    const pages = await registry.discover();

    expect(registry.isDiscovered()).toBe(true);
    expect(pages.map(page => page.pageName)).toEqual(['ProfilePage', 'SearchPage']);
    expect(registry.get('SearchPage')).toEqual({
      pageName: 'SearchPage',
      filePath: path.resolve(fixturePath('pages', 'SearchPage.json')),
      url: '/search',
      tags: ['search', 'smoke'],
      elementCount: 10
    });
    expect(registry.findByTag('healing').map(page => page.pageName)).toEqual(['ProfilePage']);
    expect(registry.findByTag('checkout')).toEqual([]);
    expect(registry.getInvalidFiles()).toEqual([]);
  });

  test('unknown page names fail with the available names', async () => {
    const registry = new PageRegistry(fixturePath('pages'));
    await registry.discover();

    let caught: unknown;
    try {
      registry.get('CheckoutPage');
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(AutomationError);
    if (caught instanceof AutomationError) {
      expect(caught.code).toBe('PAGE_NOT_REGISTERED');
      expect(caught.message).toBe("Page 'CheckoutPage' not found in registry. Available pages: ProfilePage, SearchPage");
    }
    expect(registry.has('CheckoutPage')).toBe(false);
  });

  test('invalid files are reported and left out of the index', async () => {
    const registry = new PageRegistry(fixturePath('invalid-pages'));

    const pages = await registry.discover();

    expect(pages).toEqual([]);
    const invalid = registry.getInvalidFiles();
    expect(invalid.map(file => path.basename(file.filePath))).toEqual([
      'BrokenElements.json',
      'NoElements.json',
      'NotJson.json'
    ]);
    expect(invalid[1]?.problems).toEqual(['elements must be a non-empty array']);
  });

  test('a repeated page name is reported without stopping discovery', async () => {
    const registry = new PageRegistry(fixturePath('duplicate-pages'));

    const pages = await registry.discover();

    expect(registry.isDiscovered()).toBe(true);
    expect(pages.map(page => page.url)).toEqual(['/']);
    expect(registry.getInvalidFiles()).toEqual([{
      filePath: path.resolve(fixturePath('duplicate-pages', 'LandingCopy.json')),
      problems: [`pageName 'Landing' is already defined in ${path.resolve(fixturePath('duplicate-pages', 'Landing.json'))}`]
    }]);
  });

  test('the shipped page files are all valid', async () => {
    const registry = new PageRegistry(path.join(__dirname, '..', '..', 'pages'));

    const pages = await registry.discover();

    expect(registry.getInvalidFiles()).toEqual([]);
    expect(pages.map(page => page.pageName)).toEqual(['HomePage', 'ProfileFormPage', 'SearchResultsPage']);
  });

  test('clear forgets everything discovered', async () => {
    const registry = new PageRegistry(fixturePath('pages'));
    await registry.discover();

    registry.clear();

    expect(registry.isDiscovered()).toBe(false);
    expect(registry.listPages()).toEqual([]);
  });
});
