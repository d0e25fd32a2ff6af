import { test, expect } from '@playwright/test';
import { ElementBinding } from '../../src/core/elements/ElementBinding';
import { Textbox } from '../../src/core/elements/Textbox';
import { ActionFailedError, ElementNotReadyError } from '../../src/core/errors/AutomationErrors';
import { ActionLogger } from '../../src/core/logging/ActionLogger';
import { FakeDriver } from '../support/fake-driver';

function searchBox(driver: FakeDriver, timeout = 300): Textbox {
  return new Textbox(new ElementBinding({
    driver,
    elementName: 'search',
    locator: 'id=search',
    pageName: 'SearchPage',
    waitType: 'visible',
    timeout
  }));
}

test.describe('Wait policy', () => {
  let driver: FakeDriver;

  test.beforeEach(() => {
    ActionLogger.getInstance().clearHistory();
    driver = new FakeDriver();
  });

  test('waits for an element that appears within the timeout', async () => {
    driver.addLater('#search', {}, 80);

    await searchBox(driver).setValue('Da Nang');

    expect(driver.matches('#search')[0]?.value).toBe('Da Nang');
  });

  test('reports the element, locator, condition and timeout when it never appears', async () => {
    const error = await searchBox(driver, 120).setValue('Da Nang').catch((e: unknown) => e);

    expect(error).toBeInstanceOf(ElementNotReadyError);
    if (!(error instanceof ElementNotReadyError)) return;
    expect(error.elementName).toBe('search');
    expect(error.locator).toBe('id=search');
    expect(error.waitType).toBe('visible');
    expect(error.timeoutMs).toBe(120);
    expect(error.message).toBe("Element 'search' (id=search) was not visible within 120ms");
    expect(driver.methodsCalled('#search')).not.toContain('fill');
  });

  test('a hidden element is present but not visible', async () => {
    driver.add('#search', { visible: false });
    const search = searchBox(driver, 60);

    await search.waitPresent();
    expect(await search.isDisplayed()).toBe(false);
    const error = await search.waitVisible().catch((e: unknown) => e);
    expect(error).toBeInstanceOf(ElementNotReadyError);
  });

  test('a driver failure after the wait surfaces as ActionFailedError', async () => {
    driver.add('#search', { failOn: ['fill'] });

    const error = await searchBox(driver).setValue('Da Nang').catch((e: unknown) => e);

    expect(error).toBeInstanceOf(ActionFailedError);
    if (!(error instanceof ActionFailedError)) return;
    expect(error.action).toBe('setValue');
    expect(error.message).toBe("Action 'setValue' failed on element 'search' (id=search): fill failed on #search");
    expect(error.cause?.message).toBe('fill failed on #search');

    const logged = ActionLogger.getInstance().getHistory({ level: 'error' });
    expect(logged.map(entry => entry.message)).toEqual(["Action 'setValue' failed on search"]);
  });

  test('waits through the driver with the element timeout', async () => {
    driver.add('#search', {});

    await searchBox(driver, 250).waitClickable();

    const waits = driver.callsFor('#search').filter(call => call.method === 'waitFor');
    expect(waits.map(call => call.args)).toEqual([['clickable', 250]]);
  });

  test('a disabled element is visible but never clickable', async () => {
    driver.add('#search', { enabled: false });
    const search = searchBox(driver, 60);

    await search.waitVisible();
    const error = await search.waitClickable().catch((e: unknown) => e);

    expect(error).toBeInstanceOf(ElementNotReadyError);
    expect(error instanceof ElementNotReadyError ? error.waitType : '').toBe('clickable');
  });

  test('waitInvisible returns once the element is removed', async () => {
    driver.add('#search', {});
    setTimeout(() => driver.remove('#search'), 40);

    await searchBox(driver).waitInvisible();

    expect(driver.matches('#search')).toEqual([]);
  });
});
