import { test, expect } from '@playwright/test';
import { ActionFailedError, ElementNotReadyError, StateMismatchError } from '../../src/core/errors/AutomationErrors';
import { ActionLogger } from '../../src/core/logging/ActionLogger';
import { DynamicPage } from '../../src/core/pages/DynamicPage';
import { FakeDriver } from '../support/fake-driver';
import { loadFixturePage } from '../support/pages';

test.describe('Element wrappers', () => {
  let driver: FakeDriver;
  let page: DynamicPage;

  test.beforeEach(() => {
    ActionLogger.getInstance().clearHistory();
    driver = new FakeDriver();
    page = loadFixturePage(driver, 'SearchPage');
  });

  test.describe('Textbox', () => {
    test('type then getValue returns the typed text', async () => {
      driver.add('#search', {});

      await test.step('Type a destination', async () => {
        await page.textbox('search').type('Da Nang');
      });

      await test.step('Read it back', async () => {
        expect(await page.textbox('search').getValue()).toBe('Da Nang');
      });
    });

    test('type appends while setValue and clearAndType replace', async () => {
      driver.add('#search', { value: 'Hue' });
      const search = page.textbox('search');

      await search.type(' City');
      expect(await search.getValue()).toBe('Hue City');

      await search.setValue('Hoi An');
      expect(await search.getValue()).toBe('Hoi An');

      await search.clearAndType('Da Lat');
      expect(await search.getValue()).toBe('Da Lat');

      await search.clear();
      expect(await search.isEmpty()).toBe(true);
    });

    test('reads placeholder and readonly attributes', async () => {
      driver.add('#search', { attributes: { placeholder: 'Where to?', readonly: '' } });
      const search = page.textbox('search');

      expect(await search.getPlaceholder()).toBe('Where to?');
      expect(await search.isReadonly()).toBe(true);
    });

    test('a missing placeholder reads as an empty string', async () => {
      driver.add('#search', {});
      expect(await page.textbox('search').getPlaceholder()).toBe('');
      expect(await page.textbox('search').isReadonly()).toBe(false);
    });

    test('key presses go to the field', async () => {
      driver.add('#search', {});
      await page.textbox('search').pressEnter();
      await page.textbox('search').pressTab();

      const presses = driver.callsFor('#search').filter(call => call.method === 'press');
      expect(presses.map(call => call.args)).toEqual([['Enter'], ['Tab']]);
    });
  });

  test.describe('Button', () => {
    test('click activates the element', async () => {
      let clicks = 0;
      driver.add('#search-btn', { onClick: () => { clicks++; } });

      await page.button('searchButton').click();

      expect(clicks).toBe(1);
      expect(ActionLogger.getInstance().getLastEntry()?.message).toBe("Element action: click on 'searchButton'");
    });

    test('a disabled button is never clicked and times out as not clickable', async () => {
      driver.add('#search-btn', { enabled: false });
      const button = page.button('searchButton');

      expect(await button.isDisabled()).toBe(true);
      expect(await button.isEnabled()).toBe(false);

      const error = await button.click().catch((e: unknown) => e);
      expect(error).toBeInstanceOf(ElementNotReadyError);
      expect(driver.methodsCalled('#search-btn')).not.toContain('click');
    });

    test('clickViaScript only needs the element to be present', async () => {
      let clicks = 0;
      driver.add('#search-btn', { visible: false, onClick: () => { clicks++; } });

      await page.button('searchButton').clickViaScript();

      expect(clicks).toBe(1);
      expect(driver.methodsCalled('#search-btn')).toContain('dispatchClick');
    });

    test('rightClick sends the right mouse button', async () => {
      driver.add('#search-btn', {});
      await page.button('searchButton').rightClick();

      const click = driver.callsFor('#search-btn').find(call => call.method === 'click');
      expect(click?.args).toEqual(['right']);
    });

    test('isDisplayed and exists report false for a missing element', async () => {
      const button = page.button('searchButton');
      expect(await button.isDisplayed()).toBe(false);
      expect(await button.exists()).toBe(false);
    });
  });

  test.describe('Combobox', () => {
    test.beforeEach(() => {
      driver.add('#destination', {
        options: [
          { label: 'Da Nang', value: 'dad' },
          { label: 'Hanoi', value: 'han' },
          { label: ' Hue ', value: 'hui' }
        ]
      });
    });

    test('selects by text, value and index', async () => {
      const destination = page.combobox('destination');

      await destination.selectByText('Hanoi');
      expect(await destination.getSelectedOption()).toBe('Hanoi');
      expect(await destination.getSelectedValue()).toBe('han');

      await destination.selectByValue('dad');
      expect(await destination.getSelectedOption()).toBe('Da Nang');

      await destination.selectByIndex(2);
      expect(await destination.getSelectedOption()).toBe('Hue');
    });

    test('lists options and checks membership by trimmed text', async () => {
      const destination = page.combobox('destination');
      expect(await destination.getAllOptions()).toEqual(['Da Nang', 'Hanoi', ' Hue ']);
      expect(await destination.hasOption('Hue')).toBe(true);
      expect(await destination.hasOption('Paris')).toBe(false);
    });

    test('selecting an unknown option fails as an action', async () => {
      const error = await page.combobox('destination').selectByText('Paris').catch((e: unknown) => e);

      expect(error).toBeInstanceOf(ActionFailedError);
      if (error instanceof ActionFailedError) {
        expect(error.action).toBe('selectByText');
        expect(error.elementName).toBe('destination');
      }
    });
  });

  test.describe('Checkbox', () => {
    const selector = "[name='free-cancellation']";

    test('check is idempotent', async () => {
      driver.add(selector, { checkable: true, checked: false });
      const checkbox = page.checkbox('freeCancellation');

      await checkbox.check();
      await checkbox.check();

      expect(await checkbox.isChecked()).toBe(true);
      expect(driver.methodsCalled(selector).filter(method => method === 'click')).toHaveLength(1);
    });

    test('uncheck and toggle change the state', async () => {
      driver.add(selector, { checkable: true, checked: true });
      const checkbox = page.checkbox('freeCancellation');

      await checkbox.uncheck();
      expect(await checkbox.isChecked()).toBe(false);

      await checkbox.toggle();
      expect(await checkbox.isChecked()).toBe(true);
    });

    test('verifyState throws on a mismatch', async () => {
      driver.add(selector, { checkable: true, checked: true });

      const error = await page.checkbox('freeCancellation').verifyState(false).catch((e: unknown) => e);

      expect(error).toBeInstanceOf(StateMismatchError);
      if (error instanceof StateMismatchError) {
        expect(error.expected).toBe(false);
        expect(error.actual).toBe(true);
      }
    });
  });

  test.describe('Label', () => {
    test('text comparisons use the trimmed text', async () => {
      driver.add('h1.title', { text: '  Hotels in Da Nang \n' });
      const title = page.label('title');

      expect(await title.getText()).toBe('Hotels in Da Nang');
      expect(await title.containsText('Da Nang')).toBe(true);
      expect(await title.equalsText('Hotels in Da Nang')).toBe(true);
      expect(await title.matchesPattern(/^Hotels in \w+/)).toBe(true);
      expect(await title.matchesPattern('Hanoi$')).toBe(false);
    });

    test('waitInvisible resolves once the element is gone', async () => {
      driver.add('.spinner', {});
      setTimeout(() => driver.remove('.spinner'), 50);

      await page.label('spinner').waitInvisible();

      expect(driver.matches('.spinner')).toHaveLength(0);
    });

    test('a label that stays visible fails its invisible wait', async () => {
      driver.add('.spinner', {});

      const error = await page.label('spinner').waitInvisible().catch((e: unknown) => e);

      expect(error).toBeInstanceOf(ElementNotReadyError);
      if (error instanceof ElementNotReadyError) {
        expect(error.waitType).toBe('invisible');
        expect(error.timeoutMs).toBe(200);
      }
    });
  });
});
