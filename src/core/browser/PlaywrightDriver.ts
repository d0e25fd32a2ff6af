// src/core/browser/PlaywrightDriver.ts

import { errors, Locator, Page } from 'playwright';
import { LocatorResolver, NativeSelector } from '../locators/LocatorResolver';
import {
  BrowserDriver,
  DriverClickOptions,
  DriverElement,
  ElementState,
  SelectOptionTarget,
  SelectedOption
} from './types/driver.types';

const HIGHLIGHT_STYLE = '3px solid #ff4081';

const LOCATOR_STATES = {
  visible: 'visible',
  clickable: 'visible',
  present: 'attached',
  invisible: 'hidden'
} as const satisfies Record<ElementState, 'attached' | 'visible' | 'hidden'>;

// Playwright reads a zero timeout as "wait forever".
function remaining(deadline: number): number {
  return Math.max(1, deadline - Date.now());
}

export class PlaywrightElement implements DriverElement {
  constructor(private readonly locator: Locator) {}

  async count(): Promise<number> {
    return await this.locator.count();
  }

  nth(index: number): DriverElement {
    return new PlaywrightElement(this.locator.nth(index));
  }

  async isVisible(): Promise<boolean> {
    return await this.target.isVisible();
  }

  async isEnabled(): Promise<boolean> {
    return await this.target.isEnabled();
  }

  async isChecked(): Promise<boolean> {
    return await this.target.isChecked();
  }

  async waitFor(state: ElementState, timeout: number): Promise<boolean> {
    const deadline = Date.now() + timeout;
    try {
      await this.target.waitFor({ state: LOCATOR_STATES[state], timeout: remaining(deadline) });
      if (state === 'clickable') {
        const handle = await this.target.elementHandle({ timeout: remaining(deadline) });
        if (!handle) {
          return false;
        }
        try {
          await handle.waitForElementState('enabled', { timeout: remaining(deadline) });
        } finally {
          await handle.dispose();
        }
      }
      return true;
    } catch (error) {
      if (error instanceof errors.TimeoutError) {
        return false;
      }
      throw error;
    }
  }

  async click(options: DriverClickOptions = {}): Promise<void> {
    await this.target.click({ button: options.button ?? 'left' });
  }

  async dblclick(): Promise<void> {
    await this.target.dblclick();
  }

  async dispatchClick(): Promise<void> {
    await this.target.dispatchEvent('click');
  }

  async hover(): Promise<void> {
    await this.target.hover();
  }

  async focus(): Promise<void> {
    await this.target.focus();
  }

  async openInNewTab(): Promise<void> {
    const modifier = process.platform === 'darwin' ? 'Meta' : 'Control';
    await this.target.click({ modifiers: [modifier] });
  }

  async fill(value: string): Promise<void> {
    await this.target.fill(value);
  }

  async typeText(text: string): Promise<void> {
    await this.target.pressSequentially(text);
  }

  async clear(): Promise<void> {
    await this.target.clear();
  }

  async press(key: string): Promise<void> {
    await this.target.press(key);
  }

  async inputValue(): Promise<string> {
    return await this.target.inputValue();
  }

  async innerText(): Promise<string> {
    return await this.target.innerText();
  }

  async getAttribute(name: string): Promise<string | null> {
    return await this.target.getAttribute(name);
  }

  async allInnerTexts(): Promise<string[]> {
    return await this.locator.allInnerTexts();
  }

  async selectOption(target: SelectOptionTarget): Promise<void> {
    await this.target.selectOption(target);
  }

  async selectedOption(): Promise<SelectedOption | null> {
    return await this.target.evaluate(el => {
      if (!(el instanceof HTMLSelectElement)) return null;
      const option = el.options[el.selectedIndex];
      return option ? { label: option.text, value: option.value } : null;
    });
  }

  async optionTexts(): Promise<string[]> {
    const texts = await this.target.locator('option').allTextContents();
    return texts.map(text => text.trim());
  }

  async scrollIntoView(): Promise<void> {
    await this.target.scrollIntoViewIfNeeded();
  }

  async highlight(): Promise<void> {
    await this.target.evaluate((el, style) => {
      el.style.outline = style;
    }, HIGHLIGHT_STYLE);
  }

  // Single-element operations act on the first match.
  private get target(): Locator {
    return this.locator.first();
  }
}

export class PlaywrightDriver implements BrowserDriver {
  constructor(private readonly page: Page) {}

  async navigate(url: string): Promise<void> {
    await this.page.goto(url, { waitUntil: 'domcontentloaded' });
  }

  find(selector: NativeSelector): DriverElement {
    return new PlaywrightElement(this.page.locator(LocatorResolver.toPlaywrightSelector(selector)));
  }

  currentUrl(): string {
    return this.page.url();
  }

  async close(): Promise<void> {
    if (!this.page.isClosed()) {
      await this.page.close();
    }
  }

  getPage(): Page {
    return this.page;
  }
}
