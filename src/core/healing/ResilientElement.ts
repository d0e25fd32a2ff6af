// src/core/healing/ResilientElement.ts

import { BrowserDriver, DriverElement } from '../browser/types/driver.types';
import { ElementBinding } from '../elements/ElementBinding';
import { WaitType } from '../elements/types/element.types';
import { ActionLogger } from '../logging/ActionLogger';
import { ChainResult, tryInOrderWithResult } from './FallbackChain';

export interface ResilientElementOptions {
    driver: BrowserDriver;
    elementName: string;
    pageName: string;
    /** Primary locator first, then the fallbacks in the order to try them. */
    locators: readonly string[];
    waitType: WaitType;
    /** Wait budget for each candidate, not for the whole chain. */
    timeout?: number | undefined;
}

/**
 * An element known by several locators. Each operation walks the locators
 * through the fallback chain; a candidate waits before acting, so one that
 * cannot find its element fails without touching the page.
 */
export class ResilientElement {
    private lastWorkingLocator: string | null = null;

    constructor(private readonly options: ResilientElementOptions) {
        if (options.locators.length === 0) {
            throw new Error(`Resilient element '${options.elementName}' needs at least one locator`);
        }
    }

    getElementName(): string {
        return this.options.elementName;
    }

    getLocators(): readonly string[] {
        return this.options.locators;
    }

    /** Locator that satisfied the most recent operation, if any. */
    getLastWorkingLocator(): string | null {
        return this.lastWorkingLocator;
    }

    async click(): Promise<void> {
        await this.run('click', element => element.click(), 'clickable');
    }

    async setValue(value: string): Promise<void> {
        await this.run('setValue', element => element.fill(value), 'visible');
    }

    async selectByText(text: string): Promise<void> {
        await this.run('selectByText', element => element.selectOption({ label: text }), 'visible');
    }

    async check(): Promise<void> {
        await this.run('check', async element => {
            if (!(await element.isChecked())) {
                await element.click();
            }
        }, 'clickable');
    }

    async getText(): Promise<string> {
        const text = await this.run('getText', element => element.innerText(), 'visible');
        return text.trim();
    }

    /** `true` when any locator finds a visible element now; never waits. */
    async isDisplayed(): Promise<boolean> {
        for (const locator of this.options.locators) {
            const visible = await this.bind(locator, 'visible').probe('isDisplayed', async element =>
                (await element.count()) > 0 && (await element.isVisible()));
            if (visible) {
                return true;
            }
        }
        return false;
    }

    /**
     * First locator whose element satisfies `waitType`.
     *
     * @throws AllCandidatesFailedError when none does
     */
    async resolveWorkingLocator(waitType: WaitType = this.options.waitType): Promise<string> {
        const result = await this.attempt('resolveLocator', async () => true, waitType);
        return result.label;
    }

    private async run<T>(action: string, fn: (element: DriverElement) => Promise<T>, waitType: WaitType): Promise<T> {
        const result = await this.attempt(action, fn, waitType);
        return result.value;
    }

    private async attempt<T>(
        action: string,
        fn: (element: DriverElement) => Promise<T>,
        waitType: WaitType
    ): Promise<ChainResult<T>> {
        const candidates = this.options.locators.map(locator => ({
            label: locator,
            run: () => this.bind(locator, waitType).perform(action, fn)
        }));

        const result = await tryInOrderWithResult(candidates, `'${this.options.elementName}' (${action})`);
        this.lastWorkingLocator = result.label;

        if (result.index > 0) {
            ActionLogger.logHealing(this.options.elementName, result.label, result.index, {
                pageName: this.options.pageName,
                action,
                primaryLocator: this.options.locators[0]
            });
        }
        return result;
    }

    private bind(locator: string, waitType: WaitType): ElementBinding {
        return new ElementBinding({
            driver: this.options.driver,
            elementName: this.options.elementName,
            locator,
            pageName: this.options.pageName,
            waitType,
            timeout: this.options.timeout
        });
    }
}
