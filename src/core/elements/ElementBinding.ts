// src/core/elements/ElementBinding.ts

import { BrowserDriver, DriverElement } from '../browser/types/driver.types';
import { ConfigurationManager, DEFAULT_ELEMENT_TIMEOUT } from '../configuration/ConfigurationManager';
import {
    ActionFailedError,
    AutomationError,
    ElementNotReadyError
} from '../errors/AutomationErrors';
import { tryInOrderWithResult } from '../healing/FallbackChain';
import { LocatorResolver, NativeSelector } from '../locators/LocatorResolver';
import { ActionLogger } from '../logging/ActionLogger';
import { LogMetadata } from '../utils/Logger';
import { WaitType } from './types/element.types';

export interface ElementBindingOptions {
    driver: BrowserDriver;
    elementName: string;
    /** Locator string with any placeholder already substituted. */
    locator: string;
    pageName: string;
    waitType: WaitType;
    timeout?: number | undefined;
    /** Tried in order when the primary locator never becomes ready. */
    fallbacks?: readonly string[] | undefined;
    /** Binds to the n-th match instead of the first. */
    index?: number | undefined;
}

/**
 * Ties one locator to one driver and carries the resolve / wait / act / log
 * steps every wrapper needs.
 */
export class ElementBinding {
    readonly selector: NativeSelector;
    private readonly timeout: number;

    constructor(private readonly options: ElementBindingOptions) {
        this.selector = LocatorResolver.resolve(options.locator);
        this.timeout = options.timeout ?? ConfigurationManager.getNumber('ELEMENT_TIMEOUT', DEFAULT_ELEMENT_TIMEOUT);
    }

    get elementName(): string {
        return this.options.elementName;
    }

    get locator(): string {
        return this.options.locator;
    }

    get pageName(): string {
        return this.options.pageName;
    }

    get waitType(): WaitType {
        return this.options.waitType;
    }

    get timeoutMs(): number {
        return this.timeout;
    }

    /** Label used in logs and errors, e.g. `search[2]` for an indexed binding. */
    get displayName(): string {
        return this.options.index === undefined
            ? this.options.elementName
            : `${this.options.elementName}[${this.options.index}]`;
    }

    handle(): DriverElement {
        const element = this.options.driver.find(this.selector);
        return this.options.index === undefined ? element : element.nth(this.options.index);
    }

    /** A binding on the n-th match of the same locator. */
    at(index: number, waitType: WaitType = 'visible'): ElementBinding {
        return new ElementBinding({ ...this.options, index, waitType, timeout: this.timeout });
    }

    get fallbacks(): readonly string[] {
        return this.options.fallbacks ?? [];
    }

    /**
     * Waits on the driver for `waitType`; throws `ElementNotReadyError` once
     * the timeout elapses. With fallbacks, each locator gets the full timeout
     * in turn and `AllCandidatesFailedError` reports every one that failed.
     */
    async ready(waitType: WaitType = this.options.waitType): Promise<DriverElement> {
        if (this.fallbacks.length === 0) {
            return await this.readyOnPrimary(waitType);
        }

        const chain = [this, ...this.fallbacks.map(locator => this.withLocator(locator))];
        const result = await tryInOrderWithResult(
            chain.map(binding => ({ label: binding.locator, run: () => binding.readyOnPrimary(waitType) })),
            `'${this.displayName}' (${waitType})`
        );

        if (result.index > 0) {
            ActionLogger.logHealing(this.displayName, result.label, result.index, {
                pageName: this.options.pageName,
                primaryLocator: this.options.locator
            });
        }
        return result.value;
    }

    private async readyOnPrimary(waitType: WaitType): Promise<DriverElement> {
        const element = this.handle();
        const met = await element.waitFor(waitType, this.timeout);

        if (!met) {
            const error = new ElementNotReadyError(this.displayName, this.locator, waitType, this.timeout);
            ActionLogger.logError(`Element not ready: ${this.displayName}`, error, this.context());
            throw error;
        }
        return element;
    }

    /**
     * Waits (unless `bypassWait`), runs `action` and logs it. Driver failures
     * after a successful wait surface as `ActionFailedError`.
     */
    async perform<T>(
        action: string,
        fn: (element: DriverElement) => Promise<T>,
        options: { waitType?: WaitType; bypassWait?: boolean; details?: LogMetadata } = {}
    ): Promise<T> {
        const element = options.bypassWait ? await this.firstPresent() : await this.ready(options.waitType);
        const startTime = Date.now();

        try {
            const result = await fn(element);
            ActionLogger.logElementAction(action, this.displayName, {
                ...this.context(),
                ...options.details,
                duration: Date.now() - startTime
            });
            return result;
        } catch (error) {
            if (error instanceof AutomationError) {
                throw error;
            }
            const failure = new ActionFailedError(this.displayName, action, this.locator, error);
            ActionLogger.logError(`Action '${action}' failed on ${this.displayName}`, failure, this.context());
            throw failure;
        }
    }

    /**
     * Non-asserting check: `false` on any failure, logged as a warning.
     * Fallback locators are checked, without waiting, when the primary
     * answers `false`.
     */
    async probe(check: string, fn: (element: DriverElement) => Promise<boolean>): Promise<boolean> {
        if (await this.probeOnPrimary(check, fn)) {
            return true;
        }
        for (const locator of this.fallbacks) {
            if (await this.withLocator(locator).probeOnPrimary(check, fn)) {
                return true;
            }
        }
        return false;
    }

    /** Handle on the first locator that matches anything now, else the primary. */
    private async firstPresent(): Promise<DriverElement> {
        const primary = this.handle();
        if (this.fallbacks.length === 0 || (await primary.count()) > 0) {
            return primary;
        }
        for (const locator of this.fallbacks) {
            const fallback = this.withLocator(locator).handle();
            if ((await fallback.count()) > 0) {
                return fallback;
            }
        }
        return primary;
    }

    private withLocator(locator: string): ElementBinding {
        return new ElementBinding({ ...this.options, locator, fallbacks: [], timeout: this.timeout });
    }

    private async probeOnPrimary(check: string, fn: (element: DriverElement) => Promise<boolean>): Promise<boolean> {
        try {
            return await fn(this.handle());
        } catch (error) {
            ActionLogger.logWarn(`Check '${check}' failed on ${this.displayName}; treating as false`, {
                ...this.context(),
                error: error instanceof Error ? error.message : String(error)
            });
            return false;
        }
    }

    private context(): LogMetadata {
        return {
            pageName: this.options.pageName,
            locator: this.options.locator
        };
    }
}
