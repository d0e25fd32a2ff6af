// src/core/elements/DynamicElement.ts

import { InvalidParameterError } from '../errors/AutomationErrors';
import { LocatorResolver } from '../locators/LocatorResolver';
import { ElementBinding, ElementBindingOptions } from './ElementBinding';

export type DynamicParameter = string | number | null | undefined;

/**
 * Wrapper over a locator template. Every call substitutes its own parameter
 * and binds afresh, so values never leak from one call into the next.
 */
export abstract class DynamicElement {
    constructor(protected readonly template: ElementBindingOptions) {}

    getElementName(): string {
        return this.template.elementName;
    }

    getLocatorTemplate(): string {
        return this.template.locator;
    }

    /**
     * @throws InvalidParameterError for a missing, empty or blank parameter
     */
    resolveLocator(parameter: DynamicParameter): string {
        const value = parameter === null || parameter === undefined ? '' : String(parameter);
        if (value.trim() === '') {
            throw new InvalidParameterError(this.template.elementName, this.template.locator);
        }
        return LocatorResolver.applyParameter(this.template.locator, value);
    }

    protected bind(parameter: DynamicParameter): ElementBinding {
        const locator = this.resolveLocator(parameter);
        const value = String(parameter);
        const fallbacks = (this.template.fallbacks ?? []).map(fallback => LocatorResolver.applyParameter(fallback, value));
        return new ElementBinding({ ...this.template, locator, fallbacks });
    }
}

export class DynamicLabel extends DynamicElement {
    async getText(parameter: DynamicParameter): Promise<string> {
        const text = await this.bind(parameter).perform('getText', element => element.innerText());
        return text.trim();
    }

    async containsText(parameter: DynamicParameter, text: string): Promise<boolean> {
        return (await this.getText(parameter)).includes(text);
    }

    async equalsText(parameter: DynamicParameter, text: string): Promise<boolean> {
        return (await this.getText(parameter)) === text;
    }

    async isDisplayed(parameter: DynamicParameter): Promise<boolean> {
        return await this.bind(parameter).probe('isDisplayed', async element =>
            (await element.count()) > 0 && (await element.isVisible()));
    }

    async waitVisible(parameter: DynamicParameter): Promise<void> {
        await this.bind(parameter).ready('visible');
    }
}

export class DynamicButton extends DynamicElement {
    async click(parameter: DynamicParameter): Promise<void> {
        await this.bind(parameter).perform('click', element => element.click());
    }

    async doubleClick(parameter: DynamicParameter): Promise<void> {
        await this.bind(parameter).perform('doubleClick', element => element.dblclick());
    }

    async rightClick(parameter: DynamicParameter): Promise<void> {
        await this.bind(parameter).perform('rightClick', element => element.click({ button: 'right' }));
    }

    async isEnabled(parameter: DynamicParameter): Promise<boolean> {
        return await this.bind(parameter).probe('isEnabled', element => element.isEnabled());
    }

    async getText(parameter: DynamicParameter): Promise<string> {
        const text = await this.bind(parameter).perform('getText', element => element.innerText());
        return text.trim();
    }

    async waitClickable(parameter: DynamicParameter): Promise<void> {
        await this.bind(parameter).ready('clickable');
    }
}

export class DynamicLink extends DynamicElement {
    async click(parameter: DynamicParameter): Promise<void> {
        await this.bind(parameter).perform('click', element => element.click());
    }

    async getHref(parameter: DynamicParameter): Promise<string> {
        const href = await this.bind(parameter).perform('getHref', element => element.getAttribute('href'));
        return href ?? '';
    }

    async getText(parameter: DynamicParameter): Promise<string> {
        const text = await this.bind(parameter).perform('getText', element => element.innerText());
        return text.trim();
    }

    async isDisplayed(parameter: DynamicParameter): Promise<boolean> {
        return await this.bind(parameter).probe('isDisplayed', async element =>
            (await element.count()) > 0 && (await element.isVisible()));
    }

    async waitVisible(parameter: DynamicParameter): Promise<void> {
        await this.bind(parameter).ready('visible');
    }

    async openInNewTab(parameter: DynamicParameter): Promise<void> {
        await this.bind(parameter).perform('openInNewTab', element => element.openInNewTab());
    }
}
