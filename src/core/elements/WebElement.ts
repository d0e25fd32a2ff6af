// src/core/elements/WebElement.ts

import { ElementBinding } from './ElementBinding';
import { WaitType } from './types/element.types';

/**
 * Capabilities shared by every element wrapper. The resolve / wait / act
 * steps live in {@link ElementBinding}; this class only names the actions.
 */
export abstract class WebElement {
    constructor(protected readonly binding: ElementBinding) {}

    getElementName(): string {
        return this.binding.elementName;
    }

    getLocator(): string {
        return this.binding.locator;
    }

    getWaitType(): WaitType {
        return this.binding.waitType;
    }

    async isDisplayed(): Promise<boolean> {
        return await this.binding.probe('isDisplayed', async element =>
            (await element.count()) > 0 && (await element.isVisible()));
    }

    async exists(): Promise<boolean> {
        return await this.binding.probe('exists', async element => (await element.count()) > 0);
    }

    async waitVisible(): Promise<void> {
        await this.binding.ready('visible');
    }

    async waitClickable(): Promise<void> {
        await this.binding.ready('clickable');
    }

    async waitPresent(): Promise<void> {
        await this.binding.ready('present');
    }

    async waitInvisible(): Promise<void> {
        await this.binding.ready('invisible');
    }

    async getText(): Promise<string> {
        const text = await this.binding.perform('getText', element => element.innerText());
        return text.trim();
    }

    async getAttribute(name: string): Promise<string | null> {
        return await this.binding.perform('getAttribute', element => element.getAttribute(name), {
            details: { attribute: name }
        });
    }

    async scrollIntoView(): Promise<void> {
        await this.binding.perform('scrollIntoView', element => element.scrollIntoView(), { waitType: 'present' });
    }

    async highlight(): Promise<void> {
        await this.binding.perform('highlight', element => element.highlight());
    }

    async hover(): Promise<void> {
        await this.binding.perform('hover', element => element.hover());
    }
}
