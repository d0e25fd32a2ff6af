// src/core/elements/Label.ts

import { WebElement } from './WebElement';

export class Label extends WebElement {
    async containsText(text: string): Promise<boolean> {
        return (await this.getText()).includes(text);
    }

    async equalsText(text: string): Promise<boolean> {
        return (await this.getText()) === text;
    }

    async matchesPattern(pattern: RegExp | string): Promise<boolean> {
        const regex = typeof pattern === 'string' ? new RegExp(pattern) : pattern;
        return regex.test(await this.getText());
    }

    async isClickable(): Promise<boolean> {
        return await this.binding.probe('isClickable', async element =>
            (await element.count()) > 0 && (await element.isVisible()) && (await element.isEnabled()));
    }
}
