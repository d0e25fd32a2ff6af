// src/core/elements/Textbox.ts

import { WebElement } from './WebElement';

export class Textbox extends WebElement {
    /** Sends keystrokes after whatever the field already holds. */
    async type(text: string): Promise<void> {
        await this.binding.perform('type', element => element.typeText(text), {
            details: { characters: text.length }
        });
    }

    /** Replaces the field's value in one step. */
    async setValue(value: string): Promise<void> {
        await this.binding.perform('setValue', element => element.fill(value), {
            details: { characters: value.length }
        });
    }

    async clear(): Promise<void> {
        await this.binding.perform('clear', element => element.clear());
    }

    async clearAndType(text: string): Promise<void> {
        await this.binding.perform('clearAndType', async element => {
            await element.clear();
            await element.typeText(text);
        }, { details: { characters: text.length } });
    }

    async getValue(): Promise<string> {
        return await this.binding.perform('getValue', element => element.inputValue());
    }

    async getPlaceholder(): Promise<string> {
        const placeholder = await this.binding.perform('getPlaceholder', element => element.getAttribute('placeholder'));
        return placeholder ?? '';
    }

    async isEmpty(): Promise<boolean> {
        return (await this.getValue()).length === 0;
    }

    async isReadonly(): Promise<boolean> {
        const readonly = await this.binding.perform('isReadonly', element => element.getAttribute('readonly'));
        return readonly !== null;
    }

    async pressEnter(): Promise<void> {
        await this.binding.perform('pressEnter', element => element.press('Enter'));
    }

    async pressTab(): Promise<void> {
        await this.binding.perform('pressTab', element => element.press('Tab'));
    }

    async pressEscape(): Promise<void> {
        await this.binding.perform('pressEscape', element => element.press('Escape'));
    }

    async focus(): Promise<void> {
        await this.binding.perform('focus', element => element.focus());
    }
}
