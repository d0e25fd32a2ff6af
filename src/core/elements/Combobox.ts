// src/core/elements/Combobox.ts

import { WebElement } from './WebElement';

export class Combobox extends WebElement {
    async selectByText(text: string): Promise<void> {
        await this.binding.perform('selectByText', element => element.selectOption({ label: text }), {
            details: { text }
        });
    }

    async selectByValue(value: string): Promise<void> {
        await this.binding.perform('selectByValue', element => element.selectOption({ value }), {
            details: { value }
        });
    }

    async selectByIndex(index: number): Promise<void> {
        await this.binding.perform('selectByIndex', element => element.selectOption({ index }), {
            details: { index }
        });
    }

    /** Visible text of the selected option, or an empty string when nothing is selected. */
    async getSelectedOption(): Promise<string> {
        const selected = await this.binding.perform('getSelectedOption', element => element.selectedOption());
        return selected?.label.trim() ?? '';
    }

    async getSelectedValue(): Promise<string> {
        const selected = await this.binding.perform('getSelectedValue', element => element.selectedOption());
        return selected?.value ?? '';
    }

    async getAllOptions(): Promise<string[]> {
        return await this.binding.perform('getAllOptions', element => element.optionTexts());
    }

    async hasOption(text: string): Promise<boolean> {
        return await this.binding.probe('hasOption', async element => {
            const options = await element.optionTexts();
            return options.some(option => option.trim() === text);
        });
    }
}
