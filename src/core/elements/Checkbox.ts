// src/core/elements/Checkbox.ts

import { StateMismatchError } from '../errors/AutomationErrors';
import { WebElement } from './WebElement';

export class Checkbox extends WebElement {
    async check(): Promise<void> {
        await this.setChecked(true);
    }

    async uncheck(): Promise<void> {
        await this.setChecked(false);
    }

    /** Clicks only when the current state differs. */
    async setChecked(checked: boolean): Promise<void> {
        await this.binding.perform(checked ? 'check' : 'uncheck', async element => {
            if ((await element.isChecked()) !== checked) {
                await element.click();
            }
        });
    }

    async isChecked(): Promise<boolean> {
        return await this.binding.perform('isChecked', element => element.isChecked(), { waitType: 'present' });
    }

    async toggle(): Promise<void> {
        await this.binding.perform('toggle', element => element.click());
    }

    async isEnabled(): Promise<boolean> {
        return await this.binding.probe('isEnabled', element => element.isEnabled());
    }

    async verifyState(expected: boolean): Promise<void> {
        const actual = await this.isChecked();
        if (actual !== expected) {
            throw new StateMismatchError(this.getElementName(), expected, actual);
        }
    }
}
