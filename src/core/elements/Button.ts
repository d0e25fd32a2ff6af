// src/core/elements/Button.ts

import { WebElement } from './WebElement';

export class Button extends WebElement {
    async click(): Promise<void> {
        await this.binding.perform('click', element => element.click());
    }

    async doubleClick(): Promise<void> {
        await this.binding.perform('doubleClick', element => element.dblclick());
    }

    async rightClick(): Promise<void> {
        await this.binding.perform('rightClick', element => element.click({ button: 'right' }));
    }

    /** Dispatches the DOM click event directly; only waits for presence. */
    async clickViaScript(): Promise<void> {
        await this.binding.perform('clickViaScript', element => element.dispatchClick(), { waitType: 'present' });
    }

    async isEnabled(): Promise<boolean> {
        return await this.binding.probe('isEnabled', element => element.isEnabled());
    }

    async isDisabled(): Promise<boolean> {
        return await this.binding.probe('isDisabled', async element => !(await element.isEnabled()));
    }
}
