// src/core/elements/Collection.ts

import { IndexOutOfRangeError } from '../errors/AutomationErrors';
import { ElementBinding } from './ElementBinding';
import { Label } from './Label';
import { WebElement } from './WebElement';

/** One match of a collection locator, bound by position. */
export class CollectionItem extends Label {
    constructor(binding: ElementBinding, private readonly index: number) {
        super(binding);
    }

    getIndex(): number {
        return this.index;
    }

    async click(): Promise<void> {
        await this.binding.perform('click', element => element.click(), { waitType: 'clickable' });
    }
}

export class Collection extends WebElement {
    /** Current match count; never waits, so an empty collection reads as 0. */
    async size(): Promise<number> {
        return await this.binding.perform('size', element => element.count(), { bypassWait: true });
    }

    async isEmpty(): Promise<boolean> {
        return (await this.size()) === 0;
    }

    async getElementAt(index: number): Promise<CollectionItem> {
        const size = await this.size();
        if (!Number.isInteger(index) || index < 0 || index >= size) {
            throw new IndexOutOfRangeError(this.getElementName(), index, size);
        }
        return new CollectionItem(this.binding.at(index), index);
    }

    async getFirst(): Promise<CollectionItem> {
        return await this.getElementAt(0);
    }

    async getLast(): Promise<CollectionItem> {
        return await this.getElementAt((await this.size()) - 1);
    }

    async getAllTexts(): Promise<string[]> {
        const texts = await this.binding.perform('getAllTexts', element => element.allInnerTexts(), { bypassWait: true });
        return texts.map(text => text.trim());
    }

    async clickElementAt(index: number): Promise<void> {
        const item = await this.getElementAt(index);
        await item.click();
    }

    async clickFirst(): Promise<void> {
        await this.clickElementAt(0);
    }

    async clickLast(): Promise<void> {
        await (await this.getLast()).click();
    }
}

/** Same behaviour as {@link Collection}; kept as its own type for page files that declare lists. */
export class ListElement extends Collection {}
