// src/core/pages/DynamicPage.ts

import { BrowserDriver } from '../browser/types/driver.types';
import { ConfigurationManager } from '../configuration/ConfigurationManager';
import { ElementNotFoundError } from '../errors/AutomationErrors';
import { Button } from '../elements/Button';
import { Checkbox } from '../elements/Checkbox';
import { Collection, ListElement } from '../elements/Collection';
import { Combobox } from '../elements/Combobox';
import { DynamicButton, DynamicLabel, DynamicLink } from '../elements/DynamicElement';
import { ElementFactory, ElementWrapperMap } from '../elements/ElementFactory';
import { Label } from '../elements/Label';
import { Textbox } from '../elements/Textbox';
import { ELEMENT_TYPES, ElementDefinition, ElementType } from '../elements/types/element.types';
import { ResilientElement } from '../healing/ResilientElement';
import { ActionLogger } from '../logging/ActionLogger';
import { PageDefinition } from './types/page.types';

type ElementCacheStore = { [K in ElementType]: Map<string, ElementWrapperMap[K]> };

function createElementCache(): ElementCacheStore {
    return {
        Button: new Map(),
        Textbox: new Map(),
        Combobox: new Map(),
        Checkbox: new Map(),
        Label: new Map(),
        Collection: new Map(),
        ListElement: new Map(),
        DynamicLabel: new Map(),
        DynamicButton: new Map(),
        DynamicLink: new Map()
    };
}

export interface DynamicPageOptions {
    /** Joined with relative page URLs by `open()`. Defaults to `BASE_URL`. */
    baseUrl?: string;
}

/**
 * A loaded page definition bound to one driver. Wrappers are built on first
 * access and reused per (name, type) until the element cache is cleared.
 */
export class DynamicPage {
    private elementCache: ElementCacheStore = createElementCache();
    private readonly resilientCache = new Map<string, ResilientElement>();

    constructor(
        private readonly driver: BrowserDriver,
        private readonly definition: PageDefinition,
        private readonly options: DynamicPageOptions = {}
    ) {}

    getPageName(): string {
        return this.definition.pageName;
    }

    getDefinition(): PageDefinition {
        return this.definition;
    }

    getUrl(): string {
        const url = this.definition.url;
        if (!url || /^[a-z][a-z\d+.-]*:/i.test(url)) {
            return url;
        }

        const baseUrl = this.options.baseUrl ?? ConfigurationManager.get('BASE_URL');
        if (!baseUrl) {
            return url;
        }
        return `${baseUrl.replace(/\/+$/, '')}/${url.replace(/^\/+/, '')}`;
    }

    async open(): Promise<void> {
        const url = this.getUrl();
        if (!url) {
            throw new Error(`Page '${this.definition.pageName}' has no URL to open`);
        }
        await this.driver.navigate(url);
        ActionLogger.logPageOperation('open', this.definition.pageName, { url });
    }

    hasElement(name: string): boolean {
        return this.definition.elements.has(name);
    }

    getElementNames(): string[] {
        return [...this.definition.elements.keys()];
    }

    getElementDefinition(name: string): ElementDefinition {
        const definition = this.definition.elements.get(name);
        if (!definition) {
            throw new ElementNotFoundError(this.definition.pageName, name, this.getElementNames());
        }
        return definition;
    }

    element<K extends ElementType>(name: string, type: K): ElementWrapperMap[K] {
        const definition = this.getElementDefinition(name);
        const cache = this.elementCache[type];

        const cached = cache.get(name);
        if (cached !== undefined) {
            return cached;
        }

        const wrapper = ElementFactory.create(type, this.driver, definition, {
            pageName: this.definition.pageName,
            pageTimeout: this.definition.timeout
        });
        cache.set(name, wrapper);

        ActionLogger.logPageOperation('resolveElement', this.definition.pageName, {
            elementName: name,
            type,
            locator: definition.locator
        });
        return wrapper;
    }

    button(name: string): Button {
        return this.element(name, 'Button');
    }

    textbox(name: string): Textbox {
        return this.element(name, 'Textbox');
    }

    combobox(name: string): Combobox {
        return this.element(name, 'Combobox');
    }

    checkbox(name: string): Checkbox {
        return this.element(name, 'Checkbox');
    }

    label(name: string): Label {
        return this.element(name, 'Label');
    }

    collection(name: string): Collection {
        return this.element(name, 'Collection');
    }

    listElement(name: string): ListElement {
        return this.element(name, 'ListElement');
    }

    dynamicLabel(name: string): DynamicLabel {
        return this.element(name, 'DynamicLabel');
    }

    dynamicButton(name: string): DynamicButton {
        return this.element(name, 'DynamicButton');
    }

    dynamicLink(name: string): DynamicLink {
        return this.element(name, 'DynamicLink');
    }

    /**
     * Fallback-aware handle: the declared locator first, then `candidates`
     * when given, otherwise the element's own `fallbacks`.
     */
    resilient(name: string, candidates?: readonly string[]): ResilientElement {
        const definition = this.getElementDefinition(name);
        const fallbacks = candidates ?? definition.fallbacks;
        const locators = [definition.locator, ...fallbacks.filter(locator => locator !== definition.locator)];
        const key = [name, ...locators].join('\u0000');

        const cached = this.resilientCache.get(key);
        if (cached) {
            return cached;
        }

        const element = new ResilientElement({
            driver: this.driver,
            elementName: name,
            pageName: this.definition.pageName,
            locators,
            waitType: definition.waitType,
            timeout: definition.timeout ?? this.definition.timeout
        });
        this.resilientCache.set(key, element);
        return element;
    }

    getCacheSize(): number {
        return ELEMENT_TYPES.reduce((total, type) => total + this.elementCache[type].size, 0)
            + this.resilientCache.size;
    }

    clearElementCache(): void {
        const cleared = this.getCacheSize();
        this.elementCache = createElementCache();
        this.resilientCache.clear();
        ActionLogger.logCacheOperation('clearElements', { pageName: this.definition.pageName, cleared });
    }
}
