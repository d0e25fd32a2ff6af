// src/core/elements/ElementFactory.ts

import { BrowserDriver } from '../browser/types/driver.types';
import { Button } from './Button';
import { Checkbox } from './Checkbox';
import { Collection, ListElement } from './Collection';
import { Combobox } from './Combobox';
import { DynamicButton, DynamicLabel, DynamicLink } from './DynamicElement';
import { ElementBinding, ElementBindingOptions } from './ElementBinding';
import { Label } from './Label';
import { Textbox } from './Textbox';
import { ElementDefinition, ElementScope, ElementType } from './types/element.types';

export interface ElementWrapperMap {
    Button: Button;
    Textbox: Textbox;
    Combobox: Combobox;
    Checkbox: Checkbox;
    Label: Label;
    Collection: Collection;
    ListElement: ListElement;
    DynamicLabel: DynamicLabel;
    DynamicButton: DynamicButton;
    DynamicLink: DynamicLink;
}

export type ElementWrapper = ElementWrapperMap[ElementType];

type ElementBuilders = { [K in ElementType]: (options: ElementBindingOptions) => ElementWrapperMap[K] };

const BUILDERS: ElementBuilders = {
    Button: options => new Button(new ElementBinding(options)),
    Textbox: options => new Textbox(new ElementBinding(options)),
    Combobox: options => new Combobox(new ElementBinding(options)),
    Checkbox: options => new Checkbox(new ElementBinding(options)),
    Label: options => new Label(new ElementBinding(options)),
    Collection: options => new Collection(new ElementBinding(options)),
    ListElement: options => new ListElement(new ElementBinding(options)),
    DynamicLabel: options => new DynamicLabel(options),
    DynamicButton: options => new DynamicButton(options),
    DynamicLink: options => new DynamicLink(options)
};

export class ElementFactory {
    private constructor() {}

    /**
     * Builds the wrapper for `type` over the definition's locator. The wait
     * type and timeout come from the definition, falling back to the page.
     */
    static create<K extends ElementType>(
        type: K,
        driver: BrowserDriver,
        definition: ElementDefinition,
        scope: ElementScope
    ): ElementWrapperMap[K] {
        return BUILDERS[type](ElementFactory.bindingOptions(driver, definition, scope));
    }

    static bindingOptions(driver: BrowserDriver, definition: ElementDefinition, scope: ElementScope): ElementBindingOptions {
        return {
            driver,
            elementName: definition.name,
            locator: definition.locator,
            pageName: scope.pageName,
            waitType: definition.waitType,
            timeout: definition.timeout ?? scope.pageTimeout,
            fallbacks: definition.fallbacks
        };
    }
}
