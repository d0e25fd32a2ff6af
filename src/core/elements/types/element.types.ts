// src/core/elements/types/element.types.ts

export const ELEMENT_TYPES = [
    'Button',
    'Textbox',
    'Combobox',
    'Checkbox',
    'Label',
    'Collection',
    'DynamicLabel',
    'DynamicButton',
    'DynamicLink',
    'ListElement'
] as const;

export type ElementType = typeof ELEMENT_TYPES[number];

export type DynamicElementType = Extract<ElementType, 'DynamicLabel' | 'DynamicButton' | 'DynamicLink'>;

export const WAIT_TYPES = ['visible', 'clickable', 'present', 'invisible'] as const;

export type WaitType = typeof WAIT_TYPES[number];

export interface ElementDefinition {
    readonly name: string;
    readonly locator: string;
    readonly type: ElementType;
    readonly description: string;
    readonly timeout?: number | undefined;
    readonly required: boolean;
    readonly tags: readonly string[];
    readonly waitType: WaitType;
    readonly fallbacks: readonly string[];
}

/** Where an element lives, for log lines and error messages. */
export interface ElementScope {
    pageName: string;
    pageTimeout?: number | undefined;
}

export function isElementType(value: unknown): value is ElementType {
    return typeof value === 'string' && ELEMENT_TYPES.some(type => type === value);
}

export function isWaitType(value: unknown): value is WaitType {
    return typeof value === 'string' && WAIT_TYPES.some(type => type === value);
}

export function isDynamicType(type: ElementType): type is DynamicElementType {
    return type === 'DynamicLabel' || type === 'DynamicButton' || type === 'DynamicLink';
}

export function defaultWaitType(type: ElementType): WaitType {
    switch (type) {
        case 'Button':
        case 'Checkbox':
        case 'Combobox':
        case 'DynamicButton':
        case 'DynamicLink':
            return 'clickable';
        case 'Collection':
        case 'ListElement':
            return 'present';
        case 'Textbox':
        case 'Label':
        case 'DynamicLabel':
            return 'visible';
    }
}
