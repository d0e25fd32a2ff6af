// src/core/pages/types/page.types.ts

import { ElementDefinition } from '../../elements/types/element.types';

/** Page file shape as written on disk, before validation. */
export interface RawElementDefinition {
    name?: unknown;
    locator?: unknown;
    type?: unknown;
    description?: unknown;
    timeout?: unknown;
    required?: unknown;
    tags?: unknown;
    waitType?: unknown;
    fallbacks?: unknown;
}

export interface RawPageDefinition {
    pageName?: unknown;
    url?: unknown;
    description?: unknown;
    timeout?: unknown;
    tags?: unknown;
    elements?: unknown;
}

export interface PageDefinition {
    readonly pageName: string;
    readonly url: string;
    readonly description: string;
    readonly timeout?: number | undefined;
    readonly tags: readonly string[];
    /** Keyed by element name, in declaration order. */
    readonly elements: ReadonlyMap<string, ElementDefinition>;
}

export type PageSource = string | PageDefinition;

export interface PageSummary {
    pageName: string;
    filePath: string;
    url: string;
    tags: string[];
    elementCount: number;
}
