// src/core/pages/PageDefinitionParser.ts

import * as fs from 'fs';
import { InvalidPageDefinitionError } from '../errors/AutomationErrors';
import { LocatorResolver } from '../locators/LocatorResolver';
import {
    ElementDefinition,
    ElementType,
    defaultWaitType,
    isDynamicType,
    isElementType,
    isWaitType
} from '../elements/types/element.types';
import { PageDefinition } from './types/page.types';

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isNonEmptyString(value: unknown): value is string {
    return typeof value === 'string' && value.trim().length > 0;
}

function isPositiveNumber(value: unknown): value is number {
    return typeof value === 'number' && Number.isFinite(value) && value > 0;
}

function isStringArray(value: unknown): value is string[] {
    return Array.isArray(value) && value.every(item => typeof item === 'string');
}

/**
 * Turns page-file JSON into a frozen {@link PageDefinition}. Every problem in
 * the document is collected before failing, so one error lists them all.
 */
export class PageDefinitionParser {
    private constructor() {}

    static parseFile(filePath: string): PageDefinition {
        if (!fs.existsSync(filePath)) {
            throw new InvalidPageDefinitionError(filePath, ['page file does not exist']);
        }

        let raw: unknown;
        try {
            raw = JSON.parse(fs.readFileSync(filePath, 'utf-8'));
        } catch (error) {
            throw new InvalidPageDefinitionError(filePath, [
                `invalid JSON: ${error instanceof Error ? error.message : String(error)}`
            ]);
        }
        return PageDefinitionParser.parse(raw, filePath);
    }

    static parse(raw: unknown, source: string): PageDefinition {
        const problems: string[] = [];

        if (!isRecord(raw)) {
            throw new InvalidPageDefinitionError(source, ['page definition must be a JSON object']);
        }

        if (!isNonEmptyString(raw['pageName'])) {
            problems.push('pageName is missing or empty');
        }
        if (raw['url'] !== undefined && typeof raw['url'] !== 'string') {
            problems.push('url must be a string');
        }
        if (raw['description'] !== undefined && typeof raw['description'] !== 'string') {
            problems.push('description must be a string');
        }
        if (raw['timeout'] !== undefined && !isPositiveNumber(raw['timeout'])) {
            problems.push('timeout must be a positive number');
        }
        if (raw['tags'] !== undefined && !isStringArray(raw['tags'])) {
            problems.push('tags must be an array of strings');
        }

        const elements = new Map<string, ElementDefinition>();
        const rawElements = raw['elements'];

        if (!Array.isArray(rawElements) || rawElements.length === 0) {
            problems.push('elements must be a non-empty array');
        } else {
            rawElements.forEach((rawElement: unknown, index: number) => {
                const element = PageDefinitionParser.parseElement(rawElement, index, problems);
                if (!element) return;
                if (elements.has(element.name)) {
                    problems.push(`elements[${index}]: duplicate element name '${element.name}'`);
                    return;
                }
                elements.set(element.name, element);
            });
        }

        if (problems.length > 0) {
            throw new InvalidPageDefinitionError(source, problems);
        }

        const pageName = raw['pageName'];
        const url = raw['url'];
        const description = raw['description'];
        const timeout = raw['timeout'];
        const tags = raw['tags'];

        return Object.freeze({
            pageName: isNonEmptyString(pageName) ? pageName.trim() : '',
            url: typeof url === 'string' ? url : '',
            description: typeof description === 'string' ? description : '',
            timeout: isPositiveNumber(timeout) ? timeout : undefined,
            tags: Object.freeze(isStringArray(tags) ? [...tags] : []),
            elements
        });
    }

    /**
     * Applies the page-file rules to a definition built in code, which never
     * went through {@link parse}.
     */
    static validate(definition: PageDefinition, source: string): PageDefinition {
        const problems: string[] = [];

        if (!isNonEmptyString(definition.pageName)) {
            problems.push('pageName is missing or empty');
        }
        if (definition.timeout !== undefined && !isPositiveNumber(definition.timeout)) {
            problems.push('timeout must be a positive number');
        }
        if (definition.elements.size === 0) {
            problems.push('elements must not be empty');
        }

        for (const [key, element] of definition.elements) {
            const label = `element '${key}'`;
            if (element.name !== key) {
                problems.push(`${label}: name '${element.name}' does not match its key`);
            }
            if (!isElementType(element.type)) {
                problems.push(`${label}: unknown element type '${String(element.type)}'`);
            }
            if (!isNonEmptyString(element.locator)) {
                problems.push(`${label}: locator is missing or empty`);
            } else if (isElementType(element.type)) {
                PageDefinitionParser.checkPlaceholders(element.type, element.locator, label, problems);
            }
            if (element.timeout !== undefined && !isPositiveNumber(element.timeout)) {
                problems.push(`${label}: timeout must be a positive number`);
            }
            if (!isWaitType(element.waitType)) {
                problems.push(`${label}: unknown wait type '${String(element.waitType)}'`);
            }
            if (!element.fallbacks.every(isNonEmptyString)) {
                problems.push(`${label}: fallbacks must be an array of non-empty locator strings`);
            }
        }

        if (problems.length > 0) {
            throw new InvalidPageDefinitionError(source, problems);
        }
        return definition;
    }

    private static checkPlaceholders(type: ElementType, locator: string, label: string, problems: string[]): void {
        const placeholders = LocatorResolver.countPlaceholders(locator);
        if (isDynamicType(type) && placeholders !== 1) {
            problems.push(`${label}: ${type} locator must contain exactly one placeholder, found ${placeholders}`);
        }
        if (!isDynamicType(type) && placeholders > 0) {
            problems.push(`${label}: ${type} locator must not contain a placeholder`);
        }
    }

    private static parseElement(raw: unknown, index: number, problems: string[]): ElementDefinition | null {
        const at = `elements[${index}]`;

        if (!isRecord(raw)) {
            problems.push(`${at}: element must be a JSON object`);
            return null;
        }

        const { name, locator, type, description, timeout, required, tags, waitType, fallbacks } = raw;
        const label = isNonEmptyString(name) ? `${at} '${name}'` : at;
        const before = problems.length;

        if (!isNonEmptyString(name)) {
            problems.push(`${at}: name is missing or empty`);
        }
        if (!isNonEmptyString(locator)) {
            problems.push(`${label}: locator is missing or empty`);
        }
        if (!isElementType(type)) {
            problems.push(`${label}: unknown element type '${String(type)}'`);
        }
        if (isElementType(type) && isNonEmptyString(locator)) {
            PageDefinitionParser.checkPlaceholders(type, locator, label, problems);
        }
        if (description !== undefined && typeof description !== 'string') {
            problems.push(`${label}: description must be a string`);
        }
        if (timeout !== undefined && !isPositiveNumber(timeout)) {
            problems.push(`${label}: timeout must be a positive number`);
        }
        if (required !== undefined && typeof required !== 'boolean') {
            problems.push(`${label}: required must be a boolean`);
        }
        if (tags !== undefined && !isStringArray(tags)) {
            problems.push(`${label}: tags must be an array of strings`);
        }
        if (waitType !== undefined && !isWaitType(waitType)) {
            problems.push(`${label}: unknown wait type '${String(waitType)}'`);
        }
        if (fallbacks !== undefined && !(isStringArray(fallbacks) && fallbacks.every(isNonEmptyString))) {
            problems.push(`${label}: fallbacks must be an array of non-empty locator strings`);
        }

        if (problems.length > before || !isNonEmptyString(name) || !isNonEmptyString(locator) || !isElementType(type)) {
            return null;
        }

        return Object.freeze({
            name: name.trim(),
            locator,
            type,
            description: typeof description === 'string' ? description : '',
            timeout: isPositiveNumber(timeout) ? timeout : undefined,
            required: typeof required === 'boolean' ? required : true,
            tags: Object.freeze(isStringArray(tags) ? [...tags] : []),
            waitType: isWaitType(waitType) ? waitType : defaultWaitType(type),
            fallbacks: Object.freeze(isStringArray(fallbacks) ? [...fallbacks] : [])
        });
    }
}
