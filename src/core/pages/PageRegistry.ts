// src/core/pages/PageRegistry.ts

import * as path from 'path';
import { glob } from 'glob';
import { ConfigurationManager } from '../configuration/ConfigurationManager';
import { AutomationError, InvalidPageDefinitionError } from '../errors/AutomationErrors';
import { ActionLogger } from '../logging/ActionLogger';
import { PageDefinitionParser } from './PageDefinitionParser';
import { PageSummary } from './types/page.types';

export interface InvalidPageFile {
    filePath: string;
    problems: string[];
}

/**
 * Index of the page files under a directory, by page name and by tag.
 * Files that fail validation, or repeat a page name already indexed, are
 * reported by `getInvalidFiles()` and left out of the index.
 */
export class PageRegistry {
    private readonly pagesDir: string;
    private pages = new Map<string, PageSummary>();
    private tags = new Map<string, Set<string>>();
    private invalidFiles: InvalidPageFile[] = [];
    private discovered = false;

    constructor(pagesDir?: string) {
        this.pagesDir = path.resolve(pagesDir ?? ConfigurationManager.get('PAGES_DIR', 'pages'));
    }

    getPagesDir(): string {
        return this.pagesDir;
    }

    async discover(): Promise<PageSummary[]> {
        const files = await glob('**/*.json', {
            cwd: this.pagesDir,
            absolute: true,
            nodir: true
        });

        this.clear();

        for (const filePath of files.sort()) {
            try {
                this.register(filePath);
            } catch (error) {
                if (!(error instanceof InvalidPageDefinitionError)) {
                    throw error;
                }
                this.invalidFiles.push({ filePath, problems: error.problems });
                ActionLogger.logWarn(`Skipping invalid page file ${filePath}`, { problems: error.problems });
            }
        }

        this.discovered = true;
        ActionLogger.logPageOperation('page_registry_discover', '*', {
            pagesDir: this.pagesDir,
            pages: this.pages.size,
            invalid: this.invalidFiles.length
        });
        return this.listPages();
    }

    isDiscovered(): boolean {
        return this.discovered;
    }

    has(pageName: string): boolean {
        return this.pages.has(pageName);
    }

    get(pageName: string): PageSummary {
        const summary = this.pages.get(pageName);
        if (!summary) {
            throw new AutomationError(
                `Page '${pageName}' not found in registry. Available pages: ${[...this.pages.keys()].join(', ')}`,
                'PAGE_NOT_REGISTERED',
                { pageName, pagesDir: this.pagesDir }
            );
        }
        return summary;
    }

    getPath(pageName: string): string {
        return this.get(pageName).filePath;
    }

    findByTag(tag: string): PageSummary[] {
        const names = this.tags.get(tag) ?? new Set<string>();
        return this.listPages().filter(page => names.has(page.pageName));
    }

    listPages(): PageSummary[] {
        return [...this.pages.values()];
    }

    getInvalidFiles(): InvalidPageFile[] {
        return [...this.invalidFiles];
    }

    clear(): void {
        this.pages = new Map();
        this.tags = new Map();
        this.invalidFiles = [];
        this.discovered = false;
    }

    private register(filePath: string): void {
        const definition = PageDefinitionParser.parseFile(filePath);
        const existing = this.pages.get(definition.pageName);
        if (existing) {
            throw new InvalidPageDefinitionError(filePath, [
                `pageName '${definition.pageName}' is already defined in ${existing.filePath}`
            ]);
        }

        this.pages.set(definition.pageName, {
            pageName: definition.pageName,
            filePath,
            url: definition.url,
            tags: [...definition.tags],
            elementCount: definition.elements.size
        });

        for (const tag of definition.tags) {
            const names = this.tags.get(tag) ?? new Set<string>();
            names.add(definition.pageName);
            this.tags.set(tag, names);
        }
    }
}
