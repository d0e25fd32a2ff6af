// src/core/pages/DynamicPageFactory.ts

import * as fs from 'fs';
import * as path from 'path';
import { BrowserDriver } from '../browser/types/driver.types';
import { ConfigurationManager } from '../configuration/ConfigurationManager';
import { InvalidPageDefinitionError } from '../errors/AutomationErrors';
import { ActionLogger } from '../logging/ActionLogger';
import { DynamicPage } from './DynamicPage';
import { PageCache } from './PageCache';
import { PageDefinitionParser } from './PageDefinitionParser';
import { PageRegistry } from './PageRegistry';
import { PageDefinition, RawPageDefinition } from './types/page.types';

export type LoadableSource = string | PageDefinition | RawPageDefinition;

export interface PageFactoryOptions {
    cache?: PageCache<DynamicPage>;
    /** Directory searched for bare page names. Defaults to `PAGES_DIR`. */
    pagesDir?: string;
    /** Consulted first for string sources that name a registered page. */
    registry?: PageRegistry;
    baseUrl?: string;
}

function isPageDefinition(source: PageDefinition | RawPageDefinition): source is PageDefinition {
    return source.elements instanceof Map;
}

/**
 * Loads page definitions into {@link DynamicPage}s bound to one driver,
 * caching them by source id: the resolved file path, or
 * `definition:<pageName>#<n>` for in-memory definitions, where `n` is
 * assigned per definition object.
 */
export class DynamicPageFactory {
    private readonly cache: PageCache<DynamicPage>;
    private readonly pagesDir: string;
    private readonly inlineIds = new WeakMap<PageDefinition | RawPageDefinition, string>();
    private inlineCount = 0;

    constructor(private readonly driver: BrowserDriver, private readonly options: PageFactoryOptions = {}) {
        this.cache = options.cache ?? new PageCache<DynamicPage>();
        this.pagesDir = path.resolve(options.pagesDir ?? ConfigurationManager.get('PAGES_DIR', 'pages'));
    }

    loadPage(source: LoadableSource): DynamicPage {
        if (typeof source === 'string') {
            const filePath = this.resolvePath(source);
            return this.fromCacheOr(filePath, () => PageDefinitionParser.parseFile(filePath));
        }

        const definition = this.toDefinition(source);
        return this.fromCacheOr(this.inlineId(source, definition.pageName), () => definition);
    }

    preloadPage(source: LoadableSource): void {
        this.loadPage(source);
    }

    /** `true` when the source parses and passes validation; never throws for invalid pages. */
    validatePageDefinition(source: LoadableSource): boolean {
        try {
            if (typeof source === 'string') {
                PageDefinitionParser.parseFile(this.resolvePath(source));
            } else {
                this.toDefinition(source);
            }
            return true;
        } catch (error) {
            if (error instanceof InvalidPageDefinitionError) {
                ActionLogger.logWarn('Page definition failed validation', {
                    source: error.source,
                    problems: error.problems
                });
                return false;
            }
            throw error;
        }
    }

    getSourceId(source: LoadableSource): string {
        if (typeof source === 'string') {
            return this.resolvePath(source);
        }
        return this.inlineId(source, this.toDefinition(source).pageName);
    }

    isCached(source: LoadableSource): boolean {
        return this.cache.has(this.getSourceId(source));
    }

    removeFromCache(source: LoadableSource): boolean {
        const key = this.getSourceId(source);
        const page = this.cache.get(key);
        page?.clearElementCache();
        return this.cache.delete(key);
    }

    getCacheSize(): number {
        return this.cache.size;
    }

    getCachedPageNames(): string[] {
        return this.cache.values().map(page => page.getPageName());
    }

    /** Idempotent; also drops every cached page's element wrappers. */
    clearCache(): void {
        for (const page of this.cache.values()) {
            page.clearElementCache();
        }
        this.cache.clear();
    }

    private fromCacheOr(key: string, parse: () => PageDefinition): DynamicPage {
        const cached = this.cache.get(key);
        if (cached) {
            return cached;
        }

        const definition = parse();
        const page = new DynamicPage(this.driver, definition, this.pageOptions());
        this.cache.set(key, page);

        ActionLogger.logPageOperation('loadPage', definition.pageName, {
            source: key,
            elements: definition.elements.size
        });
        return page;
    }

    private inlineId(source: PageDefinition | RawPageDefinition, pageName: string): string {
        const known = this.inlineIds.get(source);
        if (known !== undefined) {
            return known;
        }
        this.inlineCount += 1;
        const id = `definition:${pageName}#${this.inlineCount}`;
        this.inlineIds.set(source, id);
        return id;
    }

    private pageOptions(): { baseUrl?: string } {
        return this.options.baseUrl === undefined ? {} : { baseUrl: this.options.baseUrl };
    }

    private toDefinition(source: PageDefinition | RawPageDefinition): PageDefinition {
        if (!isPageDefinition(source)) {
            return PageDefinitionParser.parse(source, 'inline definition');
        }

        return PageDefinitionParser.validate(source, `definition:${source.pageName}`);
    }

    private resolvePath(source: string): string {
        if (this.options.registry?.has(source)) {
            return this.options.registry.getPath(source);
        }

        const fileName = source.endsWith('.json') ? source : `${source}.json`;
        if (path.isAbsolute(fileName)) {
            return fileName;
        }

        const direct = path.resolve(fileName);
        return fs.existsSync(direct) ? direct : path.resolve(this.pagesDir, fileName);
    }
}
