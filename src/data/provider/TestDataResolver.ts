// src/data/provider/TestDataResolver.ts

import * as fs from 'fs';
import * as path from 'path';
import { ConfigurationManager } from '../../core/configuration/ConfigurationManager';
import { AutomationError } from '../../core/errors/AutomationErrors';
import { ActionLogger } from '../../core/logging/ActionLogger';
import { logger } from '../../core/utils/Logger';
import { DateTokenResolver } from '../transformers/DateTokenResolver';
import { JsonObject, JsonValue, TestCaseData, TestDataDocument } from '../types/data.types';

function isJsonObject(value: unknown): value is JsonObject {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export interface TestDataResolverOptions {
    /** Directory searched for relative file names not found from the working directory. Defaults to `TEST_DATA_DIR`. */
    dataDir?: string;
    dateResolver?: DateTokenResolver;
}

/**
 * Loads JSON test data keyed by test case id. Every string leaf, however
 * deeply nested in objects or arrays, goes through the date-token resolver
 * once at load time; the resolved document is cached per file.
 */
export class TestDataResolver {
    private readonly cache = new Map<string, TestDataDocument>();
    private readonly dataDir: string;
    private readonly dateResolver: DateTokenResolver;

    constructor(options: TestDataResolverOptions = {}) {
        this.dataDir = path.resolve(options.dataDir ?? ConfigurationManager.get('TEST_DATA_DIR', 'testdata'));
        this.dateResolver = options.dateResolver ?? new DateTokenResolver();
    }

    loadTestData(file: string): JsonObject {
        const filePath = this.resolvePath(file);
        const cached = this.cache.get(filePath);
        if (cached) {
            ActionLogger.logCacheOperation('hit', { cache: 'test-data', key: filePath });
            return cached.data;
        }

        if (!fs.existsSync(filePath)) {
            throw new AutomationError(`Test data file not found: ${file}`, 'TEST_DATA_NOT_FOUND', { file, filePath });
        }

        let parsed: unknown;
        try {
            parsed = JSON.parse(fs.readFileSync(filePath, 'utf-8'));
        } catch (error) {
            throw new AutomationError(
                `Test data file is not valid JSON: ${file}`,
                'TEST_DATA_INVALID',
                { file, filePath },
                error instanceof Error ? error : undefined
            );
        }

        if (!isJsonObject(parsed)) {
            throw new AutomationError(`Test data root must be a JSON object: ${file}`, 'TEST_DATA_INVALID', { file, filePath });
        }

        const data = this.resolveObject(parsed);
        this.cache.set(filePath, { filePath, loadedAt: new Date(), data });

        logger.debug(`Loaded test data from ${filePath}`, { testCases: Object.keys(data).length });
        ActionLogger.logCacheOperation('store', { cache: 'test-data', key: filePath });
        return data;
    }

    getTestCaseData(file: string, testCaseId: string): TestCaseData {
        const data = this.loadTestData(file);
        const testCase = data[testCaseId];

        if (testCase === undefined) {
            throw new AutomationError(
                `Test case '${testCaseId}' not found in ${file}`,
                'TEST_DATA_NOT_FOUND',
                { file, testCaseId, available: Object.keys(data) }
            );
        }
        if (!isJsonObject(testCase)) {
            throw new AutomationError(
                `Test case data for '${testCaseId}' in ${file} is not an object`,
                'TEST_DATA_INVALID',
                { file, testCaseId }
            );
        }
        return testCase;
    }

    getTestCaseIds(file: string): string[] {
        return Object.keys(this.loadTestData(file));
    }

    /**
     * Value rendered as a string; objects and arrays as JSON. A missing or
     * null key yields `defaultValue`.
     */
    getValue(file: string, testCaseId: string, key: string, defaultValue?: string): string | undefined {
        const value = this.getTestCaseData(file, testCaseId)[key];
        if (value === undefined || value === null) {
            logger.warn(`Key '${key}' not found in test case '${testCaseId}' from ${file}`);
            return defaultValue;
        }
        return typeof value === 'string' ? value : typeof value === 'object' ? JSON.stringify(value) : String(value);
    }

    getNumberValue(file: string, testCaseId: string, key: string, defaultValue?: number): number | undefined {
        const value = this.getValue(file, testCaseId, key);
        if (value === undefined) {
            return defaultValue;
        }

        const parsed = Number(value);
        if (value.trim() === '' || !Number.isFinite(parsed)) {
            throw new AutomationError(
                `Invalid numeric value for key '${key}' in test case '${testCaseId}': ${value}`,
                'TEST_DATA_INVALID',
                { file, testCaseId, key, value }
            );
        }
        return parsed;
    }

    getBooleanValue(file: string, testCaseId: string, key: string, defaultValue?: boolean): boolean | undefined {
        const value = this.getValue(file, testCaseId, key);
        if (value === undefined) {
            return defaultValue;
        }
        return value.trim().toLowerCase() === 'true';
    }

    /** `true` when the file loads as a JSON object; load failures are logged and reported as `false`. */
    validateTestData(file: string): boolean {
        try {
            this.loadTestData(file);
            return true;
        } catch (error) {
            if (error instanceof AutomationError) {
                ActionLogger.logError(`Invalid test data: ${file}`, error, { code: error.code });
                return false;
            }
            throw error;
        }
    }

    isCached(file: string): boolean {
        return this.cache.has(this.resolvePath(file));
    }

    removeFromCache(file: string): boolean {
        return this.cache.delete(this.resolvePath(file));
    }

    getCacheSize(): number {
        return this.cache.size;
    }

    clearCache(): void {
        const cleared = this.cache.size;
        this.cache.clear();
        ActionLogger.logCacheOperation('clear', { cache: 'test-data', cleared });
    }

    private resolveValue(value: JsonValue): JsonValue {
        if (typeof value === 'string') {
            return this.dateResolver.resolve(value);
        }
        if (Array.isArray(value)) {
            return value.map(item => this.resolveValue(item));
        }
        if (isJsonObject(value)) {
            return this.resolveObject(value);
        }
        return value;
    }

    private resolveObject(value: JsonObject): JsonObject {
        const resolved: JsonObject = {};
        for (const [key, item] of Object.entries(value)) {
            resolved[key] = this.resolveValue(item);
        }
        return resolved;
    }

    private resolvePath(file: string): string {
        if (path.isAbsolute(file)) {
            return file;
        }
        const direct = path.resolve(file);
        return fs.existsSync(direct) ? direct : path.resolve(this.dataDir, file);
    }
}
