// src/data/types/data.types.ts

export type JsonPrimitive = string | number | boolean | null;

export type JsonValue = JsonPrimitive | JsonValue[] | JsonObject;

export interface JsonObject {
    [key: string]: JsonValue;
}

/** One test case: a named bag of values, string leaves already resolved. */
export type TestCaseData = JsonObject;

export interface TestDataDocument {
    filePath: string;
    loadedAt: Date;
    data: JsonObject;
}
