export type JsonPrimitive = string | number | boolean | null;

export type JsonValue = JsonPrimitive | JsonValue[] | { [key: string]: JsonValue };

export type JsonMap = { [key: string]: JsonValue };

export function isJsonMap(value: unknown): value is JsonMap {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}
