/**
 * Helpers for reading structured command arguments
 */

import JSON5 from 'json5';
import type { Value } from './types';
import { splitList } from './stringParsing';
import { toValue, valueToString } from './valueConversion';

/**
 * Read a list argument. Arrays pass through; text is split on `|`.
 */
export function parseListArgument(value: Value): Value[] {
    if (Array.isArray(value)) {
        return value.map(item => toValue(item));
    }
    if (value === null) {
        return [];
    }
    return splitList(valueToString(value));
}

/**
 * Read a map argument into string pairs.
 *
 * Accepts an object or Map value, a JSON5 object literal (`{a: 'b'}`), or
 * `key=value|key=value` text.
 */
export function parseMapArgument(value: Value): Record<string, string> {
    const result: Record<string, string> = {};
    if (value === null) {
        return result;
    }
    if (value instanceof Map) {
        for (const [key, item] of value) {
            result[String(key)] = valueToString(toValue(item));
        }
        return result;
    }
    if (typeof value === 'object' && !Array.isArray(value) && !(value instanceof Uint8Array)) {
        for (const [key, item] of Object.entries(value)) {
            result[key] = valueToString(toValue(item));
        }
        return result;
    }

    const text = valueToString(value).trim();
    if (text.startsWith('{')) {
        const parsed: unknown = JSON5.parse(text);
        if (typeof parsed === 'object' && parsed !== null && !Array.isArray(parsed)) {
            return parseMapArgument(parsed);
        }
        throw new Error(`Expected an object literal, got: ${text}`);
    }
    for (const pair of splitList(text)) {
        const eq = pair.indexOf('=');
        if (eq <= 0) {
            throw new Error(`Invalid map entry '${pair}', expected key=value`);
        }
        result[pair.slice(0, eq)] = pair.slice(eq + 1);
    }
    return result;
}
