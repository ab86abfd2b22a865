/**
 * Value conversion and type checking utilities
 */

import type { Value } from './types';

const NUMBER_PATTERN = /^-?(\d+\.?\d*|\.\d+)$/;
const INTEGER_PATTERN = /^-?\d+$/;

/**
 * Narrow an unknown host value into a Value
 */
export function toValue(input: unknown): Value {
    if (input === undefined || input === null) {
        return null;
    }
    if (typeof input === 'string' || typeof input === 'number' || typeof input === 'boolean') {
        return input;
    }
    if (typeof input === 'object') {
        return input;
    }
    return String(input);
}

/**
 * Convert a Value to the text a script sees
 */
export function valueToString(val: Value): string {
    if (val === null || val === undefined) {
        return 'null';
    }
    if (typeof val === 'string') {
        return val;
    }
    if (typeof val === 'number' || typeof val === 'boolean') {
        return String(val);
    }
    if (val instanceof Uint8Array) {
        return Buffer.from(val).toString('hex');
    }
    if (Array.isArray(val)) {
        return val.map(item => valueToString(toValue(item))).join('|');
    }
    if (val instanceof Map) {
        return JSON.stringify(Object.fromEntries(val));
    }
    return JSON.stringify(val);
}

/**
 * Describe a value with its type, for debug reports
 */
export function describeValue(val: Value): string {
    const type = getValueType(val);
    if (type === 'null') {
        return 'null';
    }
    return `${type}@${valueToString(val)}`;
}

/**
 * Get the type of a value
 */
export function getValueType(value: Value): 'string' | 'number' | 'boolean' | 'null' | 'binary' | 'array' | 'object' {
    if (value === null || value === undefined) {
        return 'null';
    }
    if (typeof value === 'string') {
        return 'string';
    }
    if (typeof value === 'number') {
        return 'number';
    }
    if (typeof value === 'boolean') {
        return 'boolean';
    }
    if (value instanceof Uint8Array) {
        return 'binary';
    }
    if (Array.isArray(value)) {
        return 'array';
    }
    return 'object';
}

/**
 * Read a value as a number, or null when it is not numeric
 */
export function asNumber(value: Value): number | null {
    if (typeof value === 'number') {
        return Number.isNaN(value) ? null : value;
    }
    if (typeof value === 'boolean') {
        return value ? 1 : 0;
    }
    if (typeof value === 'string') {
        const trimmed = value.trim();
        return NUMBER_PATTERN.test(trimmed) ? parseFloat(trimmed) : null;
    }
    return null;
}

/**
 * Read a value as a boolean, or null when it is neither true nor false
 */
export function asBoolean(value: Value): boolean | null {
    if (typeof value === 'boolean') {
        return value;
    }
    if (typeof value === 'string') {
        const lower = value.trim().toLowerCase();
        if (lower === 'true') return true;
        if (lower === 'false') return false;
    }
    return null;
}

export function isInteger(text: string): boolean {
    return INTEGER_PATTERN.test(text.trim());
}

/**
 * Read one own property of a plain object or map
 */
export function getProperty(container: Value, key: string): Value | undefined {
    if (container === null || typeof container !== 'object') {
        return undefined;
    }
    if (container instanceof Map) {
        return container.has(key) ? toValue(container.get(key)) : undefined;
    }
    if (Array.isArray(container) || container instanceof Uint8Array) {
        return undefined;
    }
    const descriptor = Object.getOwnPropertyDescriptor(container, key);
    return descriptor === undefined ? undefined : toValue(descriptor.value);
}
