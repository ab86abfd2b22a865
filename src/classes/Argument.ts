import type { CompiledTemplate } from '../types/Template.type';
import {
    asBoolean,
    asNumber,
    isInteger,
    parseDuration,
    valueToString,
    type Value
} from '../utils';
import { InvalidArgumentsError } from './exceptions';

const PREFIX_CHAR = /[A-Za-z0-9_.]/;

/**
 * Find the colon that splits `prefix:value`.
 *
 * The colon must not be the first character, and unless any symbol is allowed,
 * everything before it must be letters, digits, `_` or `.`.
 * @returns the colon index, or -1 when the text has no prefix
 */
export function findPrefixSplit(text: string, anyPrefixSymbolAllowed: boolean = false): number {
    const colon = text.indexOf(':');
    if (colon <= 0) {
        return -1;
    }
    if (anyPrefixSymbolAllowed) {
        return colon;
    }
    for (let i = 0; i < colon; i++) {
        if (!PREFIX_CHAR.test(text[i])) {
            return -1;
        }
    }
    return colon;
}

/**
 * The compiled form of one argument token, built once per entry and shared by its clones
 */
export class InternalArgument {
    readonly fullOriginalRawValue: string;
    readonly prefix: InternalArgument | null;
    readonly value: CompiledTemplate;
    readonly hadColon: boolean;
    /** Prefix or value contains a tag and has to be resolved each run */
    readonly shouldProcess: boolean;
    /** Resolved form of a fully literal argument */
    readonly rawArgument: Argument | null;

    constructor(fullOriginalRawValue: string, value: CompiledTemplate, prefix: InternalArgument | null = null, hadColon: boolean = false) {
        this.fullOriginalRawValue = fullOriginalRawValue;
        this.value = value;
        this.prefix = prefix;
        this.hadColon = hadColon;
        this.shouldProcess = value.hasTag || (prefix !== null && prefix.value.hasTag);
        this.rawArgument = this.shouldProcess
            ? null
            : new Argument(prefix ? prefix.fullOriginalRawValue : null, value.source);
    }

    /** Literal value text, or null when the value holds a tag */
    get rawValue(): string | null {
        return this.value.rawValue;
    }
}

/**
 * One resolved argument, as handlers see it during parseArgs
 */
export class Argument {
    readonly prefix: string | null;
    readonly object: Value;
    readonly rawValue: string;
    readonly prefixWasDynamic: boolean;

    constructor(prefix: string | null, object: Value, prefixWasDynamic: boolean = false) {
        this.prefix = prefix;
        this.object = object;
        this.rawValue = valueToString(object);
        this.prefixWasDynamic = prefixWasDynamic;
    }

    /**
     * Build an argument from resolved text, splitting off a prefix where the text has one
     */
    static fromText(text: string, anyPrefixSymbolAllowed: boolean = false, prefixWasDynamic: boolean = false): Argument {
        const colon = findPrefixSplit(text, anyPrefixSymbolAllowed);
        if (colon === -1) {
            return new Argument(null, text);
        }
        return new Argument(text.slice(0, colon), text.slice(colon + 1), prefixWasDynamic);
    }

    hasPrefix(): boolean {
        return this.prefix !== null;
    }

    matchesPrefix(...names: string[]): boolean {
        if (this.prefix === null) {
            return false;
        }
        const lower = this.prefix.toLowerCase();
        return names.some(name => name.toLowerCase() === lower);
    }

    /**
     * True when the value equals one of the given words, ignoring case
     */
    matches(...values: string[]): boolean {
        const lower = this.rawValue.toLowerCase();
        return values.some(value => value.toLowerCase() === lower);
    }

    matchesInteger(): boolean {
        return typeof this.object === 'number' ? Number.isInteger(this.object) : isInteger(this.rawValue);
    }

    matchesNumber(): boolean {
        return asNumber(this.object) !== null;
    }

    matchesBoolean(): boolean {
        return asBoolean(this.object) !== null;
    }

    matchesDuration(): boolean {
        return parseDuration(this.rawValue) !== null;
    }

    asText(): string {
        return this.rawValue;
    }

    asInt(): number {
        if (!this.matchesInteger()) {
            throw new InvalidArgumentsError(`'${this.toString()}' is not a whole number`);
        }
        return parseInt(this.rawValue, 10);
    }

    asNumber(): number {
        const number = asNumber(this.object);
        if (number === null) {
            throw new InvalidArgumentsError(`'${this.toString()}' is not a number`);
        }
        return number;
    }

    asBoolean(): boolean {
        const bool = asBoolean(this.object);
        if (bool === null) {
            throw new InvalidArgumentsError(`'${this.toString()}' is not true or false`);
        }
        return bool;
    }

    /**
     * @returns the duration in milliseconds
     */
    asDuration(): number {
        const millis = parseDuration(this.rawValue);
        if (millis === null) {
            throw new InvalidArgumentsError(`'${this.toString()}' is not a duration`);
        }
        return millis;
    }

    /**
     * Fail unless the argument is unprefixed or carries the given prefix
     */
    limitToOnlyPrefix(name: string): this {
        if (this.prefix !== null && !this.matchesPrefix(name)) {
            this.reportUnhandled();
        }
        return this;
    }

    reportUnhandled(): never {
        throw new InvalidArgumentsError(`Unknown argument '${this.toString()}'`);
    }

    toString(): string {
        return this.prefix === null ? this.rawValue : `${this.prefix}:${this.rawValue}`;
    }
}
