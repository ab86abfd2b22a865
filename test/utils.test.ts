import { describe, expect, it } from 'vitest';
import {
    describeValue,
    formatDuration,
    formatErrorWithContext,
    parseDuration,
    parseListArgument,
    parseMapArgument,
    tokenizeArguments,
    valueToString
} from '../src/utils';

describe('utils', () => {
    describe('parseDuration', () => {
        it('should read bare numbers as seconds', () => {
            expect(parseDuration('3')).toBe(3000);
            expect(parseDuration('1.5')).toBe(1500);
        });

        it('should read unit suffixes', () => {
            expect(parseDuration('250ms')).toBe(250);
            expect(parseDuration('20t')).toBe(1000);
            expect(parseDuration('2m')).toBe(120000);
            expect(parseDuration('1h')).toBe(3600000);
            expect(parseDuration('1D')).toBe(86400000);
        });

        it('should reject text that is not a duration', () => {
            expect(parseDuration('abc')).toBeNull();
            expect(parseDuration('')).toBeNull();
            expect(parseDuration('-1s')).toBeNull();
        });

        it('should format whole seconds and milliseconds', () => {
            expect(formatDuration(3000)).toBe('3s');
            expect(formatDuration(250)).toBe('250ms');
        });
    });

    describe('tokenizeArguments', () => {
        const splitArguments = (line: string) => tokenizeArguments(line).map(token => token.text);

        it('should split on whitespace', () => {
            expect(splitArguments('debug log  hello')).toEqual(['debug', 'log', 'hello']);
        });

        it('should group quoted words and drop the quotes', () => {
            expect(splitArguments('debug log "hello world"')).toEqual(['debug', 'log', 'hello world']);
            expect(splitArguments("define name 'a b'")).toEqual(['define', 'name', 'a b']);
        });

        it('should allow a quote right after a prefix colon', () => {
            expect(splitArguments('text:"a b" c')).toEqual(['text:a b', 'c']);
        });

        it('should keep spaces inside tags', () => {
            expect(splitArguments('<element[a b].upper> x')).toEqual(['<element[a b].upper>', 'x']);
        });

        it('should leave quotes inside a word alone', () => {
            expect(splitArguments("it's fine")).toEqual(["it's", 'fine']);
        });

        it('should treat an unclosed quote as a plain character', () => {
            expect(splitArguments('"unclosed word')).toEqual(['"unclosed', 'word']);
        });

        it('should mark words that were quoted', () => {
            expect(tokenizeArguments('repeat "{" {')).toEqual([
                { text: 'repeat', quoted: false },
                { text: '{', quoted: true },
                { text: '{', quoted: false }
            ]);
        });
    });

    describe('values', () => {
        it('should convert values to script text', () => {
            expect(valueToString(null)).toBe('null');
            expect(valueToString(3)).toBe('3');
            expect(valueToString([1, 'a'])).toBe('1|a');
            expect(valueToString(new Uint8Array([0xff, 0x01]))).toBe('ff01');
            expect(valueToString({ a: 1 })).toBe('{"a":1}');
        });

        it('should describe values with their type', () => {
            expect(describeValue(3)).toBe('number@3');
            expect(describeValue('x')).toBe('string@x');
            expect(describeValue(null)).toBe('null');
        });

        it('should read list arguments', () => {
            expect(parseListArgument('a|b|c')).toEqual(['a', 'b', 'c']);
            expect(parseListArgument('')).toEqual([]);
            expect(parseListArgument(['x', 2])).toEqual(['x', 2]);
        });

        it('should read map arguments', () => {
            expect(parseMapArgument('a=1|b=2')).toEqual({ a: '1', b: '2' });
            expect(parseMapArgument("{accept: 'text/plain'}")).toEqual({ accept: 'text/plain' });
            expect(parseMapArgument({ retries: 3 })).toEqual({ retries: '3' });
        });

        it('should reject malformed map entries', () => {
            expect(() => parseMapArgument('novalue')).toThrow("Invalid map entry 'novalue', expected key=value");
        });
    });

    describe('formatErrorWithContext', () => {
        it('should append the location and command', () => {
            const message = formatErrorWithContext({
                message: 'boom',
                queueId: 'task_1',
                script: 'task',
                line: 2,
                command: 'debug log x'
            });
            expect(message).toBe('boom\n  at queue task_1, script task, line 2\n  while executing: debug log x');
        });

        it('should add a source excerpt around the line', () => {
            const message = formatErrorWithContext({
                message: 'boom',
                line: 2,
                source: 'first\nsecond\nthird'
            });
            expect(message).toBe('boom\n  at line 2\n\nContext:\n     1 | first\n  >  2 | second\n     3 | third');
        });
    });
});
