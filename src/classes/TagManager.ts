import JSON5 from 'json5';
import type { CueScript } from '../index';
import type { CompiledTemplate, TemplateContext, TemplateResolver } from '../types/Template.type';
import {
    asBoolean,
    asNumber,
    describeValue,
    errorMessage,
    getProperty,
    isInteger,
    isTagOpen,
    parseListArgument,
    toValue,
    valueToString,
    type Value
} from '../utils';
import { ScriptRuntimeError } from './exceptions';

/**
 * Default template resolver.
 *
 * A tag is written `<base[param].attribute[param]...>`. Parameters may contain
 * further tags. A template that is exactly one tag resolves to the tag's raw
 * value; anything else resolves to text.
 */

export interface TagSegment {
    name: string;
    param: CompiledTemplate | null;
}

export interface TagNode {
    source: string;
    segments: TagSegment[];
}

type TemplatePart = string | TagNode;

export type TagBaseHandler = (attribute: TagAttribute) => Value;
export type TagAttributeHandler = (value: Value, attribute: TagAttribute) => Value;

class Template implements CompiledTemplate {
    readonly source: string;
    readonly hasTag: boolean;
    readonly rawValue: string | null;
    private readonly parts: TemplatePart[];
    private readonly manager: TagManager;

    constructor(manager: TagManager, source: string, parts: TemplatePart[]) {
        this.manager = manager;
        this.source = source;
        this.parts = parts;
        this.hasTag = parts.some(part => typeof part !== 'string');
        this.rawValue = this.hasTag ? null : source;
    }

    resolve(context: TemplateContext): Value {
        if (!this.hasTag) {
            return this.source;
        }
        const only = this.parts[0];
        if (this.parts.length === 1 && typeof only !== 'string') {
            return this.manager.resolveTag(only, context);
        }
        let text = '';
        for (const part of this.parts) {
            text += typeof part === 'string' ? part : valueToString(this.manager.resolveTag(part, context));
        }
        return text;
    }
}

/**
 * Walks the segments of one tag while it resolves
 */
export class TagAttribute {
    readonly context: TemplateContext;
    readonly source: string;
    private readonly segments: TagSegment[];
    private index = 0;

    constructor(node: TagNode, context: TemplateContext) {
        this.segments = node.segments;
        this.source = node.source;
        this.context = context;
    }

    get done(): boolean {
        return this.index >= this.segments.length;
    }

    name(): string {
        return this.done ? '' : this.segments[this.index].name.toLowerCase();
    }

    /** The segment name as written */
    rawName(): string {
        return this.done ? '' : this.segments[this.index].name;
    }

    hasParam(): boolean {
        return !this.done && this.segments[this.index].param !== null;
    }

    param(): Value {
        if (this.done) {
            return null;
        }
        const param = this.segments[this.index].param;
        return param === null ? null : param.resolve(this.context);
    }

    paramText(): string {
        return valueToString(this.param());
    }

    requireParam(): Value {
        if (!this.hasParam()) {
            throw new ScriptRuntimeError(`'${this.name()}' needs a [parameter]`);
        }
        return this.param();
    }

    fulfill(count: number = 1): void {
        this.index += count;
    }
}

function requireNumber(value: Value, what: string): number {
    const number = asNumber(value);
    if (number === null) {
        throw new ScriptRuntimeError(`${what} is not a number: ${describeValue(value)}`);
    }
    return number;
}

function sizeOf(value: Value): number {
    if (value instanceof Uint8Array || Array.isArray(value)) {
        return value.length;
    }
    if (value instanceof Map) {
        return value.size;
    }
    if (value !== null && typeof value === 'object') {
        return Object.keys(value).length;
    }
    return valueToString(value).length;
}

const ESCAPES: Record<string, string> = {
    '&lt': '<',
    '&gt': '>',
    '&dq': '"',
    '&sq': "'",
    '&sp': ' ',
    '&co': ':',
    '&pipe': '|',
    '&nl': '\n'
};

export class TagManager implements TemplateResolver {
    private readonly engine: CueScript;
    private readonly cache = new Map<string, Template>();
    private readonly bases = new Map<string, TagBaseHandler>();
    private readonly attributes = new Map<string, TagAttributeHandler>();

    constructor(engine: CueScript) {
        this.engine = engine;
        this.registerDefaultBases();
        this.registerDefaultAttributes();
    }

    /**
     * Register a tag base, e.g. `player` for `<player.name>`
     */
    registerTagBase(name: string, handler: TagBaseHandler): void {
        this.bases.set(name.toLowerCase(), handler);
    }

    /**
     * Register an attribute usable on any value, e.g. `reverse` for `<[list].reverse>`
     */
    registerAttribute(name: string, handler: TagAttributeHandler): void {
        this.attributes.set(name.toLowerCase(), handler);
    }

    compile(text: string): CompiledTemplate {
        return this.compileTemplate(text);
    }

    /**
     * Resolve one tag. A failing tag is reported and resolves to null.
     */
    resolveTag(node: TagNode, context: TemplateContext): Value {
        const attribute = new TagAttribute(node, context);
        try {
            const base = this.bases.get(attribute.name());
            if (base === undefined) {
                throw new ScriptRuntimeError(`Unknown tag base '${attribute.name()}'`);
            }
            let value = base(attribute);
            while (!attribute.done) {
                value = this.applyAttribute(value, attribute);
            }
            return value;
        } catch (error) {
            const scope = context.entry ? context.entry.debugScope() : { queueId: context.queue?.id ?? null };
            this.engine.debug.echoError(`Tag <${node.source}> is invalid: ${errorMessage(error)}`, scope);
            return null;
        }
    }

    private applyAttribute(value: Value, attribute: TagAttribute): Value {
        const name = attribute.name();
        const handler = this.attributes.get(name);
        let result: Value | undefined;
        if (handler !== undefined) {
            result = handler(value, attribute);
        } else {
            result = getProperty(value, attribute.rawName());
            if (result === undefined) {
                throw new ScriptRuntimeError(`Unknown attribute '${name}' for ${describeValue(value)}`);
            }
        }
        attribute.fulfill();
        return result;
    }

    private compileTemplate(text: string): Template {
        const cached = this.cache.get(text);
        if (cached !== undefined) {
            return cached;
        }
        const template = new Template(this, text, this.parseParts(text));
        this.cache.set(text, template);
        return template;
    }

    private parseParts(text: string): TemplatePart[] {
        const parts: TemplatePart[] = [];
        let buffer = '';
        let i = 0;
        while (i < text.length) {
            if (isTagOpen(text, i)) {
                const end = this.findTagEnd(text, i);
                if (end !== -1) {
                    if (buffer !== '') {
                        parts.push(buffer);
                        buffer = '';
                    }
                    parts.push(this.parseTag(text.slice(i + 1, end)));
                    i = end + 1;
                    continue;
                }
            }
            buffer += text[i];
            i++;
        }
        if (buffer !== '') {
            parts.push(buffer);
        }
        return parts;
    }

    private findTagEnd(text: string, start: number): number {
        let depth = 0;
        for (let j = start; j < text.length; j++) {
            if (isTagOpen(text, j)) {
                depth++;
            } else if (text[j] === '>') {
                depth--;
                if (depth === 0) {
                    return j;
                }
            }
        }
        return -1;
    }

    private parseTag(content: string): TagNode {
        const raw: string[] = [];
        let current = '';
        let brackets = 0;
        let tags = 0;
        for (let j = 0; j < content.length; j++) {
            const char = content[j];
            if (isTagOpen(content, j)) {
                tags++;
            } else if (char === '>' && tags > 0) {
                tags--;
            } else if (tags === 0 && char === '[') {
                brackets++;
            } else if (tags === 0 && char === ']' && brackets > 0) {
                brackets--;
            } else if (char === '.' && brackets === 0 && tags === 0) {
                raw.push(current);
                current = '';
                continue;
            }
            current += char;
        }
        raw.push(current);

        const segments = raw.map((segment): TagSegment => {
            const open = segment.indexOf('[');
            if (open === -1 || !segment.endsWith(']')) {
                return { name: segment, param: null };
            }
            return {
                name: segment.slice(0, open),
                param: this.compileTemplate(segment.slice(open + 1, -1))
            };
        });
        return { source: content, segments };
    }

    private registerDefaultBases(): void {
        // <[name]>
        this.registerTagBase('', attribute => {
            const name = attribute.paramText();
            const value = attribute.context.queue?.getDefinition(name);
            if (value === undefined) {
                throw new ScriptRuntimeError(`Definition '${name}' does not exist`);
            }
            attribute.fulfill();
            return value;
        });

        // <entry[save_name].result_key>
        this.registerTagBase('entry', attribute => {
            const saveName = attribute.paramText();
            const held = attribute.context.queue?.getHeldScriptEntry(saveName) ?? null;
            if (held === null) {
                throw new ScriptRuntimeError(`No entry was saved as '${saveName}'`);
            }
            attribute.fulfill();
            const key = attribute.name();
            if (key === '') {
                throw new ScriptRuntimeError(`Specify which result of '${saveName}' to read`);
            }
            const value = held.getObject(key);
            if (value === undefined) {
                throw new ScriptRuntimeError(`Saved entry '${saveName}' has no result '${key}'`);
            }
            attribute.fulfill();
            return value;
        });

        this.registerTagBase('queue', attribute => {
            const queue = attribute.context.queue;
            if (queue === null) {
                throw new ScriptRuntimeError('No queue is available here');
            }
            attribute.fulfill();
            const property = attribute.name();
            if (property === '') {
                return queue.id;
            }
            attribute.fulfill();
            switch (property) {
                case 'id':
                    return queue.id;
                case 'name':
                    return queue.name;
                case 'size':
                    return queue.getQueueSize();
                case 'state':
                    return queue.state;
                case 'determination':
                    return queue.determinations ?? [];
                case 'definitions':
                    return Array.from(queue.getAllDefinitions().keys());
                default:
                    throw new ScriptRuntimeError(`Unknown queue property '${property}'`);
            }
        });

        this.registerTagBase('element', attribute => {
            const value = attribute.param();
            attribute.fulfill();
            return value;
        });

        this.registerTagBase('list', attribute => {
            const value = parseListArgument(attribute.param());
            attribute.fulfill();
            return value;
        });

        // <proc[script_name].context[a|b]>
        this.registerTagBase('proc', attribute => {
            const name = valueToString(attribute.requireParam());
            attribute.fulfill();
            let args: Value[] = [];
            if (attribute.name() === 'context') {
                args = parseListArgument(attribute.param());
                attribute.fulfill();
            }
            return this.engine.runProcedure(name, args);
        });

        for (const [name, replacement] of Object.entries(ESCAPES)) {
            this.registerTagBase(name, attribute => {
                attribute.fulfill();
                return replacement;
            });
        }
    }

    private registerDefaultAttributes(): void {
        this.registerAttribute('size', value => sizeOf(value));
        this.registerAttribute('upper', value => valueToString(value).toUpperCase());
        this.registerAttribute('lower', value => valueToString(value).toLowerCase());
        this.registerAttribute('add', (value, attribute) =>
            requireNumber(value, 'Value') + requireNumber(attribute.requireParam(), 'Parameter'));
        this.registerAttribute('sub', (value, attribute) =>
            requireNumber(value, 'Value') - requireNumber(attribute.requireParam(), 'Parameter'));
        this.registerAttribute('mul', (value, attribute) =>
            requireNumber(value, 'Value') * requireNumber(attribute.requireParam(), 'Parameter'));
        this.registerAttribute('equals', (value, attribute) =>
            valueToString(value) === valueToString(attribute.requireParam()));
        this.registerAttribute('not', value => {
            const bool = asBoolean(value);
            if (bool === null) {
                throw new ScriptRuntimeError(`Cannot negate ${describeValue(value)}`);
            }
            return !bool;
        });
        this.registerAttribute('split', (value, attribute) => {
            const separator = attribute.hasParam() ? attribute.paramText() : '|';
            return valueToString(value).split(separator);
        });
        this.registerAttribute('get', (value, attribute) => {
            const position = attribute.paramText();
            if (!Array.isArray(value)) {
                throw new ScriptRuntimeError(`Cannot index ${describeValue(value)}`);
            }
            if (!isInteger(position)) {
                throw new ScriptRuntimeError(`Index '${position}' is not a whole number`);
            }
            const index = parseInt(position, 10);
            if (index < 1 || index > value.length) {
                throw new ScriptRuntimeError(`Index ${index} is out of range 1..${value.length}`);
            }
            return toValue(value[index - 1]);
        });
        this.registerAttribute('utf8_encode', value => new Uint8Array(Buffer.from(valueToString(value), 'utf8')));
        this.registerAttribute('utf8_decode', value => {
            if (!(value instanceof Uint8Array)) {
                throw new ScriptRuntimeError(`Expected binary data, got ${describeValue(value)}`);
            }
            return Buffer.from(value).toString('utf8');
        });
        this.registerAttribute('to_json', value => JSON.stringify(value instanceof Map ? Object.fromEntries(value) : value));
        this.registerAttribute('from_json', value => {
            const parsed: unknown = JSON5.parse(valueToString(value));
            return toValue(parsed);
        });
    }
}
