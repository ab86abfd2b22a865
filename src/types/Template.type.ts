/**
 * Template types: how argument text with `<...>` tags is compiled and resolved
 */

import type { Value } from '../utils';
import type { ScriptEntry } from '../classes/ScriptEntry';
import type { ScriptQueue } from '../classes/ScriptQueue';
import type { ScriptContainer } from '../classes/ScriptContainer';

/**
 * Everything a tag may read while it resolves
 */
export interface TemplateContext {
    entry: ScriptEntry | null;
    queue: ScriptQueue | null;
    script: ScriptContainer | null;
}

export interface CompiledTemplate {
    readonly source: string;
    /** True when the text contains at least one tag and must be resolved at run time */
    readonly hasTag: boolean;
    /** The literal text when there is no tag */
    readonly rawValue: string | null;
    resolve(context: TemplateContext): Value;
}

export interface TemplateResolver {
    compile(text: string): CompiledTemplate;
}
