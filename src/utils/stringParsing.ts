/**
 * String parsing utilities for command lines
 */

function isWhitespace(char: string | undefined): boolean {
    return char !== undefined && /\s/.test(char);
}

/**
 * Whether a `<` at this position opens a tag rather than standing for itself
 */
export function isTagOpen(text: string, index: number): boolean {
    if (text[index] !== '<') {
        return false;
    }
    const next = text[index + 1];
    return next !== undefined && !isWhitespace(next) && next !== '=' && next !== '<';
}

/**
 * Find the closing quote that ends a quoted section starting at `start`.
 * A quote only closes when followed by whitespace or the end of the line.
 */
function findClosingQuote(line: string, start: number): number {
    const quote = line[start];
    for (let j = start + 1; j < line.length; j++) {
        if (line[j] === quote && (j + 1 === line.length || isWhitespace(line[j + 1]))) {
            return j;
        }
    }
    return -1;
}

/**
 * A word of a command line. `quoted` is set when any part of it was written in quotes.
 */
export interface ArgumentToken {
    text: string;
    quoted: boolean;
}

/**
 * Split a command line into argument tokens.
 *
 * Whitespace separates tokens, except inside quotes and inside tags (`<...>`).
 * A quote opens a section at the start of a token or right after a prefix colon,
 * so `"a b"` and `text:"a b"` each yield a single token with the quotes removed.
 */
export function tokenizeArguments(line: string): ArgumentToken[] {
    const tokens: ArgumentToken[] = [];
    let current = '';
    let hasToken = false;
    let quoted = false;
    let tagDepth = 0;
    let i = 0;

    while (i < line.length) {
        const char = line[i];

        if (tagDepth === 0 && (char === '"' || char === "'") && (current === '' || current.endsWith(':'))) {
            const end = findClosingQuote(line, i);
            if (end !== -1) {
                current += line.slice(i + 1, end);
                hasToken = true;
                quoted = true;
                i = end + 1;
                continue;
            }
        }

        if (isTagOpen(line, i)) {
            tagDepth++;
        } else if (char === '>' && tagDepth > 0) {
            tagDepth--;
        }

        if (tagDepth === 0 && isWhitespace(char)) {
            if (hasToken) {
                tokens.push({ text: current, quoted });
            }
            current = '';
            hasToken = false;
            quoted = false;
        } else {
            current += char;
            hasToken = true;
        }
        i++;
    }

    if (hasToken) {
        tokens.push({ text: current, quoted });
    }
    return tokens;
}

/**
 * Quote an argument for display when it would not survive a re-split
 */
export function quoteArgument(arg: string): string {
    if (arg === '' || /\s/.test(arg)) {
        return arg.includes('"') ? `'${arg}'` : `"${arg}"`;
    }
    return arg;
}

/**
 * Split a list argument written as `a|b|c`
 */
export function splitList(text: string): string[] {
    if (text === '') {
        return [];
    }
    return text.split('|');
}
