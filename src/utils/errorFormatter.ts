/**
 * Utility for formatting errors with script context
 */

export interface ErrorContext {
    message: string;
    script?: string | null;   // Script container name
    line?: number | null;     // 1-based line in the script source
    queueId?: string | null;
    command?: string | null;  // Command text as written
    source?: string | null;   // Original script source, for a code excerpt
}

/**
 * Format an error message with the queue, script position and command that raised it
 *
 * @param context - Error context with position and code information
 * @returns Formatted error message with code snippet
 */
export function formatErrorWithContext(context: ErrorContext): string {
    const { message, script, line, queueId, command, source } = context;

    let errorMsg = message;

    const location: string[] = [];
    if (queueId) {
        location.push(`queue ${queueId}`);
    }
    if (script) {
        location.push(`script ${script}`);
    }
    if (line !== undefined && line !== null && line > 0) {
        location.push(`line ${line}`);
    }
    if (location.length > 0) {
        errorMsg += `\n  at ${location.join(', ')}`;
    }
    if (command) {
        errorMsg += `\n  while executing: ${command}`;
    }

    if (source && line !== undefined && line !== null && line > 0) {
        const lines = source.split('\n');
        const lineIndex = line - 1;
        if (lineIndex < lines.length) {
            const contextLines: string[] = [];
            for (let i = Math.max(0, lineIndex - 2); i < Math.min(lines.length, lineIndex + 3); i++) {
                const lineNum = (i + 1).toString().padStart(3, ' ');
                const marker = i === lineIndex ? '>' : ' ';
                contextLines.push(`  ${marker}${lineNum} | ${lines[i]}`);
            }
            errorMsg += '\n\nContext:\n' + contextLines.join('\n');
        }
    }

    return errorMsg;
}

/**
 * Message of any thrown value
 */
export function errorMessage(error: unknown): string {
    if (error instanceof Error) {
        return error.message;
    }
    return String(error);
}
