/**
 * Duration parsing. Durations are written as `3s`, `250ms`, `2m`, `1h`, `1d`, `20t`
 * (ticks of 50ms) or a bare number of seconds.
 */

export const TICK_MILLIS = 50;

const UNIT_MILLIS: Record<string, number> = {
    t: TICK_MILLIS,
    ms: 1,
    s: 1000,
    m: 60_000,
    h: 3_600_000,
    d: 86_400_000
};

const DURATION_PATTERN = /^(\d+\.?\d*|\.\d+)(ms|t|s|m|h|d)?$/i;

/**
 * @returns the duration in milliseconds, or null when the text is not a duration
 */
export function parseDuration(text: string): number | null {
    const match = DURATION_PATTERN.exec(text.trim());
    if (!match) {
        return null;
    }
    const amount = parseFloat(match[1]);
    const unit = (match[2] ?? 's').toLowerCase();
    return Math.round(amount * UNIT_MILLIS[unit]);
}

export function formatDuration(millis: number): string {
    if (millis % 1000 === 0) {
        return `${millis / 1000}s`;
    }
    return `${millis}ms`;
}
