/**
 * Shared types for utility functions
 */

export type Value = string | number | boolean | null | object;

