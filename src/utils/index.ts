/**
 * Utility functions
 */

export * from './types';
export * from './stringParsing';
export * from './valueConversion';
export * from './duration';
export * from './args';
export * from './errorFormatter';
