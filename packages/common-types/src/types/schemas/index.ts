/**
 * Validation Schemas - Barrel Export
 */

export * from './suggestion.js';
