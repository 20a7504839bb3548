/**
 * Date Labels Module
 *
 * Exports the label vocabulary, calendar utilities and the date calculator
 */

export * from './types.js';
export * from './utils.js';
export * from './calculator.js';
