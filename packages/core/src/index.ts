/**
 * @vixbot/core
 *
 * Foundational, shared types and interfaces.
 * This package has zero dependencies on other @vixbot packages.
 */

export * from './types.js';
export * from './result.js';
export * from './errors.js';
export * from './ports/index.js';
