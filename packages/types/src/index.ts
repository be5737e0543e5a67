/**
 * Routebench Types - Shared TypeScript interfaces
 */

export * from './topology.js';
export * from './dispatch.js';
export * from './evaluation.js';
