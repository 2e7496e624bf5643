/**
 * @contextstack/shared — primitives every ContextStack package builds on.
 */

export * from './types/index.js';
export { EventBus, createEvent } from './event-bus/index.js';
export { ContextStore } from './context-store/index.js';
export { globToRegExp, matchesGlob } from './glob/index.js';
