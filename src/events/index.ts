/**
 * Events Module
 *
 * Merge request lifecycle and pipeline events.
 */

export * from './types';
export { EventBus, eventBus, createEvent } from './bus';
