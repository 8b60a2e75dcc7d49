export * from './types.js';
export { InvestigationEventBus, toServerSentEvent } from './bus.js';
