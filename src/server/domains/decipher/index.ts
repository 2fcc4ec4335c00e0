export { decipherTools } from './definitions.js';
export { DecipherToolHandlers, type DecipherHandlerOptions } from './handlers.js';
