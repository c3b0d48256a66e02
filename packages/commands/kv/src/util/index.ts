/**
 * Utility functions for the kv command
 */
export { validateTarget } from './validate-target.js';
export { getNamespaceId } from './namespace-id.js';
export { encodeKey } from './encode-key.js';
export {
  formatFailure,
  getSuggestion,
  getStatusAdvisory,
} from './format-error.js';
export {
  confirm,
  parseConfirmation,
  type ConfirmFn,
  type ConfirmIO,
} from './confirm.js';
export { createErrorResponse, createTextResponse } from './responses.js';
export {
  parseArgs,
  parseToolRequest,
  parseCommonToolArgs,
  toNamespaceSelector,
} from './tool-args.js';
