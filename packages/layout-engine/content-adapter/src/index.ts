export { normalizeContentDescription, normalizeContentBlock, DEFAULT_TITLE } from './normalize.js';
export { applyContentLimits, truncateText, DEFAULT_CONTENT_LIMITS, type ContentLimits } from './limits.js';
