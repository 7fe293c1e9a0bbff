/**
 * Pure utility functions with no service dependencies
 */

// Deduplication utilities
export { normalizeUrl, extractDomain, dedupeByUrl } from "./deduplication";

// Date formatting
export { formatTimestamp } from "./date-format";

// JSON narrowing
export {
  isRecord,
  asRecord,
  asArray,
  asString,
  parseJsonObject,
  type JsonRecord,
} from "./json";
