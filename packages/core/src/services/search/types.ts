/**
 * Shared backend construction options
 */
export interface BackendOptions {
  apiKey?: string;
  timeoutMs: number;
}
