/**
 * Shared HTTP helper for search backends
 */

import { TimeoutError } from "../../errors";

export interface FetchJsonOptions {
  // Service name used in error messages ("Tavily", "SerpAPI", ...)
  label: string;
  timeoutMs: number;
  method?: "GET" | "POST";
  headers?: Record<string, string>;
  body?: string;
}

/**
 * Fetch a URL and parse the JSON body. Non-2xx responses, timeouts and
 * invalid JSON all throw.
 */
export async function fetchJson(
  url: string,
  options: FetchJsonOptions
): Promise<unknown> {
  const controller = new AbortController();
  const timeoutId = setTimeout(() => controller.abort(), options.timeoutMs);

  try {
    const response = await fetch(url, {
      method: options.method ?? "GET",
      headers: {
        Accept: "application/json",
        ...options.headers,
      },
      body: options.body,
      signal: controller.signal,
    });

    if (!response.ok) {
      const errorText = await response.text();
      throw new Error(
        `${options.label} API error (${response.status}): ${errorText.slice(
          0,
          200
        )}`
      );
    }

    const data: unknown = await response.json();
    return data;
  } catch (error) {
    if (error instanceof Error && error.name === "AbortError") {
      throw new TimeoutError(`${options.label} request`, options.timeoutMs);
    }
    throw error;
  } finally {
    clearTimeout(timeoutId);
  }
}
