/**
 * Search Resolver smoke test
 *
 * Runs a query through the configured search backends and fetches the
 * first result page. Hits the live services.
 *
 * Usage:
 *   npm run search -- "<query>"
 *
 * Environment variables (each optional; missing keys skip that backend):
 *   TAVILY_API_KEY, BRAVE_SEARCH_API_KEY, SERPAPI_API_KEY,
 *   GOOGLE_SEARCH_API_KEY, GOOGLE_SEARCH_ENGINE_ID
 */

// Load environment variables from .env file
import * as dotenv from "dotenv";
import * as path from "path";
dotenv.config({ path: path.resolve(__dirname, "../.env") });

import {
  SearchResolver,
  createSearchBackends,
  getConfig,
} from "../packages/core/src";

async function main(): Promise<void> {
  const query =
    process.argv.slice(2).join(" ").trim() || "solid state battery research";
  const config = getConfig();

  const resolver = new SearchResolver({
    backends: createSearchBackends(config.search),
    sanitization: config.sanitization,
    defaultResultCount: config.search.defaultResultCount,
    extraction: {
      maxChars: config.extraction.maxChars,
      timeoutMs: config.extraction.timeoutMs,
      userAgent: config.extraction.userAgent,
    },
  });

  console.log("\n=== Search ===\n");
  console.log(`Query:    ${query}`);
  console.log(`Backends: ${resolver.getBackendNames().join(", ")}\n`);

  const outcome = await resolver.resolve(query);

  console.log(`Status:   ${outcome.status}`);
  console.log(`Method:   ${outcome.methodUsed}`);
  if (outcome.errorDetail) {
    console.log(`Error:    ${outcome.errorDetail}`);
  }
  console.log(`\n${outcome.message}\n`);

  const first = outcome.results.find((result) => result.link);
  if (!first) {
    console.log("No result with a link to fetch");
    return;
  }

  console.log("\n=== Page Content ===\n");
  console.log(await resolver.fetchPage(first.link, 1500));
}

main().catch((error: unknown) => {
  console.error("Search test failed:", error);
  process.exitCode = 1;
});
