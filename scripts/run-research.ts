/**
 * Research Run Script
 *
 * Runs one research session and writes every progress event to stdout as
 * one JSON object per line. A short summary goes to stderr at the end.
 *
 * Usage:
 *   npm run research -- "<query>" [--loops=N]
 *
 * Example:
 *   npm run research -- "What is quantum computing?" --loops=2
 *
 * Environment variables required:
 *   OPENAI_API_KEY (or DEEPSEEK_API_KEY with llm.provider: deepseek)
 *
 * Optional (search backends are tried in configured order):
 *   TAVILY_API_KEY, BRAVE_SEARCH_API_KEY, SERPAPI_API_KEY,
 *   GOOGLE_SEARCH_API_KEY + GOOGLE_SEARCH_ENGINE_ID
 */

// Load environment variables from .env file
import * as dotenv from "dotenv";
import * as path from "path";
dotenv.config({ path: path.resolve(__dirname, "../.env") });

import {
  ConfigurationError,
  createResearchSystem,
  serializeEvent,
} from "../packages/core/src";

function parseArgs(argv: string[]): { query: string; loops?: number } {
  const words: string[] = [];
  let loops: number | undefined;

  for (const arg of argv) {
    if (arg.startsWith("--loops=")) {
      const value = Number(arg.slice("--loops=".length));
      if (!Number.isInteger(value) || value < 1) {
        throw new Error(`Invalid --loops value: ${arg}`);
      }
      loops = value;
    } else {
      words.push(arg);
    }
  }

  return { query: words.join(" ").trim(), loops };
}

async function main(): Promise<void> {
  const { query, loops } = parseArgs(process.argv.slice(2));

  if (!query) {
    console.error('Usage: npm run research -- "<query>" [--loops=N]');
    process.exitCode = 1;
    return;
  }

  const { orchestrator } = createResearchSystem();
  const startTime = Date.now();
  let succeeded = false;

  for await (const event of orchestrator.run(query, loops)) {
    process.stdout.write(serializeEvent(event));
    if (event.type === "complete") succeeded = true;
  }

  const duration = ((Date.now() - startTime) / 1000).toFixed(2);
  console.error(
    `\nResearch ${succeeded ? "completed" : "failed"} in ${duration}s`
  );
  process.exitCode = succeeded ? 0 : 1;
}

main().catch((error: unknown) => {
  if (error instanceof ConfigurationError) {
    console.error(`Configuration error: ${error.message}`);
  } else {
    console.error("Research run failed:", error);
  }
  process.exitCode = 1;
});
