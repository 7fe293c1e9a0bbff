/**
 * Research tools exposed to the researcher agent
 *
 * - generate_search_queries: query variants for a topic
 * - enhanced_web_search: cascading multi-backend search
 * - get_page_content: fetch a page as structured text
 */

import type {
  ToolDefinition,
  ToolParameters,
  ToolParametersSchema,
} from "../../interfaces/tool";
import type { SearchResolver } from "../search/resolver";

const QUERY_SUFFIXES = [
  "",
  " latest news",
  " research studies",
  " expert analysis",
  " facts statistics",
];

class ToolArgumentError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ToolArgumentError";
  }
}

function readString(params: ToolParameters, key: string): string {
  const value = params[key];
  if (typeof value !== "string" || !value.trim()) {
    throw new ToolArgumentError(`"${key}" must be a non-empty string`);
  }
  return value.trim();
}

/**
 * Optional integer argument; numeric strings are accepted since models
 * sometimes quote numbers
 */
function readInteger(params: ToolParameters, key: string): number | undefined {
  const value = params[key];
  if (value === undefined || value === null) return undefined;

  const parsed = typeof value === "string" ? Number(value) : value;
  if (typeof parsed !== "number" || !Number.isInteger(parsed) || parsed < 1) {
    throw new ToolArgumentError(`"${key}" must be a positive integer`);
  }
  return parsed;
}

/**
 * Wrap a tool body so argument problems come back as text
 */
function defineTool(
  name: string,
  description: string,
  parameters: ToolParametersSchema,
  run: (params: ToolParameters) => Promise<string>
): ToolDefinition {
  return {
    name,
    description,
    parameters,
    async execute(params) {
      try {
        return await run(params);
      } catch (error) {
        if (error instanceof ToolArgumentError) {
          return `Invalid arguments for ${name}: ${error.message}`;
        }
        throw error;
      }
    },
  };
}

/**
 * Numbered list of search query variants for a topic (at most five)
 */
export function generateSearchQueries(
  researchTopic: string,
  numQueries = 3
): string {
  const count = Math.min(QUERY_SUFFIXES.length, Math.max(1, numQueries));
  const queries = QUERY_SUFFIXES.slice(0, count).map(
    (suffix) => `${researchTopic}${suffix}`
  );

  const lines = queries.map((query, index) => `${index + 1}. ${query}`);
  return `Generated search queries for '${researchTopic}':\n\n${lines.join("\n")}`;
}

export function createResearchTools(resolver: SearchResolver): ToolDefinition[] {
  return [
    defineTool(
      "generate_search_queries",
      "Generate optimized search queries for web research on a topic.",
      {
        type: "object",
        properties: {
          research_topic: {
            type: "string",
            description: "The main topic or question to research",
          },
          num_queries: {
            type: "integer",
            description: "Number of queries to generate (default 3, max 5)",
          },
        },
        required: ["research_topic"],
      },
      async (params) =>
        generateSearchQueries(
          readString(params, "research_topic"),
          readInteger(params, "num_queries") ?? 3
        )
    ),

    defineTool(
      "enhanced_web_search",
      "Search the web across several search engines and return titles, URLs and summaries.",
      {
        type: "object",
        properties: {
          query: { type: "string", description: "The search query" },
          num_results: {
            type: "integer",
            description: "Number of results to return (max 10, defaults to the configured count)",
          },
        },
        required: ["query"],
      },
      async (params) => {
        const outcome = await resolver.resolve(
          readString(params, "query"),
          readInteger(params, "num_results")
        );
        return outcome.message;
      }
    ),

    defineTool(
      "get_page_content",
      "Fetch a web page and return its readable text content.",
      {
        type: "object",
        properties: {
          url: { type: "string", description: "Absolute http(s) URL" },
          max_chars: {
            type: "integer",
            description: "Maximum characters of content (defaults to the configured limit)",
          },
        },
        required: ["url"],
      },
      async (params) =>
        resolver.fetchPage(
          readString(params, "url"),
          readInteger(params, "max_chars")
        )
    ),
  ];
}
