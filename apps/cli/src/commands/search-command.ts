import type { Command } from "commander";
import { retrieve } from "@chunkwise/core";
import type { SearchResult } from "@chunkwise/types";
import type { CliServices } from "../services.js";
import { parsePositiveInt, parseTags } from "./options.js";

interface SearchOptions {
  permissions: string[];
  topK?: number;
  document?: string[];
}

export function formatSearchResult(result: SearchResult): string {
  if (result.chunks.length === 0) {
    return "No matching chunks.\n";
  }
  return `${result.context}\n`;
}

export function registerSearchCommand(program: Command, services: CliServices): void {
  program
    .command("search")
    .description("Search indexed chunks and print them as numbered context")
    .argument("<query>", "Search text")
    .requiredOption("-p, --permissions <tags>", "Comma-separated access tags of the caller", parseTags)
    .option("-k, --top-k <n>", "Maximum number of chunks", parsePositiveInt)
    .option("-d, --document <ids...>", "Restrict to these document ids")
    .action(async (query: string, options: SearchOptions) => {
      const result = await retrieve(
        {
          query,
          permissions: options.permissions,
          topK: options.topK,
          filter: options.document ? { documentIds: options.document } : undefined,
        },
        services.retrieval(),
      );
      services.logger.info(
        { hits: result.chunks.length, ...result.metadata },
        "Search complete",
      );
      services.write(formatSearchResult(result));
    });
}
