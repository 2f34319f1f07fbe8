import { createHash } from "node:crypto";
import { readdir } from "node:fs/promises";
import { join, relative, resolve, sep } from "node:path";
import type { Command } from "commander";
import { isSupportedPath, mimeTypeFromPath } from "@chunkwise/parser";
import type { IngestJobData } from "@chunkwise/types";
import type { CliServices } from "../services.js";
import { parseTags } from "./options.js";

interface LoadOptions {
  permissions: string[];
}

/**
 * Stable id for a file under the loaded directory, so loading the same tree
 * again re-ingests each document in place.
 */
export function documentIdFor(relativePath: string): string {
  return createHash("sha256").update(relativePath).digest("hex").slice(0, 32);
}

async function listFiles(dir: string): Promise<string[]> {
  const entries = await readdir(dir, { withFileTypes: true });
  const nested = await Promise.all(
    entries
      .filter((entry) => !entry.name.startsWith("."))
      .map(async (entry) => {
        const path = join(dir, entry.name);
        if (entry.isDirectory()) return listFiles(path);
        return entry.isFile() ? [path] : [];
      }),
  );
  return nested.flat();
}

/**
 * One ingest job per supported file below `root`, in path order. Hidden files
 * and directories are skipped.
 */
export async function collectIngestJobs(
  root: string,
  permissions: string[],
): Promise<IngestJobData[]> {
  const base = resolve(root);
  const files = (await listFiles(base)).filter(isSupportedPath).sort();

  return files.map((sourcePath) => ({
    type: "ingest",
    documentId: documentIdFor(relative(base, sourcePath).split(sep).join("/")),
    sourcePath,
    mimeType: mimeTypeFromPath(sourcePath),
    permissions,
  }));
}

export function registerLoadCommand(program: Command, services: CliServices): void {
  program
    .command("load")
    .description("Queue every supported file under a directory for ingestion")
    .argument("<dir>", "Directory to walk")
    .requiredOption("-p, --permissions <tags>", "Comma-separated access tags", parseTags)
    .action(async (dir: string, options: LoadOptions) => {
      const jobs = await collectIngestJobs(dir, options.permissions);
      if (jobs.length === 0) {
        services.logger.warn({ dir }, "No supported files found");
        return;
      }
      await services.enqueueIngest(jobs);
      services.logger.info({ dir, count: jobs.length }, "Ingest jobs queued");
    });
}
