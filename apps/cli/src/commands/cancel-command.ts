import type { Command } from "commander";
import type { CliServices } from "../services.js";

interface CancelOptions {
  reason?: string;
}

export function registerCancelCommand(program: Command, services: CliServices): void {
  program
    .command("cancel")
    .description("Stop a document's ingestion and discard its undelivered chunks")
    .argument("<documentId>", "Document to cancel")
    .option("-r, --reason <text>", "Recorded on the document")
    .action(async (documentId: string, options: CancelOptions) => {
      await services.enqueueCancel({ type: "cancel", documentId, reason: options.reason });
      services.logger.info({ documentId }, "Cancel job queued");
    });
}
