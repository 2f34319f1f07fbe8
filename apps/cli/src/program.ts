import { Command } from "commander";
import { registerCancelCommand } from "./commands/cancel-command.js";
import { registerLoadCommand } from "./commands/load-command.js";
import { registerSearchCommand } from "./commands/search-command.js";
import type { CliServices } from "./services.js";

export function createProgram(services: CliServices): Command {
  const program = new Command();

  program
    .name("chunkwise")
    .description("Queue documents for ingestion and search the indexed chunks")
    .version("0.1.0");

  registerLoadCommand(program, services);
  registerCancelCommand(program, services);
  registerSearchCommand(program, services);

  return program;
}
