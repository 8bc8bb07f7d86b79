#!/usr/bin/env node
import { Command } from "commander";
import { registerSchemaGraphCli } from "./cli.js";

const program = new Command();
program
  .name("schemagraph")
  .description("Declarative schema-driven graph upsert and cleanup")
  .version("0.1.0");

registerSchemaGraphCli({
  program,
  logger: {
    info: (msg) => console.error(msg),
    warn: (msg) => console.error(`warning: ${msg}`),
    error: (msg) => console.error(`error: ${msg}`),
  },
});

await program.parseAsync(process.argv);
