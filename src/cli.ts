#!/usr/bin/env node

import { Command } from "commander";
import packageJson from "../package.json" with { type: "json" };
import { registerPrepareRefseqsCommand } from "./cli/prepare-refseqs";

const program = new Command();

program
  .name("refseq-prep")
  .description("Prepare reference sequences for static genome browser hosting")
  .version(packageJson.version);

registerPrepareRefseqsCommand(program);

await program.parseAsync();
