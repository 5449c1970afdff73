#!/usr/bin/env node

import { Command } from "commander";
import { createWhyCommand } from "./commands/why.js";
import { createStatsCommand } from "./commands/stats.js";
import { GRAPH_PATH_ENV } from "../core/graph-source.js";
import chalk from "chalk";
import { readFileSync } from "fs";
import { fileURLToPath } from "url";
import { dirname, join } from "path";

// Get package.json info
const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);
const packageJson: unknown = JSON.parse(
  readFileSync(join(__dirname, "../../package.json"), "utf-8"),
);
const version =
  typeof packageJson === "object" &&
  packageJson !== null &&
  "version" in packageJson &&
  typeof packageJson.version === "string"
    ? packageJson.version
    : "0.0.0";

// Create main program
const program = new Command()
  .name("depwhy")
  .description("CLI tool for explaining module dependency paths")
  .version(version)
  .addHelpText(
    "after",
    `
${chalk.gray("Examples:")}
  $ go mod graph > modgraph.txt
  $ depwhy why golang.org/x/net
  $ depwhy why golang.org/x/net --max-paths 50 --output json
  $ depwhy why golang.org/x/net --output dot | dot -Tsvg -o why.svg
  $ go mod graph | depwhy stats --file - --output csv
  $ depwhy stats --compare --main-modules-a example.com/app --main-modules-b example.com/tool

${chalk.gray("Environment Variables:")}
  ${GRAPH_PATH_ENV}    Default path to the dependency graph file
`,
  );

// Add commands
program.addCommand(createWhyCommand());
program.addCommand(createStatsCommand());

// Parse arguments
program.parse(process.argv);

// Show help if no command provided
if (!process.argv.slice(2).length) {
  program.outputHelp();
}
