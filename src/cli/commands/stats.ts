import { Command, Option } from "commander";
import chalk from "chalk";
import {
  buildOverview,
  getAllDeps,
  loadGraphFile,
} from "../../core/graph-source.js";
import { StatsUsecase, type OutputFormat } from "../../usecases/stats.usecase.js";
import { collectModules } from "../options.js";

interface StatsCommandOptions {
  file?: string;
  mainModules?: string[];
  excludeModules?: string[];
  verbose?: boolean;
  output: OutputFormat;
  compare?: boolean;
  setA?: string;
  setB?: string;
  mainModulesA?: string[];
  mainModulesB?: string[];
}

export function createStatsCommand(): Command {
  const command = new Command("stats")
    .description("Show metrics about dependency chains")
    .addHelpText(
      "after",
      `
Metrics:
  Direct Dependencies       dependencies required by the main module(s) directly
  Transitive Dependencies   dependencies pulled in by direct dependencies
  Total Dependencies        all dependencies of the main module(s)
  Max Depth                 length of the longest chain from the first main module`,
    )
    .option(
      "-f, --file <path>",
      'Path to a "go mod graph" dump or a YAML/JSON graph file ("-" for stdin)',
    )
    .option(
      "-m, --main-modules <modules>",
      "Main modules, repeatable or comma-separated (default: first module in the graph)",
      collectModules,
    )
    .option(
      "--exclude-modules <patterns>",
      "Exclude module path patterns, repeatable, supports * wildcard",
      collectModules,
    )
    .option("-v, --verbose", "List all dependencies")
    .addOption(
      new Option("-o, --output <format>", "Output format")
        .choices(["text", "json", "csv"])
        .default("text"),
    )
    .option("--compare", "Compare stats between two main module sets")
    .option("--set-a <label>", "Label for the first comparison set")
    .option("--set-b <label>", "Label for the second comparison set")
    .option(
      "--main-modules-a <modules>",
      "Main modules for comparison set A",
      collectModules,
    )
    .option(
      "--main-modules-b <modules>",
      "Main modules for comparison set B",
      collectModules,
    )
    .action((options: StatsCommandOptions) => {
      try {
        const source = loadGraphFile(options.file);
        const excludeModules = options.excludeModules ?? [];
        const statsUsecase = new StatsUsecase();

        console.error(
          chalk.gray(
            `Analyzing ${options.file || "dependency graph"} for dependency metrics...\n`,
          ),
        );

        if (options.compare) {
          const before = buildOverview(source, {
            mainModules: options.mainModulesA ?? options.mainModules,
            excludeModules,
          });
          const after = buildOverview(source, {
            mainModules: options.mainModulesB ?? options.mainModules,
            excludeModules,
          });

          const comparison = statsUsecase.compareStats(
            before,
            after,
            { setA: options.setA, setB: options.setB },
            excludeModules,
          );
          console.log(statsUsecase.formatComparison(comparison, options.output));
          return;
        }

        const overview = buildOverview(source, {
          mainModules: options.mainModules,
          excludeModules,
        });
        const snapshot = statsUsecase.computeStats(overview, excludeModules);

        console.log(statsUsecase.formatStats(snapshot, options.output));

        if (options.verbose) {
          const allDeps = getAllDeps(overview);
          console.log(chalk.green(`\nAll dependencies (${allDeps.length}):`));
          for (const dep of allDeps) {
            console.log(`  ${dep}`);
          }
        }
      } catch (error) {
        console.error(
          chalk.red("Error:"),
          error instanceof Error ? error.message : String(error),
        );
        process.exit(1);
      }
    });

  return command;
}
