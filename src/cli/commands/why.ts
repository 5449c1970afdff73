import { Command, Option } from "commander";
import chalk from "chalk";
import { buildOverview, loadGraphFile } from "../../core/graph-source.js";
import {
  DEFAULT_MAX_PATHS,
  WhyUsecase,
  type OutputFormat,
} from "../../usecases/why.usecase.js";
import { collectModules, parseLimit } from "../options.js";

interface WhyCommandOptions {
  file?: string;
  mainModules?: string[];
  excludeModules?: string[];
  maxPaths: number;
  maxDepth: number;
  output: OutputFormat;
}

export function createWhyCommand(): Command {
  const command = new Command("why")
    .description("Show why a dependency is included")
    .argument("<module>", 'Module path to explain (e.g., "golang.org/x/net")')
    .option(
      "-f, --file <path>",
      'Path to a "go mod graph" dump or a YAML/JSON graph file ("-" for stdin)',
    )
    .option(
      "-m, --main-modules <modules>",
      "Main modules to search from, repeatable or comma-separated",
      collectModules,
    )
    .option(
      "--exclude-modules <patterns>",
      'Exclude module path patterns, repeatable, supports * wildcard (e.g., "k8s.io/*")',
      collectModules,
    )
    .option(
      "--max-paths <number>",
      "Maximum dependency paths to search (0 = no limit)",
      parseLimit,
      DEFAULT_MAX_PATHS,
    )
    .option(
      "--max-depth <number>",
      "Maximum path depth in hops (0 = unlimited)",
      parseLimit,
      0,
    )
    .addOption(
      new Option("-o, --output <format>", "Output format")
        .choices(["text", "json", "dot", "svg"])
        .default("text"),
    )
    .action((target: string, options: WhyCommandOptions) => {
      try {
        const source = loadGraphFile(options.file);
        const overview = buildOverview(source, {
          mainModules: options.mainModules,
          excludeModules: options.excludeModules,
        });

        const whyUsecase = new WhyUsecase(overview, {
          maxPaths: options.maxPaths,
          maxDepth: options.maxDepth,
        });

        // Picture outputs use the subgraph instead of enumerating paths
        const pictureOutput =
          options.output === "dot" || options.output === "svg";

        console.error(
          chalk.gray(
            `Analyzing ${options.file || "dependency graph"} for paths to "${target}"...\n`,
          ),
        );

        const result = whyUsecase.analyze(target, {
          mode: pictureOutput ? "subgraph" : "paths",
        });

        if (options.output === "text") {
          if (!result.found) {
            console.log(
              chalk.yellow(
                `Dependency "${target}" not found in the dependency graph.`,
              ),
            );
            return;
          }
          if (!result.reachable) {
            console.log(
              chalk.yellow(
                `Dependency "${target}" not reachable from any main module.`,
              ),
            );
            return;
          }
        }

        if (result.subgraph) {
          console.error(
            chalk.gray(
              `[depwhy why] subgraph nodes=${result.subgraph.nodes.size} edges=${result.subgraph.edges.length}`,
            ),
          );
        } else if (result.reachable) {
          console.error(
            chalk.gray(
              `[depwhy why] paths=${result.paths.length} truncated=${result.truncated}`,
            ),
          );
          if (result.paths.length === 0 && options.output === "text") {
            console.log(
              chalk.yellow(
                `Dependency "${target}" found in graph, but no paths were discovered.\n` +
                  "Try increasing --max-paths or --max-depth, or checking module exclusions.",
              ),
            );
            return;
          }
        }

        console.log(whyUsecase.formatResult(result, options.output));
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
