/**
 * WinProv CLI — Metadata Command
 *
 * Prints one value from EC2 instance metadata, bare, for use in scripts.
 *
 * Usage:
 *   winprov metadata region
 *   winprov metadata stack-name --imds-v2
 */

import { Argument, Command } from "commander";
import { MetadataError } from "@winprov/engine";
import { createCliLogger, defaultDeps, loadSettings, type CliDeps } from "../config";
import { printError } from "../output";

type MetadataField = "region" | "stack-name";

export function registerMetadataCommand(
  program: Command,
  deps: CliDeps = defaultDeps,
): void {
  program
    .command("metadata")
    .description("Print the instance's region or CloudFormation stack name")
    .addArgument(
      new Argument("<field>", "value to print").choices(["region", "stack-name"]),
    )
    .option("--imds-v2", "Request a session token first (IMDSv2)", false)
    .action(async (field: MetadataField, opts: { imdsV2: boolean }) => {
      const logger = createCliLogger(loadSettings(deps));
      const metadataOpts = { imdsToken: opts.imdsV2, logger };

      try {
        const value =
          field === "region"
            ? await deps.getRegion(metadataOpts)
            : await deps.getStackName(metadataOpts);
        console.log(value);
      } catch (err: unknown) {
        if (!(err instanceof MetadataError)) throw err;
        printError(err.message);
        process.exitCode = 1;
      }
    });
}
