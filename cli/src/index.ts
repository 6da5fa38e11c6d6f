#!/usr/bin/env node

/**
 * WinProv CLI — Entry Point
 *
 * Commands:
 *   winprov fetch <artifactPath> <outputPath>   Download an Artifactory artifact
 *   winprov install-config <source>             Install agent config, restart agent
 *   winprov metadata <region|stack-name>        Print instance metadata
 *   winprov db-exists <server> <database>       Check for a SQL Server database
 */

import { createProgram } from "./program";
import { printError } from "./output";
import { errorMessage } from "@winprov/engine";

createProgram()
  .parseAsync(process.argv)
  .catch((err: unknown) => {
    printError(`Error: ${errorMessage(err)}`);
    process.exit(1);
  });
