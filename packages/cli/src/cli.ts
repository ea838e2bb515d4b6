#!/usr/bin/env node

/**
 * recordkit CLI entry point
 */

import { runCli } from "./program.js";

process.exitCode = await runCli(process.argv);
