#!/usr/bin/env node
import { runCli } from "../src/cli/reviewOrder.js";

process.exitCode = runCli(process.argv.slice(2));
