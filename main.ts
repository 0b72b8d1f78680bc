#!/usr/bin/env tsx

/**
 * spawn - Main Entry Point
 *
 * Toggle an application between launched, focused and the Sway scratchpad.
 * Meant to be bound to one key per application.
 */

import { run } from "./src/cli.ts";

process.exitCode = await run(process.argv.slice(2));
