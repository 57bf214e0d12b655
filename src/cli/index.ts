#!/usr/bin/env tsx

/**
 * CLI entry point for the documentation site builder
 */

import { createProgram } from "./program";

await createProgram().parseAsync();
