#!/usr/bin/env node
/**
 * Appends the Markdown summary of one exported pipeline to a document.
 *
 *   adf-pipeline-docs <pipeline.json> <output.md>
 *
 * Paths may also come from PIPELINE_FILE and MARKDOWN_FILE.
 */

import { runCli } from './cli.js';

process.exitCode = runCli(process.argv.slice(2));
