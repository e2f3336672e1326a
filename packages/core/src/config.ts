import { ConfigError } from './errors.js';

export interface PipelineDocsConfig {
  /** Exported pipeline JSON to read */
  pipelineFile: string;
  /** Markdown document to append to */
  markdownFile: string;
}

export const USAGE = 'Usage: adf-pipeline-docs <pipeline.json> <output.md>';

/**
 * Resolve paths from positional arguments, falling back to
 * PIPELINE_FILE / MARKDOWN_FILE.
 * @param args Arguments after the script name
 * @throws {ConfigError} If either path is missing
 */
export function loadConfig(
  args: readonly string[],
  env: NodeJS.ProcessEnv = process.env
): PipelineDocsConfig {
  const [pipelineArg, markdownArg] = args;
  const pipelineFile = pipelineArg || env.PIPELINE_FILE;
  const markdownFile = markdownArg || env.MARKDOWN_FILE;

  if (!pipelineFile || !markdownFile) {
    throw new ConfigError(USAGE);
  }
  return { pipelineFile, markdownFile };
}
