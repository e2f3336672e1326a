import { loadConfig } from './config.js';
import { renderPipeline } from './pipeline/renderer.js';

/**
 * Render one pipeline from command line arguments.
 * @returns Process exit code
 */
export function runCli(args: readonly string[], env: NodeJS.ProcessEnv = process.env): number {
  try {
    const config = loadConfig(args, env);
    renderPipeline(config.pipelineFile, config.markdownFile);
    return 0;
  } catch (err) {
    console.error('[Cli]', err instanceof Error ? err.message : err);
    return 1;
  }
}
