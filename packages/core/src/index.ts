/**
 * @adf-docs/core — Data Factory pipeline documentation
 *
 * Reads a pipeline exported from Azure Data Factory and appends a Markdown
 * summary of it (name, description, activities, queries, dependencies) to
 * an existing document.
 */

// Types
export type {
  PipelineDocument,
  PipelineProperties,
  Activity,
  ActivityTypeProperties,
  Dependency,
  SourceDescriptor,
  QueryValue,
  QueryValueKind,
} from './types/pipeline.js';

// Errors
export {
  PipelineDocsError,
  FileAccessError,
  PipelineParseError,
  MissingFieldError,
  ConfigError,
} from './errors.js';

// Pipeline
export * from './pipeline/index.js';

// Config
export { loadConfig, type PipelineDocsConfig } from './config.js';
