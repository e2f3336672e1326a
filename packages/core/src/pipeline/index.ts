/**
 * Pipeline loading and Markdown rendering.
 *
 * @module pipeline
 */

export {
  loadPipelineDocument,
  parsePipelineDocument,
  validatePipelineDocument,
  queryFieldFor,
  QUERY_FIELD_BY_SOURCE_TYPE,
} from './loader.js';
export {
  renderPipeline,
  renderPipelineDocument,
  renderPipelineMarkdown,
  writePipelineHeader,
  writeActivity,
  writeActivityDescription,
  writeActivityQuery,
  writeActivityDependencies,
  toAnchor,
} from './renderer.js';
export {
  EXPRESSION_TYPE,
  isExpression,
  toQueryValue,
  resolveQueryValue,
  resolveValue,
  type RawQueryValue,
} from './expression.js';
export { BufferSink, FileSink, type MarkdownSink } from './sink.js';
