/**
 * Markdown rendering of a loaded pipeline.
 *
 * Every writer takes the sink explicitly and only appends to it; the
 * fragments themselves come from ./templates.
 */

import type { Activity, PipelineDocument } from '../types/pipeline.js';
import { loadPipelineDocument } from './loader.js';
import { resolveQueryValue } from './expression.js';
import { BufferSink, FileSink, type MarkdownSink } from './sink.js';
import * as md from './templates.js';

// ─────────────────────────────────────────────────────────────────────────────
// Writers
// ─────────────────────────────────────────────────────────────────────────────

export function writePipelineHeader(sink: MarkdownSink, pipeline: PipelineDocument): void {
  sink.write(md.pipelineHeading(pipeline.name));
  if (pipeline.properties.description !== undefined) {
    sink.write(md.pipelineDescription(pipeline.properties.description));
  }
  sink.write(md.STEPS_HEADING);
}

export function writeActivity(sink: MarkdownSink, activity: Activity): void {
  sink.write(md.activityLine(activity.name, activity.type));
  writeActivityDescription(sink, activity);
  writeActivityQuery(sink, activity);
  writeActivityDependencies(sink, activity);
}

export function writeActivityDescription(sink: MarkdownSink, activity: Activity): void {
  if (activity.description !== undefined) {
    sink.write(md.activityDescription(activity.description));
  }
}

/** Collapsible SQL block, only for sources with a known query field. */
export function writeActivityQuery(sink: MarkdownSink, activity: Activity): void {
  const query = activity.typeProperties?.source?.query;
  if (!query) return;

  sink.write(md.DETAILS_OPEN);
  sink.write(md.QUERY_SUMMARY);
  sink.write(md.sqlCodeBlock(resolveQueryValue(query)));
  sink.write(md.DETAILS_CLOSE);
}

/**
 * Links to upstream activities. Only the first dependency condition is
 * written, even when several are listed.
 */
export function writeActivityDependencies(sink: MarkdownSink, activity: Activity): void {
  if (activity.dependsOn.length === 0) return;

  sink.write(md.DEPENDENCIES_LABEL);
  for (const dep of activity.dependsOn) {
    sink.write(md.dependencyLine(dep.activity, toAnchor(dep.activity), dep.dependencyConditions[0]));
  }
}

/** Same-document anchor for an activity name: spaces become hyphens. */
export function toAnchor(activityName: string): string {
  return activityName.replaceAll(' ', '-');
}

// ─────────────────────────────────────────────────────────────────────────────
// Public API
// ─────────────────────────────────────────────────────────────────────────────

export function renderPipelineDocument(sink: MarkdownSink, pipeline: PipelineDocument): void {
  writePipelineHeader(sink, pipeline);
  for (const activity of pipeline.properties.activities) {
    writeActivity(sink, activity);
  }
}

export function renderPipelineMarkdown(pipeline: PipelineDocument): string {
  const sink = new BufferSink();
  renderPipelineDocument(sink, pipeline);
  return sink.toString();
}

/**
 * Append the Markdown section for one pipeline file to an existing document.
 *
 * The output file is opened (created if needed) before the input is read and
 * is always closed, also when loading fails. Anything written before an error
 * stays in the file.
 */
export function renderPipeline(pipelineFile: string, markdownFile: string): PipelineDocument {
  const sink = new FileSink(markdownFile);
  try {
    console.log(`[PipelineRenderer] Reading ${pipelineFile}`);
    const pipeline = loadPipelineDocument(pipelineFile);
    renderPipelineDocument(sink, pipeline);
    console.log(
      `[PipelineRenderer] Appended "${pipeline.name}" ` +
      `(${pipeline.properties.activities.length} activities) to ${markdownFile}`
    );
    return pipeline;
  } finally {
    sink.close();
  }
}
