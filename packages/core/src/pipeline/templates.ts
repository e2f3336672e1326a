/**
 * Markdown fragments appended for a pipeline.
 *
 * The leading/trailing spaces and newlines are part of the output format and
 * are compared byte-for-byte by downstream diffs.
 */

// ─────────────────────────────────────────────────────────────────────────────
// Pipeline header
// ─────────────────────────────────────────────────────────────────────────────

export const pipelineHeading = (name: string): string => `\n\n ## ${name} \n`;

export const pipelineDescription = (description: string): string => `\n Description: ${description} \n`;

export const STEPS_HEADING = '\n\n ### Steps \n';

// ─────────────────────────────────────────────────────────────────────────────
// Activities
// ─────────────────────────────────────────────────────────────────────────────

export const activityLine = (name: string, type: string): string =>
  `\n * Name: __${name}__, Type: ${type}  \n`;

export const activityDescription = (description: string): string => `Description: ${description}\n`;

export const DETAILS_OPEN = '\n<details>\n';
export const QUERY_SUMMARY = '\n<summary>Query</summary>\n';
export const sqlCodeBlock = (query: string): string => `\n\`\`\` sql\n${query}\n\`\`\`\n`;
export const DETAILS_CLOSE = '\n</details>\n';

export const DEPENDENCIES_LABEL = '\n   Dependencies:';

export const dependencyLine = (activity: string, anchor: string, condition: string): string =>
  `\n   * [${activity}](#${anchor}) (${condition}) \n`;
