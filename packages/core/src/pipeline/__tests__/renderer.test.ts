import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { mkdtempSync, readFileSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { fileURLToPath } from 'node:url';
import type { Activity } from '../../types/pipeline.js';
import {
  renderPipeline,
  renderPipelineMarkdown,
  toAnchor,
  writeActivity,
  writeActivityDependencies,
  writeActivityDescription,
  writeActivityQuery,
} from '../renderer.js';
import { loadPipelineDocument } from '../loader.js';
import { BufferSink } from '../sink.js';
import { FileAccessError, PipelineParseError } from '../../errors.js';

const fixture = (name: string) => fileURLToPath(new URL(`./fixtures/${name}`, import.meta.url));

function render(write: (sink: BufferSink) => void): string {
  const sink = new BufferSink();
  write(sink);
  return sink.toString();
}

const activity = (overrides: Partial<Activity> = {}): Activity => ({
  name: 'Step',
  type: 'Wait',
  dependsOn: [],
  ...overrides,
});

describe('activity writers', () => {
  it('writes the name and type bullet', () => {
    expect(render(sink => writeActivity(sink, activity({ name: 'Copy Data', type: 'Copy' }))))
      .toBe('\n * Name: __Copy Data__, Type: Copy  \n');
  });

  it('omits the description line when there is none', () => {
    expect(render(sink => writeActivityDescription(sink, activity()))).toBe('');
    expect(render(sink => writeActivityDescription(sink, activity({ description: '' }))))
      .toBe('Description: \n');
  });

  it('writes a collapsible SQL block for recognized sources', () => {
    const withQuery = activity({
      typeProperties: {
        source: { type: 'SqlServerSource', query: { kind: 'expression', text: 'SELECT 1' } },
      },
    });

    expect(render(sink => writeActivityQuery(sink, withQuery))).toBe(
      '\n<details>\n' +
      '\n<summary>Query</summary>\n' +
      '\n``` sql\nSELECT 1\n```\n' +
      '\n</details>\n'
    );
  });

  it('writes no query block for other sources', () => {
    const other = activity({ typeProperties: { source: { type: 'ParquetSource' } } });
    expect(render(sink => writeActivityQuery(sink, other))).toBe('');
    expect(render(sink => writeActivityQuery(sink, activity()))).toBe('');
  });

  it('links dependencies using only their first condition', () => {
    const downstream = activity({
      dependsOn: [
        { activity: 'A', dependencyConditions: ['Succeeded', 'Completed'] },
        { activity: 'B 2', dependencyConditions: ['Failed'] },
      ],
    });

    expect(render(sink => writeActivityDependencies(sink, downstream))).toBe(
      '\n   Dependencies:' +
      '\n   * [A](#A) (Succeeded) \n' +
      '\n   * [B 2](#B-2) (Failed) \n'
    );
  });

  it('writes nothing for an empty dependsOn', () => {
    expect(render(sink => writeActivityDependencies(sink, activity()))).toBe('');
  });

  it('replaces every space in anchors', () => {
    expect(toAnchor('Load  Fact Sales')).toBe('Load--Fact-Sales');
  });
});

describe('renderPipelineMarkdown', () => {
  it('renders a pipeline with a single described activity', () => {
    const pipeline = loadPipelineDocument(fixture('load_sales.json'));

    expect(renderPipelineMarkdown(pipeline)).toBe(
      '\n\n ## Load Sales \n' +
      '\n\n ### Steps \n' +
      '\n * Name: __Copy Data__, Type: Copy  \n' +
      'Description: copies rows\n'
    );
  });

  it('renders queries, expressions and dependencies in document order', () => {
    const pipeline = loadPipelineDocument(fixture('nightly_warehouse.json'));
    const queryBlock = (query: string) =>
      `\n<details>\n\n<summary>Query</summary>\n\n\`\`\` sql\n${query}\n\`\`\`\n\n</details>\n`;

    expect(renderPipelineMarkdown(pipeline)).toBe(
      '\n\n ## Nightly Warehouse \n' +
      '\n Description: Refreshes the warehouse staging tables \n' +
      '\n\n ### Steps \n' +
      '\n * Name: __Lookup Watermark__, Type: Lookup  \n' +
      queryBlock("@concat('SELECT MAX(id) FROM ', pipeline().parameters.table)") +
      '\n * Name: __Copy Orders__, Type: Copy  \n' +
      'Description: orders since the last watermark\n' +
      queryBlock('SELECT * FROM orders') +
      '\n   Dependencies:\n   * [Lookup Watermark](#Lookup-Watermark) (Succeeded) \n' +
      '\n * Name: __Archive Files__, Type: Copy  \n' +
      '\n   Dependencies:\n   * [Copy Orders](#Copy-Orders) (Completed) \n' +
      '\n * Name: __Notify__, Type: WebActivity  \n' +
      '\n   Dependencies:' +
      '\n   * [Copy Orders](#Copy-Orders) (Failed) \n' +
      '\n   * [Archive Files](#Archive-Files) (Skipped) \n'
    );
  });

  it('renders the header only for a pipeline without activities', () => {
    expect(renderPipelineMarkdown({ name: 'Empty', properties: { activities: [] } })).toBe(
      '\n\n ## Empty \n\n\n ### Steps \n'
    );
  });
});

describe('renderPipeline', () => {
  let dir: string;
  let output: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'adf-docs-'));
    output = join(dir, 'pipelines.md');
    vi.spyOn(console, 'log').mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
    rmSync(dir, { recursive: true, force: true });
  });

  it('appends to the existing document', () => {
    writeFileSync(output, '# Pipelines');

    renderPipeline(fixture('load_sales.json'), output);
    renderPipeline(fixture('load_sales.json'), output);

    const section =
      '\n\n ## Load Sales \n\n\n ### Steps \n' +
      '\n * Name: __Copy Data__, Type: Copy  \n' +
      'Description: copies rows\n';
    expect(readFileSync(output, 'utf-8')).toBe('# Pipelines' + section + section);
  });

  it('creates the output file when absent and returns the pipeline', () => {
    const pipeline = renderPipeline(fixture('load_sales.json'), output);

    expect(pipeline.name).toBe('Load Sales');
    expect(readFileSync(output, 'utf-8')).toContain('\n\n ## Load Sales \n');
  });

  it('logs the file being read', () => {
    renderPipeline(fixture('load_sales.json'), output);

    expect(console.log).toHaveBeenCalledWith(
      `[PipelineRenderer] Reading ${fixture('load_sales.json')}`
    );
  });

  it('fails on malformed JSON without writing anything', () => {
    writeFileSync(output, 'existing');

    expect(() => renderPipeline(fixture('malformed.json'), output)).toThrow(PipelineParseError);
    expect(readFileSync(output, 'utf-8')).toBe('existing');
  });

  it('fails with FileAccessError when the output cannot be opened', () => {
    expect(() => renderPipeline(fixture('load_sales.json'), join(dir, 'missing', 'out.md')))
      .toThrow(FileAccessError);
  });
});
