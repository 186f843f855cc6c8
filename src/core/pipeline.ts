/**
 * Pipeline - capture file to catalogue to test cases and documentation
 */

import { link, mkdir, rename, rm, writeFile } from 'node:fs/promises';
import { join, resolve } from 'node:path';
import type { ApiDefinition, Diagnostic, TestCase } from '../types/index.js';
import { CaptureParser, type CaptureStream } from '../capture/har-parser.js';
import { ModelBuilder, type BuildStats } from '../generators/model-builder.js';
import { TestSynthesizer } from '../generators/test-synthesizer.js';
import { renderMarkdown, renderOpenApi, type OpenApiDocument } from '../generators/doc-renderer.js';
import { throwIfCancelled } from './errors.js';
import { type Logger, silentLogger } from './logger.js';
import type { RuleEngine } from './rule-engine.js';

export interface PipelineOptions {
  engine: RuleEngine;
  parser?: CaptureParser;
  builder?: ModelBuilder;
  synthesizer?: TestSynthesizer;
  logger?: Logger;
}

export interface RunOptions {
  signal?: AbortSignal;
}

export interface CatalogueStats extends BuildStats {
  /** Entries in the capture, including skipped ones */
  entries: number;
  skipped: number;
}

export interface CatalogueResult {
  definitions: ApiDefinition[];
  diagnostics: Diagnostic[];
  /** True when at least one capture entry was skipped */
  partial: boolean;
  stats: CatalogueStats;
}

export interface GeneratedArtifacts {
  testCases: TestCase[];
  markdown: string;
  openapi: OpenApiDocument;
}

export interface PublishArtifacts extends Partial<GeneratedArtifacts> {
  definitions?: ApiDefinition[];
}

/** File names written by publish() */
export const ARTIFACT_FILES = {
  definitions: 'catalogue.json',
  testCases: 'test-cases.json',
  markdown: 'api_docs.md',
  openapi: 'openapi.json',
} as const;

export type CaptureInput = string | { har: unknown; source?: string };

export class Pipeline {
  private engine: RuleEngine;
  private parser: CaptureParser;
  private builder: ModelBuilder;
  private synthesizer: TestSynthesizer;
  private logger: Logger;

  constructor(options: PipelineOptions) {
    const logger = options.logger ?? silentLogger;
    this.engine = options.engine;
    this.parser = options.parser ?? new CaptureParser(logger);
    this.builder = options.builder ?? new ModelBuilder({ logger });
    this.synthesizer = options.synthesizer ?? new TestSynthesizer();
    this.logger = logger.child({ component: 'pipeline' });
  }

  /**
   * Parse a capture (file path or in-memory archive) and build its catalogue
   * with the rule snapshot current when the run starts
   */
  async parseCapture(input: CaptureInput, options: RunOptions = {}): Promise<CatalogueResult> {
    const { signal } = options;
    throwIfCancelled(signal, 'capture parse');

    const predicate = this.engine.createPredicate();
    const stream: CaptureStream =
      typeof input === 'string'
        ? await this.parser.open(input)
        : this.parser.fromObject(input.har, input.source ?? '<request>');
    throwIfCancelled(signal, 'capture parse');

    const result = this.builder.build(stream, predicate, { signal });
    const skipped = stream.diagnostics.length;

    this.logger.info(
      { source: stream.source, definitions: result.definitions.length, skipped },
      'capture parsed'
    );

    return {
      definitions: result.definitions,
      diagnostics: [...stream.diagnostics, ...result.diagnostics],
      partial: skipped > 0,
      stats: { ...result.stats, entries: stream.entryCount, skipped },
    };
  }

  generateTests(definitions: readonly ApiDefinition[], options: RunOptions = {}): GeneratedArtifacts {
    const testCases = this.synthesizer.synthesize(definitions, options);
    throwIfCancelled(options.signal, 'documentation');

    return {
      testCases,
      markdown: renderMarkdown(definitions),
      openapi: renderOpenApi(definitions),
    };
  }

  /**
   * Write artifacts into outDir. Everything is written to temporary names
   * first and renamed only once all writes succeeded. If a rename fails, the
   * targets already replaced get their previous contents back.
   */
  async publish(outDir: string, artifacts: PublishArtifacts, options: RunOptions = {}): Promise<string[]> {
    const { signal } = options;
    throwIfCancelled(signal, 'publish');

    const dir = resolve(outDir);
    await mkdir(dir, { recursive: true });

    const files: Array<{ target: string; content: string }> = [];
    if (artifacts.definitions) files.push({ target: ARTIFACT_FILES.definitions, content: toJson(artifacts.definitions) });
    if (artifacts.testCases) files.push({ target: ARTIFACT_FILES.testCases, content: toJson(artifacts.testCases) });
    if (artifacts.markdown !== undefined) files.push({ target: ARTIFACT_FILES.markdown, content: artifacts.markdown });
    if (artifacts.openapi) files.push({ target: ARTIFACT_FILES.openapi, content: toJson(artifacts.openapi) });

    const stamp = `${process.pid}-${Date.now()}`;
    const suffix = `.tmp-${stamp}`;
    const backupSuffix = `.bak-${stamp}`;
    const staged: string[] = [];
    const replaced: Array<{ target: string; backup: string | null }> = [];

    try {
      for (const file of files) {
        const tempPath = join(dir, file.target + suffix);
        staged.push(tempPath);
        await writeFile(tempPath, file.content, 'utf-8');
        throwIfCancelled(signal, 'publish');
      }

      for (const file of files) {
        const target = join(dir, file.target);
        const backup = (await keepPrevious(target, target + backupSuffix)) ? target + backupSuffix : null;
        await rename(join(dir, file.target + suffix), target);
        replaced.push({ target, backup });
      }
    } catch (error) {
      for (const { target, backup } of replaced.reverse()) {
        if (backup) {
          await rename(backup, target);
        } else {
          await rm(target, { force: true });
        }
      }
      await Promise.all(
        [...staged, ...files.map((file) => join(dir, file.target + backupSuffix))].map((path) => rm(path, { force: true }))
      );
      throw error;
    }

    await Promise.all(replaced.map(({ backup }) => (backup ? rm(backup, { force: true }) : undefined)));
    const written = replaced.map(({ target }) => target);

    this.logger.info({ outDir: dir, files: written.length }, 'artifacts published');
    return written;
  }
}

/**
 * Hard-link the current target to the backup name. False when there is no
 * previous file.
 */
async function keepPrevious(target: string, backup: string): Promise<boolean> {
  try {
    await link(target, backup);
    return true;
  } catch (error) {
    if ((error as NodeJS.ErrnoException).code === 'ENOENT') {
      return false;
    }
    throw error;
  }
}

function toJson(value: unknown): string {
  return `${JSON.stringify(value, null, 2)}\n`;
}
