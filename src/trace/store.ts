import { createHash } from 'node:crypto';
import { existsSync, mkdirSync, readdirSync, readFileSync, rmSync, writeFileSync } from 'node:fs';
import { join, resolve } from 'node:path';
import { z } from 'zod';
import { normalizePath } from '../analyzer/function-key.js';
import { TraceFormatError } from '../analyzer/errors.js';
import type { TraceArtifact } from '../analyzer/types.js';
import { writeArtifact } from './artifact.js';
import { NodeTraceRunner, type TraceRunner } from './runner.js';
import {
  coverageFileSchema,
  cpuProfileSchema,
  decodeV8Trace,
  type RawTrace,
  type SourceReader,
} from './v8-decoder.js';

const CATALOG_FILE = 'catalog.json';
const TRACES_DIR = 'traces';
const SCRATCH_DIR = 'tmp';

const catalogSchema = z.record(z.string());

/** Script path -> artifact path */
export type Catalog = Record<string, string>;

export interface TraceStoreOptions {
  /** Directory holding the catalog and the trace artifacts */
  baseDir: string;
  runner?: TraceRunner;
  /** Directory relative script paths are resolved against */
  cwd?: string;
}

export interface RecordOptions {
  args?: string[];
  nodeArgs?: string[];
}

export interface RecordResult {
  script: string;
  artifactPath: string;
  artifact: TraceArtifact;
}

/** Artifact file name for a script: the SHA-256 of its absolute path */
export function traceHash(absoluteScriptPath: string): string {
  return createHash('sha256').update(absoluteScriptPath).digest('hex');
}

const readSourceFile: SourceReader = (path) =>
  existsSync(path) ? readFileSync(path, 'utf-8') : null;

/**
 * Persistent cache of execution traces, one artifact per script path.
 *
 * The store is the only writer of its directory. The catalog is
 * read-modify-written as a whole, so two concurrent `record` calls can
 * lose an update; the tool assumes a single writer.
 */
export class TraceStore {
  readonly baseDir: string;
  private runner: TraceRunner;
  private cwd: string;

  constructor(options: TraceStoreOptions) {
    this.cwd = options.cwd ?? process.cwd();
    this.baseDir = resolve(this.cwd, options.baseDir);
    this.runner = options.runner ?? new NodeTraceRunner();
  }

  get catalogPath(): string {
    return join(this.baseDir, CATALOG_FILE);
  }

  get tracesDir(): string {
    return join(this.baseDir, TRACES_DIR);
  }

  /** Deterministic artifact location for a script, whether or not it exists */
  artifactPathFor(scriptPath: string): string {
    const script = normalizePath(scriptPath, this.cwd);
    return join(this.tracesDir, `${traceHash(script)}.json`);
  }

  /**
   * Run a script under tracing and store the result, replacing any earlier
   * trace of the same script. The script's exit status is recorded, never
   * raised.
   */
  async record(scriptPath: string, options: RecordOptions = {}): Promise<RecordResult> {
    const script = normalizePath(scriptPath, this.cwd);
    const hash = traceHash(script);
    const artifactPath = join(this.tracesDir, `${hash}.json`);

    const scratch = join(this.baseDir, SCRATCH_DIR, hash);
    const coverageDir = join(scratch, 'coverage');
    const profileDir = join(scratch, 'profile');
    rmSync(scratch, { recursive: true, force: true });
    mkdirSync(coverageDir, { recursive: true });
    mkdirSync(profileDir, { recursive: true });

    try {
      const startTime = Date.now();
      const result = await this.runner.run({
        script,
        args: options.args ?? [],
        nodeArgs: options.nodeArgs ?? [],
        coverageDir,
        profileDir,
        cwd: this.cwd,
      });
      const durationMs = Date.now() - startTime;

      const raw = collectRawTrace(coverageDir, profileDir);
      const artifact: TraceArtifact = {
        version: 1,
        script,
        recordedAt: new Date().toISOString(),
        exitCode: result.exitCode,
        durationMs,
        functions: decodeV8Trace(raw, readSourceFile),
      };

      mkdirSync(this.tracesDir, { recursive: true });
      writeArtifact(artifact, artifactPath);

      const catalog = this.readCatalog();
      catalog[script] = artifactPath;
      this.writeCatalog(catalog);

      return { script, artifactPath, artifact };
    } finally {
      rmSync(scratch, { recursive: true, force: true });
    }
  }

  /** Artifact path of the script's latest trace, or null when there is none */
  lookup(scriptPath: string): string | null {
    const script = normalizePath(scriptPath, this.cwd);
    const artifactPath = this.readCatalog()[script];
    if (artifactPath === undefined || !existsSync(artifactPath)) return null;
    return artifactPath;
  }

  /**
   * Delete every artifact in `traces/` and every artifact the catalog
   * references, then empty the catalog. Safe on an empty store; a corrupt
   * catalog is replaced.
   */
  clear(): void {
    for (const file of [...this.artifactFiles(), ...this.referencedArtifacts()]) {
      rmSync(file, { force: true });
    }
    rmSync(join(this.baseDir, SCRATCH_DIR), { recursive: true, force: true });
    this.writeCatalog({});
  }

  /** Traced script paths in catalog order */
  listEntries(): string[] {
    return Object.keys(this.readCatalog());
  }

  /** Every artifact on disk, including ones the catalog no longer references */
  artifactFiles(): string[] {
    if (!existsSync(this.tracesDir)) return [];
    return readdirSync(this.tracesDir)
      .filter(name => name.endsWith('.json'))
      .sort()
      .map(name => join(this.tracesDir, name));
  }

  readCatalog(): Catalog {
    if (!existsSync(this.catalogPath)) return {};

    const content = readFileSync(this.catalogPath, 'utf-8');
    let json: unknown;
    try {
      json = JSON.parse(content);
    } catch (err) {
      throw new TraceFormatError(this.catalogPath, err instanceof Error ? err.message : String(err));
    }

    const parsed = catalogSchema.safeParse(json);
    if (!parsed.success) {
      throw new TraceFormatError(this.catalogPath, 'expected an object of script paths to artifact paths');
    }
    return parsed.data;
  }

  private referencedArtifacts(): string[] {
    try {
      return Object.values(this.readCatalog());
    } catch (err) {
      if (err instanceof TraceFormatError) return [];
      throw err;
    }
  }

  /** Write the catalog with sorted keys */
  private writeCatalog(catalog: Catalog): void {
    const sorted: Catalog = {};
    for (const key of Object.keys(catalog).sort()) {
      sorted[key] = catalog[key];
    }
    mkdirSync(this.baseDir, { recursive: true });
    writeFileSync(this.catalogPath, JSON.stringify(sorted, null, 2), 'utf-8');
  }
}

/** Load whatever coverage and profile files the traced process wrote */
function collectRawTrace(coverageDir: string, profileDir: string): RawTrace {
  const coverage = readJsonFiles(coverageDir, '.json').map(({ file, json }) => {
    const parsed = coverageFileSchema.safeParse(json);
    if (!parsed.success) throw new TraceFormatError(file, 'not a V8 coverage file');
    return parsed.data;
  });

  const profiles = readJsonFiles(profileDir, '.cpuprofile').map(({ file, json }) => {
    const parsed = cpuProfileSchema.safeParse(json);
    if (!parsed.success) throw new TraceFormatError(file, 'not a V8 CPU profile');
    return parsed.data;
  });

  return { coverage, profiles };
}

function readJsonFiles(dir: string, extension: string): Array<{ file: string; json: unknown }> {
  if (!existsSync(dir)) return [];
  return readdirSync(dir)
    .filter(name => name.endsWith(extension))
    .sort()
    .map(name => {
      const file = join(dir, name);
      try {
        return { file, json: JSON.parse(readFileSync(file, 'utf-8')) };
      } catch (err) {
        throw new TraceFormatError(file, err instanceof Error ? err.message : String(err));
      }
    });
}
