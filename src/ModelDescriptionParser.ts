import * as fs from 'fs';
import { NodeArena, freeElement } from './Ast';
import { ParserConfig, loadConfig } from './Config';
import { ConsoleDiagnostics, DiagnosticsSink } from './Diagnostics';
import { ModelDescription } from './ModelDescription';
import { ReductionProfiler } from './Profiler';
import { BuildError, OK, Result, fail } from './Result';
import { TreeBuilder } from './TreeBuilder';
import { validate } from './Validator';
import { XmlTokenizer } from './XmlTokenizer';

export interface ParserOptions {
  /** Where diagnostics go; defaults to the console, filtered by FMIMD_LOG_LEVEL. */
  diagnostics?: DiagnosticsSink;
  /** Allocation owner of every node built; one is created when omitted. */
  arena?: NodeArena;
  chunkSize?: number;
  profile?: boolean;
  /** Environment the defaults are read from. */
  env?: NodeJS.ProcessEnv;
}

/**
 * Parser for FMI 1.0 model descriptions. Each call to `parseFile` or
 * `parseString` runs with its own tokenizer and tree builder, so parses do
 * not share mutable state.
 */
export class ModelDescriptionParser {
  private readonly config: ParserConfig;
  private readonly diagnostics: DiagnosticsSink;
  public readonly arena: NodeArena;
  private lastBuildError: BuildError | null = null;

  constructor(options: ParserOptions = {}) {
    const fromEnv = loadConfig(options.env);
    this.config = {
      chunkSize: options.chunkSize && options.chunkSize > 0 ? options.chunkSize : fromEnv.chunkSize,
      logLevel: fromEnv.logLevel,
      profile: options.profile ?? fromEnv.profile
    };
    this.diagnostics = options.diagnostics ?? new ConsoleDiagnostics(this.config.logLevel);
    this.arena = options.arena ?? new NodeArena();
  }

  /** Error that made the last parse fail, if it failed while building. */
  public get lastError(): BuildError | null {
    return this.lastBuildError;
  }

  /**
   * Parse the model description stored at `xmlPath`.
   * @returns the validated model, or null on any failure
   */
  public parseFile(xmlPath: string): ModelDescription | null {
    this.lastBuildError = null;
    const tokenizer = new XmlTokenizer();
    const read = this.readChunks(xmlPath, tokenizer);
    if (!read.ok) {
      this.lastBuildError = read.error;
      this.diagnostics.notify('error', read.error.message);
      return null;
    }
    this.diagnostics.notify('info', `parse ${xmlPath}`);
    return this.run(tokenizer, xmlPath);
  }

  public parseString(xml: string, source: string = '<string>'): ModelDescription | null {
    this.lastBuildError = null;
    const tokenizer = new XmlTokenizer();
    tokenizer.feed(xml);
    return this.run(tokenizer, source);
  }

  private readChunks(xmlPath: string, tokenizer: XmlTokenizer): Result<void> {
    let fd: number;
    try {
      fd = fs.openSync(xmlPath, 'r');
    } catch {
      return fail('io', `Cannot open file '${xmlPath}'`);
    }
    try {
      const buffer = Buffer.alloc(this.config.chunkSize);
      for (;;) {
        const n = fs.readSync(fd, buffer, 0, buffer.length, null);
        if (n === 0) break;
        tokenizer.feed(Buffer.from(buffer.subarray(0, n)));
      }
      return OK;
    } catch (error) {
      return fail('io', `Cannot read file '${xmlPath}': ${error instanceof Error ? error.message : String(error)}`);
    } finally {
      fs.closeSync(fd);
    }
  }

  private run(tokenizer: XmlTokenizer, source: string): ModelDescription | null {
    const profiler = this.config.profile ? new ReductionProfiler() : undefined;
    const builder = new TreeBuilder(this.arena, profiler);
    const events = tokenizer.run(builder);
    const built = events.ok ? builder.finish() : events;
    if (profiler) profiler.print(source);

    if (!built.ok) {
      this.lastBuildError = built.error;
      this.report(built.error, source);
      builder.abort();
      return null;
    }

    const md = validate(built.value, this.diagnostics);
    if (!md) {
      freeElement(built.value, this.arena);
      return null;
    }
    return new ModelDescription(md, this.arena);
  }

  private report(error: BuildError, source: string): void {
    if (error.kind === 'syntax') {
      this.diagnostics.notify('error', `Parse error in file ${source} at line ${error.line ?? 0}:\n${error.message}`);
      return;
    }
    const where = error.line ? ` (${source}, line ${error.line})` : ` (${source})`;
    this.diagnostics.notify('fatal', error.message + where);
  }
}

/**
 * Parse a model description file with a fresh parser.
 */
export function parse(xmlPath: string, options: ParserOptions = {}): ModelDescription | null {
  return new ModelDescriptionParser(options).parseFile(xmlPath);
}

export function parseString(xml: string, options: ParserOptions = {}): ModelDescription | null {
  return new ModelDescriptionParser(options).parseString(xml);
}
