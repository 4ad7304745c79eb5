/**
 * Log collector
 * One append-only log file per execution, all inside a private temporary directory
 * that is removed when the run ends.
 */

import { createWriteStream, promises as fs, type WriteStream } from 'node:fs';
import { once } from 'node:events';
import os from 'node:os';
import path from 'node:path';
import type { Readable } from 'node:stream';
import type { Project } from '../types/project.js';

/**
 * An open log sink for one execution
 */
export interface LogSink {
  readonly path: string;
  readonly stream: WriteStream;
  /** Streams piped into this sink */
  readonly sources: Readable[];
  /** First write error, if capture failed */
  error?: Error;
}

/**
 * Turn a project name into a safe file name fragment
 */
function slugify(name: string): string {
  return name.replace(/[^a-zA-Z0-9._-]+/g, '-').replace(/^-+|-+$/g, '') || 'project';
}

async function closeSink(sink: LogSink): Promise<void> {
  for (const source of sink.sources) {
    source.unpipe(sink.stream);
  }
  sink.sources.length = 0;

  const { stream } = sink;
  if (stream.closed) return;
  if (!stream.writableEnded) {
    stream.end();
  }
  try {
    await once(stream, 'close');
  } catch (error) {
    sink.error ??= error instanceof Error ? error : new Error(String(error));
  }
}

export class LogCollector {
  private readonly dir: string;
  private readonly sinks = new Map<string, LogSink>();
  private disposed = false;

  private constructor(dir: string) {
    this.dir = dir;
  }

  /**
   * Allocate the temporary log directory
   *
   * @param prefix - Directory name prefix under the OS temp dir
   */
  static async create(prefix: string = 'testfleet-'): Promise<LogCollector> {
    const dir = await fs.mkdtemp(path.join(os.tmpdir(), prefix));
    return new LogCollector(dir);
  }

  get directory(): string {
    return this.dir;
  }

  get isDisposed(): boolean {
    return this.disposed;
  }

  /**
   * Open the sink for a project. Each project gets exactly one sink.
   *
   * @param project - Project the sink belongs to
   */
  open(project: Project): LogSink {
    if (this.disposed) {
      throw new Error('LogCollector has been disposed');
    }
    if (this.sinks.has(project.path)) {
      throw new Error(`Log sink already open for ${project.name}`);
    }

    const filePath = path.join(this.dir, `${this.sinks.size + 1}-${slugify(project.name)}.log`);
    const sink: LogSink = {
      path: filePath,
      stream: createWriteStream(filePath, { flags: 'a' }),
      sources: [],
    };
    sink.stream.on('error', (error) => {
      sink.error ??= error;
    });
    this.sinks.set(project.path, sink);
    return sink;
  }

  /**
   * Pipe a process stream into a project's sink. The sink stays open when the source ends.
   *
   * @param project - Project that owns the sink
   * @param source - stdout or stderr of the project's process
   */
  attach(project: Project, source: Readable): void {
    const sink = this.sinks.get(project.path);
    if (!sink) {
      throw new Error(`No log sink open for ${project.name}`);
    }
    sink.sources.push(source);
    source.pipe(sink.stream, { end: false });
  }

  /**
   * Append a line written by the orchestrator itself (e.g. a spawn error)
   */
  note(project: Project, line: string): void {
    const sink = this.sinks.get(project.path);
    if (sink && !sink.stream.writableEnded) {
      sink.stream.write(`${line}\n`);
    }
  }

  /**
   * Close a project's sink and return everything it captured
   *
   * @param project - Project whose log to read
   * @returns Full log content, or an empty string if nothing was captured
   */
  async read(project: Project): Promise<string> {
    const sink = this.sinks.get(project.path);
    if (!sink) return '';

    await closeSink(sink);
    let content = '';
    try {
      content = await fs.readFile(sink.path, 'utf-8');
    } catch (error) {
      sink.error ??= error instanceof Error ? error : new Error(String(error));
    }
    if (sink.error) {
      content += `${content && !content.endsWith('\n') ? '\n' : ''}[log capture failed: ${sink.error.message}]\n`;
    }
    return content;
  }

  /**
   * Close every sink and remove the temporary directory. Safe to call more than once.
   */
  async dispose(): Promise<void> {
    if (this.disposed) return;
    this.disposed = true;

    await Promise.all(
      Array.from(this.sinks.values(), (sink) => closeSink(sink))
    );
    this.sinks.clear();
    await fs.rm(this.dir, { recursive: true, force: true });
  }
}
