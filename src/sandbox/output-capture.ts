/**
 * Console capture for sandboxed runs.
 *
 * Each stream keeps its first `head` and last `tail` characters. When more
 * was written, the middle is replaced by a marker naming how much was
 * dropped, so a chatty workflow cannot grow host memory without bound.
 */

import { ExecutionLogs } from '../domain/execution';

export type OutputStream = 'stdout' | 'stderr';

export interface TruncateConfig {
  maxChars: number;
  head: number;
  tail: number;
}

/** 64 KiB per stream. */
export const DEFAULT_OUTPUT_LIMIT = 64 * 1024;

/** Lines of stack trace kept on failed runs. */
export const DEFAULT_TRACE_LINES = 20;

export function truncateConfigFor(maxChars: number): TruncateConfig {
  const head = Math.floor(maxChars / 2);
  return { maxChars, head, tail: maxChars - head };
}

class StreamBuffer {
  private head = '';
  private tail = '';
  private total = 0;

  constructor(private readonly config: TruncateConfig) {}

  append(text: string): void {
    this.total += text.length;
    let rest = text;
    if (this.head.length < this.config.head) {
      const room = this.config.head - this.head.length;
      this.head += rest.slice(0, room);
      rest = rest.slice(room);
    }
    if (rest.length > 0) {
      this.tail = this.config.tail > 0 ? (this.tail + rest).slice(-this.config.tail) : '';
    }
  }

  get truncated(): boolean {
    return this.total > this.head.length + this.tail.length;
  }

  toString(): string {
    const dropped = this.total - this.head.length - this.tail.length;
    if (dropped <= 0) return this.head + this.tail;
    return `${this.head}\n\n[... truncated ${dropped} characters ...]\n\n${this.tail}`;
  }
}

export class OutputCapture {
  private readonly streams: Record<OutputStream, StreamBuffer>;
  private closed = false;

  constructor(maxCharsPerStream: number = DEFAULT_OUTPUT_LIMIT) {
    const config = truncateConfigFor(maxCharsPerStream);
    this.streams = { stdout: new StreamBuffer(config), stderr: new StreamBuffer(config) };
  }

  /** Append one console line. Ignored once the run has been finalized. */
  write(stream: OutputStream, line: string): void {
    if (this.closed) return;
    this.streams[stream].append(`${line}\n`);
  }

  /** Stop accepting output; late writes from abandoned code are dropped. */
  close(): void {
    this.closed = true;
  }

  get truncated(): boolean {
    return this.streams.stdout.truncated || this.streams.stderr.truncated;
  }

  snapshot(): ExecutionLogs {
    return { stdout: this.streams.stdout.toString(), stderr: this.streams.stderr.toString() };
  }
}

/** Keep the first `maxLines` lines of a stack trace. */
export function truncateTrace(trace: string, maxLines: number = DEFAULT_TRACE_LINES): string {
  const lines = trace.split('\n');
  if (lines.length <= maxLines) return trace;
  return [...lines.slice(0, maxLines), `    ... ${lines.length - maxLines} more lines`].join('\n');
}
