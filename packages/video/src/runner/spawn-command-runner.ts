/**
 * Spawn Command Runner
 * Launches external tools with node:child_process and collects their output
 */

import { spawn } from 'node:child_process';
import { createChildLogger } from '@framegrab/shared';
import type {
  CommandInvocation,
  CommandResult,
  CommandRunner,
  OutputLineHandler,
  OutputStream,
} from '../types.js';

// Keep only the tail of long outputs (ffmpeg and yt-dlp can be chatty)
export const MAX_CAPTURED_CHARS = 64 * 1024;

// Progress output uses carriage returns as well as newlines
const LINE_BREAK = /\r\n|\r|\n/;

function appendCapped(buffer: string, chunk: string): string {
  const next = buffer + chunk;
  return next.length > MAX_CAPTURED_CHARS ? next.slice(next.length - MAX_CAPTURED_CHARS) : next;
}

/**
 * Accumulates one stream and hands complete lines to `emit`
 */
class StreamCapture {
  text = '';
  private pending = '';

  constructor(
    private readonly stream: OutputStream,
    private readonly emit: (line: string, stream: OutputStream) => void
  ) {}

  push(chunk: string): void {
    this.text = appendCapped(this.text, chunk);
    const lines = (this.pending + chunk).split(LINE_BREAK);
    this.pending = lines.pop() ?? '';
    for (const line of lines) {
      if (line.length > 0) this.emit(line, this.stream);
    }
  }

  flush(): void {
    if (this.pending.length > 0) {
      this.emit(this.pending, this.stream);
      this.pending = '';
    }
  }
}

export class SpawnCommandRunner implements CommandRunner {
  private logger = createChildLogger({ component: 'SpawnCommandRunner' });

  run(invocation: CommandInvocation, onOutputLine?: OutputLineHandler): Promise<CommandResult> {
    const startTime = Date.now();
    const { tool, command, args, env } = invocation;

    this.logger.debug({ tool, command, args }, 'Launching external tool');

    const emit = (line: string, stream: OutputStream) => {
      this.logger.debug({ tool, stream, line }, 'output');
      onOutputLine?.(line, stream);
    };

    return new Promise((resolve, reject) => {
      // No shell: arguments such as "bv*[ext=mp4]" must reach the tool verbatim
      const proc = spawn(command, args, {
        env: env ?? process.env,
        stdio: ['ignore', 'pipe', 'pipe'],
      });

      const stdout = new StreamCapture('stdout', emit);
      const stderr = new StreamCapture('stderr', emit);

      proc.stdout.on('data', (data: Buffer) => {
        stdout.push(data.toString());
      });

      proc.stderr.on('data', (data: Buffer) => {
        stderr.push(data.toString());
      });

      proc.on('close', (exitCode) => {
        stdout.flush();
        stderr.flush();
        const durationMs = Date.now() - startTime;
        this.logger.debug({ tool, exitCode, durationMs }, 'External tool exited');
        resolve({ exitCode, stdout: stdout.text, stderr: stderr.text, durationMs });
      });

      proc.on('error', (error) => {
        this.logger.error({ tool, command, err: error }, 'Failed to launch external tool');
        reject(error);
      });
    });
  }
}

/**
 * Last non-empty lines of a tool's stderr, for error messages
 */
export function stderrTail(stderr: string, lineCount = 5): string {
  return stderr
    .split(LINE_BREAK)
    .map((line) => line.trim())
    .filter((line) => line.length > 0)
    .slice(-lineCount)
    .join('\n');
}
