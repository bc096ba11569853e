/**
 * mpv-backed media engine.
 *
 * One mpv process per loaded track, controlled through mpv's JSON IPC
 * socket: newline-delimited JSON commands correlated by `request_id`,
 * interleaved with unsolicited `event` messages.
 */

import { type ChildProcess, execFile, spawn } from 'node:child_process';
import { randomUUID } from 'node:crypto';
import { rm } from 'node:fs/promises';
import { createConnection, type Socket } from 'node:net';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { promisify } from 'node:util';
import { z } from 'zod';
import { AudioError, errorMessage } from '../../utils/errors.js';
import { logger } from '../../utils/logger.js';
import { SUPPORTED_EXTENSIONS } from '../library/scanner.js';
import type {
  EngineDiagnostics,
  MediaEngine,
  OpenOptions,
  PlaybackHandle,
} from './engine.js';

const execFileAsync = promisify(execFile);

const CONNECT_RETRY_MS = 50;

const MpvMessageCodec = z
  .object({
    request_id: z.number().optional(),
    error: z.string().optional(),
    data: z.unknown().optional(),
    event: z.string().optional(),
  })
  .passthrough();
type MpvMessage = z.infer<typeof MpvMessageCodec>;

interface Pending {
  resolve: (data: unknown) => void;
  reject: (error: Error) => void;
}

export interface MpvEngineOptions {
  binary?: string;
  connectTimeoutMs?: number;
}

function createIpcPath(): string {
  const id = randomUUID();
  return process.platform === 'win32'
    ? `\\\\.\\pipe\\local-audio-mcp-${id}`
    : join(tmpdir(), `local-audio-mcp-${id}.sock`);
}

function parseMessage(line: string): MpvMessage | null {
  try {
    const parsed = MpvMessageCodec.safeParse(JSON.parse(line));
    return parsed.success ? parsed.data : null;
  } catch {
    void logger.debug('mpv', { message: 'Ignoring non-JSON IPC line', line });
    return null;
  }
}

function delay(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

function connectOnce(socketPath: string): Promise<Socket> {
  return new Promise((resolve, reject) => {
    const socket = createConnection(socketPath);
    socket.once('connect', () => {
      socket.removeAllListeners('error');
      resolve(socket);
    });
    socket.once('error', (error) => {
      socket.destroy();
      reject(error);
    });
  });
}

class MpvHandle implements PlaybackHandle {
  private readonly pending = new Map<number, Pending>();
  private nextRequestId = 1;
  private buffer = '';
  private finished = false;
  private released = false;

  constructor(
    private readonly child: ChildProcess,
    private readonly socket: Socket,
    private readonly socketPath: string,
  ) {
    socket.setEncoding('utf8');
    socket.on('data', (chunk: string) => this.onData(chunk));
    socket.on('error', (error) => {
      void logger.warning('mpv', { message: 'IPC socket error', error: error.message });
    });
    socket.on('close', () => this.fail(new Error('mpv IPC connection closed')));
    child.once('exit', (code, signal) => {
      this.finished = true;
      void logger.debug('mpv', { message: 'mpv exited', code, signal });
      this.fail(new Error('mpv exited'));
    });
  }

  get ended(): boolean {
    return this.finished;
  }

  private onData(chunk: string): void {
    this.buffer += chunk;
    let newline = this.buffer.indexOf('\n');
    while (newline >= 0) {
      const line = this.buffer.slice(0, newline).trim();
      this.buffer = this.buffer.slice(newline + 1);
      if (line) {
        const message = parseMessage(line);
        if (message) {
          this.dispatch(message);
        }
      }
      newline = this.buffer.indexOf('\n');
    }
  }

  private dispatch(message: MpvMessage): void {
    if (message.event === 'end-file') {
      this.finished = true;
      return;
    }
    if (typeof message.request_id !== 'number') {
      return;
    }
    const waiter = this.pending.get(message.request_id);
    if (!waiter) {
      return;
    }
    this.pending.delete(message.request_id);
    if (message.error && message.error !== 'success') {
      waiter.reject(new Error(`mpv: ${message.error}`));
    } else {
      waiter.resolve(message.data);
    }
  }

  private fail(error: Error): void {
    for (const waiter of this.pending.values()) {
      waiter.reject(error);
    }
    this.pending.clear();
  }

  private command(args: unknown[]): Promise<unknown> {
    if (this.released || this.socket.destroyed) {
      return Promise.reject(
        new AudioError('EngineUnavailable', 'The media player is no longer running'),
      );
    }
    const requestId = this.nextRequestId++;
    return new Promise((resolve, reject) => {
      this.pending.set(requestId, { resolve, reject });
      this.socket.write(`${JSON.stringify({ command: args, request_id: requestId })}\n`);
    });
  }

  async pause(): Promise<void> {
    await this.command(['set_property', 'pause', true]);
  }

  async resume(): Promise<void> {
    await this.command(['set_property', 'pause', false]);
  }

  async seek(seconds: number): Promise<void> {
    await this.command(['seek', seconds, 'absolute']);
  }

  async setVolume(percent: number): Promise<void> {
    await this.command(['set_property', 'volume', percent]);
  }

  async position(): Promise<number> {
    const data = await this.command(['get_property', 'time-pos']);
    return typeof data === 'number' ? data : 0;
  }

  async duration(): Promise<number | null> {
    try {
      const data = await this.command(['get_property', 'duration']);
      return typeof data === 'number' && data > 0 ? data : null;
    } catch (error) {
      // mpv answers "property unavailable" until the demuxer knows the length
      if (errorMessage(error).includes('property unavailable')) {
        return null;
      }
      throw error;
    }
  }

  async seekable(): Promise<boolean> {
    const data = await this.command(['get_property', 'seekable']);
    return data === true;
  }

  async release(): Promise<void> {
    if (this.released) {
      return;
    }
    try {
      await Promise.race([this.command(['quit']), delay(500)]);
    } catch (error) {
      void logger.debug('mpv', {
        message: 'quit command not acknowledged',
        error: errorMessage(error),
      });
    }
    this.released = true;
    this.finished = true;
    this.socket.destroy();
    if (this.child.exitCode === null && this.child.signalCode === null) {
      this.child.kill();
    }
    if (process.platform !== 'win32') {
      await rm(this.socketPath, { force: true });
    }
  }
}

export class MpvEngine implements MediaEngine {
  private readonly binary: string;
  private readonly connectTimeoutMs: number;

  constructor(options: MpvEngineOptions = {}) {
    this.binary = options.binary ?? 'mpv';
    this.connectTimeoutMs = options.connectTimeoutMs ?? 3000;
  }

  async open(filePath: string, options: OpenOptions): Promise<PlaybackHandle> {
    const socketPath = createIpcPath();
    const child = spawn(
      this.binary,
      [
        '--no-video',
        '--no-terminal',
        '--idle=no',
        `--input-ipc-server=${socketPath}`,
        `--volume=${Math.round(options.volume)}`,
        '--',
        filePath,
      ],
      { stdio: 'ignore' },
    );

    try {
      await new Promise<void>((resolve, reject) => {
        child.once('spawn', () => resolve());
        child.once('error', reject);
      });
    } catch (error) {
      throw new AudioError(
        'EngineUnavailable',
        `Could not start ${this.binary}: ${errorMessage(error)}`,
        { binary: this.binary },
      );
    }

    try {
      const socket = await this.connect(socketPath, child);
      void logger.debug('mpv', { message: 'Connected to mpv', pid: child.pid, filePath });
      return new MpvHandle(child, socket, socketPath);
    } catch (error) {
      child.kill();
      throw new AudioError(
        'EngineUnavailable',
        `mpv did not open its control socket: ${errorMessage(error)}`,
        { binary: this.binary, socketPath },
      );
    }
  }

  private async connect(socketPath: string, child: ChildProcess): Promise<Socket> {
    const deadline = Date.now() + this.connectTimeoutMs;
    let lastError: unknown = new Error('timed out');
    while (Date.now() < deadline) {
      if (child.exitCode !== null) {
        throw new Error(`mpv exited with code ${child.exitCode}`);
      }
      try {
        return await connectOnce(socketPath);
      } catch (error) {
        lastError = error;
        await delay(CONNECT_RETRY_MS);
      }
    }
    throw lastError;
  }

  async diagnose(): Promise<EngineDiagnostics> {
    const report: EngineDiagnostics = {
      engine: 'mpv',
      available: false,
      version: null,
      binary: this.binary,
      supportedFormats: [...SUPPORTED_EXTENSIONS].map((ext) => ext.slice(1)),
      errors: [],
    };
    try {
      const { stdout } = await execFileAsync(this.binary, ['--version'], { timeout: 5000 });
      const firstLine = stdout.split('\n')[0] ?? '';
      report.version = /^mpv\s+(\S+)/.exec(firstLine)?.[1] ?? (firstLine.trim() || null);
      report.available = true;
    } catch (error) {
      report.errors.push(`mpv not available: ${errorMessage(error)}`);
    }
    return report;
  }
}
