import { spawn, type ChildProcess } from "node:child_process";
import type { Logger } from "../../utils/logger.js";
import { FramingError, LaunchError, TimeoutError, TransportClosedError } from "../errors.js";
import { createFrameDecoder, encodeFrame, type FrameDecoder } from "./framing.js";
import type { FramingMode, LaunchDescriptor, ReceivedFrame, Transport } from "./types.js";

export interface StdioTransportOptions {
  framing?: FramingMode;
  /** How long to wait after SIGTERM before SIGKILL. */
  closeGraceMs?: number;
}

interface Waiter {
  resolve: (frame: ReceivedFrame) => void;
  reject: (err: Error) => void;
  timer?: ReturnType<typeof setTimeout>;
}

const DEFAULT_CLOSE_GRACE_MS = 2_000;

/**
 * Transport over a spawned child process's stdin/stdout.
 * stderr is forwarded to the debug log line by line.
 */
export class StdioTransport implements Transport {
  private child: ChildProcess | null = null;
  private readonly framing: FramingMode;
  private readonly closeGraceMs: number;
  private readonly decoder: FrameDecoder;
  private readonly logger: Logger;

  private inbox: string[] = [];
  private waiters: Waiter[] = [];
  private streamError: FramingError | null = null;

  private exited = false;
  private ended = false;
  private exitInfo: { exitCode: number | null; signal: string | null } = {
    exitCode: null,
    signal: null,
  };
  private exitListeners: Array<() => void> = [];
  private closing: Promise<void> | null = null;
  private stderrTail = "";

  constructor(logger: Logger, options: StdioTransportOptions = {}) {
    this.framing = options.framing ?? "newline";
    this.closeGraceMs = options.closeGraceMs ?? DEFAULT_CLOSE_GRACE_MS;
    this.decoder = createFrameDecoder(this.framing);
    this.logger = logger.child({ component: "stdio-transport" });
  }

  async open(descriptor: LaunchDescriptor): Promise<void> {
    if (this.child) {
      throw new TransportClosedError("Transport has already been opened");
    }

    const child = spawn(descriptor.command, descriptor.args ?? [], {
      cwd: descriptor.cwd,
      env: { ...process.env, ...descriptor.env },
      stdio: ["pipe", "pipe", "pipe"],
    });
    this.child = child;

    child.stdout?.on("data", (chunk: Buffer) => this.handleData(chunk));
    child.stderr?.on("data", (chunk: Buffer) => this.handleStderr(chunk));
    child.stdin?.on("error", (err) => {
      // EPIPE after the server exits; the exit path reports the failure.
      this.logger.debug({ error: err }, "Server stdin error");
    });
    child.on("error", (err) => {
      this.logger.debug({ error: err, command: descriptor.command }, "Server process error");
      this.markExited();
    });
    child.on("exit", (code, signal) => {
      this.exitInfo = { exitCode: code, signal };
      this.markExited();
    });
    child.on("close", (code, signal) => {
      this.exitInfo = { exitCode: code ?? this.exitInfo.exitCode, signal: signal ?? this.exitInfo.signal };
      this.markExited();
      this.markEnded();
    });

    await new Promise<void>((resolve, reject) => {
      const onSpawn = () => {
        child.off("error", onError);
        resolve();
      };
      const onError = (err: Error) => {
        child.off("spawn", onSpawn);
        reject(new LaunchError(descriptor.command, err));
      };
      child.once("spawn", onSpawn);
      child.once("error", onError);
    });

    this.logger.debug(
      { command: descriptor.command, args: descriptor.args ?? [], pid: child.pid, framing: this.framing },
      "Server process started"
    );
  }

  isAlive(): boolean {
    return this.child !== null && !this.exited;
  }

  async send(message: string): Promise<void> {
    const stdin = this.child?.stdin;
    if (!this.isAlive() || !stdin || !stdin.writable) {
      throw new TransportClosedError();
    }

    const frame = encodeFrame(this.framing, message);
    await new Promise<void>((resolve, reject) => {
      stdin.write(frame, (err) => {
        if (err) {
          reject(new TransportClosedError(`Write failed: ${err.message}`, err));
        } else {
          resolve();
        }
      });
    });
  }

  receive(timeoutMs?: number): Promise<ReceivedFrame> {
    const next = this.inbox.shift();
    if (next !== undefined) {
      return Promise.resolve({ type: "message", payload: next });
    }
    if (this.streamError) {
      return Promise.reject(this.streamError);
    }
    if (!this.child) {
      return Promise.reject(new TransportClosedError("Transport has not been opened"));
    }
    if (this.ended) {
      return Promise.resolve(this.eofFrame());
    }

    return new Promise<ReceivedFrame>((resolve, reject) => {
      const waiter: Waiter = { resolve, reject };
      if (timeoutMs !== undefined) {
        waiter.timer = setTimeout(() => {
          this.waiters = this.waiters.filter((w) => w !== waiter);
          reject(new TimeoutError("receive", timeoutMs));
        }, timeoutMs);
      }
      this.waiters.push(waiter);
    });
  }

  close(): Promise<void> {
    if (!this.closing) {
      this.closing = this.terminate();
    }
    return this.closing;
  }

  private async terminate(): Promise<void> {
    const child = this.child;

    if (child && !this.exited) {
      child.stdin?.end();
      child.kill("SIGTERM");

      const exitedGracefully = await this.waitForExit(this.closeGraceMs);
      if (!exitedGracefully) {
        this.logger.warn(
          { pid: child.pid, graceMs: this.closeGraceMs },
          "Server did not exit after SIGTERM, sending SIGKILL"
        );
        child.kill("SIGKILL");
        await this.waitForExit();
      }
    }

    if (child) {
      child.stdout?.removeAllListeners("data");
      child.stderr?.removeAllListeners("data");
      child.stdout?.destroy();
      child.stderr?.destroy();
    }
    this.flushStderr();
    this.markEnded();
  }

  private waitForExit(timeoutMs?: number): Promise<boolean> {
    if (this.exited) return Promise.resolve(true);

    return new Promise<boolean>((resolve) => {
      let timer: ReturnType<typeof setTimeout> | undefined;
      const listener = () => {
        if (timer) clearTimeout(timer);
        resolve(true);
      };
      this.exitListeners.push(listener);
      if (timeoutMs !== undefined) {
        timer = setTimeout(() => {
          this.exitListeners = this.exitListeners.filter((l) => l !== listener);
          resolve(false);
        }, timeoutMs);
      }
    });
  }

  private handleData(chunk: Buffer): void {
    let frames: string[];
    try {
      frames = this.decoder.push(chunk);
    } catch (err) {
      if (!(err instanceof FramingError)) throw err;
      this.logger.error({ error: err }, "Inbound stream can no longer be framed");
      this.streamError = err;
      this.rejectWaiters(err);
      return;
    }

    for (const payload of frames) {
      const waiter = this.waiters.shift();
      if (waiter) {
        if (waiter.timer) clearTimeout(waiter.timer);
        waiter.resolve({ type: "message", payload });
      } else {
        this.inbox.push(payload);
      }
    }
  }

  private handleStderr(chunk: Buffer): void {
    const text = this.stderrTail + chunk.toString("utf-8");
    const lines = text.split("\n");
    this.stderrTail = lines.pop() ?? "";
    for (const line of lines) {
      if (line.trim()) this.logger.debug({ stderr: line }, "Server stderr");
    }
  }

  private flushStderr(): void {
    if (this.stderrTail.trim()) {
      this.logger.debug({ stderr: this.stderrTail }, "Server stderr");
    }
    this.stderrTail = "";
  }

  private markExited(): void {
    if (this.exited) return;
    this.exited = true;
    const listeners = this.exitListeners;
    this.exitListeners = [];
    for (const listener of listeners) listener();
  }

  private markEnded(): void {
    if (this.ended) return;
    this.ended = true;
    if (this.decoder.buffered > 0) {
      this.logger.debug({ bytes: this.decoder.buffered }, "Discarding partial frame at end of stream");
    }
    const waiters = this.waiters;
    this.waiters = [];
    for (const waiter of waiters) {
      if (waiter.timer) clearTimeout(waiter.timer);
      waiter.resolve(this.eofFrame());
    }
  }

  private rejectWaiters(err: Error): void {
    const waiters = this.waiters;
    this.waiters = [];
    for (const waiter of waiters) {
      if (waiter.timer) clearTimeout(waiter.timer);
      waiter.reject(err);
    }
  }

  private eofFrame(): ReceivedFrame {
    return { type: "eof", exitCode: this.exitInfo.exitCode, signal: this.exitInfo.signal };
  }
}
