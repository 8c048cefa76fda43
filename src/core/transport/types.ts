/** How to start a tool server. Opaque to the core beyond spawning it. */
export interface LaunchDescriptor {
  command: string;
  args?: string[];
  cwd?: string;
  env?: Record<string, string>;
}

export type FramingMode = "newline" | "content-length";

export type ReceivedFrame =
  | { type: "message"; payload: string }
  | { type: "eof"; exitCode: number | null; signal: string | null };

/**
 * Byte-level delivery of discrete messages to and from one child process.
 * A transport has exactly one consumer of `receive()`.
 */
export interface Transport {
  open(descriptor: LaunchDescriptor): Promise<void>;
  send(message: string): Promise<void>;
  /** Rejects with TimeoutError when `timeoutMs` elapses first. */
  receive(timeoutMs?: number): Promise<ReceivedFrame>;
  close(): Promise<void>;
  isAlive(): boolean;
}

export type TransportFactory = (framing: FramingMode) => Transport;

/** Stable key for a descriptor: same command, args, cwd and env. */
export function descriptorKey(descriptor: LaunchDescriptor): string {
  const env = Object.entries(descriptor.env ?? {}).sort(([a], [b]) => a.localeCompare(b));
  return JSON.stringify([descriptor.command, descriptor.args ?? [], descriptor.cwd ?? null, env]);
}
