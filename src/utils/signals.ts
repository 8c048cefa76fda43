import { constants } from "node:os";

export type ShutdownSignal = "SIGINT" | "SIGTERM";

/** Conventional shell exit status for a process ended by `signal`: 128 + its number. */
export function exitCodeForSignal(signal: ShutdownSignal): number {
  return 128 + constants.signals[signal];
}
