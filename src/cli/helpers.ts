import { ConfigError, errorMessage } from "../types/errors";
import { c } from "./colors";

export const EXIT_OK = 0;
export const EXIT_FAILURES = 1;
export const EXIT_FATAL = 2;

export function handleFatal(error: unknown): void {
  const label = error instanceof ConfigError ? "Configuration error" : "Sync aborted";
  console.error(`${c.error(label)} ${errorMessage(error)}`);
  process.exitCode = EXIT_FATAL;
}

export function parseCount(value: string | undefined, fallback: number): number {
  const parsed = Number.parseInt(value ?? "", 10);
  return Number.isFinite(parsed) && parsed > 0 ? parsed : fallback;
}
