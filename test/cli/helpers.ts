import { vi } from 'vitest';

/** Thrown by the stubbed process.exit so a command stops where it would exit. */
export class ExitCalled extends Error {
  constructor(readonly code: number | string | null | undefined) {
    super(`process.exit(${String(code)})`);
  }
}

/**
 * Capture console output and turn process.exit into a throw.
 */
export function captureCli() {
  const log = vi.spyOn(console, 'log').mockImplementation(() => {});
  const error = vi.spyOn(console, 'error').mockImplementation(() => {});
  const exit = vi.spyOn(process, 'exit').mockImplementation((code?: number | string | null): never => {
    throw new ExitCalled(code);
  });

  return {
    exit,
    /** Everything printed to stdout, one entry per console.log call. */
    stdout: (): string[] => log.mock.calls.map((args) => args.map(String).join(' ')),
    stderr: (): string[] => error.mock.calls.map((args) => args.map(String).join(' ')),
  };
}

export type CliCapture = ReturnType<typeof captureCli>;
