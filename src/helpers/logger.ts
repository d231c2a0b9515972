import pinoLib from "pino";

/**
 * Per-module logger. Output goes to stderr so that command output on
 * stdout stays machine-readable.
 */
export function createLogger(name: string): pinoLib.Logger {
  return pinoLib(
    {
      level: process.env.LOG_LEVEL || "warn",
      name,
    },
    pinoLib.destination({ dest: 2, sync: true })
  );
}
