import { destination as pinoDestination, pino, type DestinationStream, type Logger } from "pino";

export type { Logger };

const IS_TEST = process.env.NODE_ENV === "test" || Boolean(process.env.VITEST);

const SECRET_KEYS = [
  "password",
  "passwd",
  "secret",
  "token",
  "apiKey",
  "apikey",
  "api_key",
  "credential",
  "credentials",
  "privateKey",
  "private_key",
];

/**
 * Paths pino censors in every record. Event payloads are logged under `data`
 * and have already been through `redactEventData`; these catch direct logging.
 */
export const REDACT_PATHS = SECRET_KEYS.flatMap((key) => [
  key,
  `data.${key}`,
  `data.*.${key}`,
  `settings.${key}`,
  `settings.*.${key}`,
]);

/**
 * JSON logger on stderr, so stdout stays for command output.
 * Level comes from the caller, then STRATA_LOG_LEVEL; tests run silent unless
 * they pass their own destination.
 */
export function createLogger(name: string, level?: string, destination?: DestinationStream): Logger {
  const silent = IS_TEST && destination === undefined;
  return pino(
    {
      name,
      level: silent ? "silent" : (level ?? process.env.STRATA_LOG_LEVEL ?? "info"),
      redact: { paths: REDACT_PATHS, censor: "[REDACTED]" },
    },
    destination ?? pinoDestination(2),
  );
}
