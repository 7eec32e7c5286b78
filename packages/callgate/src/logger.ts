import pino from "pino";
import pinoPretty from "pino-pretty";

const level =
  process.env.LOG_LEVEL ||
  (process.env.NODE_ENV === "development" ? "debug" : "info");
const usePretty =
  process.env.LOG_PRETTY === "1" || process.env.NODE_ENV === "development";

const prettyStream = usePretty
  ? pinoPretty({
      colorize: true,
      translateTime: "SYS:standard",
      destination: 2,
    })
  : undefined;

// stdout is reserved for CLI output; logs go to stderr.
export const logger = pino(
  {
    level,
    base: { name: "callgate" },
  },
  prettyStream ?? pino.destination(2),
);

export type Logger = pino.Logger;
