import { pino, type DestinationStream, type Logger } from "pino";

export type { Logger };

export function createLogger(
  level: string = "info",
  destination?: DestinationStream
): Logger {
  const options = {
    level,
    formatters: {
      level(label: string) {
        return { level: label };
      },
    },
    timestamp: pino.stdTimeFunctions.isoTime,
  };

  return destination ? pino(options, destination) : pino(options);
}
