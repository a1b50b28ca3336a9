import * as winston from "winston";
import { config } from "../config";

function serializeErrors(_key: string, value: unknown): unknown {
  if (value instanceof Error) {
    return {
      ...value,
      name: value.name,
      message: value.message,
      stack: value.stack,
      cause: value.cause,
    };
  }
  return value;
}

const logFormat = winston.format.printf(info => {
  const metadata: Record<string, unknown> =
    typeof info.metadata === "object" && info.metadata !== null
      ? { ...info.metadata }
      : {};
  const details =
    info.level.includes("error") || info.level.includes("warn")
      ? JSON.stringify(metadata, serializeErrors)
      : "";

  return `${info.timestamp} ${info.level} [${metadata.module ?? ""}:${metadata.method ?? ""}]: ${info.message} ${details}`;
});

export const logger = winston.createLogger({
  level: config.LOGGING_LEVEL.toLowerCase(),
  format: winston.format.json({ replacer: serializeErrors }),
  transports: [
    new winston.transports.Console({
      format: winston.format.combine(
        winston.format.timestamp({ format: "YYYY-MM-DD HH:mm:ss" }),
        winston.format.metadata({
          fillExcept: ["message", "level", "timestamp"],
        }),
        ...(config.ENV === "production"
          ? [winston.format.json()]
          : [winston.format.colorize(), logFormat]),
      ),
    }),
  ],
});
