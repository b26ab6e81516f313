import winston from "winston";

export const logger = winston.createLogger({
  level: process.env.LOGSIFT_LOG_LEVEL ?? "info",
  silent: process.env.NODE_ENV === "test",
  defaultMeta: { service: "logsift" },
  format: winston.format.combine(winston.format.timestamp(), winston.format.json()),
  transports: [new winston.transports.Console({ stderrLevels: ["error", "warn"] })],
});

const children = new Map<string, winston.Logger>();

/** Logger tagged with the pipeline component that emits it, one per component */
export function childLogger(component: string): winston.Logger {
  let child = children.get(component);
  if (!child) {
    child = logger.child({ component });
    children.set(component, child);
  }
  return child;
}
