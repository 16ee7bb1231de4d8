import pino from "pino";
import { env } from "./env";
import { PROJECT_NAME } from "./constants";

export const logger = pino({
  name: PROJECT_NAME,
  level: env.LOG_LEVEL
});

export function componentLogger(component: string) {
  return logger.child({ component });
}
