import pino from "pino";
import { env } from "./env";

export type Logger = pino.Logger;

const IS_TEST = env.NODE_ENV === "test" || Boolean(process.env.VITEST);

export function createLogger(name: string): Logger {
  return pino({
    name,
    level: IS_TEST ? "silent" : env.LOG_LEVEL,
    transport:
      env.NODE_ENV === "production" || IS_TEST
        ? undefined
        : {
            target: "pino-pretty",
            options: {
              colorize: true,
              translateTime: "SYS:standard"
            }
          }
  });
}
