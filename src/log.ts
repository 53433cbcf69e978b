import pino from "pino";
import type { Logger, LoggerOptions } from "pino";
import { isTestEnv } from "./util/env.js";

export function createLogger(): Logger {
    const options: LoggerOptions = {
        base: undefined,
        level: isTestEnv() ? "silent" : process.env.LOG_LEVEL || "info",
        formatters: {
            level: (label) => ({ level: label }),
        },
        timestamp: pino.stdTimeFunctions.epochTime,
    };
    // plain ndjson when piped, or under jest (no transport worker)
    if (isTestEnv() || process.env.LOG_PRETTY === "false") return pino(options);
    const transport = pino.transport({
        target: "pino-pretty",
        options: {
            translateTime: "SYS:yyyy-mm-dd HH:MM:ss.l",
            colorize: false,
            ignore: "pid,hostname",
        },
    });
    return pino(options, transport);
}

let shared: Logger | null = null;

// one transport worker per process, however many engines get built
export function defaultLogger(): Logger {
    if (!shared) shared = createLogger();
    return shared;
}
