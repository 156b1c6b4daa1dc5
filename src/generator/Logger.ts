// -----------------------------
// Logging support
// -----------------------------

export type LogLevel = "silent" | "info" | "debug";

const LOG_LEVELS: readonly LogLevel[] = ["silent", "info", "debug"];

const PREFIX = "[config-gen]";

function isLogLevel(value: string): value is LogLevel {
    return LOG_LEVELS.some(level => level === value);
}

/**
 * Process-wide logger for the generator.
 *
 * `info` and `debug` are gated by the active level; `error` always prints.
 * The LOGLEVEL environment variable, when set, wins over the level passed to `setLevel`.
 */
export class Logger {
    private static level: LogLevel = "info";

    static setLevel(configured: LogLevel | undefined): void {
        const fromEnv = process.env.LOGLEVEL;

        if (fromEnv !== undefined && fromEnv !== "") {
            if (!isLogLevel(fromEnv)) {
                throw new Error(
                    `Invalid LOGLEVEL value '${fromEnv}'. Expected one of: ${LOG_LEVELS.join(", ")}`
                );
            }

            Logger.level = fromEnv;

            if (fromEnv !== "silent") {
                console.info(`${PREFIX}[warn] Log level overridden via environment variable LOGLEVEL=${fromEnv}`);
            }
            return;
        }

        Logger.level = configured ?? "info";
    }

    static info(message: string): void {
        if (Logger.level === "info" || Logger.level === "debug") {
            console.log(`${PREFIX} ${message}`);
        }
    }

    static debug(message: string): void {
        if (Logger.level === "debug") {
            console.log(`${PREFIX}[debug] ${message}`);
        }
    }

    static error(message: string): void {
        console.error(`${PREFIX}[error] ${message}`);
    }
}
