import type { LogLevel, OpticsEventRecord } from "./events";

const rank: Record<LogLevel, number> = { debug: 10, info: 20, warn: 30, error: 40 };

export const shouldLog = (level: LogLevel, minLevel: LogLevel) => rank[level] >= rank[minLevel];

export type LoggerSinkOptions = {
    minLevel?: LogLevel;
    write?: (level: LogLevel, line: string) => void;
};

const consoleWrite = (level: LogLevel, line: string) => {
    // stderr for errors, stdout for the rest
    if (level === "error") console.error(line);
    else console.log(line);
};

/** One JSON line per `log` event at or above `minLevel`. */
export function consoleJsonLoggerSink(opts: LoggerSinkOptions = {}) {
    const minLevel = opts.minLevel ?? "info";
    const write = opts.write ?? consoleWrite;

    return (ev: OpticsEventRecord) => {
        if (ev.type !== "log") return;
        if (!shouldLog(ev.level, minLevel)) return;

        const out = {
            level: ev.level,
            msg: ev.message,
            wallTs: ev.wallTs,
            traceId: ev.traceId,
            spanId: ev.spanId,
            ...(ev.fields ?? {}),
        };

        write(ev.level, JSON.stringify(out));
    };
}
