// src/transform/traced.ts
import { now } from "../core/runtime/clock";
import { resolveConfig, type OpticsConfig } from "../core/runtime/config";
import type { LogLevel, OpticsEmitContext } from "../core/runtime/events";
import { shouldLog } from "../core/runtime/loggerSink";
import { isOpticsError } from "../optics/errors";
import { Transform } from "./transform";

/**
 * Wraps `tx` so that every `apply` is reported to `config.hooks` as a
 * `transform.start` / `transform.end` pair sharing one trace id, plus a
 * `log` event at `debug` (success) or `error` (failure). Errors are
 * re-thrown unchanged.
 */
export function tracedTx<I, O>(tx: Transform<I, O>, name: string, config: Partial<OpticsConfig> = {}): Transform<I, O> {
    const { hooks, tracer, logLevel } = resolveConfig(config);

    const log = (ctx: OpticsEmitContext, level: LogLevel, message: string, fields: Record<string, unknown>) => {
        if (shouldLog(level, logLevel)) hooks.emit({ type: "log", level, message, fields }, ctx);
    };

    return Transform.make((input) => {
        const ctx: OpticsEmitContext = { traceId: tracer.newTraceId(), spanId: tracer.newSpanId() };
        const start = now();
        hooks.emit({ type: "transform.start", name }, ctx);

        try {
            const out = tx.apply(input);
            const durationMs = now() - start;
            hooks.emit({ type: "transform.end", name, status: "success", durationMs }, ctx);
            log(ctx, "debug", "transform.applied", { transform: name, durationMs });
            return out;
        } catch (error) {
            const durationMs = now() - start;
            hooks.emit({ type: "transform.end", name, status: "failure", durationMs, error }, ctx);
            log(ctx, "error", "transform.failed", {
                transform: name,
                errorTag: isOpticsError(error) ? error._tag : "Defect",
                error: String(error),
            });
            throw error;
        }
    });
}
