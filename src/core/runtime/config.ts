import { noopHooks, type LogLevel, type OpticsHooks } from "./events";
import { defaultTracer, type Tracer } from "./tracer";

export type OpticsConfig = {
    hooks: OpticsHooks;
    tracer: Tracer;
    /** Lowest level `log` events are emitted at. */
    logLevel: LogLevel;
};

export const defaultConfig: OpticsConfig = {
    hooks: noopHooks,
    tracer: defaultTracer,
    logLevel: "info",
};

export const resolveConfig = (partial: Partial<OpticsConfig> = {}): OpticsConfig => ({
    hooks: partial.hooks ?? defaultConfig.hooks,
    tracer: partial.tracer ?? defaultConfig.tracer,
    logLevel: partial.logLevel ?? defaultConfig.logLevel,
});
