export interface Tracer {
    newTraceId(): string;
    newSpanId(): string;
}

// default (Node 20: global crypto.randomUUID)
export const defaultTracer: Tracer = {
    newTraceId: () => crypto.randomUUID(),
    newSpanId: () => crypto.randomUUID(),
};

/** Deterministic ids (`trace-1`, `span-1`, ...), for tests and replayable logs. */
export function sequentialTracer(prefix = ""): Tracer {
    let trace = 0;
    let span = 0;
    return {
        newTraceId: () => `${prefix}trace-${++trace}`,
        newSpanId: () => `${prefix}span-${++span}`,
    };
}
