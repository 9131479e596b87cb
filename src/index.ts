// optics
export { Lens } from "./optics/lens";
export type { LensGroup, RefLens, RefValueLens, ValueLens } from "./optics/lens";
export { LensPath } from "./optics/path";
export type { LensPathElement } from "./optics/path";
export { field, scalar, index } from "./optics/primitives";
export type { Scalar, ScalarKeys } from "./optics/primitives";
export { compose, composeAll } from "./optics/compose";
export type { Composed } from "./optics/compose";
export { draftCopy } from "./optics/draft";
export type { DraftCopyable } from "./optics/draft";
export { boxed, isLens, isRefLens, isValueLens, modify, mutateWithFn, set } from "./optics/ops";
export {
    CompositionError,
    IndexOutOfRange,
    IntegerOverflow,
    InvalidPathElement,
    NotIntegral,
    OpticsError,
    UncopyableValue,
    isOpticsError,
} from "./optics/errors";
export type { OpticsErrorTag } from "./optics/errors";

// transforms
export { Transform, composeTx, fnTx, identityTx, pipeTx } from "./transform/transform";
export {
    decrementBigIntTx,
    decrementTx,
    incrementBigIntTx,
    incrementTx,
    lensSet,
    modTx,
    notTx,
    setToTx,
    setTx,
} from "./transform/lensTx";
export { tracedTx } from "./transform/traced";
export { tryApply, trySet } from "./transform/result";

// results
export { Cause, Exit } from "./core/types/exit";

// instrumentation
export { EventBus } from "./core/runtime/eventBus";
export type { EventHandler } from "./core/runtime/eventBus";
export { noopHooks } from "./core/runtime/events";
export type {
    LogLevel,
    OpticsEmitContext,
    OpticsEvent,
    OpticsEventRecord,
    OpticsHooks,
} from "./core/runtime/events";
export { consoleJsonLoggerSink, shouldLog } from "./core/runtime/loggerSink";
export type { LoggerSinkOptions } from "./core/runtime/loggerSink";
export { defaultTracer, sequentialTracer } from "./core/runtime/tracer";
export type { Tracer } from "./core/runtime/tracer";
export { defaultConfig, resolveConfig } from "./core/runtime/config";
export type { OpticsConfig } from "./core/runtime/config";
