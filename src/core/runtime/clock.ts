// src/core/runtime/clock.ts

/** Monotonic milliseconds where `performance` exists, wall clock otherwise. */
export const now = (): number => (typeof performance !== "undefined" ? performance.now() : Date.now());
