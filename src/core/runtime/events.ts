export type LogLevel = "debug" | "info" | "warn" | "error";

export type OpticsEvent =
    | {
          type: "transform.start";
          name: string;
      }
    | {
          type: "transform.end";
          name: string;
          status: "success" | "failure";
          durationMs: number;
          error?: unknown;
      }
    | {
          type: "log";
          level: LogLevel;
          message: string;
          fields?: Record<string, unknown>;
      };

export type OpticsEmitContext = {
    traceId?: string;
    spanId?: string;
};

export interface OpticsHooks {
    emit(ev: OpticsEvent, ctx: OpticsEmitContext): void;
}

export type OpticsEventRecord = OpticsEvent &
    OpticsEmitContext & {
        seq: number;
        wallTs: number; // Date.now()
        ts: number; // performance.now()
    };

export const noopHooks: OpticsHooks = {
    emit: () => {},
};
