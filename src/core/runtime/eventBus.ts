import type { OpticsEmitContext, OpticsEvent, OpticsEventRecord, OpticsHooks } from "./events";
import { now } from "./clock";

export type EventHandler = (ev: OpticsEventRecord) => void;

type Subscriber = {
    handler: EventHandler;
    // one queue per subscriber so a slow sink only drops its own events
    q: OpticsEventRecord[];
    capacity: number;
    dropped: number;
};

export class EventBus implements OpticsHooks {
    private seq = 1;
    private subs: Subscriber[] = [];
    private flushScheduled = false;

    constructor(private readonly onHandlerError: (e: unknown) => void = defaultHandlerError) {}

    emit(ev: OpticsEvent, ctx: OpticsEmitContext) {
        const full: OpticsEventRecord = {
            ...ev,
            ...ctx,
            seq: this.seq++,
            ts: now(),
            wallTs: Date.now(),
        };

        for (const s of this.subs) {
            if (s.q.length >= s.capacity) s.dropped++;
            else s.q.push(full);
        }

        if (!this.flushScheduled) {
            this.flushScheduled = true;
            queueMicrotask(() => this.flush());
        }
    }

    subscribe(handler: EventHandler, perSubscriberCapacity = 2048) {
        this.subs.push({ handler, q: [], capacity: Math.max(1, perSubscriberCapacity), dropped: 0 });

        return () => {
            this.subs = this.subs.filter((s) => s.handler !== handler);
        };
    }

    flush(budget = 4096) {
        this.flushScheduled = false;

        for (const s of this.subs) {
            if (s.dropped > 0) {
                this.deliver(s, {
                    seq: 0,
                    ts: now(),
                    wallTs: Date.now(),
                    type: "log",
                    level: "warn",
                    message: "eventbus.dropped",
                    fields: { dropped: s.dropped },
                });
                s.dropped = 0;
            }

            const batch = s.q.splice(0, budget);
            for (const ev of batch) this.deliver(s, ev);
        }
    }

    private deliver(s: Subscriber, ev: OpticsEventRecord) {
        try {
            s.handler(ev);
        } catch (e) {
            this.onHandlerError(e);
        }
    }
}

function defaultHandlerError(e: unknown) {
    console.error(JSON.stringify({ level: "error", msg: "eventbus.handler_failed", error: String(e) }));
}
