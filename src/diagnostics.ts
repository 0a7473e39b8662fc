import type { Logger } from "./types.js";

export type DiagnosticKind =
    | "malformed-record"
    | "calendar-conflict"
    | "irregular-service"
    | "non-monotonic-time"
    | "join-failure"
    | "unmatched-map-route"
    | "dropped-route"
    | "dropped-departure";

export type Diagnostic = {
    kind: DiagnosticKind;
    message: string;
    context?: string;       // file:line, trip id, route name ...
};

/**
 * Collects per-record and per-route problems during a run. None of them stop
 * the pipeline; they get printed once everything is done.
 */
export class Diagnostics {
    private readonly entries: Diagnostic[] = [];

    report(kind: DiagnosticKind, message: string, context?: string) {
        this.entries.push(context === undefined ? { kind, message } : { kind, message, context });
    }

    list(kind?: DiagnosticKind): Diagnostic[] {
        return kind ? this.entries.filter(d => d.kind === kind) : this.entries.slice();
    }

    get size() {
        return this.entries.length;
    }

    counts(): Partial<Record<DiagnosticKind, number>> {
        const out: Partial<Record<DiagnosticKind, number>> = {};
        for (const d of this.entries) out[d.kind] = (out[d.kind] ?? 0) + 1;
        return out;
    }

    print(log: Logger, limitPerKind = 20) {
        if (!this.entries.length) return;
        const counts = this.counts();
        log.warn(`\n=== ${this.entries.length.toLocaleString()} warnings ===`);
        for (const [kind, n] of Object.entries(counts)) {
            log.warn(`[${kind}] ${n.toLocaleString()}`);
            const sample = this.entries.filter(d => d.kind === kind).slice(0, limitPerKind);
            for (const d of sample) {
                log.warn(`  ${d.context ? `${d.context}: ` : ""}${d.message}`);
            }
            if (n > sample.length) log.warn(`  … and ${n - sample.length} more`);
        }
    }
}
