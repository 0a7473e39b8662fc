import type { Diagnostics } from "./diagnostics.js";
import type { FeedTrip, StopTime } from "./types.js";

export type RawStopTime = {
    stopId: string;
    seq: number;
    arr?: number;
    dep?: number;
};

/**
 * Fills in stops without times (non-timepoints) by interpolating linearly over
 * the stop index between the surrounding timed stops. Returns undefined when
 * the first or last stop has no time at all.
 */
export function interpolateTimes(raw: RawStopTime[]): StopTime[] | undefined {
    const times = raw.map(st => ({ arr: st.arr ?? st.dep, dep: st.dep ?? st.arr }));
    const known: number[] = [];
    times.forEach((t, i) => {
        if (t.arr !== undefined) known.push(i);
    });
    if (!known.length || known[0] !== 0 || known[known.length - 1] !== raw.length - 1) return;

    const out: StopTime[] = [];
    for (let k = 0; k < known.length; k++) {
        const i = known[k];
        const { arr, dep } = times[i];
        if (arr === undefined || dep === undefined) return;
        out.push({ stopId: raw[i].stopId, seq: raw[i].seq, arr, dep });

        const j = known[k + 1];
        if (j === undefined) break;
        const to = times[j].arr;
        if (to === undefined) return;
        for (let m = i + 1; m < j; m++) {
            const t = Math.round(dep + ((to - dep) * (m - i)) / (j - i));
            out.push({ stopId: raw[m].stopId, seq: raw[m].seq, arr: t, dep: t });
        }
    }
    return out;
}

/**
 * Seconds between consecutive stops of `trip`, measured departure to departure
 * (arrival at the final stop), so dwell time counts toward the leg that ends
 * at the stop. Negative legs are reported and clamped to 0.
 */
export function estimateDurations(trip: FeedTrip, diagnostics: Diagnostics): number[] {
    const st = trip.stopTimes;
    const out: number[] = [];
    for (let i = 0; i < st.length - 1; i++) {
        const a = st[i];
        const b = st[i + 1];
        const tB = i + 1 === st.length - 1 ? b.arr : b.dep;
        const dur = tB - a.dep;
        if (dur < 0) {
            diagnostics.report(
                "non-monotonic-time",
                `time goes backwards by ${-dur}s between ${a.stopId} and ${b.stopId}, clamped to 0`,
                `trip ${trip.id}`
            );
            out.push(0);
        } else {
            out.push(dur);
        }
    }
    return out;
}
