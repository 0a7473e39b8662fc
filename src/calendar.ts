import dayjs, { type Dayjs } from "dayjs";
import customParseFormat from "dayjs/plugin/customParseFormat";

import type { Diagnostics } from "./diagnostics.js";
import type {
    ExceptionCounting,
    ServiceCalendar,
    ServicePattern,
    WeekdayClass,
    WeeklyRule,
} from "./types.js";

dayjs.extend(customParseFormat);

export const GTFS_DATE = "YYYYMMDD";

// bit 0 = monday ... bit 6 = sunday
const CLASS_MASKS: Record<WeekdayClass, number> = {
    0: 0b0011111,
    1: 0b0100000,
    2: 0b1000000,
};

export type CalendarOptions = {
    weekdayClass: WeekdayClass;
    maxExceptions: number;
    exceptionCounting?: ExceptionCounting;
};

export function parseGtfsDate(s: string): Dayjs | undefined {
    const d = dayjs(s, GTFS_DATE, true);
    return d.isValid() ? d : undefined;
}

export function weekdayBit(d: Dayjs) {
    // dayjs counts from sunday
    return 1 << ((d.day() + 6) % 7);
}

export function inWeekdayClass(date: string, weekdayClass: WeekdayClass) {
    const d = parseGtfsDate(date);
    return d !== undefined && (weekdayBit(d) & CLASS_MASKS[weekdayClass]) !== 0;
}

/** Every date the weekly rule covers, before removals, limited to `classMask`. */
export function expandWeekly(rule: WeeklyRule, classMask = 0b1111111): string[] {
    const start = parseGtfsDate(rule.startDate);
    const end = parseGtfsDate(rule.endDate);
    if (!start || !end || start.isAfter(end)) return [];
    const mask = rule.mask & classMask;
    if (!mask) return [];

    const out: string[] = [];
    for (let d = start; !d.isAfter(end); d = d.add(1, "day")) {
        if (weekdayBit(d) & mask) out.push(d.format(GTFS_DATE));
    }
    return out;
}

function weeklyCovers(rule: WeeklyRule, date: string) {
    const d = parseGtfsDate(date);
    if (!d) return false;
    return date >= rule.startDate && date <= rule.endDate && (weekdayBit(d) & rule.mask) !== 0;
}

// removal wins over an addition of the same date
export function isActiveOn(calendar: ServiceCalendar, date: string) {
    if (calendar.removed.has(date)) return false;
    if (calendar.added.has(date)) return true;
    return calendar.weekly !== null && weeklyCovers(calendar.weekly, date);
}

export function resolveServicePattern(calendar: ServiceCalendar, options: CalendarOptions): ServicePattern {
    const { weekdayClass, maxExceptions, exceptionCounting = "both" } = options;
    const { added, removed } = calendar;

    const weeklyDates = calendar.weekly ? expandWeekly(calendar.weekly, CLASS_MASKS[weekdayClass]) : [];
    const weeklySet = new Set(weeklyDates);

    const baseDates = weeklyDates.filter(d => !removed.has(d));
    const removedBase = weeklyDates.filter(d => removed.has(d));
    const addedExtra = [...added]
        .filter(d => !removed.has(d) && !weeklySet.has(d) && inWeekdayClass(d, weekdayClass))
        .sort();
    const conflicts = [...added].filter(d => removed.has(d)).sort();

    const exceptionCount =
        exceptionCounting === "added" ? addedExtra.length
        : exceptionCounting === "removed" ? removedBase.length
        : addedExtra.length + removedBase.length;

    return {
        serviceId: calendar.serviceId,
        baseDates,
        exceptionDates: [...addedExtra, ...removedBase].sort(),
        activeDates: [...baseDates, ...addedExtra].sort(),
        exceptionCount,
        regular: exceptionCount <= maxExceptions,
        conflicts,
    };
}

export function countExceptions(
    calendar: ServiceCalendar,
    weekdayClass: WeekdayClass,
    counting: ExceptionCounting = "both"
) {
    return resolveServicePattern(calendar, { weekdayClass, maxExceptions: Infinity, exceptionCounting: counting })
        .exceptionCount;
}

export function resolveServicePatterns(
    calendars: ReadonlyMap<string, ServiceCalendar>,
    options: CalendarOptions,
    diagnostics: Diagnostics
): Map<string, ServicePattern> {
    const out = new Map<string, ServicePattern>();
    const ids = [...calendars.keys()].sort();
    for (const id of ids) {
        const calendar = calendars.get(id);
        if (!calendar) continue;
        const pattern = resolveServicePattern(calendar, options);
        for (const date of pattern.conflicts) {
            diagnostics.report("calendar-conflict", `date ${date} both added and removed, treated as removed`, `service ${id}`);
        }
        if (pattern.activeDates.length && !pattern.regular) {
            diagnostics.report(
                "irregular-service",
                `${pattern.exceptionCount} exception dates (max ${options.maxExceptions})`,
                `service ${id}`
            );
        }
        out.set(id, pattern);
    }
    return out;
}
