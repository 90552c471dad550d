import { addSeconds, parse } from "date-fns";
import type { Annotations, AttendeeRecord, OccupancyPoint, Timeline } from "../types";

/**
 * Seconds added to the first time point of a timeline
 *
 * The first point is read as "end of that minute" so attendees who joined
 * within the opening minute are present at it.
 */
export const FIRST_POINT_GRACE_SECONDS = 59;

/**
 * Minute boundary of a time point on the event date, in local time
 *
 * Example: ('2024-04-01', '09:15') => 2024-04-01 09:15:00.000
 */
export const timePointOn = (eventDate: string, time: string): Date =>
    parse(`${eventDate} ${time}`, 'yyyy-MM-dd HH:mm', new Date());

/**
 * Instant at which presence is checked for the point at `position`
 *
 * The first point gets FIRST_POINT_GRACE_SECONDS, every other point is
 * checked exactly on its minute boundary.
 */
export const checkInstant = (date: string, time: string, position: number): Date => {
    const base = timePointOn(date, time);
    return position === 0 ? addSeconds(base, FIRST_POINT_GRACE_SECONDS) : base;
}

/**
 * Whether a session covers an instant; both ends are inclusive
 */
export const isPresent = (record: AttendeeRecord, instant: Date): boolean => {
    const at = instant.getTime();
    return record.joinTime.getTime() <= at && at <= record.leaveTime.getTime();
}

export const formatDisplay = (count: number, label?: string): string =>
    label ? `${count} (${label})` : String(count);

/**
 * Count distinct attendees present at every time point of a timeline
 *
 * Algorithm:
 * 1. Combine the event date with each time point (first point + 59s)
 * 2. Keep records whose [joinTime, leaveTime] contains that instant
 * 3. Count distinct identity keys, so repeated sessions of one attendee count once
 * 4. Append the annotation label to the display value when there is one
 *
 * Annotations only affect `display`, never `count`.
 *
 * @param eventDate - Date the records belong to (YYYY-MM-DD)
 * @param records - Records already filtered to eventDate
 * @returns One point per timeline entry, in timeline order
 */
export const countOccupancy = (
    eventDate: string,
    records: AttendeeRecord[],
    timeline: Timeline,
    annotations: Annotations = {}
): OccupancyPoint[] =>
    timeline.map((time, position) => {
        const instant = checkInstant(eventDate, time, position);
        const present = new Set<string>();
        for (const record of records) {
            if (isPresent(record, instant)) present.add(record.identityKey);
        }

        const count = present.size;
        const label = annotations[time];
        return label
            ? { time, count, label, display: formatDisplay(count, label) }
            : { time, count, display: formatDisplay(count) };
    });
