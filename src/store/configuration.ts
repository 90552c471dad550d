import { z } from 'zod';
import type { Annotations, TimelineConfiguration } from "../types";

/** HH:MM, 24-hour, zero-padded */
export const TIME_POINT_PATTERN = /^([01]\d|2[0-3]):([0-5]\d)$/;

export const TimePointSchema = z.string().trim().regex(TIME_POINT_PATTERN);

const LabelSchema = z.string().trim().min(1);

export const DEFAULT_TIMELINE = [
    '09:00', '09:15', '09:30', '09:45',
    '10:00', '10:15', '10:30', '10:45',
    '11:02', '11:12', '11:15', '11:30', '11:45',
    '12:00', '12:15', '12:21', '12:33', '12:35', '12:50', '12:51'
];

export const DEFAULT_ANNOTATIONS: Annotations = {
    '11:02': 'Break starts',
    '11:12': 'Break ends',
    '12:21': 'PACE Intro',
    '12:33': 'PACE investment',
    '12:35': 'Pitch starts',
    '12:50': 'Pitch ends',
    '12:51': 'Workshop ends'
};

/**
 * Keep valid HH:MM entries, trimmed, without duplicates, ascending
 */
export const sanitizeTimeline = (candidate: readonly unknown[]): string[] => {
    const points = new Set<string>();
    for (const entry of candidate) {
        const parsed = TimePointSchema.safeParse(entry);
        if (parsed.success) points.add(parsed.data);
    }
    return Array.from(points).sort();
}

/**
 * Keep pairs with a valid HH:MM key and a non-empty label, both trimmed
 */
export const sanitizeAnnotations = (candidate: Readonly<Record<string, unknown>>): Annotations => {
    const annotations: Annotations = {};
    for (const [key, value] of Object.entries(candidate)) {
        const time = TimePointSchema.safeParse(key);
        const label = LabelSchema.safeParse(value);
        if (time.success && label.success) {
            annotations[time.data] = label.data;
        }
    }
    return annotations;
}

const copy = (configuration: TimelineConfiguration): TimelineConfiguration => ({
    timeline: [...configuration.timeline],
    annotations: { ...configuration.annotations }
});

/**
 * Process-wide timeline and annotations
 *
 * Writes are lenient: invalid entries are dropped, never rejected, and the
 * sanitized result replaces the previous configuration as a whole (last write
 * wins). Readers get a copy, so a job holding one is unaffected by later writes.
 */
export class TimelineConfigurationStore {
    private current: TimelineConfiguration;

    constructor(initial: TimelineConfiguration = { timeline: DEFAULT_TIMELINE, annotations: DEFAULT_ANNOTATIONS }) {
        this.current = {
            timeline: sanitizeTimeline(initial.timeline),
            annotations: sanitizeAnnotations(initial.annotations)
        };
    }

    read(): TimelineConfiguration {
        return copy(this.current);
    }

    /**
     * Replace the configuration with the sanitized candidates
     *
     * @returns the configuration actually stored
     */
    write(candidateTimeline: readonly unknown[], candidateAnnotations: Readonly<Record<string, unknown>>): TimelineConfiguration {
        this.current = {
            timeline: sanitizeTimeline(candidateTimeline),
            annotations: sanitizeAnnotations(candidateAnnotations)
        };
        return this.read();
    }

    /** Go back to the built-in timeline and labels */
    reset(): TimelineConfiguration {
        return this.write(DEFAULT_TIMELINE, DEFAULT_ANNOTATIONS);
    }
}
