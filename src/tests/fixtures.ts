import pino from 'pino';
import type { RawTable } from '../types';
import type { ArtifactStore } from '../store/artifacts';

export const silentLogger = pino({ level: 'silent' });

/**
 * Two-day webinar export with a reconnecting attendee and one unparsable row
 *
 * 2024-04-01 sessions:
 * - ana: 09:00:30-10:05 and again 10:00-12:40 (overlap at 10:00)
 * - ben: 09:01-12:51
 * - cho: 09:14-11:05
 * 2024-04-02 sessions:
 * - dee: 09:00-09:30
 */
export const webinarTable: RawTable = {
    columns: [' name ', 'EMAIL', 'join time', 'leave time', 'Duration (Minutes)'],
    rows: [
        ['Ana', 'Ana@Example.com ', '01/04/2024 09:00:30', '01/04/2024 10:05:00', '65'],
        ['Ana (phone)', 'ana@example.com', '01/04/2024 10:00', '01/04/2024 12:40', '160'],
        ['Ben', 'ben@example.com', '01/04/2024 09:01:00', '01/04/2024 12:51:00', '230'],
        ['Cho', 'cho@example.com', '1/4/2024 9:14', '1/4/2024 11:05', '111'],
        ['Broken', 'broken@example.com', 'not a date', '01/04/2024 10:00', null],
        ['Dee', 'dee@example.com', '02/04/2024 09:00', '02/04/2024 09:30', '30']
    ]
};

export const testTimeline = ['09:00', '09:15', '10:00', '10:20', '11:05', '12:51'];

export const testAnnotations = {
    '09:15': 'Intro',
    '12:51': 'Close'
};

/**
 * Artifact store keeping reports in memory
 */
export class MemoryArtifactStore implements ArtifactStore {
    files: Map<string, string> = new Map();

    async save(name: string, content: string): Promise<string> {
        this.files.set(name, content);
        return name;
    }

    async read(ref: string): Promise<string | undefined> {
        return this.files.get(ref);
    }
}

/**
 * Artifact store whose writes always fail
 */
export class FailingArtifactStore implements ArtifactStore {
    async save(): Promise<string> {
        throw new Error('disk full');
    }

    async read(): Promise<string | undefined> {
        return undefined;
    }
}
