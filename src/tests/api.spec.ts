import { describe, it, expect, beforeAll, afterAll } from 'vitest';
import { buildApp } from '../app';
import { loadConfig } from '../config';
import { DEFAULT_ANNOTATIONS, DEFAULT_TIMELINE } from '../store/configuration';
import { MemoryArtifactStore, silentLogger, webinarTable } from './fixtures';

const artifacts = new MemoryArtifactStore();
const { app } = buildApp({
    config: loadConfig({ STREAM_IDLE_MS: '20' }),
    logger: silentLogger,
    artifacts
});

const submit = async (payload: object) => {
    const response = await app.inject({ method: 'POST', url: '/jobs', payload });
    expect(response.statusCode).toBe(202);
    return response.json<{ jobId: string }>().jobId;
}

describe('Attendance Occupancy API', () => {
    beforeAll(async () => {
        await app.ready();
    });

    afterAll(async () => {
        await app.close();
    });

    it('POST /jobs - should reject a malformed table', async () => {
        const response = await app.inject({
            method: 'POST',
            url: '/jobs',
            payload: { columns: [], rows: [[1, 2]] }
        });

        expect(response.statusCode).toBe(400);
        expect(response.json().error).toBe('invalid_input');
    });

    it('POST /jobs - should run a job through to its result', async () => {
        const jobId = await submit({ fileName: 'webinar.csv', ...webinarTable });

        const stream = await app.inject({ method: 'GET', url: `/jobs/${jobId}/stream` });
        expect(stream.statusCode).toBe(200);
        expect(stream.headers['content-type']).toBe('text/event-stream');
        expect(stream.payload).toContain("Using 'Email' for dedupe.\n\n");
        expect(stream.payload.endsWith('data: DONE\n\n')).toBe(true);

        const status = await app.inject({ method: 'GET', url: `/jobs/${jobId}` });
        expect(status.json()).toMatchObject({ id: jobId, status: 'done', fileName: 'webinar.csv', error: null });

        const result = await app.inject({ method: 'GET', url: `/jobs/${jobId}/result` });
        expect(result.statusCode).toBe(200);
        const body = result.json();
        expect(body.dates).toEqual(['2024-04-01', '2024-04-02']);
        expect(body.primaryDateRows).toHaveLength(DEFAULT_TIMELINE.length);
        expect(body.primaryDateRows[0]).toEqual(['09:00', '1']);
        expect(body.primaryDateRows[8]).toEqual(['11:02', '3 (Break starts)']);

        const report = await app.inject({ method: 'GET', url: `/reports/${body.outputArtifactRef}` });
        expect(report.statusCode).toBe(200);
        expect(report.headers['content-type']).toBe('text/csv; charset=utf-8');
        expect(report.payload).toBe(artifacts.files.get(body.outputArtifactRef));
        expect(report.payload.split('\n')[0]).toBe('Time,Count (2024-04-01)');
    });

    it('GET /jobs/:id/stream - should end a failed job with FAILED', async () => {
        const jobId = await submit({
            columns: ['Email', 'Join Time'],
            rows: [['a@x.com', '01/04/2024 09:00']]
        });

        const stream = await app.inject({ method: 'GET', url: `/jobs/${jobId}/stream` });
        expect(stream.payload).toContain("Error: Missing required column(s): 'Leave Time'\n\n");
        expect(stream.payload.endsWith('data: FAILED\n\n')).toBe(true);

        const result = await app.inject({ method: 'GET', url: `/jobs/${jobId}/result` });
        expect(result.statusCode).toBe(404);
        expect(result.json().error).toBe('not_found');
    });

    it('should answer 404 for unknown jobs and reports', async () => {
        for (const url of ['/jobs/unknown', '/jobs/unknown/stream', '/jobs/unknown/result', '/reports/unknown.csv']) {
            const response = await app.inject({ method: 'GET', url });
            expect(response.statusCode).toBe(404);
            expect(response.json().error).toBe('not_found');
        }
    });

    it('GET /settings - should return the default timeline', async () => {
        const response = await app.inject({ method: 'GET', url: '/settings' });

        expect(response.statusCode).toBe(200);
        expect(response.json().timeline).toEqual(DEFAULT_TIMELINE);
        expect(response.json().annotations['12:51']).toBe('Workshop ends');
    });

    it('PUT /settings - should store only valid entries', async () => {
        const response = await app.inject({
            method: 'PUT',
            url: '/settings',
            payload: {
                timeline: ['10:00', '25:61', '09:00', '10:00'],
                annotations: { '09:00': ' Start ', '99:99': 'Never' }
            }
        });

        expect(response.statusCode).toBe(200);
        expect(response.json()).toEqual({ timeline: ['09:00', '10:00'], annotations: { '09:00': 'Start' } });
    });

    it('PUT /settings - should keep the half that is omitted', async () => {
        const response = await app.inject({
            method: 'PUT',
            url: '/settings',
            payload: { annotations: { '10:00': 'Break' } }
        });

        expect(response.json()).toEqual({ timeline: ['09:00', '10:00'], annotations: { '10:00': 'Break' } });
    });

    it('PUT /settings - should reject a body of the wrong shape', async () => {
        const response = await app.inject({
            method: 'PUT',
            url: '/settings',
            payload: { timeline: '09:00' }
        });

        expect(response.statusCode).toBe(400);
        expect(response.json().error).toBe('invalid_input');
    });

    it('DELETE /settings - should restore the default timeline and labels', async () => {
        const response = await app.inject({ method: 'DELETE', url: '/settings' });

        expect(response.statusCode).toBe(200);
        expect(response.json()).toEqual({ timeline: DEFAULT_TIMELINE, annotations: DEFAULT_ANNOTATIONS });

        const stored = await app.inject({ method: 'GET', url: '/settings' });
        expect(stored.json().annotations['12:21']).toBe('PACE Intro');
    });

    it('GET /health - should report liveness', async () => {
        const response = await app.inject({ method: 'GET', url: '/health' });

        expect(response.statusCode).toBe(200);
        expect(response.json().status).toBe('ok');
    });
});

describe('API Hardening', () => {
    it('should rate limit requests', async () => {
        const { app: limited } = buildApp({
            config: loadConfig({ RATE_LIMIT_MAX: '5' }),
            logger: silentLogger,
            artifacts: new MemoryArtifactStore()
        });
        await limited.ready();

        const responses = await Promise.all(
            Array.from({ length: 8 }, () => limited.inject({ method: 'GET', url: '/health' }))
        );
        await limited.close();

        expect(responses.filter(r => r.statusCode === 429).length).toBeGreaterThan(0);
    });
});
