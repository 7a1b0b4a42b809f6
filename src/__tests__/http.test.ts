import express from 'express';
import request from 'supertest';
import { describe, expect, it } from 'vitest';
import { createApp } from '../app';
import { createRateLimiter } from '../middleware/rateLimiter';
import { at, createHarness, makeAppointment, makeWallet } from './fixtures';

const appFor = (harness: ReturnType<typeof createHarness>) => createApp(harness.services, { accessLog: false, rateLimit: false });

const booking = {
    establishment_id: 'est-1',
    staff_id: 'staff-1',
    service_id: 'svc-cut',
    scheduled_at: at('14:00'),
};

describe('HTTP API', () => {
    it('reports health', async () => {
        const res = await request(appFor(createHarness())).get('/health');
        expect(res.status).toBe(200);
        expect(res.body).toMatchObject({ status: 'ok', service: 'scheduling-api', storage: 'memory' });
    });

    it('requires a bearer token', async () => {
        const res = await request(appFor(createHarness())).post('/api/appointments').send(booking);
        expect(res.status).toBe(401);
        expect(res.body).toEqual({ status: 'error', code: 'UNAUTHORIZED', message: 'Authorization header missing' });
    });

    it('books an appointment and reports a conflict with its code', async () => {
        const app = appFor(createHarness());

        const created = await request(app).post('/api/appointments').set('Authorization', 'Bearer user-1').send(booking);
        expect(created.status).toBe(201);
        expect(created.body).toMatchObject({ status: 'success', data: { status: 'pending', user_id: 'user-1', total_price: 100 } });

        const clash = await request(app)
            .post('/api/appointments')
            .set('Authorization', 'Bearer user-2')
            .send({ ...booking, scheduled_at: at('14:15') });
        expect(clash.status).toBe(400);
        expect(clash.body).toEqual({
            status: 'error',
            code: 'TIME_CONFLICT',
            message: 'time conflict with another appointment',
            retryable: false,
        });

        const mine = await request(app).get('/api/appointments/my').set('Authorization', 'Bearer user-1');
        expect(mine.body.data).toHaveLength(1);
    });

    it('validates the request body', async () => {
        const res = await request(appFor(createHarness()))
            .post('/api/appointments')
            .set('Authorization', 'Bearer user-1')
            .send({ ...booking, scheduled_at: 'next tuesday' });
        expect(res.status).toBe(400);
        expect(res.body.code).toBe('INVALID_REQUEST');
        expect(res.body.details).toEqual([{ field: 'scheduled_at', message: 'Invalid timestamp' }]);
    });

    it('keeps status changes to the establishment owner', async () => {
        const app = appFor(createHarness({ appointments: [makeAppointment({ status: 'confirmed' })] }));

        const denied = await request(app).patch('/api/appointments/appt-1/status').set('Authorization', 'Bearer user-1').send({ status: 'completed' });
        expect(denied.status).toBe(403);

        const done = await request(app).patch('/api/appointments/appt-1/status').set('Authorization', 'Bearer owner-1').send({ status: 'completed' });
        expect(done.status).toBe(200);
        expect(done.body.data.status).toBe('completed');
    });

    it('cancels through the customer route', async () => {
        const app = appFor(createHarness({ appointments: [makeAppointment()] }));
        const res = await request(app).patch('/api/appointments/appt-1/cancel').set('Authorization', 'Bearer user-1').send({ reason: 'sick' });
        expect(res.status).toBe(200);
        expect(res.body.data).toEqual({ id: 'appt-1', cancelled: true });
    });

    it('confirms an appointment through an intent and its webhook', async () => {
        const harness = createHarness({ appointments: [makeAppointment()] });
        const app = appFor(harness);

        const intent = await request(app)
            .post('/api/payments/intent')
            .set('Authorization', 'Bearer user-1')
            .send({ appointment_id: 'appt-1', provider: 'mock' });
        expect(intent.status).toBe(201);
        expect(intent.body.data.amount).toBe(100);

        const event = JSON.stringify({ provider_payment_id: intent.body.data.provider_payment_id, status: 'succeeded', amount: 100 });
        const hook = await request(app).post('/api/payments/webhook/mock').set('Content-Type', 'application/json').send(event);
        expect(hook.status).toBe(200);
        expect(hook.body.data).toMatchObject({ handled: true, duplicate: false, status: 'succeeded' });

        expect((await harness.repository.getAppointment('appt-1'))?.status).toBe('confirmed');
    });

    it('answers 402 with the balance when a wallet payment falls short', async () => {
        const app = appFor(createHarness({ appointments: [makeAppointment()], wallets: [makeWallet('user-1', 40)] }));
        const res = await request(app).post('/api/payments/wallet').set('Authorization', 'Bearer user-1').send({ appointment_id: 'appt-1' });
        expect(res.status).toBe(402);
        expect(res.body).toMatchObject({ code: 'INSUFFICIENT_FUNDS', data: { balance: 40, requested: 100 } });
    });

    it('returns the wallet of the caller', async () => {
        const app = appFor(createHarness({ wallets: [makeWallet('user-1', 12.5)] }));
        const res = await request(app).get('/api/wallet').set('Authorization', 'Bearer user-1');
        expect(res.body.data).toEqual({ user_id: 'user-1', balance: 12.5, transactions: [] });
    });

    it('runs the walk-in queue', async () => {
        const app = appFor(createHarness());

        const joined = await request(app).post('/api/queue/join').set('Authorization', 'Bearer user-a').send({ establishment_id: 'est-1' });
        expect(joined.status).toBe(201);
        expect(joined.body.data.position).toBe(1);

        const duplicate = await request(app).post('/api/queue/join').set('Authorization', 'Bearer user-a').send({ establishment_id: 'est-1' });
        expect(duplicate.status).toBe(400);
        expect(duplicate.body.code).toBe('ALREADY_IN_QUEUE');

        const called = await request(app)
            .patch(`/api/queue/entries/${joined.body.data.id}/status`)
            .set('Authorization', 'Bearer owner-1')
            .send({ status: 'called' });
        expect(called.body.data.status).toBe('called');

        const left = await request(app).delete(`/api/queue/entries/${joined.body.data.id}`).set('Authorization', 'Bearer user-a');
        expect(left.body.data).toMatchObject({ status: 'left', position: 0 });

        const queue = await request(app).get('/api/queue/est-1').set('Authorization', 'Bearer user-a');
        expect(queue.body.data).toEqual([]);
    });

    it('answers unknown routes with a 404 body', async () => {
        const res = await request(appFor(createHarness())).get('/api/nope');
        expect(res.status).toBe(404);
        expect(res.body.code).toBe('NOT_FOUND');
    });
});

describe('createRateLimiter', () => {
    it('rejects requests above the window budget', async () => {
        const app = express();
        app.use(createRateLimiter({ windowMs: 60_000, maxRequests: 2 }));
        app.get('/', (req, res) => {
            res.json({ ok: true });
        });

        expect((await request(app).get('/')).status).toBe(200);
        expect((await request(app).get('/')).status).toBe(200);
        const limited = await request(app).get('/');
        expect(limited.status).toBe(429);
        expect(limited.body.code).toBe('RATE_LIMITED');
    });
});
