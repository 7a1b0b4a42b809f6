import { describe, expect, it } from 'vitest';
import { QueueEntry } from '../types';
import { ForbiddenError, StateError, ValidationError } from '../utils/errors';
import { at, createHarness } from './fixtures';

const joinAll = async (harness: ReturnType<typeof createHarness>, users: string[]) => {
    const entries: QueueEntry[] = [];
    for (const user of users) {
        entries.push(await harness.services.queue.join(user, { establishment_id: 'est-1' }));
    }
    return entries;
};

describe('QueueService', () => {
    it('hands out consecutive positions and refuses a second active entry', async () => {
        const harness = createHarness();
        const entries = await joinAll(harness, ['user-a', 'user-b', 'user-c']);

        expect(entries.map((e) => e.position)).toEqual([1, 2, 3]);
        expect(entries[0]).toMatchObject({ status: 'waiting', entered_at: at('08:00'), assigned_staff_id: null });

        const again = harness.services.queue.join('user-b', { establishment_id: 'est-1' });
        await expect(again).rejects.toBeInstanceOf(ValidationError);
        await expect(again).rejects.toMatchObject({ reason: 'ALREADY_IN_QUEUE' });
    });

    it('closes the gap when someone in the middle leaves', async () => {
        const harness = createHarness();
        const [, second] = await joinAll(harness, ['user-a', 'user-b', 'user-c', 'user-d']);

        const left = await harness.services.queue.leave(second.id, 'user-b');

        expect(left).toMatchObject({ status: 'left', position: 0, completed_at: at('08:00') });
        const active = await harness.services.queue.listByEstablishment('est-1');
        expect(active.map((e) => [e.user_id, e.position])).toEqual([
            ['user-a', 1],
            ['user-c', 2],
            ['user-d', 3],
        ]);
    });

    it('walks an entry through called, serving and completed', async () => {
        const harness = createHarness();
        const [first] = await joinAll(harness, ['user-a', 'user-b']);

        const called = await harness.services.queue.updateStatus(first.id, 'called', 'staff-1', 'owner-1');
        expect(called).toMatchObject({ status: 'called', called_at: at('08:00'), assigned_staff_id: 'staff-1', position: 1 });

        const serving = await harness.services.queue.updateStatus(first.id, 'serving', undefined, 'owner-1');
        expect(serving).toMatchObject({ status: 'serving', started_at: at('08:00'), assigned_staff_id: 'staff-1' });

        const done = await harness.services.queue.updateStatus(first.id, 'completed', undefined, 'owner-1');
        expect(done).toMatchObject({ status: 'completed', completed_at: at('08:00'), position: 0 });

        const remaining = await harness.services.queue.listByEstablishment('est-1');
        expect(remaining.map((e) => [e.user_id, e.position])).toEqual([['user-b', 1]]);

        expect(harness.notifications.sent).toEqual([
            { userId: 'user-a', title: "It's your turn", type: 'queue' },
            { userId: 'user-b', title: 'You are next', type: 'queue' },
        ]);
    });

    it('numbers newcomers and reorders only among waiting entries', async () => {
        const harness = createHarness();
        const { queue } = harness.services;
        const [a, b] = await joinAll(harness, ['user-a', 'user-b']);
        for (const entry of [a, b]) {
            await queue.updateStatus(entry.id, 'called', 'staff-1', 'owner-1');
            await queue.updateStatus(entry.id, 'serving', undefined, 'owner-1');
        }

        const c = await queue.join('user-c', { establishment_id: 'est-1' });
        expect(c.position).toBe(1);

        await queue.updateStatus(a.id, 'completed', undefined, 'owner-1');

        const active = await queue.listByEstablishment('est-1');
        expect(active.map((e) => [e.user_id, e.status, e.position])).toEqual([
            ['user-c', 'waiting', 1],
            ['user-b', 'serving', 2],
        ]);
    });

    it('lets the user join again after finishing', async () => {
        const harness = createHarness();
        const [entry] = await joinAll(harness, ['user-a']);
        await harness.services.queue.leave(entry.id, 'user-a');

        const rejoined = await harness.services.queue.join('user-a', { establishment_id: 'est-1' });
        expect(rejoined.position).toBe(1);
    });

    it('rejects skipping the call step', async () => {
        const harness = createHarness();
        const [entry] = await joinAll(harness, ['user-a']);
        await expect(harness.services.queue.updateStatus(entry.id, 'serving')).rejects.toBeInstanceOf(StateError);
    });

    it('keeps the queue to its owner and entries to their users', async () => {
        const harness = createHarness();
        const [entry] = await joinAll(harness, ['user-a']);

        await expect(harness.services.queue.updateStatus(entry.id, 'called', undefined, 'user-a')).rejects.toBeInstanceOf(ForbiddenError);
        await expect(harness.services.queue.leave(entry.id, 'user-b')).rejects.toBeInstanceOf(ForbiddenError);
    });
});
