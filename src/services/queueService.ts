import { randomUUID } from 'crypto';
import { createModuleLogger, Logger } from '../lib/logger';
import { QueueEntryPatch, SchedulingOp, SchedulingRepository } from '../repositories/schedulingRepository';
import { QueueEntry, QueueStatus } from '../types';
import { ForbiddenError, NotFoundError, StateError, ValidationError } from '../utils/errors';
import { notifySafely, NotificationService } from './notificationService';

const QUEUE_TRANSITIONS: Record<QueueStatus, readonly QueueStatus[]> = {
    waiting: ['called', 'left'],
    called: ['serving', 'left'],
    serving: ['completed', 'left'],
    completed: [],
    left: [],
};

export interface JoinQueueInput {
    establishment_id: string;
    service_id?: string | null;
    preferred_staff_id?: string | null;
}

export const canMoveQueueEntry = (from: QueueStatus, to: QueueStatus): boolean => QUEUE_TRANSITIONS[from].includes(to);

/**
 * Walk-in queue per establishment. A newcomer is placed after the last
 * waiting entry. An entry that finishes or leaves drops to position 0 and
 * every waiting entry behind it moves up one place in the same batch.
 */
export class QueueService {
    constructor(
        private readonly repository: SchedulingRepository,
        private readonly notifications: NotificationService,
        private readonly clock: () => Date = () => new Date(),
        private readonly log: Logger = createModuleLogger('queue'),
    ) {}

    async join(userId: string, input: JoinQueueInput): Promise<QueueEntry> {
        const establishment = await this.repository.getEstablishment(input.establishment_id);
        if (!establishment) throw new NotFoundError('Establishment', input.establishment_id);

        const existing = await this.repository.findActiveQueueEntry(establishment.id, userId);
        if (existing) {
            throw new ValidationError('ALREADY_IN_QUEUE', `Already in queue at position ${existing.position}`);
        }

        const waiting = (await this.repository.listActiveQueueEntries(establishment.id)).filter((e) => e.status === 'waiting');
        const nextPosition = waiting.reduce((max, e) => Math.max(max, e.position), 0) + 1;

        const entry: QueueEntry = {
            id: randomUUID(),
            establishment_id: establishment.id,
            user_id: userId,
            service_id: input.service_id ?? null,
            preferred_staff_id: input.preferred_staff_id ?? null,
            assigned_staff_id: null,
            position: nextPosition,
            status: 'waiting',
            entered_at: this.clock().toISOString(),
            called_at: null,
            started_at: null,
            completed_at: null,
        };
        await this.repository.commit([{ kind: 'insert_queue_entry', entry }]);

        this.log.info({ entryId: entry.id, establishmentId: establishment.id, position: nextPosition }, 'Joined queue');
        return entry;
    }

    async updateStatus(entryId: string, status: QueueStatus, assignedStaffId?: string | null, actorId?: string): Promise<QueueEntry> {
        const entry = await this.requireEntry(entryId);
        if (actorId) {
            const establishment = await this.repository.getEstablishment(entry.establishment_id);
            if (!establishment || establishment.owner_id !== actorId) {
                throw new ForbiddenError('Only the establishment owner can manage its queue');
            }
        }
        if (entry.status === status) return entry;

        const updated = await this.move(entry, status, assignedStaffId);

        if (status === 'called') {
            await notifySafely(this.notifications, this.log, entry.user_id, "It's your turn", 'Please proceed to the counter.', 'queue', {
                entry_id: entry.id,
            });
        } else if (status === 'serving') {
            const [next] = (await this.repository.listActiveQueueEntries(entry.establishment_id)).filter((e) => e.status === 'waiting');
            if (next) {
                await notifySafely(this.notifications, this.log, next.user_id, 'You are next', 'Your turn is approaching. You are next in line.', 'queue', {
                    entry_id: next.id,
                });
            }
        }
        return updated;
    }

    async leave(entryId: string, userId: string): Promise<QueueEntry> {
        const entry = await this.requireEntry(entryId);
        if (entry.user_id !== userId) throw new ForbiddenError('Queue entry belongs to another user');
        if (entry.status === 'left') return entry;
        return this.move(entry, 'left');
    }

    async listByEstablishment(establishmentId: string): Promise<QueueEntry[]> {
        return this.repository.listActiveQueueEntries(establishmentId);
    }

    private async move(entry: QueueEntry, status: QueueStatus, assignedStaffId?: string | null): Promise<QueueEntry> {
        if (!canMoveQueueEntry(entry.status, status)) {
            throw new StateError(`Cannot move queue entry from ${entry.status} to ${status}`);
        }

        const now = this.clock().toISOString();
        const patch: QueueEntryPatch = { status };
        if (assignedStaffId !== undefined) patch.assigned_staff_id = assignedStaffId;
        if (status === 'called') patch.called_at = now;
        if (status === 'serving') patch.started_at = now;
        if (status === 'completed' || status === 'left') {
            patch.completed_at = now;
            patch.position = 0;
        }

        const ops: SchedulingOp[] = [{ kind: 'update_queue_entry', entry_id: entry.id, from: entry.status, patch }];
        if (patch.position === 0) {
            ops.push({ kind: 'shift_queue_positions', establishment_id: entry.establishment_id, after_position: entry.position });
        }

        await this.repository.commit(ops);
        this.log.info({ entryId: entry.id, from: entry.status, to: status }, 'Queue entry updated');
        return { ...entry, ...patch };
    }

    private async requireEntry(id: string): Promise<QueueEntry> {
        const entry = await this.repository.getQueueEntry(id);
        if (!entry) throw new NotFoundError('Queue entry', id);
        return entry;
    }
}
