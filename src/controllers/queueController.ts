import { NextFunction, Request, Response } from 'express';
import { z } from 'zod';
import { currentUser } from '../middleware/authMiddleware';
import { validateBody } from '../middleware/validate';
import { QueueService } from '../services/queueService';
import { queueStatusSchema } from '../types';

const joinQueueSchema = z.object({
    establishment_id: z.string().min(1),
    service_id: z.string().min(1).nullish(),
    preferred_staff_id: z.string().min(1).nullish(),
});

const updateEntrySchema = z.object({
    status: queueStatusSchema,
    assigned_staff_id: z.string().min(1).nullish(),
});

export const createQueueController = (queue: QueueService) => ({
    joinQueue: async (req: Request, res: Response, next: NextFunction) => {
        try {
            const input = validateBody(joinQueueSchema, req.body);
            const data = await queue.join(currentUser(req).id, input);
            res.status(201).json({ status: 'success', message: `Joined queue at position ${data.position}`, data });
        } catch (error) {
            next(error);
        }
    },

    getQueue: async (req: Request, res: Response, next: NextFunction) => {
        try {
            const data = await queue.listByEstablishment(req.params.establishmentId);
            res.status(200).json({ status: 'success', message: 'Queue retrieved successfully', data });
        } catch (error) {
            next(error);
        }
    },

    updateQueueEntryStatus: async (req: Request, res: Response, next: NextFunction) => {
        try {
            const { status, assigned_staff_id } = validateBody(updateEntrySchema, req.body);
            const data = await queue.updateStatus(req.params.id, status, assigned_staff_id, currentUser(req).id);
            res.status(200).json({ status: 'success', message: 'Status updated successfully', data });
        } catch (error) {
            next(error);
        }
    },

    leaveQueue: async (req: Request, res: Response, next: NextFunction) => {
        try {
            const data = await queue.leave(req.params.id, currentUser(req).id);
            res.status(200).json({ status: 'success', message: 'Left the queue', data });
        } catch (error) {
            next(error);
        }
    },
});

export type QueueController = ReturnType<typeof createQueueController>;
