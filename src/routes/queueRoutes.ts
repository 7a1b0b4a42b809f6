import { RequestHandler, Router } from 'express';
import { QueueController } from '../controllers/queueController';

export const queueRoutes = (controller: QueueController, requireAuth: RequestHandler): Router => {
    const router = Router();

    router.post('/join', requireAuth, controller.joinQueue);
    router.patch('/entries/:id/status', requireAuth, controller.updateQueueEntryStatus);
    router.delete('/entries/:id', requireAuth, controller.leaveQueue);
    router.get('/:establishmentId', requireAuth, controller.getQueue);

    return router;
};
