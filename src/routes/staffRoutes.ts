import { RequestHandler, Router } from 'express';
import { StaffGoalController } from '../controllers/staffGoalController';

export const staffRoutes = (controller: StaffGoalController, requireAuth: RequestHandler): Router => {
    const router = Router();
    router.get('/:staffId/goals', requireAuth, controller.getActiveGoals);
    return router;
};
