import { NextFunction, Request, Response } from 'express';
import { currentUser } from '../middleware/authMiddleware';
import { StaffGoalService } from '../services/staffGoalService';

export const createStaffGoalController = (goals: StaffGoalService, clock: () => Date = () => new Date()) => ({
    getActiveGoals: async (req: Request, res: Response, next: NextFunction) => {
        try {
            const data = await goals.activeGoalsWithProgress(req.params.staffId, clock(), currentUser(req).id);
            res.status(200).json({ status: 'success', message: 'Goals retrieved successfully', data });
        } catch (error) {
            next(error);
        }
    },
});

export type StaffGoalController = ReturnType<typeof createStaffGoalController>;
