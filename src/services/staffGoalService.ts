import { SchedulingRepository } from '../repositories/schedulingRepository';
import { StaffGoal } from '../types';
import { ForbiddenError, NotFoundError } from '../utils/errors';
import { roundMoney, sumMoney } from '../utils/money';

export interface GoalProgress {
    current_value: number;
    progress_percentage: number;
    is_completed: boolean;
}

export type GoalWithProgress = StaffGoal & GoalProgress;

/**
 * Read-side goal figures, recomputed from completed appointments rather than
 * trusting the running current_value kept by settlement.
 */
export class StaffGoalService {
    constructor(private readonly repository: SchedulingRepository) {}

    async calculateProgress(goal: StaffGoal): Promise<GoalProgress> {
        const completed = await this.repository.listCompletedStaffAppointments(goal.staff_id, goal.start_date, goal.end_date);

        let current = 0;
        switch (goal.goal_type) {
            case 'revenue':
                current = sumMoney(completed.map((a) => a.total_price));
                break;
            case 'services_count':
                current = completed.length;
                break;
            case 'customer_count':
                current = new Set(completed.map((a) => a.user_id)).size;
                break;
        }

        const percentage = goal.target_value > 0 ? (current / goal.target_value) * 100 : 0;
        return {
            current_value: current,
            progress_percentage: roundMoney(percentage),
            is_completed: current >= goal.target_value,
        };
    }

    async activeGoalsWithProgress(staffId: string, at: Date, actorId?: string): Promise<GoalWithProgress[]> {
        if (actorId) {
            const staff = await this.repository.getStaffMember(staffId);
            if (!staff) throw new NotFoundError('Staff member', staffId);
            const establishment = await this.repository.getEstablishment(staff.establishment_id);
            // The staff member may read their own goals.
            if (staff.user_id !== actorId && establishment?.owner_id !== actorId) {
                throw new ForbiddenError('Only the staff member or the establishment owner can view these goals');
            }
        }
        const goals = await this.repository.listActiveGoals(staffId, at);
        return Promise.all(goals.map(async (goal) => ({ ...goal, ...(await this.calculateProgress(goal)) })));
    }
}
