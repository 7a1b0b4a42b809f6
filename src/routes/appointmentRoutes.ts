import { RequestHandler, Router } from 'express';
import { AppointmentController } from '../controllers/appointmentController';

export const appointmentRoutes = (controller: AppointmentController, requireAuth: RequestHandler): Router => {
    const router = Router();

    // Customer
    router.post('/', requireAuth, controller.createAppointment);
    router.get('/my', requireAuth, controller.getMyAppointments);
    router.patch('/:id/cancel', requireAuth, controller.cancelAppointment);

    // Owner
    router.get('/establishment/:id', requireAuth, controller.getEstablishmentAppointments);
    router.patch('/:id/status', requireAuth, controller.updateAppointmentStatus);
    router.post('/:id/no-show', requireAuth, controller.markNoShow);

    return router;
};
