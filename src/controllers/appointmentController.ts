import { NextFunction, Request, Response } from 'express';
import { z } from 'zod';
import { currentUser } from '../middleware/authMiddleware';
import { validateBody, validateQuery } from '../middleware/validate';
import { SchedulingService } from '../services/schedulingService';
import { appointmentStatusSchema, paymentMethodSchema, paymentTypeSchema } from '../types';
import { isValidInstant } from '../utils/timeUtils';

const createAppointmentSchema = z.object({
    establishment_id: z.string().min(1),
    staff_id: z.string().min(1),
    service_id: z.string().min(1),
    bundle_id: z.string().min(1).nullable().optional(),
    scheduled_at: z.string().refine(isValidInstant, 'Invalid timestamp'),
    payment_method: paymentMethodSchema.optional(),
    payment_type: paymentTypeSchema.optional(),
    products: z
        .array(z.object({ product_id: z.string().min(1), quantity: z.number().int().positive().default(1) }))
        .max(20)
        .optional(),
});

const updateStatusSchema = z.object({ status: appointmentStatusSchema });

const cancelSchema = z.object({ reason: z.string().trim().max(500).optional() }).default({});

const myAppointmentsQuerySchema = z.object({ status: appointmentStatusSchema.optional() });

const establishmentQuerySchema = z.object({
    date: z
        .string()
        .regex(/^\d{4}-\d{2}-\d{2}$/, 'Expected YYYY-MM-DD')
        .optional(),
    staff_id: z.string().optional(),
    status: appointmentStatusSchema.optional(),
});

export const createAppointmentController = (scheduling: SchedulingService) => ({
    createAppointment: async (req: Request, res: Response, next: NextFunction) => {
        try {
            const input = validateBody(createAppointmentSchema, req.body);
            const data = await scheduling.createAppointment(currentUser(req).id, input);
            res.status(201).json({ status: 'success', message: 'Appointment booked successfully', data });
        } catch (error) {
            next(error);
        }
    },

    getMyAppointments: async (req: Request, res: Response, next: NextFunction) => {
        try {
            const { status } = validateQuery(myAppointmentsQuerySchema, req.query);
            const data = await scheduling.listByUser(currentUser(req).id, status);
            res.status(200).json({ status: 'success', message: 'Appointments retrieved successfully', data });
        } catch (error) {
            next(error);
        }
    },

    getEstablishmentAppointments: async (req: Request, res: Response, next: NextFunction) => {
        try {
            const query = validateQuery(establishmentQuerySchema, req.query);
            const data = await scheduling.listByEstablishment(
                req.params.id,
                { date: query.date, staffId: query.staff_id, status: query.status },
                currentUser(req).id,
            );
            res.status(200).json({ status: 'success', message: 'Appointments retrieved successfully', data });
        } catch (error) {
            next(error);
        }
    },

    updateAppointmentStatus: async (req: Request, res: Response, next: NextFunction) => {
        try {
            const { status } = validateBody(updateStatusSchema, req.body);
            const data = await scheduling.updateAppointmentStatus(req.params.id, status, currentUser(req).id);
            res.status(200).json({ status: 'success', message: `Appointment marked as ${data.status}`, data });
        } catch (error) {
            next(error);
        }
    },

    cancelAppointment: async (req: Request, res: Response, next: NextFunction) => {
        try {
            const { reason } = validateBody(cancelSchema, req.body);
            await scheduling.cancelAppointment(req.params.id, currentUser(req).id, reason ?? null);
            res.status(200).json({ status: 'success', message: 'Appointment cancelled', data: { id: req.params.id, cancelled: true } });
        } catch (error) {
            next(error);
        }
    },

    markNoShow: async (req: Request, res: Response, next: NextFunction) => {
        try {
            const data = await scheduling.markNoShow(req.params.id, currentUser(req).id);
            res.status(200).json({ status: 'success', message: 'Appointment marked as no-show', data });
        } catch (error) {
            next(error);
        }
    },
});

export type AppointmentController = ReturnType<typeof createAppointmentController>;
