import { Appointment, DayHours, Establishment, Service, StaffBlock, StaffMember, WeeklyHours } from '../types';
import { ValidationCode } from './errors';
import { addMinutes, intervalsOverlap, normalizeTime, parseInstant, timeOfDay, weekdayKey } from './timeUtils';

export interface SlotRequest {
    establishment: Establishment;
    staff: StaffMember;
    service: Service;
    scheduledAt: string | Date;
    blocks: StaffBlock[];
    existingAppointments: Appointment[];
}

export type SlotDecision =
    | { ok: true; start: Date; end: Date }
    | { ok: false; code: ValidationCode; message: string };

type OpenHours = { open: string; close: string };

const openHours = (hours: DayHours | null | undefined): OpenHours | null => {
    if (!hours || 'closed' in hours) return null;
    return { open: normalizeTime(hours.open), close: normalizeTime(hours.close) };
};

const hoursFor = (schedule: WeeklyHours, day: string): OpenHours | null => openHours(schedule[day]);

const reject = (code: ValidationCode, message: string): SlotDecision => ({ ok: false, code, message });

/**
 * Decides whether a staff member can take a booking that starts at `scheduledAt`.
 *
 * Checks run in a fixed order and the first failure wins: establishment day,
 * staff day, staff hours (start only), schedule blocks, then existing appointments.
 * Cancelled appointments never conflict; touching intervals are allowed.
 */
export const validateSlot = (req: SlotRequest): SlotDecision => {
    const { establishment, staff, service } = req;

    if (staff.establishment_id !== establishment.id || !staff.is_active) {
        return reject('STAFF_UNAVAILABLE', `staff ${staff.id} is not available at establishment ${establishment.id}`);
    }
    if (service.establishment_id !== establishment.id) {
        return reject('SERVICE_MISMATCH', `service ${service.id} is not offered by establishment ${establishment.id}`);
    }

    const start = parseInstant(req.scheduledAt);
    const day = weekdayKey(start);
    const end = addMinutes(start, service.duration_minutes);

    const establishmentHours = hoursFor(establishment.business_hours, day);
    if (!establishmentHours) {
        return reject('ESTABLISHMENT_CLOSED', `establishment closed on ${day}`);
    }

    // A missing staff entry inherits the establishment's day; an explicit closed/null entry is a day off.
    const staffDay = staff.work_schedule?.[day];
    const staffHours = staffDay === undefined ? establishmentHours : openHours(staffDay);
    if (!staffHours) {
        return reject('STAFF_UNAVAILABLE', `staff does not work on ${day}`);
    }

    // Only the start has to fall inside working hours; the end may run past close.
    const startTime = timeOfDay(start);
    if (startTime < staffHours.open || startTime >= staffHours.close) {
        return reject('STAFF_UNAVAILABLE', `outside staff hours ${staffHours.open}-${staffHours.close}`);
    }

    const blocked = req.blocks.some(
        (b) => b.staff_id === staff.id && intervalsOverlap(start, end, parseInstant(b.start_at), parseInstant(b.end_at)),
    );
    if (blocked) {
        return reject('SCHEDULE_BLOCKED', 'staff unavailable (schedule block)');
    }

    const conflict = req.existingAppointments.some((appt) => {
        if (appt.staff_id !== staff.id || appt.status === 'cancelled') return false;
        const apptStart = parseInstant(appt.scheduled_at);
        return intervalsOverlap(start, end, apptStart, addMinutes(apptStart, appt.duration_minutes));
    });
    if (conflict) {
        return reject('TIME_CONFLICT', 'time conflict with another appointment');
    }

    return { ok: true, start, end };
};
