import { describe, expect, it } from 'vitest';
import { StaffBlock } from '../types';
import { validateSlot, SlotRequest } from '../utils/availability';
import { intervalsOverlap } from '../utils/timeUtils';
import { at, makeAppointment, makeEstablishment, makeService, makeStaff } from './fixtures';

const request = (overrides: Partial<SlotRequest> = {}): SlotRequest => ({
    establishment: makeEstablishment(),
    staff: makeStaff(),
    service: makeService(),
    scheduledAt: at('14:00'),
    blocks: [],
    existingAppointments: [],
    ...overrides,
});

const block = (start: string, end: string): StaffBlock => ({ id: 'block-1', staff_id: 'staff-1', start_at: start, end_at: end, reason: 'training' });

describe('intervalsOverlap', () => {
    const d = (time: string) => new Date(at(time));

    it('treats touching intervals as free', () => {
        expect(intervalsOverlap(d('14:00'), d('14:30'), d('14:30'), d('15:00'))).toBe(false);
        expect(intervalsOverlap(d('14:30'), d('15:00'), d('14:00'), d('14:30'))).toBe(false);
    });

    it('detects partial overlap and containment', () => {
        expect(intervalsOverlap(d('14:00'), d('14:30'), d('14:15'), d('14:45'))).toBe(true);
        expect(intervalsOverlap(d('14:00'), d('15:00'), d('14:10'), d('14:20'))).toBe(true);
        expect(intervalsOverlap(d('14:10'), d('14:20'), d('14:00'), d('15:00'))).toBe(true);
    });

    it('is false for disjoint intervals', () => {
        expect(intervalsOverlap(d('09:00'), d('10:00'), d('11:00'), d('12:00'))).toBe(false);
    });

    it('treats identical intervals as overlapping', () => {
        expect(intervalsOverlap(d('14:00'), d('14:30'), d('14:00'), d('14:30'))).toBe(true);
    });

    it('agrees with a minute-by-minute check on random pairs', () => {
        // mulberry32, fixed seed so failures reproduce
        let seed = 0x5eed;
        const random = () => {
            seed = (seed + 0x6d2b79f5) | 0;
            let t = Math.imul(seed ^ (seed >>> 15), 1 | seed);
            t = (t + Math.imul(t ^ (t >>> 7), 61 | t)) ^ t;
            return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
        };
        const minute = (n: number) => new Date(Date.UTC(2030, 0, 7, 14, n));
        const interval = (): [number, number] => {
            const start = Math.floor(random() * 24);
            return [start, start + 1 + Math.floor(random() * 8)];
        };
        const sharesMinute = ([aStart, aEnd]: [number, number], [bStart, bEnd]: [number, number]) => {
            for (let m = aStart; m < aEnd; m++) {
                if (m >= bStart && m < bEnd) return true;
            }
            return false;
        };

        for (let i = 0; i < 1000; i++) {
            const a = interval();
            const b = interval();
            const expected = sharesMinute(a, b);
            expect(intervalsOverlap(minute(a[0]), minute(a[1]), minute(b[0]), minute(b[1])), `[${a}) vs [${b})`).toBe(expected);
            expect(intervalsOverlap(minute(b[0]), minute(b[1]), minute(a[0]), minute(a[1]))).toBe(expected);
        }
    });
});

describe('validateSlot', () => {
    it('accepts a free slot inside working hours', () => {
        const decision = validateSlot(request());
        expect(decision).toEqual({ ok: true, start: new Date(at('14:00')), end: new Date(at('14:30')) });
    });

    it('books back to back but rejects an overlapping start', () => {
        const existing = [makeAppointment({ scheduled_at: at('14:00') })];

        expect(validateSlot(request({ scheduledAt: at('14:15'), existingAppointments: existing }))).toEqual({
            ok: false,
            code: 'TIME_CONFLICT',
            message: 'time conflict with another appointment',
        });
        expect(validateSlot(request({ scheduledAt: at('14:30'), existingAppointments: existing })).ok).toBe(true);
        expect(validateSlot(request({ scheduledAt: at('13:30'), existingAppointments: existing })).ok).toBe(true);
    });

    it('ignores cancelled appointments and other staff', () => {
        const existing = [
            makeAppointment({ status: 'cancelled' }),
            makeAppointment({ id: 'appt-2', staff_id: 'staff-2' }),
        ];
        expect(validateSlot(request({ existingAppointments: existing })).ok).toBe(true);
    });

    it('reads timestamps without an offset as UTC', () => {
        const decision = validateSlot(request({ scheduledAt: '2030-01-07T14:00:00' }));
        expect(decision.ok && decision.start.toISOString()).toBe('2030-01-07T14:00:00.000Z');
    });

    it('rejects a day the establishment is closed', () => {
        expect(validateSlot(request({ scheduledAt: at('14:00', '2030-01-06') }))).toEqual({
            ok: false,
            code: 'ESTABLISHMENT_CLOSED',
            message: 'establishment closed on sun',
        });
    });

    it('treats an explicit closed day as closed', () => {
        const establishment = makeEstablishment({ business_hours: { mon: { closed: true } } });
        expect(validateSlot(request({ establishment }))).toMatchObject({ ok: false, code: 'ESTABLISHMENT_CLOSED' });
    });

    it('rejects a staff day off', () => {
        const staff = makeStaff({ work_schedule: { mon: null } });
        expect(validateSlot(request({ staff }))).toEqual({ ok: false, code: 'STAFF_UNAVAILABLE', message: 'staff does not work on mon' });
    });

    it('falls back to establishment hours for days missing from the staff schedule', () => {
        const staff = makeStaff({ work_schedule: { tue: { open: '12:00', close: '13:00' } } });
        expect(validateSlot(request({ staff })).ok).toBe(true);
    });

    it('checks the start against the staff hours as a half-open range', () => {
        const staff = makeStaff({ work_schedule: { mon: { open: '10:00', close: '16:00' } } });

        expect(validateSlot(request({ staff, scheduledAt: at('09:30') }))).toEqual({
            ok: false,
            code: 'STAFF_UNAVAILABLE',
            message: 'outside staff hours 10:00-16:00',
        });
        expect(validateSlot(request({ staff, scheduledAt: at('16:00') })).ok).toBe(false);
        expect(validateSlot(request({ staff, scheduledAt: at('10:00') })).ok).toBe(true);
    });

    it('lets a booking run past closing when it starts before close', () => {
        expect(validateSlot(request({ scheduledAt: at('17:50') }))).toEqual({
            ok: true,
            start: new Date(at('17:50')),
            end: new Date(at('18:20')),
        });
    });

    it('normalises loosely formatted hours', () => {
        const establishment = makeEstablishment({ business_hours: { mon: { open: '9:00', close: '18:00:00' } } });
        expect(validateSlot(request({ establishment, scheduledAt: at('09:00') })).ok).toBe(true);
    });

    it('rejects slots that hit a schedule block', () => {
        const blocks = [block(at('14:20'), at('15:00'))];
        expect(validateSlot(request({ blocks }))).toEqual({
            ok: false,
            code: 'SCHEDULE_BLOCKED',
            message: 'staff unavailable (schedule block)',
        });
    });

    it('allows a slot that ends when a block starts', () => {
        expect(validateSlot(request({ blocks: [block(at('14:30'), at('15:00'))] })).ok).toBe(true);
    });

    it('reports the block before an appointment conflict', () => {
        const decision = validateSlot(
            request({ blocks: [block(at('14:00'), at('14:30'))], existingAppointments: [makeAppointment()] }),
        );
        expect(decision).toMatchObject({ ok: false, code: 'SCHEDULE_BLOCKED' });
    });

    it('rejects inactive staff and staff from another establishment', () => {
        expect(validateSlot(request({ staff: makeStaff({ is_active: false }) }))).toMatchObject({ ok: false, code: 'STAFF_UNAVAILABLE' });
        expect(validateSlot(request({ staff: makeStaff({ establishment_id: 'est-2' }) }))).toMatchObject({
            ok: false,
            code: 'STAFF_UNAVAILABLE',
        });
    });

    it('rejects a service of another establishment', () => {
        expect(validateSlot(request({ service: makeService({ establishment_id: 'est-2' }) }))).toMatchObject({
            ok: false,
            code: 'SERVICE_MISMATCH',
        });
    });
});
