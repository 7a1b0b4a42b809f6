import { AppointmentStatus, Establishment, Service } from '../types';
import { StateError } from './errors';

const TRANSITIONS: Record<AppointmentStatus, readonly AppointmentStatus[]> = {
    pending: ['confirmed', 'completed', 'cancelled', 'no_show'],
    awaiting_deposit: ['confirmed', 'completed', 'cancelled', 'no_show'],
    confirmed: ['completed', 'cancelled', 'no_show'],
    completed: [],
    cancelled: [],
    no_show: [],
};

export const TERMINAL_STATUSES: readonly AppointmentStatus[] = ['completed', 'cancelled', 'no_show'];

export const PAYABLE_STATUSES: readonly AppointmentStatus[] = ['pending', 'awaiting_deposit'];

export const isTerminal = (status: AppointmentStatus): boolean => TERMINAL_STATUSES.includes(status);

export const canTransition = (from: AppointmentStatus, to: AppointmentStatus): boolean => TRANSITIONS[from].includes(to);

export const assertTransition = (from: AppointmentStatus, to: AppointmentStatus): void => {
    if (!canTransition(from, to)) {
        throw new StateError(`Cannot move appointment from ${from} to ${to}`);
    }
};

/**
 * A booking waits for a deposit when the service demands one or the
 * establishment charges a deposit percentage on every booking.
 */
export const initialStatus = (
    service: Pick<Service, 'deposit_required'>,
    establishment: Pick<Establishment, 'deposit_percent'>,
): AppointmentStatus => (service.deposit_required || establishment.deposit_percent > 0 ? 'awaiting_deposit' : 'pending');
