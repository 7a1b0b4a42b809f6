import { createModuleLogger, Logger } from '../lib/logger';

export type NotificationType = 'appointment' | 'queue' | 'payment' | 'wallet';

// Interface for Notification Service
export interface NotificationService {
    notify(userId: string, title: string, message: string, type: NotificationType, data?: Record<string, string>): Promise<void>;
}

// Log-only implementation used until a push/SMS channel is wired in
export class LogNotificationService implements NotificationService {
    constructor(private readonly log: Logger = createModuleLogger('notifications')) {}

    async notify(userId: string, title: string, message: string, type: NotificationType, data: Record<string, string> = {}): Promise<void> {
        this.log.info({ userId, type, data }, `[notify] ${title}: ${message}`);
    }
}

/**
 * Delivers a notification without letting a delivery failure reach the caller.
 * Callers invoke it after their batch has committed.
 */
export const notifySafely = async (
    service: NotificationService,
    log: Logger,
    userId: string,
    title: string,
    message: string,
    type: NotificationType,
    data: Record<string, string> = {},
): Promise<void> => {
    try {
        await service.notify(userId, title, message, type, data);
    } catch (err) {
        log.warn({ err, userId, type }, 'Notification delivery failed');
    }
};
