/**
 * Command Handler Registry
 *
 * Centralizes registration of all command handlers with the handler registry.
 */

import { logger } from '../../../config/logger.config';
import type { NotificationsService } from '../../../modules/notifications/notifications.service';
import type { PaymentsService } from '../../../modules/payments/payments.service';
import type { UsersService } from '../../../modules/users/users.service';
import type { HandlerRegistry } from '../handler-registry';
import { getNotificationCommandHandlers } from './notification-command.handlers';
import { getPaymentCommandHandlers } from './payment-command.handlers';
import { getUserCommandHandlers } from './user-command.handlers';

export interface HandlerServices {
  usersService: UsersService;
  paymentsService: PaymentsService;
  notificationsService: NotificationsService;
}

/**
 * Register every (operation, transport) handler.
 *
 * @param registry - The registry instance to register handlers with
 */
export function registerAllHandlers(registry: HandlerRegistry, services: HandlerServices): void {
  const registrations = [
    ...getUserCommandHandlers(services.usersService),
    ...getPaymentCommandHandlers(services.paymentsService),
    ...getNotificationCommandHandlers(services.notificationsService),
  ];

  registry.registerAll(registrations);

  logger.info(`Registered ${registrations.length} command handlers`, {
    operations: registry.listOperations(),
  });
}

// Re-export individual handler modules
export * from './user-command.handlers';
export * from './payment-command.handlers';
export * from './notification-command.handlers';
