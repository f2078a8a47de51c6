/**
 * Composition root.
 *
 * Everything is wired through constructors; there is no global container.
 * `buildApplication` takes the bound ports and returns the Application record
 * that transports dispatch through. Tests build one per case from fakes.
 */

import type {
  EmailService,
  NotificationRepository,
  PaymentGateway,
  PaymentRepository,
  UserRepository,
} from './domain';
import { MockEmailService } from './integrations/email/mock-email.service';
import { MockPaymentGateway } from './integrations/payments/mock-payment-gateway';
import { InMemoryNotificationRepository } from './modules/notifications/notifications.memory-repository';
import { NotificationsService } from './modules/notifications/notifications.service';
import { InMemoryPaymentRepository } from './modules/payments/payments.memory-repository';
import { PaymentsService } from './modules/payments/payments.service';
import { InMemoryUserRepository } from './modules/users/users.memory-repository';
import { UsersService } from './modules/users/users.service';
import { CommandBus, HandlerRegistry, HandlerServices, registerAllHandlers } from './shared/command-bus';
import type { IdempotencyStore } from './shared/command-bus/idempotency.store';
import {
  BusEventPublisher,
  DomainEventBus,
  DomainEventSubscriber,
  LoggingEventSubscriber,
} from './shared/events';

export interface ApplicationPorts {
  userRepo: UserRepository;
  paymentRepo: PaymentRepository;
  notificationRepo: NotificationRepository;
  emailService: EmailService;
  paymentGateway: PaymentGateway;
  idempotencyStore?: IdempotencyStore;
  /** Extra event fan-out next to the logging subscriber */
  eventSubscribers?: DomainEventSubscriber[];
}

export interface ApplicationOptions {
  appName: string;
  idempotencyTtlMs?: number;
}

export interface Application {
  registry: HandlerRegistry;
  commandBus: CommandBus;
  eventBus: DomainEventBus;
  services: HandlerServices;
  ports: ApplicationPorts;
}

export function buildApplication(ports: ApplicationPorts, options: ApplicationOptions): Application {
  const eventBus = new DomainEventBus();
  eventBus.subscribe(new LoggingEventSubscriber());
  for (const subscriber of ports.eventSubscribers ?? []) {
    eventBus.subscribe(subscriber);
  }
  const eventPublisher = new BusEventPublisher(eventBus);

  const services: HandlerServices = {
    usersService: new UsersService(
      ports.userRepo,
      ports.notificationRepo,
      eventPublisher,
      options.appName
    ),
    paymentsService: new PaymentsService(
      ports.paymentRepo,
      ports.userRepo,
      ports.paymentGateway,
      eventPublisher
    ),
    notificationsService: new NotificationsService(
      ports.notificationRepo,
      ports.emailService,
      eventPublisher
    ),
  };

  const registry = new HandlerRegistry();
  registerAllHandlers(registry, services);

  const commandBus = new CommandBus(registry, {
    idempotencyStore: ports.idempotencyStore,
    idempotencyTtlMs: options.idempotencyTtlMs,
  });

  return { registry, commandBus, eventBus, services, ports };
}

/**
 * Memory-backed repositories and mock providers.
 */
export function createInMemoryPorts(overrides: Partial<ApplicationPorts> = {}): ApplicationPorts {
  return {
    userRepo: new InMemoryUserRepository(),
    paymentRepo: new InMemoryPaymentRepository(),
    notificationRepo: new InMemoryNotificationRepository(),
    emailService: new MockEmailService(),
    paymentGateway: new MockPaymentGateway(),
    ...overrides,
  };
}
