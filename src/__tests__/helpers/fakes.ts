import { Application, ApplicationPorts, buildApplication, createInMemoryPorts } from '../../container';
import type { EmailMessage, EmailSendResult, EmailService, GatewayChargeRequest, GatewayChargeResult, PaymentGateway } from '../../domain';
import { InMemoryNotificationRepository } from '../../modules/notifications/notifications.memory-repository';
import { InMemoryPaymentRepository } from '../../modules/payments/payments.memory-repository';
import { InMemoryUserRepository } from '../../modules/users/users.memory-repository';
import type { DomainEvent, DomainEventSubscriber } from '../../shared/events';

export class RecordingSubscriber implements DomainEventSubscriber {
  readonly name = 'recording';
  readonly events: DomainEvent[] = [];

  handle(event: DomainEvent): void {
    this.events.push(event);
  }

  ofType(type: string): DomainEvent[] {
    return this.events.filter((event) => event.type === type);
  }
}

/** Gateway whose next answer is set by the test */
export class StubPaymentGateway implements PaymentGateway {
  readonly requests: GatewayChargeRequest[] = [];
  next: GatewayChargeResult | Error = { success: true, transactionId: 'txn_test_1' };

  async process(request: GatewayChargeRequest): Promise<GatewayChargeResult> {
    this.requests.push(request);
    if (this.next instanceof Error) throw this.next;
    return this.next;
  }
}

export class StubEmailService implements EmailService {
  readonly messages: EmailMessage[] = [];
  next: EmailSendResult | Error = { success: true, messageId: 'msg_test_1' };

  async send(message: EmailMessage): Promise<EmailSendResult> {
    this.messages.push(message);
    if (this.next instanceof Error) throw this.next;
    return this.next;
  }
}

export interface TestHarness {
  app: Application;
  users: InMemoryUserRepository;
  payments: InMemoryPaymentRepository;
  notifications: InMemoryNotificationRepository;
  gateway: StubPaymentGateway;
  email: StubEmailService;
  events: RecordingSubscriber;
}

export const TEST_APP_NAME = 'Test App';

/**
 * A fresh Application over memory repositories and stub providers.
 */
export function createTestHarness(overrides: Partial<ApplicationPorts> = {}): TestHarness {
  const users = new InMemoryUserRepository();
  const payments = new InMemoryPaymentRepository();
  const notifications = new InMemoryNotificationRepository();
  const gateway = new StubPaymentGateway();
  const email = new StubEmailService();
  const events = new RecordingSubscriber();

  const ports = createInMemoryPorts({
    userRepo: users,
    paymentRepo: payments,
    notificationRepo: notifications,
    paymentGateway: gateway,
    emailService: email,
    eventSubscribers: [events],
    ...overrides,
  });

  return {
    app: buildApplication(ports, { appName: TEST_APP_NAME }),
    users,
    payments,
    notifications,
    gateway,
    email,
    events,
  };
}
