import {
  EventPublisher,
  Payment,
  PaymentGateway,
  PaymentRepository,
  UserDomainService,
  UserRepository,
} from '../../domain';
import { getPayment, processPayment, refundPayment } from './use-cases';
import type {
  GetPaymentCommand,
  ProcessPaymentCommand,
  RefundPaymentCommand,
} from './payments.schemas';

export class PaymentsService {
  private readonly userDomainService: UserDomainService;

  constructor(
    private readonly paymentRepo: PaymentRepository,
    userRepo: UserRepository,
    private readonly paymentGateway: PaymentGateway,
    private readonly eventPublisher: EventPublisher
  ) {
    this.userDomainService = new UserDomainService(userRepo);
  }

  async processPayment(command: ProcessPaymentCommand): Promise<Payment> {
    return processPayment(
      {
        paymentRepo: this.paymentRepo,
        paymentGateway: this.paymentGateway,
        userDomainService: this.userDomainService,
        eventPublisher: this.eventPublisher,
      },
      command
    );
  }

  async refundPayment(command: RefundPaymentCommand): Promise<Payment> {
    return refundPayment(
      { paymentRepo: this.paymentRepo, eventPublisher: this.eventPublisher },
      command
    );
  }

  async getPayment(command: GetPaymentCommand): Promise<Payment> {
    return getPayment({ paymentRepo: this.paymentRepo }, command);
  }
}
