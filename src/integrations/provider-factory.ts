import type { Env } from '../config/env.config';
import { logger } from '../config/logger.config';
import type { EmailService, PaymentGateway } from '../domain';
import { HttpEmailService } from './email/http-email.service';
import { MockEmailService } from './email/mock-email.service';
import { HttpPaymentGateway } from './payments/http-payment-gateway';
import { MockPaymentGateway } from './payments/mock-payment-gateway';

/** API key value that selects the in-process mock providers */
export const MOCK_API_KEY = 'mock_key';

export type ProviderKind = 'http' | 'mock';

/**
 * Factory for outbound provider adapters.
 *
 * Selection happens once at composition time from configuration.
 */
export class ProviderFactory {
  static providerKind(apiKey: string): ProviderKind {
    return apiKey === MOCK_API_KEY ? 'mock' : 'http';
  }

  static createEmailService(env: Env): EmailService {
    const kind = ProviderFactory.providerKind(env.EMAIL_SERVICE_API_KEY);
    logger.info(`Creating email service: ${kind}`);

    return kind === 'mock'
      ? new MockEmailService()
      : new HttpEmailService(env.EMAIL_SERVICE_URL, env.EMAIL_SERVICE_API_KEY);
  }

  static createPaymentGateway(env: Env): PaymentGateway {
    const kind = ProviderFactory.providerKind(env.PAYMENT_GATEWAY_API_KEY);
    logger.info(`Creating payment gateway: ${kind}`);

    return kind === 'mock'
      ? new MockPaymentGateway()
      : new HttpPaymentGateway(env.PAYMENT_GATEWAY_URL, env.PAYMENT_GATEWAY_API_KEY);
  }
}
