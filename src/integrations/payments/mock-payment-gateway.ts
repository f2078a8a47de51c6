import { v4 as uuidv4 } from 'uuid';
import { logger } from '../../config/logger.config';
import type { GatewayChargeRequest, GatewayChargeResult, PaymentGateway } from '../../domain';

export const MOCK_DECLINE_REASON = 'Insufficient funds';

export interface MockPaymentGatewayOptions {
  /** Share of charges that are declined, between 0 and 1 */
  failureRate?: number;
  random?: () => number;
  /** Most recent requests kept in `charges`; older ones are dropped */
  maxRecorded?: number;
}

const DEFAULT_MAX_RECORDED = 100;

/**
 * In-process processor that approves charges except for a random share.
 */
export class MockPaymentGateway implements PaymentGateway {
  readonly charges: GatewayChargeRequest[] = [];
  private readonly failureRate: number;
  private readonly random: () => number;
  private readonly maxRecorded: number;

  constructor(options: MockPaymentGatewayOptions = {}) {
    this.failureRate = options.failureRate ?? 0.1;
    this.random = options.random ?? Math.random;
    this.maxRecorded = options.maxRecorded ?? DEFAULT_MAX_RECORDED;
  }

  async process(request: GatewayChargeRequest): Promise<GatewayChargeResult> {
    this.record(request);

    if (this.random() < this.failureRate) {
      return { success: false, error: MOCK_DECLINE_REASON };
    }

    const transactionId = `txn_${uuidv4().replace(/-/g, '').slice(0, 12)}`;
    logger.info('Mock payment processed', {
      transactionId,
      amount: request.amount,
      currency: request.currency,
    });
    return { success: true, transactionId };
  }

  private record(request: GatewayChargeRequest): void {
    this.charges.push(request);
    if (this.charges.length > this.maxRecorded) {
      this.charges.shift();
    }
  }
}
