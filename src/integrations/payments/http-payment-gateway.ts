import { AxiosInstance } from 'axios';
import { v4 as uuidv4 } from 'uuid';
import { z } from 'zod';
import { logger } from '../../config/logger.config';
import type { GatewayChargeRequest, GatewayChargeResult, PaymentGateway } from '../../domain';
import { ExternalServiceException } from '../../utils/exceptions';
import { createProviderClient, isTransientError } from '../http-client';

const SERVICE_NAME = 'PaymentGateway';

const chargeResponseSchema = z.object({
  status: z.string(),
  transaction_id: z.string().nullish(),
  error_message: z.string().nullish(),
});

export function generateReference(): string {
  return `ref_${uuidv4().replace(/-/g, '').slice(0, 8)}`;
}

/**
 * Card processor reached over HTTP (`POST /v1/payments`).
 * A charge succeeds only when the processor reports `completed`.
 */
export class HttpPaymentGateway implements PaymentGateway {
  private readonly client: AxiosInstance;

  constructor(baseUrl: string, apiKey: string, client?: AxiosInstance) {
    this.client = client ?? createProviderClient(baseUrl, apiKey, 60_000);
  }

  async process(request: GatewayChargeRequest): Promise<GatewayChargeResult> {
    const payload = {
      amount: request.amount.toFixed(2),
      currency: request.currency,
      payment_method: request.paymentMethod,
      reference: request.reference || generateReference(),
    };

    try {
      const response = await this.client.post('/v1/payments', payload);
      const parsed = chargeResponseSchema.safeParse(response.data);
      if (!parsed.success) {
        throw new ExternalServiceException(SERVICE_NAME, 'Malformed response body');
      }

      const body = parsed.data;
      logger.info('Payment gateway responded', {
        status: body.status,
        transactionId: body.transaction_id,
      });

      return {
        success: body.status === 'completed',
        transactionId: body.transaction_id ?? undefined,
        error: body.error_message ?? undefined,
      };
    } catch (error) {
      if (error instanceof ExternalServiceException) throw error;

      logger.error('Payment gateway request failed', {
        error: error instanceof Error ? error.message : String(error),
        transient: isTransientError(error),
      });
      throw ExternalServiceException.fromError(SERVICE_NAME, error);
    }
  }
}
