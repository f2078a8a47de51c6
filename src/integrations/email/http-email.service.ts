import { AxiosInstance } from 'axios';
import { z } from 'zod';
import { logger } from '../../config/logger.config';
import type { EmailMessage, EmailSendResult, EmailService } from '../../domain';
import { ExternalServiceException } from '../../utils/exceptions';
import { createProviderClient, isTransientError } from '../http-client';

const SERVICE_NAME = 'EmailService';

const sendResponseSchema = z.object({
  message_id: z.string().optional(),
});

/**
 * Email provider reached over HTTP (`POST /v1/emails`).
 * Transport failures and non-2xx responses throw ExternalServiceException.
 */
export class HttpEmailService implements EmailService {
  private readonly client: AxiosInstance;

  constructor(baseUrl: string, apiKey: string, client?: AxiosInstance) {
    this.client = client ?? createProviderClient(baseUrl, apiKey, 30_000);
  }

  async send(message: EmailMessage): Promise<EmailSendResult> {
    const payload: Record<string, unknown> = {
      to: message.recipient,
      subject: message.subject,
      body: message.body,
    };
    if (message.templateId) {
      payload.template_id = message.templateId;
      payload.variables = message.variables ?? {};
    }

    try {
      const response = await this.client.post('/v1/emails', payload);
      const parsed = sendResponseSchema.safeParse(response.data);
      if (!parsed.success) {
        throw new ExternalServiceException(SERVICE_NAME, 'Malformed response body');
      }

      logger.info('Email sent', { messageId: parsed.data.message_id });
      return { success: true, messageId: parsed.data.message_id };
    } catch (error) {
      if (error instanceof ExternalServiceException) throw error;

      logger.error('Email service request failed', {
        error: error instanceof Error ? error.message : String(error),
        transient: isTransientError(error),
      });
      throw ExternalServiceException.fromError(SERVICE_NAME, error);
    }
  }
}
