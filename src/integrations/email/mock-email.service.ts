import { v4 as uuidv4 } from 'uuid';
import { logger } from '../../config/logger.config';
import type { EmailMessage, EmailSendResult, EmailService } from '../../domain';
import { ExternalServiceException } from '../../utils/exceptions';

export interface MockEmailOptions {
  /** Share of sends that raise a provider outage, between 0 and 1 */
  failureRate?: number;
  random?: () => number;
  /** Most recent requests kept in `sent`; older ones are dropped */
  maxRecorded?: number;
}

const DEFAULT_MAX_RECORDED = 100;

/**
 * In-process email provider. Keeps the most recent accepted messages.
 */
export class MockEmailService implements EmailService {
  readonly sent: EmailMessage[] = [];
  private readonly failureRate: number;
  private readonly random: () => number;
  private readonly maxRecorded: number;

  constructor(options: MockEmailOptions = {}) {
    this.failureRate = options.failureRate ?? 0.05;
    this.random = options.random ?? Math.random;
    this.maxRecorded = options.maxRecorded ?? DEFAULT_MAX_RECORDED;
  }

  async send(message: EmailMessage): Promise<EmailSendResult> {
    if (this.random() < this.failureRate) {
      throw new ExternalServiceException('EmailService', 'Service temporarily unavailable');
    }

    const messageId = `msg_${uuidv4().replace(/-/g, '').slice(0, 8)}`;
    this.record(message);
    logger.info('Mock email sent', { recipient: message.recipient, messageId });
    return { success: true, messageId };
  }

  private record(message: EmailMessage): void {
    this.sent.push(message);
    if (this.sent.length > this.maxRecorded) {
      this.sent.shift();
    }
  }
}
