import type { StreamBatch, StreamSource } from '../../integrations/redis/redis-stream-source';
import { StreamConsumerJob } from '../../jobs/stream-consumer.job';
import { InMemoryIdempotencyStore } from '../../shared/command-bus/idempotency.store';
import { createTestHarness, TestHarness } from '../helpers/fakes';

jest.mock('../../config/logger.config', () => ({
  logger: {
    debug: jest.fn(),
    info: jest.fn(),
    warn: jest.fn(),
    error: jest.fn(),
  },
}));

/** `incoming` answers reads for new entries, `unacked` answers re-reads of the pending list */
class FakeStreamSource implements StreamSource {
  readonly groups: string[] = [];
  readonly acked: string[] = [];
  readonly appended: Array<{ stream: string; fields: Record<string, string> }> = [];
  readonly reads: string[][] = [];
  readonly incoming: StreamBatch[] = [];
  readonly unacked: StreamBatch[] = [];
  appendError: Error | null = null;

  async ensureGroup(stream: string, group: string): Promise<void> {
    this.groups.push(`${stream}/${group}`);
  }

  async read(
    _group: string,
    _consumer: string,
    streams: string[],
    _count: number,
    _blockMs: number,
    ids: string[] = streams.map(() => '>')
  ): Promise<StreamBatch[]> {
    this.reads.push(ids);
    await new Promise((resolve) => setImmediate(resolve));
    const source = ids.every((id) => id === '>') ? this.incoming : this.unacked;
    return source.splice(0, source.length);
  }

  async ack(stream: string, group: string, id: string): Promise<void> {
    this.acked.push(`${stream}/${group}/${id}`);
  }

  async append(stream: string, fields: Record<string, string>): Promise<void> {
    if (this.appendError) throw this.appendError;
    this.appended.push({ stream, fields });
  }
}

const payload = (message: Record<string, unknown>) => ({ payload: JSON.stringify(message) });

describe('StreamConsumerJob', () => {
  let harness: TestHarness;
  let source: FakeStreamSource;
  let consumer: StreamConsumerJob;

  beforeEach(() => {
    harness = createTestHarness({ idempotencyStore: new InMemoryIdempotencyStore() });
    source = new FakeStreamSource();
    consumer = new StreamConsumerJob(source, harness.app.commandBus, {
      group: 'workers',
      consumer: 'worker-1',
    });
  });

  it('dispatches an entry and acknowledges it', async () => {
    const result = await consumer.processEntry('user.commands', {
      id: '1-0',
      fields: payload({
        operation: 'create',
        data: { name: 'Streamed', email: 'streamed@example.com' },
        correlation_id: 'corr-stream-9',
      }),
    });

    expect(result?.success).toBe(true);
    expect(harness.users.size).toBe(1);
    expect(source.acked).toEqual(['user.commands/workers/1-0']);
    expect(harness.events.ofType('user.created')[0].correlationId).toBe('corr-stream-9');
  });

  it('does not run a redelivered entry twice', async () => {
    const entry = {
      id: '2-0',
      fields: payload({ data: { name: 'Once', email: 'once@example.com' } }),
    };

    await consumer.processEntry('user.commands', entry);
    const replay = await consumer.processEntry('user.commands', entry);

    expect(replay?.success).toBe(true);
    expect(harness.users.size).toBe(1);
    expect(source.acked).toHaveLength(2);
  });

  it('acknowledges a domain failure without dead-lettering it', async () => {
    const result = await consumer.processEntry('payment.commands', {
      id: '3-0',
      fields: payload({
        operation: 'process',
        data: { user_id: 'ghost', amount: 5, currency: 'USD', payment_method: 'paypal' },
      }),
    });

    expect(result?.errorCode).toBe('NOT_FOUND');
    expect(source.appended).toHaveLength(0);
    expect(source.acked).toEqual(['payment.commands/workers/3-0']);
  });

  it('dead-letters an INTERNAL_ERROR and still acknowledges it', async () => {
    const user = await harness.app.services.usersService.createUser({
      name: 'Payer',
      email: 'payer@example.com',
      metadata: {},
    });
    harness.gateway.next = new Error('gateway timeout');
    const fields = payload({
      operation: 'process',
      data: { user_id: user.id.value, amount: 5, currency: 'USD', payment_method: 'paypal' },
    });

    await consumer.processEntry('payment.commands', { id: '4-0', fields });

    expect(source.appended).toHaveLength(1);
    expect(source.appended[0].stream).toBe('payment.commands.dead-letter');
    expect(source.appended[0].fields.message_id).toBe('4-0');
    expect(source.appended[0].fields.payload).toBe(fields.payload);
    expect(JSON.parse(source.appended[0].fields.error)).toMatchObject({
      success: false,
      error_code: 'INTERNAL_ERROR',
    });
    expect(source.acked).toEqual(['payment.commands/workers/4-0']);
  });

  it('dead-letters an entry without a payload field', async () => {
    const result = await consumer.processEntry('user.commands', { id: '5-0', fields: { body: '{}' } });

    expect(result).toBeNull();
    expect(source.appended).toEqual([
      {
        stream: 'user.commands.dead-letter',
        fields: { message_id: '5-0', payload: '', error: 'Missing payload field' },
      },
    ]);
    expect(source.acked).toEqual(['user.commands/workers/5-0']);
  });

  it('dead-letters unparseable JSON', async () => {
    await consumer.processEntry('user.commands', { id: '6-0', fields: { payload: '{oops' } });

    expect(source.appended[0].fields).toEqual({
      message_id: '6-0',
      payload: '{oops',
      error: 'Malformed payload JSON',
    });
  });

  it('dead-letters a payload whose data is not an object', async () => {
    await consumer.processEntry('user.commands', {
      id: '7-0',
      fields: payload({ data: 'nope' }),
    });

    expect(source.appended[0].fields.error).toBe(
      'Invalid message: data: Expected object, received string'
    );
  });

  it('ignores entries from streams it does not consume', async () => {
    const result = await consumer.processEntry('orders.commands', {
      id: '8-0',
      fields: payload({ data: {} }),
    });

    expect(result).toBeNull();
    expect(source.appended).toHaveLength(0);
    expect(source.acked).toEqual(['orders.commands/workers/8-0']);
  });

  it('creates the groups and processes batches in order until stopped', async () => {
    source.incoming.push({
      stream: 'user.commands',
      entries: [
        { id: '9-0', fields: payload({ data: { name: 'First', email: 'first@example.com' } }) },
        {
          id: '9-1',
          fields: payload({ operation: 'update', data: { user_id: 'missing', name: 'Second' } }),
        },
      ],
    });

    consumer.start();
    while (source.acked.length < 2) {
      await new Promise((resolve) => setImmediate(resolve));
    }
    await consumer.stop();

    expect(source.groups).toEqual(['user.commands/workers', 'payment.commands/workers']);
    expect(source.acked).toEqual(['user.commands/workers/9-0', 'user.commands/workers/9-1']);
    expect(harness.users.size).toBe(1);
  });

  it('leaves an entry pending when its dead-letter write fails and finishes the batch', async () => {
    source.appendError = new Error('redis down');

    await consumer.processBatches([
      {
        stream: 'user.commands',
        entries: [
          { id: '10-0', fields: { payload: '{oops' } },
          {
            id: '10-1',
            fields: payload({ data: { name: 'After', email: 'after@example.com' } }),
          },
        ],
      },
    ]);

    expect(source.acked).toEqual(['user.commands/workers/10-1']);
    expect(harness.users.size).toBe(1);
  });

  it('re-reads its pending entries on startup before reading new ones', async () => {
    source.unacked.push({
      stream: 'user.commands',
      entries: [
        { id: '11-0', fields: payload({ data: { name: 'Left', email: 'left@example.com' } }) },
      ],
    });

    consumer.start();
    while (source.reads.length < 3) {
      await new Promise((resolve) => setImmediate(resolve));
    }
    await consumer.stop();

    expect(source.reads.slice(0, 3)).toEqual([
      ['0', '0'],
      ['11-0', '0'],
      ['>', '>'],
    ]);
    expect(source.acked[0]).toBe('user.commands/workers/11-0');
    expect(harness.users.size).toBe(1);
  });
});
