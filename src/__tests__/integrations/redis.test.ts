import type Redis from 'ioredis';
import { parseReadReply, RedisStreamSource } from '../../integrations/redis/redis-stream-source';
import { RedisTaskQueue } from '../../integrations/redis/redis-task-queue';
import { MessageBrokerException } from '../../utils/exceptions';

function fakeRedis(methods: Record<string, jest.Mock>): Redis {
  return methods as unknown as Redis;
}

describe('RedisTaskQueue', () => {
  it('pops across lists with BRPOP', async () => {
    const brpop = jest.fn().mockResolvedValue(['commands:users', '{"id":"t1"}']);
    const queue = new RedisTaskQueue(fakeRedis({ brpop }));

    const item = await queue.pop(['commands:users', 'commands:payments'], 5);

    expect(item).toEqual({ list: 'commands:users', value: '{"id":"t1"}' });
    expect(brpop).toHaveBeenCalledWith(['commands:users', 'commands:payments'], 5);
  });

  it('returns null when the timeout elapses', async () => {
    const queue = new RedisTaskQueue(fakeRedis({ brpop: jest.fn().mockResolvedValue(null) }));

    expect(await queue.pop(['commands:users'], 1)).toBeNull();
  });

  it('stores results with an expiry in seconds', async () => {
    const set = jest.fn().mockResolvedValue('OK');
    const queue = new RedisTaskQueue(fakeRedis({ set }));

    await queue.storeResult('command-results:t1', '{}', 3600);

    expect(set).toHaveBeenCalledWith('command-results:t1', '{}', 'EX', 3600);
  });

  it('wraps client failures in MessageBrokerException', async () => {
    const queue = new RedisTaskQueue(
      fakeRedis({ lpush: jest.fn().mockRejectedValue(new Error('READONLY')) })
    );

    await expect(queue.push('commands:users', '{}')).rejects.toThrow(
      new MessageBrokerException('Task queue push failed')
    );
  });
});

describe('parseReadReply', () => {
  it('turns the flat field list into a record', () => {
    const reply = [
      ['user.commands', [['1-0', ['payload', '{"data":{}}', 'source', 'api']]]],
      ['payment.commands', []],
    ];

    expect(parseReadReply(reply)).toEqual([
      { stream: 'user.commands', entries: [{ id: '1-0', fields: { payload: '{"data":{}}', source: 'api' } }] },
      { stream: 'payment.commands', entries: [] },
    ]);
  });

  it('gives a deleted pending entry empty fields', () => {
    expect(parseReadReply([['user.commands', [['3-0', null]]]])).toEqual([
      { stream: 'user.commands', entries: [{ id: '3-0', fields: {} }] },
    ]);
  });

  it('returns no batches when the block times out', () => {
    expect(parseReadReply(null)).toEqual([]);
  });

  it('rejects an unexpected shape', () => {
    expect(() => parseReadReply({ unexpected: true })).toThrow('Unexpected XREADGROUP reply shape');
  });
});

describe('RedisStreamSource', () => {
  it('creates the consumer group and ignores BUSYGROUP', async () => {
    const call = jest
      .fn()
      .mockResolvedValueOnce('OK')
      .mockRejectedValueOnce(new Error('BUSYGROUP Consumer Group name already exists'));
    const source = new RedisStreamSource(fakeRedis({ call }));

    await source.ensureGroup('user.commands', 'workers');
    await source.ensureGroup('user.commands', 'workers');

    expect(call).toHaveBeenCalledWith('XGROUP', 'CREATE', 'user.commands', 'workers', '$', 'MKSTREAM');
  });

  it('reads new entries for every stream', async () => {
    const call = jest.fn().mockResolvedValue(null);
    const source = new RedisStreamSource(fakeRedis({ call }));

    await source.read('workers', 'worker-1', ['user.commands', 'payment.commands'], 10, 5000);

    expect(call).toHaveBeenCalledWith(
      'XREADGROUP',
      'GROUP',
      'workers',
      'worker-1',
      'COUNT',
      10,
      'BLOCK',
      5000,
      'STREAMS',
      'user.commands',
      'payment.commands',
      '>',
      '>'
    );
  });

  it('re-reads pending entries after the given cursors', async () => {
    const call = jest.fn().mockResolvedValue(null);
    const source = new RedisStreamSource(fakeRedis({ call }));

    await source.read('workers', 'worker-1', ['user.commands', 'payment.commands'], 10, 5000, [
      '4-0',
      '0',
    ]);

    expect(call).toHaveBeenCalledWith(
      'XREADGROUP',
      'GROUP',
      'workers',
      'worker-1',
      'COUNT',
      10,
      'BLOCK',
      5000,
      'STREAMS',
      'user.commands',
      'payment.commands',
      '4-0',
      '0'
    );
  });

  it('appends fields as flat pairs', async () => {
    const xadd = jest.fn().mockResolvedValue('5-0');
    const source = new RedisStreamSource(fakeRedis({ xadd }));

    await source.append('user.commands.dead-letter', { message_id: '1-0', error: 'bad' });

    expect(xadd).toHaveBeenCalledWith('user.commands.dead-letter', '*', 'message_id', '1-0', 'error', 'bad');
  });
});
