/**
 * Kafka Consumer Tests
 */

import type { EachMessagePayload } from 'kafkajs';

interface MockConsumer {
  groupId: string;
  connect: jest.Mock;
  subscribe: jest.Mock;
  run: jest.Mock;
  commitOffsets: jest.Mock;
  disconnect: jest.Mock;
}

const mockConsumers: MockConsumer[] = [];

jest.mock('kafkajs', () => ({
  logLevel: jest.requireActual<typeof import('kafkajs')>('kafkajs').logLevel,
  Kafka: jest.fn().mockImplementation(() => ({
    consumer: ({ groupId }: { groupId: string }) => {
      const consumer: MockConsumer = {
        groupId,
        connect: jest.fn().mockResolvedValue(undefined),
        subscribe: jest.fn().mockResolvedValue(undefined),
        run: jest.fn().mockResolvedValue(undefined),
        commitOffsets: jest.fn().mockResolvedValue(undefined),
        disconnect: jest.fn().mockResolvedValue(undefined),
      };
      mockConsumers.push(consumer);
      return consumer;
    },
  })),
}));

const mockLog = {
  error: jest.fn(),
  warn: jest.fn(),
  info: jest.fn(),
  debug: jest.fn(),
};

jest.mock('../../src/lib/logger.js', () => ({
  createLogger: () => mockLog,
}));

import { KafkaConsumerService, parseHeaders } from '../../src/kafka/consumer.js';

function mockCache() {
  return {
    setString: jest.fn(),
    getString: jest.fn(),
    exists: jest.fn(),
    delete: jest.fn(),
    setExpiration: jest.fn(),
    cacheUserEvent: jest.fn().mockResolvedValue(true),
    getUserEvent: jest.fn(),
    healthCheck: jest.fn(),
  };
}

function payload(
  topic: string,
  value: string | null,
  key: string | null,
  offset: string = '5'
): EachMessagePayload {
  return {
    topic,
    partition: 0,
    message: {
      key: key === null ? null : Buffer.from(key),
      value: value === null ? null : Buffer.from(value),
      timestamp: '1700000000000',
      attributes: 0,
      offset,
      headers: {},
    },
    heartbeat: async () => {},
    pause: () => () => {},
  };
}

function consumerFor(groupId: string): MockConsumer {
  const consumer = mockConsumers.find((c) => c.groupId === groupId);
  if (!consumer) throw new Error(`No consumer for group ${groupId}`);
  return consumer;
}

function eachMessageOf(consumer: MockConsumer): (payload: EachMessagePayload) => Promise<void> {
  return consumer.run.mock.calls[0][0].eachMessage;
}

describe('KafkaConsumerService', () => {
  let cache: ReturnType<typeof mockCache>;
  let service: KafkaConsumerService;

  beforeEach(() => {
    jest.clearAllMocks();
    mockConsumers.length = 0;
    cache = mockCache();
    service = new KafkaConsumerService(cache);
  });

  describe('start', () => {
    it('should run one consumer per listener group', async () => {
      await service.start();

      expect(mockConsumers.map((c) => c.groupId)).toEqual(['test-group', 'user-group']);
      expect(consumerFor('test-group').subscribe).toHaveBeenCalledWith({
        topics: ['test-topic'],
        fromBeginning: false,
      });
      expect(consumerFor('user-group').subscribe).toHaveBeenCalledWith({
        topics: ['user-events'],
        fromBeginning: false,
      });
    });

    it('should disable auto-commit', async () => {
      await service.start();

      for (const consumer of mockConsumers) {
        expect(consumer.run).toHaveBeenCalledWith(expect.objectContaining({ autoCommit: false }));
      }
    });

    it('should ignore a second start', async () => {
      await service.start();
      await service.start();

      expect(mockConsumers).toHaveLength(2);
    });

    it('should disconnect started consumers when a subscription fails', async () => {
      const failure = new Error('unknown topic');
      const pending = service.start();
      // First consumer is created synchronously up to its connect call
      mockConsumers[0]?.subscribe.mockRejectedValueOnce(failure);

      await expect(pending).rejects.toThrow('unknown topic');
      expect(mockConsumers).toHaveLength(1);
      expect(mockConsumers[0]?.disconnect).toHaveBeenCalled();
    });
  });

  describe('test-topic listener', () => {
    it('should commit the next offset after processing', async () => {
      await service.start();
      const consumer = consumerFor('test-group');

      await eachMessageOf(consumer)(payload('test-topic', 'test message', null, '5'));

      expect(consumer.commitOffsets).toHaveBeenCalledWith([
        { topic: 'test-topic', partition: 0, offset: '6' },
      ]);
      expect(cache.cacheUserEvent).not.toHaveBeenCalled();
    });

    it('should not reject when the commit fails', async () => {
      await service.start();
      const consumer = consumerFor('test-group');
      consumer.commitOffsets.mockRejectedValueOnce(new Error('rebalance in progress'));

      await expect(
        eachMessageOf(consumer)(payload('test-topic', 'test message', null))
      ).resolves.toBeUndefined();
    });
  });

  describe('user-events listener', () => {
    it('should cache the event under the message key and commit', async () => {
      await service.start();
      const consumer = consumerFor('user-group');

      await eachMessageOf(consumer)(payload('user-events', '"event data"', 'user123', '10'));

      expect(cache.cacheUserEvent).toHaveBeenCalledWith('user123', '"event data"');
      expect(consumer.commitOffsets).toHaveBeenCalledWith([
        { topic: 'user-events', partition: 0, offset: '11' },
      ]);
    });

    it('should use empty strings for a missing key and value', async () => {
      await service.start();
      const consumer = consumerFor('user-group');

      await eachMessageOf(consumer)(payload('user-events', null, null));

      expect(cache.cacheUserEvent).toHaveBeenCalledWith('', '');
    });

    it('should leave the offset uncommitted when caching reports failure', async () => {
      cache.cacheUserEvent.mockResolvedValueOnce(false);
      await service.start();
      const consumer = consumerFor('user-group');

      await eachMessageOf(consumer)(payload('user-events', 'event data', 'user123'));

      expect(consumer.commitOffsets).not.toHaveBeenCalled();
    });

    it('should swallow handler errors without committing', async () => {
      cache.cacheUserEvent.mockRejectedValueOnce(new Error('socket closed'));
      await service.start();
      const consumer = consumerFor('user-group');

      await expect(
        eachMessageOf(consumer)(payload('user-events', 'event data', 'user123'))
      ).resolves.toBeUndefined();
      expect(consumer.commitOffsets).not.toHaveBeenCalled();
    });

    it('should log processing failures without the payload', async () => {
      cache.cacheUserEvent.mockRejectedValueOnce(new Error('socket closed'));
      await service.start();

      await eachMessageOf(consumerFor('user-group'))(
        payload('user-events', 'event data', 'user123', '9')
      );

      expect(mockLog.error).toHaveBeenCalledWith(
        { err: expect.any(Error), topic: 'user-events', partition: 0, offset: '9' },
        'User event processing failed, offset left uncommitted: socket closed'
      );
      expect(mockLog.debug).toHaveBeenCalledWith({ payload: 'event data' }, 'Received payload');
    });
  });

  describe('stop', () => {
    it('should disconnect every consumer once', async () => {
      await service.start();
      await service.stop();
      await service.stop();

      for (const consumer of mockConsumers) {
        expect(consumer.disconnect).toHaveBeenCalledTimes(1);
      }
    });

    it('should do nothing when never started', async () => {
      await service.stop();

      expect(mockConsumers).toHaveLength(0);
    });
  });
});

describe('parseHeaders', () => {
  it('should convert buffers and arrays to strings', () => {
    expect(
      parseHeaders({
        messageId: Buffer.from('message-id-1'),
        source: 'api',
        tags: [Buffer.from('a'), 'b'],
        skipped: undefined,
      })
    ).toEqual({ messageId: 'message-id-1', source: 'api', tags: 'a,b' });
  });

  it('should return an empty map without headers', () => {
    expect(parseHeaders(undefined)).toEqual({});
  });
});
