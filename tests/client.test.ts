/**
 * Tests for HandoffClient
 */

import { HandoffClient } from '../src';
import { cmd } from '../src/command';
import {
  CommandError,
  ConnectionBusyError,
  ConnectionError,
  ConnectionLostError,
  InvalidArgumentError,
  ProtocolError
} from '../src/errors';
import { breakWith, CONTINUE } from '../src/pubsub';
import { asInteger, asString, RedisValue } from '../src/value';
import { FakeConnection, pagesByCursor } from './support/fake-connection';

describe('HandoffClient', () => {
  describe('one-shot commands', () => {
    test('should get a value and keep the connection', async () => {
      const fake = new FakeConnection(() => Buffer.from('value'));
      const client = new HandoffClient(fake);

      const value = await client.get('key');

      expect(value).toEqual(Buffer.from('value'));
      expect(fake.commands).toEqual([{ name: 'GET', args: [Buffer.from('key')] }]);
      expect(client.isIdle()).toBe(true);
    });

    test('should return null for a missing key', async () => {
      const client = new HandoffClient(new FakeConnection(() => null));

      expect(await client.get('missing')).toBeNull();
    });

    test('should set a value with an expiry', async () => {
      const fake = new FakeConnection();
      const client = new HandoffClient(fake);

      await client.set('key', 'value', { expireSeconds: 60 });

      expect(fake.commands[0]).toEqual({ name: 'SET', args: [Buffer.from('key'), Buffer.from('value'), 'EX', 60] });
    });

    test('should decode hash, set and sorted set replies', async () => {
      const replies: Record<string, RedisValue> = {
        HGETALL: ['f1', 'v1', 'f2', 'v2'],
        SISMEMBER: 1,
        ZSCORE: '2.5',
        INCRBY: 11,
        EXPIRE: 0
      };
      const client = new HandoffClient(new FakeConnection((command) => replies[command.name] ?? null));

      expect(await client.hgetall('h')).toEqual(new Map([['f1', Buffer.from('v1')], ['f2', Buffer.from('v2')]]));
      expect(await client.sismember('s', 'm')).toBe(true);
      expect(await client.zscore('z', 'm')).toBe(2.5);
      expect(await client.incrBy('n', 10)).toBe(11);
      expect(await client.expire('k', 30)).toBe(false);
    });

    test('should send arbitrary commands', async () => {
      const fake = new FakeConnection(() => 3);
      const client = new HandoffClient(fake);

      expect(await client.command(cmd('DBSIZE'), asInteger)).toBe(3);
      expect(fake.commandNames()).toEqual(['DBSIZE']);
    });

    test('should keep the connection after an error reply', async () => {
      let first = true;
      const fake = new FakeConnection((command) => {
        if (first) {
          first = false;
          throw new CommandError(command, 'WRONGTYPE Operation against a key holding the wrong kind of value');
        }
        return 'OK';
      });
      const client = new HandoffClient(fake);

      await expect(client.get('list')).rejects.toThrow(CommandError);

      expect(client.isIdle()).toBe(true);
      await expect(client.set('key', 'value')).resolves.toBeUndefined();
    });

    test('should keep the connection when a reply does not decode', async () => {
      const client = new HandoffClient(new FakeConnection(() => 'QUEUED'));

      await expect(client.set('key', 'value')).rejects.toThrow(ProtocolError);
      expect(client.isIdle()).toBe(true);
    });

    test('should lose the connection after a transport failure', async () => {
      const client = new HandoffClient(new FakeConnection(() => {
        throw new ConnectionError('connection reset');
      }));

      await expect(client.get('key')).rejects.toThrow(ConnectionError);

      expect(client.isIdle()).toBe(false);
      await expect(client.get('key')).rejects.toThrow(ConnectionLostError);
    });

    test('should validate arguments before borrowing the connection', async () => {
      const fake = new FakeConnection();
      const client = new HandoffClient(fake);

      await expect(client.get('')).rejects.toThrow(InvalidArgumentError);

      expect(fake.commands).toHaveLength(0);
      expect(client.isIdle()).toBe(true);
    });
  });

  describe('scans', () => {
    const twoPages = () => pagesByCursor({
      '0': ['5', ['a']],
      '5': ['0', ['b']]
    });

    test('should iterate the keyspace and return the connection with the last key', async () => {
      const fake = new FakeConnection(twoPages());
      const client = new HandoffClient(fake);
      const keys: string[] = [];
      const idle: boolean[] = [];

      for await (const key of client.scan({ match: '*', count: 10 })) {
        keys.push(key.toString());
        idle.push(client.isIdle());
      }

      expect(keys).toEqual(['a', 'b']);
      expect(idle).toEqual([false, true]);
      expect(fake.commands.map((command) => command.args)).toEqual([
        [0n, 'MATCH', '*', 'COUNT', 10],
        [5n, 'MATCH', '*', 'COUNT', 10]
      ]);
    });

    test('should refuse other commands while a scan has the connection', async () => {
      const client = new HandoffClient(new FakeConnection(twoPages()));
      const iterator = client.scan()[Symbol.asyncIterator]();

      await iterator.next();

      await expect(client.get('key')).rejects.toThrow(ConnectionBusyError);
      await iterator.return(undefined);
    });

    test('should lose the connection when a scan is abandoned early', async () => {
      const client = new HandoffClient(new FakeConnection(twoPages()));

      for await (const key of client.scan()) {
        expect(key.toString()).toBe('a');
        break;
      }

      await expect(client.get('key')).rejects.toThrow(ConnectionLostError);
    });

    test('should keep the connection when the consumer stops after the last key', async () => {
      const client = new HandoffClient(new FakeConnection(pagesByCursor({ '0': ['0', ['only']] })));

      for await (const key of client.scan()) {
        expect(key.toString()).toBe('only');
        break;
      }

      expect(client.isIdle()).toBe(true);
    });

    test('should lose the connection when a page request fails', async () => {
      const pages = twoPages();
      const client = new HandoffClient(new FakeConnection((command) => {
        if (command.args[0] === 5n) {
          throw new ConnectionError('connection reset');
        }
        return pages(command);
      }));
      const keys: string[] = [];

      await expect((async () => {
        for await (const key of client.scan()) {
          keys.push(key.toString());
        }
      })()).rejects.toThrow('connection reset');

      expect(keys).toEqual(['a']);
      await expect(client.get('key')).rejects.toThrow(ConnectionLostError);
    });

    test('should collect every scan family', async () => {
      const client = new HandoffClient(new FakeConnection((command) => {
        switch (command.name) {
          case 'SCAN':
            return ['0', ['k1', 'k2']];
          case 'HSCAN':
            return ['0', ['f', 'v']];
          case 'SSCAN':
            return ['0', ['m']];
          default:
            return ['0', ['z1', '1', 'z2', '-inf']];
        }
      }));

      expect(await client.scanAll({ type: 'string' })).toEqual([Buffer.from('k1'), Buffer.from('k2')]);
      expect(await client.hscanAll('h')).toEqual([[Buffer.from('f'), Buffer.from('v')]]);
      expect(await client.sscanAll('s')).toEqual([Buffer.from('m')]);
      expect(await client.zscanAll('z')).toEqual([[Buffer.from('z1'), 1], [Buffer.from('z2'), -Infinity]]);
      expect(client.isIdle()).toBe(true);
    });

    test('should lose the connection when collecting fails', async () => {
      const client = new HandoffClient(new FakeConnection(() => 'garbage'));

      await expect(client.sscanAll('s')).rejects.toThrow(ProtocolError);
      await expect(client.sscanAll('s')).rejects.toThrow(ConnectionLostError);
    });

    test('should iterate hash fields and sorted set members', async () => {
      const pages: Record<string, RedisValue> = {
        HSCAN: ['0', ['f', 'v']],
        ZSCAN: ['0', ['m', '4']],
        SSCAN: ['0', ['s1']]
      };
      const client = new HandoffClient(new FakeConnection((command) => pages[command.name]));
      const fields: string[] = [];
      const scores: number[] = [];

      for await (const [field, value] of client.hscan('h')) {
        fields.push(`${field.toString()}=${value.toString()}`);
      }
      for await (const [, score] of client.zscan('z')) {
        scores.push(score);
      }
      for await (const member of client.sscan('s')) {
        fields.push(member.toString());
      }

      expect(fields).toEqual(['f=v', 's1']);
      expect(scores).toEqual([4]);
    });
  });

  describe('subscriptions', () => {
    test('should run until the handler breaks and keep the connection', async () => {
      const fake = new FakeConnection().push(['message', 'news', 'one'], ['message', 'news', 'two']);
      const client = new HandoffClient(fake);
      const busy: boolean[] = [];

      const result = await client.subscribe('news', async (msg) => {
        busy.push(client.isIdle());
        return msg.getPayload(asString) === 'two' ? breakWith('stopped') : CONTINUE;
      });

      expect(result).toEqual({ ok: true, value: 'stopped' });
      expect(busy).toEqual([false, false]);
      expect(client.isIdle()).toBe(true);
      expect(fake.commandNames()).toEqual(['SUBSCRIBE', 'UNSUBSCRIBE', 'PUNSUBSCRIBE']);
    });

    test('should refuse commands from inside the handler', async () => {
      const client = new HandoffClient(new FakeConnection().push(['pmessage', 'n*', 'news', 'x']));

      const result = await client.psubscribe('n*', async () => {
        await client.get('key');
        return breakWith(true);
      });

      expect(result.ok).toBe(false);
      expect(result.ok ? undefined : result.error).toBeInstanceOf(ConnectionBusyError);
      expect(client.isIdle()).toBe(true);
    });

    test('should unsubscribe before taking the connection back from a failed handler', async () => {
      const fake = new FakeConnection().push(['message', 'news', 'bad']);
      const client = new HandoffClient(fake);
      const failure = new Error('cannot parse');

      const result = await client.subscribe('news', () => {
        throw failure;
      });

      expect(result).toEqual({ ok: false, error: failure });
      expect(fake.commandNames()).toEqual(['SUBSCRIBE', 'UNSUBSCRIBE', 'PUNSUBSCRIBE']);
      expect(client.isIdle()).toBe(true);
    });

    test('should lose the connection when the subscription fails', async () => {
      const client = new HandoffClient(new FakeConnection());

      await expect(client.subscribe('news', () => CONTINUE)).rejects.toThrow('No more push frames');
      await expect(client.get('key')).rejects.toThrow(ConnectionLostError);
    });

    test('should reject an empty channel list without borrowing the connection', async () => {
      const client = new HandoffClient(new FakeConnection());

      await expect(client.subscribe([], () => CONTINUE)).rejects.toThrow(InvalidArgumentError);
      expect(client.isIdle()).toBe(true);
    });
  });

  test('should release the connection to the caller', async () => {
    const fake = new FakeConnection();
    const client = new HandoffClient(fake);

    expect(client.release()).toBe(fake);
    await expect(client.get('key')).rejects.toThrow(ConnectionLostError);
  });
});
