/**
 * Source Client Tests
 *
 * Requests go through an injected transport: either a jest mock that records
 * each call, or an in-process fake source server.
 */

import {
  SourceClient,
  createClient,
  SourceError,
  UsageError,
  ValidationError,
  RemoteError,
  DecodeError,
  isSourceError,
  isUsageError,
  isValidationError,
  isRemoteError,
  USER_AGENT,
  VERSION,
} from '../src';
import type { HttpRequestInit, HttpResponse, Validatable } from '../src';
import { FakeSourceServer, encodeValue, respond } from './fakeServer';

class TestOptions implements Validatable {
  insecureTransport = false;
  requestTimeout = 0;

  constructor(init: Partial<Pick<TestOptions, 'insecureTransport' | 'requestTimeout'>> = {}) {
    Object.assign(this, init);
  }

  validate(): void {
    if (this.requestTimeout < 0) {
      throw new ValidationError('requestTimeout must not be negative', { field: 'requestTimeout' });
    }
  }
}

const HOST = 'http://localhost:8080';

function itemRecord(key: string, value: unknown, type = 'AAA'): object {
  return { key, type, value: encodeValue(value), updated: '2024-01-31T09:30:15.042Z' };
}

describe('SourceClient', () => {
  let transport: jest.Mock<Promise<HttpResponse>, [string, HttpRequestInit]>;
  let client: SourceClient;

  beforeEach(() => {
    transport = jest.fn<Promise<HttpResponse>, [string, HttpRequestInit]>();
    client = new SourceClient({
      host: HOST,
      user: 'admin',
      password: 'test-secret',
      retry: { maxRetries: 2, baseDelay: 0, maxDelay: 0 },
      transport,
    });
  });

  function lastCall(): { url: string; init: HttpRequestInit } {
    const call = transport.mock.calls[transport.mock.calls.length - 1];
    if (!call) {
      throw new Error('transport was not called');
    }
    return { url: call[0], init: call[1] };
  }

  describe('Constructor', () => {
    it('should create client with valid config', () => {
      expect(client.host).toBe(HOST);
      expect(client.options).toEqual({ insecureTransport: true, requestTimeout: 60000 });
    });

    it('should remove trailing slash from host', () => {
      const other = new SourceClient({ host: `${HOST}/`, user: 'admin', password: 'test-secret', transport });

      expect(other.host).toBe(HOST);
    });

    it('should throw ValidationError if host is missing', () => {
      expect(() => new SourceClient({ host: '', user: 'admin', password: 'test-secret' })).toThrow(ValidationError);
    });

    it('should throw ValidationError if host is not a URL', () => {
      expect(() => new SourceClient({ host: 'localhost', user: 'admin', password: 'test-secret' })).toThrow(
        ValidationError,
      );
    });

    it('should throw ValidationError if user is missing', () => {
      expect(() => new SourceClient({ host: HOST, user: '', password: 'test-secret' })).toThrow(ValidationError);
    });

    it('should reject a request timeout under 30 seconds', () => {
      expect(
        () =>
          new SourceClient({
            host: HOST,
            user: 'admin',
            password: 'test-secret',
            options: { requestTimeout: 10000 },
          }),
      ).toThrow('timeout must be at least 30 secs');
    });

    it('should accept custom options', () => {
      const other = new SourceClient({
        host: HOST,
        user: 'admin',
        password: 'test-secret',
        options: { insecureTransport: false, requestTimeout: 120000 },
      });

      expect(other.options).toEqual({ insecureTransport: false, requestTimeout: 120000 });
    });
  });

  describe('createClient helper', () => {
    it('should create SourceClient instance', () => {
      expect(createClient({ host: HOST, user: 'admin', password: 'test-secret' })).toBeInstanceOf(SourceClient);
    });
  });

  describe('request headers', () => {
    it('should send basic auth and user agent on every request', async () => {
      transport.mockResolvedValueOnce(respond(200));

      await client.delete('OPT_1');

      const { init } = lastCall();
      expect(init.headers.Authorization).toBe(`Basic ${Buffer.from('admin:test-secret').toString('base64')}`);
      expect(init.headers['User-Agent']).toBe(`SOURCE-CLIENT-JS-${VERSION}`);
      expect(client.userAgent).toBe(USER_AGENT);
    });
  });

  describe('registerType()', () => {
    it('should put the derived schema and example', async () => {
      transport.mockResolvedValueOnce(respond(200));

      await client.registerType('AAA', { insecureTransport: false, requestTimeout: 10000 });

      const { url, init } = lastCall();
      expect(url).toBe(`${HOST}/type`);
      expect(init.method).toBe('PUT');
      const body = JSON.parse(init.body ?? '');
      expect(body.key).toBe('AAA');
      expect(JSON.parse(Buffer.from(body.proto, 'base64').toString('utf8'))).toEqual({
        insecureTransport: false,
        requestTimeout: 10000,
      });
      expect(JSON.parse(Buffer.from(body.schema, 'base64').toString('utf8'))).toMatchObject({
        type: 'object',
        properties: {
          insecureTransport: { type: 'boolean' },
          requestTimeout: { type: 'integer' },
        },
      });
    });

    it('should throw RemoteError when the server rejects the type', async () => {
      transport.mockResolvedValueOnce(respond(400));

      await expect(client.registerType('AAA', {})).rejects.toThrow(
        'cannot set type, source server responded with: 400 Bad Request',
      );
    });

    it('should throw UsageError for an empty type key', async () => {
      await expect(client.registerType('', {})).rejects.toThrow(UsageError);
      expect(transport).not.toHaveBeenCalled();
    });
  });

  describe('save()', () => {
    it('should put the item with its type header', async () => {
      transport.mockResolvedValueOnce(respond(200));

      const key = await client.save('OPT_1', 'AAA', new TestOptions({ requestTimeout: 60000 }));

      const { url, init } = lastCall();
      expect(key).toBe('OPT_1');
      expect(url).toBe(`${HOST}/item/OPT_1`);
      expect(init.method).toBe('PUT');
      expect(init.headers['Source-Type']).toBe('AAA');
      expect(init.headers['Content-Type']).toBe('application/json');
      expect(init.body).toBe('{"insecureTransport":false,"requestTimeout":60000}');
    });

    it('should resolve a wildcard key and return it', async () => {
      transport.mockResolvedValueOnce(respond(200));

      const key = await client.save('ITEM_?', 'AAA', new TestOptions());

      expect(key).toMatch(/^ITEM_\d{14}\.\d{3}$/);
      expect(lastCall().url).toBe(`${HOST}/item/${key}`);
    });

    it('should not send an item that fails validation', async () => {
      await expect(client.save('OPT_1', 'AAA', new TestOptions({ requestTimeout: -1 }))).rejects.toThrow(
        ValidationError,
      );
      expect(transport).not.toHaveBeenCalled();
    });

    it('should wrap errors thrown by validate() in ValidationError', async () => {
      const item = {
        validate(): void {
          throw new Error('bad shape');
        },
      };

      await expect(client.save('OPT_1', 'AAA', item)).rejects.toThrow('item failed validation: bad shape');
      expect(transport).not.toHaveBeenCalled();
    });

    it('should throw UsageError when the item type is missing', async () => {
      await expect(client.save('OPT_1', '', new TestOptions())).rejects.toThrow(
        'item type is required to validate the item data',
      );
      expect(transport).not.toHaveBeenCalled();
    });

    it('should reject an item type that cannot be sent as a header', async () => {
      await expect(client.save('K', 'A\nB', new TestOptions())).rejects.toThrow(
        'cannot save item: item type "A\\nB" is not a valid header value',
      );
      expect(transport).not.toHaveBeenCalled();
    });

    it('should throw UsageError for a thenable item', async () => {
      const pending = {
        validate(): void {},
        then(): void {},
      };

      await expect(client.save('OPT_1', 'AAA', pending)).rejects.toThrow(UsageError);
      expect(transport).not.toHaveBeenCalled();
    });

    it('should include the response body in RemoteError', async () => {
      transport.mockResolvedValueOnce(respond(400, 'schema mismatch'));

      const error = await client.save('OPT_1', 'AAA', new TestOptions()).catch((e: unknown) => e);

      expect(error).toBeInstanceOf(RemoteError);
      expect(isRemoteError(error) && error.statusCode).toBe(400);
      expect(isRemoteError(error) && error.body).toBe('schema mismatch');
      expect(isRemoteError(error) && error.message).toBe(
        'cannot save item, source server responded with: 400 Bad Request, schema mismatch',
      );
    });
  });

  describe('loadRaw() and load()', () => {
    it('should load the raw item', async () => {
      transport.mockResolvedValueOnce(respond(200, itemRecord('OPT_1', { requestTimeout: 60000 })));

      const item = await client.loadRaw('OPT_1');

      expect(lastCall().url).toBe(`${HOST}/item/OPT_1`);
      expect(lastCall().init.method).toBe('GET');
      expect(item.key).toBe('OPT_1');
      expect(item.type).toBe('AAA');
      expect(item.updatedAt.toISOString()).toBe('2024-01-31T09:30:15.042Z');
    });

    it('should load into the prototype instance', async () => {
      transport.mockResolvedValueOnce(
        respond(200, itemRecord('OPT_1', { insecureTransport: true, requestTimeout: 60000 })),
      );
      const prototype = new TestOptions();

      const options = await client.load('OPT_1', prototype);

      expect(options).toBe(prototype);
      expect(options.insecureTransport).toBe(true);
      expect(options.requestTimeout).toBe(60000);
    });

    it('should throw DecodeError when the value does not fit', async () => {
      transport.mockResolvedValueOnce(respond(200, itemRecord('OPT_1', { requestTimeout: 'sixty' })));

      await expect(client.load('OPT_1', new TestOptions())).rejects.toThrow(DecodeError);
    });

    it('should check the prototype before loading', async () => {
      await expect(client.load('OPT_1', Object.seal(new TestOptions()))).rejects.toThrow(UsageError);

      expect(transport).not.toHaveBeenCalled();
    });

    it('should throw RemoteError for a missing item', async () => {
      transport.mockResolvedValueOnce(respond(404));

      await expect(client.loadRaw('NOPE')).rejects.toThrow(
        'cannot get item, source server responded with: 404 Not Found',
      );
    });

    it('should percent-encode keys', async () => {
      transport.mockResolvedValueOnce(respond(200, itemRecord('a b', {})));

      await client.loadRaw('a b');

      expect(lastCall().url).toBe(`${HOST}/item/a%20b`);
    });
  });

  describe('queries', () => {
    it('should join tags with a pipe', async () => {
      transport.mockResolvedValueOnce(respond(200, []));

      await client.loadItemsByTagRaw('status', 'owner');

      expect(lastCall().url).toBe(`${HOST}/item/tag/status|owner`);
    });

    it('should require at least one tag', async () => {
      await expect(client.loadItemsByTagRaw()).rejects.toThrow(UsageError);
      expect(transport).not.toHaveBeenCalled();
    });

    it('should convert items by type with a factory', async () => {
      transport.mockResolvedValueOnce(
        respond(200, [itemRecord('A', { requestTimeout: 1 }), itemRecord('B', { requestTimeout: 2 })]),
      );

      const items = await client.loadItemsByType(() => new TestOptions(), 'AAA');

      expect(lastCall().url).toBe(`${HOST}/item/type/AAA`);
      expect(items.map((item) => item.requestTimeout)).toEqual([1, 2]);
      expect(items[0]).toBeInstanceOf(TestOptions);
    });

    it('should treat a null list as empty', async () => {
      transport.mockResolvedValueOnce(respond(200, 'null'));

      await expect(client.loadItemsByType(() => new TestOptions(), 'AAA')).resolves.toEqual([]);
    });

    it('should load children and parents', async () => {
      transport.mockResolvedValueOnce(respond(200, []));
      await client.loadChildrenRaw('OPT_1');
      expect(lastCall().url).toBe(`${HOST}/item/OPT_1/children`);

      transport.mockResolvedValueOnce(respond(200, []));
      await client.loadParentsRaw('OPT_1');
      expect(lastCall().url).toBe(`${HOST}/item/OPT_1/parents`);
    });
  });

  describe('pop', () => {
    it('should pop the oldest item', async () => {
      transport.mockResolvedValueOnce(respond(200, itemRecord('JOB_1', { requestTimeout: 5 })));

      const job = await client.popOldest('AAA', new TestOptions());

      expect(lastCall().url).toBe(`${HOST}/item/pop/oldest/AAA`);
      expect(lastCall().init.method).toBe('DELETE');
      expect(job?.requestTimeout).toBe(5);
    });

    it('should pop the newest item from the newest route', async () => {
      transport.mockResolvedValueOnce(respond(200, itemRecord('JOB_2', { requestTimeout: 7 })));

      const job = await client.popNewest('AAA', new TestOptions());

      expect(lastCall().url).toBe(`${HOST}/item/pop/newest/AAA`);
      expect(job?.requestTimeout).toBe(7);
    });

    it('should return null when the queue is empty', async () => {
      transport.mockResolvedValueOnce(respond(404));
      await expect(client.popOldest('AAA', new TestOptions())).resolves.toBeNull();

      transport.mockResolvedValueOnce(respond(404));
      await expect(client.popNewestRaw('AAA')).resolves.toBeNull();
    });

    it('should check the prototype before popping', async () => {
      await expect(client.popOldest('AAA', Object.freeze(new TestOptions()))).rejects.toThrow(UsageError);
      await expect(client.popNewest('AAA', Object.freeze(new TestOptions()))).rejects.toThrow(UsageError);

      expect(transport).not.toHaveBeenCalled();
    });

    it('should reject a null body on success', async () => {
      transport.mockResolvedValueOnce(respond(200, 'null'));

      await expect(client.popOldestRaw('AAA')).rejects.toThrow(DecodeError);
    });

    it('should fail on other error statuses', async () => {
      transport.mockResolvedValueOnce(respond(400));

      await expect(client.popOldestRaw('AAA')).rejects.toThrow(
        'cannot pop oldest item, source server responded with: 400 Bad Request',
      );
    });
  });

  describe('tags and links', () => {
    it('should tag with a name and value', async () => {
      transport.mockResolvedValueOnce(respond(200));

      await client.tag('OPT_1', 'status', 'dev');

      expect(lastCall().url).toBe(`${HOST}/item/OPT_1/tag/status|dev`);
      expect(lastCall().init.method).toBe('PUT');
      expect(lastCall().init.body).toBeUndefined();
    });

    it('should tag with a name only', async () => {
      transport.mockResolvedValueOnce(respond(200));

      await client.tag('OPT_1', 'reviewed');

      expect(lastCall().url).toBe(`${HOST}/item/OPT_1/tag/reviewed`);
    });

    it('should require a tag name', async () => {
      await expect(client.tag('OPT_1', '', 'dev')).rejects.toThrow('a tag name is required');
      await expect(client.untag('OPT_1', '')).rejects.toThrow('a tag name is required');
      expect(transport).not.toHaveBeenCalled();
    });

    it('should untag', async () => {
      transport.mockResolvedValueOnce(respond(200));

      await client.untag('OPT_1', 'status');

      expect(lastCall().url).toBe(`${HOST}/item/OPT_1/tag/status`);
      expect(lastCall().init.method).toBe('DELETE');
    });

    it('should link and unlink', async () => {
      transport.mockResolvedValueOnce(respond(200));
      await client.link('OPT_1', 'OPT_2');
      expect(lastCall().url).toBe(`${HOST}/link/OPT_1/to/OPT_2`);
      expect(lastCall().init.method).toBe('PUT');

      transport.mockResolvedValueOnce(respond(200));
      await client.unlink('OPT_1', 'OPT_2');
      expect(lastCall().init.method).toBe('DELETE');
    });

    it('should report link failures', async () => {
      transport.mockResolvedValueOnce(respond(404));

      await expect(client.link('OPT_1', 'NOPE')).rejects.toThrow(
        'cannot link items, source server responded with: 404 Not Found',
      );
    });
  });

  describe('Error type guards', () => {
    it('should identify error classes', async () => {
      const usage = await client.delete('').catch((e: unknown) => e);

      expect(isUsageError(usage)).toBe(true);
      expect(isSourceError(usage)).toBe(true);
      expect(isValidationError(usage)).toBe(false);
      expect(usage).toBeInstanceOf(SourceError);
    });
  });
});

describe('SourceClient against a source server', () => {
  let server: FakeSourceServer;
  let client: SourceClient;

  beforeEach(() => {
    server = new FakeSourceServer();
    client = createClient({
      host: HOST,
      user: 'admin',
      password: 'test-secret',
      transport: server.transport,
    });
  });

  afterEach(() => {
    jest.useRealTimers();
  });

  it('should register, save, load, tag and untag an item', async () => {
    await client.registerType('AAA', { insecureTransport: false, requestTimeout: 10000 });
    const saved = new TestOptions({ insecureTransport: false, requestTimeout: 60000 });
    await client.save('OPT_1', 'AAA', saved);

    const loaded = await client.load('OPT_1', new TestOptions());
    expect(loaded).toEqual(saved);

    await expect(client.tag('OPT_1', 'status', 'dev')).resolves.toBeUndefined();
    expect(server.items.get('OPT_1')?.tags.get('status')).toBe('dev');
    await expect(client.untag('OPT_1', 'status')).resolves.toBeUndefined();
    expect(server.items.get('OPT_1')?.tags.has('status')).toBe(false);
  });

  it('should load three sequenced items of a type', async () => {
    const start = Date.parse('2024-01-31T09:30:15.000Z');
    jest.useFakeTimers({
      now: start,
      doNotFake: ['nextTick', 'queueMicrotask', 'setTimeout', 'clearTimeout', 'setImmediate', 'clearImmediate'],
    });
    await client.registerType('AAA', { insecureTransport: false, requestTimeout: 10000 });
    const values = [
      new TestOptions({ insecureTransport: false, requestTimeout: 10 }),
      new TestOptions({ insecureTransport: false, requestTimeout: 15 }),
      new TestOptions({ insecureTransport: true, requestTimeout: 20 }),
    ];

    const keys: string[] = [];
    for (const [index, value] of values.entries()) {
      jest.setSystemTime(start + index);
      keys.push(await client.save('ITEM_?', 'AAA', value));
    }

    expect(keys).toEqual(['ITEM_20240131093015.000', 'ITEM_20240131093015.001', 'ITEM_20240131093015.002']);
    const raw = await client.loadItemsByTypeRaw('AAA');
    expect(raw.keys()).toEqual(keys);
    expect(raw.typed(() => new TestOptions())).toEqual(values);
  });

  it('should pop oldest and newest items in key order', async () => {
    await client.registerType('AAA', new TestOptions());
    await client.save('JOB_1', 'AAA', new TestOptions({ requestTimeout: 1 }));
    await client.save('JOB_2', 'AAA', new TestOptions({ requestTimeout: 2 }));
    await client.save('JOB_3', 'AAA', new TestOptions({ requestTimeout: 3 }));

    expect((await client.popOldest('AAA', new TestOptions()))?.requestTimeout).toBe(1);
    expect((await client.popNewest('AAA', new TestOptions()))?.requestTimeout).toBe(3);
    expect((await client.popNewestRaw('AAA'))?.key).toBe('JOB_2');
    expect(await client.popOldestRaw('AAA')).toBeNull();
  });

  it('should keep the queued item when the prototype is rejected', async () => {
    await client.registerType('JOB', new TestOptions());
    await client.save('JOB_1', 'JOB', new TestOptions({ requestTimeout: 1 }));

    await expect(client.popOldest('JOB', Object.freeze(new TestOptions()))).rejects.toThrow(UsageError);

    expect(server.items.has('JOB_1')).toBe(true);
    expect((await client.popOldest('JOB', new TestOptions()))?.requestTimeout).toBe(1);
  });

  it('should follow links to children and parents', async () => {
    await client.registerType('AAA', new TestOptions());
    await client.save('OPT_1', 'AAA', new TestOptions({ requestTimeout: 1 }));
    await client.save('OPT_2', 'AAA', new TestOptions({ requestTimeout: 2 }));
    await client.link('OPT_1', 'OPT_2');

    const children = await client.loadChildren(() => new TestOptions(), 'OPT_1');
    const parents = await client.loadParentsRaw('OPT_2');

    expect(children.map((child) => child.requestTimeout)).toEqual([2]);
    expect(parents.keys()).toEqual(['OPT_1']);

    await client.unlink('OPT_1', 'OPT_2');
    await expect(client.loadChildrenRaw('OPT_1')).resolves.toHaveLength(0);
  });

  it('should find items by tag', async () => {
    await client.registerType('AAA', new TestOptions());
    await client.save('OPT_1', 'AAA', new TestOptions({ requestTimeout: 1 }));
    await client.save('OPT_2', 'AAA', new TestOptions({ requestTimeout: 2 }));
    await client.save('OPT_3', 'AAA', new TestOptions({ requestTimeout: 3 }));
    await client.tag('OPT_1', 'status', 'dev');
    await client.tag('OPT_3', 'owner');

    const tagged = await client.loadItemsByTag(() => new TestOptions(), 'status', 'owner');

    expect(tagged.map((item) => item.requestTimeout)).toEqual([1, 3]);
  });

  it('should reject items of an unregistered type', async () => {
    await expect(client.save('OPT_1', 'ZZZ', new TestOptions())).rejects.toThrow(
      "cannot save item, source server responded with: 400 Bad Request, type 'ZZZ' is not registered",
    );
  });

  it('should delete items', async () => {
    await client.registerType('AAA', new TestOptions());
    await client.save('OPT_1', 'AAA', new TestOptions());

    await client.delete('OPT_1');

    await expect(client.loadRaw('OPT_1')).rejects.toThrow(RemoteError);
  });
});
