/**
 * NativeMessagingClient テスト
 */

import { NativeMessagingClient } from '../native-messaging-client';
import { MessageParser } from '../message-parser';
import { ClientError, ErrorCodes } from '../../types';
import { FakeHelper, flush, frame, testManifest } from './helpers/fake-helper';

function decodeAll(bytes: Buffer): string[] {
  const parser = new MessageParser();
  const texts: string[] = [];
  let buffer = bytes;
  let result = parser.decode(buffer);
  while (result !== null) {
    texts.push(result.text);
    buffer = result.remaining;
    result = parser.decode(buffer);
  }
  return texts;
}

function drainInbox(transport: NativeMessagingClient): string[] {
  const texts: string[] = [];
  let text = transport.tryReceive();
  while (text !== undefined) {
    texts.push(text);
    text = transport.tryReceive();
  }
  return texts;
}

describe('NativeMessagingClient', () => {
  let helper: FakeHelper;
  let spawned: Array<{ command: string; args: string[] }>;
  let transport: NativeMessagingClient;
  let errors: ClientError[];

  function createTransport(maxMessageSize?: number): NativeMessagingClient {
    const created = new NativeMessagingClient(testManifest, {
      maxMessageSize,
      spawn: (command, args) => {
        spawned.push({ command, args });
        return helper;
      },
    });
    created.on('error', (error) => errors.push(error));
    return created;
  }

  beforeEach(() => {
    helper = new FakeHelper();
    spawned = [];
    errors = [];
    transport = createTransport();
  });

  describe('start', () => {
    it('should spawn the helper with manifest path and first allowed extension', () => {
      transport.start();

      expect(spawned).toEqual([
        {
          command: '/opt/example/helper',
          args: ['/tmp/com.example.helper.json', 'helper@example.com'],
        },
      ]);
      expect(transport.isReading()).toBe(true);
    });

    it('should spawn only once', () => {
      transport.start();
      transport.start();

      expect(spawned).toHaveLength(1);
    });

    it('should wrap spawn failures', () => {
      const failing = new NativeMessagingClient(testManifest, {
        spawn: () => {
          throw new Error('ENOENT');
        },
      });

      expect(() => failing.start()).toThrow(ClientError);
      expect(() => failing.start()).toThrow('Failed to launch helper /opt/example/helper: ENOENT');
    });
  });

  describe('send', () => {
    it('should write one framed message', async () => {
      transport.start();

      await transport.send('{"jsonrpc":"2.0","method":"XVPN.GetStatus","params":{},"id":1}');
      await flush();

      const bytes = helper.writtenBytes;
      expect(bytes.readUInt32LE(0)).toBe(62);
      expect(decodeAll(bytes)).toEqual(['{"jsonrpc":"2.0","method":"XVPN.GetStatus","params":{},"id":1}']);
    });

    it('should write frames in call order', async () => {
      transport.start();

      await Promise.all([transport.send('{"n":1}'), transport.send('{"n":2}'), transport.send('{"n":3}')]);
      await flush();

      expect(decodeAll(helper.writtenBytes)).toEqual(['{"n":1}', '{"n":2}', '{"n":3}']);
    });

    it('should reject before start', async () => {
      await expect(transport.send('{}')).rejects.toMatchObject({ code: ErrorCodes.TRANSPORT_CLOSED });
    });

    it('should reject oversized messages', async () => {
      transport = createTransport(16);
      transport.start();

      await expect(transport.send('x'.repeat(17))).rejects.toMatchObject({ code: ErrorCodes.SIZE_EXCEEDED });
    });

    it('should reject after the helper exited', async () => {
      transport.start();
      helper.exit(0);

      await expect(transport.send('{}')).rejects.toMatchObject({ code: ErrorCodes.TRANSPORT_CLOSED });
    });
  });

  describe('receive', () => {
    beforeEach(() => {
      transport.start();
    });

    it('should return undefined when nothing was received', () => {
      expect(transport.tryReceive()).toBeUndefined();
    });

    it('should decode a frame split across chunks', async () => {
      const bytes = frame('{"connected":true,"app_version":"1.2.3"}');

      helper.stdout.write(bytes.subarray(0, 2));
      await flush();
      expect(transport.tryReceive()).toBeUndefined();

      helper.stdout.write(bytes.subarray(2, 10));
      await flush();
      expect(transport.tryReceive()).toBeUndefined();

      helper.stdout.write(bytes.subarray(10));
      await flush();
      expect(transport.tryReceive()).toBe('{"connected":true,"app_version":"1.2.3"}');
    });

    it('should decode several frames from one chunk in order', async () => {
      helper.stdout.write(Buffer.concat([frame('{"a":1}'), frame('{"b":2}'), frame('{"c":3}')]));
      await flush();

      expect(transport.pendingCount).toBe(3);
      expect(drainInbox(transport)).toEqual(['{"a":1}', '{"b":2}', '{"c":3}']);
    });

    it('should end cleanly on a frame boundary', async () => {
      helper.stdout.write(frame('{"success":true}'));
      helper.stdout.end();
      await flush();

      expect(errors).toEqual([]);
      expect(transport.isReading()).toBe(false);
      expect(transport.tryReceive()).toBe('{"success":true}');
    });

    it('should fail on end of stream inside a frame', async () => {
      const bytes = frame('{"abcdefgh":1}');
      helper.stdout.write(bytes.subarray(0, 8));
      helper.stdout.end();
      await flush();

      expect(errors).toHaveLength(1);
      expect(errors[0].code).toBe(ErrorCodes.PREMATURE_EOF);
      expect(errors[0].message).toBe('Reached end of stream but expected 10 more bytes');
      expect(transport.isReading()).toBe(false);
    });
  });

  describe('size limit', () => {
    it('should stop reading after a frame that declares too many bytes', async () => {
      transport = createTransport(4096);
      transport.start();

      const header = Buffer.alloc(4);
      header.writeUInt32LE(5000, 0);
      helper.stdout.write(Buffer.concat([frame('{"before":true}'), header]));
      await flush();

      expect(errors).toHaveLength(1);
      expect(errors[0].code).toBe(ErrorCodes.SIZE_EXCEEDED);
      expect(transport.isReading()).toBe(false);

      helper.stdout.write(frame('{"after":true}'));
      await flush();

      expect(drainInbox(transport)).toEqual(['{"before":true}']);
      await expect(transport.send('{}')).rejects.toMatchObject({ code: ErrorCodes.TRANSPORT_CLOSED });
    });
  });

  describe('exit', () => {
    it('should notify exit listeners with the code', () => {
      const codes: Array<number | null> = [];
      transport.onExit((code) => codes.push(code));
      transport.start();

      helper.exit(3);

      expect(codes).toEqual([3]);
      expect(transport.isReading()).toBe(false);
    });

    it('should report helper process errors as fatal', async () => {
      transport.start();

      helper.fail(new Error('EPIPE'));

      expect(errors).toHaveLength(1);
      expect(errors[0].code).toBe(ErrorCodes.SPAWN_FAILED);
      expect(errors[0].message).toBe('Helper process error: EPIPE');
      await expect(transport.send('{}')).rejects.toMatchObject({ code: ErrorCodes.TRANSPORT_CLOSED });
    });
  });

  describe('stop', () => {
    it('should kill the helper and reject later sends', async () => {
      transport.start();

      await transport.stop();

      expect(helper.killed).toBe(true);
      expect(transport.isReading()).toBe(false);
      await expect(transport.send('{}')).rejects.toMatchObject({ code: ErrorCodes.TRANSPORT_CLOSED });
    });
  });
});
