/**
 * spawnHelper テスト
 *
 * 実際の子プロセスとして Node.js を起動する
 */

import { spawnHelper } from '../helper-process';
import { MessageParser } from '../message-parser';
import { HelperProcess } from '../../types';

/** 1フレームを読み、引数と受信内容を返して終了コード 3 で終わるヘルパー */
const echoScript = `
const chunks = [];
process.stdin.on('data', (chunk) => {
  chunks.push(chunk);
  const buffer = Buffer.concat(chunks);
  if (buffer.length < 4) return;
  const length = buffer.readUInt32LE(0);
  if (buffer.length < 4 + length) return;
  const received = JSON.parse(buffer.subarray(4, 4 + length).toString('utf8'));
  const body = Buffer.from(JSON.stringify({ args: process.argv.slice(1), received }), 'utf8');
  const header = Buffer.alloc(4);
  header.writeUInt32LE(body.length, 0);
  process.stdout.write(Buffer.concat([header, body]), () => process.exit(3));
});
`;

function collectFrames(helper: HelperProcess, parser: MessageParser): string[] {
  const texts: string[] = [];
  let buffer: Buffer = Buffer.alloc(0);
  helper.stdout.on('data', (chunk: Buffer) => {
    buffer = Buffer.concat([buffer, chunk]);
    let result = parser.decode(buffer);
    while (result !== null) {
      texts.push(result.text);
      buffer = result.remaining;
      result = parser.decode(buffer);
    }
  });
  return texts;
}

function waitForExit(helper: HelperProcess): Promise<number | null> {
  return new Promise((resolve) => helper.onExit(resolve));
}

describe('spawnHelper', () => {
  it('should pass arguments without a shell and exchange framed messages', async () => {
    const parser = new MessageParser();
    const helper = spawnHelper(process.execPath, [
      '-e',
      echoScript,
      'C:\\Program Files\\helper manifest.json',
      'chrome-extension://test-extension/',
    ]);
    const texts = collectFrames(helper, parser);
    const exited = waitForExit(helper);

    helper.stdin.write(parser.encode('{"method":"XVPN.GetStatus"}'));
    const code = await exited;

    expect(code).toBe(3);
    expect(texts).toEqual([
      '{"args":["C:\\\\Program Files\\\\helper manifest.json","chrome-extension://test-extension/"],"received":{"method":"XVPN.GetStatus"}}',
    ]);
  });

  it('should report the exit code after stdout closes', async () => {
    const helper = spawnHelper(process.execPath, ['-e', 'process.exit(0)']);
    const exited = waitForExit(helper);

    await expect(exited).resolves.toBe(0);
  });

  it('should report a missing executable through the error handler', async () => {
    const helper = spawnHelper('/nonexistent/xvpn-test-helper', []);
    const failed = new Promise<Error>((resolve) => helper.onError(resolve));

    const error = await failed;

    expect(error.message).toContain('ENOENT');
  });
});
