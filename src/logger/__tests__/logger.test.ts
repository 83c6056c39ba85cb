/**
 * Logger テスト
 */

import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { Logger, formatLine } from '../logger';
import { ClientError, ErrorCodes } from '../../types';

function readEntries(dir: string): unknown[] {
  return fs
    .readdirSync(dir)
    .filter((f) => f.endsWith('.jsonl'))
    .sort()
    .flatMap((f) => fs.readFileSync(path.join(dir, f), 'utf8').split('\n'))
    .filter((line) => line.length > 0)
    .map((line): unknown => JSON.parse(line));
}

describe('formatLine', () => {
  it('should format level and event', () => {
    expect(formatLine({ ts: '2024-01-01T00:00:00.000Z', level: 'info', event: 'Helper started' })).toBe(
      '[INFO] Helper started'
    );
  });

  it('should append string data as is and other data as JSON', () => {
    expect(formatLine({ ts: '', level: 'debug', event: 'Helper stderr', data: 'ready' })).toBe(
      '[DEBUG] Helper stderr ready'
    );
    expect(formatLine({ ts: '', level: 'error', event: 'Exception handling message', data: { text: 'x' } })).toBe(
      '[ERROR] Exception handling message {"text":"x"}'
    );
  });

  it('should append the error code and message', () => {
    expect(
      formatLine({
        ts: '',
        level: 'error',
        event: 'Transport error',
        error: { name: 'ClientError', message: 'Helper is not running', code: 'N006' },
      })
    ).toBe('[ERROR] Transport error (N006: Helper is not running)');
  });
});

describe('Logger', () => {
  let stderr: jest.SpyInstance;
  let lines: string[];

  beforeEach(() => {
    lines = [];
    stderr = jest.spyOn(process.stderr, 'write').mockImplementation((chunk: string | Uint8Array) => {
      lines.push(chunk.toString());
      return true;
    });
  });

  afterEach(() => {
    stderr.mockRestore();
  });

  it('should filter by level', () => {
    const logger = new Logger({ level: 'warn' });

    logger.debug('hidden');
    logger.info('hidden');
    logger.warn('Unhandled named message: Foo');
    logger.error('Helper has exited with code 1');

    expect(lines).toEqual(['[WARN] Unhandled named message: Foo\n', '[ERROR] Helper has exited with code 1\n']);
  });

  it('should include error details', () => {
    const logger = new Logger({ level: 'debug' });

    logger.error(
      'Connection to helper failed',
      undefined,
      new ClientError('Message size 5000 exceeds maximum 4096', ErrorCodes.SIZE_EXCEEDED, false)
    );

    expect(lines).toEqual(['[ERROR] Connection to helper failed (N002: Message size 5000 exceeds maximum 4096)\n']);
  });

  it('should stay silent without console output', () => {
    const logger = new Logger({ level: 'debug', console: false });

    logger.error('quiet');

    expect(lines).toEqual([]);
  });

  it('should report enabled levels', () => {
    const logger = new Logger({ level: 'info' });

    expect(logger.isEnabled('debug')).toBe(false);
    expect(logger.isEnabled('info')).toBe(true);
    expect(logger.isEnabled('error')).toBe(true);
  });

  describe('file output', () => {
    let tempDir: string;

    beforeEach(() => {
      tempDir = fs.mkdtempSync(path.join(os.tmpdir(), 'xvpn-log-'));
    });

    afterEach(() => {
      fs.rmSync(tempDir, { recursive: true, force: true });
    });

    it('should write JSONL entries', async () => {
      const logger = new Logger({ level: 'info', logDir: tempDir, console: false });
      await logger.init();

      logger.info('Manifest loaded', { name: 'com.example.helper' });
      logger.debug('hidden');
      await logger.close();

      const entries = readEntries(tempDir);
      expect(entries).toHaveLength(1);
      expect(entries[0]).toMatchObject({
        level: 'info',
        event: 'Manifest loaded',
        data: { name: 'com.example.helper' },
      });
    });
  });
});
