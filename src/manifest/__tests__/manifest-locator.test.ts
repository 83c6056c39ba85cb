/**
 * マニフェスト検索 / 読み込みテスト
 */

import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import {
  expandHome,
  findManifest,
  getDefaultManifestName,
  getManifestSearchPaths,
  loadManifest,
  resolveManifest,
} from '../manifest-locator';
import { ErrorCodes } from '../../types';

describe('manifest-locator', () => {
  let tempDir: string;
  let helperPath: string;

  function writeManifest(dir: string, name: string, content: unknown): string {
    fs.mkdirSync(dir, { recursive: true });
    const manifestPath = path.join(dir, `${name}.json`);
    fs.writeFileSync(manifestPath, typeof content === 'string' ? content : JSON.stringify(content));
    return manifestPath;
  }

  beforeEach(() => {
    tempDir = fs.mkdtempSync(path.join(os.tmpdir(), 'xvpn-manifest-'));
    helperPath = path.join(tempDir, 'helper');
    fs.writeFileSync(helperPath, '');
  });

  afterEach(() => {
    fs.rmSync(tempDir, { recursive: true, force: true });
  });

  describe('getManifestSearchPaths', () => {
    it('should list macOS paths', () => {
      expect(getManifestSearchPaths('darwin')).toEqual([
        '~/Library/Application Support/Mozilla/NativeMessagingHosts',
        '/Library/Application Support/Mozilla/NativeMessagingHosts',
      ]);
    });

    it('should list Linux paths', () => {
      expect(getManifestSearchPaths('linux')).toEqual([
        '/usr/lib/mozilla/native-messaging-hosts',
        '/usr/lib64/mozilla/native-messaging-hosts',
        '~/.mozilla/native-messaging-hosts',
      ]);
    });

    it('should search every known location on other platforms', () => {
      const paths = getManifestSearchPaths('freebsd');

      expect(paths).toEqual(expect.arrayContaining([...getManifestSearchPaths('darwin'), ...getManifestSearchPaths('linux')]));
    });
  });

  describe('getDefaultManifestName', () => {
    it('should use the firefox helper name on Windows', () => {
      expect(getDefaultManifestName('win32')).toBe('com.expressvpn.helper.firefox');
      expect(getDefaultManifestName('linux')).toBe('com.expressvpn.helper');
      expect(getDefaultManifestName('darwin')).toBe('com.expressvpn.helper');
    });
  });

  describe('expandHome', () => {
    it('should expand a leading tilde', () => {
      expect(expandHome('~/.mozilla', '/home/test')).toBe(path.join('/home/test', '.mozilla'));
      expect(expandHome('~', '/home/test')).toBe('/home/test');
    });

    it('should leave other paths alone', () => {
      expect(expandHome('/usr/lib/~/x', '/home/test')).toBe('/usr/lib/~/x');
    });
  });

  describe('findManifest', () => {
    it('should return the first match in search order', () => {
      const first = path.join(tempDir, 'first');
      const second = path.join(tempDir, 'second');
      writeManifest(second, 'com.example.helper', {});
      const expected = writeManifest(first, 'com.example.helper', {});

      expect(findManifest('com.example.helper', [path.join(tempDir, 'missing'), first, second])).toBe(expected);
    });

    it('should return null when nothing matches', () => {
      expect(findManifest('com.example.helper', [tempDir])).toBeNull();
    });
  });

  describe('loadManifest', () => {
    const valid = (): Record<string, unknown> => ({
      name: 'com.example.helper',
      description: 'Example helper',
      path: helperPath,
      type: 'stdio',
      allowed_extensions: ['helper@example.com'],
    });

    it('should load a valid manifest', async () => {
      const manifestPath = writeManifest(tempDir, 'com.example.helper', valid());

      await expect(loadManifest(manifestPath)).resolves.toEqual({
        name: 'com.example.helper',
        description: 'Example helper',
        path: helperPath,
        type: 'stdio',
        allowed_extensions: ['helper@example.com'],
        manifestPath,
      });
    });

    it('should reject invalid JSON', async () => {
      const manifestPath = writeManifest(tempDir, 'broken', '{not json');

      await expect(loadManifest(manifestPath)).rejects.toMatchObject({ code: ErrorCodes.MANIFEST_INVALID });
    });

    it('should reject an empty allowed_extensions list', async () => {
      const manifestPath = writeManifest(tempDir, 'empty', { ...valid(), allowed_extensions: [] });

      await expect(loadManifest(manifestPath)).rejects.toMatchObject({
        code: ErrorCodes.MANIFEST_INVALID,
        message: `Invalid manifest '${manifestPath}': allowed_extensions must be a non-empty list of strings`,
      });
    });

    it('should reject protocols other than stdio', async () => {
      const manifestPath = writeManifest(tempDir, 'socket', { ...valid(), type: 'socket' });

      await expect(loadManifest(manifestPath)).rejects.toMatchObject({
        code: ErrorCodes.UNSUPPORTED_PROTOCOL,
        message: "Unsupported native message type 'socket', only stdio is supported",
      });
    });

    it('should reject a missing helper executable', async () => {
      const missing = path.join(tempDir, 'no-such-helper');
      const manifestPath = writeManifest(tempDir, 'missing', { ...valid(), path: missing });

      await expect(loadManifest(manifestPath)).rejects.toMatchObject({
        code: ErrorCodes.HELPER_NOT_FOUND,
        message: `Helper specified in '${manifestPath}' does not exist: ${missing}`,
      });
    });
  });

  describe('resolveManifest', () => {
    it('should find and load by name', async () => {
      writeManifest(tempDir, 'com.example.helper', {
        name: 'com.example.helper',
        description: '',
        path: helperPath,
        type: 'stdio',
        allowed_extensions: ['helper@example.com'],
      });

      const manifest = await resolveManifest('com.example.helper', [tempDir]);

      expect(manifest.manifestPath).toBe(path.join(tempDir, 'com.example.helper.json'));
    });

    it('should report a missing manifest', async () => {
      await expect(resolveManifest('com.example.missing', [tempDir])).rejects.toMatchObject({
        code: ErrorCodes.MANIFEST_NOT_FOUND,
        message: 'No manifest found with name: com.example.missing',
      });
    });
  });
});
