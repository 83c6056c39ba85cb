/**
 * Native Messaging マニフェストの検索と読み込み
 */

import * as fs from 'fs';
import * as path from 'path';
import * as os from 'os';
import {
  ClientError,
  ErrorCodes,
  NativeMessagingConstants,
  NativeMessagingManifest,
  ResolvedManifest,
} from '../types';

/**
 * マニフェストファイルの拡張子
 */
const MANIFEST_EXTENSION = '.json';

const MAC_PATHS = [
  '~/Library/Application Support/Mozilla/NativeMessagingHosts',
  '/Library/Application Support/Mozilla/NativeMessagingHosts',
];

const LINUX_PATHS = [
  '/usr/lib/mozilla/native-messaging-hosts',
  '/usr/lib64/mozilla/native-messaging-hosts',
  '~/.mozilla/native-messaging-hosts',
];

function windowsPaths(): string[] {
  const paths: string[] = [];
  const programFilesX86 = process.env['ProgramFiles(x86)'];
  const programFiles = process.env.ProgramFiles;
  if (programFilesX86) {
    paths.push(path.join(programFilesX86, 'ExpressVPN', 'expressvpnd'));
  }
  if (programFiles) {
    paths.push(path.join(programFiles, 'ExpressVPN', 'expressvpnd'));
  }
  return paths;
}

/**
 * OS ごとのマニフェスト検索パス
 *
 * OS を判別できない場合はすべてのパスを検索する
 */
export function getManifestSearchPaths(platform: NodeJS.Platform = process.platform): string[] {
  switch (platform) {
    case 'darwin':
      return [...MAC_PATHS];
    case 'linux':
      return [...LINUX_PATHS];
    case 'win32':
      return windowsPaths();
    default:
      return [...MAC_PATHS, ...LINUX_PATHS, ...windowsPaths()];
  }
}

/**
 * ヘルパーのデフォルトのマニフェスト名
 */
export function getDefaultManifestName(platform: NodeJS.Platform = process.platform): string {
  return platform === 'win32' ? 'com.expressvpn.helper.firefox' : 'com.expressvpn.helper';
}

/**
 * 先頭の ~/ をホームディレクトリに展開
 */
export function expandHome(p: string, homedir: string = os.homedir()): string {
  if (p === '~') {
    return homedir;
  }
  if (p.startsWith('~/')) {
    return path.join(homedir, p.slice(2));
  }
  return p;
}

/**
 * 名前からマニフェストファイルを検索
 *
 * @returns 最初に見つかったパス、見つからなければ null
 */
export function findManifest(name: string, searchPaths: string[] = getManifestSearchPaths()): string | null {
  for (const basePath of searchPaths) {
    const candidate = path.join(expandHome(basePath), name + MANIFEST_EXTENSION);
    if (fs.existsSync(candidate)) {
      return candidate;
    }
  }
  return null;
}

/**
 * マニフェストを読み込んで検証
 *
 * @throws {ClientError} 不正な内容、未対応の通信方式、ヘルパーが存在しない
 */
export async function loadManifest(manifestPath: string): Promise<ResolvedManifest> {
  const text = await fs.promises.readFile(manifestPath, 'utf8');

  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch (error) {
    throw new ClientError(
      `Invalid JSON in manifest: ${manifestPath}`,
      ErrorCodes.MANIFEST_INVALID,
      false,
      error instanceof Error ? error : undefined
    );
  }

  const manifest = validateManifest(parsed, manifestPath);

  if (manifest.type !== NativeMessagingConstants.PROTOCOL_TYPE) {
    throw new ClientError(
      `Unsupported native message type '${manifest.type}', only ${NativeMessagingConstants.PROTOCOL_TYPE} is supported`,
      ErrorCodes.UNSUPPORTED_PROTOCOL,
      false
    );
  }

  if (!fs.existsSync(manifest.path)) {
    throw new ClientError(
      `Helper specified in '${manifestPath}' does not exist: ${manifest.path}`,
      ErrorCodes.HELPER_NOT_FOUND,
      false
    );
  }

  return { ...manifest, manifestPath };
}

/**
 * 名前からマニフェストを検索して読み込む
 *
 * @throws {ClientError} 見つからない、または不正
 */
export async function resolveManifest(
  name: string,
  searchPaths: string[] = getManifestSearchPaths()
): Promise<ResolvedManifest> {
  const manifestPath = findManifest(name, searchPaths);
  if (!manifestPath) {
    throw new ClientError(`No manifest found with name: ${name}`, ErrorCodes.MANIFEST_NOT_FOUND, false);
  }
  return loadManifest(manifestPath);
}

/**
 * マニフェストの形を検証
 */
function validateManifest(value: unknown, manifestPath: string): NativeMessagingManifest {
  const invalid = (message: string): ClientError =>
    new ClientError(`Invalid manifest '${manifestPath}': ${message}`, ErrorCodes.MANIFEST_INVALID, false);

  if (typeof value !== 'object' || value === null || Array.isArray(value)) {
    throw invalid('must be an object');
  }

  const name: unknown = Reflect.get(value, 'name');
  const description: unknown = Reflect.get(value, 'description');
  const helperPath: unknown = Reflect.get(value, 'path');
  const type: unknown = Reflect.get(value, 'type');
  const allowedExtensions: unknown = Reflect.get(value, 'allowed_extensions');

  if (typeof name !== 'string') {
    throw invalid('name must be a string');
  }
  if (typeof helperPath !== 'string' || helperPath === '') {
    throw invalid('path must be a non-empty string');
  }
  if (typeof type !== 'string') {
    throw invalid('type must be a string');
  }
  if (
    !Array.isArray(allowedExtensions) ||
    allowedExtensions.length === 0 ||
    !allowedExtensions.every((ext): ext is string => typeof ext === 'string')
  ) {
    throw invalid('allowed_extensions must be a non-empty list of strings');
  }

  return {
    name,
    description: typeof description === 'string' ? description : '',
    path: helperPath,
    type,
    allowed_extensions: allowedExtensions,
  };
}
