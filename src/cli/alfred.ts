/**
 * Alfred ワークフロー用の出力
 *
 * Script Filter の JSON 形式 ({"items": [...]}) を生成する
 */

import { Location, VpnState } from '../types';

/** 接続中 */
export const CURRENT_MARK = '\u26A1\uFE0F ';
/** お気に入り */
export const FAVORITE_MARK = '\u2764\uFE0F';
/** 最近の接続 */
export const RECENT_MARK = '\u{1F559}';
/** スマートロケーション */
export const DEFAULT_MARK = '\u{1F44D}';

export interface AlfredIcon {
  path: string;
}

export interface AlfredItem {
  uid?: string;
  title: string;
  subtitle: string;
  arg: string;
  icon: AlfredIcon;
  valid: boolean;
  match: string;
}

/**
 * 出力に必要なクライアントの状態
 */
export interface AlfredContext {
  state: VpnState | null;
  currentLocation: Location | null;
  locations: ReadonlyArray<Location>;
  recentLocationIds: ReadonlyArray<string>;
  defaultLocationId: string | null;
}

/**
 * 接続中のロケーション (未接続なら null)
 */
function connectedLocation(context: AlfredContext): Location | null {
  return context.state === 'connected' ? context.currentLocation : null;
}

/**
 * ロケーション1件分の項目
 */
export function alfredItemFor(context: AlfredContext, location: Location, withUid = true): AlfredItem {
  let prefix = '';
  let arg = `connect ${location.id}`;

  if (location.id === connectedLocation(context)?.id) {
    prefix = CURRENT_MARK;
    arg = 'disconnect';
  } else {
    if (location.favorite) prefix += FAVORITE_MARK;
    if (context.recentLocationIds.includes(location.id)) prefix += RECENT_MARK;
    if (context.defaultLocationId === location.id) prefix += DEFAULT_MARK;
    if (prefix.length > 0) prefix += ' ';
  }

  return {
    uid: withUid ? location.id : undefined,
    title: location.name,
    subtitle: `${prefix}${location.region} - ${location.country}`,
    arg,
    icon: { path: `./flags/${location.country_code}.png` },
    valid: true,
    match: `${location.name} ${location.region} ${location.country_code}`,
  };
}

/**
 * 項目一覧を生成
 *
 * listAll が false の場合はメインメニュー:
 * 接続中のロケーション、お気に入り、最近の接続、スマートロケーションの順
 */
export function buildAlfredItems(context: AlfredContext, listAll: boolean): AlfredItem[] {
  if (listAll) {
    return context.locations.map((location) => alfredItemFor(context, location));
  }

  const items: AlfredItem[] = [];
  const current = connectedLocation(context);
  const currentId = current?.id ?? null;

  if (current) {
    items.push(alfredItemFor(context, current, false));
  }

  for (const location of context.locations) {
    if (!location.favorite || location.id === currentId) continue;
    items.push(alfredItemFor(context, location, false));
  }

  for (const id of context.recentLocationIds) {
    const location = context.locations.find((l) => l.id === id);
    if (!location || location.favorite || location.id === currentId) continue;
    items.push(alfredItemFor(context, location, false));
  }

  const defaultLocation = context.locations.find((l) => l.id === context.defaultLocationId);
  if (defaultLocation) {
    items.push(alfredItemFor(context, defaultLocation, false));
  }

  return items;
}

/**
 * Alfred に渡す JSON テキスト
 */
export function renderAlfred(items: AlfredItem[]): string {
  return JSON.stringify({ items }, null, 2);
}
