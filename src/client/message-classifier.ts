/**
 * Message Classifier
 *
 * ヘルパーからのメッセージをトップレベルのキーで分類する。
 * 複数のキーを含む場合も、優先順位の高い解釈だけを採用する:
 *   error > connected > info > name > Preferences > locations > messages > success
 */

import {
  ClientError,
  ErrorCodes,
  Location,
  LocationsResult,
  SelectedLocation,
  StatusInfo,
  VpnState,
} from '../types';
import {
  JsonObject,
  isRecord,
  parseObject,
  readBoolean,
  readDate,
  readNumber,
  readString,
  readStringArray,
  requireObject,
} from './json';
import { parseState } from './status-reducer';

/**
 * 分類済みメッセージ
 */
export type HelperMessage =
  | { kind: 'error'; error: unknown }
  | { kind: 'handshake'; appVersion: string | null }
  | { kind: 'status'; info: StatusInfo }
  | { kind: 'state-changed'; label: string; state: VpnState | undefined }
  | { kind: 'progress'; progress: number }
  | { kind: 'selected-location'; selected: SelectedLocation }
  | { kind: 'network-wait' }
  | { kind: 'unhandled-event'; name: string }
  | { kind: 'preferences' }
  | { kind: 'locations'; result: LocationsResult }
  | { kind: 'messages' }
  | { kind: 'success' }
  | { kind: 'unknown' };

/**
 * JSON テキストを分類
 *
 * @throws {ClientError} 不正な JSON、または該当する形に必要なフィールドが欠けている
 */
export function classifyMessage(text: string): HelperMessage {
  const doc = parseObject(text);

  if ('error' in doc) {
    return { kind: 'error', error: doc.error };
  }
  if (doc.connected === true) {
    return { kind: 'handshake', appVersion: readString(doc, 'app_version') };
  }
  if ('info' in doc) {
    return { kind: 'status', info: parseStatusInfo(requireObject(doc, 'info', 'status message')) };
  }
  if ('name' in doc) {
    return classifyNamedEvent(doc);
  }
  if ('Preferences' in doc) {
    return { kind: 'preferences' };
  }
  if ('locations' in doc) {
    return { kind: 'locations', result: parseLocationsResult(doc) };
  }
  if ('messages' in doc) {
    return { kind: 'messages' };
  }
  if ('success' in doc) {
    return { kind: 'success' };
  }
  return { kind: 'unknown' };
}

/**
 * 名前付きイベントを分類
 *
 * イベントのデータは data.<name>Data に入っている
 */
function classifyNamedEvent(doc: JsonObject): HelperMessage {
  const name = readString(doc, 'name');
  if (name === null) {
    throw new ClientError('Named message has a non-string name', ErrorCodes.PARSE_ERROR, true);
  }

  const eventData = (): JsonObject => {
    const data = requireObject(doc, 'data', `${name} message`);
    return requireObject(data, `${name}Data`, `${name} message`);
  };

  switch (name) {
    case 'ServiceStateChanged': {
      const label = readString(eventData(), 'newstate');
      if (label === null) {
        throw new ClientError('Missing newstate in ServiceStateChanged', ErrorCodes.PARSE_ERROR, true);
      }
      return { kind: 'state-changed', label, state: parseState(label) };
    }
    case 'ConnectionProgress': {
      const progress = readNumber(eventData(), 'progress');
      if (progress === null) {
        throw new ClientError('Missing progress in ConnectionProgress', ErrorCodes.PARSE_ERROR, true);
      }
      return { kind: 'progress', progress };
    }
    case 'SelectedLocationChanged':
      return { kind: 'selected-location', selected: parseSelectedLocation(eventData()) };
    case 'WaitForNetworkReady':
      return { kind: 'network-wait' };
    default:
      return { kind: 'unhandled-event', name };
  }
}

/**
 * "XVPN.GetStatus" の info をパース
 */
export function parseStatusInfo(info: JsonObject): StatusInfo {
  let state: VpnState | null = null;
  const label = readString(info, 'state');
  if (label !== null) {
    const parsed = parseState(label);
    if (parsed === undefined) {
      throw new ClientError(`Unknown state in status: ${label}`, ErrorCodes.PARSE_ERROR, true);
    }
    state = parsed;
  }

  return {
    state,
    current_location: parseOptionalLocation(info.current_location),
    selected_location: isRecord(info.selected_location)
      ? parseSelectedLocation(info.selected_location)
      : null,
    last_location: parseOptionalLocation(info.last_location),
    latest_version: readString(info, 'latest_version'),
    latest_version_url: readString(info, 'latest_version_url'),
  };
}

/**
 * "XVPN.GetLocations" の結果をパース
 */
export function parseLocationsResult(doc: JsonObject): LocationsResult {
  if (!Array.isArray(doc.locations)) {
    throw new ClientError('locations is not an array', ErrorCodes.PARSE_ERROR, true);
  }

  const locations = doc.locations.filter(isRecord).map(parseLocation);
  const defaultLocation = doc.default_location;

  return {
    locations,
    default_location_id: isRecord(defaultLocation) ? readString(defaultLocation, 'id') : null,
    recent_location_ids: readStringArray(doc, 'recent_locations_ids'),
    recommended_location_ids: readStringArray(doc, 'recommended_location_ids'),
  };
}

export function parseLocation(obj: JsonObject): Location {
  return {
    country: readString(obj, 'country') ?? '',
    country_code: readString(obj, 'country_code') ?? '',
    favorite: readBoolean(obj, 'favorite'),
    icon: readString(obj, 'icon') ?? '',
    id: readString(obj, 'id') ?? '',
    last_connected_time: readDate(obj, 'last_connected_time'),
    name: readString(obj, 'name') ?? '',
    protocols: readString(obj, 'protocols') ?? '',
    recommended: readBoolean(obj, 'recommended'),
    region: readString(obj, 'region') ?? '',
    sort_order: readNumber(obj, 'sort_order') ?? 0,
    update_time: readDate(obj, 'update_time'),
  };
}

function parseOptionalLocation(value: unknown): Location | null {
  return isRecord(value) ? parseLocation(value) : null;
}

function parseSelectedLocation(obj: JsonObject): SelectedLocation {
  return {
    id: readString(obj, 'id') ?? '',
    name: readString(obj, 'name') ?? '',
    is_country: readBoolean(obj, 'is_country'),
    is_smart_location: readBoolean(obj, 'is_smart_location'),
  };
}
