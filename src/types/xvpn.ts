/**
 * VPN ヘルパーのメッセージ / 状態の型定義
 */

/**
 * VPN サービスの状態
 */
export const VpnStates = [
  'activated',
  'ready',
  'connecting',
  'reconnecting',
  'connected',
  'disconnecting',
  'internal_error',
  'network_error',
  'fraudster',
  'subscription_expired',
  'license_revoked',
  'activation_error',
  'duplicate_license_used',
  'connection_error',
  'not_activated',
] as const;

export type VpnState = (typeof VpnStates)[number];

/**
 * 選択中のロケーション
 */
export interface SelectedLocation {
  id: string;
  name: string;
  is_country: boolean;
  is_smart_location: boolean;
}

/**
 * VPN ロケーション
 */
export interface Location {
  country: string;
  country_code: string;
  favorite: boolean;
  icon: string;
  id: string;
  last_connected_time: Date | null;
  name: string;
  protocols: string;
  recommended: boolean;
  region: string;
  sort_order: number;
  update_time: Date | null;
}

/**
 * 最新の VPN 状態スナップショット
 */
export interface StatusInfo {
  /** 未取得の間は null */
  state: VpnState | null;
  current_location: Location | null;
  selected_location: SelectedLocation | null;
  last_location: Location | null;
  latest_version: string | null;
  latest_version_url: string | null;
}

/**
 * "XVPN.GetLocations" の結果
 */
export interface LocationsResult {
  locations: Location[];
  default_location_id: string | null;
  recent_location_ids: string[];
  recommended_location_ids: string[];
}

/**
 * "XVPN.Connect" の引数
 */
export interface ConnectArgs {
  country?: string;
  name?: string;
  id?: string;
  is_default?: boolean;
  change_connected_location?: boolean;
  is_auto_connect?: boolean;
}

/**
 * ヘルパーに送るメソッド呼び出し
 *
 * 応答との対応付けは通知で行うため id は常に 1
 */
export interface MethodCall<TParams> {
  jsonrpc: '2.0';
  method: string;
  params: TParams;
  id: 1;
}

/**
 * 既知のメソッド名
 */
export const Methods = {
  GET_STATUS: 'XVPN.GetStatus',
  GET_LOCATIONS: 'XVPN.GetLocations',
  SELECT_LOCATION: 'XVPN.SelectLocation',
  CONNECT: 'XVPN.Connect',
  DISCONNECT: 'XVPN.Disconnect',
} as const;

/**
 * 空のスナップショット
 */
export const EMPTY_STATUS: StatusInfo = {
  state: null,
  current_location: null,
  selected_location: null,
  last_location: null,
  latest_version: null,
  latest_version_url: null,
};
