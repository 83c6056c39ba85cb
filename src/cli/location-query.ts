/**
 * 接続先の解決
 *
 * コマンドラインの指定 (なし / 国名・国コード / ロケーション ID・名前) から XVPN.Connect の引数を作る
 */

import { ClientError, ConnectArgs, ErrorCodes, Location } from '../types';

/**
 * 解決結果
 */
export interface ConnectTarget {
  args: ConnectArgs;
  /** ログ用の説明 */
  description: string;
}

/**
 * 接続先を解決
 *
 * 優先順位: 指定なし → スマートロケーション、国名 / 国コードの一致 → 国単位、
 * ID の完全一致 → 名前の部分一致 (大文字小文字を区別しない)
 *
 * @throws {ClientError} 該当するロケーションが無い
 */
export function resolveConnectTarget(
  query: string | undefined,
  locations: ReadonlyArray<Location>,
  defaultLocationId: string | null
): ConnectTarget {
  if (!query) {
    if (!defaultLocationId) {
      throw new ClientError('No default location returned', ErrorCodes.LOCATION_NOT_FOUND, false);
    }
    const defaultLocation = locations.find((l) => l.id === defaultLocationId);
    if (!defaultLocation) {
      throw new ClientError(
        `Default location with id ${defaultLocationId} not found in locations list`,
        ErrorCodes.LOCATION_NOT_FOUND,
        false
      );
    }
    return {
      args: { id: defaultLocation.id, name: defaultLocation.name, is_default: true },
      description: `Connecting to default location '${defaultLocation.name}'`,
    };
  }

  const countryLocation = locations.find((l) => l.country === query || l.country_code === query);
  if (countryLocation) {
    return {
      args: { country: countryLocation.country },
      description: `Connecting to best location in country '${countryLocation.country}'`,
    };
  }

  const lowerQuery = query.toLowerCase();
  const selected =
    locations.find((l) => l.id === query) ??
    locations.find((l) => l.name.toLowerCase().includes(lowerQuery));
  if (!selected) {
    throw new ClientError(
      `Could not find a location for the query '${query}'`,
      ErrorCodes.LOCATION_NOT_FOUND,
      true
    );
  }

  return {
    args: { id: selected.id, name: selected.name },
    description: `Connecting to location '${selected.name}'`,
  };
}
