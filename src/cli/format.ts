/**
 * 人が読むための出力
 */

import { Location, StatusInfo } from '../types';

function compareText(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

/**
 * ロケーション一覧を地域 → 国 → 名前の順に整形
 */
export function formatLocations(locations: ReadonlyArray<Location>): string[] {
  const sorted = [...locations].sort(
    (a, b) =>
      compareText(a.region, b.region) || compareText(a.country, b.country) || compareText(a.name, b.name)
  );

  const lines: string[] = [];
  let lastRegion: string | null = null;
  let lastCountry: string | null = null;

  for (const location of sorted) {
    if (location.region !== lastRegion) {
      lines.push('', `--- ${location.region} ---`);
      lastRegion = location.region;
    }
    if (location.country !== lastCountry) {
      lines.push('', `${location.country} (${location.country_code})`);
      lastCountry = location.country;
    }
    lines.push(`- ${location.name} (${location.id})`);
  }

  return lines;
}

/**
 * 状態を整形
 */
export function formatStatus(status: StatusInfo, appVersion: string | null): string[] {
  const lines = [`State:     ${status.state ?? 'unknown'}`];

  if (status.state === 'connected' && status.current_location) {
    lines.push(`Location:  ${status.current_location.name} (${status.current_location.id})`);
  }
  if (status.selected_location) {
    const kind = status.selected_location.is_smart_location
      ? ' [smart]'
      : status.selected_location.is_country
        ? ' [country]'
        : '';
    lines.push(`Selected:  ${status.selected_location.name}${kind}`);
  }
  if (appVersion) {
    lines.push(`App:       ${appVersion}`);
  }
  if (status.latest_version && status.latest_version !== appVersion) {
    lines.push(`Latest:    ${status.latest_version}`);
  }

  return lines;
}
