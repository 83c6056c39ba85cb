/**
 * Status Reducer
 *
 * ディスパッチャが受け取ったイベントからスナップショットを作り直す純粋関数
 */

import { SelectedLocation, StatusInfo, VpnState, VpnStates } from '../types';

/**
 * スナップショット更新イベント
 */
export type StatusEvent =
  | { type: 'replace'; info: StatusInfo }
  | { type: 'state'; state: VpnState }
  | { type: 'selected-location'; selected: SelectedLocation };

/**
 * 小文字ラベル → 状態
 */
const STATE_LOOKUP: ReadonlyMap<string, VpnState> = new Map(
  VpnStates.map((state) => [state.toLowerCase(), state])
);

/**
 * ヘルパーの状態ラベルを大文字小文字を区別せずに解釈
 *
 * @returns 未知のラベルなら undefined
 */
export function parseState(label: string): VpnState | undefined {
  return STATE_LOOKUP.get(label.toLowerCase());
}

/**
 * イベントを適用した新しいスナップショットを返す
 */
export function reduceStatus(previous: StatusInfo, event: StatusEvent): StatusInfo {
  switch (event.type) {
    case 'replace':
      return event.info;
    case 'state':
      return { ...previous, state: event.state };
    case 'selected-location':
      // 選択ロケーションの4項目だけを差し替え、他の項目はそのまま
      return { ...previous, selected_location: { ...event.selected } };
  }
}
