/**
 * Pending Wait
 *
 * 通知カテゴリへの一回限りの購読と期限。
 * プロトコルに応答 ID が無いため、要求への応答は「次に届く該当カテゴリの通知」で判断する
 */

import { TimeoutError } from '../types';

/**
 * 購読を登録し、解除関数を返す
 */
export type Subscribe = (listener: () => void) => () => void;

/**
 * 待機中の購読
 */
export interface PendingWait {
  /** 通知で resolve、期限切れで TimeoutError により reject */
  readonly promise: Promise<void>;
  /** 購読を解除 (以後 promise は決着しない) */
  cancel(): void;
  /** 未決着なら購読を解除し、指定のエラーで reject */
  fail(error: Error): void;
}

/**
 * 通知を購読し、期限付きで待機する
 *
 * 購読はこの関数の中で同期的に登録されるため、呼び出し後に要求を送れば応答を取りこぼさない。
 * 解除は通知・期限切れ・キャンセル・失敗のうち最初の1回だけ行われる
 */
export function waitForNotification(
  subscribe: Subscribe,
  category: string,
  timeout: number
): PendingWait {
  let settled = false;
  let timer: NodeJS.Timeout | null = null;
  let unsubscribe: (() => void) | null = null;
  let rejectWait: (error: Error) => void = () => undefined;

  const cleanup = (): boolean => {
    if (settled) {
      return false;
    }
    settled = true;
    if (timer) {
      clearTimeout(timer);
    }
    if (unsubscribe) {
      unsubscribe();
    }
    return true;
  };

  const promise = new Promise<void>((resolve, reject) => {
    rejectWait = reject;
    unsubscribe = subscribe(() => {
      if (cleanup()) {
        resolve();
      }
    });
    timer = setTimeout(() => {
      if (cleanup()) {
        reject(new TimeoutError(`Timed out waiting for '${category}' after ${timeout}ms`));
      }
    }, timeout);
  });

  return {
    promise,
    cancel: () => {
      cleanup();
    },
    fail: (error) => {
      if (cleanup()) {
        rejectWait(error);
      }
    },
  };
}
