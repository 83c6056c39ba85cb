/**
 * XVPN Client
 *
 * VPN ヘルパーとのメッセージを処理し、接続 / 切断ワークフローを提供する
 */

import { EventEmitter } from 'events';
import {
  ClientError,
  ConnectArgs,
  ConnectionFailedError,
  EMPTY_STATUS,
  ErrorCodes,
  Location,
  LocationsResult,
  MessageTransport,
  MethodCall,
  Methods,
  SelectedLocation,
  StatusInfo,
  TimeoutError,
  VpnState,
} from '../types';
import { Logger } from '../logger';
import { HelperMessage, classifyMessage } from './message-classifier';
import { StatusEvent, reduceStatus } from './status-reducer';
import { PendingWait, waitForNotification } from './pending-wait';

/**
 * XvpnClient オプション (時間はすべて ms)
 */
export interface XvpnClientOptions {
  /** 要求に対する通知の待機時間 */
  responseTimeout?: number;
  /** ヘルパーとのハンドシェイク待機時間 */
  handshakeTimeout?: number;
  /** 接続完了までの待機時間 */
  connectTimeout?: number;
  /** 切断完了までの待機時間 */
  disconnectTimeout?: number;
  /** 受信キューの処理間隔 */
  dispatchInterval?: number;
  /** 接続中の状態確認間隔 */
  connectPollInterval?: number;
  /** 切断中の状態確認間隔 */
  disconnectPollInterval?: number;
  logger?: Logger;
}

/**
 * XvpnClient イベント
 */
export interface XvpnClientEvents {
  /** ヘルパーとの接続確立 (1回のみ) */
  connected: (appVersion: string | null) => void;
  /** スナップショットのいずれかの項目が変化 */
  status: () => void;
  /** XVPN.GetStatus による完全なスナップショットの受信 */
  'full-status': () => void;
  /** 接続進捗 (0-100) */
  progress: (progress: number) => void;
  /** ロケーション一覧の更新 */
  locations: () => void;
  /** 処理したすべての受信メッセージ */
  message: (text: string) => void;
  /** トランスポートの致命的エラー */
  error: (error: ClientError) => void;
  /** ヘルパーの終了 */
  exit: (code: number | null) => void;
}

/**
 * 待機に使える通知カテゴリ
 */
export type NotificationCategory = 'connected' | 'status' | 'full-status' | 'locations';

const DEFAULTS = {
  responseTimeout: 500,
  handshakeTimeout: 1000,
  connectTimeout: 10000,
  disconnectTimeout: 10000,
  dispatchInterval: 20,
  connectPollInterval: 20,
  disconnectPollInterval: 200,
};

/**
 * 接続中とみなす状態
 */
const CONNECT_IN_PROGRESS: ReadonlySet<VpnState> = new Set<VpnState>(['ready', 'connecting', 'disconnecting']);

/**
 * XVPN Client
 */
export class XvpnClient extends EventEmitter {
  private readonly logger: Logger;
  private readonly options: Required<Omit<XvpnClientOptions, 'logger'>>;
  private dispatchTimer: NodeJS.Timeout | null = null;
  private helperConnected = false;
  private helperVersion: string | null = null;
  private status: StatusInfo = EMPTY_STATUS;
  private locationsResult: LocationsResult | null = null;
  /** トランスポートの致命的エラー (以後の要求・待機はこのエラーで失敗する) */
  private failure: ClientError | null = null;
  private readonly pendingWaits = new Set<PendingWait>();

  constructor(
    private readonly transport: MessageTransport,
    options: XvpnClientOptions = {}
  ) {
    super();
    this.logger = options.logger ?? new Logger({ console: false });
    this.options = {
      responseTimeout: options.responseTimeout ?? DEFAULTS.responseTimeout,
      handshakeTimeout: options.handshakeTimeout ?? DEFAULTS.handshakeTimeout,
      connectTimeout: options.connectTimeout ?? DEFAULTS.connectTimeout,
      disconnectTimeout: options.disconnectTimeout ?? DEFAULTS.disconnectTimeout,
      dispatchInterval: options.dispatchInterval ?? DEFAULTS.dispatchInterval,
      connectPollInterval: options.connectPollInterval ?? DEFAULTS.connectPollInterval,
      disconnectPollInterval: options.disconnectPollInterval ?? DEFAULTS.disconnectPollInterval,
    };
    // リスナー未登録でも unhandled error にしない
    this.on('error', (error) => {
      this.logger.error('Connection to helper failed', undefined, error);
    });
  }

  // ---- 状態 ----

  /** ヘルパーとのハンドシェイクが完了しているか */
  get isConnectedToHelper(): boolean {
    return this.helperConnected;
  }

  /** 接続先アプリのバージョン */
  get appVersion(): string | null {
    return this.helperVersion;
  }

  /** 最新の状態スナップショット */
  get latestStatus(): StatusInfo {
    return this.status;
  }

  /**
   * 利用可能なロケーション (refreshLocations() 前は null)
   */
  get locations(): ReadonlyArray<Location> | null {
    return this.locationsResult ? this.locationsResult.locations : null;
  }

  /** スマートロケーションの ID */
  get defaultLocationId(): string | null {
    return this.locationsResult ? this.locationsResult.default_location_id : null;
  }

  /** 最近接続したロケーションの ID */
  get recentLocationIds(): ReadonlyArray<string> {
    return this.locationsResult ? this.locationsResult.recent_location_ids : [];
  }

  /** おすすめロケーションの ID */
  get recommendedLocationIds(): ReadonlyArray<string> {
    return this.locationsResult ? this.locationsResult.recommended_location_ids : [];
  }

  // ---- ライフサイクル ----

  /**
   * ヘルパーを起動し、受信メッセージの処理を開始
   */
  start(): void {
    if (this.dispatchTimer) {
      return;
    }

    this.transport.onError((error) => {
      this.drain();
      this.stopDispatch();
      this.abort(error);
      this.emit('error', error);
    });
    this.transport.onExit((code) => {
      this.drain();
      this.stopDispatch();
      this.abort(new ClientError(`Helper exited with code ${code}`, ErrorCodes.TRANSPORT_CLOSED, false));
      this.emit('exit', code);
    });

    this.transport.start();
    this.dispatchTimer = setInterval(() => this.drain(), this.options.dispatchInterval);
  }

  /**
   * 処理を停止してヘルパーを終了
   */
  async stop(): Promise<void> {
    this.stopDispatch();
    await this.transport.stop();
  }

  /**
   * ヘルパーとの接続確立を待機
   *
   * 下位のプロセス接続とは別に、ヘルパーが準備完了を通知するまで待つ
   */
  async waitForConnection(timeout: number = this.options.handshakeTimeout): Promise<void> {
    if (this.helperConnected) {
      return;
    }
    await this.waitFor('connected', timeout);
  }

  // ---- 要求 ----

  /**
   * メソッドを呼び出す (応答は待たない)
   */
  async call<TParams>(method: string, params: TParams): Promise<void> {
    if (this.failure) {
      throw this.failure;
    }
    const call: MethodCall<TParams> = { jsonrpc: '2.0', method, params, id: 1 };
    await this.transport.send(JSON.stringify(call));
  }

  /**
   * メソッドを呼び出し、指定カテゴリの次の通知を待つ
   *
   * 購読は送信より前に登録し、成功・失敗・期限切れのいずれでも必ず解除する
   *
   * @throws {TimeoutError} 期限内に通知が無かった
   * @throws {ClientError} 待機中にトランスポートが失敗した
   */
  async callAndWait<TParams>(
    method: string,
    params: TParams,
    category: NotificationCategory,
    timeout: number = this.options.responseTimeout
  ): Promise<void> {
    await this.waitFor(category, timeout, () => this.call(method, params));
  }

  /**
   * 生の JSON テキストを送信 (REPL 用)
   */
  async send(json: string): Promise<void> {
    await this.transport.send(json);
  }

  /**
   * 状態スナップショットを更新
   */
  async refreshStatus(): Promise<void> {
    this.assertHelperConnected();
    await this.callAndWait(Methods.GET_STATUS, {}, 'full-status');
  }

  /**
   * ロケーション一覧を更新
   */
  async refreshLocations(): Promise<void> {
    this.assertHelperConnected();
    await this.callAndWait(Methods.GET_LOCATIONS, {}, 'locations');
  }

  /**
   * ID でロケーションを検索
   *
   * @throws {ClientError} ロケーション一覧が未取得
   */
  findLocation(id: string): Location | undefined {
    if (!this.locationsResult) {
      throw new ClientError('Locations have not been loaded yet', ErrorCodes.LOCATIONS_NOT_LOADED, true);
    }
    return this.locationsResult.locations.find((location) => location.id === id);
  }

  /**
   * VPN ロケーションに接続
   *
   * @throws {TimeoutError} 期限内に接続が完了しなかった
   * @throws {ConnectionFailedError} 接続が想定外の状態で終了した
   */
  async connect(args: ConnectArgs, timeout: number = this.options.connectTimeout): Promise<void> {
    this.assertHelperConnected();

    if (this.currentState() !== 'connected') {
      // ブラウザ拡張に正しいロケーションを表示させるには SelectLocation が必要
      const selected = selectionFor(args);
      if (this.status.selected_location?.name !== selected.name) {
        await this.callAndWait(Methods.SELECT_LOCATION, { selected_location: selected }, 'status');
      }
    }

    // 接続済みからの再接続では、一度 connected 以外に遷移するまで connected も途中状態とみなす
    let wasConnected = this.currentState() === 'connected';

    await this.call(Methods.CONNECT, connectParamsFor(args));

    const progressValues: number[] = [];
    const onProgress = (progress: number): void => {
      progressValues.push(progress);
    };
    this.on('progress', onProgress);

    const start = Date.now();
    try {
      while (
        !this.failure &&
        isConnectInProgress(this.currentState(), wasConnected) &&
        Date.now() - start < timeout
      ) {
        await delay(this.options.connectPollInterval);

        const progress = progressValues.pop();
        progressValues.length = 0;
        if (progress !== undefined) {
          this.logger.info(`Connecting... ${formatProgress(progress)}%`);
        }

        const state = this.currentState();
        if (wasConnected && state !== 'connected' && state !== 'disconnecting') {
          wasConnected = false;
        }
      }
    } finally {
      this.removeListener('progress', onProgress);
    }

    if (this.failure) {
      throw this.failure;
    }
    const finalState = this.currentState();
    if (finalState === 'connected') {
      this.logger.info(`Finished connection with state: ${finalState}`);
    } else if (finalState === 'ready' || finalState === 'connecting') {
      throw new TimeoutError('Timed out waiting to connect');
    } else {
      throw new ConnectionFailedError(`Error while connecting, ended up in state '${finalState}'`, finalState);
    }
  }

  /**
   * 現在の VPN ロケーションから切断
   *
   * @throws {ClientError} VPN が接続されていない
   * @throws {TimeoutError} 期限内に切断が完了しなかった
   * @throws {ConnectionFailedError} 切断が想定外の状態で終了した
   */
  async disconnect(timeout: number = this.options.disconnectTimeout): Promise<void> {
    this.assertHelperConnected();
    if (this.currentState() !== 'connected') {
      throw new ClientError('VPN is not connected', ErrorCodes.NOT_CONNECTED, true);
    }

    await this.call(Methods.DISCONNECT, {});

    const start = Date.now();
    while (!this.failure && isDisconnectInProgress(this.currentState()) && Date.now() - start < timeout) {
      await delay(this.options.disconnectPollInterval);
    }

    if (this.failure) {
      throw this.failure;
    }
    const finalState = this.currentState();
    if (finalState === 'ready') {
      this.logger.info('Disconnected successfully');
    } else if (isDisconnectInProgress(finalState)) {
      throw new TimeoutError('Timed out waiting to disconnect');
    } else {
      throw new ConnectionFailedError(`Error while disconnecting, ended up in state '${finalState}'`, finalState);
    }
  }

  // ---- ディスパッチ ----

  /**
   * 受信キューのメッセージをすべて処理
   */
  drain(): void {
    let text = this.transport.tryReceive();
    while (text !== undefined) {
      this.dispatch(text);
      text = this.transport.tryReceive();
    }
  }

  /**
   * 受信メッセージを1件処理
   *
   * 失敗はメッセージ単位でログに記録し、後続のメッセージ処理は継続する
   */
  dispatch(text: string): void {
    try {
      this.handleMessage(classifyMessage(text), text);
      this.emit('message', text);
    } catch (error) {
      this.logger.error('Exception handling message', { text }, error instanceof Error ? error : undefined);
    }
  }

  private handleMessage(message: HelperMessage, text: string): void {
    switch (message.kind) {
      case 'error':
        this.logger.error('Helper reported an error', message.error);
        break;

      case 'handshake':
        this.helperVersion = message.appVersion;
        if (!this.helperConnected) {
          this.helperConnected = true;
          this.emit('connected', message.appVersion);
        }
        break;

      case 'status':
        this.applyStatus({ type: 'replace', info: message.info });
        this.emit('full-status');
        break;

      case 'state-changed':
        if (message.state === undefined) {
          this.logger.error(`Unknown state in ServiceStateChanged: ${message.label}`);
        } else {
          this.applyStatus({ type: 'state', state: message.state });
        }
        break;

      case 'progress':
        this.emit('progress', message.progress);
        break;

      case 'selected-location':
        this.applyStatus({ type: 'selected-location', selected: message.selected });
        break;

      case 'locations':
        // 一覧は受信ごとに丸ごと置き換え、外部からは変更させない
        Object.freeze(message.result.locations);
        Object.freeze(message.result.recent_location_ids);
        Object.freeze(message.result.recommended_location_ids);
        this.locationsResult = message.result;
        this.emit('locations');
        break;

      case 'unhandled-event':
        this.logger.warn(`Unhandled named message: ${message.name}`);
        break;

      case 'unknown':
        this.logger.warn(`Unhandled message: ${text}`);
        break;

      case 'network-wait':
      case 'preferences':
      case 'messages':
      case 'success':
        // 受け付けるが何もしない
        break;
    }
  }

  private applyStatus(event: StatusEvent): void {
    this.status = reduceStatus(this.status, event);
    this.emit('status');
  }

  /**
   * 通知を待機する (action があれば購読の登録後に実行)
   */
  private async waitFor(
    category: NotificationCategory,
    timeout: number,
    action?: () => Promise<void>
  ): Promise<void> {
    if (this.failure) {
      throw this.failure;
    }
    const wait = waitForNotification((listener) => this.subscribe(category, listener), category, timeout);
    this.pendingWaits.add(wait);
    try {
      await Promise.all([action ? action() : undefined, wait.promise]);
    } finally {
      this.pendingWaits.delete(wait);
      wait.cancel();
    }
  }

  /**
   * 致命的エラーを記録し、待機中の購読をすべて失敗させる
   */
  private abort(error: ClientError): void {
    if (!this.failure) {
      this.failure = error;
    }
    for (const wait of this.pendingWaits) {
      wait.fail(this.failure);
    }
    this.pendingWaits.clear();
  }

  private subscribe(category: NotificationCategory, listener: () => void): () => void {
    this.on(category, listener);
    return () => {
      this.removeListener(category, listener);
    };
  }

  private currentState(): VpnState | null {
    return this.status.state;
  }

  private stopDispatch(): void {
    if (this.dispatchTimer) {
      clearInterval(this.dispatchTimer);
      this.dispatchTimer = null;
    }
  }

  private assertHelperConnected(): void {
    if (this.failure) {
      throw this.failure;
    }
    if (!this.helperConnected) {
      throw new ClientError(
        'Connection to helper has not been established',
        ErrorCodes.HELPER_NOT_CONNECTED,
        false
      );
    }
  }
}

// EventEmitter の型付けを強化
export interface XvpnClient {
  on<K extends keyof XvpnClientEvents>(event: K, listener: XvpnClientEvents[K]): this;
  emit<K extends keyof XvpnClientEvents>(event: K, ...args: Parameters<XvpnClientEvents[K]>): boolean;
}

/**
 * SelectLocation に渡す選択内容
 *
 * 国が指定されていれば国名、なければロケーション名を使う
 */
export function selectionFor(args: ConnectArgs): SelectedLocation {
  const country = args.country ?? '';
  const isCountry = country !== '';
  return {
    id: args.id ?? '',
    name: isCountry ? country : args.name ?? '',
    is_country: isCountry,
    is_smart_location: args.is_default ?? false,
  };
}

/**
 * XVPN.Connect のパラメータ
 */
export function connectParamsFor(args: ConnectArgs): Record<string, string | boolean | null> {
  return {
    country: args.country ?? null,
    name: args.name ?? null,
    is_default: args.is_default ?? false,
    id: args.id ?? null,
    change_connected_location: args.change_connected_location ?? false,
    is_auto_connect: args.is_auto_connect ?? false,
  };
}

function isConnectInProgress(state: VpnState | null, wasConnected: boolean): boolean {
  if (state === null) {
    return false;
  }
  return CONNECT_IN_PROGRESS.has(state) || (wasConnected && state === 'connected');
}

function isDisconnectInProgress(state: VpnState | null): boolean {
  return state === 'connected' || state === 'disconnecting';
}

function formatProgress(progress: number): string {
  return String(Math.round(progress * 100) / 100);
}

function delay(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}
