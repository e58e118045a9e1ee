/**
 * Node state as exposed by an open radio client. Each block is weakly typed
 * (protocol messages rendered as plain objects with snake_case keys) and may
 * be missing entirely.
 */
export interface RadioState {
  /** 本机设备信息块 */
  readonly myInfo?: unknown;
  /** 无线电偏好设置块（region / role） */
  readonly radioConfig?: unknown;
  /** 已知节点：节点号或节点 ID -> 节点信息 */
  readonly nodes?: unknown;
  /** 信道块列表 */
  readonly channels?: unknown;
  /** 最近收到的一条报文 */
  readonly lastReceived?: unknown;
}

/**
 * An open session with one radio. Command methods are optional capabilities;
 * callers check for them before use.
 */
export interface RadioClient extends RadioState {
  sendText?(text: string, destinationId?: string): Promise<void>;
  reboot?(): Promise<void>;
  setPrimaryChannel?(name: string): Promise<void>;
  close(): Promise<void>;
}

export interface RadioOpenOptions {
  timeoutMs: number;
}

export interface RadioClientFactory {
  openSerial(devicePath: string, opts: RadioOpenOptions): Promise<RadioClient>;
  openTcp(host: string, port: number, opts: RadioOpenOptions): Promise<RadioClient>;
}
