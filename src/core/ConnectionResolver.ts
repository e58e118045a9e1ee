import { DEFAULT_OPEN_TIMEOUT_MS, DEFAULT_TCP_PORT } from './constants';
import {
  ConnectionFailedError,
  InvalidConnectionKindError,
  SerialPortNotFoundError,
  TcpHostMissingError,
  errorMessage,
  isMeshError,
} from './errors';
import { KeyedMutex } from './KeyedMutex';
import { isRecord } from './optionalTree';
import { PortEnumerator } from './PortEnumerator';
import { RadioClient, RadioClientFactory } from './radio/RadioClient';
import { ConnectionSpec, ResolvedTarget, UsbPortInfo } from '../types/mesh';

export interface ResolvedConnection {
  target: ResolvedTarget;
  usb?: UsbPortInfo;
}

export interface TransportHandle extends ResolvedConnection {
  client: RadioClient;
}

export interface ConnectionResolverOptions {
  ports: PortEnumerator;
  clients: RadioClientFactory;
  openTimeoutMs?: number;
  mutex?: KeyedMutex;
}

export function transportKey(target: ResolvedTarget): string {
  return target.kind === 'serial' ? `serial:${target.serialPort}` : `tcp:${target.tcpHost}:${target.tcpPort}`;
}

/**
 * 从持久化配置构造 ConnectionSpec；未知 kind 抛 InvalidConnectionKind。
 */
export function parseConnectionSpec(raw: unknown): ConnectionSpec {
  const obj = isRecord(raw) ? raw : {};
  const kind = typeof obj.kind === 'string' ? obj.kind : String(obj.kind);
  if (kind === 'serial') {
    const serialPort = typeof obj.serialPort === 'string' && obj.serialPort.trim() ? obj.serialPort.trim() : 'auto';
    return { kind: 'serial', serialPort };
  }
  if (kind === 'tcp') {
    const tcpHost = typeof obj.tcpHost === 'string' ? obj.tcpHost.trim() : '';
    const port = Number(obj.tcpPort);
    if (Number.isInteger(port) && port > 0 && port <= 65535) return { kind: 'tcp', tcpHost, tcpPort: port };
    return { kind: 'tcp', tcpHost };
  }
  throw new InvalidConnectionKindError(kind);
}

export class ConnectionResolver {
  private ports: PortEnumerator;
  private clients: RadioClientFactory;
  private openTimeoutMs: number;
  private mutex: KeyedMutex;

  constructor(opts: ConnectionResolverOptions) {
    this.ports = opts.ports;
    this.clients = opts.clients;
    this.openTimeoutMs = Math.max(100, opts.openTimeoutMs ?? DEFAULT_OPEN_TIMEOUT_MS);
    this.mutex = opts.mutex ?? new KeyedMutex();
  }

  /**
   * 把连接配置解析成具体的串口路径或 TCP 地址，不打开连接。
   */
  public async resolve(spec: ConnectionSpec): Promise<ResolvedConnection> {
    switch (spec.kind) {
      case 'serial': {
        const usb = await this.ports.findPort(spec.serialPort);
        if (!usb) throw new SerialPortNotFoundError(spec.serialPort);
        return { target: { kind: 'serial', serialPort: usb.device }, usb };
      }
      case 'tcp': {
        const host = spec.tcpHost.trim();
        if (!host) throw new TcpHostMissingError();
        return { target: { kind: 'tcp', tcpHost: host, tcpPort: spec.tcpPort || DEFAULT_TCP_PORT } };
      }
      default:
        throw new InvalidConnectionKindError(kindOf(spec));
    }
  }

  /**
   * Resolve and open without taking the per-connection lock. The caller owns
   * the handle and must close it; prefer `withTransport`.
   */
  public async openTransport(spec: ConnectionSpec): Promise<TransportHandle> {
    return this.startOpen(await this.resolve(spec)).handle;
  }

  /**
   * resolve -> 加锁 -> open -> fn -> close（无论成功失败都只关闭一次）。
   * 打开超时立即拒绝调用方，但锁保持到底层打开结束并关闭为止。
   */
  public async withTransport<T>(spec: ConnectionSpec, fn: (handle: TransportHandle) => Promise<T>): Promise<T> {
    const resolved = await this.resolve(spec);
    return new Promise<T>((resolve, reject) => {
      const session = this.mutex.runExclusive(transportKey(resolved.target), async () => {
        const opening = this.startOpen(resolved);
        let handle: TransportHandle;
        try {
          handle = await opening.handle;
        } catch (e) {
          reject(e);
          await opening.settled;
          return;
        }
        try {
          const value = await fn(handle);
          await this.closeQuietly(handle.client, handle.target);
          resolve(value);
        } catch (e) {
          await this.closeQuietly(handle.client, handle.target);
          reject(e);
        }
      });
      void session.catch(reject);
    });
  }

  public isBusy(target: ResolvedTarget): boolean {
    return this.mutex.isLocked(transportKey(target));
  }

  /**
   * `handle` 在超时时拒绝；`settled` 在底层打开结束（超时后到达的连接已关闭）时完成。
   */
  private startOpen(resolved: ResolvedConnection): { handle: Promise<TransportHandle>; settled: Promise<void> } {
    const { target } = resolved;
    const timeoutMs = this.openTimeoutMs;
    const opening =
      target.kind === 'serial'
        ? this.clients.openSerial(target.serialPort, { timeoutMs })
        : this.clients.openTcp(target.tcpHost, target.tcpPort, { timeoutMs });

    let timedOut = false;
    const settled = opening.then(
      async (late) => {
        // 超时后才打开成功的连接直接丢弃
        if (timedOut) await this.closeQuietly(late, target);
      },
      (e: unknown) => {
        if (timedOut) console.debug(`[ConnectionResolver] Late open of ${transportKey(target)} failed: ${errorMessage(e)}`);
      }
    );

    const client = new Promise<RadioClient>((resolve, reject) => {
      const timer = setTimeout(() => {
        timedOut = true;
        reject(new ConnectionFailedError(`Timed out after ${timeoutMs}ms opening ${transportKey(target)}`));
      }, timeoutMs);

      void opening.then(
        (c) => {
          if (timedOut) return;
          clearTimeout(timer);
          resolve(c);
        },
        (e: unknown) => {
          if (timedOut) return;
          clearTimeout(timer);
          reject(isMeshError(e) ? e : new ConnectionFailedError(errorMessage(e), e));
        }
      );
    });

    return { handle: client.then((c) => ({ ...resolved, client: c })), settled };
  }

  private async closeQuietly(client: RadioClient, target: ResolvedTarget): Promise<void> {
    try {
      await client.close();
    } catch (e) {
      console.warn(`[ConnectionResolver] Error closing ${transportKey(target)}: ${errorMessage(e)}`);
    }
  }
}

function kindOf(spec: unknown): string {
  return isRecord(spec) ? String(spec.kind) : String(spec);
}
