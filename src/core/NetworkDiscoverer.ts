import dgram from 'dgram';
import dns from 'dns';
import net from 'net';
import os from 'os';
import { candidateTitle } from './device';
import { DEFAULT_DISCOVERY_TIMEOUT_MS, DEFAULT_TCP_PORT } from './constants';
import { DeviceReader } from './DeviceReader';
import { InvalidArgumentError, errorMessage, isMeshError } from './errors';
import { DiscoveredTcpCandidate } from '../types/mesh';

export type PortProbe = (host: string, port: number, timeoutMs: number) => Promise<boolean>;

export interface DiscoverOptions {
  port?: number;
  timeoutMs?: number;
  subnet?: string;
  concurrency?: number;
}

export interface NetworkDiscovererOptions {
  reader: Pick<DeviceReader, 'read'>;
  probe?: PortProbe;
  localAddress?: () => Promise<string>;
}

// 超过 /16 的网段不扫描
export const MIN_DISCOVERY_PREFIX = 16;

export function parseIpv4(s: string): number | undefined {
  const parts = s.trim().split('.');
  if (parts.length !== 4) return undefined;
  let n = 0;
  for (const part of parts) {
    if (!/^\d{1,3}$/.test(part)) return undefined;
    const octet = Number(part);
    if (octet > 255) return undefined;
    n = n * 256 + octet;
  }
  return n;
}

export function formatIpv4(n: number): string {
  return [n >>> 24, (n >>> 16) & 0xff, (n >>> 8) & 0xff, n & 0xff].join('.');
}

/**
 * CIDR 内全部主机地址（/31、/32 以外去掉网络地址与广播地址）。
 * 格式非法返回 undefined。
 */
export function enumerateHosts(cidr: string): string[] | undefined {
  const [addr, prefixText, ...rest] = cidr.trim().split('/');
  if (rest.length > 0) return undefined;
  const ip = parseIpv4(addr);
  const prefix = prefixText === undefined ? 32 : /^\d{1,2}$/.test(prefixText) ? Number(prefixText) : NaN;
  if (ip === undefined || !Number.isInteger(prefix) || prefix < 0 || prefix > 32) return undefined;

  const mask = prefix === 0 ? 0 : (0xffffffff << (32 - prefix)) >>> 0;
  const network = (ip & mask) >>> 0;
  const size = 2 ** (32 - prefix);
  const first = prefix >= 31 ? network : network + 1;
  const last = prefix >= 31 ? network + size - 1 : network + size - 2;

  const hosts: string[] = [];
  for (let n = first; n <= last; n++) hosts.push(formatIpv4(n));
  return hosts;
}

export function isSkippedHost(host: string): boolean {
  return host === '0.0.0.0' || host.startsWith('127.');
}

export const isPortOpen: PortProbe = (host, port, timeoutMs) =>
  new Promise<boolean>((resolve) => {
    const socket = new net.Socket();
    let done = false;
    const finish = (open: boolean) => {
      if (done) return;
      done = true;
      socket.destroy();
      resolve(open);
    };
    socket.setTimeout(Math.max(1, timeoutMs));
    socket.once('timeout', () => finish(false));
    // 连不上是常态，静默跳过
    socket.once('error', () => finish(false));
    socket.connect(port, host, () => finish(true));
  });

function udpLocalAddress(): Promise<string | undefined> {
  return new Promise((resolve) => {
    const sock = dgram.createSocket('udp4');
    let done = false;
    const finish = (addr?: string) => {
      if (done) return;
      done = true;
      sock.close();
      resolve(addr);
    };
    sock.once('error', () => finish(undefined));
    // UDP connect 不发包，只用来选出出口网卡地址
    sock.connect(80, '8.8.8.8', () => finish(sock.address().address));
  });
}

export async function getLocalIpv4(): Promise<string> {
  try {
    const viaUdp = await udpLocalAddress();
    if (viaUdp && parseIpv4(viaUdp) !== undefined) return viaUdp;
  } catch (e) {
    console.debug(`[NetworkDiscoverer] UDP address probe failed: ${errorMessage(e)}`);
  }
  try {
    const { address } = await dns.promises.lookup(os.hostname(), { family: 4 });
    return address;
  } catch (e) {
    console.debug(`[NetworkDiscoverer] Hostname lookup failed: ${errorMessage(e)}`);
  }
  return '127.0.0.1';
}

async function mapWithConcurrency<T, R>(items: T[], concurrency: number, fn: (item: T) => Promise<R>): Promise<R[]> {
  const results: R[] = new Array(items.length);
  let next = 0;
  const worker = async () => {
    while (next < items.length) {
      const idx = next++;
      results[idx] = await fn(items[idx]);
    }
  };
  await Promise.all(Array.from({ length: Math.min(Math.max(1, concurrency), items.length) }, worker));
  return results;
}

export class NetworkDiscoverer {
  private reader: Pick<DeviceReader, 'read'>;
  private probe: PortProbe;
  private localAddress: () => Promise<string>;

  constructor(opts: NetworkDiscovererOptions) {
    this.reader = opts.reader;
    this.probe = opts.probe ?? isPortOpen;
    this.localAddress = opts.localAddress ?? getLocalIpv4;
  }

  public async discoveryHosts(subnet?: string): Promise<string[]> {
    const cidr = subnet?.trim() ? subnet.trim() : `${await this.localAddress()}/24`;
    const prefix = Number(cidr.split('/')[1] ?? 32);
    if (prefix < MIN_DISCOVERY_PREFIX) {
      throw new InvalidArgumentError(`Subnet ${cidr} is wider than /${MIN_DISCOVERY_PREFIX}; narrow it to scan`);
    }
    const hosts = enumerateHosts(cidr);
    if (!hosts) {
      console.warn(`[NetworkDiscoverer] Invalid subnet '${cidr}' provided for discovery`);
      return [];
    }
    return hosts.filter((h) => !isSkippedHost(h));
  }

  /**
   * 探测网段内开放电台 TCP 端口的主机，并读取其遥测。单个主机失败只会被跳过。
   */
  public async discover(opts: DiscoverOptions = {}): Promise<DiscoveredTcpCandidate[]> {
    const port = opts.port ?? DEFAULT_TCP_PORT;
    const timeoutMs = opts.timeoutMs ?? DEFAULT_DISCOVERY_TIMEOUT_MS;
    const hosts = await this.discoveryHosts(opts.subnet);
    console.log(`[NetworkDiscoverer] Probing ${hosts.length} hosts on port ${port}`);

    const results = await mapWithConcurrency(hosts, opts.concurrency ?? 1, (host) => this.probeHost(host, port, timeoutMs));
    return results.filter((c): c is DiscoveredTcpCandidate => c !== undefined);
  }

  private async probeHost(host: string, port: number, timeoutMs: number): Promise<DiscoveredTcpCandidate | undefined> {
    try {
      if (!(await this.probe(host, port, timeoutMs))) return undefined;
      const { telemetry } = await this.reader.read({ kind: 'tcp', tcpHost: host, tcpPort: port });
      return { host, port, telemetry, title: candidateTitle(host, port, telemetry) };
    } catch (e) {
      if (!isMeshError(e)) console.debug(`[NetworkDiscoverer] Unexpected error while probing ${host}:${port}: ${errorMessage(e)}`);
      return undefined;
    }
  }
}
