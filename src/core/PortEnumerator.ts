import { AUTODETECT_SERIAL, IGNORED_PORT_PREFIXES, RADIO_USB_IDS, UsbIdPair } from './constants';
import { SerialBackendUnavailableError, isMeshError } from './errors';
import { UsbPortInfo } from '../types/mesh';

type SerialPortModule = typeof import('serialport');

// SerialPort.list() 返回的字段；friendlyName 仅 Windows 提供
export interface RawSerialPort {
  path: string;
  manufacturer?: string;
  serialNumber?: string;
  pnpId?: string;
  locationId?: string;
  productId?: string;
  vendorId?: string;
  friendlyName?: string;
}

export type SerialPortLister = () => Promise<RawSerialPort[]>;

export interface PortEnumeratorOptions {
  ignoredPrefixes?: readonly string[];
  allowList?: readonly UsbIdPair[];
  lister?: SerialPortLister;
}

function loadSerialBackend(): SerialPortModule {
  try {
    return require('serialport') as SerialPortModule;
  } catch (e) {
    throw new SerialBackendUnavailableError(e);
  }
}

const systemLister: SerialPortLister = () => loadSerialBackend().SerialPort.list();

/**
 * 解析 USB VID/PID（'10c4'、'0x10C4'）为 16 位无符号整数。
 */
export function parseUsbId(value: string | undefined): number | undefined {
  if (!value) return undefined;
  const cleaned = value.trim().replace(/^0x/i, '');
  if (!/^[0-9a-f]{1,4}$/i.test(cleaned)) return undefined;
  return parseInt(cleaned, 16);
}

export class PortEnumerator {
  private ignoredPrefixes: readonly string[];
  private allowList: ReadonlySet<string>;
  private lister: SerialPortLister;

  constructor(opts: PortEnumeratorOptions = {}) {
    this.ignoredPrefixes = opts.ignoredPrefixes ?? IGNORED_PORT_PREFIXES;
    this.allowList = new Set((opts.allowList ?? RADIO_USB_IDS).map(({ vid, pid }) => usbKey(vid, pid)));
    this.lister = opts.lister ?? systemLister;
  }

  /**
   * 列出识别为电台的串口。每次调用都重新枚举。
   */
  public async listPorts(): Promise<UsbPortInfo[]> {
    let raw: RawSerialPort[];
    try {
      raw = await this.lister();
    } catch (e) {
      if (isMeshError(e)) throw e;
      console.error('[PortEnumerator] Failed to list ports:', e);
      throw new SerialBackendUnavailableError(e);
    }

    const ports: UsbPortInfo[] = [];
    for (const p of raw) {
      const info = toUsbPortInfo(p);
      if (this.shouldIgnore(info)) continue;
      // 必须同时有 VID 与 PID 并且在白名单里
      if (info.vid === undefined || info.pid === undefined) continue;
      if (!this.allowList.has(usbKey(info.vid, info.pid))) continue;
      ports.push(info);
    }
    return ports;
  }

  /**
   * 'auto' 取第一个电台串口；指定路径时返回匹配项或 undefined。
   */
  public async findPort(serialPort: string): Promise<UsbPortInfo | undefined> {
    const ports = await this.listPorts();
    if (serialPort === AUTODETECT_SERIAL) return ports[0];
    return ports.find((p) => p.device === serialPort);
  }

  private shouldIgnore(info: UsbPortInfo): boolean {
    if (this.ignoredPrefixes.some((prefix) => info.device.startsWith(prefix))) return true;
    return !!info.description && info.description.toLowerCase().includes('virtualbox');
  }
}

function usbKey(vid: number, pid: number): string {
  return `${vid}:${pid}`;
}

export function toUsbPortInfo(p: RawSerialPort): UsbPortInfo {
  const info: UsbPortInfo = { device: p.path };
  if (p.friendlyName) info.description = p.friendlyName;
  if (p.pnpId) info.hwid = p.pnpId;
  if (p.manufacturer) info.manufacturer = p.manufacturer;
  if (p.serialNumber) info.serialNumber = p.serialNumber;
  if (p.locationId) info.location = p.locationId;
  const vid = parseUsbId(p.vendorId);
  const pid = parseUsbId(p.productId);
  if (vid !== undefined) info.vid = vid;
  if (pid !== undefined) info.pid = pid;
  return info;
}
