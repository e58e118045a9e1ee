import { RadioClient, RadioClientFactory, RadioOpenOptions, RadioState } from './RadioClient';

export interface FakeRadioCapabilities {
  sendText?: boolean;
  reboot?: boolean;
  setPrimaryChannel?: boolean;
}

export interface SentText {
  text: string;
  destinationId?: string;
}

/**
 * In-memory radio. Holds a mutable state tree and records every command and
 * close call so callers can assert on them.
 */
export class FakeRadioClient implements RadioClient {
  state: RadioState;
  closeCount = 0;
  rebootCount = 0;
  sent: SentText[] = [];
  primaryChannels: string[] = [];
  failClose?: Error;
  failCommand?: Error;

  sendText?: (text: string, destinationId?: string) => Promise<void>;
  reboot?: () => Promise<void>;
  setPrimaryChannel?: (name: string) => Promise<void>;

  constructor(state: RadioState = {}, capabilities: FakeRadioCapabilities = { sendText: true, reboot: true, setPrimaryChannel: true }) {
    this.state = state;
    if (capabilities.sendText) {
      this.sendText = async (text, destinationId) => {
        this.throwIfFailing();
        this.sent.push(destinationId === undefined ? { text } : { text, destinationId });
      };
    }
    if (capabilities.reboot) {
      this.reboot = async () => {
        this.throwIfFailing();
        this.rebootCount += 1;
      };
    }
    if (capabilities.setPrimaryChannel) {
      this.setPrimaryChannel = async (name) => {
        this.throwIfFailing();
        this.primaryChannels.push(name);
      };
    }
  }

  get myInfo(): unknown {
    return this.state.myInfo;
  }

  get radioConfig(): unknown {
    return this.state.radioConfig;
  }

  get nodes(): unknown {
    return this.state.nodes;
  }

  get channels(): unknown {
    return this.state.channels;
  }

  get lastReceived(): unknown {
    return this.state.lastReceived;
  }

  async close(): Promise<void> {
    this.closeCount += 1;
    if (this.failClose) throw this.failClose;
  }

  private throwIfFailing() {
    if (this.failCommand) throw this.failCommand;
  }
}

export interface FakeOpenCall {
  kind: 'serial' | 'tcp';
  address: string;
  timeoutMs: number;
}

/**
 * Factory over a fixed table of fake radios keyed by `serial:<path>` or
 * `tcp:<host>:<port>`. Unknown addresses fail like a refused connection.
 */
export class FakeRadioClientFactory implements RadioClientFactory {
  readonly clients = new Map<string, FakeRadioClient>();
  readonly opened: FakeOpenCall[] = [];
  openError?: Error;
  openDelayMs = 0;
  // 同时进行中的 open 数及其峰值
  pendingOpens = 0;
  maxPendingOpens = 0;

  constructor(clients?: Record<string, FakeRadioClient>) {
    for (const [key, client] of Object.entries(clients ?? {})) this.clients.set(key, client);
  }

  async openSerial(devicePath: string, opts: RadioOpenOptions): Promise<RadioClient> {
    return this.open('serial', devicePath, `serial:${devicePath}`, opts);
  }

  async openTcp(host: string, port: number, opts: RadioOpenOptions): Promise<RadioClient> {
    return this.open('tcp', `${host}:${port}`, `tcp:${host}:${port}`, opts);
  }

  private async open(kind: 'serial' | 'tcp', address: string, key: string, opts: RadioOpenOptions): Promise<RadioClient> {
    this.opened.push({ kind, address, timeoutMs: opts.timeoutMs });
    this.pendingOpens += 1;
    this.maxPendingOpens = Math.max(this.maxPendingOpens, this.pendingOpens);
    try {
      if (this.openDelayMs > 0) await new Promise((r) => setTimeout(r, this.openDelayMs));
      if (this.openError) throw this.openError;
      const client = this.clients.get(key);
      if (!client) throw new Error(`connect ECONNREFUSED ${address}`);
      return client;
    } finally {
      this.pendingOpens -= 1;
    }
  }
}

/** Small demo mesh used when the server runs with MESH_FAKE_RADIO=1. */
export function createDemoRadioFactory(): FakeRadioClientFactory {
  const radio = new FakeRadioClient({
    myInfo: {
      firmware_version: '2.5.6.demo',
      my_node_num: 2712847316,
      my_node_id: '!a1b2c3d4',
      hw_model: 'TBEAM',
      region: 'EU_868',
      node_info: { user: { long_name: 'Demo Base', short_name: 'DB' } },
      node_metrics: { rssi: -71, snr: 9.5, air_util_tx: 1.8 },
      device_metrics: { battery_level: 97, voltage: 4.12, temperature: 23.5, uptime: 3600 },
    },
    radioConfig: { preferences: { role: 'ROUTER' } },
    nodes: {
      '2712847316': { num: 2712847316 },
      '3841374136': { num: 3841374136, rx_rssi: -98, rx_snr: 2.25 },
    },
    channels: [{ settings: { name: 'LongFast' } }, { settings: { name: 'Admin' } }],
    lastReceived: {
      from: 3841374136,
      decoded: { text: 'comms check', portnum: 'TEXT_MESSAGE_APP', rx_time: 1700000000 },
    },
  });
  return new FakeRadioClientFactory({ 'tcp:127.0.0.1:4403': radio });
}
