import { DEFAULT_DISCOVERY_TIMEOUT_MS, DEFAULT_TCP_PORT } from '../core/constants';
import { ConnectionResolver } from '../core/ConnectionResolver';
import { candidateToJSON, usbPortToJSON } from '../core/device';
import { DeviceReader } from '../core/DeviceReader';
import { errorMessage, isMeshError } from '../core/errors';
import { NetworkDiscoverer } from '../core/NetworkDiscoverer';
import { PortEnumerator } from '../core/PortEnumerator';
import { MeshtasticClientFactory } from '../core/radio/MeshtasticClientFactory';

export interface DiscoverArgs {
  subnet?: string;
  port: number;
  timeoutMs: number;
  concurrency: number;
  ports: boolean;
}

export function parseArgs(argv: string[]): Record<string, string | boolean> {
  const out: Record<string, string | boolean> = {};
  for (let i = 2; i < argv.length; i++) {
    const a = argv[i];
    if (!a.startsWith('--')) continue;
    const key = a.slice(2);
    const next = argv[i + 1];
    if (!next || next.startsWith('--')) {
      out[key] = true;
    } else {
      out[key] = next;
      i += 1;
    }
  }
  return out;
}

function intArg(v: string | boolean | undefined, fallback: number): number {
  if (typeof v !== 'string') return fallback;
  const n = Number(v);
  return Number.isInteger(n) && n > 0 ? n : fallback;
}

export function toDiscoverArgs(raw: Record<string, string | boolean>): DiscoverArgs {
  return {
    subnet: typeof raw.subnet === 'string' ? raw.subnet : undefined,
    port: intArg(raw.port, DEFAULT_TCP_PORT),
    timeoutMs: intArg(raw.timeout, DEFAULT_DISCOVERY_TIMEOUT_MS),
    concurrency: intArg(raw.concurrency, 1),
    ports: raw.ports === true,
  };
}

async function main() {
  const args = toDiscoverArgs(parseArgs(process.argv));
  const ports = new PortEnumerator();
  const resolver = new ConnectionResolver({ ports, clients: new MeshtasticClientFactory() });

  if (args.ports) {
    try {
      const list = await ports.listPorts();
      process.stdout.write(`${JSON.stringify({ serial: list.map(usbPortToJSON) }, null, 2)}\n`);
    } catch (e) {
      console.error(`Serial enumeration failed: ${errorMessage(e)}`);
    }
  }

  const discoverer = new NetworkDiscoverer({ reader: new DeviceReader(resolver) });
  const found = await discoverer.discover({
    subnet: args.subnet,
    port: args.port,
    timeoutMs: args.timeoutMs,
    concurrency: args.concurrency,
  });
  process.stdout.write(`${JSON.stringify({ tcp: found.map(candidateToJSON) }, null, 2)}\n`);
}

if (require.main === module) {
  main().catch((e: unknown) => {
    console.error(isMeshError(e) ? `${e.code}: ${e.message}` : e);
    process.exit(1);
  });
}
