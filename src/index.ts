import express from 'express';
import http from 'http';
import path from 'path';
import cors from 'cors';
import { createApp } from './api/app';
import { createWsServer } from './api/ws';
import { loadServerConfig } from './config';
import { CommandExecutor } from './core/CommandExecutor';
import { ConnectionResolver } from './core/ConnectionResolver';
import { DeviceReader } from './core/DeviceReader';
import { EInstanceLocked, ESerialBusy, errnoCode, errorMessage } from './core/errors';
import { InstanceLock, acquireInstanceLock } from './core/instanceLock';
import { NetworkDiscoverer } from './core/NetworkDiscoverer';
import { PortEnumerator } from './core/PortEnumerator';
import { createDemoRadioFactory } from './core/radio/FakeRadioClient';
import { MeshtasticClientFactory } from './core/radio/MeshtasticClientFactory';
import { RadioClientFactory } from './core/radio/RadioClient';
import { MeshRegistry } from './services/MeshRegistry';
import { ConnectionConfigStore } from './storage/ConnectionConfigStore';

async function main() {
  const config = loadServerConfig();
  const lockFilePath = path.join(config.dataDir, 'server.lock.json');
  let lock: InstanceLock | null = null;
  try {
    lock = acquireInstanceLock(lockFilePath);
  } catch (e) {
    if (e instanceof EInstanceLocked) {
      throw new ESerialBusy('Another server instance is already running', {
        lockedPid: e.lockedPid,
        lockFilePath: e.lockFilePath,
      });
    }
    throw e;
  }

  const clients: RadioClientFactory = config.fakeRadio ? createDemoRadioFactory() : new MeshtasticClientFactory();
  const ports = new PortEnumerator(
    config.fakeRadio ? { lister: async () => [] } : {}
  );
  const resolver = new ConnectionResolver({ ports, clients, openTimeoutMs: config.openTimeoutMs });
  const reader = new DeviceReader(resolver);
  const registry = new MeshRegistry({
    reader,
    executor: new CommandExecutor(resolver),
    setupRetryMs: config.setupRetryMs,
  });
  const discoverer = new NetworkDiscoverer({ reader });
  const store = new ConnectionConfigStore(config.dataDir);

  // 演示模式：没有配置时自动加一个内存电台
  if (config.fakeRadio && (await store.list()).length === 0) {
    await store.upsert({
      id: 'demo',
      title: 'Demo radio',
      connection: { kind: 'tcp', tcpHost: '127.0.0.1', tcpPort: 4403 },
      scanIntervalSec: config.defaultScanIntervalSec,
    });
  }

  const app = createApp({ ports, discoverer, registry, store, defaultScanIntervalSec: config.defaultScanIntervalSec });

  const mainApp = express();
  mainApp.use(cors());
  mainApp.get('/health', (_req, res) => {
    res.status(200).json({ ok: true, pid: process.pid, port: config.port });
  });
  mainApp.use('/api', app);

  const server = http.createServer(mainApp);
  const wss = createWsServer(server, registry);

  const releaseLock = () => {
    try {
      lock?.release();
    } catch (e) {
      console.warn(`Failed to release instance lock: ${errorMessage(e)}`);
    }
  };

  server.on('error', (err) => {
    registry.shutdown();
    releaseLock();
    if (errnoCode(err) === 'EADDRINUSE') {
      console.error(`PORT_IN_USE:${config.port}`);
      process.exit(110);
    }
    console.error(err);
    process.exit(1);
  });

  server.listen(config.port, () => {
    console.log(`Server is running on http://localhost:${config.port}`);
    console.log(`WebSocket server is running on ws://localhost:${config.port}/ws`);
  });

  const entries = await store.list();
  console.log(`Loading ${entries.length} mesh radio connection(s) from ${store.getFilePath()}`);
  await registry.loadEntries(entries);

  // 优雅退出
  let exiting = false;
  function gracefulExit(code: number) {
    if (exiting) return;
    exiting = true;
    console.log('Stopping server...');
    registry.shutdown();
    wss.close();
    releaseLock();
    server.close(() => {
      console.log('Server stopped');
      process.exit(code);
    });
  }

  process.on('SIGINT', () => gracefulExit(0));
  process.on('SIGTERM', () => gracefulExit(0));
}

main().catch((e: unknown) => {
  if (e instanceof ESerialBusy) {
    const pidPart = e.lockedPid !== undefined ? ` pid=${e.lockedPid}` : '';
    console.error(`ESerialBusy:${pidPart} ${e.message}`);
    process.exit(110);
  }
  console.error(e);
  process.exit(1);
});
