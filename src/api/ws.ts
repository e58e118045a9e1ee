import { WebSocketServer, WebSocket } from 'ws';
import { Server } from 'http';
import { JsonObject, snapshotToJSON } from '../core/device';
import { errorMessage } from '../core/errors';
import { MeshRegistry } from '../services/MeshRegistry';
import { DeviceSnapshot } from '../types/mesh';

type SnapshotSource = Pick<MeshRegistry, 'on' | 'off' | 'getSnapshots'>;

function snapshotMessage(entryId: string, snapshot: DeviceSnapshot): JsonObject {
  return { type: 'mesh:snapshot', entryId, data: snapshotToJSON(snapshot) };
}

export function createWsServer(server: Server, registry: SnapshotSource) {
  const wss = new WebSocketServer({ server, path: '/ws' });

  // 广播函数
  const broadcast = (data: JsonObject) => {
    const msg = JSON.stringify(data);
    wss.clients.forEach((client) => {
      if (client.readyState === WebSocket.OPEN) {
        client.send(msg);
      }
    });
  };

  const onSnapshot = (entryId: string, snapshot: DeviceSnapshot) => {
    broadcast(snapshotMessage(entryId, snapshot));
  };
  registry.on('snapshot', onSnapshot);

  wss.on('connection', (ws) => {
    console.log('[WS] Client connected');
    // 新客户端先拿到当前全部快照
    for (const s of registry.getSnapshots()) {
      if (s.snapshot) ws.send(JSON.stringify(snapshotMessage(s.entryId, s.snapshot)));
    }

    ws.on('message', (message) => {
      try {
        const parsed: unknown = JSON.parse(message.toString());
        if (typeof parsed === 'object' && parsed !== null && 'type' in parsed && parsed.type === 'ping') {
          ws.send(JSON.stringify({ type: 'pong' }));
        }
      } catch (e) {
        console.error(`[WS] Invalid message: ${errorMessage(e)}`);
      }
    });

    ws.on('close', () => {
      console.log('[WS] Client disconnected');
    });
  });

  wss.on('close', () => {
    registry.off('snapshot', onSnapshot);
  });

  return wss;
}
