import { formatNodeId } from './nodeId';
import { OptionalTree } from './optionalTree';
import { RadioState } from './radio/RadioClient';
import { NodeTelemetry } from '../types/mesh';

/**
 * Canonical field -> accepted source keys, most preferred first. Firmware
 * releases renamed several of these; a new spelling is one more entry here.
 */
export const FIELD_ALIASES = {
  firmware: ['firmware_version'],
  nodeNum: ['my_node_num'],
  hwModel: ['hw_model'],
  canonicalNodeId: ['my_node_id'],
  nodeName: ['long_name', 'short_name'],
  region: ['region'],
  role: ['role'],
  bleBlock: ['ble', 'ble_info'],
  bleMac: ['macaddr', 'address', 'mac'],
  bleName: ['name', 'hostname'],
  rssi: ['rssi', 'rx_rssi', 'last_heard_rssi'],
  snr: ['snr', 'rx_snr', 'last_heard_snr'],
  airtimeUtilization: ['air_util_tx', 'air_util', 'airtime'],
  peerRssi: ['rx_rssi'],
  peerSnr: ['rx_snr'],
  batteryLevel: ['battery_level'],
  batteryVoltage: ['voltage', 'battery_voltage'],
  temperature: ['temperature'],
  uptime: ['uptime', 'uptime_seconds'],
  lastMessage: ['text', 'payload', 'data'],
  lastSender: ['from', 'from_id'],
  lastGateway: ['gateway_id', 'rx_gateway'],
  lastMessageType: ['portnum', 'type'],
  lastMessageTime: ['rx_time', 'time'],
} as const satisfies Record<string, readonly string[]>;

// 发送者/网关可能是节点号，统一成 !xxxxxxxx
function nodeRef(tree: OptionalTree): string | undefined {
  const raw = tree.raw;
  if (typeof raw === 'number' && Number.isInteger(raw) && raw >= 0) return formatNodeId(raw);
  return tree.string();
}

function channelNames(channels: OptionalTree): string[] {
  const names: string[] = [];
  for (const ch of channels.items()) {
    const name = ch.path('settings', 'name').or(ch.get('name')).string();
    if (name) names.push(name);
  }
  return names;
}

/**
 * 从客户端状态提取扁平遥测记录。纯函数：同一输入总得到相同输出，
 * 缺失的块或字段只会让对应字段缺省，不会抛错。
 */
export function normalize(state: RadioState): NodeTelemetry {
  const a = FIELD_ALIASES;
  const info = OptionalTree.of(state.myInfo);
  const prefs = OptionalTree.of(state.radioConfig).get('preferences');
  const nodes = OptionalTree.of(state.nodes);
  const last = OptionalTree.of(state.lastReceived);
  const decoded = last.get('decoded');
  const nodeInfo = info.get('node_info');
  const user = nodeInfo.get('user');
  const metrics = info.get('node_metrics');
  const deviceMetrics = info.get('device_metrics');
  const ble = info.first(a.bleBlock);

  const t: NodeTelemetry = {};
  const put = <K extends keyof NodeTelemetry>(key: K, value: NodeTelemetry[K] | undefined) => {
    if (value !== undefined) t[key] = value;
  };

  put('firmware', info.first(a.firmware).string());
  put('nodeNum', info.first(a.nodeNum).number());
  put('hwModel', info.first(a.hwModel).string());
  put('canonicalNodeId', info.first(a.canonicalNodeId).string()?.toLowerCase());
  put('nodeName', user.first(a.nodeName).string());
  put('region', info.first(a.region).or(prefs.first(a.region)).string());
  put('role', prefs.first(a.role).or(nodeInfo.first(a.role)).string());
  put('routeTableSize', nodes.size());

  const channels = channelNames(OptionalTree.of(state.channels));
  if (channels.length > 0) {
    put('channels', channels);
    put('channel', channels[0]);
  }

  put('bleMac', ble.first(a.bleMac).string());
  put('bleName', ble.first(a.bleName).string());

  let rssi = metrics.first(a.rssi).number();
  let snr = metrics.first(a.snr).number();
  if (rssi === undefined || snr === undefined) {
    const self = selfNodeEntry(nodes, t.nodeNum, t.canonicalNodeId);
    rssi = rssi ?? self.first(a.peerRssi).number();
    snr = snr ?? self.first(a.peerSnr).number();
  }
  put('rssi', rssi);
  put('snr', snr);
  put('airtimeUtilization', metrics.first(a.airtimeUtilization).number());

  put('batteryLevel', deviceMetrics.first(a.batteryLevel).number());
  put('batteryVoltage', deviceMetrics.first(a.batteryVoltage).number());
  put('temperature', deviceMetrics.first(a.temperature).number());
  put('uptime', info.first(a.uptime).or(deviceMetrics.first(a.uptime)).number());

  put('lastMessage', decoded.first(a.lastMessage).string());
  put('lastSender', nodeRef(last.first(a.lastSender)));
  put('lastGateway', nodeRef(last.first(a.lastGateway)));
  put('lastMessageType', decoded.first(a.lastMessageType).or(last.first(a.lastMessageType)).string());
  put('lastMessageTime', decoded.first(a.lastMessageTime).or(last.first(a.lastMessageTime)).number());

  return t;
}

function selfNodeEntry(nodes: OptionalTree, nodeNum: number | undefined, nodeId: string | undefined): OptionalTree {
  const byNum = nodeNum === undefined ? undefined : nodes.get(nodeNum);
  if (byNum && !byNum.isAbsent()) return byNum;
  return nodeId === undefined ? OptionalTree.of(undefined) : nodes.get(nodeId);
}
