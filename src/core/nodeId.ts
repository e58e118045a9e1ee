import { InvalidArgumentError } from './errors';

export const BROADCAST_NUM = 0xffffffff;

export type NodeTarget = number | 'broadcast';

export function formatNodeId(num: number): string {
  return `!${(num >>> 0).toString(16).padStart(8, '0')}`;
}

/**
 * 解析发送目标：`!a1b2c3d4`、十进制节点号、`^all` 或 `broadcast`。
 */
export function parseNodeTarget(target: string): NodeTarget {
  const s = target.trim();
  const lower = s.toLowerCase();
  if (lower === '^all' || lower === 'broadcast' || lower === '!ffffffff') return 'broadcast';
  if (/^![0-9a-f]{1,8}$/.test(lower)) return parseInt(lower.slice(1), 16);
  if (/^\d+$/.test(s)) {
    const n = Number(s);
    if (n <= BROADCAST_NUM) return n === BROADCAST_NUM ? 'broadcast' : n;
  }
  throw new InvalidArgumentError(`Invalid target node: ${target}`);
}
