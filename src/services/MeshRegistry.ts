import { EventEmitter } from 'events';
import { CommandExecutor } from '../core/CommandExecutor';
import { DeviceReader } from '../core/DeviceReader';
import {
  AmbiguousEntryError,
  EntryNotFoundError,
  InvalidArgumentError,
  NoEntriesError,
  NotReadyError,
  errorMessage,
} from '../core/errors';
import { isRecord } from '../core/optionalTree';
import { ConnectionEntry, DeviceSnapshot } from '../types/mesh';
import { PollScheduler } from './PollScheduler';

export const COMMAND_NAMES = ['send_message', 'reboot', 'set_channel', 'refresh'] as const;
export type CommandName = (typeof COMMAND_NAMES)[number];

export interface CommandResult {
  entryIds: string[];
  snapshots?: DeviceSnapshot[];
}

type CommandHandler = (payload: Record<string, unknown>) => Promise<CommandResult>;

export interface EntrySnapshot {
  entryId: string;
  title: string;
  snapshot: DeviceSnapshot | null;
}

export interface MeshRegistryOptions {
  reader: Pick<DeviceReader, 'read'>;
  executor: Pick<CommandExecutor, 'sendMessage' | 'reboot' | 'setChannel'>;
  setupRetryMs?: number;
}

const MAX_SETUP_RETRY_MS = 5 * 60 * 1000;

export function isCommandName(name: string): name is CommandName {
  return COMMAND_NAMES.some((n) => n === name);
}

function optionalString(payload: Record<string, unknown>, key: string): string | undefined {
  const v = payload[key];
  if (v === undefined || v === null || v === '') return undefined;
  if (typeof v !== 'string') throw new InvalidArgumentError(`${key} must be a string`);
  return v;
}

function requiredString(payload: Record<string, unknown>, key: string): string {
  const v = payload[key];
  if (typeof v !== 'string') throw new InvalidArgumentError(`${key} is required`);
  return v;
}

/**
 * 进程级注册表：每个连接条目一个 PollScheduler，命令表只注册一次。
 */
export class MeshRegistry extends EventEmitter {
  private reader: Pick<DeviceReader, 'read'>;
  private executor: Pick<CommandExecutor, 'sendMessage' | 'reboot' | 'setChannel'>;
  private setupRetryMs: number;

  private schedulers: Map<string, PollScheduler> = new Map();
  private titles: Map<string, string> = new Map();
  private pending: Map<string, NodeJS.Timeout> = new Map();
  // 首次轮询尚未返回的调度器
  private starting: Map<string, PollScheduler> = new Map();
  // 每次卸载递增；首次轮询返回时代数不符即作废
  private generations: Map<string, number> = new Map();
  private commands: Map<CommandName, CommandHandler> = new Map();
  private commandsRegistered = false;

  constructor(opts: MeshRegistryOptions) {
    super();
    this.reader = opts.reader;
    this.executor = opts.executor;
    this.setupRetryMs = Math.max(10, opts.setupRetryMs ?? 30_000);
  }

  public get entryIds(): string[] {
    return [...this.schedulers.keys()];
  }

  public get pendingIds(): string[] {
    return [...this.pending.keys()];
  }

  /** 已配置但尚未就绪（首次轮询中或等待重试）的条目。 */
  public get waitingIds(): string[] {
    return [...new Set([...this.starting.keys(), ...this.pending.keys()])];
  }

  public hasCommands(): boolean {
    return this.commandsRegistered;
  }

  /**
   * 首次轮询成功后才登记调度器；失败抛 NotReady。等待期间被卸载或
   * 被新一次 setup 取代时同样抛 NotReady，且不登记。
   */
  public async setupEntry(entry: ConnectionEntry): Promise<DeviceSnapshot> {
    return this.startEntry(entry, this.resetEntry(entry.id));
  }

  /**
   * 逐个启动条目；未就绪的按 setupRetryMs 重试，间隔翻倍，上限 5 分钟。
   */
  public async loadEntries(entries: ConnectionEntry[]): Promise<void> {
    this.registerCommands();
    for (const entry of entries) {
      await this.setupWithRetry(entry, this.setupRetryMs);
    }
  }

  /** 配置变更：卸载后重新启动。 */
  public async reloadEntry(entry: ConnectionEntry): Promise<void> {
    await this.setupWithRetry(entry, this.setupRetryMs);
  }

  public unloadEntry(entryId: string): boolean {
    this.generations.set(entryId, (this.generations.get(entryId) ?? 0) + 1);
    const hadRetry = this.cancelRetry(entryId);
    const starting = this.starting.get(entryId);
    if (starting) {
      starting.stop();
      starting.removeAllListeners('snapshot');
      this.starting.delete(entryId);
    }
    const scheduler = this.schedulers.get(entryId);
    if (!scheduler) return hadRetry || starting !== undefined;
    scheduler.stop();
    scheduler.removeAllListeners('snapshot');
    this.schedulers.delete(entryId);
    this.titles.delete(entryId);
    console.log(`[MeshRegistry] Entry ${entryId} unloaded`);
    return true;
  }

  public shutdown(): void {
    for (const id of this.waitingIds) this.unloadEntry(id);
    for (const id of [...this.schedulers.keys()]) this.unloadEntry(id);
  }

  public resolveSchedulers(entryId?: string): PollScheduler[] {
    const waiting = this.waitingIds;
    if (entryId) {
      const scheduler = this.schedulers.get(entryId);
      if (scheduler) return [scheduler];
      if (waiting.includes(entryId)) throw new NotReadyError(entryId, 'setup has not completed yet');
      throw new EntryNotFoundError(entryId);
    }
    if (this.schedulers.size === 1) return [...this.schedulers.values()];
    if (this.schedulers.size === 0) {
      if (waiting.length > 0) throw new NotReadyError(waiting.join(', '), 'setup has not completed yet');
      throw new NoEntriesError();
    }
    throw new AmbiguousEntryError(this.schedulers.size);
  }

  public getSnapshots(): EntrySnapshot[] {
    return [...this.schedulers.values()].map((s) => ({
      entryId: s.id,
      title: this.titles.get(s.id) ?? s.id,
      snapshot: s.getSnapshot(),
    }));
  }

  public async invoke(name: string, payload: unknown): Promise<CommandResult> {
    if (!isCommandName(name)) throw new InvalidArgumentError(`Unknown command: ${name}`);
    if (payload !== undefined && payload !== null && !isRecord(payload)) {
      throw new InvalidArgumentError('Command payload must be an object');
    }
    const handler = this.commands.get(name);
    if (!handler) throw new NoEntriesError();
    return handler(isRecord(payload) ? payload : {});
  }

  private registerCommands() {
    if (this.commandsRegistered) return;
    this.commandsRegistered = true;

    this.commands.set('send_message', async (payload) => {
      const message = requiredString(payload, 'message');
      const target = optionalString(payload, 'target');
      if (!message.trim()) throw new InvalidArgumentError('Message cannot be empty');
      return this.forEachConnection(payload, (s) => this.executor.sendMessage(s.connection, message, target));
    });

    this.commands.set('reboot', async (payload) =>
      this.forEachConnection(payload, (s) => this.executor.reboot(s.connection))
    );

    this.commands.set('set_channel', async (payload) => {
      const channelName = requiredString(payload, 'channel_name');
      if (!channelName.trim()) throw new InvalidArgumentError('Channel name cannot be empty');
      return this.forEachConnection(payload, (s) => this.executor.setChannel(s.connection, channelName));
    });

    this.commands.set('refresh', async (payload) => {
      const schedulers = this.resolveSchedulers(optionalString(payload, 'entry_id'));
      const snapshots: DeviceSnapshot[] = [];
      for (const s of schedulers) snapshots.push(await s.refresh());
      return { entryIds: schedulers.map((s) => s.id), snapshots };
    });
  }

  private async forEachConnection(
    payload: Record<string, unknown>,
    fn: (scheduler: PollScheduler) => Promise<void>
  ): Promise<CommandResult> {
    const schedulers = this.resolveSchedulers(optionalString(payload, 'entry_id'));
    for (const s of schedulers) await fn(s);
    return { entryIds: schedulers.map((s) => s.id) };
  }

  /** 卸载旧状态并返回本次 setup 的代数。 */
  private resetEntry(entryId: string): number {
    this.unloadEntry(entryId);
    return this.generations.get(entryId) ?? 0;
  }

  private isCurrent(entryId: string, generation: number): boolean {
    return this.generations.get(entryId) === generation;
  }

  private async startEntry(entry: ConnectionEntry, generation: number): Promise<DeviceSnapshot> {
    const scheduler = new PollScheduler({
      id: entry.id,
      connection: entry.connection,
      reader: this.reader,
      intervalSec: entry.scanIntervalSec,
    });
    const forward = (id: string, snapshot: DeviceSnapshot) => this.emit('snapshot', id, snapshot);
    scheduler.on('snapshot', forward);
    this.starting.set(entry.id, scheduler);

    let snapshot: DeviceSnapshot;
    try {
      snapshot = await scheduler.start();
    } catch (e) {
      scheduler.stop();
      scheduler.off('snapshot', forward);
      if (this.starting.get(entry.id) === scheduler) this.starting.delete(entry.id);
      throw e;
    }

    if (!this.isCurrent(entry.id, generation)) {
      scheduler.stop();
      scheduler.off('snapshot', forward);
      throw new NotReadyError(entry.id, 'entry was unloaded during setup');
    }
    this.starting.delete(entry.id);
    this.schedulers.set(entry.id, scheduler);
    this.titles.set(entry.id, entry.title);
    this.registerCommands();
    console.log(`[MeshRegistry] Entry ${entry.id} ready (${entry.title})`);
    return snapshot;
  }

  private async setupWithRetry(entry: ConnectionEntry, delayMs: number): Promise<void> {
    const generation = this.resetEntry(entry.id);
    try {
      await this.startEntry(entry, generation);
    } catch (e) {
      // 已被卸载或被更新的 setup 取代：不再重试
      if (!this.isCurrent(entry.id, generation)) return;
      console.warn(`[MeshRegistry] Entry ${entry.id} not ready, retrying in ${delayMs}ms: ${errorMessage(e)}`);
      const timer = setTimeout(() => {
        this.pending.delete(entry.id);
        void this.setupWithRetry(entry, Math.min(delayMs * 2, MAX_SETUP_RETRY_MS));
      }, delayMs);
      timer.unref?.();
      this.pending.set(entry.id, timer);
    }
  }

  private cancelRetry(entryId: string): boolean {
    const timer = this.pending.get(entryId);
    if (!timer) return false;
    clearTimeout(timer);
    this.pending.delete(entryId);
    return true;
  }
}
