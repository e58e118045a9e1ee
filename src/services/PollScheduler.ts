import { EventEmitter } from 'events';
import { DEFAULT_SCAN_INTERVAL_SEC, MAX_SCAN_INTERVAL_SEC, MIN_SCAN_INTERVAL_SEC } from '../core/constants';
import { DeviceReader } from '../core/DeviceReader';
import { NotReadyError, errorMessage } from '../core/errors';
import { ConnectionSpec, DeviceSnapshot, SchedulerState } from '../types/mesh';

export function clampScanInterval(value: unknown): number {
  const n = typeof value === 'string' ? Number(value.trim()) : value;
  if (typeof n !== 'number' || !Number.isFinite(n)) return DEFAULT_SCAN_INTERVAL_SEC;
  return Math.min(MAX_SCAN_INTERVAL_SEC, Math.max(MIN_SCAN_INTERVAL_SEC, Math.round(n)));
}

export interface PollSchedulerOptions {
  id: string;
  connection: ConnectionSpec;
  reader: Pick<DeviceReader, 'read'>;
  intervalSec?: number;
  now?: () => number;
}

type PollOutcome = { ok: true; snapshot: DeviceSnapshot } | { ok: false; snapshot: DeviceSnapshot; error: unknown };

/**
 * 单个连接条目的轮询器：idle -> polling -> idle。轮询之间不重叠，
 * 每次成功或失败都整体替换快照。
 */
export class PollScheduler extends EventEmitter {
  readonly id: string;
  readonly connection: ConnectionSpec;
  readonly intervalSec: number;

  private reader: Pick<DeviceReader, 'read'>;
  private now: () => number;
  private timer: NodeJS.Timeout | null = null;
  private inFlight: Promise<PollOutcome> | null = null;
  private snapshot: DeviceSnapshot | null = null;
  private stopped = false;

  constructor(opts: PollSchedulerOptions) {
    super();
    this.id = opts.id;
    this.connection = opts.connection;
    this.reader = opts.reader;
    this.intervalSec = clampScanInterval(opts.intervalSec);
    this.now = opts.now ?? Date.now;
  }

  public get state(): SchedulerState {
    if (this.stopped) return 'stopped';
    return this.inFlight ? 'polling' : 'idle';
  }

  public getSnapshot(): DeviceSnapshot | null {
    return this.snapshot;
  }

  /**
   * 执行首次轮询；失败时抛 NotReady，调度不会启动。
   */
  public async start(): Promise<DeviceSnapshot> {
    this.stopped = false;
    const outcome = await this.poll();
    if (!outcome.ok) throw new NotReadyError(this.id, outcome.error);
    this.schedule();
    return outcome.snapshot;
  }

  /**
   * 立即轮询一次。已有轮询在进行时等待同一次结果，不抛错。
   */
  public async refresh(): Promise<DeviceSnapshot> {
    const outcome = await this.poll();
    return outcome.snapshot;
  }

  public stop(): void {
    this.stopped = true;
    if (this.timer) clearTimeout(this.timer);
    this.timer = null;
  }

  private schedule() {
    if (this.stopped) return;
    if (this.timer) clearTimeout(this.timer);
    this.timer = setTimeout(() => {
      this.timer = null;
      void this.poll().then(() => this.schedule());
    }, this.intervalSec * 1000);
    this.timer.unref?.();
  }

  private poll(): Promise<PollOutcome> {
    if (this.inFlight) return this.inFlight;
    const run = this.runPoll().finally(() => {
      this.inFlight = null;
    });
    this.inFlight = run;
    return run;
  }

  private async runPoll(): Promise<PollOutcome> {
    let outcome: PollOutcome;
    try {
      const record = await this.reader.read(this.connection);
      const snapshot: DeviceSnapshot = {
        connection: this.connection,
        target: record.target,
        telemetry: record.telemetry,
        updatedAt: this.now(),
      };
      if (record.usb) snapshot.usb = record.usb;
      outcome = { ok: true, snapshot };
    } catch (e) {
      console.warn(`[PollScheduler] Poll of ${this.id} failed: ${errorMessage(e)}`);
      outcome = { ok: false, snapshot: { connection: this.connection, error: errorMessage(e), updatedAt: this.now() }, error: e };
    }

    // stop() 之后完成的轮询不再发布
    if (!this.stopped) {
      this.snapshot = outcome.snapshot;
      this.emit('snapshot', this.id, outcome.snapshot);
    }
    return outcome;
  }
}
