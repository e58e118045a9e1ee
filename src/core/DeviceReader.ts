import { ConnectionResolver } from './ConnectionResolver';
import { ConnectionFailedError, errorMessage, isMeshError } from './errors';
import { normalize } from './TelemetryNormalizer';
import { ConnectionSpec, DeviceRecord } from '../types/mesh';

export class DeviceReader {
  private resolver: ConnectionResolver;

  constructor(resolver: ConnectionResolver) {
    this.resolver = resolver;
  }

  /**
   * 打开连接、读取并归一化遥测，然后关闭连接。
   */
  public async read(spec: ConnectionSpec): Promise<DeviceRecord> {
    return this.resolver.withTransport(spec, async ({ client, target, usb }) => {
      try {
        const record: DeviceRecord = { connection: spec, target, telemetry: normalize(client) };
        if (usb) record.usb = usb;
        return record;
      } catch (e) {
        // 客户端库在读取属性时抛出的异常
        if (isMeshError(e)) throw e;
        throw new ConnectionFailedError(`Failed to read node state: ${errorMessage(e)}`, e);
      }
    });
  }
}
