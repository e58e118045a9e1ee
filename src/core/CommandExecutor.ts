import { ConnectionResolver } from './ConnectionResolver';
import { ConnectionFailedError, InvalidArgumentError, UnsupportedOperationError, errorMessage, isMeshError } from './errors';
import { parseNodeTarget } from './nodeId';
import { RadioClient } from './radio/RadioClient';
import { ConnectionSpec } from '../types/mesh';

export class CommandExecutor {
  private resolver: ConnectionResolver;

  constructor(resolver: ConnectionResolver) {
    this.resolver = resolver;
  }

  /**
   * 发送文本。未指定 target 时按广播发送。
   */
  public async sendMessage(spec: ConnectionSpec, message: string, target?: string): Promise<void> {
    if (!message.trim()) throw new InvalidArgumentError('Message cannot be empty');
    const destination = target?.trim() ? target.trim() : undefined;
    if (destination !== undefined) parseNodeTarget(destination);

    await this.invoke(spec, 'send_message', async (client) => {
      if (!client.sendText) throw new UnsupportedOperationError('send_message');
      if (destination === undefined) await client.sendText(message);
      else await client.sendText(message, destination);
    });
  }

  public async reboot(spec: ConnectionSpec): Promise<void> {
    await this.invoke(spec, 'reboot', async (client) => {
      if (!client.reboot) throw new UnsupportedOperationError('reboot');
      await client.reboot();
    });
  }

  public async setChannel(spec: ConnectionSpec, channelName: string): Promise<void> {
    const name = channelName.trim();
    if (!name) throw new InvalidArgumentError('Channel name cannot be empty');

    await this.invoke(spec, 'set_channel', async (client) => {
      if (!client.setPrimaryChannel) throw new UnsupportedOperationError('set_channel');
      await client.setPrimaryChannel(name);
    });
  }

  private async invoke(spec: ConnectionSpec, name: string, fn: (client: RadioClient) => Promise<void>): Promise<void> {
    await this.resolver.withTransport(spec, async ({ client }) => {
      try {
        await fn(client);
      } catch (e) {
        if (isMeshError(e)) throw e;
        throw new ConnectionFailedError(`${name} failed: ${errorMessage(e)}`, e);
      }
    });
  }
}
