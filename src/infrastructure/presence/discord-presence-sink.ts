import RPC from 'discord-rpc';
import type { Presence } from 'discord-rpc';
import type { Logger } from '../../core/logging/index.js';
import type { PresenceSink } from './presence-sink.js';
import type { PresenceView } from './presence-renderer.js';

/**
 * The slice of the discord-rpc client this sink uses.
 */
export interface RpcClientLike {
  login(options: { clientId: string }): Promise<unknown>;
  setActivity(activity: Presence): Promise<unknown>;
  clearActivity(): Promise<unknown>;
  destroy(): Promise<void>;
}

export type RpcClientFactory = () => RpcClientLike;

const ipcClient: RpcClientFactory = () => new RPC.Client({ transport: 'ipc' });

export function toActivity(view: PresenceView): Presence {
  return {
    state: view.state,
    details: view.details,
    largeImageKey: view.largeImageKey,
    largeImageText: view.largeImageText,
    smallImageKey: view.smallImageKey,
    smallImageText: view.smallImageText,
    startTimestamp: new Date(view.startTimestampMs),
    instance: false,
  };
}

/**
 * Discord Rich Presence over the local IPC socket.
 *
 * Connects lazily on the first `show`. If Discord is not running the update
 * is skipped with a warning; any RPC failure drops the connection so the next
 * update reconnects.
 */
export class DiscordPresenceSink implements PresenceSink {
  readonly name = 'discord';
  private client: RpcClientLike | null = null;

  constructor(
    private readonly clientId: string,
    private readonly logger: Logger,
    private readonly createClient: RpcClientFactory = ipcClient,
  ) {}

  get connected(): boolean {
    return this.client !== null;
  }

  async show(view: PresenceView): Promise<boolean> {
    const client = await this.connect();
    if (!client) return false;

    try {
      await client.setActivity(toActivity(view));
      this.logger.info({ state: view.state }, 'Discord presence updated');
      return true;
    } catch (error) {
      this.logger.error({ err: error }, 'Discord presence update failed');
      await this.disconnect();
      return false;
    }
  }

  async clear(): Promise<void> {
    if (!this.client) return;
    try {
      await this.client.clearActivity();
      this.logger.info('Discord presence cleared');
    } catch (error) {
      this.logger.warn({ err: error }, 'Discord presence clear failed');
      await this.disconnect();
    }
  }

  async close(): Promise<void> {
    await this.disconnect();
  }

  private async connect(): Promise<RpcClientLike | null> {
    if (this.client) return this.client;

    const client = this.createClient();
    try {
      await client.login({ clientId: this.clientId });
    } catch (error) {
      this.logger.warn({ err: error }, 'Discord not running or connection failed');
      await this.destroyQuietly(client);
      return null;
    }

    this.logger.info('Connected to Discord RPC');
    this.client = client;
    return client;
  }

  private async disconnect(): Promise<void> {
    const client = this.client;
    this.client = null;
    if (client) await this.destroyQuietly(client);
  }

  private async destroyQuietly(client: RpcClientLike): Promise<void> {
    try {
      await client.destroy();
    } catch (error) {
      this.logger.debug({ err: error }, 'Discord client teardown failed');
    }
  }
}
