import { EXTERNAL_PLATFORMS, type ExternalPlatform } from '@cobra-relay/shared';
import { config } from '../config/env.js';
import { createLogger } from '../utils/logger.js';
import { UnsupportedPlatformAdapter, type PlatformAdapter } from './base.js';
import { GroupMeAdapter } from './groupme/adapter.js';
import { TeamsAdapter } from './teams/adapter.js';

const log = createLogger('ChannelRouter');

/**
 * Enum dispatch from platform to adapter. Platforms without an integration
 * resolve to an adapter that fails every send as unsupported.
 */
export class ChannelRouter {
  private adapters = new Map<ExternalPlatform, PlatformAdapter>();

  constructor(adapters: PlatformAdapter[] = []) {
    for (const adapter of adapters) {
      this.register(adapter);
    }
  }

  register(adapter: PlatformAdapter): void {
    this.adapters.set(adapter.platform, adapter);
    log.debug({ platform: adapter.platform }, 'Adapter registered');
  }

  get(platform: ExternalPlatform): PlatformAdapter {
    return this.adapters.get(platform) ?? new UnsupportedPlatformAdapter(platform);
  }

  isSupported(platform: ExternalPlatform): boolean {
    return this.adapters.has(platform);
  }

  getSupportedPlatforms(): ExternalPlatform[] {
    return EXTERNAL_PLATFORMS.filter(platform => this.adapters.has(platform));
  }
}

// Singleton instance
let routerInstance: ChannelRouter | null = null;

export function getChannelRouter(): ChannelRouter {
  if (!routerInstance) {
    routerInstance = new ChannelRouter([
      new GroupMeAdapter({ apiBase: config.groupme.apiBase, accessToken: config.groupme.accessToken }),
      new TeamsAdapter({ botUrl: config.teams.botUrl, botApiKey: config.teams.botApiKey }),
    ]);
  }
  return routerInstance;
}
