import { describe, it, expect } from '@jest/globals';
import { register, version, FeishuAdapter } from '../index.js';
import type { ChannelPlugin, PluginManager } from '../index.js';

describe('register', () => {
  it('registers a Feishu channel with the plugin manager', () => {
    const channels: ChannelPlugin[] = [];
    const manager: PluginManager = {
      registerChannel: (channel) => {
        channels.push(channel);
      },
    };

    register(manager);

    expect(channels).toHaveLength(1);
    expect(channels[0]).toBeInstanceOf(FeishuAdapter);
    expect(channels[0].id).toBe('feishu');
    expect(channels[0].label).toBe('飞书');
  });

  it('exposes the package version', () => {
    expect(version).toBe('0.1.0');
  });
});
