import type { API, Logging } from 'homebridge';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';

import { ProtectApiError } from './api/errors.js';
import { ProtectPrivacyPlatform } from './platform.js';
import { PLATFORM_NAME, PLUGIN_NAME } from './settings.js';
import {
  createMockAccessory,
  createMockAPI,
  createMockConfig,
  createMockLogger,
  emitApiEvent,
  mockService,
} from './test/mocks.js';
import type { FakeGpioChip, FakeRemoteControl, MemoryStateStore } from './test/mocks.js';

const harness = vi.hoisted(() => ({
  connect: vi.fn(),
  disconnect: vi.fn(),
  client: null as FakeRemoteControl | null,
  chip: null as FakeGpioChip | null,
  store: null as MemoryStateStore | null,
  statePath: null as string | null,
}));

vi.mock('./api/client.js', async () => {
  const { FakeRemoteControl } = await import('./test/mocks.js');

  class ProtectClient extends FakeRemoteControl {
    public connect = harness.connect;
    public disconnect = harness.disconnect;

    constructor() {
      super(FakeRemoteControl.withCameras('Bedroom', 'Kitchen').cameras);
      harness.client = this;
    }
  }

  return { ProtectClient };
});

vi.mock('./gpio/onoff-chip.js', async () => {
  const { FakeGpioChip } = await import('./test/mocks.js');

  class OnoffGpioChip extends FakeGpioChip {
    constructor() {
      super();
      harness.chip = this;
    }
  }

  return { OnoffGpioChip };
});

vi.mock('./privacy/store.js', async () => {
  const { MemoryStateStore } = await import('./test/mocks.js');

  class FileStateStore extends MemoryStateStore {
    constructor(template: string) {
      super();
      harness.statePath = template;
      harness.store = this;
    }
  }

  return { FileStateStore };
});

function uuidOf(cameraName: string): string {
  return `uuid-${PLUGIN_NAME}:${cameraName}`;
}

describe('ProtectPrivacyPlatform', () => {
  let api: API;
  let log: Logging;

  function createPlatform(overrides: Parameters<typeof createMockConfig>[0] = {}): ProtectPrivacyPlatform {
    return new ProtectPrivacyPlatform(log, createMockConfig({ startupDelaySeconds: 0, ...overrides }), api);
  }

  async function launch(platform: ProtectPrivacyPlatform): Promise<void> {
    emitApiEvent(api, 'didFinishLaunching');
    await vi.waitFor(() => expect(platform.isRunning).toBe(true));
  }

  beforeEach(() => {
    vi.clearAllMocks();
    harness.connect.mockResolvedValue(undefined);
    harness.client = null;
    harness.chip = null;
    harness.store = null;
    harness.statePath = null;
    api = createMockAPI('/var/lib/homebridge');
    log = createMockLogger();
  });

  afterEach(async () => {
    emitApiEvent(api, 'shutdown');
    await vi.waitFor(() => expect(log.info).toHaveBeenCalledWith('Shutting down, releasing GPIO and closing API connection...'));
  });

  it('should connect with the configured credentials and store state under the Homebridge storage path', async () => {
    const platform = createPlatform();

    await launch(platform);

    expect(harness.connect).toHaveBeenCalledWith('192.168.1.1', 'testuser', 'testpass');
    expect(harness.statePath).toBe('/var/lib/homebridge/protect-privacy-buttons/privacy_state_{camera}.json');
  });

  it('should register an accessory per running camera', async () => {
    const platform = createPlatform();

    await launch(platform);

    expect(api.registerPlatformAccessories).toHaveBeenCalledTimes(2);
    expect(platform.accessories.map(accessory => accessory.UUID)).toEqual([uuidOf('Bedroom'), uuidOf('Kitchen')]);
    expect(platform.accessories.map(accessory => accessory.context.cameraName)).toEqual(['Bedroom', 'Kitchen']);
  });

  it('should restore cached accessories and remove stale ones', async () => {
    const platform = createPlatform();
    const cachedBedroom = createMockAccessory('Bedroom', uuidOf('Bedroom'));
    const cachedGarage = createMockAccessory('Garage', uuidOf('Garage'));
    platform.configureAccessory(cachedBedroom);
    platform.configureAccessory(cachedGarage);

    await launch(platform);

    expect(api.updatePlatformAccessories).toHaveBeenCalledWith([cachedBedroom]);
    expect(api.registerPlatformAccessories).toHaveBeenCalledTimes(1);
    expect(api.unregisterPlatformAccessories).toHaveBeenCalledWith(PLUGIN_NAME, PLATFORM_NAME, [cachedGarage]);
    expect(platform.accessories.map(accessory => accessory.displayName)).toEqual(['Bedroom', 'Kitchen']);
  });

  it('should stay idle with an invalid configuration', () => {
    createPlatform({ cameras: [] });

    emitApiEvent(api, 'didFinishLaunching');

    expect(log.error).toHaveBeenCalledWith('Invalid configuration: cameras must be a non-empty array');
    expect(log.warn).toHaveBeenCalledWith('Privacy buttons disabled until the configuration is fixed');
    expect(harness.connect).not.toHaveBeenCalled();
  });

  it('should explain a refused login', async () => {
    harness.connect.mockRejectedValue(
      new ProtectApiError('Failed to login to controller at 192.168.1.1', '192.168.1.1', 401),
    );
    createPlatform();

    emitApiEvent(api, 'didFinishLaunching');

    await vi.waitFor(() => expect(log.error).toHaveBeenCalledWith(
      'Check the controller username and password in the plugin settings',
    ));
    expect(log.error).toHaveBeenCalledWith(
      'Privacy buttons not started: Failed to login to controller at 192.168.1.1',
    );
  });

  it('should disconnect when the privacy buttons cannot start', async () => {
    const platform = createPlatform({ cameras: [{ name: 'Garage', inputPin: 5 }] });

    emitApiEvent(api, 'didFinishLaunching');

    await vi.waitFor(() => expect(harness.disconnect).toHaveBeenCalledTimes(1));
    expect(log.error).toHaveBeenCalledWith(
      'Privacy buttons not started: None of the configured cameras exist on the Protect controller',
    );
    expect(platform.isRunning).toBe(false);
  });

  it('should release the GPIO lines and disconnect on shutdown', async () => {
    const platform = createPlatform();
    await launch(platform);

    emitApiEvent(api, 'shutdown');

    await vi.waitFor(() => expect(platform.isRunning).toBe(false));
    expect(harness.chip?.input(18).released).toBe(true);
    expect(harness.chip?.input(20).released).toBe(true);
    expect(harness.chip?.output(24).released).toBe(true);
    expect(harness.disconnect).toHaveBeenCalled();
  });

  it('should disconnect a login that completes after shutdown', async () => {
    let finishLogin: () => void = () => undefined;
    harness.connect.mockReturnValue(new Promise<void>(resolve => {
      finishLogin = resolve;
    }));
    const platform = createPlatform();

    emitApiEvent(api, 'didFinishLaunching');
    emitApiEvent(api, 'shutdown');
    await vi.waitFor(() => expect(harness.disconnect).toHaveBeenCalledTimes(1));
    finishLogin();

    await vi.waitFor(() => expect(harness.disconnect).toHaveBeenCalledTimes(2));
    expect(harness.chip).toBeNull();
    expect(platform.isRunning).toBe(false);
  });

  it('should apply a privacy change requested from HomeKit', async () => {
    const platform = createPlatform();
    await launch(platform);
    const accessory = platform.accessories[0];
    const privacy = accessory ? mockService(accessory, 'Switch', 'privacy-switch') : undefined;

    privacy?.getCharacteristic('On').set(true);

    await vi.waitFor(() => expect(harness.store?.saves).toHaveLength(1));
    expect(harness.client?.callsOf('setPrivacy')).toEqual([{ operation: 'setPrivacy', camera: 'Bedroom', value: true }]);
    expect(privacy?.getCharacteristic('On').value).toBe(true);
  });
});
