import type { Logging } from 'homebridge';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';

import { parseSettings } from './config.js';
import type { PrivacyButtonSettings } from './config.js';
import { PrivacyController } from './controller.js';
import { ConfigurationError, HardwareAcquisitionError } from './errors.js';
import { HIGH, LOW } from './gpio/chip.js';
import { privacyOff, privacyOn } from './privacy/state.js';
import {
  FakeGpioChip,
  FakeRemoteControl,
  MemoryStateStore,
  createMockConfig,
  createMockLogger,
} from './test/mocks.js';

const MINUTE = 60_000;
const T0 = Date.UTC(2026, 9, 18, 8, 0, 0);
const FIRST_TICK = T0 + 5_100;

describe('PrivacyController', () => {
  let settings: PrivacyButtonSettings;
  let remote: FakeRemoteControl;
  let gpio: FakeGpioChip;
  let store: MemoryStateStore;
  let log: Logging;
  let controller: PrivacyController;

  function createController(): PrivacyController {
    return new PrivacyController({ settings, remote, gpio, store, log, now: () => Date.now() });
  }

  beforeEach(() => {
    vi.useFakeTimers({ now: T0 });
    settings = parseSettings(createMockConfig(), '/var/lib/homebridge');
    remote = FakeRemoteControl.withCameras('Bedroom', 'Kitchen');
    gpio = new FakeGpioChip();
    store = new MemoryStateStore();
    log = createMockLogger();
    controller = createController();
  });

  afterEach(async () => {
    await controller.stop();
    vi.useRealTimers();
  });

  describe('start', () => {
    it('should acquire every camera and start polling after the startup delay', async () => {
      await controller.start();

      expect(controller.cameras.map(camera => camera.name)).toEqual(['Bedroom', 'Kitchen']);
      expect([...gpio.inputs.keys()]).toEqual([18, 20]);
      expect(gpio.output(24).writes).toEqual([HIGH]);
      expect(controller.isRunning).toBe(false);

      await vi.advanceTimersByTimeAsync(4_999);
      expect(controller.isRunning).toBe(false);

      await vi.advanceTimersByTimeAsync(1);
      expect(controller.isRunning).toBe(true);
      expect(log.info).toHaveBeenCalledWith('Privacy buttons active for: Bedroom, Kitchen');
    });

    it('should skip cameras the Protect controller does not know', async () => {
      remote = FakeRemoteControl.withCameras('Bedroom', 'Garage');
      controller = createController();

      await controller.start();

      expect(controller.cameras.map(camera => camera.name)).toEqual(['Bedroom']);
      expect(log.warn).toHaveBeenCalledWith(
        "Camera 'Kitchen' not found on the Protect controller, skipping (available: Bedroom, Garage)",
      );
      expect(gpio.inputs.has(20)).toBe(false);
    });

    it('should fail when no configured camera exists on the Protect controller', async () => {
      remote = FakeRemoteControl.withCameras('Garage');
      controller = createController();

      await expect(controller.start()).rejects.toThrow(
        new ConfigurationError('None of the configured cameras exist on the Protect controller'),
      );
      expect(gpio.inputs.size).toBe(0);
    });

    it('should fail when every camera is disabled', async () => {
      settings = parseSettings(createMockConfig({
        cameras: [{ name: 'Bedroom', inputPin: 18, enabled: false }],
      }), '/var/lib/homebridge');
      controller = createController();

      await expect(controller.start()).rejects.toBeInstanceOf(ConfigurationError);
    });

    it('should disable a camera whose button line is unavailable', async () => {
      gpio.busyPins.add(20);

      await controller.start();

      expect(controller.cameras.map(camera => camera.name)).toEqual(['Bedroom']);
      expect(log.error).toHaveBeenCalledWith('[Kitchen] Disabled: Failed to export GPIO 20: EBUSY');
    });

    it('should run a camera without its LED when the LED line is unavailable', async () => {
      gpio.busyPins.add(24);

      await controller.start();

      expect(controller.cameras.map(camera => camera.name)).toEqual(['Bedroom', 'Kitchen']);
      expect(log.warn).toHaveBeenCalledWith('[Bedroom] Running without LED: Failed to export GPIO 24: EBUSY');
      expect(controller.isLedOn('Bedroom')).toBeNull();
      expect(controller.setLedOverride('Bedroom', true)).toBe(false);
    });

    it('should fail when no button line can be acquired', async () => {
      gpio.busyPins.add(18);
      gpio.busyPins.add(20);

      const error = await controller.start().catch((caught: unknown) => caught);

      expect(error).toBeInstanceOf(HardwareAcquisitionError);
      expect(error).toMatchObject({ pin: 18, message: 'Failed to export GPIO 18: EBUSY' });
    });

    it('should release the lines when the state cannot be loaded', async () => {
      vi.spyOn(store, 'load').mockRejectedValueOnce(new Error('disk gone'));

      await expect(controller.start()).rejects.toThrow('disk gone');

      expect(gpio.input(18).released).toBe(true);
      expect(gpio.input(20).released).toBe(true);
      expect(gpio.output(24).released).toBe(true);
    });

    it('should report the remaining timeout of a restored camera', async () => {
      store.records.set('Bedroom', privacyOn('Bedroom', T0 - 30 * MINUTE));

      await controller.start();

      expect(controller.getState('Bedroom')).toEqual(privacyOn('Bedroom', T0 - 30 * MINUTE));
      expect(log.info).toHaveBeenCalledWith('[Bedroom] Restored privacy ENABLED');
      expect(log.info).toHaveBeenCalledWith('[Bedroom] Auto-disable in 30 minutes');
    });

    it('should warn when the stored state disagrees with the Protect controller', async () => {
      remote.cameras[0] = { id: 'camera-1', name: 'Bedroom', privacyEnabled: true };

      await controller.start();

      expect(log.warn).toHaveBeenCalledWith('[Bedroom] Stored privacy is DISABLED but the controller reports ENABLED');
      expect(controller.getState('Bedroom')).toEqual(privacyOff('Bedroom'));
    });

    it('should disable privacy on the first poll when the timeout expired while stopped', async () => {
      store.records.set('Bedroom', privacyOn('Bedroom', T0 - 61 * MINUTE));

      await controller.start();
      expect(log.info).toHaveBeenCalledWith('[Bedroom] Timeout expired while stopped, privacy will be disabled');

      await vi.advanceTimersByTimeAsync(5_100);
      await vi.advanceTimersByTimeAsync(100);

      expect(controller.getState('Bedroom')).toEqual(privacyOff('Bedroom'));
      expect(remote.callsOf('setPrivacy')).toEqual([{ operation: 'setPrivacy', camera: 'Bedroom', value: false }]);
    });
  });

  describe('restart', () => {
    it('should restore the privacy state and start time saved before a restart', async () => {
      await controller.start();
      expect(controller.requestPrivacy('Bedroom', true)).toBe(true);
      await vi.advanceTimersByTimeAsync(5_100);
      await vi.advanceTimersByTimeAsync(100);
      expect(controller.getState('Bedroom')).toEqual(privacyOn('Bedroom', FIRST_TICK));
      await controller.stop();

      gpio = new FakeGpioChip();
      controller = createController();
      await controller.start();

      expect(controller.getState('Bedroom')).toEqual(privacyOn('Bedroom', FIRST_TICK));
      expect(controller.getState('Kitchen')).toEqual(privacyOff('Kitchen'));
      expect(gpio.output(24).writes).toEqual([LOW]);
    });
  });

  describe('stop', () => {
    it('should wait for in-flight changes, darken the LEDs and release every line', async () => {
      remote.hold();
      await controller.start();
      controller.requestPrivacy('Bedroom', true);
      await vi.advanceTimersByTimeAsync(5_100);

      const stopping = controller.stop();
      remote.release();
      await stopping;

      expect(log.info).toHaveBeenCalledWith('Waiting for privacy changes to finish: Bedroom');
      expect(store.saves).toEqual([privacyOn('Bedroom', FIRST_TICK)]);
      expect(gpio.output(24).level).toBe(LOW);
      expect(gpio.output(24).released).toBe(true);
      expect(gpio.input(18).released).toBe(true);
      expect(gpio.input(20).released).toBe(true);
      expect(controller.isRunning).toBe(false);
    });

    it('should give up waiting after the shutdown timeout', async () => {
      remote.hold();
      await controller.start();
      controller.requestPrivacy('Bedroom', true);
      await vi.advanceTimersByTimeAsync(5_100);

      const stopping = controller.stop();
      await vi.advanceTimersByTimeAsync(4_000);
      await stopping;

      expect(log.warn).toHaveBeenCalledWith('Shut down with privacy changes still pending for: Bedroom');
      expect(gpio.input(18).released).toBe(true);
    });

    it('should cancel a pending startup', async () => {
      await controller.start();

      await controller.stop();
      await vi.advanceTimersByTimeAsync(10_000);

      expect(controller.isRunning).toBe(false);
      expect(gpio.input(18).released).toBe(true);
    });
  });

  describe('HomeKit surface', () => {
    it('should reject requests before start', () => {
      expect(controller.requestPrivacy('Bedroom', true)).toBe(false);
      expect(controller.getState('Bedroom')).toBeNull();
      expect(controller.isLedOn('Bedroom')).toBeNull();
    });

    it('should forward transitions to listeners', async () => {
      await controller.start();
      const listener = vi.fn();
      controller.onTransition(listener);

      controller.requestPrivacy('Kitchen', true);
      await vi.advanceTimersByTimeAsync(5_100);
      await vi.advanceTimersByTimeAsync(100);

      expect(listener).toHaveBeenCalledWith({
        cameraName: 'Kitchen',
        cause: 'request',
        target: true,
        applied: true,
        state: privacyOn('Kitchen', FIRST_TICK),
      });
    });

    it('should report and override the LED', async () => {
      await controller.start();
      expect(controller.isLedOn('Bedroom')).toBe(true);

      controller.setLedOverride('Bedroom', false);
      expect(controller.ledOverride('Bedroom')).toBe(false);
      await vi.advanceTimersByTimeAsync(5_100);

      expect(controller.isLedOn('Bedroom')).toBe(false);
      expect(controller.isLedOn('Kitchen')).toBeNull();
    });
  });
});
