import type { Logging } from 'homebridge';

import type { RemoteControl } from './api/remote-control.js';
import type { CameraSpec, PrivacyButtonSettings } from './config.js';
import { ConfigurationError, HardwareAcquisitionError, describeError } from './errors.js';
import { HIGH } from './gpio/chip.js';
import type { GpioChip, InputLine, Level, OutputLine } from './gpio/chip.js';
import { DebouncedInput } from './gpio/debounced-input.js';
import { CameraPrivacyMachine } from './privacy/machine.js';
import type { TransitionListener } from './privacy/machine.js';
import { privacyOff, remainingTimeout } from './privacy/state.js';
import type { PrivacyState } from './privacy/state.js';
import type { StateStore } from './privacy/store.js';
import { PollingScheduler } from './scheduler.js';
import type { CameraChannel } from './scheduler.js';

export interface PrivacyControllerOptions {
  settings: PrivacyButtonSettings;
  remote: RemoteControl;
  gpio: GpioChip;
  store: StateStore;
  log: Logging;
  now?: () => number;
}

interface AcquiredCamera {
  spec: CameraSpec;
  input: InputLine;
  led: OutputLine | null;
}

function toHardwareError(error: unknown, pin: number): HardwareAcquisitionError {
  return error instanceof HardwareAcquisitionError
    ? error
    : new HardwareAcquisitionError(`Failed to acquire GPIO ${pin}: ${describeError(error)}`, pin, { cause: error });
}

/**
 * Owns the GPIO lines, the camera table and the polling loop for one process.
 *
 * A camera whose button line cannot be acquired is left out and the others keep running; a
 * camera whose LED line cannot be acquired runs without an LED.
 */
export class PrivacyController {
  private readonly settings: PrivacyButtonSettings;
  private readonly remote: RemoteControl;
  private readonly gpio: GpioChip;
  private readonly store: StateStore;
  private readonly log: Logging;
  private readonly now: () => number;

  private channels: CameraChannel[] = [];
  private scheduler: PollingScheduler | null = null;
  private startupTimer: NodeJS.Timeout | null = null;

  constructor(options: PrivacyControllerOptions) {
    this.settings = options.settings;
    this.remote = options.remote;
    this.gpio = options.gpio;
    this.store = options.store;
    this.log = options.log;
    this.now = options.now ?? Date.now;
  }

  public get cameras(): CameraSpec[] {
    return this.channels.map(channel => channel.spec);
  }

  public get isRunning(): boolean {
    return this.scheduler?.running ?? false;
  }

  /**
   * Acquires the GPIO lines, restores state and schedules the polling loop to begin after the
   * startup delay.
   *
   * @throws ConfigurationError when no configured camera exists on the controller.
   * @throws HardwareAcquisitionError when no button line could be acquired.
   */
  public async start(): Promise<void> {
    if (this.scheduler) {
      return;
    }

    const enabled = this.settings.cameras.filter(camera => camera.enabled);
    if (enabled.length === 0) {
      throw new ConfigurationError('No enabled cameras configured');
    }

    const known = enabled.filter(spec => this.verifyRemoteCamera(spec));
    if (known.length === 0) {
      throw new ConfigurationError('None of the configured cameras exist on the Protect controller');
    }

    const acquired = this.acquire(known);

    let stored: Map<string, PrivacyState>;
    try {
      stored = await this.store.load(acquired.map(camera => camera.spec.name));
    } catch (error) {
      this.release(acquired);
      throw error;
    }

    const now = this.now();
    const { global } = this.settings;
    this.channels = acquired.map(camera => this.createChannel(camera, stored.get(camera.spec.name), now));
    this.scheduler = new PollingScheduler(this.channels, {
      pollingIntervalMs: global.pollingIntervalSeconds * 1000,
      log: this.log,
      now: this.now,
    });
    this.scheduler.refreshLeds();

    this.log.info(`Waiting ${global.startupDelaySeconds}s before polling ${this.channels.length} buttons...`);
    const scheduler = this.scheduler;
    this.startupTimer = setTimeout(() => {
      this.startupTimer = null;
      scheduler.start();
      this.log.info(`Privacy buttons active for: ${this.cameras.map(camera => camera.name).join(', ')}`);
    }, global.startupDelaySeconds * 1000);
  }

  /**
   * Stops polling, waits (bounded) for in-flight privacy changes, darkens the LEDs and releases
   * every GPIO line.
   */
  public async stop(): Promise<void> {
    if (this.startupTimer) {
      clearTimeout(this.startupTimer);
      this.startupTimer = null;
    }

    const scheduler = this.scheduler;
    if (!scheduler) {
      return;
    }
    scheduler.stop();

    const pending = this.channels.filter(channel => channel.machine.busy);
    if (pending.length > 0) {
      const names = pending.map(channel => channel.spec.name).join(', ');
      this.log.info(`Waiting for privacy changes to finish: ${names}`);

      const finished = await this.waitAtMost(
        Promise.all(pending.map(channel => channel.machine.settled())),
        this.settings.global.shutdownTimeoutSeconds * 1000,
      );
      if (!finished) {
        this.log.warn(`Shut down with privacy changes still pending for: ${names}`);
      }
    }

    scheduler.darkenLeds();
    this.release(this.channels);
    this.channels = [];
    this.scheduler = null;
    this.log.info('Released all GPIO lines');
  }

  public getState(cameraName: string): PrivacyState | null {
    return this.channel(cameraName)?.machine.state ?? null;
  }

  public onTransition(listener: TransitionListener): void {
    for (const channel of this.channels) {
      channel.machine.onTransition(listener);
    }
  }

  public requestPrivacy(cameraName: string, enabled: boolean): boolean {
    return this.scheduler?.requestPrivacy(cameraName, enabled) ?? false;
  }

  public setLedOverride(cameraName: string, on: boolean | null): boolean {
    return this.scheduler?.setLedOverride(cameraName, on) ?? false;
  }

  public ledOverride(cameraName: string): boolean | null {
    return this.scheduler?.ledOverride(cameraName) ?? null;
  }

  /** Whether the camera's button LED is lit, or null when it has none. */
  public isLedOn(cameraName: string): boolean | null {
    const level = this.scheduler?.ledLevel(cameraName) ?? null;
    return level === null ? null : level === HIGH;
  }

  private channel(cameraName: string): CameraChannel | undefined {
    return this.channels.find(channel => channel.spec.name === cameraName);
  }

  private verifyRemoteCamera(spec: CameraSpec): boolean {
    if (this.remote.findCamera(spec.name)) {
      return true;
    }
    const available = this.remote.listCameras().map(camera => camera.name).join(', ') || 'none';
    this.log.warn(`Camera '${spec.name}' not found on the Protect controller, skipping (available: ${available})`);
    return false;
  }

  private acquire(specs: CameraSpec[]): AcquiredCamera[] {
    const acquired: AcquiredCamera[] = [];
    const failures: HardwareAcquisitionError[] = [];

    for (const spec of specs) {
      let input: InputLine;
      try {
        input = this.gpio.openInput(spec.inputPin);
      } catch (error) {
        const failure = toHardwareError(error, spec.inputPin);
        failures.push(failure);
        this.log.error(`[${spec.name}] Disabled: ${failure.message}`);
        continue;
      }

      let led: OutputLine | null = null;
      if (spec.ledPin !== null) {
        try {
          led = this.gpio.openOutput(spec.ledPin, HIGH);
        } catch (error) {
          this.log.warn(`[${spec.name}] Running without LED: ${toHardwareError(error, spec.ledPin).message}`);
        }
      }

      acquired.push({ spec, input, led });
    }

    const [firstFailure] = failures;
    if (acquired.length === 0 && firstFailure) {
      throw firstFailure;
    }
    return acquired;
  }

  private createChannel(camera: AcquiredCamera, restored: PrivacyState | undefined, now: number): CameraChannel {
    const { spec, input, led } = camera;
    const initial = restored ?? privacyOff(spec.name);

    this.reportRestoredState(spec, initial, restored !== undefined, now);

    const machine = new CameraPrivacyMachine({
      spec,
      initial,
      remote: this.remote,
      store: this.store,
      log: this.log,
      remoteTimeoutMs: this.settings.global.remoteTimeoutSeconds * 1000,
    });

    const button = new DebouncedInput(this.readInitialLevel(spec, input), now, {
      debounceMs: Math.round(this.settings.global.debounceSeconds * 1000),
    });

    this.log.info(
      `[${spec.name}] Button on GPIO ${spec.inputPin}` +
      (led ? `, LED on GPIO ${led.pin}` : ', no LED') +
      `, timeout ${spec.timeoutMinutes > 0 ? `${spec.timeoutMinutes} minutes` : 'disabled'}`,
    );

    return { spec, input, button, machine, led };
  }

  private reportRestoredState(spec: CameraSpec, state: PrivacyState, restored: boolean, now: number): void {
    const remote = this.remote.findCamera(spec.name);
    if (remote && remote.privacyEnabled !== state.privacyEnabled) {
      this.log.warn(
        `[${spec.name}] Stored privacy is ${state.privacyEnabled ? 'ENABLED' : 'DISABLED'} ` +
        `but the controller reports ${remote.privacyEnabled ? 'ENABLED' : 'DISABLED'}`,
      );
    }

    if (!restored) {
      return;
    }

    this.log.info(`[${spec.name}] Restored privacy ${state.privacyEnabled ? 'ENABLED' : 'DISABLED'}`);
    const remaining = remainingTimeout(state, spec.timeoutMinutes, now);
    if (remaining === 0) {
      this.log.info(`[${spec.name}] Timeout expired while stopped, privacy will be disabled`);
    } else if (remaining !== null) {
      this.log.info(`[${spec.name}] Auto-disable in ${Math.ceil(remaining / 60_000)} minutes`);
    }
  }

  private readInitialLevel(spec: CameraSpec, input: InputLine): Level {
    try {
      return input.read();
    } catch (error) {
      this.log.warn(`[${spec.name}] Could not read initial button level, assuming released: ${describeError(error)}`);
      return HIGH;
    }
  }

  private release(lines: ReadonlyArray<{ input: InputLine; led: OutputLine | null }>): void {
    for (const { input, led } of lines) {
      input.release();
      led?.release();
    }
  }

  private async waitAtMost(work: Promise<unknown>, timeoutMs: number): Promise<boolean> {
    let timer: NodeJS.Timeout | undefined;
    const expired = new Promise<boolean>(resolve => {
      timer = setTimeout(() => resolve(false), timeoutMs);
    });

    try {
      return await Promise.race([work.then(() => true), expired]);
    } finally {
      clearTimeout(timer);
    }
  }
}
