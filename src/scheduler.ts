import type { Logging } from 'homebridge';

import type { CameraSpec } from './config.js';
import { describeError } from './errors.js';
import { HIGH, LOW } from './gpio/chip.js';
import type { InputLine, Level, OutputLine } from './gpio/chip.js';
import type { DebouncedInput } from './gpio/debounced-input.js';
import type { CameraPrivacyMachine } from './privacy/machine.js';

export interface CameraChannel {
  spec: CameraSpec;
  input: InputLine;
  button: DebouncedInput;
  machine: CameraPrivacyMachine;
  led: OutputLine | null;
}

interface ChannelRuntime {
  channel: CameraChannel;
  readFailing: boolean;
  ledFailing: boolean;
  ledLevel: Level | null;
  ledOverride: boolean | null;
  pendingRequest: boolean | null;
}

export interface SchedulerOptions {
  pollingIntervalMs: number;
  log: Logging;
  now?: () => number;
}

/**
 * Fixed-period loop over every running camera. It is the only reader of the buttons, the only
 * writer of the LEDs and the only source of state machine events.
 */
export class PollingScheduler {
  private readonly runtimes = new Map<string, ChannelRuntime>();
  private readonly pollingIntervalMs: number;
  private readonly log: Logging;
  private readonly now: () => number;
  private interval: NodeJS.Timeout | null = null;

  constructor(channels: readonly CameraChannel[], options: SchedulerOptions) {
    this.pollingIntervalMs = options.pollingIntervalMs;
    this.log = options.log;
    this.now = options.now ?? Date.now;

    for (const channel of channels) {
      this.runtimes.set(channel.spec.name, {
        channel,
        readFailing: false,
        ledFailing: false,
        ledLevel: null,
        ledOverride: null,
        pendingRequest: null,
      });

      channel.machine.onTransition(event => {
        if (event.applied) {
          const runtime = this.runtimes.get(event.cameraName);
          if (runtime) {
            runtime.ledOverride = null;
          }
        }
      });
    }
  }

  public get running(): boolean {
    return this.interval !== null;
  }

  public start(): void {
    if (this.interval) {
      return;
    }
    this.log.debug(`Polling ${this.runtimes.size} buttons every ${this.pollingIntervalMs} ms`);
    this.interval = setInterval(() => this.tick(), this.pollingIntervalMs);
  }

  /** Stops sampling; transitions already dispatched keep running. */
  public stop(): void {
    if (this.interval) {
      clearInterval(this.interval);
      this.interval = null;
    }
  }

  public tick(now: number = this.now()): void {
    for (const runtime of this.runtimes.values()) {
      this.tickChannel(runtime, now);
    }
  }

  /** Queues an explicit privacy target, applied on a later tick once the camera is idle. */
  public requestPrivacy(cameraName: string, enabled: boolean): boolean {
    const runtime = this.runtimes.get(cameraName);
    if (!runtime) {
      return false;
    }
    runtime.pendingRequest = enabled;
    return true;
  }

  /**
   * Forces the button LED on or off until the camera's next privacy change; `null` hands the
   * LED back to the privacy state.
   */
  public setLedOverride(cameraName: string, on: boolean | null): boolean {
    const runtime = this.runtimes.get(cameraName);
    if (!runtime?.channel.led) {
      return false;
    }
    runtime.ledOverride = on;
    return true;
  }

  public ledOverride(cameraName: string): boolean | null {
    return this.runtimes.get(cameraName)?.ledOverride ?? null;
  }

  public ledLevel(cameraName: string): Level | null {
    return this.runtimes.get(cameraName)?.ledLevel ?? null;
  }

  /** Writes every LED from the current state, outside the regular tick. */
  public refreshLeds(): void {
    for (const runtime of this.runtimes.values()) {
      this.driveLed(runtime);
    }
  }

  /** Turns every LED off. */
  public darkenLeds(): void {
    for (const runtime of this.runtimes.values()) {
      this.writeLed(runtime, LOW);
    }
  }

  private tickChannel(runtime: ChannelRuntime, now: number): void {
    const { channel } = runtime;
    const { machine } = channel;

    const level = this.readButton(runtime);
    if (level !== null && channel.button.sample(level, now) === 'pressed') {
      this.log.debug(`[${channel.spec.name}] Button pressed on GPIO ${channel.spec.inputPin}`);
      machine.press(now);
    }

    if (runtime.pendingRequest !== null && !machine.busy) {
      const target = runtime.pendingRequest;
      runtime.pendingRequest = null;
      machine.request(target, now);
    }

    machine.checkTimeout(now);
    this.driveLed(runtime);
  }

  private readButton(runtime: ChannelRuntime): Level | null {
    const { spec, input } = runtime.channel;
    try {
      const level = input.read();
      if (runtime.readFailing) {
        runtime.readFailing = false;
        this.log.info(`[${spec.name}] Button GPIO ${spec.inputPin} readable again`);
      }
      return level;
    } catch (error) {
      if (!runtime.readFailing) {
        runtime.readFailing = true;
        this.log.error(`[${spec.name}] Failed to read button GPIO ${spec.inputPin}: ${describeError(error)}`);
      }
      return null;
    }
  }

  private driveLed(runtime: ChannelRuntime): void {
    const ledOn = runtime.ledOverride ?? !runtime.channel.machine.state.privacyEnabled;
    this.writeLed(runtime, ledOn ? HIGH : LOW);
  }

  private writeLed(runtime: ChannelRuntime, level: Level): void {
    const { spec, led } = runtime.channel;
    if (!led || runtime.ledLevel === level) {
      return;
    }
    try {
      led.write(level);
      runtime.ledLevel = level;
      runtime.ledFailing = false;
    } catch (error) {
      if (!runtime.ledFailing) {
        runtime.ledFailing = true;
        this.log.error(`[${spec.name}] Failed to drive LED GPIO ${led.pin}: ${describeError(error)}`);
      }
    }
  }
}
