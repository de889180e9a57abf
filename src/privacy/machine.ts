import type { Logging } from 'homebridge';

import type { IrMode, RemoteControl, RemoteResult } from '../api/remote-control.js';
import { remoteFailure } from '../api/remote-control.js';
import type { CameraSpec } from '../config.js';
import { describeError } from '../errors.js';
import { privacyOff, privacyOn, remainingTimeout } from './state.js';
import type { PrivacyState } from './state.js';
import type { StateStore } from './store.js';

/** Wait before retrying an auto-disable the controller refused. */
export const TIMEOUT_RETRY_MS = 60_000;

export type TransitionCause = 'button' | 'timeout' | 'request';

export interface TransitionEvent {
  cameraName: string;
  cause: TransitionCause;
  target: boolean;
  applied: boolean;
  state: PrivacyState;
}

export type TransitionListener = (event: TransitionEvent) => void;

export interface PrivacyMachineOptions {
  spec: CameraSpec;
  initial: PrivacyState;
  remote: RemoteControl;
  store: StateStore;
  log: Logging;
  remoteTimeoutMs: number;
}

interface SideEffect {
  setting: string;
  call: () => Promise<RemoteResult>;
}

/**
 * Privacy on/off for one camera. Local state only changes after the controller confirms the
 * privacy toggle, and at most one transition is in flight at a time.
 */
export class CameraPrivacyMachine {
  private readonly spec: CameraSpec;
  private readonly remote: RemoteControl;
  private readonly store: StateStore;
  private readonly log: Logging;
  private readonly remoteTimeoutMs: number;

  private current: PrivacyState;
  private inFlight: Promise<void> | null = null;
  private timeoutFailures = 0;
  private timeoutRetryAt: number | null = null;
  private listeners: TransitionListener[] = [];

  constructor(options: PrivacyMachineOptions) {
    this.spec = options.spec;
    this.current = options.initial;
    this.remote = options.remote;
    this.store = options.store;
    this.log = options.log;
    this.remoteTimeoutMs = options.remoteTimeoutMs;
  }

  public get name(): string {
    return this.spec.name;
  }

  public get state(): PrivacyState {
    return this.current;
  }

  public get busy(): boolean {
    return this.inFlight !== null;
  }

  public onTransition(listener: TransitionListener): void {
    this.listeners.push(listener);
  }

  /** Toggles privacy. Ignored while a transition is in flight. */
  public press(now: number): boolean {
    if (this.inFlight) {
      this.log.debug(`[${this.name}] Button press ignored: a privacy change is already in progress`);
      return false;
    }
    this.dispatch(!this.current.privacyEnabled, 'button', now);
    return true;
  }

  public request(enabled: boolean, now: number): boolean {
    if (this.inFlight || this.current.privacyEnabled === enabled) {
      return false;
    }
    this.dispatch(enabled, 'request', now);
    return true;
  }

  public timeoutDue(now: number): boolean {
    const remaining = remainingTimeout(this.current, this.spec.timeoutMinutes, now);
    return remaining !== null && remaining === 0;
  }

  public checkTimeout(now: number): boolean {
    if (this.inFlight || !this.timeoutDue(now)) {
      return false;
    }
    if (this.timeoutRetryAt !== null && now < this.timeoutRetryAt) {
      return false;
    }
    if (this.timeoutFailures === 0) {
      this.log.info(`[${this.name}] Privacy timeout reached (${this.spec.timeoutMinutes} minutes)`);
    } else {
      this.log.debug(`[${this.name}] Retrying privacy timeout (attempt ${this.timeoutFailures + 1})`);
    }
    this.dispatch(false, 'timeout', now);
    return true;
  }

  /** Resolves once the in-flight transition, if any, has finished. */
  public settled(): Promise<void> {
    return this.inFlight ?? Promise.resolve();
  }

  private dispatch(target: boolean, cause: TransitionCause, now: number): void {
    this.inFlight = this.transition(target, cause, now)
      .catch(error => {
        this.log.error(`[${this.name}] Unexpected error while changing privacy:`, error);
      })
      .finally(() => {
        this.inFlight = null;
      });
  }

  private async transition(target: boolean, cause: TransitionCause, now: number): Promise<void> {
    const action = target ? 'enable' : 'disable';

    const privacy = await this.call('privacy', () => this.remote.setPrivacy(this.name, target));
    if (!privacy.ok) {
      const failure = `[${this.name}] Failed to ${action} privacy (${cause}): ${privacy.kind}: ${privacy.message}`;
      if (cause !== 'timeout') {
        this.log.error(failure);
      } else {
        this.timeoutFailures++;
        this.timeoutRetryAt = now + TIMEOUT_RETRY_MS;
        if (this.timeoutFailures === 1) {
          this.log.error(`${failure}; retrying every ${TIMEOUT_RETRY_MS / 1000}s`);
        } else {
          this.log.debug(failure);
        }
      }
      this.notify({ cameraName: this.name, cause, target, applied: false, state: this.current });
      return;
    }

    const irMode: IrMode = target ? 'off' : 'auto';
    await this.applySideEffects([
      { setting: 'status LED', call: () => this.remote.setLed(this.name, !target) },
      { setting: 'IR LEDs', call: () => this.remote.setIr(this.name, irMode) },
      { setting: 'microphone', call: () => this.remote.setMic(this.name, !target) },
    ]);

    this.current = target ? privacyOn(this.name, now) : privacyOff(this.name);
    this.timeoutFailures = 0;
    this.timeoutRetryAt = null;
    this.log.info(`[${this.name}] Privacy ${target ? 'enabled' : 'disabled'} (${cause})`);
    if (target && this.spec.timeoutMinutes > 0) {
      this.log.info(`[${this.name}] Auto-disable in ${this.spec.timeoutMinutes} minutes`);
    }

    try {
      await this.store.save(this.name, this.current);
    } catch (error) {
      this.log.error(
        `[${this.name}] Failed to persist privacy state; a restart may lose this change: ${describeError(error)}`,
      );
    }

    this.notify({ cameraName: this.name, cause, target, applied: true, state: this.current });
  }

  private async applySideEffects(effects: SideEffect[]): Promise<void> {
    const results = await Promise.all(effects.map(effect => this.call(effect.setting, effect.call)));

    results.forEach((result, index) => {
      if (result.ok) {
        return;
      }
      const setting = effects[index]?.setting ?? 'setting';
      if (result.kind === 'unsupported') {
        this.log.debug(`[${this.name}] Skipped ${setting}: ${result.message}`);
      } else {
        this.log.warn(`[${this.name}] Failed to update ${setting}: ${result.kind}: ${result.message}`);
      }
    });
  }

  private async call(setting: string, operation: () => Promise<RemoteResult>): Promise<RemoteResult> {
    let timer: NodeJS.Timeout | undefined;
    const timeout = new Promise<RemoteResult>(resolve => {
      timer = setTimeout(
        () => resolve(remoteFailure('transient', `${setting} update timed out after ${this.remoteTimeoutMs} ms`)),
        this.remoteTimeoutMs,
      );
    });

    try {
      return await Promise.race([
        operation().catch(error => remoteFailure('transient', describeError(error))),
        timeout,
      ]);
    } finally {
      clearTimeout(timer);
    }
  }

  private notify(event: TransitionEvent): void {
    for (const listener of this.listeners) {
      try {
        listener(event);
      } catch (error) {
        this.log.error(`[${this.name}] Error in transition listener:`, error);
      }
    }
  }
}
