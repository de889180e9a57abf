import type { Logging } from 'homebridge';
import { ProtectApi } from 'unifi-protect';

import { describeError } from '../errors.js';
import { ProtectApiError } from './errors.js';
import { REMOTE_OK, remoteFailure } from './remote-control.js';
import type { IrMode, RemoteCamera, RemoteControl, RemoteResult } from './remote-control.js';
import type {
  ProtectBootstrap,
  ProtectCamera,
  ProtectCameraPayload,
  ProtectFeatureFlags,
  ProtectPrivacyZone,
} from './types.js';

export const PRIVACY_ZONE_NAME = 'privacy-button';
export const DEFAULT_MIC_VOLUME = 100;

const PRIVACY_ZONE_COLOR = '#85BCEC';
const FULL_FRAME: [number, number][] = [[0, 0], [1, 0], [1, 1], [0, 1]];

function hasPrivacyZone(camera: ProtectCamera): boolean {
  return (camera.privacyZones ?? []).some(zone => zone.name === PRIVACY_ZONE_NAME);
}

/**
 * Privacy, LED, IR and microphone control through a single logged-in Protect session.
 * Privacy is a full-frame privacy zone, added next to any zones the user drew.
 */
export class ProtectClient implements RemoteControl {
  private api: ProtectApi;
  private connected = false;
  private readonly micVolumes = new Map<string, number>();

  constructor(private readonly log: Logging) {
    this.api = new ProtectApi();
  }

  public async connect(address: string, username: string, password: string): Promise<void> {
    try {
      this.log.info(`Connecting to UniFi Protect controller at ${address}...`);

      const loggedIn = await this.api.login(address, username, password);

      if (!loggedIn) {
        throw new ProtectApiError(`Failed to login to controller at ${address}`, address, 401);
      }

      this.log.info(`Successfully logged in to ${address}`);

      const bootstrapSuccess = await this.api.getBootstrap();
      if (!bootstrapSuccess) {
        throw new ProtectApiError(`Failed to get bootstrap from ${address}`, address);
      }

      this.connected = true;
      this.log.info(`Found ${this.cameras.length} cameras on ${address}`);
    } catch (error) {
      if (error instanceof ProtectApiError) {
        throw error;
      }
      throw new ProtectApiError(`Error connecting to ${address}: ${describeError(error)}`, address);
    }
  }

  public get bootstrap(): ProtectBootstrap | null {
    if (!this.connected || !this.api.bootstrap) {
      return null;
    }
    return this.api.bootstrap as unknown as ProtectBootstrap;
  }

  public get cameras(): ProtectCamera[] {
    return this.bootstrap?.cameras ?? [];
  }

  public get isConnected(): boolean {
    return this.connected;
  }

  public listCameras(): RemoteCamera[] {
    return this.cameras.map(camera => ({
      id: camera.id,
      name: camera.name,
      privacyEnabled: hasPrivacyZone(camera),
    }));
  }

  public findCamera(nameOrId: string): RemoteCamera | null {
    const cameras = this.listCameras();
    return cameras.find(camera => camera.name === nameOrId)
      ?? cameras.find(camera => camera.id === nameOrId)
      ?? null;
  }

  public setPrivacy(cameraName: string, enabled: boolean): Promise<RemoteResult> {
    return this.updateCamera(cameraName, 'privacy zone', null, camera => {
      const userZones = (camera.privacyZones ?? []).filter(zone => zone.name !== PRIVACY_ZONE_NAME);
      if (!enabled) {
        return { privacyZones: userZones };
      }

      const zone: ProtectPrivacyZone = {
        id: userZones.reduce((next, z) => Math.max(next, z.id + 1), 0),
        name: PRIVACY_ZONE_NAME,
        color: PRIVACY_ZONE_COLOR,
        points: FULL_FRAME,
      };
      return { privacyZones: [...userZones, zone] };
    });
  }

  public setLed(cameraName: string, on: boolean): Promise<RemoteResult> {
    return this.updateCamera(cameraName, 'status LED', 'hasLedStatus', () => ({
      ledSettings: { isEnabled: on },
    }));
  }

  public setIr(cameraName: string, mode: IrMode): Promise<RemoteResult> {
    return this.updateCamera(cameraName, 'IR LEDs', 'hasLedIr', () => ({
      ispSettings: { irLedMode: mode },
    }));
  }

  public setMic(cameraName: string, on: boolean): Promise<RemoteResult> {
    return this.updateCamera(cameraName, 'microphone', 'hasMic', camera => {
      const current = camera.micVolume ?? 0;
      if (!on) {
        if (current > 0) {
          this.micVolumes.set(camera.id, current);
        }
        return { micVolume: 0 };
      }
      return { micVolume: this.micVolumes.get(camera.id) ?? (current > 0 ? current : DEFAULT_MIC_VOLUME) };
    });
  }

  public disconnect(): void {
    if (this.connected) {
      this.api.reset();
      this.connected = false;
    }
  }

  private lookup(nameOrId: string): ProtectCamera | undefined {
    return this.cameras.find(camera => camera.name === nameOrId)
      ?? this.cameras.find(camera => camera.id === nameOrId);
  }

  private async updateCamera(
    cameraName: string,
    setting: string,
    feature: keyof ProtectFeatureFlags | null,
    buildPayload: (camera: ProtectCamera) => ProtectCameraPayload,
  ): Promise<RemoteResult> {
    if (!this.connected) {
      return remoteFailure('transient', `Cannot update ${setting}: not connected`);
    }

    const camera = this.lookup(cameraName);
    if (!camera) {
      return remoteFailure('not-found', `Camera '${cameraName}' not found on the controller`);
    }

    if (feature && !camera.featureFlags?.[feature]) {
      return remoteFailure('unsupported', `${setting} control not available for ${camera.name}`);
    }

    const payload = buildPayload(camera);

    try {
      const result = await this.api.updateDevice(camera as never, payload as never);

      if (!result) {
        return remoteFailure('transient', `Controller rejected the ${setting} update for ${camera.name}`);
      }

      // The bootstrap copy is what the next update builds on.
      Object.assign(camera, payload);
      this.log.debug(`Updated ${setting} for ${camera.name}`);
      return REMOTE_OK;
    } catch (error) {
      return remoteFailure('transient', `Error updating ${setting} for ${camera.name}: ${describeError(error)}`);
    }
  }
}
