import type { CharacteristicValue, PlatformAccessory, Service } from 'homebridge';

import type { CameraSpec } from './config.js';
import type { PrivacyController } from './controller.js';
import type { ProtectPrivacyPlatform } from './platform.js';
import type { TransitionEvent } from './privacy/machine.js';

const PRIVACY_SUBTYPE = 'privacy-switch';
const LED_SUBTYPE = 'led-switch';

export class PrivacyAccessory {
  private readonly privacySwitch: Service;
  private readonly ledSwitch: Service | null;

  constructor(
    private readonly platform: ProtectPrivacyPlatform,
    private readonly accessory: PlatformAccessory,
    private readonly controller: PrivacyController,
    private readonly spec: CameraSpec,
  ) {
    const infoService = this.accessory.getService(this.platform.Service.AccessoryInformation)
      ?? this.accessory.addService(this.platform.Service.AccessoryInformation);
    infoService
      .setCharacteristic(this.platform.Characteristic.Manufacturer, 'Raspberry Pi')
      .setCharacteristic(this.platform.Characteristic.Model, 'GPIO Privacy Button')
      .setCharacteristic(this.platform.Characteristic.SerialNumber, `GPIO ${spec.inputPin}`);

    // Privacy switch service
    this.privacySwitch = this.getOrAddSwitch('Privacy', PRIVACY_SUBTYPE);

    this.privacySwitch.getCharacteristic(this.platform.Characteristic.On)
      .onGet(() => this.privacyEnabled)
      .onSet(this.setPrivacy.bind(this));

    // Button LED switch service, only for cameras with an LED
    if (spec.ledPin !== null) {
      this.ledSwitch = this.getOrAddSwitch('Button LED', LED_SUBTYPE);

      this.ledSwitch.getCharacteristic(this.platform.Characteristic.On)
        .onGet(() => this.controller.isLedOn(this.spec.name) ?? false)
        .onSet(this.setLed.bind(this));
    } else {
      this.ledSwitch = null;
      const stale = this.accessory.getServiceById(this.platform.Service.Switch, LED_SUBTYPE);
      if (stale) {
        this.accessory.removeService(stale);
      }
    }

    this.updatePrivacySwitch(this.privacyEnabled);
  }

  private get privacyEnabled(): boolean {
    return this.controller.getState(this.spec.name)?.privacyEnabled ?? false;
  }

  private getOrAddSwitch(displayName: string, subtype: string): Service {
    const existingService = this.accessory.getServiceById(this.platform.Service.Switch, subtype);
    const service = existingService ?? this.accessory.addService(this.platform.Service.Switch, displayName, subtype);

    service.setCharacteristic(this.platform.Characteristic.Name, displayName);
    service.addOptionalCharacteristic(this.platform.Characteristic.ConfiguredName);
    service.setCharacteristic(this.platform.Characteristic.ConfiguredName, displayName);
    return service;
  }

  private setPrivacy(value: CharacteristicValue): void {
    const enabled = value === true;
    this.platform.log.debug(`[${this.spec.name}] HomeKit requested privacy ${enabled ? 'on' : 'off'}`);

    if (!this.controller.requestPrivacy(this.spec.name, enabled)) {
      this.platform.log.error(`[${this.spec.name}] Privacy request rejected: camera is not running`);
      // Revert the switch state
      setTimeout(() => this.updatePrivacySwitch(this.privacyEnabled), 100);
    }
  }

  private setLed(value: CharacteristicValue): void {
    const on = value === true;
    this.platform.log.debug(`[${this.spec.name}] HomeKit set button LED ${on ? 'on' : 'off'}`);
    this.controller.setLedOverride(this.spec.name, on);
  }

  public handleTransition(event: TransitionEvent): void {
    if (event.cameraName !== this.spec.name) {
      return;
    }

    // Rejected changes land here too, which reverts the switch.
    this.updatePrivacySwitch(event.state.privacyEnabled);

    if (event.applied && this.ledSwitch) {
      this.ledSwitch.updateCharacteristic(this.platform.Characteristic.On, !event.state.privacyEnabled);
    }
  }

  private updatePrivacySwitch(enabled: boolean): void {
    this.privacySwitch.updateCharacteristic(this.platform.Characteristic.On, enabled);
  }
}
