import type {
  API,
  DynamicPlatformPlugin,
  Logging,
  PlatformAccessory,
  PlatformConfig,
} from 'homebridge';

import { ProtectClient } from './api/client.js';
import { ProtectApiError } from './api/errors.js';
import { parseSettings } from './config.js';
import type { PrivacyButtonSettings } from './config.js';
import { PrivacyController } from './controller.js';
import { ConfigurationError, describeError } from './errors.js';
import { OnoffGpioChip } from './gpio/onoff-chip.js';
import { PrivacyAccessory } from './privacy-accessory.js';
import { FileStateStore } from './privacy/store.js';
import { PLATFORM_NAME, PLUGIN_NAME } from './settings.js';

export class ProtectPrivacyPlatform implements DynamicPlatformPlugin {
  public readonly accessories: PlatformAccessory[] = [];
  private readonly privacyAccessories: Map<string, PrivacyAccessory> = new Map();

  private readonly settings: PrivacyButtonSettings | null;
  private client: ProtectClient | null = null;
  private controller: PrivacyController | null = null;
  private shuttingDown = false;

  public get Service() {
    return this.api.hap.Service;
  }

  public get Characteristic() {
    return this.api.hap.Characteristic;
  }

  constructor(
    public readonly log: Logging,
    config: PlatformConfig,
    public readonly api: API,
  ) {
    this.log.info('Initializing platform:', PLATFORM_NAME);
    this.settings = this.loadSettings(config);

    this.api.on('didFinishLaunching', () => {
      if (!this.settings) {
        this.log.warn('Privacy buttons disabled until the configuration is fixed');
        return;
      }
      this.log.debug('Finished launching, starting privacy buttons...');
      this.launch(this.settings).catch(error => {
        this.log.error(`Privacy buttons not started: ${describeError(error)}`);
        if (error instanceof ProtectApiError && error.isAuthError) {
          this.log.error('Check the controller username and password in the plugin settings');
        }
      });
    });

    this.api.on('shutdown', () => {
      this.shutdown().catch(error => {
        this.log.error(`Error while shutting down privacy buttons: ${describeError(error)}`);
      });
    });
  }

  configureAccessory(accessory: PlatformAccessory): void {
    this.log.debug(`Loading accessory from cache: ${accessory.displayName}`);
    this.accessories.push(accessory);
  }

  public get isRunning(): boolean {
    return this.controller !== null;
  }

  private loadSettings(config: PlatformConfig): PrivacyButtonSettings | null {
    try {
      return parseSettings(config, this.api.user.storagePath());
    } catch (error) {
      if (error instanceof ConfigurationError) {
        this.log.error(`Invalid configuration: ${error.message}`);
        return null;
      }
      throw error;
    }
  }

  private async launch(settings: PrivacyButtonSettings): Promise<void> {
    const { controller: protect } = settings;
    const client = new ProtectClient(this.log);
    this.client = client;

    await client.connect(protect.address, protect.username, protect.password);

    if (this.shuttingDown) {
      client.disconnect();
      return;
    }

    const controller = new PrivacyController({
      settings,
      remote: client,
      gpio: new OnoffGpioChip(this.log),
      store: new FileStateStore(settings.global.stateFilePath, this.log),
      log: this.log,
    });

    try {
      await controller.start();
    } catch (error) {
      client.disconnect();
      throw error;
    }

    if (this.shuttingDown) {
      await controller.stop();
      client.disconnect();
      return;
    }

    this.controller = controller;
    this.configureAccessories(controller);
    controller.onTransition(event => {
      this.privacyAccessories.get(event.cameraName)?.handleTransition(event);
    });
  }

  private async shutdown(): Promise<void> {
    this.shuttingDown = true;
    this.log.info('Shutting down, releasing GPIO and closing API connection...');

    if (this.controller) {
      await this.controller.stop();
      this.controller = null;
    }
    this.client?.disconnect();
  }

  private configureAccessories(controller: PrivacyController): void {
    const cameras = controller.cameras;

    for (const camera of cameras) {
      const uuid = this.api.hap.uuid.generate(`${PLUGIN_NAME}:${camera.name}`);

      let accessory = this.accessories.find(acc => acc.UUID === uuid);
      const isNew = !accessory;

      if (!accessory) {
        this.log.info(`Adding new privacy button: ${camera.name}`);
        accessory = new this.api.platformAccessory(camera.name, uuid);
        this.api.registerPlatformAccessories(PLUGIN_NAME, PLATFORM_NAME, [accessory]);
        this.accessories.push(accessory);
      } else {
        this.log.debug(`Restoring existing privacy button: ${camera.name}`);
      }

      accessory.context.cameraName = camera.name;

      this.privacyAccessories.set(camera.name, new PrivacyAccessory(this, accessory, controller, camera));

      if (!isNew) {
        this.api.updatePlatformAccessories([accessory]);
      }
    }

    // Remove accessories for cameras that are no longer running
    const validUUIDs = new Set(
      cameras.map(camera => this.api.hap.uuid.generate(`${PLUGIN_NAME}:${camera.name}`)),
    );

    const accessoriesToRemove = this.accessories.filter(acc => !validUUIDs.has(acc.UUID));

    if (accessoriesToRemove.length > 0) {
      this.log.info(`Removing ${accessoriesToRemove.length} stale accessories`);
      this.api.unregisterPlatformAccessories(PLUGIN_NAME, PLATFORM_NAME, accessoriesToRemove);
      for (const acc of accessoriesToRemove) {
        const index = this.accessories.indexOf(acc);
        if (index > -1) {
          this.accessories.splice(index, 1);
        }
      }
    }
  }
}
