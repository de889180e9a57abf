import type { Logging } from 'homebridge';
import { Gpio } from 'onoff';

import { HardwareAcquisitionError, describeError } from '../errors.js';
import { HIGH } from './chip.js';
import type { GpioChip, InputLine, Level, OutputLine } from './chip.js';

type Direction = 'in' | 'high' | 'low';

/**
 * Sysfs GPIO through onoff. Pull-ups are not configurable through sysfs, so buttons
 * need an external pull-up resistor (or one set in config.txt).
 */
export class OnoffGpioChip implements GpioChip {
  constructor(private readonly log: Logging) {}

  public openInput(pin: number): InputLine {
    const gpio = this.export(pin, 'in');
    this.log.debug(`Exported button GPIO ${pin}`);

    return {
      pin,
      read: () => gpio.readSync(),
      release: () => this.unexport(gpio, pin),
    };
  }

  public openOutput(pin: number, initial: Level): OutputLine {
    const gpio = this.export(pin, initial === HIGH ? 'high' : 'low');
    this.log.debug(`Exported LED GPIO ${pin}`);

    return {
      pin,
      write: (level: Level) => gpio.writeSync(level),
      release: () => this.unexport(gpio, pin),
    };
  }

  private export(pin: number, direction: Direction): Gpio {
    if (!Gpio.accessible) {
      throw new HardwareAcquisitionError(`GPIO ${pin} unavailable: sysfs GPIO is not accessible on this host`, pin);
    }

    try {
      return new Gpio(pin, direction);
    } catch (error) {
      throw new HardwareAcquisitionError(`Failed to export GPIO ${pin}: ${describeError(error)}`, pin, { cause: error });
    }
  }

  private unexport(gpio: Gpio, pin: number): void {
    try {
      gpio.unexport();
    } catch (error) {
      this.log.warn(`Failed to release GPIO ${pin}:`, error);
    }
  }
}
