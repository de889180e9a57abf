export type Level = 0 | 1;

export const LOW: Level = 0;
export const HIGH: Level = 1;

export interface InputLine {
  readonly pin: number;
  read(): Level;
  release(): void;
}

export interface OutputLine {
  readonly pin: number;
  write(level: Level): void;
  release(): void;
}

/**
 * Access to GPIO lines by BCM number. Opening a line that cannot be exported throws a
 * HardwareAcquisitionError.
 */
export interface GpioChip {
  openInput(pin: number): InputLine;
  openOutput(pin: number, initial: Level): OutputLine;
}
