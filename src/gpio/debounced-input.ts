import { LOW } from './chip.js';
import type { Level } from './chip.js';

export type Edge = 'pressed' | 'released';

export interface ButtonState {
  rawLevel: Level;
  stableLevel: Level;
  lastChangeTimestamp: number;
}

type Phase =
  | { kind: 'settled' }
  | { kind: 'debouncing'; candidate: Level; since: number };

export interface DebounceOptions {
  debounceMs: number;
  /** Level read while the button is held. Buttons wired to ground with a pull-up read LOW. */
  activeLevel?: Level;
}

/**
 * Turns raw samples of one GPIO line into press/release edges. A new level is accepted once it
 * has held for `debounceMs`; a bounce back to the settled level inside the window is dropped.
 */
export class DebouncedInput {
  private readonly debounceMs: number;
  private readonly activeLevel: Level;

  private phase: Phase = { kind: 'settled' };
  private rawLevel: Level;
  private stableLevel: Level;
  private lastChangeTimestamp: number;

  constructor(initialLevel: Level, now: number, options: DebounceOptions) {
    this.debounceMs = options.debounceMs;
    this.activeLevel = options.activeLevel ?? LOW;
    this.rawLevel = initialLevel;
    this.stableLevel = initialLevel;
    this.lastChangeTimestamp = now;
  }

  public get level(): Level {
    return this.stableLevel;
  }

  public get isPressed(): boolean {
    return this.stableLevel === this.activeLevel;
  }

  public get isDebouncing(): boolean {
    return this.phase.kind === 'debouncing';
  }

  public snapshot(): ButtonState {
    return {
      rawLevel: this.rawLevel,
      stableLevel: this.stableLevel,
      lastChangeTimestamp: this.lastChangeTimestamp,
    };
  }

  public sample(level: Level, now: number): Edge | null {
    this.rawLevel = level;

    if (level === this.stableLevel) {
      this.phase = { kind: 'settled' };
      return null;
    }

    if (this.phase.kind === 'settled') {
      this.phase = { kind: 'debouncing', candidate: level, since: now };
    }

    if (now - this.phase.since < this.debounceMs) {
      return null;
    }

    this.phase = { kind: 'settled' };
    this.stableLevel = level;
    this.lastChangeTimestamp = now;
    return level === this.activeLevel ? 'pressed' : 'released';
  }
}
