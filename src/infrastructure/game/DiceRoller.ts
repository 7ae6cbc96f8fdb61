// Infrastructure layer: Dice rolling RNG implementation
// Implements testable dice rolling with injectable random number generator

export interface DiceRoller {
  roll(sides: number): number;
}

/**
 * Roller whose position can be captured and restored, so a saved combat
 * continues with the same roll sequence after a load.
 */
export interface StatefulDiceRoller extends DiceRoller {
  getState(): number;
}

function assertSides(sides: number): void {
  if (!Number.isInteger(sides) || sides < 2) {
    throw new Error(`Dice must have at least 2 sides, got: ${sides}`);
  }
  if (sides > 1000) {
    throw new Error(`Dice cannot have more than 1000 sides, got: ${sides}`);
  }
}

/**
 * Fixed dice roller for testing
 * Returns predetermined values from an array
 */
export class FixedDiceRoller implements StatefulDiceRoller {
  private values: number[];
  private consumed = 0;

  constructor(values: number[]) {
    this.values = [...values];
  }

  roll(sides: number): number {
    const value = this.values.shift();
    if (value === undefined) {
      throw new Error('FixedDiceRoller: No more values available');
    }
    if (value < 1 || value > sides) {
      throw new Error(`FixedDiceRoller: Value ${value} out of range for ${sides}-sided die`);
    }
    this.consumed++;
    return value;
  }

  /** number of values consumed so far */
  getState(): number {
    return this.consumed;
  }
}

/**
 * Seeded dice roller for reproducible rolls
 * Uses a simple Linear Congruential Generator
 */
export class SeededDiceRoller implements StatefulDiceRoller {
  private state: number;

  constructor(seed: number = Date.now()) {
    this.state = normalizeSeed(seed);
  }

  roll(sides: number): number {
    assertSides(sides);
    // LCG parameters from glibc
    this.state = (Math.imul(this.state, 1103515245) + 12345) & 0x7fffffff;
    return (this.state % sides) + 1;
  }

  getState(): number {
    return this.state;
  }
}

export function normalizeSeed(seed: number): number {
  return Math.abs(Math.trunc(seed)) & 0x7fffffff;
}
