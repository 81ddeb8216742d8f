import { PracticeSymbol } from "@numdrill/types";

export type RandomSource = () => number; // uniform in [0, 1), like Math.random

export class SymbolGenerator {
  private alphabet: readonly PracticeSymbol[];
  private random: RandomSource;

  constructor(alphabet: readonly PracticeSymbol[], random: RandomSource = Math.random) {
    if (alphabet.length === 0) {
      throw new RangeError("Cannot generate symbols from an empty alphabet");
    }
    this.alphabet = alphabet;
    this.random = random;
  }

  nextSymbol(): PracticeSymbol {
    const index = Math.floor(this.random() * this.alphabet.length);
    // Guard against a source that returns exactly 1
    return this.alphabet[Math.min(index, this.alphabet.length - 1)];
  }

  generateSequence(length: number): PracticeSymbol[] {
    const sequence: PracticeSymbol[] = [];
    for (let i = 0; i < length; i++) {
      sequence.push(this.nextSymbol());
    }
    return sequence;
  }
}
