import { AlphabetName, PracticeSymbol } from "@numdrill/types";

export const DIGITS = "0123456789";
export const OPERATORS = "+-*/";
export const DECIMAL_POINT = ".";

const ALPHABETS: Record<AlphabetName, readonly PracticeSymbol[]> = {
  digits: DIGITS.split(""),
  numpad: (DIGITS + OPERATORS + DECIMAL_POINT).split(""),
};

export function getAlphabet(name: AlphabetName): readonly PracticeSymbol[] {
  return ALPHABETS[name];
}

// Single characters only: key names such as "return" never match
export function isAcceptedSymbol(alphabet: readonly PracticeSymbol[], input: string): boolean {
  return input.length === 1 && alphabet.includes(input);
}
