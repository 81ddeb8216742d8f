export { SymbolGenerator } from "./generator";
export type { RandomSource } from "./generator";
