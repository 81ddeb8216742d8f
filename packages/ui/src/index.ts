export * from "./terminal";
export * from "./styles";
export { WindowRenderer } from "./WindowRenderer";
export { StatsRenderer, formatStats } from "./StatsRenderer";
