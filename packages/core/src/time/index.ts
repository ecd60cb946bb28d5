export * from "./constants";
export { periodToDays, periodStartTimestamp } from "./periods";
