export * from "./calculator/index.js";
export { loadCalcConfig, isDebugEnabled, type CalcConfig } from "./config/env.js";
export { devLog, devWarn, devError } from "./shared/index.js";
