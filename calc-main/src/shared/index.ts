export { devLog, devWarn, devError } from "./debug-log.js";
