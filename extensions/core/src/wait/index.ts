export { unwrapWait, waitFor, waitUntil, type Pending, type WaitOptions, type WaitOutcome } from "./wait.js";
