export type { ModelClient } from "./client.js";
export { withTimeout } from "./timeout.js";
