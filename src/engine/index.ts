export { createEngineClient } from "./docker-client.js";
export { MockEngineClient } from "./mock-client.js";
export type * from "./types.js";
