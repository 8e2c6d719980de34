import { runAdapter } from "@naim-bridge/adapter-sdk";
import { NaimAdapter } from "./naim-adapter.js";

export { NaimAdapter } from "./naim-adapter.js";

runAdapter((config) => new NaimAdapter(config));
