export { LoggingLive } from "./layers.js";

export {
  prettyLogger,
  parseLogLevel,
} from "./logging.js";
