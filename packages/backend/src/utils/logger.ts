import pino from "pino";
import { appConfig } from "../config.js";

export const logger = pino({
  level: appConfig.NODE_ENV === "test" ? "silent" : appConfig.LOG_LEVEL
});
