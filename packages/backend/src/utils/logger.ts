import pino from "pino";
import { appConfig } from "../config.js";

export const logger = pino({
  name: "docent",
  level: appConfig.NODE_ENV === "test" ? "silent" : appConfig.LOG_LEVEL,
  redact: ["headers.authorization", "req.headers.authorization"]
});
