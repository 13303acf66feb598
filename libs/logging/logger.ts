import pino from "pino";
import { statsConfig } from "../config/statsConfig.js";

export const logger = pino({
  level: statsConfig.logLevel,
  base: {
    system: "solver-stats"
  }
});

