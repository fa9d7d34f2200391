import dotenv from "dotenv";

dotenv.config();

export const config = {
  NODE_ENV: process.env.NODE_ENV || "development",
  LOG_LEVEL: process.env.LOG_LEVEL || "info",
  // Config file used by the CLI when --config is not given
  PYPERF_CONFIG: process.env.PYPERF_CONFIG,
};
