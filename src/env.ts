import dotenv from "dotenv";

dotenv.config();

type Level = "debug" | "info" | "warn" | "error";

function readLevel(value: string | undefined): Level {
  switch (value) {
    case "debug":
    case "info":
    case "warn":
    case "error":
      return value;
    default:
      return "warn";
  }
}

export const env = {
  IS_PRODUCTION: process.env.NODE_ENV === "production",
  LOG_LEVEL: readLevel(process.env.STACKGUARD_LOG_LEVEL),
  // Raw strings; validated together with CLI flags in config/loader
  WORKERS: process.env.STACKGUARD_WORKERS,
  MAX_FILE_SIZE: process.env.STACKGUARD_MAX_FILE_SIZE,
  CATALOG: process.env.STACKGUARD_CATALOG,
};
