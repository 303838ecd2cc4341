import winston from "winston";

const logLevel = process.env.AMS_JOBS_LOG_LEVEL || "warn";
const logFormat = process.env.AMS_JOBS_LOG_FORMAT || "simple";

export const logger = winston.createLogger({
  level: logLevel,
  format: winston.format.combine(
    winston.format.timestamp(),
    winston.format.errors({ stack: true }),
    logFormat === "json" ? winston.format.json() : winston.format.simple(),
  ),
  defaultMeta: { service: "ams-jobs" },
  transports: [new winston.transports.Console()],
});

export default logger;
