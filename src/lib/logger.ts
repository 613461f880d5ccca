import { pino, stdTimeFunctions } from "pino";

// Shared application logger; level comes straight from the environment so it
// is usable before the rest of the configuration has been validated
export const logger = pino({
	level: process.env.LOG_LEVEL ?? "info",
	base: { service: "trip-records-api" },
	timestamp: stdTimeFunctions.isoTime,
});
