import "dotenv/config";
import { z } from "zod";
import { TRIP_SOURCES } from "../types/dto";

const envSchema = z.object({
	NODE_ENV: z
		.enum(["development", "test", "production"])
		.default("development"),
	PORT: z.coerce.number().int().min(0).max(65_535).default(3000),
	DATABASE_PATH: z.string().trim().min(1).default("data/trips.db"),
	SECRET_KEY: z.string().min(1, "SECRET_KEY is required"),
	TRIPS_SOURCE: z.enum(TRIP_SOURCES).default("daily_metrics"),
	LOG_LEVEL: z
		.enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"])
		.default("info"),
});

export type AppConfig = z.infer<typeof envSchema>;

// Validate the environment once at startup; fail fast on bad values
export const loadConfig = (
	env: NodeJS.ProcessEnv = process.env,
): AppConfig => {
	const parsed = envSchema.safeParse(env);
	if (!parsed.success) {
		const problems = parsed.error.issues
			.map((i) => `${i.path.join(".")}: ${i.message}`)
			.join("; ");
		throw new Error(`Invalid environment: ${problems}`);
	}
	return parsed.data;
};
