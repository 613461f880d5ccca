import { loadConfig } from "../lib/config";
import { openDatabase, SqliteClient } from "../lib/database";
import { logger } from "../lib/logger";
import { createServer } from "./server";

const main = async () => {
	const config = loadConfig();
	logger.level = config.LOG_LEVEL;

	const db = new SqliteClient(await openDatabase(config.DATABASE_PATH));

	const server = createServer({
		db,
		source: config.TRIPS_SOURCE,
		secretKey: config.SECRET_KEY,
	});

	server.listen(config.PORT, () => {
		logger.info(
			{ port: config.PORT, source: config.TRIPS_SOURCE },
			`Listening on port ${config.PORT}`,
		);
	});
};

main().catch((err: unknown) => {
	logger.fatal({ err }, "Failed to start");
	process.exit(1);
});
