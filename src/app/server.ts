import express, {
	type Express,
	type NextFunction,
	type Request,
	type Response,
} from "express";
import type { DbClient } from "../lib/database";
import { logger } from "../lib/logger";
import type { TripSourceName } from "../types/dto";
import { requireActiveUser } from "./auth/middleware";
import { UserService } from "./auth/service";
import { makeTripController } from "./trips/controller";
import { createTripRouter } from "./trips/router";
import { TripService } from "./trips/service";
import { tripSources } from "./trips/sources";

export type ServerOptions = {
	db: DbClient;
	source: TripSourceName;
	secretKey: string;
};

export const createServer = ({
	db,
	source,
	secretKey,
}: ServerOptions): Express => {
	const requireUser = requireActiveUser(new UserService(db), secretKey);
	const trips = makeTripController(new TripService(db, tripSources[source]));

	const server = express();
	server.use(express.json());
	server.use("/api/trips", createTripRouter(trips, requireUser));

	// Error handling middleware
	server.use(
		(err: unknown, _req: Request, res: Response, _next: NextFunction) => {
			logger.error({ err }, "Unhandled error");
			res.status(500).json({
				error: err instanceof Error ? err.message : "Internal Server Error",
			});
		},
	);

	return server;
};
