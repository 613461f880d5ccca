import type { NextFunction, Request, Response } from "express";
import { logger } from "../../lib/logger";
import { TripQueryError } from "./errors";
import { tripsQuerySchema } from "./request";
import { emptyTripsResponse, type TripService } from "./service";

export const makeTripController = (service: TripService) => ({
	// GET /api/trips (paginated list)
	getTrips: async (req: Request, res: Response, next: NextFunction) => {
		const parsed = tripsQuerySchema.safeParse(req.query);
		if (!parsed.success) {
			res.status(422).json({
				error: "Invalid query parameters",
				issues: parsed.error.issues,
			});
			return;
		}

		const query = parsed.data;
		try {
			res.json(await service.getTrips(query));
		} catch (e) {
			if (!(e instanceof TripQueryError)) {
				next(e);
				return;
			}
			// Query failures never reach the client: empty page, zeroed totals
			logger.error({ err: e, kind: e.kind }, "Error fetching trips");
			res.json(emptyTripsResponse(query.page, query.page_size));
		}
	},
});

export type TripController = ReturnType<typeof makeTripController>;
