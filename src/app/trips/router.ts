import { type RequestHandler, Router } from "express";
import type { TripController } from "./controller";

export const createTripRouter = (
	controller: TripController,
	requireUser: RequestHandler,
): Router => Router().use(requireUser).get("/", controller.getTrips);
