import type { Row } from "../../lib/database";
import { nextIsoDay } from "../../lib/dates";
import type { TripRecord, TripSourceName } from "../../types/dto";
import { mapDailyMetricRow, mapTripRow } from "./mapper";
import type { FilterColumns } from "./query";

// "client": select the whole filtered result and slice the page in memory
// "server": LIMIT/OFFSET pushed into the statement
export type PaginationStrategy = "client" | "server";

export type TripSource = {
	name: TripSourceName;
	table: string;
	columns: readonly string[];
	filters: FilterColumns;
	// Must be total so page boundaries are stable between requests
	orderBy: string;
	pagination: PaginationStrategy;
	toRecord: (row: Row, position: number) => TripRecord | undefined;
};

// Daily aggregates, small and bounded (one row per day and service type)
const dailyMetrics: TripSource = {
	name: "daily_metrics",
	table: "agg_daily_metrics",
	columns: [
		"metric_date",
		"service_type",
		"total_trips",
		"total_revenue",
		"avg_trip_distance",
		"avg_trip_duration_sec",
	],
	filters: {
		dateRange: (builder, start, end) => {
			builder.and("metric_date", ">=", start).and("metric_date", "<=", end);
		},
		serviceType: "service_type",
	},
	orderBy: "metric_date DESC, service_type ASC",
	pagination: "client",
	toRecord: mapDailyMetricRow,
};

const tripRecords: TripSource = {
	name: "trip_records",
	table: "fact_trips",
	columns: [
		"trip_id",
		"service_type",
		"pickup_datetime",
		"dropoff_datetime",
		"pickup_borough",
		"pickup_zone",
		"dropoff_borough",
		"dropoff_zone",
		"trip_distance",
		"total_amount",
		"trip_duration_sec",
	],
	filters: {
		// pickup_datetime carries a time of day, so the end bound is the start
		// of the following day
		dateRange: (builder, start, end) => {
			builder.and("pickup_datetime", ">=", start);
			// 9999-12-31 has no next day; every stored timestamp is below it
			const upper = nextIsoDay(end);
			if (upper) builder.and("pickup_datetime", "<", upper);
		},
		serviceType: "service_type",
		borough: "pickup_borough",
	},
	orderBy: "pickup_datetime DESC, trip_id DESC",
	pagination: "server",
	toRecord: (row) => mapTripRow(row),
};

export const tripSources: Record<TripSourceName, TripSource> = {
	daily_metrics: dailyMetrics,
	trip_records: tripRecords,
};
