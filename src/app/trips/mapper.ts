import type { Row } from "../../lib/database";
import { parseTimestamp } from "../../lib/dates";
import {
	SERVICE_TYPES,
	type ServiceType,
	type TripRecord,
} from "../../types/dto";

// Lenient numeric conversion: missing, empty or unparseable -> 0
export const toFloat = (value: unknown): number => {
	let n = Number.NaN;
	if (typeof value === "number") n = value;
	else if (typeof value === "bigint") n = Number(value);
	// Number("") would be 0 too, but keep blanks explicit
	else if (typeof value === "string" && value.trim() !== "") n = Number(value);
	return Number.isFinite(n) ? n : 0;
};

// Distances and durations cannot be negative
export const toNonNegativeFloat = (value: unknown): number =>
	Math.max(toFloat(value), 0);

export const toNonNegativeInt = (value: unknown): number =>
	Math.max(Math.trunc(toFloat(value)), 0);

// Blank strings count as absent
const toOptionalString = (value: unknown): string | null => {
	if (typeof value !== "string") return null;
	const s = value.trim();
	return s ? s : null;
};

// Stored values must already be canonical ("yellow", not "Yellow"): the
// service_type filter compares the raw column, so the mapper must not
// accept anything the filter would miss
const toServiceType = (value: unknown): ServiceType | undefined =>
	SERVICE_TYPES.find((t) => t === value);

// Integer ids as numbers, anything else non-blank as a string
const toTripId = (value: unknown): number | string | undefined => {
	if (typeof value === "number") {
		return Number.isInteger(value) ? value : undefined;
	}
	if (typeof value === "bigint") return Number(value);
	if (typeof value === "string" && value.trim() !== "") return value.trim();
	return undefined;
};

// agg_daily_metrics row -> synthesized trip; `position` is the 1-based rank
// of the row in the full ordered result
export const mapDailyMetricRow = (
	row: Row,
	position: number,
): TripRecord | undefined => {
	// Required: service type and the metric date
	const serviceType = toServiceType(row.service_type);
	const metricDate = parseTimestamp(row.metric_date);
	if (!serviceType || !metricDate) return undefined;

	// An aggregate has no real pickup/dropoff; both are the metric date
	const timestamp = metricDate.toISOString();
	return {
		trip_id: position,
		service_type: serviceType,
		pickup_datetime: timestamp,
		dropoff_datetime: timestamp,
		pickup_borough: null,
		pickup_zone: null,
		dropoff_borough: null,
		dropoff_zone: null,
		trip_distance: toNonNegativeFloat(row.avg_trip_distance),
		total_amount: toFloat(row.total_revenue),
		trip_duration_sec: toNonNegativeInt(row.avg_trip_duration_sec),
	};
};

// fact_trips row -> trip
export const mapTripRow = (row: Row): TripRecord | undefined => {
	// Required: id, service type and both timestamps
	const tripId = toTripId(row.trip_id);
	const serviceType = toServiceType(row.service_type);
	const pickup = parseTimestamp(row.pickup_datetime);
	const dropoff = parseTimestamp(row.dropoff_datetime);
	if (tripId === undefined || !serviceType || !pickup || !dropoff) {
		return undefined;
	}

	// Everything else is optional and falls back to null / 0
	return {
		trip_id: tripId,
		service_type: serviceType,
		pickup_datetime: pickup.toISOString(),
		dropoff_datetime: dropoff.toISOString(),
		pickup_borough: toOptionalString(row.pickup_borough),
		pickup_zone: toOptionalString(row.pickup_zone),
		dropoff_borough: toOptionalString(row.dropoff_borough),
		dropoff_zone: toOptionalString(row.dropoff_zone),
		trip_distance: toNonNegativeFloat(row.trip_distance),
		total_amount: toFloat(row.total_amount),
		trip_duration_sec: toNonNegativeInt(row.trip_duration_sec),
	};
};
