import { describe, expect, it } from "vitest";
import {
	mapDailyMetricRow,
	mapTripRow,
	toFloat,
	toNonNegativeInt,
} from "../src/app/trips/mapper";

describe("numeric conversion", () => {
	it("falls back to zero for missing or unparseable values", () => {
		expect(toFloat(undefined)).toBe(0);
		expect(toFloat(null)).toBe(0);
		expect(toFloat("")).toBe(0);
		expect(toFloat("n/a")).toBe(0);
		expect(toFloat(true)).toBe(0);
		expect(toFloat("12.75")).toBe(12.75);
		expect(toFloat(3n)).toBe(3);
	});

	it("truncates integers and clamps negatives", () => {
		expect(toNonNegativeInt(812.9)).toBe(812);
		expect(toNonNegativeInt("601")).toBe(601);
		expect(toNonNegativeInt(-40)).toBe(0);
	});
});

describe("mapDailyMetricRow", () => {
	it("synthesizes a trip from an aggregate row", () => {
		const row = {
			metric_date: "2024-03-02",
			service_type: "yellow",
			total_trips: 1200,
			total_revenue: 25431.5,
			avg_trip_distance: 3.2,
			avg_trip_duration_sec: 845.6,
		};

		expect(mapDailyMetricRow(row, 7)).toEqual({
			trip_id: 7,
			service_type: "yellow",
			pickup_datetime: "2024-03-02T00:00:00.000Z",
			dropoff_datetime: "2024-03-02T00:00:00.000Z",
			pickup_borough: null,
			pickup_zone: null,
			dropoff_borough: null,
			dropoff_zone: null,
			trip_distance: 3.2,
			total_amount: 25431.5,
			trip_duration_sec: 845,
		});
	});

	it("zeroes numeric fields that are absent or not numbers", () => {
		const record = mapDailyMetricRow(
			{
				metric_date: "2024-03-02",
				service_type: "green",
				total_revenue: "abc",
				avg_trip_distance: null,
			},
			1,
		);

		expect(record?.trip_distance).toBe(0);
		expect(record?.total_amount).toBe(0);
		expect(record?.trip_duration_sec).toBe(0);
	});

	it("drops rows without a usable date or service type", () => {
		expect(mapDailyMetricRow({ service_type: "green" }, 1)).toBeUndefined();
		expect(
			mapDailyMetricRow({ metric_date: "not a date", service_type: "green" }, 1),
		).toBeUndefined();
		expect(
			mapDailyMetricRow({ metric_date: "2024-03-02", service_type: "bus" }, 1),
		).toBeUndefined();
	});

	it("only accepts service types already in canonical form", () => {
		// the service_type filter compares stored values as-is
		expect(
			mapDailyMetricRow({ metric_date: "2024-03-02", service_type: "Yellow" }, 1),
		).toBeUndefined();
		expect(
			mapDailyMetricRow({ metric_date: "2024-03-02", service_type: " green" }, 1),
		).toBeUndefined();
	});
});

describe("mapTripRow", () => {
	const row = {
		trip_id: 42,
		service_type: "green",
		pickup_datetime: "2024-01-15 08:30:00",
		dropoff_datetime: "2024-01-15T08:52:10",
		pickup_borough: "Brooklyn",
		pickup_zone: "Park Slope",
		dropoff_borough: "Manhattan",
		dropoff_zone: "  ",
		trip_distance: 4.1,
		total_amount: 23.8,
		trip_duration_sec: 1330,
	};

	it("maps a complete row", () => {
		expect(mapTripRow(row)).toEqual({
			trip_id: 42,
			service_type: "green",
			pickup_datetime: "2024-01-15T08:30:00.000Z",
			dropoff_datetime: "2024-01-15T08:52:10.000Z",
			pickup_borough: "Brooklyn",
			pickup_zone: "Park Slope",
			dropoff_borough: "Manhattan",
			dropoff_zone: null,
			trip_distance: 4.1,
			total_amount: 23.8,
			trip_duration_sec: 1330,
		});
	});

	it("keeps string identifiers", () => {
		expect(mapTripRow({ ...row, trip_id: "a-17" })?.trip_id).toBe("a-17");
	});

	it("drops rows missing a required field", () => {
		expect(mapTripRow({ ...row, trip_id: null })).toBeUndefined();
		expect(mapTripRow({ ...row, service_type: undefined })).toBeUndefined();
		expect(mapTripRow({ ...row, pickup_datetime: "" })).toBeUndefined();
		expect(mapTripRow({ ...row, dropoff_datetime: 17 })).toBeUndefined();
	});

	it("drops rows whose timestamps are not timestamps", () => {
		expect(mapTripRow({ ...row, pickup_datetime: "1" })).toBeUndefined();
		expect(mapTripRow({ ...row, dropoff_datetime: "unit 12" })).toBeUndefined();
		expect(
			mapTripRow({ ...row, pickup_datetime: "2024-01-15 25:00:00" }),
		).toBeUndefined();
	});

	it("zeroes malformed numeric fields without dropping the row", () => {
		const record = mapTripRow({
			...row,
			trip_distance: "",
			total_amount: "free",
			trip_duration_sec: -5,
		});

		expect(record?.trip_id).toBe(42);
		expect(record?.trip_distance).toBe(0);
		expect(record?.total_amount).toBe(0);
		expect(record?.trip_duration_sec).toBe(0);
	});
});
