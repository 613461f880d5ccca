// Data transfer objects served by the API

export const SERVICE_TYPES = ["yellow", "green", "fhv", "fhvhv"] as const;
export type ServiceType = (typeof SERVICE_TYPES)[number];

export const TRIP_SOURCES = ["daily_metrics", "trip_records"] as const;
export type TripSourceName = (typeof TRIP_SOURCES)[number];

// One row of GET /api/trips
export type TripRecord = {
	trip_id: number | string;
	service_type: ServiceType;
	pickup_datetime: string; // ISO-8601, UTC
	dropoff_datetime: string;
	pickup_borough: string | null;
	pickup_zone: string | null;
	dropoff_borough: string | null;
	dropoff_zone: string | null;
	trip_distance: number;
	total_amount: number;
	trip_duration_sec: number;
};

export type PaginationMetadata = {
	page: number;
	page_size: number;
	total_records: number;
	total_pages: number;
};

export type TripsResponse = {
	data: TripRecord[];
	pagination: PaginationMetadata;
};

// Request-scoped filter; start/end only apply together
export type QueryFilter = {
	startDate?: string; // YYYY-MM-DD
	endDate?: string;
	serviceType?: ServiceType;
	borough?: string;
};

export type User = {
	username: string;
	email: string | null;
	full_name: string | null;
	disabled: boolean;
};
