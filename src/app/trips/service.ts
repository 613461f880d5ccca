import type { DbClient, Row } from "../../lib/database";
import { logger } from "../../lib/logger";
import type {
	PaginationMetadata,
	QueryFilter,
	TripRecord,
	TripsResponse,
} from "../../types/dto";
import {
	TripQueryError,
	TripQueryFailure,
	type TripQueryFailureKind,
} from "./errors";
import { buildPredicate, type WhereClause } from "./query";
import type { TripsQuery } from "./request";
import type { TripSource } from "./sources";

// total_pages rounds up; a non-positive page size has no pages
export const paginationFor = (
	page: number,
	pageSize: number,
	totalRecords: number,
): PaginationMetadata => ({
	page,
	page_size: pageSize,
	total_records: totalRecords,
	total_pages: pageSize > 0 ? Math.ceil(totalRecords / pageSize) : 0,
});

// Returned in place of a page whenever the pipeline fails
export const emptyTripsResponse = (
	page: number,
	pageSize: number,
): TripsResponse => ({
	data: [],
	pagination: paginationFor(page, pageSize, 0),
});

export const toQueryFilter = (query: TripsQuery): QueryFilter => ({
	startDate: query.start_date,
	endDate: query.end_date,
	serviceType: query.service_type,
	borough: query.borough,
});

// Run one pipeline stage, re-raising anything it throws as a typed failure
const stage = async <T>(
	kind: TripQueryFailureKind,
	run: () => T | Promise<T>,
): Promise<T> => {
	try {
		return await run();
	} catch (e) {
		throw new TripQueryError(kind, e);
	}
};

export class TripService {
	constructor(
		private readonly db: DbClient,
		private readonly source: TripSource,
	) {}

	//  --- GET /api/trips ---
	// One page of trips plus pagination meta.
	// Count and page are two separate statements; under concurrent writes the
	// total may not match the page exactly.
	async getTrips(query: TripsQuery): Promise<TripsResponse> {
		const page = query.page;
		const pageSize = query.page_size;
		const offset = (page - 1) * pageSize; // validated to stay a safe integer

		// Same WHERE clause for the count and the page
		const where = await stage(TripQueryFailure.Predicate, () =>
			buildPredicate(this.source.filters, toQueryFilter(query)),
		);

		// Total matching rows, then the rows of this page
		const total = await stage(TripQueryFailure.Count, () =>
			this.countTrips(where),
		);
		const rows = await stage(TripQueryFailure.Page, () =>
			this.fetchPage(where, offset, pageSize),
		);

		// Convert rows; unusable ones are dropped, not reported
		const data = await stage(TripQueryFailure.Mapping, () =>
			this.toRecords(rows, offset),
		);

		const skipped = rows.length - data.length;
		if (skipped > 0) {
			logger.warn(
				{ source: this.source.name, skipped, page, pageSize },
				"Dropped malformed trip rows",
			);
		}

		return { data, pagination: paginationFor(page, pageSize, total) };
	}

	private async countTrips(where: WhereClause): Promise<number> {
		const { table } = this.source;
		const sql = `SELECT COUNT(*) AS total FROM ${table} WHERE ${where.clause}`;
		// No result counts as zero
		return (await this.db.executeScalar(sql, where.params)) ?? 0;
	}

	private async fetchPage(
		where: WhereClause,
		offset: number,
		pageSize: number,
	): Promise<Row[]> {
		const { table, columns, orderBy, pagination } = this.source;
		const select = [
			`SELECT ${columns.join(", ")} FROM ${table}`,
			`WHERE ${where.clause}`,
			`ORDER BY ${orderBy}`,
		].join(" ");

		// Large fact table: let the store skip and limit
		if (pagination === "server") {
			return this.db.executeQuery(`${select} LIMIT ? OFFSET ?`, [
				...where.params,
				pageSize,
				offset,
			]);
		}

		// Small aggregate table: read it whole and slice in memory
		const rows = await this.db.executeQuery(select, where.params);
		return rows.slice(offset, offset + pageSize);
	}

	private toRecords(rows: Row[], offset: number): TripRecord[] {
		const data: TripRecord[] = [];
		rows.forEach((row, i) => {
			// Position in the whole ordered result, 1-based
			const record = this.source.toRecord(row, offset + i + 1);
			if (record) data.push(record);
		});
		return data;
	}
}
