import type { SqlParam } from "../../lib/database";
import type { QueryFilter } from "../../types/dto";

export type ComparisonOperator = "=" | "<" | "<=" | ">" | ">=";

export type Comparison = {
	column: string;
	op: ComparisonOperator;
	value: SqlParam;
};

// Clause text plus the values for its "?" placeholders, left to right
export type WhereClause = {
	clause: string;
	params: SqlParam[];
};

const IDENTIFIER = /^[A-Za-z_][A-Za-z0-9_]*$/;

// Collects (column, operator, value) triples and renders them as an
// AND-combined clause with positional placeholders
export class WhereBuilder {
	private readonly comparisons: Comparison[] = [];

	and(column: string, op: ComparisonOperator, value: SqlParam): this {
		// Columns come from source definitions, never from the request
		if (!IDENTIFIER.test(column)) {
			throw new Error(`Refusing untrusted column name: ${column}`);
		}
		this.comparisons.push({ column, op, value });
		return this;
	}

	build(): WhereClause {
		// No filters: match everything
		if (this.comparisons.length === 0) return { clause: "1=1", params: [] };

		// Values never enter the SQL text, only the params list
		const clause = this.comparisons
			.map((c) => `${c.column} ${c.op} ?`)
			.join(" AND ");
		return { clause, params: this.comparisons.map((c) => c.value) };
	}
}

// Columns a source exposes to filtering
export type FilterColumns = {
	// Adds the bounds for an inclusive [start, end] day range
	dateRange: (builder: WhereBuilder, start: string, end: string) => void;
	serviceType: string;
	borough?: string; // absent: the borough filter is ignored
};

export const buildPredicate = (
	columns: FilterColumns,
	filter: QueryFilter,
): WhereClause => {
	const builder = new WhereBuilder();

	// Half a date range behaves as no date range
	if (filter.startDate && filter.endDate) {
		columns.dateRange(builder, filter.startDate, filter.endDate);
	}

	// Service type: exact match on the stored value
	if (filter.serviceType) {
		builder.and(columns.serviceType, "=", filter.serviceType);
	}

	// Borough: only for sources that have one
	if (filter.borough && columns.borough) {
		builder.and(columns.borough, "=", filter.borough);
	}

	return builder.build();
};
