import { existsSync, readFileSync } from "node:fs";
import initSqlJs, { type Database, type Statement } from "sql.js";
import { logger } from "./logger";

export type SqlParam = string | number | null;
export type Row = Record<string, unknown>;

// Narrow database surface the API depends on. Both calls are parameterized:
// values only ever travel as bound parameters, never inside the SQL text.
export interface DbClient {
	executeScalar(
		query: string,
		params?: readonly SqlParam[],
	): Promise<number | null>;
	executeQuery(query: string, params?: readonly SqlParam[]): Promise<Row[]>;
}

// Raised for any driver failure; keeps the statement for the logs
export class DatabaseError extends Error {
	readonly query: string;

	constructor(query: string, cause: unknown) {
		super(
			`Query failed: ${cause instanceof Error ? cause.message : String(cause)}`,
			{ cause },
		);
		this.name = "DatabaseError";
		this.query = query;
	}
}

// First column of the first row -> number (or null when there is none)
const toScalar = (value: unknown): number | null => {
	if (value == null) return null;
	if (typeof value === "number") return value;
	if (typeof value === "string" && value.trim() !== "") {
		const n = Number(value);
		return Number.isFinite(n) ? n : null;
	}
	return null;
};

// Log every statement outside production
const logQuery = (query: string, params: readonly SqlParam[]) => {
	if (process.env.NODE_ENV !== "production") {
		logger.debug({ sql: query, params }, "query");
	}
};

export class SqliteClient implements DbClient {
	constructor(private readonly db: Database) {}

	async executeScalar(query: string, params: readonly SqlParam[] = []) {
		logQuery(query, params);
		const stmt = this.prepare(query, params);
		try {
			return stmt.step() ? toScalar(stmt.get()[0]) : null;
		} catch (e) {
			throw new DatabaseError(query, e);
		} finally {
			stmt.free();
		}
	}

	async executeQuery(query: string, params: readonly SqlParam[] = []) {
		logQuery(query, params);
		const stmt = this.prepare(query, params);
		try {
			const rows: Row[] = [];
			while (stmt.step()) rows.push(stmt.getAsObject());
			return rows;
		} catch (e) {
			throw new DatabaseError(query, e);
		} finally {
			stmt.free();
		}
	}

	// Compile and bind; syntax and binding errors surface as DatabaseError
	private prepare(query: string, params: readonly SqlParam[]) {
		let stmt: Statement;
		try {
			stmt = this.db.prepare(query);
		} catch (e) {
			throw new DatabaseError(query, e);
		}
		try {
			stmt.bind([...params]);
			return stmt;
		} catch (e) {
			stmt.free();
			throw new DatabaseError(query, e);
		}
	}
}

const SCHEMA_PATH = new URL("../../db/schema.sql", import.meta.url);

// Create the tables the API reads from (idempotent)
export const applySchema = (db: Database) => {
	db.exec(readFileSync(SCHEMA_PATH, "utf-8"));
};

// Load the SQLite file (or start empty for ":memory:" / a missing file) and
// make sure the schema exists. The file is read once; the API never writes.
export const openDatabase = async (filename: string): Promise<Database> => {
	const SQL = await initSqlJs();
	const onDisk = filename !== ":memory:" && existsSync(filename);

	const db = new SQL.Database(onDisk ? readFileSync(filename) : undefined);
	applySchema(db);
	return db;
};
