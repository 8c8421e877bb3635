/**
 * Query builder - accumulates clauses and renders one parameterized SELECT.
 *
 * Condition, join and order text are raw SQL fragments: trusted caller input,
 * inserted as written. Literal values only ever travel as `?` parameters.
 */

import {Entity} from "./record.js";
import {QueryError} from "./errors.js";
import type {Table} from "./table.js";
import type {Database} from "./database.js";

export type JoinType = "INNER" | "LEFT" | "RIGHT" | "FULL";

export type OrderDirection = "ASC" | "DESC";

export interface ParsedQuery {
	sql: string;
	params: unknown[];
}

/**
 * A raw SQL fragment and the parameters for its placeholders.
 */
interface Fragment {
	sql: string;
	params: unknown[];
}

function assertCount(value: number, clause: "LIMIT" | "OFFSET"): void {
	if (!Number.isInteger(value) || value < 0) {
		throw new QueryError(
			`${clause} must be a non-negative integer, got ${value}`,
		);
	}
}

/**
 * Fluent SELECT builder over one record type.
 *
 * Configuration methods may be called in any order; rendering always follows
 * `SELECT … FROM … [JOIN …] [WHERE …] [GROUP BY …] [HAVING …] [ORDER BY …]
 * [LIMIT …] [OFFSET …]`. `where` and `join` accumulate, every other clause
 * keeps its last value.
 *
 * @example
 * const rows = await db.query(Employees)
 *   .where("salary > ?", 40000)
 *   .where("department_id = ? OR department_id IS NULL", it.get("id"))
 *   .orderBy("name")
 *   .limit(10)
 *   .all();
 */
export class QueryBuilder<T extends Table = Table> {
	readonly table: T;
	#db: Database;
	#projection: string[];
	#joins: string[];
	#predicates: Fragment[];
	#groupBy: string | null;
	#having: Fragment | null;
	#orderBy: string | null;
	#limit: number | null;
	#offset: number | null;

	constructor(db: Database, table: T) {
		this.table = table;
		this.#db = db;
		this.#projection = [];
		this.#joins = [];
		this.#predicates = [];
		this.#groupBy = null;
		this.#having = null;
		this.#orderBy = null;
		this.#limit = null;
		this.#offset = null;
	}

	// ==========================================================================
	// Clauses
	// ==========================================================================

	/**
	 * Set the projection. No columns means `*`, or `<table>.*` once the query
	 * has joins.
	 */
	select(...columns: string[]): this {
		this.#projection = columns;
		return this;
	}

	/**
	 * Add a predicate. Predicates are joined with AND in call order; the text
	 * is not parsed, so an inner OR needs its own parentheses.
	 */
	where(condition: string, ...params: unknown[]): this {
		this.#predicates.push({sql: condition, params});
		return this;
	}

	join(table: string, on: string, type: JoinType = "INNER"): this {
		this.#joins.push(`${type} JOIN ${table} ON ${on}`);
		return this;
	}

	leftJoin(table: string, on: string): this {
		return this.join(table, on, "LEFT");
	}

	rightJoin(table: string, on: string): this {
		return this.join(table, on, "RIGHT");
	}

	groupBy(column: string): this {
		this.#groupBy = column;
		return this;
	}

	having(condition: string, ...params: unknown[]): this {
		this.#having = {sql: condition, params};
		return this;
	}

	orderBy(column: string, direction: OrderDirection = "ASC"): this {
		this.#orderBy = `${column} ${direction}`;
		return this;
	}

	limit(limit: number): this {
		assertCount(limit, "LIMIT");
		this.#limit = limit;
		return this;
	}

	offset(offset: number): this {
		assertCount(offset, "OFFSET");
		this.#offset = offset;
		return this;
	}

	// ==========================================================================
	// Rendering
	// ==========================================================================

	#whereClause(): Fragment | null {
		if (this.#predicates.length === 0) {
			return null;
		}

		return {
			sql: ` WHERE ${this.#predicates.map((p) => p.sql).join(" AND ")}`,
			params: this.#predicates.flatMap((p) => p.params),
		};
	}

	/**
	 * Render the statement without executing it. Parameters follow clause
	 * order: predicate parameters, then HAVING parameters.
	 */
	toSQL(): ParsedQuery {
		// A bare * over a join would let joined columns shadow the record's own
		let projection = this.#joins.length > 0 ? `${this.table.name}.*` : "*";
		if (this.#projection.length > 0) {
			projection = this.#projection.join(", ");
		}
		let sql = `SELECT ${projection} FROM ${this.table.name}`;
		const params: unknown[] = [];

		if (this.#joins.length > 0) {
			sql += " " + this.#joins.join(" ");
		}

		const where = this.#whereClause();
		if (where) {
			sql += where.sql;
			params.push(...where.params);
		}

		if (this.#groupBy !== null) {
			sql += ` GROUP BY ${this.#groupBy}`;
		}

		if (this.#having !== null) {
			sql += ` HAVING ${this.#having.sql}`;
			params.push(...this.#having.params);
		}

		if (this.#orderBy !== null) {
			sql += ` ORDER BY ${this.#orderBy}`;
		}

		if (this.#limit !== null) {
			sql += ` LIMIT ${this.#limit}`;
		} else if (this.#offset !== null) {
			// SQLite only accepts OFFSET after a LIMIT; -1 means no limit
			sql += " LIMIT -1";
		}

		if (this.#offset !== null) {
			sql += ` OFFSET ${this.#offset}`;
		}

		return {sql, params};
	}

	/**
	 * Render the COUNT(*) statement: only the predicates and their own
	 * parameters take part.
	 */
	toCountSQL(): ParsedQuery {
		let sql = `SELECT COUNT(*) AS count FROM ${this.table.name}`;
		const params: unknown[] = [];

		const where = this.#whereClause();
		if (where) {
			sql += where.sql;
			params.push(...where.params);
		}

		return {sql, params};
	}

	// ==========================================================================
	// Execution
	// ==========================================================================

	/**
	 * Run the query and materialize every row, in the order the engine
	 * returns them.
	 */
	async all(): Promise<Entity<T>[]> {
		const {sql, params} = this.toSQL();
		const rows = await this.#db.all(sql, params);
		return rows.map((row) => Entity.fromRow(this.#db, this.table, row));
	}

	/**
	 * Force LIMIT 1 and return the single row, or null.
	 */
	async first(): Promise<Entity<T> | null> {
		this.#limit = 1;
		const [row] = await this.all();
		return row ?? null;
	}

	async count(): Promise<number> {
		const {sql, params} = this.toCountSQL();
		const [row] = await this.#db.all(sql, params);
		const count = row?.count;

		if (typeof count === "number") {
			return count;
		}
		if (typeof count === "bigint") {
			return Number(count);
		}

		throw new QueryError(`COUNT(*) returned no number`, sql);
	}

	async exists(): Promise<boolean> {
		return (await this.count()) > 0;
	}
}
