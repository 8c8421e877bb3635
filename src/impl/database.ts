/**
 * Session layer: one explicitly owned driver shared by record types,
 * records and query builders.
 */

import {generateDDL} from "./ddl.js";
import {Entity} from "./record.js";
import {QueryBuilder} from "./query.js";
import {ConnectionError} from "./errors.js";
import type {Insert, Table} from "./table.js";

// ============================================================================
// Driver Interface
// ============================================================================

export type RawRow = Record<string, unknown>;

export interface RunResult {
	/** Rows changed by the statement */
	changes: number;
	/** Row id of the last inserted row */
	lastInsertRowid: number | bigint;
}

/**
 * Database driver interface.
 *
 * Drivers receive finished SQL with `?` placeholders and a flat parameter
 * list, and translate engine failures into DatabaseError subclasses.
 * Every statement runs in the engine's autocommit mode.
 */
export interface Driver {
	/**
	 * Execute a query and return all rows, keyed by column name.
	 */
	all(sql: string, params: readonly unknown[]): Promise<RawRow[]>;

	/**
	 * Execute a statement and report affected rows and the last insert id.
	 */
	run(sql: string, params: readonly unknown[]): Promise<RunResult>;

	/**
	 * Close the database connection.
	 */
	close(): Promise<void>;
}

// ============================================================================
// Events
// ============================================================================

/**
 * Dispatched as "query" before each statement is sent to the driver.
 *
 * @example
 * db.addEventListener("query", (e) => {
 *   if (e instanceof QueryEvent) console.debug(e.sql, e.params);
 * });
 */
export class QueryEvent extends Event {
	readonly sql: string;
	readonly params: readonly unknown[];

	constructor(sql: string, params: readonly unknown[]) {
		super("query");
		this.sql = sql;
		this.params = params;
	}
}

// ============================================================================
// Database
// ============================================================================

/**
 * Owns a driver and hands it to everything that talks to storage.
 *
 * @example
 * const db = new Database(new SQLiteDriver(":memory:"));
 * await db.createTable(Departments);
 *
 * const it = db.create(Departments, {name: "IT", budget: 100000});
 * await it.save();
 *
 * const rich = await db.query(Departments).where("budget > ?", 50000).all();
 * await db.close();
 */
export class Database extends EventTarget {
	#driver: Driver;
	#closed: boolean;

	constructor(driver: Driver) {
		super();
		this.#driver = driver;
		this.#closed = false;
	}

	get closed(): boolean {
		return this.#closed;
	}

	// ==========================================================================
	// Schema
	// ==========================================================================

	/**
	 * Create the table for a record type if it does not exist.
	 * Returns the DDL that was run.
	 */
	async createTable<T extends Table>(table: T): Promise<string> {
		const ddl = generateDDL(table);
		await this.run(ddl);
		return ddl;
	}

	async dropTable<T extends Table>(table: T): Promise<void> {
		await this.run(`DROP TABLE IF EXISTS ${table.name}`);
	}

	// ==========================================================================
	// Records
	// ==========================================================================

	/**
	 * Create a new, unsaved record. Every given value is marked dirty.
	 */
	create<T extends Table>(table: T, values?: Insert<T>): Entity<T> {
		return new Entity(this, table, values);
	}

	query<T extends Table>(table: T): QueryBuilder<T> {
		return new QueryBuilder(this, table);
	}

	/**
	 * Load one record by primary key.
	 */
	async get<T extends Table>(table: T, id: unknown): Promise<Entity<T> | null> {
		return this.query(table).where(`${table.primaryKey()} = ?`, id).first();
	}

	// ==========================================================================
	// Raw execution
	// ==========================================================================

	async all(sql: string, params: readonly unknown[] = []): Promise<RawRow[]> {
		this.#assertOpen();
		this.dispatchEvent(new QueryEvent(sql, params));
		return this.#driver.all(sql, params);
	}

	async run(sql: string, params: readonly unknown[] = []): Promise<RunResult> {
		this.#assertOpen();
		this.dispatchEvent(new QueryEvent(sql, params));
		return this.#driver.run(sql, params);
	}

	/**
	 * Close the driver. Safe to call more than once.
	 */
	async close(): Promise<void> {
		if (this.#closed) {
			return;
		}

		this.#closed = true;
		await this.#driver.close();
	}

	#assertOpen(): void {
		if (this.#closed) {
			throw new ConnectionError("Database is closed");
		}
	}
}

/**
 * Run `fn` with a database over `driver`, closing it once `fn` settles.
 *
 * @example
 * const count = await withDatabase(new SQLiteDriver("app.db"), async (db) => {
 *   await db.createTable(Departments);
 *   return db.query(Departments).count();
 * });
 */
export async function withDatabase<R>(
	driver: Driver,
	fn: (db: Database) => Promise<R>,
): Promise<R> {
	const db = new Database(driver);
	try {
		return await fn(db);
	} finally {
		await db.close();
	}
}
