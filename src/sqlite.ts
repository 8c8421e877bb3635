/**
 * better-sqlite3 driver for rowkit
 *
 * Provides a Driver implementation for better-sqlite3 (Node.js).
 * The connection is persistent - call close() (or let withDatabase() do it)
 * when done.
 *
 * Requires: better-sqlite3
 */

import Database from "better-sqlite3";
import {z} from "zod";
import type {Driver, RawRow, RunResult} from "./impl/database.js";
import {
	ConnectionError,
	ConstraintViolationError,
	QueryError,
	type ConstraintKind,
} from "./impl/errors.js";

// ============================================================================
// Configuration
// ============================================================================

export const SQLiteOptionsSchema = z.object({
	/** `:memory:`, a file path, or a `file:` prefixed path */
	url: z.string().min(1),
	/** Enforce FOREIGN KEY constraints (and their ON DELETE policies) */
	foreignKeys: z.boolean().default(true),
	/** Journal mode; files default to WAL, in-memory databases are left alone */
	journalMode: z.enum(["WAL", "DELETE", "MEMORY", "TRUNCATE", "OFF"]).optional(),
	readonly: z.boolean().default(false),
	/** Milliseconds to wait on a locked database before failing */
	timeout: z.number().int().nonnegative().default(5000),
});

export type SQLiteOptions = z.input<typeof SQLiteOptionsSchema>;

function parseOptions(
	options: string | SQLiteOptions,
): z.output<typeof SQLiteOptionsSchema> {
	const result = SQLiteOptionsSchema.safeParse(
		typeof options === "string" ? {url: options} : options,
	);
	if (!result.success) {
		throw new ConnectionError(
			`Invalid SQLite options: ${result.error.issues.map((issue) => `${issue.path.join(".") || "options"}: ${issue.message}`).join("; ")}`,
			{cause: result.error},
		);
	}
	return result.data;
}

// ============================================================================
// Helpers
// ============================================================================

/**
 * better-sqlite3 binds neither booleans nor undefined.
 */
function bindParams(params: readonly unknown[]): unknown[] {
	return params.map((value) => {
		if (typeof value === "boolean") {
			return value ? 1 : 0;
		}
		if (value === undefined) {
			return null;
		}
		return value;
	});
}

function isRow(value: unknown): value is RawRow {
	return value !== null && typeof value === "object" && !Array.isArray(value);
}

function constraintKind(code: string, message: string): ConstraintKind {
	if (code === "SQLITE_CONSTRAINT_UNIQUE") return "unique";
	if (code === "SQLITE_CONSTRAINT_PRIMARYKEY") return "primary_key";
	if (code === "SQLITE_CONSTRAINT_FOREIGNKEY") return "foreign_key";
	if (code === "SQLITE_CONSTRAINT_NOTNULL") return "not_null";
	if (code === "SQLITE_CONSTRAINT_CHECK") return "check";
	if (message.includes("UNIQUE")) return "unique";
	if (message.includes("FOREIGN KEY")) return "foreign_key";
	if (message.includes("NOT NULL")) return "not_null";
	if (message.includes("CHECK")) return "check";
	return "unknown";
}

/**
 * SQLite driver using better-sqlite3.
 *
 * @example
 * import SQLiteDriver from "rowkit/sqlite";
 * import {Database} from "rowkit";
 *
 * const db = new Database(new SQLiteDriver("file:app.db"));
 * await db.createTable(Departments);
 *
 * // When done:
 * await db.close();
 */
export default class SQLiteDriver implements Driver {
	#db: Database.Database;

	constructor(options: string | SQLiteOptions) {
		const config = parseOptions(options);

		// Handle file: prefix
		const path = config.url.startsWith("file:")
			? config.url.slice(5)
			: config.url;
		const inMemory = path === ":memory:";

		try {
			this.#db = new Database(path, {
				readonly: config.readonly,
				timeout: config.timeout,
			});
		} catch (error) {
			throw new ConnectionError(`Could not open SQLite database "${path}"`, {
				cause: error,
			});
		}

		if (!config.readonly) {
			const journalMode = config.journalMode ?? (inMemory ? null : "WAL");
			if (journalMode !== null) {
				this.#db.pragma(`journal_mode = ${journalMode}`);
			}
		}

		this.#db.pragma(`foreign_keys = ${config.foreignKeys ? "ON" : "OFF"}`);
	}

	/**
	 * Convert SQLite errors to rowkit errors.
	 */
	#handleError(error: unknown, sql: string): never {
		if (error instanceof Error && "code" in error) {
			const code = typeof error.code === "string" ? error.code : "";
			const message = error.message;

			if (code.startsWith("SQLITE_CONSTRAINT")) {
				// Example: "UNIQUE constraint failed: users.email"
				const match = message.match(/constraint failed: (\w+)\.(\w+)/i);
				const table = match ? match[1] : undefined;
				const column = match ? match[2] : undefined;

				throw new ConstraintViolationError(
					message,
					{
						kind: constraintKind(code, message),
						constraint: match ? `${table}.${column}` : undefined,
						table,
						column,
					},
					{cause: error},
				);
			}
		}

		const message = error instanceof Error ? error.message : String(error);
		throw new QueryError(message, sql, {cause: error});
	}

	async all(sql: string, params: readonly unknown[]): Promise<RawRow[]> {
		try {
			// Safe integers keep INTEGER values above 2^53 exact; decodeRow turns
			// them back into numbers for number fields.
			const rows: unknown[] = this.#db
				.prepare(sql)
				.safeIntegers(true)
				.all(...bindParams(params));
			return rows.filter(isRow);
		} catch (error) {
			return this.#handleError(error, sql);
		}
	}

	async run(sql: string, params: readonly unknown[]): Promise<RunResult> {
		try {
			const result = this.#db.prepare(sql).run(...bindParams(params));
			return {
				changes: result.changes,
				lastInsertRowid: result.lastInsertRowid,
			};
		} catch (error) {
			return this.#handleError(error, sql);
		}
	}

	async close(): Promise<void> {
		this.#db.close();
	}
}
