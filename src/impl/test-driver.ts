/**
 * Test driver that records statements instead of running them.
 *
 * Queries return queued result sets (or nothing); inserts hand out
 * increasing row ids. Used by tests that assert on generated SQL.
 */

import type {Driver, RawRow, RunResult} from "./database.js";

export interface RecordedStatement {
	sql: string;
	params: unknown[];
}

export class RecordingDriver implements Driver {
	readonly statements: RecordedStatement[];
	closeCount: number;
	#results: RawRow[][];
	#failures: unknown[];
	#nextRowid: number;

	constructor() {
		this.statements = [];
		this.closeCount = 0;
		this.#results = [];
		this.#failures = [];
		this.#nextRowid = 1;
	}

	/**
	 * Queue the rows the next all() call returns.
	 */
	queue(...rows: RawRow[]): this {
		this.#results.push(rows);
		return this;
	}

	/**
	 * Make the next statement throw `error`.
	 */
	fail(error: unknown): this {
		this.#failures.push(error);
		return this;
	}

	get last(): RecordedStatement | undefined {
		return this.statements[this.statements.length - 1];
	}

	#record(sql: string, params: readonly unknown[]): void {
		this.statements.push({sql, params: [...params]});
		if (this.#failures.length > 0) {
			throw this.#failures.shift();
		}
	}

	async all(sql: string, params: readonly unknown[]): Promise<RawRow[]> {
		this.#record(sql, params);
		return this.#results.shift() ?? [];
	}

	async run(sql: string, params: readonly unknown[]): Promise<RunResult> {
		this.#record(sql, params);
		if (sql.startsWith("INSERT")) {
			return {changes: 1, lastInsertRowid: this.#nextRowid++};
		}
		return {changes: sql.startsWith("CREATE") ? 0 : 1, lastInsertRowid: 0};
	}

	async close(): Promise<void> {
		this.closeCount++;
	}
}
