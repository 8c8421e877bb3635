/**
 * Record instances: a value map plus a dirty set, with the persistence
 * statements derived from primary-key state.
 */

import {AttributeError, PersistenceError} from "./errors.js";
import {
	decodeRow,
	decodeValue,
	type FieldName,
	type Insert,
	type Row,
	type Table,
} from "./table.js";
import type {Database, RawRow} from "./database.js";

/**
 * Singular form of a table name, used to derive foreign key columns
 * (`departments` → `department_id`).
 */
export function singular(name: string): string {
	if (/ies$/i.test(name)) {
		return name.slice(0, -3) + "y";
	}
	if (/(ss|x|z|ch|sh)es$/i.test(name)) {
		return name.slice(0, -2);
	}
	if (/[^su]s$/i.test(name) && !/is$/i.test(name)) {
		return name.slice(0, -1);
	}
	return name;
}

/**
 * A row of a record type, loaded or yet to be saved.
 *
 * Attribute access is checked against the table's declared fields. Writes are
 * tracked so save() only sends what changed.
 *
 * @example
 * const it = db.create(Departments, {name: "IT"});
 * await it.save();             // INSERT, then it.get("id") is set
 * it.set("budget", 120000);
 * await it.save();             // UPDATE departments SET budget = ? WHERE id = ?
 */
export class Entity<T extends Table = Table> {
	readonly table: T;
	#db: Database;
	#values: Map<string, unknown>;
	#dirty: Set<string>;
	#saving: Promise<void>;

	constructor(db: Database, table: T, values?: Insert<T>) {
		this.table = table;
		this.#db = db;
		this.#values = new Map();
		this.#dirty = new Set();
		this.#saving = Promise.resolve();

		if (values) {
			this.#assign(values);
		}
	}

	/**
	 * Build a bound, clean instance from a storage row.
	 */
	static fromRow<T extends Table>(
		db: Database,
		table: T,
		row: RawRow,
	): Entity<T> {
		const entity = new Entity(db, table);
		entity.#values = decodeRow(table, row);
		return entity;
	}

	// ==========================================================================
	// Attributes
	// ==========================================================================

	/**
	 * Current value of a declared field; undefined if it was never set or
	 * loaded.
	 */
	get<K extends FieldName<T>>(name: K): Row<T>[K] | undefined {
		this.#assertDeclared(name);
		// Values are written through set() or decoded by decodeRow()
		return this.#values.get(name) as Row<T>[K] | undefined;
	}

	/**
	 * Write a declared field and mark it dirty.
	 */
	set<K extends FieldName<T>>(name: K, value: Row<T>[K]): this {
		this.#write(name, value);
		return this;
	}

	/**
	 * Write several fields at once.
	 */
	assign(values: Insert<T>): this {
		this.#assign(values);
		return this;
	}

	/**
	 * Read any column of the loaded row, including joined or computed ones
	 * the table does not declare.
	 */
	column(name: string): unknown {
		if (!this.#values.has(name)) {
			this.#assertDeclared(name);
		}
		return this.#values.get(name);
	}

	isDirty(name?: string): boolean {
		return name === undefined ? this.#dirty.size > 0 : this.#dirty.has(name);
	}

	dirtyFields(): string[] {
		return [...this.#dirty];
	}

	primaryKeyValue(): unknown {
		return this.#values.get(this.table.primaryKey());
	}

	/**
	 * Whether the record holds a primary key, i.e. corresponds to a stored row.
	 */
	isBound(): boolean {
		const value = this.primaryKeyValue();
		return value !== undefined && value !== null;
	}

	toJSON(): Record<string, unknown> {
		return Object.fromEntries(this.#values);
	}

	// ==========================================================================
	// Persistence
	// ==========================================================================

	/**
	 * UPDATE the dirty columns of a bound record, or INSERT a new one and
	 * store the assigned primary key.
	 *
	 * Saves of one record run one after another. Only the values that were
	 * sent leave the dirty set, and only once the statement succeeded; a
	 * field written again while the statement ran stays dirty.
	 */
	save(): Promise<void> {
		const saving = this.#saving.then(() => this.#save());
		// Later saves wait for this one; its failure is reported to its caller.
		this.#saving = saving.then(
			() => undefined,
			() => undefined,
		);
		return saving;
	}

	async #save(): Promise<void> {
		const {name} = this.table;
		if (!name) {
			throw new PersistenceError(
				"Cannot save a record whose type has no table name",
			);
		}

		const pk = this.table.primaryKey();
		const sent = new Map(
			[...this.#dirty].map((col) => [col, this.#values.get(col)]),
		);

		if (this.isBound()) {
			const cols = [...sent.keys()];
			if (cols.length === 0) {
				return;
			}

			const assignments = cols.map((col) => `${col} = ?`).join(", ");
			const params = cols.map((col) => sent.get(col));
			params.push(this.primaryKeyValue());

			const result = await this.#db.run(
				`UPDATE ${name} SET ${assignments} WHERE ${pk} = ?`,
				params,
			);
			if (result.changes === 0) {
				throw new PersistenceError(
					`No "${name}" row with ${pk} = ${String(params[params.length - 1])} to update`,
					name,
				);
			}
		} else {
			const cols = this.table
				.fields()
				.map((field) => field.name)
				.filter((col) => this.#values.has(col));
			for (const col of cols) {
				sent.set(col, this.#values.get(col));
			}

			const sql =
				cols.length === 0
					? `INSERT INTO ${name} DEFAULT VALUES`
					: `INSERT INTO ${name} (${cols.join(", ")}) VALUES (${cols.map(() => "?").join(", ")})`;
			const result = await this.#db.run(
				sql,
				cols.map((col) => sent.get(col)),
			);

			// The row id is the key only for integer primary keys
			const pkField = this.table.field(pk);
			if (pkField && pkField.baseType === "INTEGER") {
				this.#values.set(pk, decodeValue(result.lastInsertRowid, pkField));
			}
		}

		for (const [col, value] of sent) {
			if (Object.is(this.#values.get(col), value)) {
				this.#dirty.delete(col);
			}
		}
	}

	/**
	 * DELETE the stored row. Returns whether a row was removed.
	 */
	async delete(): Promise<boolean> {
		const {name} = this.table;
		if (!name) {
			throw new PersistenceError(
				"Cannot delete a record whose type has no table name",
			);
		}
		if (!this.isBound()) {
			throw new PersistenceError(
				`Cannot delete a "${name}" record without a primary key`,
				name,
			);
		}

		const result = await this.#db.run(
			`DELETE FROM ${name} WHERE ${this.table.primaryKey()} = ?`,
			[this.primaryKeyValue()],
		);
		return result.changes > 0;
	}

	// ==========================================================================
	// Relations
	// ==========================================================================

	/**
	 * Load the record this one points at through `foreignKey`
	 * (default `<singular target table>_id`).
	 */
	async belongsTo<U extends Table>(
		target: U,
		foreignKey: string = `${singular(target.name)}_id`,
	): Promise<Entity<U> | null> {
		const value = this.#values.get(foreignKey);
		if (value === undefined || value === null) {
			return null;
		}

		return this.#db
			.query(target)
			.where(`${target.primaryKey()} = ?`, value)
			.first();
	}

	/**
	 * Load every record of `target` whose `foreignKey`
	 * (default `<singular own table>_id`) points at this one.
	 */
	async hasMany<U extends Table>(
		target: U,
		foreignKey: string = `${singular(this.table.name)}_id`,
	): Promise<Entity<U>[]> {
		if (!this.isBound()) {
			return [];
		}

		return this.#db
			.query(target)
			.where(`${foreignKey} = ?`, this.primaryKeyValue())
			.all();
	}

	// ==========================================================================
	// Internals
	// ==========================================================================

	#assertDeclared(name: string): void {
		if (!this.table.field(name)) {
			throw new AttributeError(this.table.name, name);
		}
	}

	#write(name: string, value: unknown): void {
		this.#assertDeclared(name);
		this.#values.set(name, value);
		this.#dirty.add(name);
	}

	#assign(values: Insert<T>): void {
		for (const [name, value] of Object.entries(values)) {
			this.#write(name, value);
		}
	}
}
